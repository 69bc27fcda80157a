import moo from 'moo';
import { ParsingError } from '../errors';

export interface CsvOptions {
  /** Write a header row of tag names first. Defaults to true. */
  header?: boolean;
  /** Qualify header tags with their category, e.g. `_Atom.ID`. Defaults to true. */
  showCategory?: boolean;
}

type CsvRule = 'quoted' | 'strayQuote' | 'delimiter' | 'newline' | 'field';

const rules: Record<CsvRule, moo.Rule> = {
  quoted: { match: /"(?:[^"]|"")*"/, lineBreaks: true },
  strayQuote: { match: /"/ },
  delimiter: { match: /,/ },
  newline: { match: /\r\n|\r|\n/, lineBreaks: true },
  // Quotes inside an unquoted field are kept as they are.
  field: { match: /[^,"\r\n][^,\r\n]*/ },
};

/**
 * Split CSV text into rows of fields. Blank lines are skipped and line breaks
 * inside quoted fields are read as `\n`, as in STAR text.
 */
export function parseCsv(text: string, source?: string): string[][] {
  const lexer = moo.compile(rules);
  lexer.reset(text);

  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let open = false;

  let token = lexer.next();
  while (token !== undefined) {
    switch (token.type) {
      case 'quoted':
        cell += token.text.slice(1, -1).replace(/""/g, '"').replace(/\r\n?/g, '\n');
        open = true;
        break;
      case 'field':
        cell += token.text;
        open = true;
        break;
      case 'delimiter':
        row.push(cell);
        cell = '';
        open = true;
        break;
      case 'newline':
        if (open) {
          row.push(cell);
          rows.push(row);
        }
        row = [];
        cell = '';
        open = false;
        break;
      default:
        throw new ParsingError(
          'Unterminated quoted field in CSV data.',
          { line: token.line, column: token.col, offset: token.offset, source },
          undefined,
          'Close the field with a double quote, and write quotes inside it as "".'
        );
    }
    token = lexer.next();
  }
  if (open) {
    row.push(cell);
    rows.push(row);
  }
  return rows;
}

function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Each row on its own `\n`-terminated line, quoting only fields that need it. */
export function formatCsv(rows: string[][]): string {
  return rows.map(row => `${row.map(quoteField).join(',')}\n`).join('');
}
