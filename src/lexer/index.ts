import moo from 'moo';
import { ParsingError } from '../errors';

// STAR whitespace. Carriage returns are normalised away before lexing.
export const WHITESPACE = ' \t\n\v';
export const NULL_VALUES: readonly string[] = ['.', '?'];

export type Keyword = 'data' | 'save' | 'loop' | 'stop' | 'global';

const KEYWORD_PREFIXES: ReadonlyArray<readonly [string, Keyword]> = [
  ['data_', 'data'],
  ['save_', 'save'],
  ['loop_', 'loop'],
  ['stop_', 'stop'],
  ['global_', 'global'],
];

export const RESERVED_KEYWORDS: readonly string[] = KEYWORD_PREFIXES.map(([prefix]) => prefix);

export type Delineator = 'whitespace' | 'single-quote' | 'double-quote' | 'semicolon' | 'comment';

export type TokenKind = 'value' | 'comment' | Keyword;

export interface StarToken {
  /** Unescaped content; delimiters are not included. */
  text: string;
  lineNumber: number;
  column: number;
  offset: number;
  delineator: Delineator;
  kind: TokenKind;
  /** Unquoted value starting with `$`, a reference to a saveframe. */
  reference: boolean;
}

export interface TokenizeOptions {
  unwrapIndentedValues?: boolean;
  source?: string;
  /** Called for recoverable oddities, such as text on a semicolon opening line. */
  onWarning?: (message: string, lineNumber: number) => void;
}

type RuleType =
  | 'ws'
  | 'comment'
  | 'semicolonBlock'
  | 'openSemicolon'
  | 'singleQuoted'
  | 'doubleQuoted'
  | 'strayQuote'
  | 'plain';

// Rule order matters: moo tries alternatives left to right.
const rules: Record<RuleType, moo.Rule> = {
  ws: { match: /[ \t\n\v]+/, lineBreaks: true },
  comment: { match: /#[^\n]*/ },
  // A ';' that starts a line opens a block closed by the next "\n;".
  semicolonBlock: { match: /(?<![^\n]);[^\n]*\n(?:;|[^]*?\n;)/, lineBreaks: true },
  openSemicolon: { match: /(?<![^\n]);/ },
  // A quote only closes the value when whitespace or the end of input follows it.
  singleQuoted: { match: /'(?:[^'\n]|'(?=[^ \t\n\v]))*'(?![^ \t\n\v])/ },
  doubleQuoted: { match: /"(?:[^"\n]|"(?=[^ \t\n\v]))*"(?![^ \t\n\v])/ },
  strayQuote: { match: /['"]/ },
  plain: { match: /[^ \t\n\v]+/ },
};

export function isWhitespace(ch: string): boolean {
  return ch.length > 0 && WHITESPACE.includes(ch);
}

export function isNullValue(value: string): boolean {
  return NULL_VALUES.includes(value);
}

/** Keyword a bare token starts with, matched case-insensitively. */
export function keywordOf(text: string): Keyword | undefined {
  const lower = text.slice(0, 7).toLowerCase();
  for (const [prefix, keyword] of KEYWORD_PREFIXES) {
    if (lower.startsWith(prefix)) return keyword;
  }
  return undefined;
}

export function prepareSource(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * True when a semicolon value must be shifted right by three spaces to keep
 * its lines from being read as a closing delimiter. The second clause keeps
 * the shift reversible for text that already looks shifted.
 */
export function needsIndentEscape(value: string): boolean {
  return value.includes('\n;') || value.startsWith(';') || looksIndented(value);
}

function looksIndented(text: string): boolean {
  const lines = text.split('\n');
  if (!lines.every(line => line.startsWith('   '))) return false;
  return needsIndentEscape(stripIndent(text));
}

export function indentLines(value: string): string {
  return value.split('\n').map(line => `   ${line}`).join('\n');
}

function stripIndent(text: string): string {
  return text.split('\n').map(line => line.slice(3)).join('\n');
}

export interface StarLexer {
  reset(input: string): StarLexer;
  [Symbol.iterator](): Iterator<StarToken>;
}

/**
 * Reusable lexer over one buffer at a time. Each iteration continues from
 * the current cursor; call `reset` to scan a new input.
 */
export function createStarLexer(options: TokenizeOptions = {}): StarLexer {
  const lexer = moo.compile(rules);
  let input = '';

  const wrapper: StarLexer = {
    reset(text: string) {
      input = prepareSource(text);
      lexer.reset(input);
      return wrapper;
    },
    [Symbol.iterator]() {
      const gen = function* (): Generator<StarToken> {
        let token = lexer.next();
        while (token !== undefined) {
          if (token.type !== 'ws') {
            yield toStarToken(token, input, options);
          }
          token = lexer.next();
        }
      };
      return gen();
    },
  };
  return wrapper;
}

/** Lazily tokenize `source`. The returned generator cannot be restarted. */
export function* tokenize(source: string, options: TokenizeOptions = {}): Generator<StarToken> {
  yield* createStarLexer(options).reset(source);
}

export function tokenizeAll(source: string, options: TokenizeOptions = {}): StarToken[] {
  return [...tokenize(source, options)];
}

function toStarToken(token: moo.Token, input: string, options: TokenizeOptions): StarToken {
  const base = {
    lineNumber: token.line,
    column: token.col,
    offset: token.offset,
    reference: false,
  };
  const text = token.text;

  switch (token.type) {
    case 'comment':
      return { ...base, text, delineator: 'comment', kind: 'comment' };
    case 'semicolonBlock':
      return {
        ...base,
        text: readSemicolonBlock(text, token.line, options),
        delineator: 'semicolon',
        kind: 'value',
      };
    case 'openSemicolon':
      throw new ParsingError(
        'Semicolon-delineated value was not terminated.',
        { line: token.line, column: token.col, offset: token.offset, source: options.source },
        lineAt(input, token.line),
        "Close the value with a line that starts with ';'."
      );
    case 'singleQuoted':
      return { ...base, text: text.slice(1, -1), delineator: 'single-quote', kind: 'value' };
    case 'doubleQuoted':
      return { ...base, text: text.slice(1, -1), delineator: 'double-quote', kind: 'value' };
    case 'strayQuote':
      throw unterminatedQuote(token, input, options);
    default:
      return {
        ...base,
        text,
        delineator: 'whitespace',
        kind: keywordOf(text) ?? 'value',
        reference: text.startsWith('$'),
      };
  }
}

function readSemicolonBlock(raw: string, line: number, options: TokenizeOptions): string {
  const inner = raw.slice(1, -1);
  const firstBreak = inner.indexOf('\n');
  const openingText = inner.slice(0, firstBreak);
  const rest = inner.slice(firstBreak + 1);
  let body = rest.length > 0 ? rest.slice(0, -1) : '';

  if (openingText.length > 0) {
    options.onWarning?.(
      'Text found on the same line as the opening semicolon of a multi-line value; it was read as the first line of the value.',
      line
    );
    body = rest.length > 0 ? `${openingText}\n${body}` : openingText;
  }

  if ((options.unwrapIndentedValues ?? true) && looksIndented(body)) {
    return stripIndent(body);
  }
  return body;
}

function unterminatedQuote(token: moo.Token, input: string, options: TokenizeOptions): ParsingError {
  const quote = token.text;
  const kind = quote === "'" ? 'Single' : 'Double';
  const loc = { line: token.line, column: token.col, offset: token.offset, source: options.source };
  const context = lineAt(input, token.line);

  let search = token.offset + 1;
  let closing = -1;
  while (search < input.length) {
    const at = input.indexOf(quote, search);
    if (at === -1) break;
    if (at + 1 >= input.length || isWhitespace(input[at + 1])) {
      closing = at;
      break;
    }
    search = at + 1;
  }

  if (closing === -1) {
    return new ParsingError(
      `${kind} quoted value was not terminated.`,
      loc,
      context,
      `Add a closing ${quote} followed by whitespace.`
    );
  }
  return new ParsingError(
    `${kind} quoted value was not terminated on the same line it began.`,
    loc,
    context,
    'Use a semicolon-delineated value for text that spans lines.'
  );
}

function lineAt(input: string, line: number): string {
  return input.split('\n')[line - 1] ?? '';
}
