import { InvalidStateError } from '../errors';
import { indentLines, isWhitespace, keywordOf, needsIndentEscape } from '../lexer';

/** Anything a caller may hand to a tag or loop cell. */
export type StarInput = string | number | boolean | null | undefined;

/** Convert a host value to its STAR string form. Absent values become `.`. */
export function toStarValue(value: StarInput): string {
  if (value === null || value === undefined) return '.';
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  return String(value);
}

/**
 * Wrap `value` so it reads back as exactly one token with the same text.
 *
 * Multi-line results are returned as a complete block, `\n;\n<body>\n;\n`,
 * so callers can append them directly after a tag name.
 */
export function quoteValue(value: string): string {
  if (value === '') {
    throw new InvalidStateError("Empty strings are not allowed as values. Use the '.' or '?' null marker instead.");
  }
  if (value.includes('\r')) {
    throw new InvalidStateError('Carriage returns cannot be written to STAR text; use \\n line breaks.');
  }

  if (value.includes('\n')) {
    return semicolonBlock(value);
  }

  if (value.includes('"') && value.includes("'")) {
    let canWrapSingle = true;
    let canWrapDouble = true;
    for (let i = 0; i < value.length - 1; i++) {
      if (!isWhitespace(value[i + 1])) continue;
      if (value[i] === "'") canWrapSingle = false;
      if (value[i] === '"') canWrapDouble = false;
    }
    if (canWrapSingle) return `'${value}'`;
    if (canWrapDouble) return `"${value}"`;
    return semicolonBlock(value);
  }

  if (requiresQuotes(value)) {
    return value.includes("'") ? `"${value}"` : `'${value}'`;
  }
  return value;
}

export function isMultilineQuoted(quoted: string): boolean {
  return quoted.startsWith('\n;\n');
}

function semicolonBlock(value: string): string {
  const body = needsIndentEscape(value) ? indentLines(value) : value;
  return `\n;\n${body}\n;\n`;
}

function requiresQuotes(value: string): boolean {
  const first = value[0];
  if (first === '_' || first === "'" || first === '"' || first === ';') return true;
  if (keywordOf(value) !== undefined) return true;
  for (let i = 0; i < value.length; i++) {
    if (isWhitespace(value[i])) return true;
    if (value[i] === '#' && (i === 0 || isWhitespace(value[i - 1]))) return true;
  }
  return false;
}

/** `_Entity.ID` → `Entity`. Unqualified names are returned without the underscore. */
export function formatCategory(tag: string): string {
  const bare = tag.startsWith('_') ? tag.slice(1) : tag;
  const dot = bare.indexOf('.');
  return dot === -1 ? bare : bare.slice(0, dot);
}

/** `_Entity.ID` → `ID`. Names without a category are returned unchanged. */
export function formatTag(tag: string): string {
  const dot = tag.indexOf('.');
  return dot === -1 ? tag : tag.slice(dot + 1);
}

export function isQualifiedTag(tag: string): boolean {
  return tag.startsWith('_') && tag.includes('.');
}
