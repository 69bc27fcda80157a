import { InvalidStateError } from '../errors';
import { WHITESPACE } from '../lexer';

/** Saveframe names, entry IDs and tag names share the same shape rules. */
export function assertValidName(name: string, what: string): void {
  if (name.length === 0) {
    throw new InvalidStateError(`The ${what} cannot be empty.`);
  }
  for (const ch of name) {
    if (WHITESPACE.includes(ch) || ch === '\r') {
      throw new InvalidStateError(`The ${what} cannot contain whitespace: '${name}'.`);
    }
  }
}

export function sameName(a: string | undefined, b: string | undefined): boolean {
  return a !== undefined && b !== undefined && a.toLowerCase() === b.toLowerCase();
}

export function assertValue(value: string, tag: string): void {
  if (value === '') {
    throw new InvalidStateError(
      `Empty strings are not allowed as values (tag '${tag}'). Use the '.' or '?' null marker instead.`
    );
  }
  if (value.includes('\r')) {
    throw new InvalidStateError(`Carriage returns are not allowed in values (tag '${tag}'); use \\n line breaks.`);
  }
}
