// Error taxonomy shared by the tokenizer, parser, document model and schema layer.

export interface ErrorLocation {
  line: number;
  column?: number;
  offset?: number;
  source?: string;
}

/**
 * Raised for malformed STAR text. Always fatal to the parse that raised it;
 * no partial tree is returned alongside it.
 */
export class ParsingError extends Error {
  public lineNumber?: number;
  public column?: number;
  public offset?: number;
  public source?: string;
  public contextLine?: string;
  public suggestion?: string;

  constructor(message: string, loc?: ErrorLocation, contextLine?: string, suggestion?: string) {
    super(message);
    this.name = 'ParsingError';
    this.lineNumber = loc?.line;
    this.column = loc?.column;
    this.offset = loc?.offset;
    this.source = loc?.source;
    this.contextLine = contextLine;
    this.suggestion = suggestion;
  }

  toString(): string {
    let location = '';
    if (this.lineNumber !== undefined) {
      const col = this.column !== undefined ? `:${this.column}` : '';
      location = this.source ? ` at ${this.source}:${this.lineNumber}${col}` : ` on line ${this.lineNumber}${col}`;
    }
    let output = `${this.name}${location}: ${this.message}`;

    if (this.contextLine !== undefined && this.lineNumber !== undefined) {
      output += `\n\n  ${this.lineNumber} | ${this.contextLine}\n`;
      output += `    | ${' '.repeat(Math.max(0, (this.column ?? 1) - 1))}^`;
    }
    if (this.suggestion) {
      output += `\n\n  Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Raised when a mutation or formatting request would leave the document in a
 * state that cannot be written back as valid STAR text.
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

/** A schema document could not be read or understood. */
export class SchemaError extends Error {
  public source?: string;

  constructor(message: string, source?: string) {
    super(message);
    this.name = 'SchemaError';
    this.source = source;
  }
}

/** Remote retrieval failed with a status the retry policy does not cover. */
export class FetchError extends Error {
  public status?: number;
  public url: string;

  constructor(message: string, url: string, status?: number) {
    super(message);
    this.name = 'FetchError';
    this.url = url;
    this.status = status;
  }
}

export function isParsingError(error: unknown): error is ParsingError {
  return error instanceof ParsingError;
}

export function isInvalidStateError(error: unknown): error is InvalidStateError {
  return error instanceof InvalidStateError;
}
