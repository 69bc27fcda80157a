import type { Logger } from './utils/logger';
import { defaultLogger } from './utils/logger';
import type { SchemaLookup } from './schema/schema';

/**
 * How a `save_<name>` closer whose name differs from the open saveframe is
 * handled. Older files use this form, so `lenient` accepts it with a warning.
 */
export type SaveframeCloserPolicy = 'lenient' | 'strict';

export interface ParseOptions {
  /** Turn parse warnings (empty loops, legacy constructs) into ParsingErrors. */
  raiseParseWarnings: boolean;
  saveframeCloser: SaveframeCloserPolicy;
  /** Attach comments that precede a saveframe to it. */
  keepComments: boolean;
  /** Strip the three-space nesting indent from semicolon values that carry it. */
  unwrapIndentedValues: boolean;
  /** Check every value against `schema` while parsing. */
  checkDataTypes: boolean;
  schema?: SchemaLookup;
  /** Name of the input, used in error messages. */
  source: string;
  logger: Logger;
}

/** Options for reading a single loop or saveframe from disk. */
export interface ReadFileOptions extends Partial<ParseOptions> {
  /** Read the file as CSV instead of STAR text. */
  csv?: boolean;
}

export interface FormatOptions {
  skipEmptyLoops: boolean;
  /** Leave out saveframe tags whose value is a null marker. */
  skipEmptyTags: boolean;
  showComments: boolean;
}

export const defaultParseOptions: Readonly<ParseOptions> = Object.freeze({
  raiseParseWarnings: false,
  saveframeCloser: 'lenient',
  keepComments: true,
  unwrapIndentedValues: true,
  checkDataTypes: false,
  source: 'unknown',
  logger: defaultLogger,
});

export const defaultFormatOptions: Readonly<FormatOptions> = Object.freeze({
  skipEmptyLoops: false,
  skipEmptyTags: false,
  showComments: true,
});

export function resolveParseOptions(options: Partial<ParseOptions> = {}): Readonly<ParseOptions> {
  const d = defaultParseOptions;
  const resolved: ParseOptions = {
    raiseParseWarnings: options.raiseParseWarnings ?? d.raiseParseWarnings,
    saveframeCloser: options.saveframeCloser ?? d.saveframeCloser,
    keepComments: options.keepComments ?? d.keepComments,
    unwrapIndentedValues: options.unwrapIndentedValues ?? d.unwrapIndentedValues,
    checkDataTypes: options.checkDataTypes ?? d.checkDataTypes,
    schema: options.schema,
    source: options.source ?? d.source,
    logger: options.logger ?? d.logger,
  };
  if (resolved.checkDataTypes && !resolved.schema) {
    throw new TypeError('checkDataTypes requires a schema');
  }
  return Object.freeze(resolved);
}

export function resolveFormatOptions(options: Partial<FormatOptions> = {}): Readonly<FormatOptions> {
  return Object.freeze({
    skipEmptyLoops: options.skipEmptyLoops ?? defaultFormatOptions.skipEmptyLoops,
    skipEmptyTags: options.skipEmptyTags ?? defaultFormatOptions.skipEmptyTags,
    showComments: options.showComments ?? defaultFormatOptions.showComments,
  });
}
