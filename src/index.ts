// src/index.ts
// ============================================
// 🌐 nmrstar-kit public API
// ============================================

// 🔤 Tokenizer
export {
  tokenize,
  tokenizeAll,
  createStarLexer,
  isNullValue,
  keywordOf,
  prepareSource,
  needsIndentEscape,
  NULL_VALUES,
  RESERVED_KEYWORDS,
  WHITESPACE,
  type StarToken,
  type StarLexer,
  type TokenizeOptions,
  type Delineator,
  type TokenKind,
  type Keyword,
} from './lexer/index';

// ✍️ Quoting
export {
  quoteValue,
  toStarValue,
  formatCategory,
  formatTag,
  isQualifiedTag,
  type StarInput,
} from './quoting/index';

// 📥 Parsing
export { StarParser, TokenStream, parse, parseSaveframe, parseLoop } from './parser/index';

// 🌳 Document model
export { Entry, type EntryJSON } from './model/entry';
export { Saveframe, type SaveframeJSON, type AddSaveframeTagOptions } from './model/saveframe';
export { Loop, type LoopJSON, type AddTagOptions, type RenumberOptions } from './model/loop';

// 📊 CSV interchange
export { parseCsv, formatCsv, type CsvOptions } from './csv/index';

// 📐 Schema
export {
  Schema,
  checkValue,
  convertValue,
  parseDataType,
  describeDataType,
  type TagDefinition,
  type SchemaLookup,
  type DataType,
  type TypedValue,
} from './schema/schema';
export { validate, checkCell, type Violation, type Validatable } from './schema/validator';

// 🌍 Remote archive
export { fetchEntryText, fetchText, entryUrl, normalizeEntryId, DEFAULT_API_URL, type FetchOptions } from './fetch/index';

// ⚙️ Configuration
export {
  defaultParseOptions,
  defaultFormatOptions,
  resolveParseOptions,
  resolveFormatOptions,
  type ParseOptions,
  type FormatOptions,
  type ReadFileOptions,
  type SaveframeCloserPolicy,
} from './config';

// ❗ Errors
export {
  ParsingError,
  InvalidStateError,
  SchemaError,
  FetchError,
  isParsingError,
  isInvalidStateError,
  type ErrorLocation,
} from './errors';

// 🛠️ Utilities
export * from './utils/index';
