// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export {
  toErrorReport,
  formatError,
  formatErrorWithColors,
  formatMultipleErrors,
  formatAnyError,
  formatLocation,
  formatViolation,
  formatViolations,
} from './format';
export type { ErrorKind, ErrorReport } from './format';
export { highlightSnippet, createSnippet, getLocationFromOffset, getOffsetFromLocation } from './highlight';
export { readTextFile } from './files';
export { createLogger, colorEnabled, defaultLogger, silentLogger } from './logger';
export type { Logger, LoggerOptions, LogLevel, LogSink } from './logger';
export type { Location, Position } from './types';
