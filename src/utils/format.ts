import * as colors from 'colorette';
import { FetchError, InvalidStateError, ParsingError, SchemaError } from '../errors';
import type { Violation } from '../schema/validator';
import { highlightSnippet } from './highlight';
import type { Location } from './types';

export type ErrorKind = 'Parse Error' | 'Invalid State' | 'Schema Error' | 'Fetch Error' | 'Error';

/** Flat, printable view of any error the library raises. */
export interface ErrorReport {
  kind: ErrorKind;
  error: string;
  location?: Location;
  source?: string;
  suggestion?: string;
  /** Full input text, used to render a snippet around `location`. */
  input?: string;
  /** The offending line when the full input is not at hand. */
  contextLine?: string;
}

export function toErrorReport(err: unknown, input?: string): ErrorReport {
  if (err instanceof ParsingError) {
    const line = err.lineNumber;
    const point =
      line !== undefined ? { line, column: err.column ?? 1, offset: err.offset ?? 0 } : undefined;
    return {
      kind: 'Parse Error',
      error: err.message,
      location: point ? { start: point, end: point } : undefined,
      source: err.source,
      suggestion: err.suggestion,
      input,
      contextLine: err.contextLine,
    };
  }
  if (err instanceof InvalidStateError) return { kind: 'Invalid State', error: err.message };
  if (err instanceof SchemaError) return { kind: 'Schema Error', error: err.message, source: err.source };
  if (err instanceof FetchError) {
    return { kind: 'Fetch Error', error: err.message, source: err.url };
  }
  if (err instanceof Error) return { kind: 'Error', error: err.message };
  return { kind: 'Error', error: typeof err === 'string' ? err : 'Unknown error' };
}

export function formatLocation(location: Location): string {
  const { start, end } = location;
  return start.line === end.line && start.column === end.column
    ? `Line ${start.line}, Col ${start.column}`
    : `Line ${start.line}, Col ${start.column} → Line ${end.line}, Col ${end.column}`;
}

export function formatError(report: ErrorReport): string {
  return formatErrorWithColors(report, false);
}

export function formatErrorWithColors(report: ErrorReport, useColors = true): string {
  const c = colors.createColors({ useColor: useColors });
  const parts: string[] = [`${c.red(`❌ ${report.kind}:`)} ${report.error || 'Unknown error'}`];

  if (report.location) {
    const where = report.source ? `${report.source}, ` : '';
    parts.push(`${c.blue('↪ at')} ${where}${formatLocation(report.location)}`);
  } else if (report.source) {
    parts.push(`${c.blue('↪ in')} ${report.source}`);
  }

  if (report.location && report.input !== undefined) {
    const snippet = highlightSnippet(report.input, report.location, useColors);
    if (snippet) parts.push(`\n${c.dim('--- Snippet ---')}\n${snippet}`);
  } else if (report.location && report.contextLine !== undefined) {
    const { line, column } = report.location.start;
    parts.push(`\n  ${line} | ${report.contextLine}\n    | ${' '.repeat(Math.max(0, column - 1))}^`);
  }

  if (report.suggestion) {
    parts.push(`${c.cyan('💡 Suggestion:')} ${report.suggestion}`);
  }
  return parts.join('\n');
}

export function formatMultipleErrors(reports: ErrorReport[], useColors = true): string {
  if (reports.length === 0) return '';
  const c = colors.createColors({ useColor: useColors });
  const header = c.red(c.bold(`Found ${reports.length} error${reports.length > 1 ? 's' : ''}:`));
  const body = reports.map((report, index) => {
    return `${c.dim(`[${index + 1}/${reports.length}]`)}\n${formatErrorWithColors(report, useColors)}`;
  });
  return [header, ...body].join('\n\n');
}

export function formatAnyError(err: unknown, useColors = true, input?: string): string {
  return formatErrorWithColors(toErrorReport(err, input), useColors);
}

/** One line per violation: `location: message`, with the expected form when known. */
export function formatViolation(violation: Violation): string {
  const expected = violation.expected ? ` Expected ${violation.expected}.` : '';
  return `${violation.location}: ${violation.message}${expected}`;
}

export function formatViolations(violations: Violation[], useColors = true): string {
  const c = colors.createColors({ useColor: useColors });
  if (violations.length === 0) return c.green('✅ No problems found.');
  const header = c.yellow(`Found ${violations.length} problem${violations.length > 1 ? 's' : ''}:`);
  return [header, ...violations.map(v => `  ${c.dim('•')} ${formatViolation(v)}`)].join('\n');
}
