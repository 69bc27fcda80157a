import chalk from 'chalk';
import type { Location, Position } from './types';

/**
 * Highlight the source input with a caret (^) under the start of `location`,
 * plus one line of context either side.
 */
export function highlightSnippet(input: string, location: Location, useColor = true): string {
  const lines = input.split('\n');
  const lineNum = location.start.line;
  const colNum = Math.max(1, location.start.column);

  if (lineNum < 1 || lineNum > lines.length) return '';

  const targetLine = lines[lineNum - 1];
  const prefix = `${lineNum}: `;
  const pointerLine = ' '.repeat(prefix.length + colNum - 1) + '^';

  const lineStr = useColor ? prefix + chalk.redBright(targetLine) : prefix + targetLine;
  const pointerStr = useColor ? chalk.yellow(pointerLine) : pointerLine;

  const resultLines: string[] = [];
  if (lineNum > 1) resultLines.push(`${lineNum - 1}: ${lines[lineNum - 2]}`);
  resultLines.push(lineStr);
  resultLines.push(pointerStr);
  if (lineNum < lines.length) resultLines.push(`${lineNum + 1}: ${lines[lineNum]}`);

  return resultLines.join('\n');
}

/** Snippet for a bare line/column pair. */
export function createSnippet(input: string, line: number, column: number, useColor = true): string {
  const point: Position = { line, column, offset: getOffsetFromLocation(input, line, column) };
  return highlightSnippet(input, { start: point, end: point }, useColor);
}

export function getLocationFromOffset(input: string, offset: number): Position {
  const lines = input.substring(0, offset).split('\n');
  const line = lines.length;
  const column = lines[lines.length - 1].length + 1;
  return { line, column, offset };
}

/** Returns -1 when the line or column is outside the input. */
export function getOffsetFromLocation(input: string, line: number, column: number): number {
  const lines = input.split('\n');

  if (line < 1 || line > lines.length) return -1;
  if (column < 1 || column > lines[line - 1].length + 1) return -1;

  let offset = 0;
  for (let i = 0; i < line - 1; i++) {
    offset += lines[i].length + 1;
  }
  return offset + column - 1;
}
