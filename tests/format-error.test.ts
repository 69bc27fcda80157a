import { FetchError, InvalidStateError, ParsingError, SchemaError } from '../src/errors';
import {
  formatAnyError,
  formatError,
  formatErrorWithColors,
  formatLocation,
  formatMultipleErrors,
  formatViolations,
  toErrorReport,
} from '../src/utils/format';
import { createSnippet, getLocationFromOffset, getOffsetFromLocation, highlightSnippet } from '../src/utils/highlight';

describe('Error Formatting Utilities', () => {
  const input = 'line1\nabc defg\nline3';
  const parseError = new ParsingError('Bad thing', { line: 2, column: 5, source: 'x.str' }, 'abc defg', 'Fix it');

  it('should render a ParsingError with its context line', () => {
    expect(parseError.toString()).toBe(
      'ParsingError at x.str:2:5: Bad thing\n\n  2 | abc defg\n    |     ^\n\n  Suggestion: Fix it'
    );
    expect(new ParsingError('Plain').toString()).toBe('ParsingError: Plain');
    expect(new ParsingError('No source', { line: 3 }).toString()).toBe('ParsingError on line 3: No source');
  });

  it('should convert a ParsingError to a report', () => {
    const report = toErrorReport(parseError);
    expect(report.kind).toBe('Parse Error');
    expect(report.source).toBe('x.str');
    expect(report.location?.start).toEqual({ line: 2, column: 5, offset: 0 });
    expect(report.contextLine).toBe('abc defg');
  });

  it('should format a parse error without the input', () => {
    expect(formatError(toErrorReport(parseError))).toBe(
      [
        '❌ Parse Error: Bad thing',
        '↪ at x.str, Line 2, Col 5',
        '\n  2 | abc defg\n    |     ^',
        '💡 Suggestion: Fix it',
      ].join('\n')
    );
  });

  it('should include a snippet when the input is known', () => {
    const output = formatAnyError(parseError, false, input);
    expect(output).toBe(
      [
        '❌ Parse Error: Bad thing',
        '↪ at x.str, Line 2, Col 5',
        '\n--- Snippet ---\n1: line1\n2: abc defg\n       ^\n3: line3',
        '💡 Suggestion: Fix it',
      ].join('\n')
    );
  });

  it('should label the other error kinds', () => {
    expect(formatAnyError(new InvalidStateError('Broken'), false)).toBe('❌ Invalid State: Broken');
    expect(formatAnyError(new SchemaError('Bad schema', 'schema.json'), false)).toBe(
      '❌ Schema Error: Bad schema\n↪ in schema.json'
    );
    expect(formatAnyError(new FetchError('Gone', 'https://example.test/x', 500), false)).toBe(
      '❌ Fetch Error: Gone\n↪ in https://example.test/x'
    );
    expect(formatAnyError(new Error('Plain'), false)).toBe('❌ Error: Plain');
    expect(formatAnyError('text', false)).toBe('❌ Error: text');
    expect(formatAnyError(42, false)).toBe('❌ Error: Unknown error');
  });

  it('should format error with ANSI colors', () => {
    const output = formatErrorWithColors(toErrorReport(parseError), true);
    expect(output).toContain('Bad thing');
    // eslint-disable-next-line no-control-regex
    expect(output).toMatch(/\x1b\[\d+m/);
  });

  it('should number several errors', () => {
    const reports = [toErrorReport(new Error('a')), toErrorReport(new Error('b'))];
    expect(formatMultipleErrors(reports, false)).toBe('Found 2 errors:\n\n[1/2]\n❌ Error: a\n\n[2/2]\n❌ Error: b');
    expect(formatMultipleErrors([], false)).toBe('');
  });

  it('should describe ranges and points', () => {
    const start = { line: 1, column: 2, offset: 1 };
    expect(formatLocation({ start, end: start })).toBe('Line 1, Col 2');
    expect(formatLocation({ start, end: { line: 1, column: 5, offset: 4 } })).toBe('Line 1, Col 2 → Line 1, Col 5');
  });

  it('should list validation problems', () => {
    expect(formatViolations([], false)).toBe('✅ No problems found.');
    expect(
      formatViolations(
        [
          {
            tag: '_A.n',
            value: 'x',
            location: 'line 3',
            lineNumber: 3,
            message: "Value 'x' is not an integer.",
            expected: 'an integer',
          },
          { tag: '_A.m', value: '1', location: 'line 4', message: "Tag '_A.m' is not in the schema." },
        ],
        false
      )
    ).toBe(
      'Found 2 problems:\n' +
        "  • line 3: Value 'x' is not an integer. Expected an integer.\n" +
        "  • line 4: Tag '_A.m' is not in the schema."
    );
  });
});

describe('Snippet helpers', () => {
  const input = 'line1\nabc defg\nline3';

  it('should point at the column with one line of context', () => {
    const point = { line: 2, column: 5, offset: 10 };
    expect(highlightSnippet(input, { start: point, end: point }, false)).toBe(
      '1: line1\n2: abc defg\n       ^\n3: line3'
    );
    expect(createSnippet(input, 1, 1, false)).toBe('1: line1\n   ^\n2: abc defg');
  });

  it('should return nothing for lines outside the input', () => {
    const point = { line: 9, column: 1, offset: 0 };
    expect(highlightSnippet(input, { start: point, end: point }, false)).toBe('');
  });

  it('should convert between offsets and positions', () => {
    expect(getLocationFromOffset('ab\ncd', 4)).toEqual({ line: 2, column: 2, offset: 4 });
    expect(getOffsetFromLocation('ab\ncd', 2, 2)).toBe(4);
    expect(getOffsetFromLocation('ab\ncd', 5, 1)).toBe(-1);
    expect(getOffsetFromLocation('ab\ncd', 1, 9)).toBe(-1);
  });
});
