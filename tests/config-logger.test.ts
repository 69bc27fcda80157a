import { defaultParseOptions, resolveFormatOptions, resolveParseOptions } from '../src/config';
import { Schema } from '../src/schema/schema';
import { createLogger } from '../src/utils/logger';
import type { LogSink } from '../src/utils/logger';

function collectingSink(): LogSink & { lines: Array<[string, string]> } {
  const lines: Array<[string, string]> = [];
  return {
    lines,
    log: message => lines.push(['log', message]),
    warn: message => lines.push(['warn', message]),
    error: message => lines.push(['error', message]),
  };
}

describe('options', () => {
  it('fills unset parse options with defaults', () => {
    const options = resolveParseOptions({ source: 'a.str' });
    expect(options.source).toBe('a.str');
    expect(options.raiseParseWarnings).toBe(false);
    expect(options.saveframeCloser).toBe('lenient');
    expect(options.keepComments).toBe(true);
    expect(options.unwrapIndentedValues).toBe(true);
    expect(options.logger).toBe(defaultParseOptions.logger);
    expect(Object.isFrozen(options)).toBe(true);
  });

  it('requires a schema for type checks while parsing', () => {
    expect(() => resolveParseOptions({ checkDataTypes: true })).toThrow(TypeError);
    expect(resolveParseOptions({ checkDataTypes: true, schema: new Schema() }).checkDataTypes).toBe(true);
  });

  it('fills unset format options with defaults', () => {
    expect(resolveFormatOptions({ skipEmptyTags: true })).toEqual({
      skipEmptyLoops: false,
      skipEmptyTags: true,
      showComments: true,
    });
  });
});

describe('logger', () => {
  it('writes each level to the matching stream', () => {
    const sink = collectingSink();
    const log = createLogger({ level: 'debug', sink, useColor: false });
    log.debug('d');
    log.info('i');
    log.success('s');
    log.warn('w');
    log.error('e');
    expect(sink.lines).toEqual([
      ['log', '🐛 d'],
      ['log', 'ℹ️  i'],
      ['log', '✅ s'],
      ['warn', '⚠️  w'],
      ['error', '❌ e'],
    ]);
  });

  it('drops messages below its level', () => {
    const sink = collectingSink();
    const log = createLogger({ level: 'warn', sink, useColor: false, prefix: '[nmrstar]' });
    log.info('hidden');
    log.warn('shown');
    expect(sink.lines).toEqual([['warn', '⚠️  [nmrstar] shown']]);
  });

  it('can be silenced', () => {
    const sink = collectingSink();
    createLogger({ level: 'silent', sink }).error('nothing');
    expect(sink.lines).toEqual([]);
  });
});
