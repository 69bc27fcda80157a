import fs from 'node:fs';
import path from 'node:path';
import type { ParseOptions } from '../src/config';
import { ParsingError } from '../src/errors';
import { Loop } from '../src/model/loop';
import { Saveframe } from '../src/model/saveframe';
import { parse, parseLoop, StarParser } from '../src/parser/index';
import { Schema } from '../src/schema/schema';
import type { Logger } from '../src/utils/logger';

const sample = fs.readFileSync(path.join(__dirname, 'fixtures', 'sample.str'), 'utf-8');

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: jest.fn(),
    info: jest.fn(),
    success: jest.fn(),
    warn: (message: string) => {
      warnings.push(message);
    },
    error: jest.fn(),
  };
}

function parseError(text: string, options: Partial<ParseOptions> = {}): ParsingError {
  try {
    parse(text, { source: 'test', logger: recordingLogger(), ...options });
  } catch (error) {
    if (error instanceof ParsingError) return error;
    throw error;
  }
  throw new Error('expected a ParsingError');
}

const DATES = `data_dates
save_special_dates_saveframe_1
   _Special_Dates.Type  Holidays
   loop_
      _Events.Date
      _Events.Description
      12/31/2017 "New Year's Eve"
      01/01/2018 "New Year's Day"
   stop_
save_
`;

describe('StarParser', () => {
  it('builds the entry tree and formats it canonically', () => {
    const entry = parse(DATES);
    expect(entry.entryId).toBe('dates');
    expect(entry.frameCount).toBe(1);

    const frame = entry.saveframes[0];
    expect(frame.name).toBe('special_dates_saveframe_1');
    expect(frame.tagPrefix).toBe('Special_Dates');
    expect(frame.getTag('Type')).toBe('Holidays');

    const loop = frame.getLoopByCategory('_Events');
    expect(loop?.data).toEqual([
      ['12/31/2017', "New Year's Eve"],
      ['01/01/2018', "New Year's Day"],
    ]);

    expect(entry.format()).toBe(
      'data_dates\n\n' +
        'save_special_dates_saveframe_1\n' +
        '   _Special_Dates.Type  Holidays\n' +
        '\n   loop_\n' +
        '      _Events.Date\n' +
        '      _Events.Description\n' +
        '\n' +
        `     12/31/2017 "New Year's Eve"\n` +
        `     01/01/2018 "New Year's Day"\n` +
        '\n   stop_\n' +
        '\nsave_\n'
    );
  });

  it('reads its own output back to an equal tree', () => {
    const entry = parse(sample);
    const text = entry.format();
    const again = parse(text);
    expect(again.equals(entry)).toBe(true);
    expect(again.format()).toBe(text);
  });

  it('keeps the two null markers apart through format and parse', () => {
    const text =
      'data_n\nsave_s\n   _S.Sf_framecode  s\n   _S.Unknown  ?\n   _S.Absent  .\n' +
      '   loop_\n      _L.x\n      _L.y\n\n     . ?\n     ? .\n   stop_\nsave_\n';
    const again = parse(parse(text).format());
    const frame = again.saveframes[0];
    expect(frame.getTag('Unknown')).toBe('?');
    expect(frame.getTag('Absent')).toBe('.');
    expect(frame.getLoopByCategory('L')?.data).toEqual([
      ['.', '?'],
      ['?', '.'],
    ]);
    expect(again.equals(parse(text))).toBe(true);
  });

  it('reads the fixture entry', () => {
    const entry = parse(sample, { source: 'sample.str' });
    expect(entry.source).toBe('sample.str');
    const info = entry.getSaveframeByName('entry_information');
    expect(info?.getTag('Title')).toBe('Solution structure of a\ntest protein');
    expect(info?.comment).toBe('# Entry level information');
    expect(info?.lineNumber).toBe(4);
    expect(info?.tagLineNumber('_Entry.ID')).toBe(7);
    expect(entry.findTag('_Entry_author.Family_name')).toEqual(['Smith', 'van der Berg']);
    expect(entry.findTag('_Entry_author.Middle_initials')).toEqual(['.', 'J.']);
  });

  it('drops comments when asked to', () => {
    const entry = parse(sample, { keepComments: false });
    expect(entry.saveframes[0].comment).toBeUndefined();
  });

  describe('structural errors', () => {
    it('requires a data_ header', () => {
      const error = parseError('save_x\n');
      expect(error.message).toBe("Invalid file. NMR-STAR files must start with 'data_' followed by the data name.");
      expect(error.lineNumber).toBe(1);
      expect(parseError('').message).toBe(
        "Invalid file. NMR-STAR files must start with 'data_' followed by the data name."
      );
    });

    it('requires a name after data_', () => {
      expect(parseError('data_\n').message).toBe("'data_' must be followed by the data name, e.g. 'data_15000'.");
    });

    it('only allows saveframes in the body', () => {
      const error = parseError('data_1\n_Tag.x 1\n');
      expect(error.message).toBe("Only 'save_NAME' is valid in the body of an NMR-STAR file. Found '_Tag.x'.");
      expect(error.lineNumber).toBe(2);
    });

    it('rejects a second data block', () => {
      expect(parseError('data_1\ndata_2\n').message).toBe("Only one data block is supported per file. Found 'data_2'.");
    });

    it('reports a saveframe left open at end of file', () => {
      const error = parseError('data_1\nsave_a\n_A.b 1\n');
      expect(error.message).toBe("Saveframe 'a' improperly terminated at end of file.");
      expect(error.lineNumber).toBe(2);
    });

    it('reports a loop left open at end of file', () => {
      expect(parseError('data_1\nsave_a\n_A.b 1\nloop_\n_L.x\n1\n').message).toBe(
        'Loop improperly terminated at end of file.'
      );
    });

    it('rejects a saveframe without tags', () => {
      expect(parseError('data_1\nsave_a\nsave_\n').message).toMatch(/^Saveframe 'a' has no tags/);
    });

    it('rejects duplicate saveframe names', () => {
      const error = parseError('data_1\nsave_a\n_A.b 1\nsave_\nsave_a\n_A.b 2\nsave_\n');
      expect(error.message).toBe(
        "Cannot add a saveframe with name 'a' since a saveframe with that name already exists in the entry."
      );
      expect(error.lineNumber).toBe(5);
    });

    it('rejects bare keywords as values', () => {
      const error = parseError('data_1\nsave_a\n_A.b stop_\nsave_\n');
      expect(error.message).toMatch(/^Cannot use keywords as data values/);
      expect(error.lineNumber).toBe(3);
    });

    it('rejects bare values that start with an underscore', () => {
      expect(parseError('data_1\nsave_a\n_A.b _A.c\nsave_\n').message).toMatch(
        /^Cannot have a value start with an underscore/
      );
    });

    it('rejects loop tags after loop data', () => {
      expect(parseError('data_1\nsave_a\n_A.b 1\nloop_\n_L.x\n1\n_L.y\nstop_\nsave_\n').message).toMatch(
        /^Cannot have more loop tags after loop data/
      );
    });

    it('names the row and tag of a short loop', () => {
      const error = parseError('data_1\nsave_a\n_A.b 1\nloop_\n_L.x\n_L.y\n1 2\n3\nstop_\nsave_\n');
      expect(error.message).toBe(
        "Loop '_L' has 3 values for 2 tags: row 2 stops after column 1 and is missing column 2 ('_L.y')."
      );
      expect(error.lineNumber).toBe(8);
    });

    it('rejects loop tags from two categories', () => {
      expect(parseError('data_1\nsave_a\n_A.b 1\nloop_\n_L.x\n_M.y\n1 2\nstop_\nsave_\n').message).toBe(
        "A loop can only hold tags of one category: '_M.y' does not belong to '_L'."
      );
    });
  });

  describe('warnings', () => {
    it('accepts a named closer with a warning', () => {
      const logger = recordingLogger();
      const entry = parse('data_1\nsave_a\n_A.b 1\nsave_b\n', { source: 'test', logger });
      expect(entry.frameCount).toBe(1);
      expect(logger.warnings).toEqual(["Saveframe 'a' was closed with 'save_b'. (test, line 4)"]);
    });

    it('rejects a named closer in strict mode', () => {
      const error = parseError('data_1\nsave_a\n_A.b 1\nsave_b\n', { saveframeCloser: 'strict' });
      expect(error.message).toBe("Saveframe 'a' was closed with 'save_b'.");
      expect(error.lineNumber).toBe(4);
    });

    it('warns about an empty loop and raises when warnings are errors', () => {
      const text = 'data_1\nsave_a\n_A.b 1\nloop_\n_L.x\nstop_\nsave_\n';
      const logger = recordingLogger();
      const entry = parse(text, { source: 'test', logger });
      expect(logger.warnings).toEqual(["Loop '_L' has no data. (test, line 4)"]);
      expect(entry.saveframes[0].getLoopByCategory('L')?.tags).toEqual(['x']);

      expect(parseError(text, { raiseParseWarnings: true }).message).toBe("Loop '_L' has no data.");
    });

    it('reads an empty quoted value as a null marker', () => {
      const logger = recordingLogger();
      const entry = parse("data_1\nsave_a\n_A.b ''\nsave_\n", { source: 'test', logger });
      expect(entry.saveframes[0].getTag('b')).toBe('.');
      expect(logger.warnings).toEqual(["Empty value read as the null marker '.'. (test, line 3)"]);
    });

    it('renames a saveframe to its Sf_framecode value', () => {
      const logger = recordingLogger();
      const entry = parse('data_1\nsave_a\n_A.Sf_framecode b\n_A.x 1\nsave_\n', { source: 'test', logger });
      expect(entry.saveframes[0].name).toBe('b');
      expect(logger.warnings).toHaveLength(1);
      expect(logger.warnings[0]).toMatch(/^The Sf_framecode value 'b' does not match the saveframe name 'a'/);
    });
  });

  it('checks values against a schema while reading when asked', () => {
    const schema = new Schema([
      { tag: '_A.count', dataType: 'INTEGER', nullable: false, saveframeCategory: 'a', loop: false },
    ]);
    const text = 'data_1\nsave_a\n_A.count abc\nsave_\n';
    expect(() => parse(text, { checkDataTypes: true, schema })).toThrow(
      "Value 'abc' is not an integer. (tag '_A.count', type INTEGER)"
    );
    expect(parse(text).saveframes[0].getTag('count')).toBe('abc');
  });

  describe('single saveframes and loops', () => {
    it('parses a standalone saveframe', () => {
      const frame = Saveframe.fromString('save_x\n   _X.a  1\nsave_\n');
      expect(frame.name).toBe('x');
      expect(frame.source).toBe('fromString()');
      expect(frame.tags).toEqual([['a', '1']]);
    });

    it('parses a standalone loop', () => {
      const loop = parseLoop('loop_\n_L.x\n_L.y\n1 2\n3 4\nstop_\n');
      expect(loop.category).toBe('L');
      expect(loop.data).toEqual([
        ['1', '2'],
        ['3', '4'],
      ]);
    });

    it('rejects trailing content', () => {
      expect(() => Loop.fromString('loop_\n_L.x\n1\nstop_\nextra\n')).toThrow(
        "Unexpected content after the loop: 'extra'."
      );
    });

    it('is usable through the class directly', () => {
      const entry = new StarParser('data_x\nsave_y\n_Y.z 1\nsave_\n').parseEntry();
      expect(entry.printTree()).toBe("<Entry 'x' unknown>\n\t[0] <Saveframe 'y'>");
    });
  });
});
