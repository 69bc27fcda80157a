import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { gzipSync } from 'node:zlib';
import { InvalidStateError } from '../src/errors';
import { Entry } from '../src/model/entry';
import { Loop } from '../src/model/loop';
import { Saveframe } from '../src/model/saveframe';
import { Schema } from '../src/schema/schema';
import { silentLogger } from '../src/utils/logger';

const fixtures = path.join(__dirname, 'fixtures');
const sample = fs.readFileSync(path.join(fixtures, 'sample.str'), 'utf-8');

function frame(name: string, prefix: string, tags: Array<[string, string]>): Saveframe {
  const result = Saveframe.fromScratch(name, prefix);
  for (const [tag, value] of tags) result.addTag(tag, value);
  return result;
}

describe('Entry', () => {
  it('keeps saveframe names unique without regard to case', () => {
    const entry = Entry.fromScratch('1');
    entry.addSaveframe(frame('a', 'A', [['x', '1']]));
    expect(() => entry.addSaveframe(frame('A', 'A', [['x', '2']]))).toThrow(
      "Cannot add a saveframe with name 'A' since a saveframe with that name already exists in the entry."
    );
    expect(entry.getSaveframeByName('A')?.name).toBe('a');
  });

  it('rejects an empty entry ID', () => {
    expect(() => Entry.fromScratch('')).toThrow('The entry ID cannot be empty.');
  });

  it('rewrites Entry_ID tags and columns when the ID changes', () => {
    const entry = Entry.fromString(sample);
    entry.entryId = '30000';
    expect(entry.findTag('_Entry.ID')).toEqual(['15000']);
    expect(entry.findTag('_Entry_author.Entry_ID')).toEqual(['30000', '30000']);
    expect(entry.format().startsWith('data_30000\n\n')).toBe(true);
  });

  it('renames a saveframe and every reference to it', () => {
    const entry = Entry.fromScratch('1');
    entry.addSaveframe(frame('sample_1', 'Sample', [['Sf_framecode', 'sample_1']]));
    const conditions = frame('conditions', 'Cond', [['Sample_label', '$sample_1']]);
    const loop = new Loop('Cond_ref');
    loop.addTag(['ID', 'Label']);
    loop.addRows([
      [1, '$sample_1'],
      [2, '$other'],
    ]);
    conditions.addLoop(loop);
    entry.addSaveframe(conditions);

    entry.renameSaveframe('sample_1', 'sample_A');
    expect(entry.getSaveframeByName('sample_A')?.getTag('Sf_framecode')).toBe('sample_A');
    expect(conditions.getTag('Sample_label')).toBe('$sample_A');
    expect(loop.getColumn('Label')).toEqual(['$sample_A', '$other']);
    expect(() => entry.renameSaveframe('missing', 'x')).toThrow("No saveframe named 'missing' in entry '1'.");
  });

  it('looks saveframes and loops up by category and tag value', () => {
    const entry = Entry.fromString(sample);
    expect(entry.categoryList()).toEqual(['entry_information', 'sample']);
    expect(entry.getSaveframesByCategory('sample').map(f => f.name)).toEqual(['sample_1']);
    expect(entry.getSaveframesByCategory('SAMPLE').map(f => f.name)).toEqual(['sample_1']);
    expect(entry.getSaveframesByTagAndValue('_Sample.Type', 'solution').map(f => f.name)).toEqual(['sample_1']);
    expect(entry.getLoopsByCategory('_Entry_author')).toHaveLength(1);
    expect(entry.findTags(['_Sample.Type', '_Entry_author.Ordinal'])).toEqual({
      '_Sample.Type': ['solution'],
      '_Entry_author.Ordinal': ['1', '2'],
    });
  });

  it('removes saveframes', () => {
    const entry = Entry.fromString(sample);
    const removed = entry.removeSaveframe('sample_1');
    expect(removed.name).toBe('sample_1');
    expect(entry.frameCount).toBe(1);
    expect(() => entry.removeSaveframe(removed)).toThrow("No saveframe named 'sample_1' in entry '15000'.");
  });

  it('drops saveframes holding only null markers', () => {
    const entry = Entry.fromScratch('1');
    entry.addSaveframe(frame('full', 'A', [['x', '1']]));
    entry.addSaveframe(frame('blank', 'B', [['Sf_framecode', 'blank'], ['y', '?']]));
    expect(entry.isEmpty()).toBe(false);
    expect(entry.removeEmptySaveframes().map(f => f.name)).toEqual(['blank']);
    expect(entry.saveframes.map(f => f.name)).toEqual(['full']);
  });

  it('reports references to saveframes that do not exist', () => {
    const entry = Entry.fromString('data_1\nsave_a\n_A.ref $nowhere\n_A.ok $a\nsave_\n');
    expect(entry.validate()).toEqual([
      {
        tag: '_A.ref',
        value: '$nowhere',
        location: 'line 3',
        lineNumber: 3,
        message: "Reference to saveframe 'nowhere' which does not exist.",
      },
    ]);
  });

  describe('comparison', () => {
    it('matches saveframes by name, not position', () => {
      const a = Entry.fromScratch('1');
      a.addSaveframe(frame('x', 'X', [['v', '1']]));
      a.addSaveframe(frame('y', 'Y', [['v', '2']]));
      const b = Entry.fromScratch('1');
      b.addSaveframe(frame('y', 'Y', [['v', '2']]));
      b.addSaveframe(frame('x', 'X', [['v', '1']]));
      expect(a.equals(b)).toBe(false);
      expect(a.compare(b)).toEqual([]);
    });

    it('nests saveframe differences under the saveframe name', () => {
      const a = Entry.fromScratch('1');
      a.addSaveframe(frame('a', 'A', [['x', '1']]));
      const b = Entry.fromScratch('2');
      b.addSaveframe(frame('a', 'A', [['x', '2']]));
      expect(a.compare(b)).toEqual([
        "Entry ID does not match between entries: '1' vs '2'.",
        "Saveframes do not match: 'a'.",
        "  Mismatched tag values for tag '_A.x': '1' vs '2'.",
      ]);
    });

    it('stops at a saveframe count mismatch', () => {
      const a = Entry.fromScratch('1');
      a.addSaveframe(frame('a', 'A', [['x', '1']]));
      expect(a.compare(Entry.fromScratch('1'))).toEqual([
        "The number of saveframes in the entries are not equal: '1' vs '0'.",
      ]);
    });
  });

  describe('serialization', () => {
    it('round trips through JSON', () => {
      const entry = Entry.fromString(sample);
      const json = JSON.parse(JSON.stringify(entry.toJSON()));
      expect(json.entry_id).toBe('15000');
      expect(Entry.fromJSON(json).equals(entry)).toBe(true);
      expect(() => Entry.fromJSON({ saveframes: [] })).toThrow(InvalidStateError);
    });

    it('round trips a loop that has no tags', () => {
      const entry = Entry.fromString('data_x\nsave_s\n _S.a 1\n loop_\n stop_\nsave_\n', { logger: silentLogger });
      const json = JSON.parse(JSON.stringify(entry.toJSON()));
      expect(json.saveframes[0].loops).toEqual([{ category: null, tags: [], data: [] }]);
      const again = Entry.fromJSON(json);
      expect(again.equals(entry)).toBe(true);
      expect(again.saveframes[0].loops[0].category).toBeUndefined();
    });

    it('joins saveframes with a blank line', () => {
      const entry = Entry.fromScratch('1');
      entry.addSaveframe(frame('a', 'A', [['x', '1']]));
      entry.addSaveframe(frame('b', 'B', [['y', '2']]));
      expect(entry.format()).toBe(
        'data_1\n\nsave_a\n   _A.x  1\n\nsave_\n\nsave_b\n   _B.y  2\n\nsave_\n'
      );
    });

    it('prints an outline of saveframes and loops', () => {
      const entry = Entry.fromString(sample, { source: 'sample.str' });
      expect(entry.printTree()).toBe(
        "<Entry '15000' sample.str>\n" +
          "\t[0] <Saveframe 'entry_information'>\n" +
          "\t\t[0] <Loop '_Entry_author'>\n" +
          "\t[1] <Saveframe 'sample_1'>"
      );
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nmrstar-entry-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes a file that reads back to an equal entry', async () => {
      const entry = Entry.fromString(sample);
      const file = path.join(dir, 'out.str');
      await entry.writeToFile(file);
      expect(fs.readdirSync(dir)).toEqual(['out.str']);

      const again = await Entry.fromFile(file);
      expect(again.source).toBe(file);
      expect(again.equals(entry)).toBe(true);
    });

    it('inflates gzip-compressed files', async () => {
      const file = path.join(dir, 'entry.str.gz');
      fs.writeFileSync(file, gzipSync(Buffer.from(sample, 'utf-8')));
      const entry = await Entry.fromFile(file);
      expect(entry.entryId).toBe('15000');
      expect(entry.frameCount).toBe(2);
    });

    it('rejects a missing file', async () => {
      await expect(Entry.fromFile(path.join(dir, 'missing.str'))).rejects.toThrow(/ENOENT/);
    });
  });

  it('reads from the remote archive through the given fetch', async () => {
    const urls: string[] = [];
    const entry = await Entry.fromDatabase('bmr15000', {
      fetchImpl: async url => {
        urls.push(url);
        return { ok: true, status: 200, text: async () => sample };
      },
    });
    expect(urls).toEqual(['https://api.bmrb.io/v2/entry/15000?format=rawnmrstar']);
    expect(entry.source).toBe('fromDatabase(bmr15000)');
    expect(entry.entryId).toBe('15000');
  });

  describe('with a schema', () => {
    const schema = Schema.fromFile(path.join(fixtures, 'schema.json'));

    it('builds a template entry', () => {
      const entry = Entry.fromTemplate('42', schema);
      expect(entry.saveframes.map(f => f.name)).toEqual(['entry_information', 'sample']);
      const info = entry.getSaveframeByName('entry_information');
      expect(info?.getTag('ID')).toBe('42');
      expect(info?.loops[0].getTagNames()).toEqual([
        '_Entry_author.Ordinal',
        '_Entry_author.Family_name',
        '_Entry_author.Entry_ID',
      ]);
    });

    it('validates the fixture without problems', () => {
      expect(Entry.fromString(sample).validate(schema)).toEqual([]);
    });

    it('moves saveframes into schema order', () => {
      const entry = Entry.fromScratch('1');
      entry.addSaveframe(frame('s', 'Sample', [['Type', 'gel'], ['Sf_category', 'sample']]));
      entry.addSaveframe(frame('e', 'Entry', [['Sf_category', 'entry_information']]));
      entry.normalize(schema);
      expect(entry.saveframes.map(f => f.name)).toEqual(['e', 's']);
      expect(entry.getSaveframeByName('s')?.tags).toEqual([
        ['Sf_category', 'sample'],
        ['Type', 'gel'],
      ]);
    });
  });
});
