import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { FormatOptions, ParseOptions } from '../config';
import { resolveFormatOptions } from '../config';
import { InvalidStateError } from '../errors';
import { fetchEntryText } from '../fetch';
import type { FetchOptions } from '../fetch';
import { parse } from '../parser';
import type { Schema, SchemaLookup } from '../schema/schema';
import type { Violation } from '../schema/validator';
import { readTextFile } from '../utils/files';
import { isRecord } from '../utils/guards';
import type { Loop } from './loop';
import { assertValidName, sameName } from './names';
import { Saveframe } from './saveframe';
import type { SaveframeContainer, SaveframeJSON } from './saveframe';

export interface EntryJSON {
  entry_id: string;
  saveframes: SaveframeJSON[];
}

const ENTRY_ID_TAG = 'entry_id';

function isEntryJSON(value: unknown): value is EntryJSON {
  return isRecord(value) && typeof value.entry_id === 'string' && Array.isArray(value.saveframes);
}

/** The root of a document: an entry ID and an ordered list of saveframes. */
export class Entry implements SaveframeContainer {
  readonly source: string;
  private _entryId: string;
  private _saveframes: Saveframe[] = [];

  constructor(entryId: string, source = 'fromScratch()') {
    assertValidName(entryId, 'entry ID');
    this._entryId = entryId;
    this.source = source;
  }

  static fromScratch(entryId: string): Entry {
    return new Entry(entryId);
  }

  static fromString(text: string, options: Partial<ParseOptions> = {}): Entry {
    return parse(text, { source: 'fromString()', ...options });
  }

  /** Read a file from disk. Gzip-compressed files are detected and inflated. */
  static async fromFile(file: string, options: Partial<ParseOptions> = {}): Promise<Entry> {
    return parse(await readTextFile(file), { source: file, ...options });
  }

  /** Retrieve an entry from the remote archive and parse it. */
  static async fromDatabase(entryId: string, options: FetchOptions & Partial<ParseOptions> = {}): Promise<Entry> {
    const text = await fetchEntryText(entryId, options);
    return parse(text, {
      raiseParseWarnings: options.raiseParseWarnings,
      saveframeCloser: options.saveframeCloser,
      keepComments: options.keepComments,
      checkDataTypes: options.checkDataTypes,
      schema: options.schema,
      logger: options.logger,
      source: `fromDatabase(${entryId})`,
    });
  }

  static fromJSON(json: unknown): Entry {
    if (!isEntryJSON(json)) {
      throw new InvalidStateError("Entry JSON must have 'entry_id' and 'saveframes' fields.");
    }
    const entry = new Entry(json.entry_id, 'fromJSON()');
    for (const frame of json.saveframes) {
      entry.addSaveframe(Saveframe.fromJSON(frame));
    }
    return entry;
  }

  /** An entry with one saveframe per saveframe category in the schema. */
  static fromTemplate(entryId: string, schema: Schema, options: { allTags?: boolean } = {}): Entry {
    const entry = new Entry(entryId, 'fromTemplate()');
    for (const category of schema.saveframeCategories()) {
      if (!schema.tagsForSaveframeCategory(category).some(d => !d.loop)) continue;
      entry.addSaveframe(Saveframe.fromTemplate(category, category, schema, { ...options, entryId }));
    }
    return entry;
  }

  get entryId(): string {
    return this._entryId;
  }

  /** Changing the ID also rewrites every `Entry_ID` tag and column. */
  set entryId(entryId: string) {
    assertValidName(entryId, 'entry ID');
    this._entryId = entryId;
    for (const frame of this._saveframes) {
      for (const [tag] of frame.tags) {
        if (tag.toLowerCase() === ENTRY_ID_TAG) frame.setTag(tag, entryId);
      }
      for (const loop of frame.loops) {
        if (loop.hasTag('Entry_ID')) loop.fillColumn('Entry_ID', entryId);
      }
    }
  }

  get saveframes(): Saveframe[] {
    return [...this._saveframes];
  }

  get frameCount(): number {
    return this._saveframes.length;
  }

  hasSaveframeNamed(name: string, except?: Saveframe): boolean {
    return this._saveframes.some(frame => frame !== except && sameName(frame.name, name));
  }

  addSaveframe(frame: Saveframe): void {
    if (this._saveframes.includes(frame)) {
      throw new InvalidStateError(`Saveframe '${frame.name}' is already part of this entry.`);
    }
    if (this.hasSaveframeNamed(frame.name)) {
      throw new InvalidStateError(`Cannot add a saveframe with name '${frame.name}' since a saveframe with that name already exists in the entry.`);
    }
    frame.attachTo(this);
    this._saveframes.push(frame);
  }

  removeSaveframe(frame: Saveframe | string): Saveframe {
    const target = typeof frame === 'string' ? this.getSaveframeByName(frame) : frame;
    const index = target === undefined ? -1 : this._saveframes.indexOf(target);
    if (target === undefined || index === -1) {
      const label = typeof frame === 'string' ? frame : frame.name;
      throw new InvalidStateError(`No saveframe named '${label}' in entry '${this._entryId}'.`);
    }
    this._saveframes.splice(index, 1);
    target.attachTo(undefined);
    return target;
  }

  /**
   * Rename a saveframe and rewrite every `$old` reference to it in tags and
   * loop cells.
   */
  renameSaveframe(oldName: string, newName: string): void {
    const frame = this.getSaveframeByName(oldName);
    if (!frame) {
      throw new InvalidStateError(`No saveframe named '${oldName}' in entry '${this._entryId}'.`);
    }
    const oldReference = `$${frame.name}`;
    frame.name = newName;
    const newReference = `$${newName}`;

    for (const other of this._saveframes) {
      for (const [tag, value] of other.tags) {
        if (value === oldReference) other.setTag(tag, newReference);
      }
      for (const loop of other.loops) {
        for (const tag of loop.tags) {
          const column = loop.getColumn(tag);
          if (column.includes(oldReference)) {
            loop.setColumn(tag, column.map(value => (value === oldReference ? newReference : value)));
          }
        }
      }
    }
  }

  getSaveframeByName(name: string): Saveframe | undefined {
    return this._saveframes.find(frame => sameName(frame.name, name));
  }

  getSaveframesByCategory(category: string): Saveframe[] {
    return this._saveframes.filter(frame => sameName(frame.category, category));
  }

  /** Saveframes whose own tag `tag` has exactly `value`. */
  getSaveframesByTagAndValue(tag: string, value: string): Saveframe[] {
    return this._saveframes.filter(frame => frame.getTag(tag) === value);
  }

  getLoopsByCategory(category: string): Loop[] {
    const results: Loop[] = [];
    for (const frame of this._saveframes) {
      const loop = frame.getLoopByCategory(category);
      if (loop) results.push(loop);
    }
    return results;
  }

  /** Every value of a fully qualified tag anywhere in the entry. */
  findTag(tag: string): string[] {
    return this._saveframes.flatMap(frame => frame.findTag(tag));
  }

  findTags(tags: string[]): Record<string, string[]> {
    const results: Record<string, string[]> = {};
    for (const tag of tags) results[tag] = this.findTag(tag);
    return results;
  }

  /** Saveframe categories in order of first appearance. */
  categoryList(): string[] {
    const seen: string[] = [];
    for (const frame of this._saveframes) {
      const category = frame.category;
      if (category !== undefined && !seen.includes(category)) seen.push(category);
    }
    return seen;
  }

  isEmpty(): boolean {
    return this._saveframes.every(frame => frame.isEmpty());
  }

  removeEmptySaveframes(): Saveframe[] {
    const removed = this._saveframes.filter(frame => frame.isEmpty());
    for (const frame of removed) this.removeSaveframe(frame);
    return removed;
  }

  /** Add missing schema tags to every saveframe and loop. */
  addMissingTags(schema: Schema, options: { allTags?: boolean } = {}): void {
    for (const frame of this._saveframes) frame.addMissingTags(schema, options);
  }

  /**
   * Reorder saveframes, tags and loops into schema order. Saveframes keep
   * their relative order within a category.
   */
  normalize(schema: Schema): void {
    const order = schema.saveframeCategories();
    const rank = (frame: Saveframe) => {
      const position = order.indexOf(frame.category ?? '');
      return position === -1 ? Number.POSITIVE_INFINITY : position;
    };
    this._saveframes = this._saveframes
      .map((frame, index) => ({ frame, index }))
      .sort((a, b) => (rank(a.frame) === rank(b.frame) ? a.index - b.index : rank(a.frame) < rank(b.frame) ? -1 : 1))
      .map(({ frame }) => frame);
    for (const frame of this._saveframes) frame.sortTags(schema);
  }

  /**
   * Check references between saveframes and, with a schema, every value.
   * Read-only; problems are returned, never thrown.
   */
  validate(schema?: SchemaLookup): Violation[] {
    const violations: Violation[] = [];
    for (const frame of this._saveframes) {
      for (const [tag, value] of frame.tags) {
        if (value.startsWith('$') && !this.hasSaveframeNamed(value.slice(1))) {
          const qualified = `_${frame.tagPrefix ?? ''}.${tag}`;
          const line = frame.tagLineNumber(tag);
          violations.push({
            tag: qualified,
            value,
            location: line !== undefined ? `line ${line}` : `tag '${qualified}' of saveframe '${frame.name}'`,
            lineNumber: line,
            message: `Reference to saveframe '${value.slice(1)}' which does not exist.`,
          });
        }
      }
      for (const loop of frame.loops) {
        loop.data.forEach((row, r) => {
          row.forEach((value, c) => {
            if (!value.startsWith('$') || this.hasSaveframeNamed(value.slice(1))) return;
            violations.push({
              tag: `_${loop.category ?? ''}.${loop.tags[c]}`,
              value,
              location: `row ${r + 1} tag ${c + 1} of loop '_${loop.category ?? ''}' in saveframe '${frame.name}'`,
              message: `Reference to saveframe '${value.slice(1)}' which does not exist.`,
            });
          });
        });
      }
      violations.push(...frame.validate(schema));
    }
    return violations;
  }

  /** Exact equality, including saveframe order. */
  equals(other: Entry): boolean {
    return (
      this._entryId === other._entryId &&
      this._saveframes.length === other._saveframes.length &&
      this._saveframes.every((frame, i) => frame.equals(other._saveframes[i]))
    );
  }

  /**
   * NMR-STAR aware differences. Saveframes are matched by name, so order
   * does not matter; an empty list means the entries are equivalent.
   */
  compare(other: Entry): string[] {
    const diffs: string[] = [];
    if (this._entryId !== other._entryId) {
      diffs.push(`Entry ID does not match between entries: '${this._entryId}' vs '${other._entryId}'.`);
    }
    if (this._saveframes.length !== other._saveframes.length) {
      diffs.push(
        `The number of saveframes in the entries are not equal: '${this._saveframes.length}' vs '${other._saveframes.length}'.`
      );
      return diffs;
    }
    for (const frame of this._saveframes) {
      const theirs = other.getSaveframeByName(frame.name);
      if (!theirs) {
        diffs.push(`No saveframe with name '${frame.name}' in other entry.`);
        continue;
      }
      const frameDiffs = frame.compare(theirs);
      if (frameDiffs.length > 0) {
        diffs.push(`Saveframes do not match: '${frame.name}'.`, ...frameDiffs.map(diff => `  ${diff}`));
      }
    }
    return diffs;
  }

  format(options: Partial<FormatOptions> = {}): string {
    const opts = resolveFormatOptions(options);
    return `data_${this._entryId}\n\n` + this._saveframes.map(frame => frame.format(opts)).join('\n');
  }

  toString(): string {
    return this.format();
  }

  toJSON(): EntryJSON {
    return { entry_id: this._entryId, saveframes: this._saveframes.map(frame => frame.toJSON()) };
  }

  /**
   * Write the entry to `file`. The text is formatted completely before the
   * file is touched, then written to a sibling temporary file and renamed.
   */
  async writeToFile(file: string, options: Partial<FormatOptions> = {}): Promise<void> {
    const text = this.format(options);
    const temporary = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.tmp`);
    await fs.writeFile(temporary, text, 'utf-8');
    try {
      await fs.rename(temporary, file);
    } catch (error) {
      await fs.rm(temporary, { force: true });
      throw error;
    }
  }

  /** Indented outline of saveframes and loops. */
  printTree(): string {
    const lines = [`<Entry '${this._entryId}' ${this.source}>`];
    this._saveframes.forEach((frame, i) => {
      lines.push(`\t[${i}] <Saveframe '${frame.name}'>`);
      frame.loops.forEach((loop, j) => {
        lines.push(`\t\t[${j}] <Loop '_${loop.category ?? ''}'>`);
      });
    });
    return lines.join('\n');
  }
}
