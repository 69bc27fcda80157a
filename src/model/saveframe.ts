import type { FormatOptions, ParseOptions, ReadFileOptions } from '../config';
import { resolveFormatOptions } from '../config';
import { formatCsv, parseCsv } from '../csv';
import type { CsvOptions } from '../csv';
import { InvalidStateError } from '../errors';
import { isNullValue } from '../lexer';
import { parseSaveframe } from '../parser';
import { formatCategory, formatTag, isMultilineQuoted, quoteValue, toStarValue } from '../quoting';
import type { StarInput } from '../quoting';
import type { Schema, SchemaLookup } from '../schema/schema';
import { checkCell } from '../schema/validator';
import type { Violation } from '../schema/validator';
import { readTextFile } from '../utils/files';
import { isRecord, isStringArray } from '../utils/guards';
import { Loop } from './loop';
import type { LoopContainer, LoopJSON } from './loop';
import { assertValidName, assertValue, sameName } from './names';

export interface SaveframeJSON {
  name: string;
  category: string;
  /** `null` while the saveframe has no tags. */
  tag_prefix: string | null;
  tags: Array<[string, string]>;
  loops: LoopJSON[];
}

/** Implemented by the entry holding a saveframe, so renames stay unique. */
export interface SaveframeContainer {
  hasSaveframeNamed(name: string, except: Saveframe): boolean;
  readonly entryId?: string;
}

export interface AddSaveframeTagOptions {
  /** Replace the value of an existing tag instead of failing. */
  update?: boolean;
  /** Line the tag was read from. */
  lineNumber?: number;
}

const FRAMECODE = 'sf_framecode';
const SF_CATEGORY = 'sf_category';
// Tags that say nothing about the saveframe's content.
const BOOKKEEPING_TAGS = new Set([FRAMECODE, SF_CATEGORY, 'entry_id']);

function isSaveframeJSON(value: unknown): value is SaveframeJSON {
  if (!isRecord(value)) return false;
  const { name, tag_prefix, tags, loops } = value;
  return (
    typeof name === 'string' &&
    (typeof tag_prefix === 'string' || tag_prefix === null) &&
    Array.isArray(tags) &&
    tags.every(pair => isStringArray(pair) && pair.length === 2) &&
    Array.isArray(loops)
  );
}

/**
 * A named record of tag/value pairs sharing one tag prefix, plus at most one
 * loop per category. The name and any `Sf_framecode` tag are kept in step.
 */
export class Saveframe implements LoopContainer {
  /** Comment lines (each starting with `#`) printed before the saveframe. */
  comment?: string;
  /** Line of the `save_` header when the saveframe was parsed. */
  lineNumber?: number;
  readonly source: string;
  private _name: string;
  private _tagPrefix?: string;
  private _tags: Array<[string, string]> = [];
  private _tagLines = new Map<string, number>();
  private _loops: Loop[] = [];
  private _container?: SaveframeContainer;

  constructor(name: string, tagPrefix?: string, source = 'fromScratch()') {
    assertValidName(name, 'saveframe name');
    this._name = name;
    this.source = source;
    if (tagPrefix !== undefined) this.tagPrefix = tagPrefix;
  }

  static fromScratch(name: string, tagPrefix?: string, source = 'fromScratch()'): Saveframe {
    return new Saveframe(name, tagPrefix, source);
  }

  static fromString(text: string, options: Partial<ParseOptions> = {}): Saveframe {
    return parseSaveframe(text, { source: 'fromString()', ...options });
  }

  /**
   * Read a saveframe from CSV: a header row of qualified tags and one row of
   * values. Without `name` the saveframe is named after its `Sf_framecode`.
   */
  static fromCsv(text: string, name?: string, source = 'fromCsv()'): Saveframe {
    const rows = parseCsv(text, source);
    if (rows.length !== 2) {
      throw new InvalidStateError('Saveframe CSV data must have one header row and one row of values.');
    }
    const [tags, values] = rows;
    if (tags.length !== values.length) {
      throw new InvalidStateError('Your CSV data is invalid. The header length does not match the data length.');
    }
    const framecode = tags.findIndex(tag => formatTag(tag).toLowerCase() === FRAMECODE);
    const frameName = name ?? (framecode === -1 ? undefined : values[framecode]);
    if (frameName === undefined) {
      throw new InvalidStateError('CSV data without an Sf_framecode tag needs a saveframe name.');
    }
    const frame = new Saveframe(frameName, undefined, source);
    frame.addTags(tags.map((tag, i): [string, string] => [tag, values[i]]));
    return frame;
  }

  static async fromFile(file: string, options: ReadFileOptions & { name?: string } = {}): Promise<Saveframe> {
    const text = await readTextFile(file);
    return options.csv ? Saveframe.fromCsv(text, options.name, file) : parseSaveframe(text, { ...options, source: file });
  }

  static fromJSON(json: unknown): Saveframe {
    if (!isSaveframeJSON(json)) {
      throw new InvalidStateError("Saveframe JSON must have 'name', 'tag_prefix', 'tags' and 'loops' fields.");
    }
    const frame = new Saveframe(json.name, json.tag_prefix ?? undefined, 'fromJSON()');
    for (const [tag, value] of json.tags) {
      frame.addTag(tag, value);
    }
    for (const loop of json.loops) {
      frame.addLoop(Loop.fromJSON(loop));
    }
    return frame;
  }

  /**
   * Build a saveframe of the given saveframe category with the tags and loops
   * the schema lists for it, filled with defaults or null markers.
   */
  static fromTemplate(
    saveframeCategory: string,
    name: string,
    schema: Schema,
    options: { allTags?: boolean; entryId?: string } = {}
  ): Saveframe {
    const definitions = schema.tagsForSaveframeCategory(saveframeCategory);
    const tagDefinitions = definitions.filter(d => !d.loop);
    if (tagDefinitions.length === 0) {
      throw new InvalidStateError(`The schema has no saveframe tags for category '${saveframeCategory}'.`);
    }

    const frame = new Saveframe(name, formatCategory(tagDefinitions[0].tag), 'fromTemplate()');
    for (const definition of tagDefinitions) {
      const bare = formatTag(definition.tag).toLowerCase();
      if (bare === FRAMECODE) {
        frame.addTag(definition.tag, name);
      } else if (bare === SF_CATEGORY) {
        frame.addTag(definition.tag, saveframeCategory);
      } else if (definition.entryIdFlag && options.entryId !== undefined) {
        frame.addTag(definition.tag, options.entryId);
      } else if (options.allTags || !definition.nullable) {
        frame.addTag(definition.tag, definition.defaultValue ?? '.');
      }
    }

    const loopCategories: string[] = [];
    for (const definition of definitions.filter(d => d.loop)) {
      const category = formatCategory(definition.tag);
      if (!loopCategories.some(c => sameName(c, category))) loopCategories.push(category);
    }
    for (const category of loopCategories) {
      frame.addLoop(Loop.fromTemplate(category, schema, options));
    }
    return frame;
  }

  get name(): string {
    return this._name;
  }

  /** Renaming also rewrites the `Sf_framecode` tag when there is one. */
  set name(name: string) {
    this.checkRename(name);
    this._name = name;
    const framecode = this.findTagPair(FRAMECODE);
    if (framecode) framecode[1] = name;
  }

  get tagPrefix(): string | undefined {
    return this._tagPrefix;
  }

  set tagPrefix(prefix: string | undefined) {
    if (prefix === undefined) {
      if (this._tags.length > 0) {
        throw new InvalidStateError('Cannot clear the tag prefix of a saveframe that has tags.');
      }
      this._tagPrefix = undefined;
      return;
    }
    const bare = formatCategory(prefix);
    assertValidName(bare, 'tag prefix');
    this._tagPrefix = bare;
  }

  /** Value of `Sf_category` when present, otherwise the tag prefix. */
  get category(): string | undefined {
    const value = this.findTagPair(SF_CATEGORY)?.[1];
    return value !== undefined && !isNullValue(value) ? value : this._tagPrefix;
  }

  /** @internal */
  attachTo(container: SaveframeContainer | undefined): void {
    this._container = container;
  }

  get tags(): Array<[string, string]> {
    return this._tags.map(([tag, value]): [string, string] => [tag, value]);
  }

  /** Tag names qualified with the prefix, e.g. `_Entry.ID`. */
  getTagNames(): string[] {
    return this._tags.map(([tag]) => this.qualify(tag));
  }

  get loops(): Loop[] {
    return [...this._loops];
  }

  hasTag(tag: string): boolean {
    return this.getTag(tag) !== undefined;
  }

  /** Value of one of this saveframe's own tags; loops are not searched. */
  getTag(tag: string): string | undefined {
    if (tag.includes('.') && !sameName(formatCategory(tag), this._tagPrefix)) return undefined;
    return this.findTagPair(formatTag(tag))?.[1];
  }

  tagLineNumber(tag: string): number | undefined {
    return this._tagLines.get(formatTag(tag).toLowerCase());
  }

  addTag(tag: string, value: StarInput, options: AddSaveframeTagOptions = {}): void {
    let prefix = this._tagPrefix;
    if (tag.includes('.')) {
      const tagPrefix = formatCategory(tag);
      if (prefix === undefined) {
        assertValidName(tagPrefix, 'tag prefix');
        prefix = tagPrefix;
      } else if (!sameName(tagPrefix, prefix)) {
        throw new InvalidStateError(
          `One saveframe cannot have tags with different categories: '${tag}' does not match '_${prefix}'.`
        );
      }
    } else if (prefix === undefined) {
      throw new InvalidStateError(`Tag '${tag}' has no category and the saveframe's tag prefix is not set.`);
    }

    const bare = formatTag(tag);
    assertValidName(bare, 'tag name');
    const text = toStarValue(value);
    assertValue(text, tag);

    const existing = this.findTagPair(bare);
    if (existing && !options.update) {
      throw new InvalidStateError(`Duplicate tag '_${prefix}.${bare}' in saveframe '${this._name}'.`);
    }

    const renames = bare.toLowerCase() === FRAMECODE && !isNullValue(text) && text !== this._name;
    if (renames) this.checkRename(text);

    this._tagPrefix = prefix;
    if (existing) {
      existing[1] = text;
    } else {
      this._tags.push([bare, text]);
    }
    if (options.lineNumber !== undefined) this._tagLines.set(bare.toLowerCase(), options.lineNumber);
    if (renames) this._name = text;
  }

  /** Add several tags. Nothing is added if any of them is rejected. */
  addTags(pairs: Array<[string, StarInput]>): void {
    const trial = new Saveframe(this._name, this._tagPrefix);
    for (const [tag, value] of this._tags) trial.addTag(tag, value);
    for (const [tag, value] of pairs) {
      trial.addTag(tag, value);
      if (formatTag(tag).toLowerCase() === FRAMECODE && trial.name !== this._name) this.checkRename(trial.name);
    }
    for (const [tag, value] of pairs) this.addTag(tag, value);
  }

  /** Set a tag, adding it when missing. */
  setTag(tag: string, value: StarInput): void {
    this.addTag(tag, value, { update: true });
  }

  removeTag(tag: string): void {
    const bare = formatTag(tag).toLowerCase();
    const index = this._tags.findIndex(([name]) => name.toLowerCase() === bare);
    if (index === -1 || (tag.includes('.') && !sameName(formatCategory(tag), this._tagPrefix))) {
      throw new InvalidStateError(`No tag '${tag}' in saveframe '${this._name}'.`);
    }
    this._tags.splice(index, 1);
    this._tagLines.delete(bare);
  }

  hasLoopCategory(category: string, except: Loop): boolean {
    return this._loops.some(loop => loop !== except && sameName(loop.category, formatCategory(category)));
  }

  getLoopByCategory(category: string): Loop | undefined {
    const wanted = formatCategory(category);
    return this._loops.find(loop => sameName(loop.category, wanted));
  }

  addLoop(loop: Loop): void {
    if (this._loops.includes(loop)) {
      throw new InvalidStateError(`The loop is already part of saveframe '${this._name}'.`);
    }
    if (loop.category !== undefined && this.getLoopByCategory(loop.category)) {
      throw new InvalidStateError(
        `You cannot have two loops with the same category in one saveframe. Category: '_${loop.category}'.`
      );
    }
    loop.attachTo(this);
    this._loops.push(loop);
  }

  removeLoop(loop: Loop | string): Loop {
    const target = typeof loop === 'string' ? this.getLoopByCategory(loop) : loop;
    const index = target === undefined ? -1 : this._loops.indexOf(target);
    if (target === undefined || index === -1) {
      const label = typeof loop === 'string' ? loop : `_${loop.category ?? ''}`;
      throw new InvalidStateError(`No loop '${label}' in saveframe '${this._name}'.`);
    }
    this._loops.splice(index, 1);
    target.attachTo(undefined);
    return target;
  }

  /**
   * Every value of a fully qualified tag in this saveframe: its own tag when
   * the prefix matches, plus the column of a loop with that category.
   */
  findTag(tag: string): string[] {
    if (!tag.includes('.')) {
      throw new InvalidStateError(`findTag needs a tag with a category, e.g. '_Entry.ID'; got '${tag}'.`);
    }
    const results: string[] = [];
    const own = this.getTag(tag);
    if (own !== undefined) results.push(own);
    const loop = this.getLoopByCategory(formatCategory(tag));
    if (loop?.hasTag(tag)) results.push(...loop.getColumn(tag));
    return results;
  }

  /** True when every content tag and every loop holds only null markers. */
  isEmpty(): boolean {
    const tagsEmpty = this._tags.every(([tag, value]) => BOOKKEEPING_TAGS.has(tag.toLowerCase()) || isNullValue(value));
    return tagsEmpty && this._loops.every(loop => loop.isEmpty());
  }

  sortTags(schema: Schema): void {
    const keyed = this._tags.map((pair, index) => ({ pair, index, key: schema.sortKey(this.qualify(pair[0])) }));
    keyed.sort((a, b) => (a.key === b.key ? a.index - b.index : a.key < b.key ? -1 : 1));
    this._tags = keyed.map(({ pair }) => pair);

    const order = schema.categoryOrder().map(c => c.toLowerCase());
    const rank = (loop: Loop) => {
      const position = order.indexOf((loop.category ?? '').toLowerCase());
      return position === -1 ? Number.POSITIVE_INFINITY : position;
    };
    this._loops = this._loops
      .map((loop, index) => ({ loop, index }))
      .sort((a, b) => (rank(a.loop) === rank(b.loop) ? a.index - b.index : rank(a.loop) < rank(b.loop) ? -1 : 1))
      .map(({ loop }) => loop);
    for (const loop of this._loops) loop.sortTags(schema);
  }

  /** Add the schema tags this saveframe and its loops lack. */
  addMissingTags(schema: Schema, options: { allTags?: boolean } = {}): void {
    if (this._tagPrefix !== undefined) {
      for (const definition of schema.tagsForCategory(this._tagPrefix)) {
        if (definition.loop || this.hasTag(definition.tag)) continue;
        if (!options.allTags && definition.nullable) continue;
        const bare = formatTag(definition.tag).toLowerCase();
        let value = definition.defaultValue ?? '.';
        if (bare === FRAMECODE) value = this._name;
        if (definition.entryIdFlag && this._container?.entryId) value = this._container.entryId;
        this.addTag(definition.tag, value);
      }
    }
    for (const loop of this._loops) loop.addMissingTags(schema, options);
    this.sortTags(schema);
  }

  validate(schema?: SchemaLookup): Violation[] {
    const violations: Violation[] = [];
    const saveframeCategory = this.findTagPair(SF_CATEGORY)?.[1];
    const context = saveframeCategory !== undefined && !isNullValue(saveframeCategory) ? saveframeCategory : undefined;

    if (schema) {
      for (const [tag, value] of this._tags) {
        violations.push(
          ...checkCell(schema, this.qualify(tag), value, {
            locator: `tag '${this.qualify(tag)}' of saveframe '${this._name}'`,
            lineNumber: this._tagLines.get(tag.toLowerCase()),
            inLoop: false,
            saveframeCategory: context,
          })
        );
      }
    }
    for (const loop of this._loops) {
      violations.push(...loop.validate(schema, { saveframe: this._name, saveframeCategory: context }));
    }
    return violations;
  }

  /** Exact equality: name, prefix, tags, values and loops in the same order and case. */
  equals(other: Saveframe): boolean {
    return (
      this._name === other._name &&
      this._tagPrefix === other._tagPrefix &&
      this._tags.length === other._tags.length &&
      this._tags.every(([tag, value], i) => tag === other._tags[i][0] && value === other._tags[i][1]) &&
      this._loops.length === other._loops.length &&
      this._loops.every((loop, i) => loop.equals(other._loops[i]))
    );
  }

  compare(other: Saveframe): string[] {
    const diffs: string[] = [];
    if (this._name !== other._name) {
      diffs.push(`Saveframe names do not match: '${this._name}' vs '${other._name}'.`);
      return diffs;
    }
    if (!sameName(this._tagPrefix ?? '', other._tagPrefix ?? '')) {
      diffs.push(`Tag prefix does not match: '_${this._tagPrefix ?? ''}' vs '_${other._tagPrefix ?? ''}'.`);
      return diffs;
    }
    if (this._tags.length !== other._tags.length) {
      diffs.push(`Number of tags does not match: '${this._tags.length}' vs '${other._tags.length}'.`);
    }
    for (const [tag, value] of this._tags) {
      const theirs = other.getTag(tag);
      if (theirs === undefined) {
        diffs.push(`No tag with name '${this.qualify(tag)}' in compared saveframe.`);
      } else if (theirs !== value) {
        diffs.push(`Mismatched tag values for tag '${this.qualify(tag)}': '${value}' vs '${theirs}'.`);
      }
    }
    if (this._loops.length !== other._loops.length) {
      diffs.push(`Number of children loops does not match: '${this._loops.length}' vs '${other._loops.length}'.`);
    }
    for (const loop of this._loops) {
      const theirs = loop.category === undefined ? undefined : other.getLoopByCategory(loop.category);
      if (!theirs) {
        diffs.push(`No loop with category '_${loop.category ?? ''}' in compared saveframe.`);
        continue;
      }
      diffs.push(...loop.compare(theirs));
    }
    return diffs;
  }

  format(options: Partial<FormatOptions> = {}): string {
    const opts = resolveFormatOptions(options);
    const printed = this._tags.filter(([, value]) => !(opts.skipEmptyTags && isNullValue(value)));
    const width = Math.max(0, ...printed.map(([tag]) => this.qualify(tag).length));

    let out = '';
    if (opts.showComments && this.comment) {
      out += `${this.comment}\n`;
    }
    out += `save_${this._name}\n`;
    for (const [tag, value] of printed) {
      const quoted = quoteValue(value);
      const name = this.qualify(tag);
      out += isMultilineQuoted(quoted) ? `   ${name}${quoted}` : `   ${name.padEnd(width)}  ${quoted}\n`;
    }
    for (const loop of this._loops) {
      out += loop.format(opts);
    }
    out += '\nsave_\n';
    return out;
  }

  toString(): string {
    return this.format();
  }

  /** The saveframe's own tags as CSV; loops are not included. */
  getDataAsCsv(options: CsvOptions = {}): string {
    const { header = true, showCategory = true } = options;
    const rows = header ? [showCategory ? this.getTagNames() : this._tags.map(([tag]) => tag)] : [];
    return formatCsv([...rows, this._tags.map(([, value]) => value)]);
  }

  toJSON(): SaveframeJSON {
    return {
      name: this._name,
      category: this.category ?? '',
      tag_prefix: this._tagPrefix === undefined ? null : `_${this._tagPrefix}`,
      tags: this.tags,
      loops: this._loops.map(loop => loop.toJSON()),
    };
  }

  private qualify(tag: string): string {
    return `_${this._tagPrefix ?? ''}.${tag}`;
  }

  private findTagPair(bare: string): [string, string] | undefined {
    const wanted = bare.toLowerCase();
    return this._tags.find(([tag]) => tag.toLowerCase() === wanted);
  }

  private checkRename(name: string): void {
    assertValidName(name, 'saveframe name');
    if (this._container?.hasSaveframeNamed(name, this)) {
      throw new InvalidStateError(`Cannot rename saveframe '${this._name}': the entry already has a saveframe named '${name}'.`);
    }
  }
}
