import type { FormatOptions, ParseOptions, ReadFileOptions } from '../config';
import { resolveFormatOptions } from '../config';
import { formatCsv, parseCsv } from '../csv';
import type { CsvOptions } from '../csv';
import { InvalidStateError } from '../errors';
import { isNullValue } from '../lexer';
import { parseLoop } from '../parser';
import { formatCategory, formatTag, isMultilineQuoted, isQualifiedTag, quoteValue, toStarValue } from '../quoting';
import type { StarInput } from '../quoting';
import type { SchemaLookup, TypedValue } from '../schema/schema';
import type { Schema } from '../schema/schema';
import { convertValue } from '../schema/schema';
import { checkCell } from '../schema/validator';
import type { Violation } from '../schema/validator';
import { readTextFile } from '../utils/files';
import { isRecord, isStringArray } from '../utils/guards';
import { assertValidName, assertValue, sameName } from './names';

export interface LoopJSON {
  /** `null` for a loop that has no tags yet. */
  category: string | null;
  tags: string[];
  data: string[][];
}

/** Implemented by whatever holds loops, so category changes can be checked. */
export interface LoopContainer {
  hasLoopCategory(category: string, except: Loop): boolean;
}

export interface AddTagOptions {
  /** Silently skip tags the loop already has. */
  ignoreDuplicates?: boolean;
  /** Fill the new column with `.` when the loop already has rows. */
  updateData?: boolean;
}

export interface RenumberOptions {
  startValue?: number;
  /** Shift the existing numbers instead of replacing them, so gaps and repeats survive. */
  maintainOrdering?: boolean;
}

function isLoopJSON(value: unknown): value is LoopJSON {
  if (!isRecord(value)) return false;
  const { category, tags, data } = value;
  return (
    (typeof category === 'string' || category === null) &&
    isStringArray(tags) &&
    Array.isArray(data) &&
    data.every(isStringArray)
  );
}

function numericColumn(values: string[]): boolean {
  return values.every(value => value.trim() !== '' && Number.isFinite(Number(value)));
}

/**
 * A table of rows under one tag category. Every row always has exactly one
 * value per tag; mutators check first and change nothing when they fail.
 */
export class Loop {
  /** Line of the `loop_` keyword when the loop was parsed. */
  lineNumber?: number;
  readonly source: string;
  private _category?: string;
  private _tags: string[] = [];
  private _data: string[][] = [];
  private _container?: LoopContainer;

  constructor(category?: string, source = 'fromScratch()') {
    this.source = source;
    if (category !== undefined) this.setCategory(category);
  }

  static fromScratch(category?: string, source = 'fromScratch()'): Loop {
    return new Loop(category, source);
  }

  static fromString(text: string, options: Partial<ParseOptions> = {}): Loop {
    return parseLoop(text, { source: 'fromString()', ...options });
  }

  /** Read a loop from CSV: a header row of qualified tags, then one row per loop row. */
  static fromCsv(text: string, source = 'fromCsv()'): Loop {
    const [header, ...rows] = parseCsv(text, source);
    if (header === undefined) {
      throw new InvalidStateError('The CSV data has no header row.');
    }
    const loop = new Loop(undefined, source);
    loop.addTag(header);
    loop.addRows(rows);
    return loop;
  }

  static async fromFile(file: string, options: ReadFileOptions = {}): Promise<Loop> {
    const text = await readTextFile(file);
    return options.csv ? Loop.fromCsv(text, file) : parseLoop(text, { ...options, source: file });
  }

  static fromJSON(json: unknown): Loop {
    if (!isLoopJSON(json)) {
      throw new InvalidStateError("Loop JSON must have 'category', 'tags' and 'data' fields.");
    }
    const loop = new Loop(json.category ?? undefined, 'fromJSON()');
    loop.addTag(json.tags);
    loop.addRows(json.data);
    return loop;
  }

  /** Build an empty loop holding every tag the schema lists for `category`. */
  static fromTemplate(category: string, schema: Schema, options: { allTags?: boolean } = {}): Loop {
    const loop = new Loop(category, 'fromTemplate()');
    const definitions = schema.tagsForCategory(category).filter(d => d.loop);
    if (definitions.length === 0) {
      throw new InvalidStateError(`The schema has no loop tags for category '_${formatCategory(category)}'.`);
    }
    loop.addTag(definitions.filter(d => options.allTags || !d.nullable).map(d => d.tag));
    return loop;
  }

  get category(): string | undefined {
    return this._category;
  }

  setCategory(category: string): void {
    const bare = formatCategory(category);
    assertValidName(bare, 'loop category');
    if (this._container?.hasLoopCategory(bare, this)) {
      throw new InvalidStateError(`The saveframe already has a loop with category '_${bare}'.`);
    }
    this._category = bare;
  }

  /** @internal */
  attachTo(container: LoopContainer | undefined): void {
    this._container = container;
  }

  get tags(): string[] {
    return [...this._tags];
  }

  /** Tag names qualified with the category, e.g. `_Atom.ID`. */
  getTagNames(): string[] {
    return this._tags.map(tag => this.qualify(tag));
  }

  get data(): string[][] {
    return this._data.map(row => [...row]);
  }

  get rowCount(): number {
    return this._data.length;
  }

  /** No rows, or every value is a null marker. Distinct from having no tags. */
  isEmpty(): boolean {
    return this._data.every(row => row.every(isNullValue));
  }

  tagIndex(tag: string): number | undefined {
    if (tag.includes('.') && !sameName(formatCategory(tag), this._category)) return undefined;
    const wanted = formatTag(tag).toLowerCase();
    const index = this._tags.findIndex(t => t.toLowerCase() === wanted);
    return index === -1 ? undefined : index;
  }

  hasTag(tag: string): boolean {
    return this.tagIndex(tag) !== undefined;
  }

  addTag(tags: string | string[], options: AddTagOptions = {}): void {
    const list = Array.isArray(tags) ? tags : [tags];
    let category = this._category;
    const pending: string[] = [];

    for (const tag of list) {
      if (tag.includes('.')) {
        const tagCategory = formatCategory(tag);
        if (category === undefined) {
          assertValidName(tagCategory, 'loop category');
          category = tagCategory;
        } else if (!sameName(tagCategory, category)) {
          throw new InvalidStateError(
            `A loop can only hold tags of one category: '${tag}' does not belong to '_${category}'.`
          );
        }
      } else if (category === undefined) {
        throw new InvalidStateError(`Tag '${tag}' has no category and the loop category is not set.`);
      }
      const bare = formatTag(tag);
      assertValidName(bare, 'tag name');

      const duplicate =
        this._tags.some(t => sameName(t, bare)) || pending.some(t => sameName(t, bare));
      if (duplicate) {
        if (options.ignoreDuplicates) continue;
        throw new InvalidStateError(`Duplicate tag '_${category}.${bare}' in loop.`);
      }
      pending.push(bare);
    }

    if (pending.length === 0) return;
    if (this._data.length > 0 && !options.updateData) {
      throw new InvalidStateError(
        "Cannot add tags to a loop that already has rows. Pass updateData to fill the new columns with '.'."
      );
    }
    if (category !== undefined && category !== this._category) this.setCategory(category);
    this._tags.push(...pending);
    for (const row of this._data) {
      row.push(...pending.map(() => '.'));
    }
  }

  removeTag(tag: string): void {
    const index = this.tagIndex(tag);
    if (index === undefined) {
      throw new InvalidStateError(`No tag '${tag}' in loop '_${this._category ?? ''}'.`);
    }
    this._tags.splice(index, 1);
    for (const row of this._data) row.splice(index, 1);
  }

  addRow(values: StarInput[]): void {
    this._data.push(this.prepareRow(values, this._data.length + 1));
  }

  /** Append several rows. Either all are added or none. */
  addRows(rows: StarInput[][]): void {
    const prepared = rows.map((row, index) => this.prepareRow(row, this._data.length + index + 1));
    this._data.push(...prepared);
  }

  /** Append a flat run of values, filling rows left to right. */
  addData(values: StarInput[]): void {
    const width = this._tags.length;
    if (width === 0) {
      throw new InvalidStateError('Cannot add data to a loop with no tags.');
    }
    if (values.length % width !== 0) {
      const rows = Math.floor(values.length / width);
      const missing = this._tags[values.length % width];
      throw new InvalidStateError(
        `${values.length} values cannot fill rows of ${width} tags: row ${this._data.length + rows + 1} ` +
          `is missing a value for tag '${this.qualify(missing)}'.`
      );
    }
    const rows: StarInput[][] = [];
    for (let i = 0; i < values.length; i += width) rows.push(values.slice(i, i + width));
    this.addRows(rows);
  }

  removeRow(index: number): string[] {
    if (!Number.isInteger(index) || index < 0 || index >= this._data.length) {
      throw new InvalidStateError(`Row ${index} does not exist; the loop has ${this._data.length} rows.`);
    }
    return this._data.splice(index, 1)[0];
  }

  clearData(): void {
    this._data = [];
  }

  getColumn(tag: string): string[] {
    const index = this.requireIndex(tag);
    return this._data.map(row => row[index]);
  }

  /** Rows restricted to the given tags, in the order given. */
  getColumns(tags: string[]): string[][] {
    const indexes = tags.map(tag => this.requireIndex(tag));
    return this._data.map(row => indexes.map(i => row[i]));
  }

  /**
   * Rows as objects keyed by tag name. With a schema, values are converted to
   * numbers and dates and both null markers become `null`.
   */
  getRecords(schema?: SchemaLookup): Array<Record<string, TypedValue>> {
    return this._data.map(row => {
      const record: Record<string, TypedValue> = {};
      this._tags.forEach((tag, i) => {
        record[tag] = schema ? convertValue(schema, this.qualify(tag), row[i]) : row[i];
      });
      return record;
    });
  }

  setColumn(tag: string, values: StarInput[]): void {
    const index = this.requireIndex(tag);
    if (values.length !== this._data.length) {
      throw new InvalidStateError(
        `Column '${this.qualify(this._tags[index])}' has ${this._data.length} rows but ${values.length} values were given.`
      );
    }
    const converted = values.map(value => toStarValue(value));
    converted.forEach(value => assertValue(value, this.qualify(this._tags[index])));
    converted.forEach((value, row) => {
      this._data[row][index] = value;
    });
  }

  /** Set every row of a column to the same value. */
  fillColumn(tag: string, value: StarInput): void {
    this.setColumn(tag, this._data.map(() => value));
  }

  /**
   * New loop holding only the given tags. Missing tags are an error unless
   * `ignoreMissingTags` is set, in which case they are filled with `.`.
   */
  filter(tags: string[], options: { ignoreMissingTags?: boolean } = {}): Loop {
    const result = new Loop(this._category, this.source);
    const indexes: Array<number | undefined> = [];
    for (const tag of tags) {
      const index = this.tagIndex(tag);
      if (index === undefined && !options.ignoreMissingTags) {
        throw new InvalidStateError(`Cannot filter on tag '${tag}': it is not in loop '_${this._category ?? ''}'.`);
      }
      indexes.push(index);
    }
    result.addTag(tags.map((tag, i) => {
      const index = indexes[i];
      return index === undefined ? tag : this.qualify(this._tags[index]);
    }));
    result.addRows(this._data.map(row => indexes.map(i => (i === undefined ? '.' : row[i]))));
    return result;
  }

  /**
   * Stable sort by one or more tags, the first tag having the highest
   * priority. Columns holding only numbers are compared numerically.
   */
  sortRows(tags: string | string[], compare?: (a: string, b: string) => number): void {
    const indexes = (Array.isArray(tags) ? tags : [tags]).map(tag => this.requireIndex(tag));
    const comparators = indexes.map(index => {
      if (compare) return compare;
      return numericColumn(this._data.map(row => row[index]))
        ? (a: string, b: string) => Number(a) - Number(b)
        : (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);
    });
    this._data.sort((a, b) => {
      for (let i = 0; i < indexes.length; i++) {
        const result = comparators[i](a[indexes[i]], b[indexes[i]]);
        if (result !== 0) return result;
      }
      return 0;
    });
  }

  renumberRows(indexTag: string, options: RenumberOptions = {}): void {
    const index = this.requireIndex(indexTag);
    const start = options.startValue ?? 1;
    if (this._data.length === 0) return;

    if (options.maintainOrdering) {
      const current = this._data.map(row => row[index]);
      const bad = current.find(value => !/^[+-]?\d+$/.test(value));
      if (bad !== undefined) {
        throw new InvalidStateError(`Cannot renumber value '${bad}' while maintaining ordering: it is not an integer.`);
      }
      const offset = start - Number.parseInt(current[0], 10);
      this._data.forEach((row, i) => {
        row[index] = String(Number.parseInt(current[i], 10) + offset);
      });
      return;
    }
    this._data.forEach((row, i) => {
      row[index] = String(start + i);
    });
  }

  /** Remove every row whose `tag` equals `value`. Returns how many were removed. */
  removeRowsByTagValue(tag: string, value: StarInput): number {
    const index = this.requireIndex(tag);
    const target = toStarValue(value);
    const before = this._data.length;
    this._data = this._data.filter(row => row[index] !== target);
    return before - this._data.length;
  }

  /** Reorder columns to schema order. Tags the schema does not know go last. */
  sortTags(schema: Schema): void {
    const order = this._tags
      .map((tag, index) => ({ index, key: schema.sortKey(this.qualify(tag)) }))
      .sort((a, b) => (a.key === b.key ? a.index - b.index : a.key < b.key ? -1 : 1))
      .map(({ index }) => index);
    this._tags = order.map(i => this._tags[i]);
    this._data = this._data.map(row => order.map(i => row[i]));
  }

  /**
   * Add the schema tags this loop lacks. Only mandatory tags are added unless
   * `allTags` is set. Existing rows get the schema default or `.`.
   */
  addMissingTags(schema: Schema, options: { allTags?: boolean } = {}): void {
    if (this._category === undefined) return;
    for (const definition of schema.tagsForCategory(this._category)) {
      if (!definition.loop || this.hasTag(definition.tag)) continue;
      if (!options.allTags && definition.nullable) continue;
      this.addTag(definition.tag, { updateData: true });
      if (definition.defaultValue !== undefined && this._data.length > 0) {
        this.fillColumn(definition.tag, definition.defaultValue);
      }
    }
    this.sortTags(schema);
  }

  /** Check cell counts and, with a schema, every value. Never mutates. */
  validate(schema?: SchemaLookup, context: { saveframe?: string; saveframeCategory?: string } = {}): Violation[] {
    const violations: Violation[] = [];
    const where = context.saveframe ? ` in saveframe '${context.saveframe}'` : '';
    const loopName = `_${this._category ?? '?'}`;

    this._data.forEach((row, r) => {
      if (row.length !== this._tags.length) {
        violations.push({
          tag: loopName,
          value: '',
          location: `row ${r + 1} of loop '${loopName}'${where}`,
          message: `Row has ${row.length} values but the loop has ${this._tags.length} tags.`,
        });
      }
    });
    if (!schema) return violations;

    this._data.forEach((row, r) => {
      row.forEach((value, c) => {
        violations.push(
          ...checkCell(schema, this.qualify(this._tags[c]), value, {
            locator: `row ${r + 1} tag ${c + 1} of loop '${loopName}'${where}`,
            inLoop: true,
            saveframeCategory: context.saveframeCategory,
          })
        );
      });
    });
    return violations;
  }

  /** Exact equality: same category, tags and rows in the same order and case. */
  equals(other: Loop): boolean {
    return (
      this._category === other._category &&
      this._tags.length === other._tags.length &&
      this._tags.every((tag, i) => tag === other._tags[i]) &&
      this._data.length === other._data.length &&
      this._data.every((row, r) => row.every((value, c) => value === other._data[r][c]))
    );
  }

  /**
   * Differences that matter to NMR-STAR: categories and tags are compared
   * without regard to case, columns are matched by name and rows as a multiset.
   */
  compare(other: Loop): string[] {
    const diffs: string[] = [];
    if (!sameName(this._category ?? '', other._category ?? '')) {
      diffs.push(`Category of loops does not match: '_${this._category ?? ''}' vs '_${other._category ?? ''}'.`);
      return diffs;
    }
    const mine = this._tags.map(t => t.toLowerCase());
    const theirs = other._tags.map(t => t.toLowerCase());
    const missing = mine.filter(t => !theirs.includes(t));
    const extra = theirs.filter(t => !mine.includes(t));
    if (missing.length > 0 || extra.length > 0) {
      diffs.push(
        `Tag sets do not match for loop '_${this._category ?? ''}': ` +
          `missing from other [${missing.join(', ')}], only in other [${extra.join(', ')}].`
      );
      return diffs;
    }
    if (this._data.length !== other._data.length) {
      diffs.push(
        `Number of rows in loop '_${this._category ?? ''}' does not match: '${this._data.length}' vs '${other._data.length}'.`
      );
      return diffs;
    }
    const order = mine.map(tag => theirs.indexOf(tag));
    const left = this._data.map(row => JSON.stringify(row)).sort();
    const right = other._data.map(row => JSON.stringify(order.map(i => row[i]))).sort();
    if (left.some((row, i) => row !== right[i])) {
      diffs.push(`Loop data does not match for loop with category '_${this._category ?? ''}'.`);
    }
    return diffs;
  }

  format(options: Partial<FormatOptions> = {}): string {
    const opts = resolveFormatOptions(options);
    if (opts.skipEmptyLoops && this.isEmpty()) return '';

    let out = '\n   loop_\n';
    for (const tag of this._tags) {
      out += `      ${this.qualify(tag)}\n`;
    }
    out += '\n';

    const quoted = this._data.map(row => row.map(value => quoteValue(value)));
    const widths = this._tags.map((_, c) =>
      Math.max(0, ...quoted.map(row => row[c]).filter(cell => !isMultilineQuoted(cell)).map(cell => cell.length))
    );
    for (const row of quoted) {
      const cells = row.map((cell, c) =>
        isMultilineQuoted(cell) || c === row.length - 1 ? cell : cell.padEnd(widths[c])
      );
      out += `     ${cells.join(' ')}\n`;
    }
    out += '\n   stop_\n';
    return out;
  }

  toString(): string {
    return this.format();
  }

  getDataAsCsv(options: CsvOptions = {}): string {
    const { header = true, showCategory = true } = options;
    const rows = header ? [showCategory ? this.getTagNames() : this.tags] : [];
    return formatCsv([...rows, ...this.data]);
  }

  toJSON(): LoopJSON {
    return { category: this._category === undefined ? null : `_${this._category}`, tags: this.tags, data: this.data };
  }

  private qualify(tag: string): string {
    return `_${this._category ?? ''}.${tag}`;
  }

  private requireIndex(tag: string): number {
    if (isQualifiedTag(tag) && !sameName(formatCategory(tag), this._category)) {
      throw new InvalidStateError(
        `Category of tag '${tag}' does not match this loop's category '_${this._category ?? ''}'.`
      );
    }
    const index = this.tagIndex(tag);
    if (index === undefined) {
      throw new InvalidStateError(`No tag '${tag}' in loop '_${this._category ?? ''}'.`);
    }
    return index;
  }

  private prepareRow(values: StarInput[], rowNumber: number): string[] {
    if (this._tags.length === 0) {
      throw new InvalidStateError('Cannot add data to a loop with no tags.');
    }
    if (values.length !== this._tags.length) {
      throw new InvalidStateError(
        `Row ${rowNumber} has ${values.length} values but loop '_${this._category ?? ''}' has ${this._tags.length} tags.`
      );
    }
    const row = values.map(value => toStarValue(value));
    row.forEach((value, i) => assertValue(value, this.qualify(this._tags[i])));
    return row;
  }
}
