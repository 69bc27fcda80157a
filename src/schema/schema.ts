import { readFileSync } from 'node:fs';
import { InvalidStateError, SchemaError } from '../errors';
import { isNullValue } from '../lexer';
import { formatCategory } from '../quoting';
import { isRecord } from '../utils/guards';

export interface TagDefinition {
  /** Fully qualified name, e.g. `_Entity.ID`. */
  tag: string;
  /** `INTEGER`, `FLOAT`, `TEXT`, `CHAR(n)`, `VARCHAR(n)`, `DATETIME year to day` or `YES_NO`. */
  dataType: string;
  nullable: boolean;
  /** Category of the saveframe the tag lives in. */
  saveframeCategory: string;
  /** Whether the tag is a loop column rather than a saveframe tag. */
  loop: boolean;
  sortOrder?: number;
  defaultValue?: string;
  /** Tag holds the entry ID and follows `Entry.entryId`. */
  entryIdFlag?: boolean;
}

/** The only thing the document model needs from a schema. */
export interface SchemaLookup {
  lookup(tag: string): TagDefinition | undefined;
}

export type DataType =
  | { kind: 'integer' }
  | { kind: 'float' }
  | { kind: 'text' }
  | { kind: 'char'; length: number }
  | { kind: 'varchar'; length: number }
  | { kind: 'date' }
  | { kind: 'yes-no' };

/** Value as seen through the schema: numbers and dates converted, null markers collapsed to `null`. */
export type TypedValue = string | number | boolean | Date | null;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const YES_NO_PATTERN = /^(?:yes|no)$/i;

export function parseDataType(raw: string): DataType | undefined {
  const normalized = raw.trim().replace(/\s+/g, ' ').toUpperCase();
  switch (normalized) {
    case 'INTEGER':
    case 'INT':
      return { kind: 'integer' };
    case 'FLOAT':
    case 'REAL':
      return { kind: 'float' };
    case 'TEXT':
      return { kind: 'text' };
    case 'DATETIME YEAR TO DAY':
    case 'DATE':
      return { kind: 'date' };
    case 'YES_NO':
      return { kind: 'yes-no' };
  }
  const sized = /^(CHAR|VARCHAR)\((\d+)\)$/.exec(normalized);
  if (sized) {
    const length = Number.parseInt(sized[2], 10);
    return sized[1] === 'CHAR' ? { kind: 'char', length } : { kind: 'varchar', length };
  }
  return undefined;
}

export function describeDataType(type: DataType): string {
  switch (type.kind) {
    case 'integer':
      return 'an integer';
    case 'float':
      return 'a decimal number';
    case 'text':
      return 'text';
    case 'char':
    case 'varchar':
      return `text of at most ${type.length} characters`;
    case 'date':
      return 'a date in the form YYYY-MM-DD';
    case 'yes-no':
      return "'yes' or 'no'";
  }
}

/**
 * Check `value` against a definition. Returns a description of the problem,
 * or `undefined` when the value conforms.
 */
export function checkValue(definition: TagDefinition, value: string): string | undefined {
  if (isNullValue(value)) {
    return definition.nullable ? undefined : `Value cannot be NULL but is: '${value}'.`;
  }
  const type = parseDataType(definition.dataType);
  if (!type) return undefined;

  switch (type.kind) {
    case 'integer':
      return INTEGER_PATTERN.test(value) ? undefined : `Value '${value}' is not an integer.`;
    case 'float':
      return FLOAT_PATTERN.test(value) ? undefined : `Value '${value}' is not a decimal number.`;
    case 'char':
    case 'varchar':
      return value.length <= type.length
        ? undefined
        : `Length of '${value.length}' is too long for '${definition.dataType}'.`;
    case 'date':
      return parseDate(value) ? undefined : `Value '${value}' is not a valid date.`;
    case 'yes-no':
      return YES_NO_PATTERN.test(value) ? undefined : `Value '${value}' is not 'yes' or 'no'.`;
    case 'text':
      return undefined;
  }
}

function parseDate(value: string): Date | undefined {
  const match = DATE_PATTERN.exec(value);
  if (!match) return undefined;
  const [year, month, day] = [match[1], match[2], match[3]].map(part => Number.parseInt(part, 10));
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

/**
 * Convert a raw cell to its typed form. Unknown tags stay strings; both null
 * markers become `null`.
 */
export function convertValue(schema: SchemaLookup, tag: string, value: string): TypedValue {
  if (isNullValue(value)) return null;
  const definition = schema.lookup(tag);
  if (!definition) return value;

  const problem = checkValue(definition, value);
  if (problem) {
    throw new InvalidStateError(`Cannot convert tag '${tag}': ${problem}`);
  }
  const type = parseDataType(definition.dataType);
  switch (type?.kind) {
    case 'integer': {
      const result = Number.parseInt(value, 10);
      if (!Number.isSafeInteger(result)) {
        throw new InvalidStateError(`Cannot convert tag '${tag}': Value '${value}' is too large to hold exactly as a number.`);
      }
      return result;
    }
    case 'float':
      return Number.parseFloat(value);
    case 'date':
      return parseDate(value) ?? value;
    case 'yes-no':
      return value.toLowerCase() === 'yes';
    default:
      return value;
  }
}

interface SchemaDocument {
  version?: string;
  tags: unknown[];
}

function isSchemaDocument(value: unknown): value is SchemaDocument {
  return isRecord(value) && Array.isArray(value.tags) && (value.version === undefined || typeof value.version === 'string');
}

function toTagDefinition(value: unknown, index: number, source?: string): TagDefinition {
  if (!isRecord(value)) {
    throw new SchemaError(`Schema entry ${index} is not an object.`, source);
  }
  const { tag, dataType, nullable, saveframeCategory, loop, sortOrder, defaultValue, entryIdFlag } = value;
  if (typeof tag !== 'string' || typeof dataType !== 'string' || typeof saveframeCategory !== 'string') {
    throw new SchemaError(`Schema entry ${index} needs string 'tag', 'dataType' and 'saveframeCategory' fields.`, source);
  }
  if (typeof nullable !== 'boolean' || typeof loop !== 'boolean') {
    throw new SchemaError(`Schema entry ${index} ('${tag}') needs boolean 'nullable' and 'loop' fields.`, source);
  }
  const definition: TagDefinition = { tag, dataType, nullable, saveframeCategory, loop };
  if (typeof sortOrder === 'number') definition.sortOrder = sortOrder;
  if (typeof defaultValue === 'string') definition.defaultValue = defaultValue;
  if (typeof entryIdFlag === 'boolean') definition.entryIdFlag = entryIdFlag;
  return definition;
}

/** In-memory schema keyed by lower-cased tag name. */
export class Schema implements SchemaLookup {
  readonly version: string;
  readonly source: string;
  private definitions = new Map<string, TagDefinition>();
  private insertionOrder: TagDefinition[] = [];

  constructor(definitions: TagDefinition[] = [], version = 'unknown', source = 'in-memory') {
    this.version = version;
    this.source = source;
    for (const definition of definitions) {
      this.addTag(definition);
    }
  }

  static fromJSON(json: unknown, source = 'json'): Schema {
    if (!isSchemaDocument(json)) {
      throw new SchemaError("A schema document must be an object with a 'tags' array.", source);
    }
    const definitions = json.tags.map((entry, index) => toTagDefinition(entry, index, source));
    return new Schema(definitions, json.version ?? 'unknown', source);
  }

  static fromFile(path: string): Schema {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SchemaError(`Could not load schema: ${reason}`, path);
    }
    return Schema.fromJSON(parsed, path);
  }

  addTag(definition: TagDefinition): void {
    if (!definition.tag.startsWith('_') || !definition.tag.includes('.')) {
      throw new SchemaError(`Schema tag '${definition.tag}' is not of the form _Category.Tag.`, this.source);
    }
    if (!parseDataType(definition.dataType)) {
      throw new SchemaError(`Unknown data type '${definition.dataType}' for tag '${definition.tag}'.`, this.source);
    }
    const key = definition.tag.toLowerCase();
    if (this.definitions.has(key)) {
      throw new SchemaError(`Tag '${definition.tag}' is defined twice.`, this.source);
    }
    this.definitions.set(key, definition);
    this.insertionOrder.push(definition);
  }

  lookup(tag: string): TagDefinition | undefined {
    return this.definitions.get(tag.toLowerCase());
  }

  get size(): number {
    return this.insertionOrder.length;
  }

  /** All definitions in schema order. */
  get tags(): TagDefinition[] {
    return this.sorted(this.insertionOrder);
  }

  /** Definitions whose tag belongs to `category` (`Entity` or `_Entity`). */
  tagsForCategory(category: string): TagDefinition[] {
    const wanted = formatCategory(category).toLowerCase();
    return this.sorted(this.insertionOrder.filter(d => formatCategory(d.tag).toLowerCase() === wanted));
  }

  tagsForSaveframeCategory(saveframeCategory: string): TagDefinition[] {
    return this.sorted(this.insertionOrder.filter(d => d.saveframeCategory === saveframeCategory));
  }

  /** Saveframe categories in the order their first tag appears. */
  saveframeCategories(): string[] {
    return unique(this.tags.map(d => d.saveframeCategory));
  }

  /** Tag categories (without the underscore) in schema order. */
  categoryOrder(): string[] {
    return unique(this.tags.map(d => formatCategory(d.tag)));
  }

  sortKey(tag: string): number {
    const definition = this.lookup(tag);
    if (!definition) return Number.POSITIVE_INFINITY;
    return definition.sortOrder ?? this.insertionOrder.indexOf(definition);
  }

  checkValue(tag: string, value: string): string | undefined {
    const definition = this.lookup(tag);
    return definition ? checkValue(definition, value) : undefined;
  }

  convertValue(tag: string, value: string): TypedValue {
    return convertValue(this, tag, value);
  }

  toJSON(): SchemaDocument {
    return { version: this.version, tags: this.insertionOrder.map(d => ({ ...d })) };
  }

  private sorted(definitions: TagDefinition[]): TagDefinition[] {
    return definitions
      .map((definition, index) => ({ definition, index }))
      .sort((a, b) => {
        const ka = a.definition.sortOrder ?? Number.POSITIVE_INFINITY;
        const kb = b.definition.sortOrder ?? Number.POSITIVE_INFINITY;
        if (ka !== kb) return ka < kb ? -1 : 1;
        return a.index - b.index;
      })
      .map(({ definition }) => definition);
  }
}

function unique(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(value);
  }
  return result;
}
