import { checkValue, describeDataType, parseDataType } from './schema';
import type { SchemaLookup } from './schema';

/** One problem found by validation. Validation never throws for data problems. */
export interface Violation {
  tag: string;
  value: string;
  /** Human readable position, e.g. `line 12` or `row 3 tag 2 of loop '_Atom'`. */
  location: string;
  lineNumber?: number;
  message: string;
  expected?: string;
}

/** Anything that can validate itself against an optional schema. */
export interface Validatable {
  validate(schema?: SchemaLookup): Violation[];
}

export interface CellContext {
  /** Position used when no line number is known. */
  locator: string;
  lineNumber?: number;
  /** Whether the value sits in a loop column. */
  inLoop: boolean;
  /** `Sf_category` of the enclosing saveframe, when known. */
  saveframeCategory?: string;
}

export function validate(node: Validatable, schema?: SchemaLookup): Violation[] {
  return node.validate(schema);
}

/**
 * Check one value against the schema. Unknown tags, misplaced tags, wrong
 * capitalisation and type mismatches are each reported separately.
 */
export function checkCell(schema: SchemaLookup, tag: string, value: string, context: CellContext): Violation[] {
  const location = context.lineNumber !== undefined ? `line ${context.lineNumber}` : context.locator;
  const base = { tag, value, location, lineNumber: context.lineNumber };
  const definition = schema.lookup(tag);

  if (!definition) {
    return [{ ...base, message: `Tag '${tag}' is not in the schema.` }];
  }

  const violations: Violation[] = [];
  if (definition.tag !== tag) {
    violations.push({
      ...base,
      message: `Tag capitalisation differs from the schema.`,
      expected: definition.tag,
    });
  }
  if (definition.loop !== context.inLoop) {
    violations.push({
      ...base,
      message: definition.loop
        ? `Tag '${tag}' belongs in a loop, not in a saveframe.`
        : `Tag '${tag}' belongs in a saveframe, not in a loop.`,
    });
  }
  if (
    context.saveframeCategory !== undefined &&
    definition.saveframeCategory !== context.saveframeCategory
  ) {
    violations.push({
      ...base,
      message: `Tag '${tag}' belongs in a saveframe of category '${definition.saveframeCategory}', not '${context.saveframeCategory}'.`,
      expected: definition.saveframeCategory,
    });
  }

  const problem = checkValue(definition, value);
  if (problem) {
    const type = parseDataType(definition.dataType);
    violations.push({
      ...base,
      message: problem,
      expected: type ? `${describeDataType(type)}${definition.nullable ? ' or a null marker' : ''}` : definition.dataType,
    });
  }
  return violations;
}
