import type { ParseOptions } from '../config';
import { resolveParseOptions } from '../config';
import { InvalidStateError, ParsingError } from '../errors';
import type { StarToken } from '../lexer';
import { isNullValue, prepareSource, tokenize } from '../lexer';
import { Entry } from '../model/entry';
import { Loop } from '../model/loop';
import { Saveframe } from '../model/saveframe';
import { formatTag } from '../quoting';
import { checkValue } from '../schema/schema';
import { TokenStream } from './token-stream';

export { TokenStream } from './token-stream';

/**
 * Builds the Entry → Saveframe → Loop tree from a token stream. One parser
 * handles one input; create a new one for each document.
 */
export class StarParser {
  private readonly options: Readonly<ParseOptions>;
  private readonly stream: TokenStream;
  private readonly lines: string[];
  private pendingComments: string[] = [];

  constructor(text: string, options: Partial<ParseOptions> = {}) {
    this.options = resolveParseOptions(options);
    const source = prepareSource(text);
    this.lines = source.split('\n');
    const tokens = tokenize(source, {
      unwrapIndentedValues: this.options.unwrapIndentedValues,
      source: this.options.source,
      onWarning: (message, line) => this.warn(message, line),
    });
    this.stream = new TokenStream(tokens, token => {
      if (this.options.keepComments) this.pendingComments.push(token.text);
    });
  }

  parseEntry(): Entry {
    const header = this.stream.next();
    if (!header || !isBare(header, 'data')) {
      throw this.error(
        "Invalid file. NMR-STAR files must start with 'data_' followed by the data name.",
        header,
        header ? `Found '${header.text}'.` : 'The input contains no tokens.'
      );
    }
    const entryId = header.text.slice('data_'.length);
    if (entryId.length === 0) {
      throw this.error("'data_' must be followed by the data name, e.g. 'data_15000'.", header);
    }
    const entry = this.build(header, () => new Entry(entryId, this.options.source));
    this.pendingComments = [];

    for (let token = this.stream.next(); token; token = this.stream.next()) {
      if (isBare(token, 'save')) {
        this.parseSaveframeBody(token, entry);
        continue;
      }
      if (isBare(token, 'data')) {
        throw this.error(`Only one data block is supported per file. Found '${token.text}'.`, token);
      }
      if (isBare(token, 'global')) {
        throw this.error("'global_' blocks are not supported in NMR-STAR files.", token);
      }
      throw this.error(`Only 'save_NAME' is valid in the body of an NMR-STAR file. Found '${token.text}'.`, token);
    }
    return entry;
  }

  /** Parse text holding a single `save_NAME … save_` block. */
  parseSaveframe(): Saveframe {
    const header = this.stream.next();
    if (!header || !isBare(header, 'save')) {
      throw this.error("A saveframe must start with 'save_' followed by the saveframe name.", header);
    }
    const frame = this.parseSaveframeBody(header);
    this.expectEnd('saveframe');
    return frame;
  }

  /** Parse text holding a single `loop_ … stop_` block. */
  parseLoop(): Loop {
    const start = this.stream.next();
    if (!start || !isBare(start, 'loop')) {
      throw this.error("A loop must start with 'loop_'.", start);
    }
    const loop = this.parseLoopBody(start);
    this.expectEnd('loop');
    return loop;
  }

  private parseSaveframeBody(header: StarToken, entry?: Entry): Saveframe {
    const name = header.text.slice('save_'.length);
    if (name.length === 0) {
      throw this.error(
        "'save_' must be followed by the saveframe name. A bare 'save_' is only valid as a saveframe closer.",
        header
      );
    }
    const frame = this.build(header, () => new Saveframe(name, undefined, this.options.source));
    frame.lineNumber = header.lineNumber;
    if (this.pendingComments.length > 0) {
      frame.comment = this.pendingComments.join('\n');
      this.pendingComments = [];
    }
    if (entry) this.build(header, () => entry.addSaveframe(frame));

    for (;;) {
      const token = this.stream.next();
      if (!token) {
        throw this.error(`Saveframe '${name}' improperly terminated at end of file.`, header, "Close it with 'save_'.");
      }

      if (isBare(token, 'loop')) {
        if (token.text.length > 'loop_'.length) {
          throw this.error(`'loop_' cannot be followed by other text. Found '${token.text}'.`, token);
        }
        const loop = this.parseLoopBody(token);
        this.build(token, () => frame.addLoop(loop));
        continue;
      }

      if (isBare(token, 'save')) {
        this.closeSaveframe(token, frame, name);
        this.pendingComments = [];
        return frame;
      }

      if (token.delineator === 'whitespace' && token.text.startsWith('_')) {
        this.readSaveframeTag(token, frame);
        continue;
      }

      throw this.error(
        `Invalid file. Expected a tag, 'loop_' or 'save_' in saveframe '${name}'. Found '${token.text}'.`,
        token,
        'Values that contain whitespace or start with an underscore must be quoted.'
      );
    }
  }

  private readSaveframeTag(tag: StarToken, frame: Saveframe): void {
    const valueToken = this.stream.next();
    if (!valueToken) {
      throw this.error(`Tag '${tag.text}' has no value at end of file.`, tag);
    }
    this.checkDataValue(valueToken);
    const value = this.valueText(valueToken);

    if (formatTag(tag.text).toLowerCase() === 'sf_framecode' && !isNullValue(value) && value !== frame.name) {
      this.warn(
        `The Sf_framecode value '${value}' does not match the saveframe name '${frame.name}'; the saveframe takes the Sf_framecode value.`,
        valueToken.lineNumber
      );
    }
    this.build(tag, () => frame.addTag(tag.text, value, { lineNumber: tag.lineNumber }));
    this.checkType(tag.text, value, valueToken);
  }

  private closeSaveframe(closer: StarToken, frame: Saveframe, openedAs: string): void {
    const closingName = closer.text.slice('save_'.length);
    if (closingName.length > 0 && closingName !== openedAs) {
      const message = `Saveframe '${openedAs}' was closed with '${closer.text}'.`;
      if (this.options.saveframeCloser === 'strict') {
        throw this.error(message, closer, "Close saveframes with a bare 'save_'.");
      }
      this.warn(message, closer.lineNumber);
    }
    if (frame.tagPrefix === undefined) {
      throw this.error(
        `Saveframe '${openedAs}' has no tags, so its tag prefix was never set. ` +
          'The saveframe may be empty or the file may be in an older STAR dialect.',
        closer
      );
    }
  }

  private parseLoopBody(start: StarToken): Loop {
    const loop = new Loop(undefined, this.options.source);
    loop.lineNumber = start.lineNumber;
    const tags: StarToken[] = [];
    const values: StarToken[] = [];
    let stop: StarToken | undefined;

    while (!stop) {
      const token = this.stream.next();
      if (!token) {
        throw this.error('Loop improperly terminated at end of file.', start, "Close the loop with 'stop_'.");
      }
      if (isBare(token, 'stop')) {
        if (token.text.length > 'stop_'.length) {
          throw this.error(`'stop_' cannot be followed by other text. Found '${token.text}'.`, token);
        }
        stop = token;
        continue;
      }
      if (token.delineator === 'whitespace' && token.text.startsWith('_')) {
        if (values.length > 0) {
          throw this.error(
            `Cannot have more loop tags after loop data. Or perhaps this is a data value not enclosed in quotes? Found '${token.text}'.`,
            token
          );
        }
        this.build(token, () => loop.addTag(token.text));
        tags.push(token);
        continue;
      }
      if (tags.length === 0) {
        throw this.error(`Data value '${token.text}' found in a loop before any loop tags.`, token);
      }
      this.checkDataValue(token);
      values.push(token);
    }

    if (tags.length === 0) {
      this.warn('Loop with no tags.', start.lineNumber);
      return loop;
    }
    if (values.length === 0) {
      this.warn(`Loop '_${loop.category ?? ''}' has no data.`, start.lineNumber);
      return loop;
    }

    if (values.length % tags.length !== 0) {
      const present = values.length % tags.length;
      const row = Math.floor(values.length / tags.length) + 1;
      const missing = tags[present];
      throw this.error(
        `Loop '_${loop.category ?? ''}' has ${values.length} values for ${tags.length} tags: ` +
          `row ${row} stops after column ${present} and is missing column ${present + 1} ('${missing.text}').`,
        values[values.length - 1],
        'Every row of a loop needs one value per tag. Check for values that contain whitespace but are not quoted.'
      );
    }

    const texts = values.map(token => this.valueText(token));
    this.build(stop, () => loop.addData(texts));
    if (this.options.checkDataTypes) {
      values.forEach((token, i) => this.checkType(tags[i % tags.length].text, texts[i], token));
    }
    return loop;
  }

  /** Bare keywords and underscore-led words cannot be data. */
  private checkDataValue(token: StarToken): void {
    if (token.delineator !== 'whitespace') return;
    if (token.kind !== 'value') {
      throw this.error(
        `Cannot use keywords as data values unless quoted or semicolon-delineated. Perhaps this is a tag with no value? Illegal value: '${token.text}'.`,
        token
      );
    }
    if (token.text.startsWith('_')) {
      throw this.error(
        `Cannot have a value start with an underscore unless the entire value is quoted. You may be missing a data value on the previous line. Illegal value: '${token.text}'.`,
        token
      );
    }
  }

  private valueText(token: StarToken): string {
    if (token.text.length > 0) return token.text;
    this.warn("Empty value read as the null marker '.'.", token.lineNumber);
    return '.';
  }

  private checkType(tag: string, value: string, token: StarToken): void {
    if (!this.options.checkDataTypes || !this.options.schema) return;
    const definition = this.options.schema.lookup(tag);
    if (!definition) return;
    this.build(token, () => {
      const problem = checkValue(definition, value);
      if (problem) throw new InvalidStateError(`${problem} (tag '${tag}', type ${definition.dataType})`);
    });
  }

  private expectEnd(what: string): void {
    const extra = this.stream.next();
    if (extra) {
      throw this.error(`Unexpected content after the ${what}: '${extra.text}'.`, extra);
    }
  }

  private warn(message: string, line: number): void {
    if (this.options.raiseParseWarnings) {
      throw new ParsingError(message, { line, source: this.options.source }, this.lines[line - 1]);
    }
    this.options.logger.warn(`${message} (${this.options.source}, line ${line})`);
  }

  /** Run a model mutation, reporting its InvalidStateError against `token`. */
  private build<T>(token: StarToken, action: () => T): T {
    try {
      return action();
    } catch (error) {
      if (error instanceof InvalidStateError) throw this.error(error.message, token);
      throw error;
    }
  }

  private error(message: string, token?: StarToken, suggestion?: string): ParsingError {
    const line = token?.lineNumber ?? this.stream.previous()?.lineNumber ?? 1;
    return new ParsingError(
      message,
      { line, column: token?.column, offset: token?.offset, source: this.options.source },
      this.lines[line - 1],
      suggestion
    );
  }
}

function isBare(token: StarToken, keyword: StarToken['kind']): boolean {
  return token.delineator === 'whitespace' && token.kind === keyword;
}

export function parse(text: string, options: Partial<ParseOptions> = {}): Entry {
  return new StarParser(text, options).parseEntry();
}

export function parseSaveframe(text: string, options: Partial<ParseOptions> = {}): Saveframe {
  return new StarParser(text, options).parseSaveframe();
}

export function parseLoop(text: string, options: Partial<ParseOptions> = {}): Loop {
  return new StarParser(text, options).parseLoop();
}
