#!/usr/bin/env node
import fg from 'fast-glob';
import * as colors from 'colorette';

import type { FormatOptions, ParseOptions } from '../config';
import { Entry } from '../model/entry';
import { Schema } from '../schema/schema';
import { formatAnyError, formatViolations } from '../utils/format';
import { colorEnabled, createLogger } from '../utils/logger';
import type { Logger, LogSink } from '../utils/logger';

export interface CLIConfig {
  patterns: string[];
  saveframes: boolean;
  tags: boolean;
  tagQuery: string[];
  schemaPath?: string;
  diffPath?: string;
  json: boolean;
  reformat: boolean;
  outFile?: string;
  skipEmptyLoops: boolean;
  skipEmptyTags: boolean;
  showComments: boolean;
  strict: boolean;
  verbose: boolean;
  color: boolean;
  help: boolean;
}

/** Where the command writes. Tests swap in collecting buffers. */
export interface CLIOutput {
  out(text: string): void;
  err(text: string): void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const consoleOutput: CLIOutput = {
  out: text => console.log(text),
  err: text => console.error(text),
};

export function helpText(useColor: boolean): string {
  const c = colors.createColors({ useColor });
  const opt = (flag: string) => c.green(flag.padEnd(24));
  return `
${c.bold('nmrstar')} - Read, check and rewrite NMR-STAR files

${c.bold('USAGE:')}
  nmrstar <file|glob>... [options]

${c.bold('OPTIONS:')}
  ${opt('--saveframes')}List saveframe names and categories
  ${opt('--tags')}List every tag in each file
  ${opt('--tag <T1,T2>')}Print the values of the given tags
  ${opt('--validate <schema>')}Check values against a JSON schema
  ${opt('--diff <file>')}Compare each file with another entry
  ${opt('--json')}Print the entry as JSON
  ${opt('--reformat')}Print the entry in canonical layout
  ${opt('--out <file>')}Write the reformatted entry to a file
  ${opt('--skip-empty-loops')}Leave out loops holding only null markers
  ${opt('--skip-empty-tags')}Leave out tags whose value is a null marker
  ${opt('--no-comments')}Drop saveframe comments when reformatting
  ${opt('--strict')}Treat parse warnings as errors
  ${opt('--verbose, -v')}Print the entry outline and debug messages
  ${opt('--no-color')}Disable colored output
  ${opt('--help, -h')}Show this help

${c.bold('EXAMPLES:')}
  nmrstar entry.str --saveframes
  nmrstar "data/*.str" --validate schema.json
  nmrstar entry.str --reformat --skip-empty-tags --out clean.str
  nmrstar old.str --diff new.str
`;
}

export function parseArgs(args: string[]): CLIConfig {
  const config: CLIConfig = {
    patterns: [],
    saveframes: false,
    tags: false,
    tagQuery: [],
    json: false,
    reformat: false,
    skipEmptyLoops: false,
    skipEmptyTags: false,
    showComments: true,
    strict: false,
    verbose: false,
    color: colorEnabled(),
    help: false,
  };

  const valueFor = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Option ${flag} needs a value.`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--saveframes':
        config.saveframes = true;
        break;
      case '--tags':
        config.tags = true;
        break;
      case '--tag':
        config.tagQuery.push(...valueFor(arg, i).split(',').map(t => t.trim()).filter(t => t.length > 0));
        i++;
        break;
      case '--validate':
        config.schemaPath = valueFor(arg, i);
        i++;
        break;
      case '--diff':
        config.diffPath = valueFor(arg, i);
        i++;
        break;
      case '--json':
        config.json = true;
        break;
      case '--reformat':
        config.reformat = true;
        break;
      case '--out':
        config.outFile = valueFor(arg, i);
        i++;
        break;
      case '--skip-empty-loops':
        config.skipEmptyLoops = true;
        break;
      case '--skip-empty-tags':
        config.skipEmptyTags = true;
        break;
      case '--no-comments':
        config.showComments = false;
        break;
      case '--strict':
        config.strict = true;
        break;
      case '--verbose':
      case '-v':
        config.verbose = true;
        break;
      case '--no-color':
        config.color = false;
        break;
      case '--help':
      case '-h':
        config.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);
        config.patterns.push(arg);
    }
  }

  if (config.outFile !== undefined && !config.reformat) {
    throw new UsageError('--out can only be used together with --reformat.');
  }
  return config;
}

/** Expand glob patterns; plain paths are kept even when they do not exist, so the read reports them. */
export async function expandInputs(patterns: string[]): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    if (!fg.isDynamicPattern(pattern)) {
      files.push(pattern);
      continue;
    }
    const matches = await fg(pattern, { onlyFiles: true, dot: false });
    files.push(...matches.sort());
  }
  return [...new Set(files)];
}

function outputSink(output: CLIOutput): LogSink {
  return { log: text => output.out(text), warn: text => output.err(text), error: text => output.err(text) };
}

async function processFile(
  file: string,
  config: CLIConfig,
  log: Logger,
  output: CLIOutput,
  schema: Schema | undefined
): Promise<boolean> {
  const parseOptions: Partial<ParseOptions> = {
    raiseParseWarnings: config.strict,
    saveframeCloser: config.strict ? 'strict' : 'lenient',
    logger: log,
  };
  const formatOptions: Partial<FormatOptions> = {
    skipEmptyLoops: config.skipEmptyLoops,
    skipEmptyTags: config.skipEmptyTags,
    showComments: config.showComments,
  };

  log.debug(`Reading ${file}`);
  const entry = await Entry.fromFile(file, parseOptions);
  let ok = true;
  let acted = false;

  if (config.verbose) output.out(entry.printTree());

  if (config.saveframes) {
    acted = true;
    for (const frame of entry.saveframes) output.out(`${frame.name}\t${frame.category ?? ''}`);
  }

  if (config.tags) {
    acted = true;
    for (const frame of entry.saveframes) {
      for (const tag of frame.getTagNames()) output.out(tag);
      for (const loop of frame.loops) {
        for (const tag of loop.getTagNames()) output.out(tag);
      }
    }
  }

  if (config.tagQuery.length > 0) {
    acted = true;
    for (const [tag, values] of Object.entries(entry.findTags(config.tagQuery))) {
      output.out([tag, ...values].join('\t'));
    }
  }

  if (schema) {
    acted = true;
    const violations = entry.validate(schema);
    output.out(formatViolations(violations, config.color));
    if (violations.length > 0) ok = false;
  }

  if (config.diffPath !== undefined) {
    acted = true;
    const other = await Entry.fromFile(config.diffPath, parseOptions);
    const diffs = entry.compare(other);
    if (diffs.length === 0) {
      log.success(`${file} and ${config.diffPath} are equivalent.`);
    } else {
      diffs.forEach(diff => output.out(diff));
      ok = false;
    }
  }

  if (config.json) {
    acted = true;
    output.out(JSON.stringify(entry.toJSON(), null, 2));
  }

  if (config.reformat) {
    acted = true;
    if (config.outFile !== undefined) {
      await entry.writeToFile(config.outFile, formatOptions);
      log.success(`Wrote ${config.outFile}`);
    } else {
      output.out(entry.format(formatOptions));
    }
  }

  if (!acted) {
    log.success(`${file}: ${entry.frameCount} saveframes in entry '${entry.entryId}'`);
  }
  return ok;
}

/** Run the command and resolve to the process exit code. */
export async function run(args: string[], output: CLIOutput = consoleOutput): Promise<number> {
  let config: CLIConfig;
  try {
    config = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      output.err(error.message);
      output.err('Run nmrstar --help for usage.');
      return 2;
    }
    throw error;
  }

  if (config.help || config.patterns.length === 0) {
    output.out(helpText(config.color));
    return config.help ? 0 : 2;
  }

  const log = createLogger({
    level: config.verbose ? 'debug' : 'info',
    sink: outputSink(output),
    useColor: config.color,
  });

  const files = await expandInputs(config.patterns);
  if (files.length === 0) {
    log.error(`No files match ${config.patterns.join(' ')}`);
    return 1;
  }
  if (config.outFile !== undefined && files.length > 1) {
    log.error('--out needs exactly one input file.');
    return 2;
  }

  let schema: Schema | undefined;
  if (config.schemaPath !== undefined) {
    try {
      schema = Schema.fromFile(config.schemaPath);
      log.debug(`Loaded schema ${schema.version} with ${schema.size} tags`);
    } catch (error) {
      output.err(formatAnyError(error, config.color));
      return 1;
    }
  }

  let exitCode = 0;
  for (const file of files) {
    try {
      if (!(await processFile(file, config, log, output, schema))) exitCode = 1;
    } catch (error) {
      output.err(formatAnyError(error, config.color));
      exitCode = 1;
    }
  }
  return exitCode;
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(formatAnyError(error, colorEnabled()));
      process.exitCode = 1;
    }
  );
}
