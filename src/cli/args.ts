import { DEFAULT_CLASSIFY_BATCH_SIZE } from '../commands/classifyPracticeAreas.js';
import type { StageOptionOverrides, StageOptions } from '../pipeline/options.js';

export const COMMANDS = [
  'list',
  'run',
  'run-all',
  'classify-practice-areas',
  'update-featured-judgment',
  'search',
  'test-connections',
  'init-db',
  'help',
] as const;

export type CliCommand =
  | { command: 'help' }
  | { command: 'list' }
  | {
      command: 'run';
      stages: number[];
      year: number;
      court?: string;
      overrides: StageOptionOverrides;
      resetCheckpoint: boolean;
    }
  | { command: 'classify-practice-areas'; batchSize: number; force: boolean; model?: string }
  | { command: 'update-featured-judgment' }
  | { command: 'search'; query: string; limit: number; court?: string }
  | { command: 'test-connections' }
  | { command: 'init-db' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const BOOLEAN_FLAGS = new Set(['--reset-checkpoint', '--force']);

interface ParsedFlags {
  values: Map<string, string>;
  switches: Set<string>;
  positional: string[];
}

function parseFlags(args: string[]): ParsedFlags {
  const parsed: ParsedFlags = { values: new Map(), switches: new Set(), positional: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      parsed.positional.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    if (eq > 0) {
      parsed.values.set(arg.slice(0, eq), arg.slice(eq + 1));
    } else if (BOOLEAN_FLAGS.has(arg)) {
      parsed.switches.add(arg);
    } else {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError(`${arg} requires a value`);
      }
      parsed.values.set(arg, value);
      i++;
    }
  }

  return parsed;
}

function parseInteger(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new CliUsageError(`${flag} must be an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function optionalInteger(flags: ParsedFlags, flag: string): number | undefined {
  const value = flags.values.get(flag);
  return value === undefined ? undefined : parseInteger(flag, value);
}

function optionalPositiveInteger(flags: ParsedFlags, flag: string): number | undefined {
  const value = optionalInteger(flags, flag);
  if (value !== undefined && value < 1) {
    throw new CliUsageError(`${flag} must be a positive integer, got ${value}`);
  }
  return value;
}

const MIN_YEAR = 1800;
const MAX_YEAR = 2100;

function parseStages(flags: ParsedFlags): number[] {
  const single = flags.values.get('--stage');
  const list = flags.values.get('--stages');
  if (single !== undefined && list !== undefined) {
    throw new CliUsageError('Use either --stage or --stages, not both');
  }
  if (single !== undefined) {
    return [parseInteger('--stage', single)];
  }
  if (list !== undefined) {
    return list.split(',').map((part) => parseInteger('--stages', part.trim()));
  }
  throw new CliUsageError('run requires --stage N or --stages 1,2,3');
}

type IntegerOption = Exclude<keyof StageOptions, 'model'>;

/**
 * Stage option overrides, holding only the flags that were given
 */
function parseOverrides(flags: ParsedFlags): StageOptionOverrides {
  const overrides: StageOptionOverrides = {};
  const integers: Array<[string, IntegerOption]> = [
    ['--batch-size', 'batchSize'],
    ['--timeout', 'timeoutSeconds'],
    ['--max-retries', 'maxRetries'],
    ['--chunk-size', 'chunkSize'],
    ['--overlap', 'overlap'],
    ['--max-tokens', 'maxTokens'],
    ['--min-reportability', 'minReportability'],
  ];

  for (const [flag, key] of integers) {
    const value = optionalInteger(flags, flag);
    if (value !== undefined) {
      overrides[key] = value;
    }
  }

  const model = flags.values.get('--model');
  if (model !== undefined) {
    overrides.model = model;
  }
  return overrides;
}

function requireYear(flags: ParsedFlags): number {
  const year = optionalInteger(flags, '--year');
  if (year === undefined) {
    throw new CliUsageError('--year is required');
  }
  if (year < MIN_YEAR || year > MAX_YEAR) {
    throw new CliUsageError(`--year must be between ${MIN_YEAR} and ${MAX_YEAR}, got ${year}`);
  }
  return year;
}

/**
 * argv (without node and the script) → command
 */
export function parseArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  if (command === undefined || command === 'help' || command === '--help') {
    return { command: 'help' };
  }

  const flags = parseFlags(rest);

  switch (command) {
    case 'list':
      return { command: 'list' };

    case 'run':
    case 'run-all':
      if (command === 'run-all' && (flags.values.has('--stage') || flags.values.has('--stages'))) {
        throw new CliUsageError('run-all runs every stage; use run --stages to pick some');
      }
      return {
        command: 'run',
        stages: command === 'run-all' ? [1, 2, 3, 4, 5, 6, 7, 8] : parseStages(flags),
        year: requireYear(flags),
        court: flags.values.get('--court'),
        overrides: parseOverrides(flags),
        resetCheckpoint: flags.switches.has('--reset-checkpoint'),
      };

    case 'classify-practice-areas':
      return {
        command: 'classify-practice-areas',
        batchSize: optionalPositiveInteger(flags, '--batch-size') ?? DEFAULT_CLASSIFY_BATCH_SIZE,
        force: flags.switches.has('--force'),
        model: flags.values.get('--model'),
      };

    case 'update-featured-judgment':
      return { command: 'update-featured-judgment' };

    case 'search': {
      const query = flags.positional.join(' ').trim();
      if (query.length === 0) {
        throw new CliUsageError('search requires a query');
      }
      return {
        command: 'search',
        query,
        limit: optionalPositiveInteger(flags, '--limit') ?? 10,
        court: flags.values.get('--court'),
      };
    }

    case 'test-connections':
      return { command: 'test-connections' };

    case 'init-db':
      return { command: 'init-db' };

    default:
      throw new CliUsageError(`Unknown command: ${command}. Valid commands: ${COMMANDS.join(', ')}`);
  }
}
