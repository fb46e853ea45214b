/**
 * CLI Shared Utilities
 * Argument parsing, output formatting and the call runner behind quill-call
 */

import { loadConfig } from './cli-config.js';
import {
  BUILTIN_REGISTRY,
  callBuiltin,
  createRuntimeContext,
  FALSE_VALUE,
  floatValue,
  fromNative,
  inspect,
  intValue,
  NULL_VALUE,
  parseInteger,
  resolveBuiltin,
  stringValue,
  TRUE_VALUE,
  type ObservabilityCallbacks,
  type QuillValue,
} from './runtime/index.js';

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// ============================================================
// ARGUMENTS
// ============================================================

/**
 * Convert a command-line word to a Quill value.
 *
 * - integer text in the 64-bit range: INTEGER
 * - other decimal text: FLOAT
 * - true / false / null
 * - text starting with [ or { that parses as JSON: LIST / MAP
 * - anything else: the raw STRING
 */
export function parseArgument(text: string): QuillValue {
  if (text === 'true') return TRUE_VALUE;
  if (text === 'false') return FALSE_VALUE;
  if (text === 'null') return NULL_VALUE;

  if (NUMBER_PATTERN.test(text)) {
    const integer = parseInteger(text);
    return integer === undefined ? floatValue(Number(text)) : intValue(integer);
  }

  if (text.startsWith('[') || text.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(text);
      return fromNative(parsed);
    } catch {
      return stringValue(text);
    }
  }

  return stringValue(text);
}

/** Text printed for a call result */
export function formatOutput(value: QuillValue): string {
  return inspect(value);
}

/** Parsed quill-call command line */
export type CliCommand =
  | { mode: 'help' }
  | { mode: 'version' }
  | { mode: 'list' }
  | {
      mode: 'call';
      name: string;
      args: string[];
      configPath: string | undefined;
    };

/**
 * Parse command-line arguments into structured command.
 * Options are only recognized before the builtin name; everything after it
 * is passed to the builtin verbatim.
 *
 * @throws Error on an unknown option or a --config without a path
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === '--help' || arg === '-h') return { mode: 'help' };
    if (arg === '--version') return { mode: 'version' };
    if (arg === '--list') return { mode: 'list' };

    if (arg === '--config') {
      configPath = argv[i + 1];
      if (configPath === undefined) {
        throw new Error('--config requires a path');
      }
      i++;
      continue;
    }

    if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    }

    return { mode: 'call', name: arg, args: argv.slice(i + 1), configPath };
  }

  return { mode: 'help' };
}

// ============================================================
// RUNNER
// ============================================================

/** Output sinks and working directory for runCall */
export interface CliIO {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  readonly cwd: string;
}

function traceCallbacks(io: CliIO): ObservabilityCallbacks {
  return {
    onHostCall: ({ name, args }) => {
      io.stderr(`[call] ${name}(${args.map(inspect).join(', ')})`);
    },
    onFunctionReturn: ({ name, value, durationMs }) => {
      io.stderr(
        `[return] ${name} -> ${inspect(value)} (${durationMs.toFixed(2)}ms)`
      );
    },
  };
}

/**
 * Run one builtin call.
 *
 * @returns Exit code: 0 on a non-error result, 1 on an ERROR result or an
 * unknown builtin
 */
export async function runCall(
  command: Extract<CliCommand, { mode: 'call' }>,
  io: CliIO
): Promise<number> {
  const config = loadConfig(io.cwd, command.configPath);
  const ctx = createRuntimeContext({
    encoding: config.encoding,
    callbacks: { onLog: io.stdout },
    observability: config.trace ? traceCallbacks(io) : {},
  });

  const builtin = resolveBuiltin(ctx, command.name);
  if (builtin === undefined) {
    io.stderr(`Unknown builtin: ${command.name}`);
    return 1;
  }

  const result = await callBuiltin(
    builtin,
    command.args.map(parseArgument),
    ctx
  );

  if (result.type === 'ERROR') {
    io.stderr(formatOutput(result));
    return 1;
  }
  io.stdout(formatOutput(result));
  return 0;
}

/** Registered builtin names in sorted order */
export function listBuiltinNames(): string[] {
  return [...BUILTIN_REGISTRY.keys()].sort();
}
