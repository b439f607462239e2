import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { configurationError, isSimulationError } from './errors';
import { validateOptions } from './Options';
import { comparePolicies, runSimulation } from './Simulation';
import {
  EVICTION_POLICY_KINDS,
  type EvictionPolicyConfigs,
  type EvictionPolicyKind,
  isEvictionPolicyKind
} from './eviction/EvictionPolicyConfig';
import { validatePositiveInteger } from './eviction/EvictionPolicyValidation';
import { formatComparison, formatDiagnostic, formatJson, formatSummary } from './report/Report';
import { readTraceFile } from './trace/TraceReader';
import LibLogger from './logger';

const logger = LibLogger.get('cli');

export const USAGE = [
  'Usage: pagesim -n <frames> -a <opt|clock|nru|rand|all> [-r <refresh>] [-s <seed>] [-q] [-j] <tracefile>',
  '',
  '  -n, --frames <n>       number of page frames (required)',
  '  -a, --algorithm <name> eviction policy: opt, clock, nru, rand, or all to compare (required)',
  '  -r, --refresh <n>      accesses between referenced-bit resets (required for nru and all)',
  '  -s, --seed <n>         seed for the rand policy',
  '  -q, --quiet            do not print the per-access trace to stderr',
  '  -j, --json             print results as JSON',
  '  -h, --help             show this help'
].join('\n');

export type AlgorithmChoice = EvictionPolicyKind | 'all';

const isAlgorithmChoice = (value: string): value is AlgorithmChoice =>
  value === 'all' || isEvictionPolicyKind(value);

export interface CliArguments {
  frameCount: number;
  algorithm: AlgorithmChoice;
  refreshRate?: number;
  seed?: number;
  quiet: boolean;
  json: boolean;
  tracePath: string;
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIO: CliIO = {
  stdout: (text) => { process.stdout.write(`${text}\n`); },
  stderr: (text) => { process.stderr.write(`${text}\n`); }
};

function parseInteger(value: string | undefined, flag: string): number | undefined {
  if (typeof value === 'undefined') {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw configurationError(`${flag} expects a whole number, got "${value}". Suggestion: Use for example ${flag} 4.`);
  }
  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed)) {
    throw configurationError(
      `${flag} is too large, got ${value.trim()}. Suggestion: Use a value of at most ${Number.MAX_SAFE_INTEGER}.`
    );
  }
  return parsed;
}

const parseRawArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      frames: { type: 'string', short: 'n' },
      algorithm: { type: 'string', short: 'a' },
      refresh: { type: 'string', short: 'r' },
      seed: { type: 'string', short: 's' },
      quiet: { type: 'boolean', short: 'q', default: false },
      json: { type: 'boolean', short: 'j', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });

/**
 * Parses command line arguments (without the node and script entries).
 * Returns null when help was requested.
 */
export function parseCliArgs(argv: string[]): CliArguments | null {
  let parsed: ReturnType<typeof parseRawArgs>;
  try {
    parsed = parseRawArgs(argv);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw configurationError(`${reason}\n${USAGE}`);
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return null;
  }

  const frameCount = parseInteger(values.frames, '--frames');
  if (typeof frameCount === 'undefined') {
    throw configurationError(`--frames is required.\n${USAGE}`);
  }
  validatePositiveInteger(frameCount, '--frames');

  const algorithm = values.algorithm;
  if (typeof algorithm === 'undefined') {
    throw configurationError(`--algorithm is required.\n${USAGE}`);
  }
  if (!isAlgorithmChoice(algorithm)) {
    throw configurationError(
      `Unknown algorithm "${algorithm}". Suggestion: Use one of ${EVICTION_POLICY_KINDS.join(', ')} or all.`
    );
  }

  if (positionals.length !== 1) {
    throw configurationError(`Expected exactly one trace file, got ${positionals.length}.\n${USAGE}`);
  }

  const refreshRate = parseInteger(values.refresh, '--refresh');
  const seed = parseInteger(values.seed, '--seed');

  return {
    frameCount,
    algorithm,
    ...(typeof refreshRate === 'number' ? { refreshRate } : {}),
    ...(typeof seed === 'number' ? { seed } : {}),
    quiet: values.quiet === true,
    json: values.json === true,
    tracePath: positionals[0]
  };
}

export function policyConfig(kind: EvictionPolicyKind, args: CliArguments): EvictionPolicyConfigs {
  switch (kind) {
    case 'opt':
      return { type: 'opt' };
    case 'clock':
      return { type: 'clock' };
    case 'nru':
      return typeof args.refreshRate === 'number' ? { type: 'nru', refreshRate: args.refreshRate } : { type: 'nru' };
    case 'rand':
      return typeof args.seed === 'number' ? { type: 'rand', seed: args.seed } : { type: 'rand' };
  }
}

/**
 * Runs the command line tool and resolves to the process exit code
 */
export async function main(argv: string[], io: CliIO = processIO): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (!args) {
      io.stdout(USAGE);
      return 0;
    }

    const kinds: readonly EvictionPolicyKind[] = args.algorithm === 'all' ? EVICTION_POLICY_KINDS : [args.algorithm];
    const policies = kinds.map((kind) => policyConfig(kind, args));
    // configuration problems surface before the trace is touched
    policies.forEach((policy) => validateOptions({ frameCount: args.frameCount, policy }));

    const operations = await readTraceFile(args.tracePath);

    if (args.algorithm === 'all') {
      const results = comparePolicies(operations, args.frameCount, policies);
      io.stdout(args.json ? formatJson(results) : formatComparison(results));
      return 0;
    }

    const result = runSimulation(
      operations,
      { frameCount: args.frameCount, policy: policies[0] },
      args.quiet ? undefined : (operation, access) => io.stderr(formatDiagnostic(operation, access))
    );
    io.stdout(args.json ? formatJson(result) : formatSummary(result));
    return 0;
  } catch (error) {
    if (isSimulationError(error)) {
      logger.debug('Run aborted', { kind: error.kind });
      io.stderr(`Error: ${error.message}`);
      return 1;
    }
    logger.error('Unexpected failure', { error });
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

const isEntryPoint = (): boolean => {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
};

if (isEntryPoint()) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
