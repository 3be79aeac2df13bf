import { HARVEST_TARGETS, isHarvestTarget, type HarvestTarget } from './harvest/coordinator.js';
import type { Config } from './config.js';

export interface CliOptions {
  targets: HarvestTarget[];
  /** Flag values keyed by the environment variable they override. */
  env: Partial<Record<keyof Config, string>>;
  helpRequested: boolean;
}

const FLAG_TO_ENV: Record<string, keyof Config> = {
  '--base-url': 'HARVEST_BASE_URL',
  '--out': 'OUTPUT_DIR',
  '--partition': 'OUTPUT_PARTITION',
  '--concurrency': 'WORKER_POOL_SIZE',
  '--enum-concurrency': 'ENUMERATION_POOL_SIZE',
  '--retries': 'MAX_RETRIES',
  '--backoff-ms': 'BACKOFF_BASE_MS',
};

function requireValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (!value || value.startsWith('--')) {
    throw new Error(`${flag} flag requires a value`);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const targets: HarvestTarget[] = [];
  const env: CliOptions['env'] = {};
  let helpRequested = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '-h' || arg === '--help') {
      helpRequested = true;
      continue;
    }

    const envKey = FLAG_TO_ENV[arg];
    if (envKey) {
      env[envKey] = requireValue(argv, ++i, arg);
      continue;
    }

    if (isHarvestTarget(arg)) {
      if (!targets.includes(arg)) targets.push(arg);
      continue;
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  return {
    targets: targets.length > 0 ? targets : [...HARVEST_TARGETS],
    env,
    helpRequested,
  };
}

export function usage(): string {
  return `Usage: fight-stats-harvester [${HARVEST_TARGETS.join('|')} ...] [options]

Targets (default: ${HARVEST_TARGETS.join(' ')}):
  entities                 Fighter profiles -> entities.csv
  contests                 Events, bouts and per-fighter totals ->
                           events.csv, contests.csv, contest_results.csv

Options (each overrides the environment variable shown):
  --base-url <url>         HARVEST_BASE_URL       (default: http://ufcstats.com)
  --out <dir>              OUTPUT_DIR             (default: ./data)
  --partition <name>       OUTPUT_PARTITION       (default: today, YYYY-MM-DD)
  --concurrency <n>        WORKER_POOL_SIZE       (default: 10)
  --enum-concurrency <n>   ENUMERATION_POOL_SIZE  (default: 10)
  --retries <n>            MAX_RETRIES            (default: 5)
  --backoff-ms <n>         BACKOFF_BASE_MS        (default: 1000)
  -h, --help               Show this message
`;
}
