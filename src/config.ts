// src/config.ts
import { parseArgs } from 'util';
import { ConfigError } from './errors';
import { LogLevel, defaultLogFileName, parseLogLevel } from './logging';

export interface DashboardConfig {
  /** Maximum interval between frames */
  tickRateMs: number;
  /** Re-list interval for kinds that cannot be watched */
  pollIntervalMs: number;
  minFrameIntervalMs: number;
  graceMs: number;
  prefetch: number;
  maxAttempts: number;
  context?: string;
  namespace?: string;
  kubeconfig?: string;
  logLevel: LogLevel;
  /** No logging at all when unset */
  logFile?: string;
  help: boolean;
  version: boolean;
}

export const USAGE = `Usage: kubeglance [options]

Options:
  -t, --tick-rate <ms>     Maximum interval between redraws, below 1000 (default 250)
  -p, --poll-rate <ms>     Re-list interval for kinds that cannot be watched,
                           a multiple of the tick rate (default 5000)
      --min-frame <ms>     Minimum interval between redraws (default 50)
      --grace <ms>         Keep subscriptions of a tab alive this long after
                           leaving it (default 30000)
      --prefetch <n>       Neighbouring tabs to keep subscribed (default 1)
  -c, --context <name>     Context to start with (default: current context)
  -n, --namespace <name>   Only show objects of this namespace
      --kubeconfig <path>  Kubeconfig file (default: $KUBECONFIG or ~/.kube/config)
      --max-attempts <n>   Attempts per API call before giving up (default 4)
  -d, --debug[=<level>]    Write a log (level info unless given) to
                           ./kubeglance-debug-<timestamp>.log
  -h, --help               Show this help
  -V, --version            Show the version

Environment:
  KUBECONFIG                   Kubeconfig search path
  KUBEGLANCE_POLL_INTERVAL_MS  Default for --poll-rate
  KUBEGLANCE_LOG_LEVEL         debug, info, warn or error
  KUBEGLANCE_LOG_FILE          Log to this file instead of the default name
`;

const DEFAULTS = {
  tickRateMs: 250,
  pollIntervalMs: 5000,
  minFrameIntervalMs: 50,
  graceMs: 30_000,
  prefetch: 1,
  maxAttempts: 4
};

function parseInteger(option: string, value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`Invalid value for ${option}: '${value}' is not a non-negative integer`);
  }
  return Number(value.trim());
}

/**
 * `--debug` may be given without a value; parseArgs wants one.
 */
function normalizeArgv(argv: readonly string[]): string[] {
  return argv.map(arg => (arg === '--debug' || arg === '-d' ? '--debug=info' : arg));
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: normalizeArgv(argv),
      strict: true,
      allowPositionals: false,
      options: {
        'tick-rate': { type: 'string', short: 't' },
        'poll-rate': { type: 'string', short: 'p' },
        'min-frame': { type: 'string' },
        grace: { type: 'string' },
        prefetch: { type: 'string' },
        context: { type: 'string', short: 'c' },
        namespace: { type: 'string', short: 'n' },
        kubeconfig: { type: 'string' },
        'max-attempts': { type: 'string' },
        debug: { type: 'string', short: 'd' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'V' }
      }
    }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Build the configuration from command-line arguments (without the node
 * and script entries) and the environment. Flags win over the environment.
 */
export function loadConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): DashboardConfig {
  const values = parseFlags(argv);

  const tickRateMs = parseInteger('--tick-rate', values['tick-rate'], DEFAULTS.tickRateMs);
  if (tickRateMs <= 0 || tickRateMs >= 1000) {
    throw new ConfigError(`Tick rate must be between 1 and 999 ms, got ${tickRateMs}`);
  }

  const pollIntervalMs = parseInteger(
    values['poll-rate'] !== undefined ? '--poll-rate' : 'KUBEGLANCE_POLL_INTERVAL_MS',
    values['poll-rate'] ?? env.KUBEGLANCE_POLL_INTERVAL_MS,
    DEFAULTS.pollIntervalMs
  );
  if (pollIntervalMs < tickRateMs || pollIntervalMs % tickRateMs !== 0) {
    throw new ConfigError(`Poll rate (${pollIntervalMs} ms) must be a multiple of the tick rate (${tickRateMs} ms)`);
  }

  const minFrameIntervalMs = parseInteger('--min-frame', values['min-frame'], Math.min(DEFAULTS.minFrameIntervalMs, tickRateMs));
  if (minFrameIntervalMs <= 0 || minFrameIntervalMs > tickRateMs) {
    throw new ConfigError(`Minimum frame interval must be between 1 and the tick rate (${tickRateMs} ms)`);
  }

  const maxAttempts = parseInteger('--max-attempts', values['max-attempts'], DEFAULTS.maxAttempts);
  if (maxAttempts < 1) {
    throw new ConfigError('--max-attempts must be at least 1');
  }

  const debug = values.debug;
  const envLogFile = env.KUBEGLANCE_LOG_FILE || undefined;
  const logFile = debug !== undefined ? envLogFile ?? defaultLogFileName(now) : envLogFile;
  const logLevel =
    debug !== undefined ? parseLogLevel(debug) : parseLogLevel(env.KUBEGLANCE_LOG_LEVEL ?? 'info');

  return {
    tickRateMs,
    pollIntervalMs,
    minFrameIntervalMs,
    graceMs: parseInteger('--grace', values.grace, DEFAULTS.graceMs),
    prefetch: parseInteger('--prefetch', values.prefetch, DEFAULTS.prefetch),
    maxAttempts,
    context: values.context,
    namespace: values.namespace,
    kubeconfig: values.kubeconfig,
    logLevel,
    logFile,
    help: values.help === true,
    version: values.version === true
  };
}
