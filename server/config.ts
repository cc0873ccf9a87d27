/**
 * Monitor Configuration
 *
 * Command-line flags override environment variables (loaded from `.env` by
 * dotenv in the entry point); the merged values are validated and defaulted
 * by MonitorConfigSchema.
 */

import {
  MonitorConfigSchema,
  MONITOR_DEFAULTS,
  type MonitorConfig,
  type RawMonitorConfig,
} from '@shared/schemas/monitor-config';

export type { MonitorConfig };

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export const USAGE = `Usage: bus-traffic-monitor [options]

Options:
  --brokers <list>        Comma-separated Kafka brokers (default: ${MONITOR_DEFAULTS.BROKERS.join(',')})
  --client-id <id>        Kafka client id (default: ${MONITOR_DEFAULTS.CLIENT_ID})
  --group-id <id>         Kafka consumer group (default: ${MONITOR_DEFAULTS.GROUP_ID})
  --username <user>       SASL/PLAIN username (requires --password)
  --password <secret>     SASL/PLAIN password (requires --username)
  --base-topic <name>     Base topic namespace (default: ${MONITOR_DEFAULTS.BASE_TOPIC})
  --separator <char>      Topic segment separator (default: ${MONITOR_DEFAULTS.SEPARATOR})
  --interval <seconds>    Reporting interval (default: ${MONITOR_DEFAULTS.REPORT_INTERVAL_SECONDS})
  --detail <depth>        Topic depth to show (default: ${MONITOR_DEFAULTS.DETAIL_DEPTH})
  --ignore-bridge         Ignore <base>/bridge topics
  --ignore <list>         Comma-separated sub-namespaces to ignore
  --retention <seconds>   Rate history kept in memory (default: ${MONITOR_DEFAULTS.RETENTION_SECONDS})
  --rates <list>          Comma-separated rate windows in seconds (default: ${MONITOR_DEFAULTS.RATE_INTERVALS.join(',')})
  --replay <file>         Replay a JSONL capture instead of consuming from Kafka
  --replay-speed <x>      Replay speed multiplier, 0 = instant (default: ${MONITOR_DEFAULTS.REPLAY_SPEED})
  --replay-loop           Restart the replay when it reaches the end
  --http-port <port>      Serve the latest report at /api/traffic/report
  --log-level <level>     debug | info | warn | error (default: ${MONITOR_DEFAULTS.LOG_LEVEL})
  -h, --help              Show this help message
`;

/** Flags that take a value, mapped to the config field they set. */
const VALUE_FLAGS = new Map<string, keyof RawMonitorConfig>([
  ['--brokers', 'brokers'],
  ['--client-id', 'clientId'],
  ['--group-id', 'groupId'],
  ['--username', 'username'],
  ['--password', 'password'],
  ['--base-topic', 'baseTopic'],
  ['--separator', 'separator'],
  ['--interval', 'reportIntervalSeconds'],
  ['--detail', 'detailDepth'],
  ['--ignore', 'ignored'],
  ['--retention', 'retentionSeconds'],
  ['--rates', 'rateIntervals'],
  ['--replay', 'replayFile'],
  ['--replay-speed', 'replaySpeed'],
  ['--http-port', 'httpPort'],
  ['--log-level', 'logLevel'],
]);

const BOOLEAN_FLAGS = new Map<string, keyof RawMonitorConfig>([
  ['--ignore-bridge', 'ignoreBridge'],
  ['--replay-loop', 'replayLoop'],
]);

export interface ParsedArgs {
  help: boolean;
  values: RawMonitorConfig;
}

/**
 * Parse command-line flags into raw config values. Unknown flags and
 * missing values throw a ConfigError; nothing is validated here.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const values: RawMonitorConfig = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      return { help: true, values };
    }

    const booleanField = BOOLEAN_FLAGS.get(arg);
    if (booleanField !== undefined) {
      values[booleanField] = true;
      continue;
    }

    const valueField = VALUE_FLAGS.get(arg);
    if (valueField === undefined) {
      throw new ConfigError([`Unknown argument: ${arg}`]);
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError([`${arg} requires a value`]);
    }
    values[valueField] = value;
    i++; // Skip the value we just consumed
  }

  return { help: false, values };
}

/** Read raw config values from environment variables. Empty strings count as unset. */
export function readEnv(env: NodeJS.ProcessEnv): RawMonitorConfig {
  const entries: Array<[keyof RawMonitorConfig, string | undefined]> = [
    ['brokers', env.KAFKA_BROKERS || env.KAFKA_BOOTSTRAP_SERVERS],
    ['clientId', env.KAFKA_CLIENT_ID],
    ['groupId', env.KAFKA_GROUP_ID],
    ['username', env.KAFKA_SASL_USERNAME],
    ['password', env.KAFKA_SASL_PASSWORD],
    ['baseTopic', env.MONITOR_BASE_TOPIC],
    ['separator', env.MONITOR_TOPIC_SEPARATOR],
    ['reportIntervalSeconds', env.MONITOR_INTERVAL],
    ['detailDepth', env.MONITOR_DETAIL],
    ['ignoreBridge', env.MONITOR_IGNORE_BRIDGE],
    ['ignored', env.MONITOR_IGNORE],
    ['retentionSeconds', env.MONITOR_RETENTION],
    ['rateIntervals', env.MONITOR_RATES],
    ['replayFile', env.MONITOR_REPLAY_FILE],
    ['replaySpeed', env.MONITOR_REPLAY_SPEED],
    ['httpPort', env.MONITOR_HTTP_PORT],
    ['logLevel', env.LOG_LEVEL],
  ];

  const values: RawMonitorConfig = {};
  for (const [key, value] of entries) {
    if (value !== undefined && value !== '') values[key] = value;
  }
  return values;
}

/** Validate merged flag and environment values, flags taking precedence. */
export function resolveConfig(
  args: RawMonitorConfig,
  env: NodeJS.ProcessEnv = process.env
): MonitorConfig {
  const result = MonitorConfigSchema.safeParse({ ...readEnv(env), ...args });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}
