import { z } from 'zod';

// Monitor configuration constants - single source of truth for defaults
export const MONITOR_DEFAULTS = {
  BROKERS: ['127.0.0.1:9092'],
  CLIENT_ID: 'bus-traffic-monitor',
  GROUP_ID: 'bus-traffic-monitor',
  BASE_TOPIC: 'zigbee2mqtt',
  SEPARATOR: '/',
  REPORT_INTERVAL_SECONDS: 5,
  DETAIL_DEPTH: 1,
  RETENTION_SECONDS: 900,
  RATE_INTERVALS: [60, 300, 900],
  REPLAY_SPEED: 1,
  MAX_REPLAY_SPEED: 100,
  LOG_LEVEL: 'info',
} as const;

/** Split a comma-separated string into trimmed, non-empty entries. */
function splitList(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** Accept `true`/`1`/`yes`/`on` (any case) from environment strings. */
function parseFlag(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export const MonitorConfigSchema = z
  .object({
    brokers: z
      .preprocess(splitList, z.array(z.string().min(1)).min(1, 'at least one broker is required'))
      .default([...MONITOR_DEFAULTS.BROKERS]),
    clientId: z.string().min(1).default(MONITOR_DEFAULTS.CLIENT_ID),
    groupId: z.string().min(1).default(MONITOR_DEFAULTS.GROUP_ID),
    // SASL/PLAIN credentials; used only when both are present
    username: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    baseTopic: z.string().min(1, 'base topic cannot be empty').default(MONITOR_DEFAULTS.BASE_TOPIC),
    separator: z
      .string()
      .length(1, 'separator must be a single character')
      .default(MONITOR_DEFAULTS.SEPARATOR),
    reportIntervalSeconds: z.coerce
      .number()
      .int()
      .positive()
      .default(MONITOR_DEFAULTS.REPORT_INTERVAL_SECONDS),
    detailDepth: z.coerce.number().int().nonnegative().default(MONITOR_DEFAULTS.DETAIL_DEPTH),
    ignoreBridge: z.preprocess(parseFlag, z.boolean()).default(false),
    ignored: z.preprocess(splitList, z.array(z.string().min(1))).default([]),
    retentionSeconds: z.coerce
      .number()
      .int()
      .positive()
      .default(MONITOR_DEFAULTS.RETENTION_SECONDS),
    rateIntervals: z
      .preprocess(splitList, z.array(z.coerce.number().int().positive()).min(1))
      .default([...MONITOR_DEFAULTS.RATE_INTERVALS]),
    replayFile: z.string().min(1).optional(),
    replaySpeed: z.coerce
      .number()
      .min(0)
      .max(MONITOR_DEFAULTS.MAX_REPLAY_SPEED)
      .default(MONITOR_DEFAULTS.REPLAY_SPEED),
    replayLoop: z.preprocess(parseFlag, z.boolean()).default(false),
    httpPort: z.coerce.number().int().min(0).max(65535).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default(MONITOR_DEFAULTS.LOG_LEVEL),
  })
  .superRefine((config, ctx) => {
    if (config.username !== undefined && config.password === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['password'],
        message: 'password is required when username is set',
      });
    }
    if (config.password !== undefined && config.username === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['username'],
        message: 'username is required when password is set',
      });
    }
    config.rateIntervals.forEach((interval, index) => {
      if (interval > config.retentionSeconds) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rateIntervals', index],
          message: `rate interval ${interval}s exceeds retention window ${config.retentionSeconds}s`,
        });
      }
    });
  })
  .transform(({ ignoreBridge, ignored, ...rest }) => ({
    ...rest,
    ignored: ignoreBridge && !ignored.includes('bridge') ? [...ignored, 'bridge'] : ignored,
  }));

export type MonitorConfig = z.output<typeof MonitorConfigSchema>;

/** Unvalidated values collected from flags and environment variables. */
export type RawMonitorConfig = Partial<
  Record<keyof MonitorConfig | 'ignoreBridge', string | boolean>
>;
