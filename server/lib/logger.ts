/**
 * Component Logger
 *
 * Level-gated console logger. Every line carries the component name,
 * e.g. `[KafkaTransport] Connected` or `[ReportDriver:warn] ...`.
 * Errors always log regardless of level.
 */

export const LOG_LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LOG_LEVELS;

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

let currentLogLevel: number = resolveLevel(process.env.LOG_LEVEL);

function resolveLevel(value: string | undefined): number {
  return value !== undefined && isLogLevel(value) ? LOG_LEVELS[value] : LOG_LEVELS.info;
}

/** Override the level read from LOG_LEVEL at startup (e.g. from `--log-level`). */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = LOG_LEVELS[level];
}

export function createLogger(component: string): Logger {
  return {
    debug: (message: string) => {
      if (currentLogLevel <= LOG_LEVELS.debug) {
        console.log(`[${component}:debug] ${message}`);
      }
    },
    info: (message: string) => {
      if (currentLogLevel <= LOG_LEVELS.info) {
        console.log(`[${component}] ${message}`);
      }
    },
    warn: (message: string) => {
      if (currentLogLevel <= LOG_LEVELS.warn) {
        console.warn(`[${component}:warn] ${message}`);
      }
    },
    error: (message: string, error?: unknown) => {
      console.error(`[${component}:error] ${message}`, error ?? '');
    },
  };
}

/** Message text of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
