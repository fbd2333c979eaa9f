/**
 * Injectable logging and timing collaborators.
 *
 * Loggers take a structured object first and an optional message, the
 * same call shape as pino, so an application logger can be passed in as is.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

/** Receives the duration of named operations (serialize, deserialize). */
export interface TimingSink {
  record(label: string, durationMs: number): void;
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export const noopTimingSink: TimingSink = {
  record: noop,
};

/**
 * Console-backed logger that drops anything below `level`.
 */
export function createConsoleLogger(level: LogLevel = "warn"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    debug: (obj, msg) => {
      if (enabled("debug")) console.debug(msg ?? "", obj);
    },
    info: (obj, msg) => {
      if (enabled("info")) console.info(msg ?? "", obj);
    },
    warn: (obj, msg) => {
      if (enabled("warn")) console.warn(msg ?? "", obj);
    },
    error: (obj, msg) => {
      if (enabled("error")) console.error(msg ?? "", obj);
    },
  };
}

/** Run `fn` and report how long it took. */
export function timed<T>(sink: TimingSink, label: string, fn: () => T): T {
  const start = performance.now();
  try {
    return fn();
  } finally {
    sink.record(label, performance.now() - start);
  }
}
