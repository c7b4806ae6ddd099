/**
 * DocMatch – Console logger
 *
 * Lines read `[DocMatch][scope][LEVEL][ISO time] message`. Warnings and
 * errors always print; debug and info only when the `debug` option is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface DocMatchLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const PREFIX = "[DocMatch]";

/** Console method and whether the level prints with debug off */
const LEVELS: Record<
  LogLevel,
  { method: "log" | "info" | "warn" | "error"; always: boolean }
> = {
  debug: { method: "log", always: false },
  info: { method: "info", always: false },
  warn: { method: "warn", always: true },
  error: { method: "error", always: true },
};

export function createLogger(
  enabled: boolean = false,
  scope?: string,
): DocMatchLogger {
  const prefix = scope ? `${PREFIX}[${scope}]` : PREFIX;

  const write =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      const { method, always } = LEVELS[level];
      if (!enabled && !always) return;
      const line = `${prefix}[${level.toUpperCase()}][${new Date().toISOString()}] ${message}`;
      // eslint-disable-next-line no-console
      console[method](line, ...args);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

/** Shared logger with debug/info suppressed */
export const silentLogger: DocMatchLogger = createLogger(false);

/** Render an unknown thrown value as a message string */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
