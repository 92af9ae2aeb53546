export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

type ConsoleLike = Pick<Console, "error">;

/**
 * Prefixed console logger, e.g. `[registry] closed`. Everything goes to stderr
 * so menu output on stdout stays clean.
 */
export function createLogger(component: string, level: LogLevel = "info", out: ConsoleLike = console): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];
  const prefix = `[${component}]`;
  return {
    debug: msg => {
      if (enabled("debug")) out.error(`${prefix} ${msg}`);
    },
    info: msg => {
      if (enabled("info")) out.error(`${prefix} ${msg}`);
    },
    warn: msg => {
      if (enabled("warn")) out.error(`${prefix} warn: ${msg}`);
    },
    error: (msg, err) => {
      if (!enabled("error")) return;
      if (err === undefined) out.error(`${prefix} error: ${msg}`);
      else out.error(`${prefix} error: ${msg}:`, err instanceof Error ? err.message : String(err));
    },
  };
}
