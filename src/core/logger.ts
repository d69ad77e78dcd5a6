export const LOG_LEVELS = ["debug", "info", "warning", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
};

export type LogSink = Pick<Console, "log" | "error">;

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

/**
 * Console logger filtered by level. debug/info go to stdout,
 * warnings and errors to stderr.
 */
export function createLogger(level: LogLevel, sink: LogSink = console): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];

  return {
    debug(msg) {
      if (enabled("debug")) sink.log(`[DEBUG] ${msg}`);
    },
    info(msg) {
      if (enabled("info")) sink.log(`[INFO] ${msg}`);
    },
    warn(msg) {
      if (enabled("warning")) sink.error(`[WARNING] ${msg}`);
    },
    error(msg, err) {
      if (!enabled("error")) return;
      if (err === undefined) sink.error(`[ERROR] ${msg}`);
      else sink.error(`[ERROR] ${msg}:`, err instanceof Error ? err.message : err);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
