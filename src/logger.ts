export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  child: (scope: string) => Logger;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function ts() {
  return new Date().toISOString();
}

function createLogger(scope?: string): Logger {
  const emit = (level: LogLevel, msg: string, meta?: LogMeta) => log(level, msg, scope, meta);
  return {
    debug: (msg, meta) => emit("debug", msg, meta),
    info: (msg, meta) => emit("info", msg, meta),
    warn: (msg, meta) => emit("warn", msg, meta),
    error: (msg, meta) => emit("error", msg, meta),
    child: (childScope) => createLogger(scope ? `${scope}.${childScope}` : childScope)
  };
}

export const logger: Logger = createLogger();

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function log(level: LogLevel, msg: string, scope: string | undefined, meta?: LogMeta) {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const base = scope ? { ts: ts(), level, scope, msg } : { ts: ts(), level, msg };
  const out = meta ? { ...base, ...meta } : base;
  // JSON line logs, one object per line.
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(out));
}
