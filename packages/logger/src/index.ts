export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export type LogMeta = {
  readonly runId?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  readonly level: LogThreshold;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Returns a logger that merges `bindings` into every entry. */
  child(bindings: LogMeta): Logger;
}

export interface LoggerOptions {
  /** Minimum level written; falls back to `LOG_LEVEL`, then `info`. */
  readonly level?: LogThreshold;
  readonly bindings?: LogMeta;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const isLogThreshold = (value: unknown): value is LogThreshold =>
  typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);

const resolveThreshold = (level?: LogThreshold): LogThreshold => {
  if (level) {
    return level;
  }
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogThreshold(fromEnv) ? fromEnv : "info";
};

const writeLine = (level: LogLevel, line: string): void => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta: LogMeta) => {
  const { runId, ...rest } = meta;

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof runId === "string" ? { runId } : {}),
    ...rest,
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  const threshold = resolveThreshold(options.level);
  const bindings = options.bindings ?? {};

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return;
    }
    const entry = buildEntry(moduleName, level, msg, { ...bindings, ...meta });
    writeLine(level, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    level: threshold,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (extra) =>
      createLogger(moduleName, { level: threshold, bindings: { ...bindings, ...extra } }),
  };
};
