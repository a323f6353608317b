export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  child: (scope: string) => Logger;
};

export type LogSink = (line: string) => void;

type LoggerOptions = {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
};

const REDACT_KEYS = ["password", "secret", "token", "apikey", "api_key", "email"];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function shouldRedactKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return REDACT_KEYS.some((candidate) => normalized.includes(candidate));
}

export function sanitizeLogMeta(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((entry) => sanitizeLogMeta(entry));
  if (typeof value !== "object") return value;

  const output: Record<string, unknown> = {};
  for (const [key, innerValue] of Object.entries(value)) {
    output[key] = shouldRedactKey(key) ? "[redacted]" : sanitizeLogMeta(innerValue);
  }
  return output;
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(`${line}\n`);
};

export function createLogger(options: LoggerOptions | LogLevel = {}): Logger {
  const resolved: LoggerOptions = typeof options === "string" ? { level: options } : options;
  const level = resolved.level ?? "info";
  const sink = resolved.sink ?? stdoutSink;
  const threshold = LEVEL_WEIGHT[level];

  const write = (lvl: LogLevel, msg: string, meta?: LogMeta) => {
    if (LEVEL_WEIGHT[lvl] < threshold) return;
    const payload = {
      at: new Date().toISOString(),
      level: lvl,
      ...(resolved.scope ? { scope: resolved.scope } : {}),
      msg,
      ...(meta ? { meta: sanitizeLogMeta(meta) } : {}),
    };
    // JSONL so hosts can ship it as-is.
    sink(JSON.stringify(payload));
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    child: (scope) =>
      createLogger({
        level,
        sink,
        scope: resolved.scope ? `${resolved.scope}.${scope}` : scope,
      }),
  };
}

export const silentLogger: Logger = createLogger({ level: "error", sink: () => undefined });
