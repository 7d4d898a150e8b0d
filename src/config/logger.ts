export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => void;
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
};

export type LogSink = (line: string) => void;

const REDACT_KEYS = ["password", "secret", "token", "authorization", "apikey", "api_key"];

function levelWeight(level: LogLevel): number {
  switch (level) {
    case "debug":
      return 10;
    case "info":
      return 20;
    case "warn":
      return 30;
    case "error":
      return 40;
  }
}

function shouldRedactKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return REDACT_KEYS.some((candidate) => normalized.includes(candidate));
}

export function sanitize(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (Array.isArray(value)) return value.map((entry) => sanitize(entry));
  if (typeof value !== "object") return value;

  const output: Record<string, unknown> = {};
  for (const [key, innerValue] of Object.entries(value)) {
    output[key] = shouldRedactKey(key) ? "[redacted]" : sanitize(innerValue);
  }
  return output;
}

export function createLogger(
  level: LogLevel = "info",
  options: { service?: string; sink?: LogSink } = {}
): Logger {
  const threshold = levelWeight(level);
  const service = options.service ?? "library-intelligence";
  const sink: LogSink = options.sink ?? ((line) => process.stdout.write(line));

  const write = (lvl: LogLevel, msg: string, meta?: Record<string, unknown>) => {
    if (levelWeight(lvl) < threshold) return;
    const payload = {
      at: new Date().toISOString(),
      level: lvl,
      service,
      msg,
      ...(meta ? { meta: sanitize(meta) } : {}),
    };
    // JSONL, one event per line.
    sink(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
