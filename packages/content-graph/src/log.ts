import { config } from "./config.js";

type LogMeta = Record<string, unknown>;
type LogLevel = "info" | "warn" | "error";

const SERVICE_NAME = "content-graph";

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3
};

const SENSITIVE_KEY = /secret|password|token|authorization|cookie|api[_-]?key|connection/i;
const CONNECTION_URL = /\b(postgres(?:ql)?):\/\/[^@\s]+@/gi;

const redact = (value: unknown, depth = 0): unknown => {
  if (depth > 4) {
    return "[redacted]";
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redact(entry, depth + 1));
  }
  if (value instanceof Error) {
    return { name: value.name, message: redact(value.message, depth + 1) };
  }
  if (typeof value === "string") {
    return value.replace(CONNECTION_URL, "$1://[redacted]@");
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) ? "[redacted]" : redact(entry, depth + 1);
    }
    return result;
  }
  return value;
};

const write = (level: LogLevel, event: string, meta?: LogMeta) => {
  if (LEVEL_RANK[level] < LEVEL_RANK[config.LOG_LEVEL]) {
    return;
  }
  const safeMeta = meta ? redact(meta) : undefined;
  const line = JSON.stringify({ level, service: SERVICE_NAME, event, ...(safeMeta ?? {}) });
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
};

export type Logger = {
  info: (event: string, meta?: LogMeta) => void;
  warn: (event: string, meta?: LogMeta) => void;
  error: (event: string, meta?: LogMeta) => void;
};

export const log: Logger = {
  info: (event, meta) => write("info", event, meta),
  warn: (event, meta) => write("warn", event, meta),
  error: (event, meta) => write("error", event, meta)
};
