import pino, { stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type LoggerBindings = Record<string, unknown>;

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
  details?: Record<string, unknown>;
};

type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: LoggerBindings;
};

const RESERVED_ERROR_KEYS = new Set(["message", "name", "stack", "code", "cause"]);

function readEnvValue(name: string, fallback: string): string {
  const value = process.env[name]?.trim();
  return value && value.length > 0 ? value : fallback;
}

/**
 * Builds a JSON logger. Level and service name default to `LOG_LEVEL` and
 * `SERVICE_NAME`; bindings are attached to every line through a child logger.
 */
export function createLogger({ level, serviceName, bindings }: CreateLoggerOptions = {}): AppLogger {
  const logger = pino({
    level: level || readEnvValue("LOG_LEVEL", "info"),
    base: { service: serviceName || readEnvValue("SERVICE_NAME", "scheduler-simulator") },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level: label => ({ level: label }),
    },
  });
  return bindings && Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "simulator" } });
export default appLogger;

function asPlainRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

function extractCode(record: Record<string, unknown>): string | number | undefined {
  const candidate = record.code;
  return typeof candidate === "string" || typeof candidate === "number" ? candidate : undefined;
}

function extractDetails(record: Record<string, unknown>): Record<string, unknown> | undefined {
  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!RESERVED_ERROR_KEYS.has(key)) {
      details[key] = value;
    }
  }
  return Object.keys(details).length > 0 ? details : undefined;
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

/**
 * Flattens a thrown value into a JSON-friendly shape for the `err` field of a
 * log line. Causes are normalized recursively so wrapped configuration errors
 * keep their full chain.
 */
export function normalizeError(error: unknown): NormalizedError {
  if (typeof error === "string") {
    return { message: error };
  }
  const record = asPlainRecord(error);
  if (!record) {
    return { message: safeStringify(error) ?? String(error) };
  }

  const isError = error instanceof Error;
  const rawMessage = isError ? error.message : record.message;
  const message = typeof rawMessage === "string" && (isError || rawMessage.trim().length > 0)
    ? rawMessage
    : safeStringify(record) ?? "Unknown error";
  const normalized: NormalizedError = { message };

  const name = isError ? error.name : record.name;
  if (typeof name === "string") {
    normalized.name = name;
  }
  const stack = isError ? error.stack : record.stack;
  if (typeof stack === "string" && stack.length > 0) {
    normalized.stack = stack;
  }
  const code = extractCode(record);
  if (code !== undefined) {
    normalized.code = code;
  }
  const cause = isError ? error.cause : record.cause;
  if (cause !== undefined) {
    normalized.cause = cause instanceof Error ? normalizeError(cause) : cause;
  }
  const details = extractDetails(record);
  if (details) {
    normalized.details = details;
  }
  return normalized;
}
