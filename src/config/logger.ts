/* ================================
   SIMPLE LOGGER
================================ */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export type LogFields = Record<string, unknown>;

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
};

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger that adds `bindings` to every line it writes. */
  child(bindings: LogFields): Logger;
}

export type LogSink = (level: LogLevel, message: string, fields: LogFields) => void;

const consoleSink: LogSink = (level, message, fields) => {
  const line = Object.keys(fields).length > 0 ? `${message} ${JSON.stringify(fields)}` : message;

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

interface LoggerOptions {
  level?: LogLevel;
  bindings?: LogFields;
  sink?: LogSink;
}

export const createLogger = ({
  level = "info",
  bindings = {},
  sink = consoleSink,
}: LoggerOptions = {}): Logger => {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (lineLevel: LogLevel, message: string, fields?: LogFields) => {
    if (LOG_LEVELS.indexOf(lineLevel) < threshold) return;
    sink(lineLevel, message, { ...bindings, ...fields });
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (extra) => createLogger({ level, sink, bindings: { ...bindings, ...extra } }),
  };
};

/** Logger that drops everything; used where a caller has nothing to log to. */
export const silentLogger: Logger = createLogger({ sink: () => undefined });

export const errorField = (error: unknown): LogFields => ({
  error: error instanceof Error ? error.message : String(error),
});

/* ================================
   MASKING
================================ */

export const SENSITIVE_KEYS = new Set([
  "password",
  "oldpassword",
  "newpassword",
  "token",
  "accesstoken",
  "refreshtoken",
  "passhash",
  "secret",
  "authorization",
  "cookie",
]);

export const MASK = "***";

/**
 * Copy of `value` with every sensitive key's value replaced by "***", at any depth.
 */
export const maskSensitiveFields = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(maskSensitiveFields);
  }

  if (value !== null && typeof value === "object") {
    const masked: LogFields = {};
    for (const [key, inner] of Object.entries(value)) {
      masked[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? MASK : maskSensitiveFields(inner);
    }
    return masked;
  }

  return value;
};
