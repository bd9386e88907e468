const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Ties a log line to the HTTP request and conversation it belongs to. */
export interface CorrelationContext {
  requestId?: string | null;
  conversationId?: string | null;
}

export type LogFields = Record<string, unknown>;

const parseLevel = (value: string | undefined): LogLevel | undefined => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
};

// BACKEND_LOG_LEVEL wins over LOG_LEVEL; with neither set, a debug or trace
// request-trace mode lowers the threshold so its events are visible.
const threshold: LogLevel =
  parseLevel(process.env.BACKEND_LOG_LEVEL ?? process.env.LOG_LEVEL) ??
  parseLevel(process.env.BACKEND_REQUEST_TRACE_MODE) ??
  "info";

export const isLogLevelEnabled = (level: LogLevel): boolean =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);

const write = (level: LogLevel, line: string): void => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.info(line);
  }
};

const logAt =
  (level: LogLevel) =>
  (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
    if (!isLogLevelEnabled(level)) {
      return;
    }
    write(
      level,
      JSON.stringify({
        ts: new Date().toISOString(),
        level,
        event,
        request_id: context.requestId ?? null,
        conversation_id: context.conversationId ?? null,
        ...fields
      })
    );
  };

export const logTrace = logAt("trace");
export const logDebug = logAt("debug");
export const logInfo = logAt("info");
export const logWarn = logAt("warn");
export const logError = logAt("error");

/** Flattens an error into log fields; stacks only at debug and below. */
export const serializeError = (error: unknown): LogFields => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const cause: unknown = error.cause;
  return {
    error_name: error.name,
    error_message: error.message,
    ...(error.stack && isLogLevelEnabled("debug") ? { error_stack: error.stack } : {}),
    ...(cause instanceof Error
      ? { error_cause: { name: cause.name, message: cause.message } }
      : cause !== undefined
        ? { error_cause: String(cause) }
        : {})
  };
};
