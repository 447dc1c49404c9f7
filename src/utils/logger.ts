type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

const isSilenced = () => process.env.NODE_ENV === "test";

const write = (
  level: LogLevel,
  prefix: string,
  message: string,
  context?: Record<string, unknown>,
  error?: unknown
) => {
  if (isSilenced()) return;
  if (level === "debug" && process.env.NODE_ENV === "production") return;

  const line = `[${prefix}] ${message}`;
  const consoleMethod = level === "debug" ? "log" : level;
  const extras: unknown[] = [];
  if (context) extras.push(context);
  if (error) extras.push(error instanceof Error ? error.message : error);
  console[consoleMethod](line, ...extras);
};

/**
 * Console logger with a fixed `[Component]` prefix.
 * Silent under NODE_ENV=test.
 */
export const createLogger = (prefix: string): Logger => ({
  debug: (message, context) => write("debug", prefix, message, context),
  info: (message, context) => write("info", prefix, message, context),
  warn: (message, context) => write("warn", prefix, message, context),
  error: (message, error, context) => write("error", prefix, message, context, error),
});
