export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type LoggerContext = {
  component?: string;
  [key: string]: unknown;
};

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  child(context: LoggerContext): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getConfiguredLogLevel()];
}

function errorFields(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

function write(level: LogLevel, message: string, context: LoggerContext, metadata?: Record<string, unknown>) {
  if (!shouldLog(level)) return;

  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  };
  for (const [key, value] of Object.entries(metadata ?? {})) {
    entry[key] = errorFields(value);
  }

  const line = JSON.stringify(entry);
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function createLogger(context: LoggerContext = {}): Logger {
  return {
    debug: (message, metadata) => write("debug", message, context, metadata),
    info: (message, metadata) => write("info", message, context, metadata),
    warn: (message, metadata) => write("warn", message, context, metadata),
    error: (message, metadata) => write("error", message, context, metadata),
    child: (childContext) => createLogger({ ...context, ...childContext }),
  };
}

