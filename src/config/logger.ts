import winston, { Logger, LoggerOptions } from "winston";

// Custom log levels with priorities
const customLevels = {
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
  },
};

function resolveLevel(level: string | undefined): string {
  return level !== undefined && Object.hasOwn(customLevels.levels, level) ? level : "info";
}

// Environment configuration
const LOG_LEVEL = resolveLevel(process.env.LOG_LEVEL);
const LOG_SILENT = process.env.LOG_SILENT === "true";

// One line per record: "<timestamp> - <logger name> - <LEVEL> - <message>"
export const lineFormat = winston.format.combine(
  winston.format.timestamp({
    format: "YYYY-MM-DD HH:mm:ss.SSS",
  }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, label, ...meta }) => {
    const name = typeof label === "string" ? label : "root";
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
    return `${timestamp} - ${name} - ${level.toUpperCase()} - ${message}${metaStr}`;
  })
);

const loggerConfig: LoggerOptions = {
  level: LOG_LEVEL,
  levels: customLevels.levels,
  format: lineFormat,
  transports: [new winston.transports.Console()],
  silent: LOG_SILENT,
  exitOnError: false,
};

// Create logger instance
export const logger: Logger = winston.createLogger(loggerConfig);

// Create child logger with label
export function createChildLogger(label: string): Logger {
  return logger.child({ label });
}

/**
 * Applies the configuration's DEBUG flag once the file has been read. Without
 * it the level from LOG_LEVEL (default info) stays in effect. Child loggers
 * follow the root level.
 */
export function setLogLevel(debug: boolean, fallback: string = LOG_LEVEL): void {
  logger.level = debug ? "debug" : resolveLevel(fallback);
}

export const loggers = {
  config: createChildLogger("CONFIG"),
  mqtt: createChildLogger("MQTT"),
  store: createChildLogger("STORE"),
  provisioner: createChildLogger("PROVISIONER"),
  handler: createChildLogger("HANDLER"),
  http: createChildLogger("HTTP"),
  system: createChildLogger("SYSTEM"),
};

// Error logging with context
export function logError(
  error: unknown,
  context: Record<string, unknown> = {},
  logger_instance: Logger = logger,
  summary = "Error occurred"
): void {
  const errorInfo =
    error instanceof Error
      ? {
          error: error.message,
          name: error.name,
        }
      : {
          error: String(error),
        };

  logger_instance.error(summary, {
    ...errorInfo,
    ...context,
  });
}
