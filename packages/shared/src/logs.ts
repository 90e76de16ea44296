import pino, { type Logger } from "pino";
import { variables } from "./variables";

// Define log levels and namespaces
const namespaces = ["automaton", "arena", "query", "stream", "cli"] as const;
const logLevels = ["info", "warn", "debug", "error"] as const;

type Namespace = (typeof namespaces)[number];
type LogLevel = (typeof logLevels)[number];
type LogMeta = Record<string, unknown>;
type LogFn = (message: string, meta?: LogMeta, error?: Error) => void;

const defaultLevels = {
  development: "debug",
  production: "info",
  test: "silent",
} as const;

let pinoLogger: Logger | null = null;

/**
 * Create pino logger with appropriate configuration. Logs go to stderr so
 * stdout stays free for command output.
 */
function rootLogger(): Logger {
  if (pinoLogger) return pinoLogger;

  const { NODE_ENV, LOG_LEVEL } = variables();
  const level = LOG_LEVEL ?? defaultLevels[NODE_ENV];
  const options: pino.LoggerOptions = {
    level,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
  };

  pinoLogger =
    NODE_ENV === "development"
      ? pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname",
              destination: 2,
            },
          },
        })
      : pino(options, pino.destination(2));

  return pinoLogger;
}

/**
 * Create logger interface for a specific namespace and level
 */
function createLogger(namespace: Namespace, level: LogLevel): LogFn {
  return (message, meta, error) => {
    const logObj: LogMeta = {
      namespace,
      ...meta,
    };

    if (error) {
      logObj.error = {
        message: error.message,
        stack: error.stack,
        name: error.name,
      };
    }

    const log = rootLogger();
    switch (level) {
      case "info":
        log.info(logObj, message);
        break;
      case "warn":
        log.warn(logObj, message);
        break;
      case "debug":
        log.debug(logObj, message);
        break;
      case "error":
        log.error(logObj, message);
        break;
    }
  };
}

/**
 * Initialize loggers for every level of a namespace
 */
function initializeLoggers(namespace: Namespace): Record<LogLevel, LogFn> {
  return {
    info: createLogger(namespace, "info"),
    warn: createLogger(namespace, "warn"),
    debug: createLogger(namespace, "debug"),
    error: createLogger(namespace, "error"),
  };
}

export const logger: Record<Namespace, Record<LogLevel, LogFn>> = {
  automaton: initializeLoggers("automaton"),
  arena: initializeLoggers("arena"),
  query: initializeLoggers("query"),
  stream: initializeLoggers("stream"),
  cli: initializeLoggers("cli"),
};

/**
 * Structured logging bound to one namespace
 */
export class StructuredLogger {
  constructor(private namespace: Namespace) {}

  info(message: string, meta?: LogMeta) {
    logger[this.namespace].info(message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    logger[this.namespace].warn(message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    logger[this.namespace].debug(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta) {
    logger[this.namespace].error(message, meta, error);
  }

  /**
   * Log with automatic timing
   */
  async timed<T>(
    operation: string,
    fn: () => Promise<T>,
    meta?: LogMeta
  ): Promise<T> {
    const startTime = performance.now();
    this.debug(`Starting ${operation}`, meta);

    try {
      const result = await fn();
      const duration = performance.now() - startTime;
      this.info(`Completed ${operation}`, {
        ...meta,
        duration: `${duration.toFixed(2)}ms`,
      });
      return result;
    } catch (error) {
      const duration = performance.now() - startTime;
      this.error(
        `Failed ${operation}`,
        error instanceof Error ? error : new Error(String(error)),
        {
          ...meta,
          duration: `${duration.toFixed(2)}ms`,
        }
      );
      throw error;
    }
  }
}

/**
 * Create a structured logger for a specific namespace
 */
export function createStructuredLogger(namespace: Namespace): StructuredLogger {
  return new StructuredLogger(namespace);
}

export { namespaces, logLevels };
export type { Namespace, LogLevel, LogMeta };
