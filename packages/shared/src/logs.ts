import pino from "pino";
import * as promClient from "prom-client";
import { variables } from "./environment";

const namespaces = ["trie", "bench"] as const;
const logLevels = ["info", "warn", "debug", "error"] as const;

type Namespace = (typeof namespaces)[number];
type LogLevel = (typeof logLevels)[number];
type LogMeta = Record<string, unknown>;
type LogFn = (message: string, meta?: LogMeta, error?: Error) => void;

// Log metrics get their own registry so repeated module evaluation
// (test isolation, hot reload) never collides in the global one.
const logRegistry = new promClient.Registry();

const logCounter = new promClient.Counter({
  name: "log_messages_total",
  help: "Total number of log messages by namespace and level",
  labelNames: ["namespace", "level"],
  registers: [logRegistry],
});

const errorLogCounter = new promClient.Counter({
  name: "log_errors_total",
  help: "Total number of error logs by namespace",
  labelNames: ["namespace", "error_type"],
  registers: [logRegistry],
});

type LoggerEnvironment = Pick<typeof variables, "NODE_ENV" | "LOG_LEVEL">;

const defaultLevel = ({
  NODE_ENV,
  LOG_LEVEL,
}: LoggerEnvironment): pino.LevelWithSilent => {
  if (LOG_LEVEL) return LOG_LEVEL;
  switch (NODE_ENV) {
    case "development":
      return "debug";
    case "test":
      return "silent";
    default:
      return "info";
  }
};

/**
 * Level and transport for the process logger. The pretty transport runs on
 * a worker thread, so it is only started when `NODE_ENV=development` is set.
 */
export const loggerOptions = (
  env: LoggerEnvironment,
): Pick<pino.LoggerOptions, "level" | "transport"> => ({
  level: defaultLevel(env),
  transport:
    env.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
          },
        }
      : undefined,
});

const pinoLogger = pino({
  ...loggerOptions({
    NODE_ENV: variables.NODE_ENV,
    LOG_LEVEL: variables.LOG_LEVEL,
  }),
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
});

function recordLogMetrics(
  namespace: Namespace,
  level: LogLevel,
  error?: Error,
): void {
  logCounter.labels(namespace, level).inc();

  if (level === "error" && error) {
    const errorType = error.constructor.name || "UnknownError";
    errorLogCounter.labels(namespace, errorType).inc();
  }
}

/**
 * Create logger interface for a specific namespace and level
 */
function createLogger(namespace: Namespace, level: LogLevel): LogFn {
  return (message, meta, error) => {
    recordLogMetrics(namespace, level, error);

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

    pinoLogger[level](logObj, message);
  };
}

function initializeLoggers(): Record<Namespace, Record<LogLevel, LogFn>> {
  const forNamespace = (namespace: Namespace): Record<LogLevel, LogFn> => ({
    info: createLogger(namespace, "info"),
    warn: createLogger(namespace, "warn"),
    debug: createLogger(namespace, "debug"),
    error: createLogger(namespace, "error"),
  });

  return {
    trie: forNamespace("trie"),
    bench: forNamespace("bench"),
  };
}

export const logger = initializeLoggers();

/**
 * Structured logging with automatic log metrics
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
  timed<T>(operation: string, fn: () => T, meta?: LogMeta): T {
    const startTime = performance.now();
    this.debug(`Starting ${operation}`, meta);

    try {
      const result = fn();
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
        { ...meta, duration: `${duration.toFixed(2)}ms` },
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

/**
 * Get current log metrics for monitoring
 */
export function getLogMetrics() {
  return {
    registry: logRegistry,
    totalLogs: logCounter,
    errorLogs: errorLogCounter,
  };
}

export { namespaces, logLevels };
export type { Namespace, LogLevel, LogMeta };
