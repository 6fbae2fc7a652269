import { randomUUID } from 'node:crypto';
import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { notify, NotifyCategory, type AlertFieldValue } from './slack.js';

/**
 * Log context that can be attached to log entries for correlation and filtering.
 */
export interface LogContext {
  /** Identifier of one orchestrator run (one HTTP trigger or push host start) */
  runId?: string;
  /** Identifier of a single pull task inside a run */
  taskId?: string;
  /** Message source name (queue, topic or event hub) */
  source?: string;
  /** Logical store key (top-level folder in the container) */
  storeKey?: string;
  /** Service/component name */
  service?: string;
  /** Component within a service */
  component?: string;
  /** HTTP request ID for trigger calls */
  requestId?: string;
  /** HTTP method for trigger calls */
  method?: string;
  /** HTTP path for trigger calls */
  path?: string;
  [key: string]: string | undefined;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context.
   * The context is merged with parent context and included in all log entries.
   */
  child(context: LogContext): Logger;

  getContext(): LogContext;
}

class ContextLogger implements Logger {
  private pino: PinoLogger;
  private context: LogContext;

  constructor(pinoInstance: PinoLogger, context: LogContext = {}) {
    this.pino = pinoInstance;
    this.context = context;
  }

  private formatData(data?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.context, ...data };
  }

  private formatError(error?: Error | unknown): Record<string, unknown> {
    if (!error) return {};
    if (error instanceof Error) {
      // First 5 frames only
      const stackLines = error.stack?.split('\n') ?? [];
      const truncatedStack = stackLines.slice(0, 6).join('\n');

      return {
        err: {
          type: error.name,
          message: error.message,
          stack: truncatedStack,
        },
      };
    }
    return { err: String(error) };
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(this.formatData(data), msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(this.formatData(data), msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(this.formatData(data), msg);
  }

  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.error({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.fatal({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  child(context: LogContext): Logger {
    const mergedContext = { ...this.context, ...context };
    const childPino = this.pino.child(context);
    return new ContextLogger(childPino, mergedContext);
  }

  getContext(): LogContext {
    return { ...this.context };
  }
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface CreateLoggerOptions {
  /** Service name to include in all log entries */
  service: string;
  /** Log level (default: LOG_LEVEL env, then 'info') */
  level?: LogLevel;
  /** Force pretty printing regardless of environment */
  pretty?: boolean;
  /** Additional context to include in all log entries */
  context?: LogContext;
}

function shouldUsePretty(forceFlag?: boolean): boolean {
  if (forceFlag !== undefined) return forceFlag;
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv === 'development' || !nodeEnv;
}

function getLogLevel(configLevel?: string): string {
  return configLevel ?? process.env.LOG_LEVEL ?? 'info';
}

/**
 * Create a new logger instance with the specified configuration.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'puller' });
 * logger.info('Starting run');
 *
 * const taskLogger = logger.child({ runId: '123', taskId: '2' });
 * taskLogger.info('Batch stored'); // includes runId and taskId
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const usePretty = shouldUsePretty(options.pretty);
  const level = getLogLevel(options.level);

  const pinoOptions: LoggerOptions = {
    level,
    base: {
      service: options.service,
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (usePretty) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{service} | {msg}',
      },
    };
  }

  const pinoInstance = pino(pinoOptions);
  return new ContextLogger(pinoInstance, options.context ?? {});
}

export function generateRunId(): string {
  return randomUUID();
}

/**
 * No-op logger for tests or when logging should be disabled
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => nullLogger,
  getContext: () => ({}),
};

/**
 * Logger for one of the apps: `service` is set on every entry.
 */
export function createServiceLogger(serviceName: string, baseContext?: LogContext): Logger {
  return createLogger({ service: serviceName, context: baseContext });
}

/**
 * Cap error messages to a maximum length to keep log entries and alerts small.
 */
export function capErrorMessage(message: string, maxLength = 1000): string {
  if (message.length <= maxLength) return message;
  return message.substring(0, maxLength) + '... (truncated)';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log an error and send a Slack notification for it.
 * The notification is fire-and-forget; this never throws.
 */
export function reportError(
  logger: Logger,
  service: string,
  msg: string,
  error: unknown,
  context?: Record<string, unknown>,
  category: NotifyCategory = NotifyCategory.STORE_FAILURE,
): void {
  logger.error(msg, error, context);

  const fields: Record<string, AlertFieldValue> = { service };
  for (const [name, value] of Object.entries(context ?? {})) {
    if (value === undefined || value === null) continue;
    fields[name] = typeof value === 'number' || typeof value === 'boolean' ? value : String(value);
  }
  notify({
    category,
    title: `${service}: ${msg}`,
    message: capErrorMessage(errorMessage(error)),
    fields,
    error,
  }).catch(() => {});
}
