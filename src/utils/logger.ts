/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Output to stderr so callers embedding the engine keep stdout
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { logLevelSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel } from './config-schemas.js';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  identity?: string;
  sessionId?: string;
  runId?: string;
  workflow?: string;
  phase?: number;
  url?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

const envLevel = logLevelSchema.safeParse(process.env.LOG_LEVEL);

const DEFAULT_CONFIG: LoggerConfig = {
  level: envLevel.success ? envLevel.data : 'info',
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Paths to redact from logs to prevent secrets from leaking.
 * Uses Pino's path syntax (wildcards with *)
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  'password',
  'credentials',
  '*.password',
  '*.credentials',
  '*.secret',
  '*.token',
  '*.accessToken',
  '*.cookie',
  '*.Cookie',
  '*.cookies',
  'headers.authorization',
  'headers.Authorization',
  'values.pin_code',
  'fields.pin_code',
];

/**
 * Create a Pino logger with the engine's options. `stream` overrides the
 * configured destination.
 */
export function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG, stream?: DestinationStream): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'portal-workflow-engine',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (stream) {
    return pino(options, stream);
  }
  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;

  // Pretty print for development
  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, destination);
}

// Base logger instance
let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Get the base logger
 */
export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper
 *
 * Uses a getter to always access the current baseLogger, allowing
 * reconfiguration at runtime via configureLogger().
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this._logger = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    if (this._logger) {
      return this._logger;
    }
    // Fresh child each time so configureLogger() changes take effect
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger._logger = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Error level. Accepts unknown for `error` since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
        ? {
            message: context.error.message,
            name: context.error.name,
            stack: context.error.stack,
          }
        : { message: String(context.error) };

      this.logger.error({ ...context, error: undefined, err }, message);
    } else {
      this.logger.error(context || {}, message);
    }
  }

  /**
   * Log with timing information
   */
  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.info(message, { ...context, durationMs });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  sessionPool: new Logger('SessionPool'),
  workflowEngine: new Logger('WorkflowEngine'),
  contentLoader: new Logger('ContentLoader'),
  classifier: new Logger('ProgressClassifier'),
  browser: new Logger('BrowserManager'),
  auth: new Logger('PortalAuthenticator'),
  engine: new Logger('PortalEngine'),

  // Create a custom logger for any component
  create: (component: string) => new Logger(component),
};

export default logger;
