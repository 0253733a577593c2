import { pino, type Logger, type LoggerOptions } from 'pino';
import { readDefaultLogLevel } from '../config/Neo4jEnvConfig.js';
import type { ILogger } from './ILogger.js';

const DEFAULT_LOGGER_NAME = 'neo4j-session-kit';

export class PinoLogger implements ILogger {
  private readonly base: Logger;

  constructor(options?: LoggerOptions, existing?: Logger) {
    this.base =
      existing ??
      pino({
        name: DEFAULT_LOGGER_NAME,
        redact: { paths: ['password', '*.password'], censor: '[redacted]' },
        ...options,
      });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.base.info(meta ?? {}, message);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.base.warn(meta ?? {}, message);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.base.error(meta ?? {}, message);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.base.debug(meta ?? {}, message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(undefined, this.base.child(bindings));
  }
}

let sharedLogger: ILogger | undefined;

/**
 * Process-wide logger used when a component is not given one explicitly.
 * The level comes from `NEO4J_SESSION_KIT_LOG_LEVEL`; missing or unknown means `info`.
 */
export function getDefaultLogger(): ILogger {
  if (!sharedLogger) {
    sharedLogger = new PinoLogger({ level: readDefaultLogLevel() });
  }
  return sharedLogger;
}

export function setDefaultLogger(logger: ILogger | undefined): void {
  sharedLogger = logger;
}

export function childLogger(logger: ILogger, bindings: Record<string, unknown>): ILogger {
  return logger.child ? logger.child(bindings) : logger;
}
