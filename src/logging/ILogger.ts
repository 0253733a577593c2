/**
 * Minimal structured logger contract used across neo4j-session-kit.
 * Implementations must accept optional metadata objects.
 */
export interface ILogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  child?(bindings: Record<string, unknown>): ILogger;
}
