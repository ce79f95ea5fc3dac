/**
 * Structured fields attached to a log line
 */
export type LogMeta = Record<string, unknown>;

/**
 * Sink for diagnostic lines emitted by the client.
 * `console` satisfies this interface.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
