import type { LogMeta, Logger } from './types/index.js';

type LogLevel = keyof Logger;

/**
 * Logger that drops everything. Default for new clients.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function writeJson(level: LogLevel, message: string, meta?: LogMeta): void {
  console.error(
    JSON.stringify({ level, ts: Date.now(), msg: message, ...meta }),
  );
}

/**
 * JSON-lines logger writing to stderr
 */
export const consoleLogger: Logger = {
  debug: (message, meta) => writeJson('debug', message, meta),
  info: (message, meta) => writeJson('info', message, meta),
  warn: (message, meta) => writeJson('warn', message, meta),
  error: (message, meta) => writeJson('error', message, meta),
};

/**
 * Wrap a logger so a throwing sink cannot fail the request being logged
 */
export function guardLogger(logger: Logger): Logger {
  const guard =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void => {
      try {
        logger[level](message, meta);
      } catch {
        // Logging is best-effort
      }
    };

  return {
    debug: guard('debug'),
    info: guard('info'),
    warn: guard('warn'),
    error: guard('error'),
  };
}
