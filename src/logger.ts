/**
 * Logger interface for diagnostics from the readers.
 * Lets a parser built on top route messages into its own logging.
 */
export interface Logger {
  /**
   * Receives the offset, width and buffer length of a rejected read.
   * Optional - if not provided, debug messages are silently dropped.
   */
  debug?(message: string, ...args: unknown[]): void;
  /** Receives precision-loss notices from 64-bit reads into a number. */
  warn(message: string, ...args: unknown[]): void;
}

export const LOG_PREFIX = '[le-fields]';

const defaultLogger: Logger = {
  warn: (msg, ...args) => console.warn(msg, ...args),
};

let currentLogger: Logger = defaultLogger;

export function getLogger(): Logger {
  return currentLogger;
}

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function resetLogger(): void {
  currentLogger = defaultLogger;
}

/** Routes debug output to console.debug, keeping the current warn sink. */
export function enableDebugLogging(): void {
  currentLogger = {
    ...currentLogger,
    debug: (msg, ...args) => console.debug(msg, ...args),
  };
}

export function logRejectedRead(
  offset: number,
  width: number,
  length: number,
): void {
  currentLogger.debug?.(`${LOG_PREFIX} Out-of-bounds read:`, {
    offset,
    width,
    length,
  });
}

export function logPrecisionLoss(offset: number): void {
  currentLogger.warn(
    `${LOG_PREFIX} UInt64 exceeds Number.MAX_SAFE_INTEGER, precision lost at offset:`,
    offset,
  );
}
