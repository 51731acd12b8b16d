/**
 * @fileoverview Interface for logging abstraction.
 *
 * Mirrors the public API of `ComponentLogger` so engine components can take
 * a logger through their constructor and tests can hand in a stub.
 *
 * @module interfaces/ILogger
 */

/**
 * Supported log levels, lowest to highest.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Interface for a component-scoped logger.
 *
 * @example
 * ```typescript
 * class JobReaper {
 *   constructor(private readonly log: ILogger) {}
 *
 *   sweep(): void {
 *     this.log.info('Sweeping stale jobs');
 *     this.log.debug('Sweep details', { candidates: 3 });
 *   }
 * }
 * ```
 */
export interface ILogger {
  /**
   * Log at debug level.
   * Only emitted if debug logging is enabled for the component.
   *
   * @param message - Log message
   * @param data - Optional structured data or Error
   */
  debug(message: string, data?: unknown): void;

  /**
   * Log at info level.
   */
  info(message: string, data?: unknown): void;

  /**
   * Log at warn level.
   */
  warn(message: string, data?: unknown): void;

  /**
   * Log at error level.
   */
  error(message: string, data?: unknown): void;

  /**
   * Check if debug logging is enabled.
   * Useful to skip expensive data formatting when debug is off.
   */
  isDebugEnabled(): boolean;

  setLevel(level: LogLevel): void;

  getLevel(): LogLevel;
}
