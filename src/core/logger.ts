/**
 * @fileoverview Centralized logging system with per-component debug control.
 *
 * Console-backed logger used by every engine component. The active level
 * and the per-component debug switches come from an {@link IConfigProvider}:
 *
 * - `jobEngine.logging.level`: minimum level (`debug` | `info` | `warn` | `error`)
 * - `jobEngine.logging.debug.<component>`: enable debug output for one component
 *
 * Components:
 * - jobs: job record operations
 * - job-runner: the run loop
 * - job-state: status transitions
 * - job-store: persistence
 * - notifier: notifier dispatch
 * - stage-tracker: stage/step contexts
 * - reaper: stale job sweeps
 * - webhook: webhook delivery
 * - engine: composition and startup
 *
 * @example
 * ```typescript
 * import { Logger } from './core/logger';
 *
 * const log = Logger.for('job-runner');
 * log.info('Job acknowledged', { jobId });
 * log.error('Hook failed', error);
 * ```
 *
 * @module core/logger
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import type { ILogger, LogLevel } from '../interfaces/ILogger';

export type { LogLevel } from '../interfaces/ILogger';

/**
 * Components that can have logging enabled
 */
export type LogComponent =
  | 'jobs'
  | 'job-runner'
  | 'job-state'
  | 'job-store'
  | 'notifier'
  | 'stage-tracker'
  | 'reaper'
  | 'webhook'
  | 'engine';

export const LOG_COMPONENTS: readonly LogComponent[] = [
  'jobs',
  'job-runner',
  'job-state',
  'job-store',
  'notifier',
  'stage-tracker',
  'reaper',
  'webhook',
  'engine',
];

/** Config section holding the logging level. */
export const LOGGING_SECTION = 'jobEngine.logging';
/** Config section holding the per-component debug switches. */
export const LOGGING_DEBUG_SECTION = 'jobEngine.logging.debug';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Centralized logger with per-component debug control.
 */
export class Logger {
  private static instance: Logger | undefined;
  private static fallback: Logger | undefined;

  private configProvider: IConfigProvider | undefined;
  private level: LogLevel = 'info';
  private readonly debugComponents = new Set<LogComponent>();

  constructor(configProvider?: IConfigProvider) {
    this.configProvider = configProvider;
    this.loadConfig();
  }

  /**
   * Install the process-wide logger. Later calls return the existing one.
   */
  static initialize(configProvider?: IConfigProvider): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(configProvider);
    }
    return Logger.instance;
  }

  /** Drop the process-wide logger (component loggers fall back to defaults). */
  static reset(): void {
    Logger.instance = undefined;
    Logger.fallback = undefined;
  }

  /** The installed logger, or a default info-level one when none is installed. */
  static current(): Logger {
    if (Logger.instance) {
      return Logger.instance;
    }
    if (!Logger.fallback) {
      Logger.fallback = new Logger();
    }
    return Logger.fallback;
  }

  /**
   * Create a component-scoped logger.
   */
  static for(component: LogComponent): ComponentLogger {
    return new ComponentLogger(component);
  }

  setConfigProvider(configProvider: IConfigProvider): void {
    this.configProvider = configProvider;
    this.loadConfig();
  }

  /**
   * Re-read level and debug switches from the config provider.
   */
  loadConfig(): void {
    this.debugComponents.clear();
    if (!this.configProvider) {
      return;
    }
    const level = this.configProvider.getConfig<string>(LOGGING_SECTION, 'level', this.level);
    if (isLogLevel(level)) {
      this.level = level;
    }
    for (const component of LOG_COMPONENTS) {
      if (this.configProvider.getConfig<boolean>(LOGGING_DEBUG_SECTION, component, false)) {
        this.debugComponents.add(component);
      }
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  enableDebug(component: LogComponent, enabled = true): void {
    if (enabled) {
      this.debugComponents.add(component);
    } else {
      this.debugComponents.delete(component);
    }
  }

  /**
   * Check if debug logging is enabled for a component.
   */
  isDebugEnabled(component: LogComponent): boolean {
    return this.level === 'debug' && this.debugComponents.has(component);
  }

  private formatMessage(level: LogLevel, component: LogComponent, message: string): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    return `${timestamp} ${levelStr} [JobEngine:${component}] ${message}`;
  }

  /**
   * Write a log entry. Structured data is passed to the console as a second
   * argument so it is rendered by Node's inspector rather than serialized.
   */
  log(level: LogLevel, component: LogComponent, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    if (level === 'debug' && !this.isDebugEnabled(component)) {
      return;
    }

    const line = this.formatMessage(level, component, message);
    const consoleFn =
      level === 'error' ? console.error :
      level === 'warn' ? console.warn :
      level === 'debug' ? console.debug :
      console.log;

    if (data === undefined) {
      consoleFn(line);
    } else {
      consoleFn(line, data);
    }
  }

  debug(component: LogComponent, message: string, data?: unknown): void {
    this.log('debug', component, message, data);
  }

  info(component: LogComponent, message: string, data?: unknown): void {
    this.log('info', component, message, data);
  }

  warn(component: LogComponent, message: string, data?: unknown): void {
    this.log('warn', component, message, data);
  }

  error(component: LogComponent, message: string, data?: unknown): void {
    this.log('error', component, message, data);
  }
}

/**
 * Component-scoped logger.
 *
 * Resolves the process-wide {@link Logger} on every call, so a logger
 * created at module load picks up configuration installed later.
 */
export class ComponentLogger implements ILogger {
  constructor(private readonly component: LogComponent) {}

  debug(message: string, data?: unknown): void {
    Logger.current().debug(this.component, message, data);
  }

  info(message: string, data?: unknown): void {
    Logger.current().info(this.component, message, data);
  }

  warn(message: string, data?: unknown): void {
    Logger.current().warn(this.component, message, data);
  }

  error(message: string, data?: unknown): void {
    Logger.current().error(this.component, message, data);
  }

  isDebugEnabled(): boolean {
    return Logger.current().isDebugEnabled(this.component);
  }

  setLevel(level: LogLevel): void {
    Logger.current().setLevel(level);
  }

  getLevel(): LogLevel {
    return Logger.current().getLevel();
  }
}
