/**
 * @fileoverview Engine Configuration Manager
 *
 * Wraps configuration access behind {@link IConfigProvider} with typed
 * accessors for every engine setting.
 *
 * @module core/engineConfig
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import { DEFAULT_WEBHOOK_TIMEOUT_MS } from '../types/webhook';

/** Three days, in seconds. */
export const DEFAULT_TTL_SECONDS = 3 * 24 * 60 * 60;

/**
 * Provides engine configuration with type-safe accessors.
 *
 * Falls back to defaults when no config provider is available.
 */
export class EngineConfig {
  private readonly provider?: IConfigProvider;

  constructor(provider?: IConfigProvider) {
    this.provider = provider;
  }

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    if (!this.provider) {
      return defaultValue;
    }
    return this.provider.getConfig(section, key, defaultValue);
  }

  /**
   * TTL in seconds given to jobs created without one.
   */
  get defaultTtlSeconds(): number {
    const ttl = this.getConfig<number>('jobEngine.jobs', 'defaultTtlSeconds', DEFAULT_TTL_SECONDS);
    return Number.isInteger(ttl) && ttl >= 0 ? ttl : DEFAULT_TTL_SECONDS;
  }

  /**
   * Directory for the file-backed store. Empty means in-memory storage.
   */
  get storagePath(): string {
    return this.getConfig<string>('jobEngine.storage', 'path', '');
  }

  /**
   * Interval between reaper sweeps.
   */
  get reaperIntervalMs(): number {
    return this.getConfig<number>('jobEngine.reaper', 'intervalMs', 60 * 60 * 1000);
  }

  /**
   * Whether the reaper may delete stale jobs that never reached a terminal status.
   */
  get reaperIncludeActive(): boolean {
    return this.getConfig<boolean>('jobEngine.reaper', 'includeActive', false);
  }

  /**
   * Localhost URL for job completion webhooks. Empty disables them.
   */
  get webhookUrl(): string {
    return this.getConfig<string>('jobEngine.webhook', 'url', '');
  }

  /**
   * Milliseconds a webhook delivery may take before it is abandoned.
   */
  get webhookTimeoutMs(): number {
    const timeout = this.getConfig<number>('jobEngine.webhook', 'timeoutMs', DEFAULT_WEBHOOK_TIMEOUT_MS);
    return Number.isInteger(timeout) && timeout > 0 ? timeout : DEFAULT_WEBHOOK_TIMEOUT_MS;
  }
}
