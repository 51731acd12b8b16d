/**
 * @fileoverview Interface for configuration access.
 *
 * Engine code reads every setting through this interface, so the same
 * components run against environment variables, a JSON file, or a fixed
 * map in tests.
 *
 * @module interfaces/IConfigProvider
 */

/**
 * Interface for reading configuration values.
 *
 * @example
 * ```typescript
 * class StaleJobReaper {
 *   constructor(private readonly config: IConfigProvider) {}
 *
 *   get interval(): number {
 *     return this.config.getConfig('jobEngine.reaper', 'intervalMs', 60_000);
 *   }
 * }
 * ```
 */
export interface IConfigProvider {
  /**
   * Get a configuration value with a fallback default.
   *
   * Implementations return the default when the value is missing or does
   * not have the same runtime type as the default.
   *
   * @param section - Dotted configuration section (e.g. `jobEngine.logging`)
   * @param key - Key within the section
   * @param defaultValue - Value used when nothing usable is configured
   */
  getConfig<T>(section: string, key: string, defaultValue: T): T;
}
