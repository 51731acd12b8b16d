/**
 * @fileoverview Configuration providers.
 *
 * Three {@link IConfigProvider} implementations:
 * - {@link EnvConfigProvider}: `JOB_ENGINE_*` environment variables
 * - {@link JsonConfigProvider}: a nested JSON document on disk
 * - {@link StaticConfigProvider}: a flat map of `section.key` values
 *
 * @module core/configProviders
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import type { IFileSystem } from '../interfaces/IFileSystem';

function sameType<T>(value: unknown, defaultValue: T): value is T {
  return value !== undefined && value !== null && typeof value === typeof defaultValue;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert `jobEngine.logging` + `level` into `JOB_ENGINE_LOGGING_LEVEL`.
 */
export function toEnvName(section: string, key: string): string {
  return `${section}.${key}`
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[.\-]/g, '_')
    .toUpperCase();
}

/**
 * Reads configuration from environment variables.
 *
 * Values are parsed according to the type of the default: `true`/`1`/`yes`
 * for booleans, finite numbers for numbers, raw text for strings.
 */
export class EnvConfigProvider implements IConfigProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    const raw = this.env[toEnvName(section, key)];
    if (raw === undefined || raw === '') {
      return defaultValue;
    }
    const parsed = this.parse(raw, typeof defaultValue);
    return sameType(parsed, defaultValue) ? parsed : defaultValue;
  }

  private parse(raw: string, kind: string): unknown {
    switch (kind) {
      case 'boolean': {
        const lowered = raw.trim().toLowerCase();
        if (['true', '1', 'yes'].includes(lowered)) { return true; }
        if (['false', '0', 'no'].includes(lowered)) { return false; }
        return undefined;
      }
      case 'number': {
        const n = Number(raw);
        return Number.isFinite(n) ? n : undefined;
      }
      default:
        return raw;
    }
  }
}

/**
 * Reads configuration from a JSON file such as:
 *
 * ```json
 * { "jobEngine": { "logging": { "level": "debug" } } }
 * ```
 *
 * The file is read once, on construction.
 */
export class JsonConfigProvider implements IConfigProvider {
  private readonly document: unknown;

  constructor(filePath: string, fs: IFileSystem) {
    this.document = fs.readJSON(filePath, {});
  }

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    let node: unknown = this.document;
    for (const segment of [...section.split('.'), key]) {
      if (!isRecord(node)) {
        return defaultValue;
      }
      node = node[segment];
    }
    return sameType(node, defaultValue) ? node : defaultValue;
  }
}

/**
 * Fixed configuration keyed by `section.key`.
 */
export class StaticConfigProvider implements IConfigProvider {
  private readonly values: Map<string, unknown>;

  constructor(values: Record<string, unknown> = {}) {
    this.values = new Map(Object.entries(values));
  }

  set(section: string, key: string, value: unknown): void {
    this.values.set(`${section}.${key}`, value);
  }

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    const value = this.values.get(`${section}.${key}`);
    return sameType(value, defaultValue) ? value : defaultValue;
  }
}

/**
 * Stacks providers; earlier providers take precedence over later ones.
 */
export class LayeredConfigProvider implements IConfigProvider {
  private readonly providers: readonly IConfigProvider[];

  constructor(...providers: IConfigProvider[]) {
    this.providers = providers;
  }

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    // Lowest precedence first, each layer falling back to what is below it.
    return [...this.providers]
      .reverse()
      .reduce((value, provider) => provider.getConfig(section, key, value), defaultValue);
  }
}
