/**
 * @fileoverview Core infrastructure exports.
 *
 * @module core
 */

export { Logger, ComponentLogger, LOG_COMPONENTS } from './logger';
export type { LogComponent } from './logger';
export {
  EnvConfigProvider,
  JsonConfigProvider,
  LayeredConfigProvider,
  StaticConfigProvider,
  toEnvName,
} from './configProviders';
export { EngineConfig, DEFAULT_TTL_SECONDS } from './engineConfig';
export { ServiceContainer, createToken } from './container';
export type { ServiceFactory, ServiceToken } from './container';
export { DefaultFileSystem } from './defaultFileSystem';
export * as Tokens from './tokens';
