/**
 * @fileoverview Service tokens for dependency injection container.
 *
 * Provides typed tokens for service registration and resolution in the
 * ServiceContainer. Each token corresponds to an interface in
 * src/interfaces/ or to an engine component.
 *
 * @module core/tokens
 */

import { createToken } from './container';
import type { IConfigProvider as ConfigProvider } from '../interfaces/IConfigProvider';
import type { IDiagnosticStore } from '../interfaces/IDiagnosticStore';
import type { IFileSystem as FileSystem } from '../interfaces/IFileSystem';
import type { IJobNotifier } from '../interfaces/IJobNotifier';
import type { IJobStore as JobStore } from '../interfaces/IJobStore';
import type { EngineConfig } from './engineConfig';
import type { Logger } from './logger';
import type { JobEventEmitter } from '../job/jobEvents';
import type { JobRunner } from '../job/jobRunner';
import type { JobTypeRegistry } from '../job/registry';
import type { JobRepository } from '../job/repository';
import type { StaleJobReaper } from '../job/reaper';
import type { GroupsetDirectory } from '../jobs/groupset/directory';

// ─── Infrastructure ────────────────────────────────────────────────────────

/**
 * Token for IConfigProvider service.
 * Provides configuration value access.
 */
export const IConfigProvider = createToken<ConfigProvider>('IConfigProvider');

/**
 * Token for the typed engine settings built on IConfigProvider.
 */
export const EngineConfigToken = createToken<EngineConfig>('EngineConfig');

/**
 * Token for the root Logger.
 * Resolving it initializes logging from IConfigProvider.
 */
export const ILogger = createToken<Logger>('ILogger');

/**
 * Token for IFileSystem service.
 * Abstracts file system operations for the file-backed store.
 */
export const IFileSystem = createToken<FileSystem>('IFileSystem');

// ─── Persistence ───────────────────────────────────────────────────────────

/**
 * Token for the job store. One object serves jobs and diagnostics.
 */
export const IJobStore = createToken<JobStore & IDiagnosticStore>('IJobStore');

// ─── Jobs ──────────────────────────────────────────────────────────────────

export const IJobTypeRegistry = createToken<JobTypeRegistry>('IJobTypeRegistry');

export const IJobEvents = createToken<JobEventEmitter>('IJobEvents');

/**
 * Token for the notifiers every job gets after the store notifier.
 */
export const IJobNotifiers = createToken<IJobNotifier[]>('IJobNotifiers');

export const IJobRunner = createToken<JobRunner>('IJobRunner');

export const IJobRepository = createToken<JobRepository>('IJobRepository');

export const IStaleJobReaper = createToken<StaleJobReaper>('IStaleJobReaper');

// ─── Example consumers ─────────────────────────────────────────────────────

export const IGroupsetDirectory = createToken<GroupsetDirectory>('IGroupsetDirectory');
