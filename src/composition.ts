/**
 * @fileoverview Composition root: DI container wiring for the job engine.
 *
 * Creates a {@link ServiceContainer} with all production service implementations
 * registered. This is the single place where concrete classes meet their interfaces.
 *
 * ## Dependency Graph
 *
 * ```
 * IConfigProvider  ──→ EnvConfigProvider        (singleton, unless given)
 *   └─ used by: EngineConfig, Logger
 *
 * IFileSystem      ──→ DefaultFileSystem        (singleton)
 *   └─ used by: FileSystemJobStore
 *
 * IJobStore        ──→ FileSystemJobStore       (when a storage path is configured)
 *                  ──→ InMemoryJobStore         (otherwise)
 *
 * IJobNotifiers    ──→ EventNotifier [+ WebhookNotifier when a URL is configured]
 *
 * IJobRepository   ──→ JobRepository            (store, registry, notifiers, events, runner)
 *   └─ used by: StaleJobReaper, callers
 * ```
 *
 * @module composition
 */

import { ServiceContainer } from './core/container';
import * as Tokens from './core/tokens';
import { EnvConfigProvider } from './core/configProviders';
import { DefaultFileSystem } from './core/defaultFileSystem';
import { EngineConfig } from './core/engineConfig';
import { Logger } from './core/logger';
import type { IConfigProvider } from './interfaces/IConfigProvider';
import type { IDiagnosticStore } from './interfaces/IDiagnosticStore';
import type { IFileSystem } from './interfaces/IFileSystem';
import type { IJobNotifier } from './interfaces/IJobNotifier';
import type { IJobStore } from './interfaces/IJobStore';
import type { WebhookTransport } from './interfaces/IWebhookNotifier';
import type { Clock } from './types/job';
import { EventNotifier, JobEventEmitter } from './job/jobEvents';
import { JobRunner } from './job/jobRunner';
import { StaleJobReaper } from './job/reaper';
import { JobTypeRegistry } from './job/registry';
import { JobRepository } from './job/repository';
import { FileSystemJobStore } from './job/store/FileSystemJobStore';
import { InMemoryJobStore } from './job/store/InMemoryJobStore';
import { WebhookNotifier } from './notifications/webhookNotifier';
import type { GroupsetDirectory } from './jobs/groupset/directory';
import { InMemoryGroupsetDirectory } from './jobs/groupset/directory';
import { GroupsetDeleteJob, GroupsetSyncJob } from './jobs/groupset/groupsetJobs';

/**
 * Overrides for the default bindings.
 */
export interface JobEngineOptions {
  configProvider?: IConfigProvider;
  fileSystem?: IFileSystem;
  store?: IJobStore & IDiagnosticStore;
  groupsetDirectory?: GroupsetDirectory;
  webhookTransport?: WebhookTransport;
  clock?: Clock;
}

/**
 * Create and wire the production DI container.
 *
 * Registers every interface → implementation binding used by the engine.
 */
export function createContainer(options: JobEngineOptions = {}): ServiceContainer {
  const container = new ServiceContainer();

  // ─── Configuration ───────────────────────────────────────────────────
  container.registerSingleton(
    Tokens.IConfigProvider,
    () => options.configProvider ?? new EnvConfigProvider(),
  );

  container.registerSingleton(
    Tokens.EngineConfigToken,
    (c) => new EngineConfig(c.resolve(Tokens.IConfigProvider)),
  );

  // ─── Logger ──────────────────────────────────────────────────────────
  // Logger is a singleton managed by its own static state.
  // We register a factory that initializes it (idempotent) and wires the
  // config provider so logging config is read through the DI layer.
  container.registerSingleton(
    Tokens.ILogger,
    (c) => {
      const configProvider = c.resolve(Tokens.IConfigProvider);
      const logger = Logger.initialize(configProvider);
      logger.setConfigProvider(configProvider);
      return logger;
    },
  );

  // ─── Persistence ─────────────────────────────────────────────────────
  container.registerSingleton(
    Tokens.IFileSystem,
    () => options.fileSystem ?? new DefaultFileSystem(),
  );

  container.registerSingleton(
    Tokens.IJobStore,
    (c) => {
      if (options.store) {
        return options.store;
      }
      const storagePath = c.resolve(Tokens.EngineConfigToken).storagePath;
      return storagePath
        ? new FileSystemJobStore(storagePath, c.resolve(Tokens.IFileSystem))
        : new InMemoryJobStore();
    },
  );

  // ─── Jobs ────────────────────────────────────────────────────────────
  container.registerSingleton(
    Tokens.IGroupsetDirectory,
    () => options.groupsetDirectory ?? new InMemoryGroupsetDirectory(),
  );

  container.registerSingleton(
    Tokens.IJobTypeRegistry,
    (c) => {
      const directory = c.resolve(Tokens.IGroupsetDirectory);
      return new JobTypeRegistry()
        .register(GroupsetSyncJob.jobType, (source, deps) => new GroupsetSyncJob(source, deps, directory))
        .register(GroupsetDeleteJob.jobType, (source, deps) => new GroupsetDeleteJob(source, deps, directory));
    },
  );

  container.registerSingleton(
    Tokens.IJobEvents,
    () => new JobEventEmitter(),
  );

  container.registerSingleton(
    Tokens.IJobNotifiers,
    (c) => {
      const notifiers: IJobNotifier[] = [new EventNotifier(c.resolve(Tokens.IJobEvents))];
      const config = c.resolve(Tokens.EngineConfigToken);
      if (config.webhookUrl) {
        notifiers.push(new WebhookNotifier(
          { url: config.webhookUrl, timeoutMs: config.webhookTimeoutMs },
          { transport: options.webhookTransport, clock: options.clock },
        ));
      }
      return notifiers;
    },
  );

  container.registerSingleton(
    Tokens.IJobRunner,
    () => new JobRunner(),
  );

  container.registerSingleton(
    Tokens.IJobRepository,
    (c) => {
      const store = c.resolve(Tokens.IJobStore);
      return new JobRepository({
        store,
        diagnosticStore: store,
        registry: c.resolve(Tokens.IJobTypeRegistry),
        notifiers: c.resolve(Tokens.IJobNotifiers),
        events: c.resolve(Tokens.IJobEvents),
        runner: c.resolve(Tokens.IJobRunner),
        clock: options.clock,
        defaultTtlSeconds: c.resolve(Tokens.EngineConfigToken).defaultTtlSeconds,
      });
    },
  );

  container.registerSingleton(
    Tokens.IStaleJobReaper,
    (c) => new StaleJobReaper(c.resolve(Tokens.IJobRepository), {
      includeActive: c.resolve(Tokens.EngineConfigToken).reaperIncludeActive,
      clock: options.clock,
    }),
  );

  return container;
}

/**
 * The resolved engine services.
 */
export interface JobEngine {
  readonly container: ServiceContainer;
  readonly config: EngineConfig;
  readonly repository: JobRepository;
  readonly registry: JobTypeRegistry;
  readonly events: JobEventEmitter;
  readonly reaper: StaleJobReaper;
  /** Start periodic stale-job sweeps at the configured interval. */
  start(): void;
  stop(): void;
}

/**
 * Build a container and resolve the engine services from it.
 *
 * @example
 * ```typescript
 * const engine = createJobEngine();
 * const job = await engine.repository.create('groupset.update', {
 *   createdBy: 'admin',
 *   data: { groupsetId: 1, addUserIds: [2, 3] },
 * });
 * await job.run();
 * ```
 */
export function createJobEngine(options: JobEngineOptions = {}): JobEngine {
  const container = createContainer(options);
  container.resolve(Tokens.ILogger);

  const config = container.resolve(Tokens.EngineConfigToken);
  const reaper = container.resolve(Tokens.IStaleJobReaper);
  const log = Logger.for('engine');

  return {
    container,
    config,
    repository: container.resolve(Tokens.IJobRepository),
    registry: container.resolve(Tokens.IJobTypeRegistry),
    events: container.resolve(Tokens.IJobEvents),
    reaper,
    start(): void {
      reaper.start(config.reaperIntervalMs);
      log.info(`Job engine started (reaper every ${config.reaperIntervalMs} ms)`);
    },
    stop(): void {
      reaper.stop();
      log.info('Job engine stopped');
    },
  };
}
