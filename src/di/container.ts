import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { DetachedProcessSignals, NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { InMemoryShutdownEvents } from '../runtime/adapters/in-memory-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { Clock } from '../runtime/ports/clock.js';
import { SystemClock } from '../runtime/adapters/system-clock.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { SplitFileSystemPort } from '../infrastructure/fs/fs.port.js';
import { NodeFileSystem } from '../infrastructure/fs/node-file-system.js';
import { PatternTable } from '../domain/splits/pattern-table.js';
import { RunStateMachine } from '../domain/splits/run-state-machine.js';
import type { PresenceSink } from '../infrastructure/presence/presence-sink.js';
import { DiscordPresenceSink } from '../infrastructure/presence/discord-presence-sink.js';
import { LogPresenceSink } from '../infrastructure/presence/log-presence-sink.js';
import type { SplitPublisher } from '../infrastructure/presence/presence-publisher.js';
import { PresencePublisher } from '../infrastructure/presence/presence-publisher.js';
import { LineStreamReader } from '../infrastructure/stream/line-stream-reader.js';
import { SnapshotReader } from '../infrastructure/snapshot/snapshot-reader.js';
import type { TrackingPaths } from '../infrastructure/discovery/minecraft-paths.js';
import { SplitTracker } from '../application/split-tracker.js';
import { assertNever } from '../runtime/assert-never.js';

export type TrackerFactory = (paths: TrackingPaths) => SplitTracker;

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Already-loaded config (CLI flags applied). Loaded from env when absent. */
  readonly config?: ValidatedConfig;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): void {
  // Tests may register config before initialization; never overwrite it.
  if (container.isRegistered(DI.Config.App)) return;

  if (options.config) {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: options.config });
    return;
  }

  const configResult = loadConfig({ env: process.env });
  if (configResult.isErr()) {
    throw new Error(formatAppError(configResult.error));
  }
  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but must not leak into services.
  if (process.env.VITEST || process.env.NODE_ENV === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  let signals: ProcessSignals;
  let terminator: ProcessTerminator;
  switch (mode.kind) {
    case 'production':
      signals = new NodeProcessSignals();
      terminator = new NodeProcessTerminator();
      break;
    case 'test':
      signals = new DetachedProcessSignals();
      terminator = new ThrowingProcessTerminator();
      break;
    default:
      return assertNever(mode);
  }

  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  container.register<ShutdownEvents>(DI.Runtime.ShutdownEvents, { useValue: new InMemoryShutdownEvents() });

  if (!container.isRegistered(DI.Runtime.Clock)) {
    container.register<Clock>(DI.Runtime.Clock, { useValue: new SystemClock() });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// Dependencies before dependents; every factory caches its instance.
// ═══════════════════════════════════════════════════════════════════════════

function registerIfMissing<T>(token: symbol, factory: (c: DependencyContainer) => T): void {
  if (container.isRegistered(token)) return;
  container.register<T>(token, { useFactory: instanceCachingFactory<T>(factory) });
}

function registerServices(): void {
  registerIfMissing<ILoggerFactory>(DI.Logging.Factory, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new PinoLoggerFactory({
      level: config.logging.level,
      ...(config.logging.filePath !== null ? { filePath: config.logging.filePath } : {}),
    });
  });

  registerIfMissing<SplitFileSystemPort>(DI.Infra.FileSystem, () => new NodeFileSystem());

  registerIfMissing<PresenceSink>(DI.Infra.PresenceSink, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    const logger = c.resolve<ILoggerFactory>(DI.Logging.Factory).create('presence');
    switch (config.presence.mode.kind) {
      case 'discord':
        return new DiscordPresenceSink(config.presence.clientId, logger);
      case 'log_only':
        return new LogPresenceSink(logger);
      default:
        return assertNever(config.presence.mode);
    }
  });

  registerIfMissing<SplitPublisher>(DI.Presence.Publisher, (c) => {
    const sink = c.resolve<PresenceSink>(DI.Infra.PresenceSink);
    return new PresencePublisher(sink, c.resolve<ILoggerFactory>(DI.Logging.Factory).create('publisher'));
  });

  registerIfMissing<PatternTable>(DI.Splits.PatternTable, () => new PatternTable());

  registerIfMissing<RunStateMachine>(DI.Splits.StateMachine, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new RunStateMachine(c.resolve<Clock>(DI.Runtime.Clock), {
      cooldownMs: config.reconciliation.cooldownMs,
      softBand: config.reconciliation.softBand,
    });
  });

  registerIfMissing<TrackerFactory>(DI.Splits.TrackerFactory, (c) => (paths) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    const loggers = c.resolve<ILoggerFactory>(DI.Logging.Factory);
    const fs = c.resolve<SplitFileSystemPort>(DI.Infra.FileSystem);

    return new SplitTracker(
      {
        machine: c.resolve<RunStateMachine>(DI.Splits.StateMachine),
        patterns: c.resolve<PatternTable>(DI.Splits.PatternTable),
        lines: new LineStreamReader(paths.logFile, fs, loggers.create('stream')),
        snapshots: new SnapshotReader(paths.snapshotRoot, fs, loggers.create('snapshot'), {
          fileNames: config.snapshot.fileNames,
          maxDepth: config.snapshot.maxDepth,
        }),
        publisher: c.resolve<SplitPublisher>(DI.Presence.Publisher),
        clock: c.resolve<Clock>(DI.Runtime.Clock),
        logger: loggers.create('tracker'),
      },
      { streamPollMs: config.polling.streamMs, snapshotPollMs: config.polling.snapshotMs },
    );
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container. Idempotent; registration is synchronous, so
 * there is no window for a concurrent caller to observe a half-built container.
 *
 * @throws Error with the formatted config problems when the environment is invalid
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;

  registerRuntime(options);
  registerConfig(options);
  registerServices();
  initialized = true;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
