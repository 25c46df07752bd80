#!/usr/bin/env node
/**
 * mcsr-presence CLI - Composition Root
 *
 * 1. Parses flags and config
 * 2. Wires dependencies for each command
 * 3. Interprets CliResult into process termination
 *
 * No business logic lives here; see src/cli/commands/*.ts.
 */

import 'reflect-metadata';
import { Command, Option } from 'commander';
import fs from 'fs';
import os from 'os';

import { initializeContainer, container } from './di/container.js';
import type { TrackerFactory } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ConfigOverrides, ValidatedConfig } from './config/app-config.js';
import { loadConfig, PLACEHOLDER_CLIENT_ID } from './config/app-config.js';
import { formatAppError } from './errors/formatter.js';
import { Err } from './errors/factories.js';
import type { ILoggerFactory } from './core/logging/index.js';
import { createBootstrapLogger } from './core/logging/index.js';
import type { Clock } from './runtime/ports/clock.js';
import type { ProcessSignals, ShutdownSignal } from './runtime/ports/process-signals.js';
import type { ShutdownEvents } from './runtime/ports/shutdown-events.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { SplitFileSystemPort } from './infrastructure/fs/fs.port.js';
import type { DiscoveryEnv } from './infrastructure/discovery/minecraft-paths.js';
import { resolveTrackingPaths } from './infrastructure/discovery/minecraft-paths.js';
import { LineStreamReader } from './infrastructure/stream/line-stream-reader.js';
import type { PatternTable } from './domain/splits/pattern-table.js';
import { SystemClock } from './runtime/adapters/system-clock.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import { executeTrackCommand, executeDiagnoseCommand, executeSimulateCommand } from './cli/commands/index.js';
import type { SnapshotFormat } from './cli/commands/index.js';

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

// ═══════════════════════════════════════════════════════════════════════════
// WIRING HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Loads config with CLI overrides and builds the container, or prints the
 * config problems and exits.
 */
function bootstrap(overrides: ConfigOverrides): ValidatedConfig | null {
  const configResult = loadConfig({ env: process.env, overrides });
  if (configResult.isErr()) {
    interpretCliResultWithoutDI(failure(formatAppError(configResult.error), { exitCode: { kind: 'misuse' } }));
    return null;
  }

  initializeContainer({ runtimeMode: { kind: 'production' }, config: configResult.value });
  return configResult.value;
}

function discoveryEnv(): DiscoveryEnv {
  return { homeDir: os.homedir(), platform: process.platform, appData: process.env['APPDATA'] };
}

/** Routes SIGINT/SIGTERM onto the shutdown bus. */
function installSignalHandlers(): void {
  const signals = container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals);
  const events = container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents);
  for (const signal of SHUTDOWN_SIGNALS) {
    signals.on(signal, () => events.emit({ kind: 'shutdown_requested', signal }));
  }
}

function nextShutdown(): Promise<ShutdownSignal> {
  const events = container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents);
  return new Promise((resolve) => {
    const off = events.onShutdown((event) => {
      off();
      resolve(event.signal);
    });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('mcsr-presence')
  .description('Minecraft speedrun split tracker with Discord Rich Presence')
  .version('0.1.0');

interface TrackFlags {
  mcDir?: string;
  logFile?: string;
  snapshotRoot?: string;
  clientId?: string;
  discord: boolean;
  debug?: boolean;
}

program
  .command('track', { isDefault: true })
  .description('Follow the current run and publish it as Rich Presence')
  .option('--mc-dir <dir>', 'Minecraft directory or launcher instances directory (auto-detected)')
  .option('--log-file <path>', 'Game log to follow (default: <mc-dir>/logs/latest.log)')
  .option('--snapshot-root <dir>', 'Where to look for timer snapshot files (default: the game directory)')
  .option('--client-id <id>', 'Discord application client id')
  .option('--no-discord', 'Log presence changes instead of sending them to Discord')
  .option('--debug', 'Verbose logging')
  .action(async (flags: TrackFlags) => {
    const config = bootstrap({
      minecraftDir: flags.mcDir,
      logFile: flags.logFile,
      snapshotRoot: flags.snapshotRoot,
      clientId: flags.clientId,
      discord: flags.discord,
      debug: flags.debug,
    });
    if (!config) return;

    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    const fsPort = container.resolve<SplitFileSystemPort>(DI.Infra.FileSystem);
    const createTracker = container.resolve<TrackerFactory>(DI.Splits.TrackerFactory);
    const logger = container.resolve<ILoggerFactory>(DI.Logging.Factory).create('cli');
    installSignalHandlers();

    const result = await executeTrackCommand(
      {
        resolvePaths: () => resolveTrackingPaths(fsPort, discoveryEnv(), config.paths),
        createTracker,
        waitForShutdown: nextShutdown,
        logger,
      },
      {
        placeholderClientId: config.presence.clientId === PLACEHOLDER_CLIENT_ID,
        discordEnabled: config.presence.mode.kind === 'discord',
      },
    );

    interpretCliResult(result, terminator);
  });

program
  .command('diagnose [logFile]')
  .description('Print every new game log line, tagging the ones split rules recognize')
  .option('--mc-dir <dir>', 'Minecraft directory used to find the log')
  .action(async (logFile: string | undefined, flags: { mcDir?: string }) => {
    const config = bootstrap({ minecraftDir: flags.mcDir, logFile, discord: false });
    if (!config) return;

    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    const fsPort = container.resolve<SplitFileSystemPort>(DI.Infra.FileSystem);
    const loggers = container.resolve<ILoggerFactory>(DI.Logging.Factory);
    installSignalHandlers();

    const abort = new AbortController();
    void nextShutdown().then(() => abort.abort());

    const result = await executeDiagnoseCommand(
      {
        resolveLogFile: () => resolveTrackingPaths(fsPort, discoveryEnv(), config.paths).map((paths) => paths.logFile),
        createReader: (file) => new LineStreamReader(file, fsPort, loggers.create('stream')),
        patterns: container.resolve<PatternTable>(DI.Splits.PatternTable),
        clock: container.resolve<Clock>(DI.Runtime.Clock),
        print: (text) => console.log(text),
        signal: abort.signal,
      },
      { pollMs: config.polling.streamMs },
    );

    interpretCliResult(result, terminator);
  });

interface SimulateFlags {
  dir: string;
  logFile?: string;
  speed: string;
  format: SnapshotFormat;
}

program
  .command('simulate')
  .description('Write a fabricated run to a snapshot file (and log) for trying the tracker')
  .option('--dir <dir>', 'Directory for the snapshot file', 'simulated-run')
  .option('--log-file <path>', 'Also append matching game log lines here')
  .option('--speed <factor>', 'How much faster than real time to play the run', '20')
  .addOption(new Option('--format <format>', 'Snapshot layout').choices(['record', 'flat']).default('record'))
  .action(async (flags: SimulateFlags) => {
    const clock = new SystemClock();
    const result = await executeSimulateCommand(
      {
        mkdir: async (dir) => {
          await fs.promises.mkdir(dir, { recursive: true });
        },
        writeFile: (filePath, content) => fs.promises.writeFile(filePath, content, 'utf-8'),
        appendFile: (filePath, content) => fs.promises.appendFile(filePath, content, 'utf-8'),
        sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
        clock,
      },
      { dir: flags.dir, logFile: flags.logFile, speed: Number(flags.speed), format: flags.format },
    );

    interpretCliResultWithoutDI(result);
  });

program.parseAsync().catch((error: unknown) => {
  createBootstrapLogger('cli').fatal({ err: error }, formatAppError(Err.unexpected('Unhandled CLI error', error)));
  process.exitCode = 1;
});
