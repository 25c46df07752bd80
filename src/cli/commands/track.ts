/**
 * Track Command
 *
 * Finds the game log, runs the split tracker until a shutdown signal, then
 * clears the presence. Pure function with dependency injection.
 */

import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { LogNotFoundError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import { Err } from '../../errors/factories.js';
import type { TrackingPaths } from '../../infrastructure/discovery/minecraft-paths.js';
import type { ShutdownSignal } from '../../runtime/ports/process-signals.js';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface TrackerHandle {
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface TrackCommandDeps {
  readonly resolvePaths: () => ResultAsync<TrackingPaths, LogNotFoundError>;
  readonly createTracker: (paths: TrackingPaths) => TrackerHandle;
  /** Resolves with the signal that asked us to stop. */
  readonly waitForShutdown: () => Promise<ShutdownSignal>;
  readonly logger: Logger;
}

export interface TrackCommandOptions {
  /** The configured Discord client id is the sample one. */
  readonly placeholderClientId: boolean;
  readonly discordEnabled: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeTrackCommand(
  deps: TrackCommandDeps,
  options: TrackCommandOptions,
): Promise<CliResult> {
  const paths = await deps.resolvePaths();
  if (paths.isErr()) {
    return failure(formatAppError(paths.error), {
      suggestions: [
        'Start Minecraft once so logs/latest.log exists',
        'Pass --mc-dir <dir> or --log-file <path> explicitly',
      ],
    });
  }

  const warnings: string[] = [];
  if (options.discordEnabled && options.placeholderClientId) {
    warnings.push('Using the sample Discord client id; pass --client-id with your own application id');
    deps.logger.warn('Using the sample Discord client id');
  }

  const tracker = deps.createTracker(paths.value);
  try {
    await tracker.start();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return failure(formatAppError(Err.startupFailed('tracker start', message, error)));
  }

  deps.logger.info({ logFile: paths.value.logFile, snapshotRoot: paths.value.snapshotRoot }, 'Tracking splits');

  const signal = await deps.waitForShutdown();
  deps.logger.info({ signal }, 'Shutdown requested');
  await tracker.stop();

  return success({
    message: `Stopped tracking (${signal})`,
    details: [`Log file: ${paths.value.logFile}`, `Snapshot root: ${paths.value.snapshotRoot}`],
    warnings,
  });
}
