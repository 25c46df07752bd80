/**
 * Simulate Command
 *
 * Plays a fabricated run into a snapshot file (and optionally a log file) so
 * the tracker can be tried end to end without the game.
 */

import path from 'path';
import type { Milestone } from '../../domain/splits/milestones.js';
import type { Clock } from '../../runtime/ports/clock.js';
import { formatIgt } from '../../infrastructure/presence/presence-renderer.js';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type SnapshotFormat = 'record' | 'flat';

export interface SimulateCommandDeps {
  readonly mkdir: (dir: string) => Promise<void>;
  readonly writeFile: (filePath: string, content: string) => Promise<void>;
  readonly appendFile: (filePath: string, content: string) => Promise<void>;
  readonly sleep: (ms: number) => Promise<void>;
  readonly clock: Clock;
}

export interface SimulateCommandOptions {
  /** Directory the snapshot file is written to. */
  readonly dir: string;
  /** Log file to append game lines to; none when absent. */
  readonly logFile?: string;
  /** In-game time runs this many times faster than wall time. */
  readonly speed: number;
  readonly format: SnapshotFormat;
}

interface SimulatedStep {
  readonly igtMs: number;
  readonly split?: Exclude<Milestone, 'none'>;
  readonly advancement?: string;
}

export const SNAPSHOT_FILE_NAME = 'record.json';

export const SIMULATED_RUN: readonly SimulatedStep[] = [
  { igtMs: 145_000, split: 'nether', advancement: 'We Need to Go Deeper' },
  { igtMs: 195_000, split: 'bastion', advancement: 'Those Were the Days' },
  { igtMs: 240_000, split: 'fortress', advancement: 'A Terrible Fortress' },
  { igtMs: 262_000, advancement: 'Into Fire' },
  { igtMs: 285_000, split: 'first_portal' },
  { igtMs: 350_000, split: 'stronghold', advancement: 'Eye Spy' },
  { igtMs: 420_000, split: 'end', advancement: 'The End?' },
  { igtMs: 490_000, split: 'finish', advancement: 'Free the End' },
];

/** Timeline names the timer mod writes, per split. */
const TIMELINE_NAMES: Readonly<Record<Exclude<Milestone, 'none' | 'finish'>, string>> = {
  nether: 'enter_nether',
  bastion: 'enter_bastion',
  fortress: 'enter_fortress',
  first_portal: 'nether_travel',
  stronghold: 'enter_stronghold',
  end: 'enter_end',
};

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

type ReachedSplits = ReadonlyArray<readonly [Exclude<Milestone, 'none'>, number]>;

export function renderSnapshot(reached: ReachedSplits, format: SnapshotFormat): string {
  if (format === 'flat') {
    return JSON.stringify(Object.fromEntries(reached), null, 2);
  }

  const timelines: Array<{ name: string; igt: number }> = [];
  let finalIgt = 0;
  for (const [split, igt] of reached) {
    if (split === 'finish') {
      finalIgt = igt;
    } else {
      timelines.push({ name: TIMELINE_NAMES[split], igt });
    }
  }
  return JSON.stringify({ timelines, is_completed: finalIgt > 0, final_igt: finalIgt }, null, 2);
}

function logTimestamp(ms: number): string {
  const d = new Date(ms);
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `[${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}]`;
}

export function gameLogLine(ms: number, message: string): string {
  return `${logTimestamp(ms)} [Server thread/INFO]: ${message}\n`;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeSimulateCommand(
  deps: SimulateCommandDeps,
  options: SimulateCommandOptions,
): Promise<CliResult> {
  if (!Number.isFinite(options.speed) || options.speed <= 0) {
    return misuse(`--speed must be a positive number (got ${options.speed})`);
  }

  const snapshotPath = path.join(options.dir, SNAPSHOT_FILE_NAME);
  const logFile = options.logFile;
  const log = async (message: string): Promise<void> => {
    if (logFile !== undefined) await deps.appendFile(logFile, gameLogLine(deps.clock.nowMs(), message));
  };

  try {
    await deps.mkdir(options.dir);
    if (logFile !== undefined) await deps.mkdir(path.dirname(logFile));

    await log('Preparing start region for dimension minecraft:overworld');
    await deps.writeFile(snapshotPath, renderSnapshot([], options.format));

    const reached: Array<readonly [Exclude<Milestone, 'none'>, number]> = [];
    let previousIgt = 0;
    for (const step of SIMULATED_RUN) {
      await deps.sleep((step.igtMs - previousIgt) / options.speed);
      previousIgt = step.igtMs;

      if (step.advancement !== undefined) {
        await log(`Runner has made the advancement [${step.advancement}]`);
      }
      if (step.split !== undefined) {
        reached.push([step.split, step.igtMs]);
        await deps.writeFile(snapshotPath, renderSnapshot(reached, options.format));
      }
    }

    return success({
      message: `Simulated run complete: ${reached.length} splits, final IGT ${formatIgt(previousIgt)}`,
      details: [
        `Snapshot: ${snapshotPath}`,
        ...(logFile !== undefined ? [`Log: ${logFile}`] : []),
      ],
    });
  } catch (error) {
    return failure(`Simulation failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}
