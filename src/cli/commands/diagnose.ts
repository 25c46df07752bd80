/**
 * Diagnose Command
 *
 * Live log viewer: prints every new line of the game log and tags the ones
 * a split rule recognizes. Run it while playing to see what the game writes.
 */

import type { ResultAsync } from 'neverthrow';
import type { LogNotFoundError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import type { PatternTable } from '../../domain/splits/pattern-table.js';
import type { LineSource } from '../../application/split-tracker.js';
import type { Clock } from '../../runtime/ports/clock.js';
import { abortableSleep } from '../../runtime/abortable-sleep.js';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import { formatLogLine, formatPath } from '../output-formatter.js';

export interface DiagnoseCommandDeps {
  readonly resolveLogFile: () => ResultAsync<string, LogNotFoundError>;
  readonly createReader: (logFile: string) => LineSource;
  readonly patterns: PatternTable;
  readonly clock: Clock;
  readonly print: (text: string) => void;
  /** Aborted on Ctrl+C. */
  readonly signal: AbortSignal;
}

export interface DiagnoseCommandOptions {
  readonly pollMs: number;
}

export async function executeDiagnoseCommand(
  deps: DiagnoseCommandDeps,
  options: DiagnoseCommandOptions,
): Promise<CliResult> {
  const logFile = await deps.resolveLogFile();
  if (logFile.isErr()) {
    return failure(formatAppError(logFile.error), {
      suggestions: ['Pass the log path: mcsr-presence diagnose <path/to/latest.log>'],
    });
  }

  const reader = deps.createReader(logFile.value);
  await reader.initialize();
  deps.print(`Watching ${formatPath(logFile.value)} (Ctrl+C to stop)`);

  let seen = 0;
  let recognized = 0;
  while (!deps.signal.aborted) {
    const lines = await reader.poll();
    for (const line of lines) {
      const event = deps.patterns.match(line, deps.clock.nowMs());
      seen += 1;
      if (event) recognized += 1;
      deps.print(formatLogLine(line, event));
    }
    await abortableSleep(options.pollMs, deps.signal);
  }

  return success({
    message: `Watched ${seen} line(s), ${recognized} recognized`,
    details: [`Log file: ${logFile.value}`],
  });
}
