/**
 * CLI Result Interpreter
 *
 * The only place a CliResult turns into process termination.
 */

import type { CliResult } from './types/cli-result.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { toNumericExitCode } from '../runtime/adapters/node-process-terminator.js';
import { printResult } from './output-formatter.js';

/**
 * Print the result and, on failure, terminate through the injected port.
 */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally so pending stderr writes flush.
      return;

    case 'failure':
      terminator.terminate(result.exitCode);
  }
}

/**
 * Same, for failures that happen before the container exists (bad config).
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  if (result.kind === 'failure') {
    process.exit(toNumericExitCode(result.exitCode));
  }
}
