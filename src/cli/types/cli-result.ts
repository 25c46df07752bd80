/**
 * CLI Result Types
 *
 * Commands return these; the composition root prints them and decides how
 * the process ends.
 */

import type { ExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Structured output for CLI display. Content only; styling lives in the formatter.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { readonly kind: 'success'; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  },
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'failure' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/** Bad arguments or flags (exit 2). */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
