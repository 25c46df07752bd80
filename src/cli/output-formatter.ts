/**
 * CLI Output Formatter
 *
 * Presentation layer: CliResult and diagnostic lines to chalk-styled text.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';
import type { DetectedEvent } from '../domain/splits/detected-event.js';

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`❌ ${output.message}`) : chalk.green(`✅ ${output.message}`));

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => lines.push(chalk.white(`  • ${detail}`)));
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('⚠️  Warnings:'));
    output.warnings.forEach((warning) => lines.push(chalk.yellow(`  • ${warning}`)));
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach((suggestion) => lines.push(chalk.gray(`  • ${suggestion}`)));
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);
  }
}

export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (!formatted) return;
  if (result.kind === 'failure') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

function eventLabel(event: DetectedEvent): string {
  switch (event.kind) {
    case 'reset':
      return 'RESET';
    case 'advance':
    case 'enrich':
      return event.milestone.toUpperCase();
    case 'display':
      return event.state.toUpperCase();
  }
}

/**
 * One tailed log line for `diagnose`; lines a rule recognizes are tagged.
 */
export function formatLogLine(line: string, event: DetectedEvent | null): string {
  if (!event) return chalk.gray(`  ${line}`);
  const tag = `[${eventLabel(event)}]`;
  return event.kind === 'reset' ? chalk.magenta(`${tag} ${line}`) : chalk.cyan(`${tag} ${line}`);
}

export function formatPath(filePath: string): string {
  return chalk.cyan(filePath);
}
