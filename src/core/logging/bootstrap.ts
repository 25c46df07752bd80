import pino from 'pino';
import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Logger for code that runs before configuration is parsed and the
 * container exists (argument handling, config failures).
 */
let _bootstrapLogger: Logger | null = null;

export function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? fallback;
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: parseLogLevel(process.env['MCSR_LOG_LEVEL'], 'info'),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true }),
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
