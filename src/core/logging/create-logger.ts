import pino from 'pino';
import type { Logger, ILoggerFactory, LoggerOptions } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root pino logger: JSON lines on stderr (stdout belongs to CLI output),
 * optionally teed into a log file.
 */
export function createRootLogger(options: LoggerOptions): Logger {
  const stderr = pino.destination({ dest: 2, sync: true });
  const streamLevel = options.level === 'silent' ? 'fatal' : options.level;
  const stream = options.filePath
    ? pino.multistream([
        { level: streamLevel, stream: stderr },
        { level: streamLevel, stream: pino.destination({ dest: options.filePath, mkdir: true, sync: true }) },
      ])
    : stderr;

  return pino(
    {
      level: options.level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    stream,
  );
}

/**
 * Logger factory - creates component loggers off one root.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(options: LoggerOptions) {
    this._root = createRootLogger(options);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
