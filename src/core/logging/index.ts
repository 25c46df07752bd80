export type { Logger, ILoggerFactory, LogLevel, LoggerOptions } from './types.js';
export { LOG_LEVELS } from './types.js';

export { PinoLoggerFactory, createRootLogger } from './create-logger.js';

export { getBootstrapLogger, createBootstrapLogger, parseLogLevel } from './bootstrap.js';

export { REDACTION_CONFIG } from './redaction.js';
