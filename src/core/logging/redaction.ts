/**
 * Redaction configuration for pino.
 *
 * The Discord client id is public; OAuth tokens that an RPC login may carry
 * are not.
 */
export const REDACTION_CONFIG = {
  paths: [
    'accessToken',
    'clientSecret',
    'token',
    '*.accessToken',
    '*.clientSecret',
    '*.token',
    'err.config.accessToken',
  ],
  censor: '[REDACTED]',
};
