import { describe, it, expect } from 'vitest';
import { Err, formatAppError } from '../../../src/errors/index.js';

describe('formatAppError', () => {
  it('lists every config issue under its variable', () => {
    const error = Err.configInvalid([
      { path: 'MCSR_STREAM_POLL_MS', message: 'Expected number, received nan' },
      { path: '(root)', message: 'bad' },
    ]);

    expect(formatAppError(error)).toBe(
      'Invalid configuration\n\n  - MCSR_STREAM_POLL_MS: Expected number, received nan\n  - (root): bad',
    );
  });

  it('says so when a config error carries no issues', () => {
    expect(formatAppError(Err.configInvalid([]))).toBe('Invalid configuration\n\n  - (no details)');
  });

  it('lists the searched locations for a missing log', () => {
    expect(formatAppError(Err.logNotFound(['/a/logs/latest.log']))).toBe(
      'Could not find the game log (logs/latest.log)\nSearched:\n  - /a/logs/latest.log',
    );
    expect(formatAppError(Err.logNotFound([]))).toBe(
      'Could not find the game log (logs/latest.log)\nSearched:\n  - (no candidate directories)',
    );
  });

  it('names the startup phase and the cause when there is one', () => {
    expect(formatAppError(Err.startupFailed('discord login', 'refused'))).toBe(
      'Startup failed during discord login: refused',
    );
    expect(formatAppError(Err.startupFailed('tracker start', 'boom', new TypeError('boom')))).toBe(
      'Startup failed during tracker start: boom\nCause: TypeError: boom',
    );
  });

  it('renders non-error causes as JSON, falling back to String', () => {
    expect(formatAppError(Err.unexpected('Crashed', { code: 1 }))).toBe('Crashed\nCause: {"code":1}');
    expect(formatAppError(Err.unexpected('Crashed', 'plain text'))).toBe('Crashed\nCause: plain text');

    const circular: Record<string, unknown> = {};
    circular['self'] = circular;
    expect(formatAppError(Err.unexpected('Crashed', circular))).toBe('Crashed\nCause: [object Object]');
  });
});
