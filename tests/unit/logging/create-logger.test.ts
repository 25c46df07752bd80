import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { PinoLoggerFactory, parseLogLevel } from '../../../src/core/logging/index.js';
import { makeTempDir } from '../../helpers/temp-dir.js';

describe('parseLogLevel', () => {
  it('accepts known levels in any case', () => {
    expect(parseLogLevel('WARN', 'info')).toBe('warn');
  });

  it('falls back for missing or unknown values', () => {
    expect(parseLogLevel(undefined, 'info')).toBe('info');
    expect(parseLogLevel('verbose', 'error')).toBe('error');
  });
});

describe('PinoLoggerFactory', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir('mcsr-logging'));
  });

  afterEach(() => cleanup());

  function fileRecords(filePath: string): Array<Record<string, unknown>> {
    return fs
      .readFileSync(filePath, 'utf-8')
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line): Record<string, unknown> => JSON.parse(line));
  }

  it('tees component records into the log file with secrets redacted', () => {
    const filePath = path.join(dir, 'nested', 'presence.log');
    const factory = new PinoLoggerFactory({ level: 'info', filePath });

    factory.create('presence').info({ token: 'test-secret', state: 'nether' }, 'Presence');
    factory.create('presence').debug('below the level');

    const records = fileRecords(filePath);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      component: 'presence',
      msg: 'Presence',
      token: '[REDACTED]',
      state: 'nether',
    });
  });
});
