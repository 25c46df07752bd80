import 'reflect-metadata';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { container } from 'tsyringe';
import { DI } from '../../src/di/tokens.js';
import { initializeContainer, isInitialized, resetContainer } from '../../src/di/container.js';
import type { TrackerFactory } from '../../src/di/container.js';
import type { RuntimeMode } from '../../src/runtime/runtime-mode.js';
import type { PresenceSink } from '../../src/infrastructure/presence/presence-sink.js';
import type { RunStateMachine } from '../../src/domain/splits/run-state-machine.js';
import type { ProcessTerminator } from '../../src/runtime/ports/process-terminator.js';
import { ProcessTerminationRequested } from '../../src/runtime/adapters/throwing-process-terminator.js';
import { testConfig } from '../helpers/test-config.js';

/**
 * Smoke tests for DI container health: every token resolves, factories
 * cache their instance, and config choices reach the services built from it.
 */
describe('[SMOKE] DI Container Health', () => {
  beforeEach(() => resetContainer());
  afterEach(() => resetContainer());

  it('resolves every registered DI token', () => {
    initializeContainer({ config: testConfig() });

    const failures: string[] = [];
    let count = 0;
    for (const [namespaceKey, namespace] of Object.entries(DI)) {
      for (const [tokenKey, token] of Object.entries(namespace)) {
        count += 1;
        try {
          const instance: unknown = container.resolve(token);
          if (instance === null || instance === undefined) failures.push(`${namespaceKey}.${tokenKey}: empty`);
        } catch (error) {
          failures.push(`${namespaceKey}.${tokenKey}: ${error instanceof Error ? error.message : String(error)}`);
        }
      }
    }

    expect(failures).toEqual([]);
    expect(count).toBe(13);
  });

  it('returns the same instance on every resolve', () => {
    initializeContainer({ config: testConfig() });

    const first = container.resolve<RunStateMachine>(DI.Splits.StateMachine);
    expect(container.resolve<RunStateMachine>(DI.Splits.StateMachine)).toBe(first);
  });

  it('is idempotent', () => {
    initializeContainer({ config: testConfig() });
    const sink = container.resolve<PresenceSink>(DI.Infra.PresenceSink);

    initializeContainer({ config: testConfig() });

    expect(isInitialized()).toBe(true);
    expect(container.resolve<PresenceSink>(DI.Infra.PresenceSink)).toBe(sink);
  });

  it('runs under test adapters when started by the test runner', () => {
    initializeContainer({ config: testConfig() });

    expect(container.resolve<RuntimeMode>(DI.Runtime.Mode)).toEqual({ kind: 'test' });
    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    expect(() => terminator.terminate({ kind: 'failure' })).toThrow(ProcessTerminationRequested);
  });

  it('picks the presence sink from the configured mode', () => {
    const base = testConfig();
    initializeContainer({ config: base });
    expect(container.resolve<PresenceSink>(DI.Infra.PresenceSink).name).toBe('log');

    resetContainer();
    initializeContainer({
      config: testConfig({ presence: { mode: { kind: 'discord' }, clientId: base.presence.clientId } }),
    });
    expect(container.resolve<PresenceSink>(DI.Infra.PresenceSink).name).toBe('discord');
  });

  it('builds trackers for the resolved paths', () => {
    initializeContainer({ config: testConfig() });

    const createTracker = container.resolve<TrackerFactory>(DI.Splits.TrackerFactory);
    const tracker = createTracker({ logFile: '/games/mc/logs/latest.log', snapshotRoot: '/games/mc' });

    expect(tracker.running).toBe(false);
  });
});
