import { describe, it, expect } from 'vitest';
import { formatIgt, renderPresence } from '../../../src/infrastructure/presence/presence-renderer.js';
import type { RunSnapshot } from '../../../src/domain/splits/run-state-machine.js';

const snapshot = (overrides: Partial<RunSnapshot>): RunSnapshot => ({
  milestone: 'none',
  display: 'none',
  elapsedMs: 0,
  isNewRun: false,
  runEpochStartMs: 1_000,
  ...overrides,
});

describe('formatIgt', () => {
  it('formats minutes, padded seconds and milliseconds', () => {
    expect(formatIgt(145_000)).toBe('2:25.000');
    expect(formatIgt(490_123)).toBe('8:10.123');
    expect(formatIgt(61_005)).toBe('1:01.005');
  });

  it('shows zero for non-positive times', () => {
    expect(formatIgt(0)).toBe('0:00.000');
    expect(formatIgt(-5)).toBe('0:00.000');
  });
});

describe('renderPresence', () => {
  it('shows a fresh run', () => {
    expect(renderPresence(snapshot({ isNewRun: true }))).toEqual({
      state: 'Starting a new run (0/7 splits)',
      details: 'Grinding the overworld...',
      largeImageKey: 'overworld',
      largeImageText: 'Overworld',
      smallImageKey: 'grass_block',
      smallImageText: 'Just started',
      startTimestampMs: 1_000,
    });
  });

  it('adds the in-game time when it is known', () => {
    const view = renderPresence(snapshot({ milestone: 'nether', display: 'nether', elapsedMs: 145_000 }));
    expect(view.state).toBe('Entered the Nether (1/7 splits)');
    expect(view.details).toBe('Trading piglins / looting bastion... | IGT: 2:25.000');
    expect(view.smallImageKey).toBe('nether_portal');
  });

  it('renders a soft state with the rank of the real split', () => {
    const view = renderPresence(snapshot({ milestone: 'fortress', display: 'stronghold_search' }));
    expect(view.state).toBe('Locating Stronghold (3/7 splits)');
    expect(view.details).toBe('Throwing eyes of ender...');
    expect(view.largeImageKey).toBe('stronghold');
  });

  it('shows the final time once the run is complete', () => {
    const view = renderPresence(snapshot({ milestone: 'finish', display: 'finish', elapsedMs: 490_000 }));
    expect(view.state).toBe('FINISHED! IGT: 8:10.000');
    expect(view.details).toBe('Dragon has been slain! | IGT: 8:10.000');
    expect(view.largeImageKey).toBe('credits');
  });
});
