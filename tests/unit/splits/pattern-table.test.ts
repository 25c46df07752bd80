import { describe, it, expect } from 'vitest';
import { PatternTable, DEFAULT_PATTERN_RULES } from '../../../src/domain/splits/pattern-table.js';
import type { PatternRule } from '../../../src/domain/splits/pattern-table.js';

const line = (message: string) => `[14:02:11] [Server thread/INFO]: ${message}`;

describe('PatternTable', () => {
  const table = new PatternTable();

  it('holds every default rule', () => {
    expect(table.size).toBe(DEFAULT_PATTERN_RULES.length);
    expect(table.size).toBe(9);
  });

  it('reads a world load as a reset', () => {
    expect(table.match(line('Loaded 7 advancements'), 42)).toEqual({
      kind: 'reset',
      source: 'stream',
      observedAtMs: 42,
    });
    expect(table.match(line('Preparing start region for dimension minecraft:overworld'), 42)?.kind).toBe('reset');
  });

  it('reads advancement messages as stream advances', () => {
    expect(table.match(line('Runner has made the advancement [We Need to Go Deeper]'), 7)).toEqual({
      kind: 'advance',
      source: 'stream',
      milestone: 'nether',
      elapsedMs: null,
      observedAtMs: 7,
    });
    expect(table.match(line('Runner has made the advancement [Eye Spy]'), 7)).toMatchObject({ milestone: 'stronghold' });
    expect(table.match(line('Runner has made the advancement [Free the End]'), 7)).toMatchObject({ milestone: 'finish' });
  });

  it('matches titles literally', () => {
    expect(table.match(line('Runner has made the advancement [The End?]'), 1)).toMatchObject({ milestone: 'end' });
    expect(table.match(line('Runner has made the advancement [The End]'), 1)).toBeNull();
  });

  it('reads blaze rods as the stronghold search display state', () => {
    expect(table.match(line('Runner has made the advancement [Into Fire]'), 3)).toEqual({
      kind: 'display',
      source: 'stream',
      state: 'stronghold_search',
      observedAtMs: 3,
    });
  });

  it('ignores unrelated lines', () => {
    expect(table.match(line('Saving chunks for level ServerLevel[New World]'), 1)).toBeNull();
    expect(table.match('', 1)).toBeNull();
  });

  it('lets a reset rule win regardless of supplied order', () => {
    const rules: PatternRule[] = [
      { kind: 'display', state: 'stronghold_search', pattern: /boom/ },
      { kind: 'advance', milestone: 'nether', pattern: /boom/ },
      { kind: 'reset', pattern: /boom/ },
    ];
    expect(new PatternTable(rules).match('boom', 1)?.kind).toBe('reset');
  });

  it('prefers earlier splits, then supplied order, among advance rules', () => {
    const rules: PatternRule[] = [
      { kind: 'advance', milestone: 'fortress', pattern: /x/ },
      { kind: 'advance', milestone: 'bastion', pattern: /x/ },
    ];
    expect(new PatternTable(rules).match('x', 1)).toMatchObject({ milestone: 'bastion' });
  });
});
