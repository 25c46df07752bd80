import { describe, it, expect } from 'vitest';
import {
  SPLIT_ORDER,
  SPLIT_COUNT,
  DEFAULT_SOFT_BAND,
  isMilestone,
  isSoftState,
  isWithinBand,
  milestoneAtRank,
  rankOf,
} from '../../../src/domain/splits/milestones.js';

describe('split order', () => {
  it('is frozen and free of duplicates', () => {
    expect(Object.isFrozen(SPLIT_ORDER)).toBe(true);
    expect(new Set(SPLIT_ORDER).size).toBe(SPLIT_ORDER.length);
  });

  it('counts seven splits after the sentinel', () => {
    expect(SPLIT_COUNT).toBe(7);
    expect(SPLIT_ORDER[0]).toBe('none');
    expect(SPLIT_ORDER[SPLIT_COUNT]).toBe('finish');
  });

  it('maps ranks both ways', () => {
    expect(rankOf('fortress')).toBe(3);
    expect(milestoneAtRank(4)).toBe('first_portal');
    expect(() => milestoneAtRank(8)).toThrow(RangeError);
  });

  it('recognizes milestones and soft states by name', () => {
    expect(isMilestone('stronghold')).toBe(true);
    expect(isMilestone('stronghold_search')).toBe(false);
    expect(isSoftState('stronghold_search')).toBe(true);
    expect(isSoftState('nether')).toBe(false);
  });
});

describe('isWithinBand', () => {
  it('includes the opening milestone and excludes the closing one', () => {
    expect(isWithinBand(rankOf('bastion'), DEFAULT_SOFT_BAND)).toBe(false);
    expect(isWithinBand(rankOf('fortress'), DEFAULT_SOFT_BAND)).toBe(true);
    expect(isWithinBand(rankOf('first_portal'), DEFAULT_SOFT_BAND)).toBe(true);
    expect(isWithinBand(rankOf('stronghold'), DEFAULT_SOFT_BAND)).toBe(false);
  });
});
