/**
 * Split order for a random-seed any% run.
 *
 * Rank is the index in SPLIT_ORDER and is the only basis for progress
 * comparisons. `none` is the sentinel every run starts at; `finish` is terminal.
 */
export const SPLIT_ORDER = Object.freeze([
  'none',
  'nether',
  'bastion',
  'fortress',
  'first_portal',
  'stronghold',
  'end',
  'finish',
] as const);

export type Milestone = (typeof SPLIT_ORDER)[number];

export const NONE: Milestone = 'none';
export const COMPLETE: Milestone = 'finish';

/** Number of rank-bearing splits after `none`. */
export const SPLIT_COUNT = SPLIT_ORDER.length - 1;

/**
 * Display-only states. They are shown externally but never move the rank.
 */
export const SOFT_STATES = Object.freeze(['stronghold_search'] as const);

export type SoftState = (typeof SOFT_STATES)[number];

export type DisplayState = Milestone | SoftState;

export function isMilestone(value: string): value is Milestone {
  return SPLIT_ORDER.some((milestone) => milestone === value);
}

export function isSoftState(value: string): value is SoftState {
  return SOFT_STATES.some((state) => state === value);
}

export function rankOf(milestone: Milestone): number {
  return SPLIT_ORDER.indexOf(milestone);
}

/**
 * @throws RangeError when rank is outside the split order
 */
export function milestoneAtRank(rank: number): Milestone {
  const milestone = SPLIT_ORDER[rank];
  if (milestone === undefined) {
    throw new RangeError(`No milestone at rank ${rank}`);
  }
  return milestone;
}

/**
 * Rank band in which a soft display state may be shown:
 * at or after `from`, strictly before `before`.
 */
export interface SoftBand {
  readonly from: Milestone;
  readonly before: Milestone;
}

export const DEFAULT_SOFT_BAND: SoftBand = Object.freeze({
  from: 'fortress',
  before: 'stronghold',
});

export function isWithinBand(rank: number, band: SoftBand): boolean {
  return rank >= rankOf(band.from) && rank < rankOf(band.before);
}
