import type { Milestone, SoftState } from './milestones.js';

export type EventSource = 'stream' | 'snapshot';

interface EventBase {
  readonly source: EventSource;
  readonly observedAtMs: number;
}

export type ResetEvent = EventBase & { readonly kind: 'reset' };

/**
 * `elapsedMs` is only known for snapshot-sourced advances; a stream advance
 * carries null until an enrich fills it in.
 */
export type AdvanceEvent = EventBase & {
  readonly kind: 'advance';
  readonly milestone: Milestone;
  readonly elapsedMs: number | null;
};

export type DisplayEvent = EventBase & {
  readonly kind: 'display';
  readonly state: SoftState;
};

export type EnrichEvent = EventBase & {
  readonly kind: 'enrich';
  readonly milestone: Milestone;
  readonly elapsedMs: number;
};

export type DetectedEvent = ResetEvent | AdvanceEvent | DisplayEvent | EnrichEvent;

export type DetectedEventKind = DetectedEvent['kind'];

export const DetectedEvents = {
  reset: (source: EventSource, observedAtMs: number): ResetEvent => ({
    kind: 'reset',
    source,
    observedAtMs,
  }),

  streamAdvance: (milestone: Milestone, observedAtMs: number): AdvanceEvent => ({
    kind: 'advance',
    source: 'stream',
    milestone,
    elapsedMs: null,
    observedAtMs,
  }),

  snapshotAdvance: (milestone: Milestone, elapsedMs: number, observedAtMs: number): AdvanceEvent => ({
    kind: 'advance',
    source: 'snapshot',
    milestone,
    elapsedMs,
    observedAtMs,
  }),

  display: (state: SoftState, observedAtMs: number): DisplayEvent => ({
    kind: 'display',
    source: 'stream',
    state,
    observedAtMs,
  }),

  enrich: (milestone: Milestone, elapsedMs: number, observedAtMs: number): EnrichEvent => ({
    kind: 'enrich',
    source: 'snapshot',
    milestone,
    elapsedMs,
    observedAtMs,
  }),
} as const;
