import type { Clock } from '../../runtime/ports/clock.js';
import { assertNever } from '../../runtime/assert-never.js';
import type {
  AdvanceEvent,
  DetectedEvent,
  DisplayEvent,
  EnrichEvent,
  ResetEvent,
} from './detected-event.js';
import type { DisplayState, Milestone, SoftBand } from './milestones.js';
import { DEFAULT_SOFT_BAND, NONE, isWithinBand, milestoneAtRank, rankOf } from './milestones.js';

export const DEFAULT_COOLDOWN_MS = 2_000;

/**
 * Immutable view of the run handed to subscribers after every accepted
 * transition.
 */
export interface RunSnapshot {
  /** Milestone at the current rank. */
  readonly milestone: Milestone;
  /** What should be shown; a soft state or the current milestone. */
  readonly display: DisplayState;
  /** 0 while unknown. */
  readonly elapsedMs: number;
  readonly isNewRun: boolean;
  readonly runEpochStartMs: number;
}

export type IgnoreReason =
  | 'already_reset'
  | 'cooldown'
  | 'not_ahead'
  | 'not_current'
  | 'elapsed_known'
  | 'no_elapsed'
  | 'out_of_band'
  | 'already_shown'
  | 'superseded_in_pass';

export type TransitionOutcome =
  | { readonly kind: 'accepted'; readonly event: DetectedEvent; readonly snapshot: RunSnapshot }
  | { readonly kind: 'ignored'; readonly event: DetectedEvent; readonly reason: IgnoreReason };

export type TransitionListener = (snapshot: RunSnapshot, event: DetectedEvent) => void;
export type Unsubscribe = () => void;

export interface RunStateMachineOptions {
  readonly cooldownMs?: number;
  readonly softBand?: SoftBand;
}

type Decision = { readonly kind: 'accept' } | { readonly kind: 'ignore'; readonly reason: IgnoreReason };

/** Per-call state of one `applyPass`; reentrant passes get their own. */
interface PassState {
  advanced: boolean;
}

const ACCEPT: Decision = { kind: 'accept' };
const ignore = (reason: IgnoreReason): Decision => ({ kind: 'ignore', reason });

/**
 * Single writer of run state.
 *
 * Transitions are synchronous; no I/O happens between reading and writing
 * state, so on the event loop every transition is atomic with respect to
 * both poll loops.
 *
 * INVARIANTS:
 * - currentRank never decreases except through a reset
 * - elapsedMs never decreases while currentRank is unchanged
 * - display is either the current milestone or a soft state inside its band
 * - ignored events never notify subscribers
 */
export class RunStateMachine {
  private readonly cooldownMs: number;
  private readonly softBand: SoftBand;
  private readonly listeners = new Set<TransitionListener>();
  private readonly lastTriggerMs = new Map<Milestone, number>();

  private currentRank = rankOf(NONE);
  private display: DisplayState = NONE;
  private elapsedMs = 0;
  private isNewRun = false;
  private runEpochStartMs: number;
  private lastResetAtMs: number | null = null;

  constructor(clock: Clock, options: RunStateMachineOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.softBand = options.softBand ?? DEFAULT_SOFT_BAND;
    if (rankOf(this.softBand.from) >= rankOf(this.softBand.before)) {
      throw new RangeError(
        `Soft band must open before it closes: ${this.softBand.from} >= ${this.softBand.before}`,
      );
    }
    this.runEpochStartMs = clock.nowMs();
  }

  get snapshot(): RunSnapshot {
    return Object.freeze({
      milestone: milestoneAtRank(this.currentRank),
      display: this.display,
      elapsedMs: this.elapsedMs,
      isNewRun: this.isNewRun,
      runEpochStartMs: this.runEpochStartMs,
    });
  }

  /**
   * Wall time of the last observed reset, or null before any.
   * Snapshot files last written before this belong to the previous run.
   */
  snapshotCutoffMs(): number | null {
    return this.lastResetAtMs;
  }

  onTransition(listener: TransitionListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  apply(event: DetectedEvent): TransitionOutcome {
    return this.applyPass([event])[0];
  }

  /**
   * Apply the events of one reconciliation pass in order.
   * A rank advance accepted in the pass wins over any soft display change
   * later in the same pass.
   */
  applyPass(events: readonly DetectedEvent[]): TransitionOutcome[] {
    const pass: PassState = { advanced: false };
    return events.map((event) => this.step(event, pass));
  }

  private step(event: DetectedEvent, pass: PassState): TransitionOutcome {
    const decision = this.decide(event, pass);
    if (decision.kind === 'ignore') {
      return { kind: 'ignored', event, reason: decision.reason };
    }

    const snapshot = this.snapshot;
    for (const listener of this.listeners) {
      listener(snapshot, event);
    }
    return { kind: 'accepted', event, snapshot };
  }

  private decide(event: DetectedEvent, pass: PassState): Decision {
    switch (event.kind) {
      case 'reset':
        return this.reset(event);
      case 'advance': {
        const decision = event.source === 'stream' ? this.streamAdvance(event) : this.snapshotAdvance(event);
        if (decision.kind === 'accept') pass.advanced = true;
        return decision;
      }
      case 'enrich':
        return this.enrich(event);
      case 'display':
        return this.showSoftState(event, pass);
      default:
        return assertNever(event);
    }
  }

  private reset(event: ResetEvent): Decision {
    if (this.currentRank === rankOf(NONE) && this.isNewRun) {
      return ignore('already_reset');
    }

    this.currentRank = rankOf(NONE);
    this.display = NONE;
    this.elapsedMs = 0;
    this.isNewRun = true;
    this.runEpochStartMs = event.observedAtMs;
    this.lastResetAtMs = event.observedAtMs;
    this.lastTriggerMs.clear();
    return ACCEPT;
  }

  private streamAdvance(event: AdvanceEvent): Decision {
    const lastTrigger = this.lastTriggerMs.get(event.milestone);
    if (lastTrigger !== undefined && event.observedAtMs - lastTrigger < this.cooldownMs) {
      return ignore('cooldown');
    }
    if (rankOf(event.milestone) <= this.currentRank) {
      return ignore('not_ahead');
    }

    this.lastTriggerMs.set(event.milestone, event.observedAtMs);
    this.advanceTo(event.milestone, 0);
    return ACCEPT;
  }

  private snapshotAdvance(event: AdvanceEvent): Decision {
    if (rankOf(event.milestone) <= this.currentRank) {
      return ignore('not_ahead');
    }

    this.advanceTo(event.milestone, event.elapsedMs ?? 0);
    return ACCEPT;
  }

  private enrich(event: EnrichEvent): Decision {
    if (event.milestone !== milestoneAtRank(this.currentRank)) return ignore('not_current');
    if (this.elapsedMs !== 0) return ignore('elapsed_known');
    if (event.elapsedMs <= 0) return ignore('no_elapsed');

    this.elapsedMs = event.elapsedMs;
    return ACCEPT;
  }

  private showSoftState(event: DisplayEvent, pass: PassState): Decision {
    if (pass.advanced) return ignore('superseded_in_pass');
    if (!isWithinBand(this.currentRank, this.softBand)) return ignore('out_of_band');
    if (this.display === event.state) return ignore('already_shown');

    this.display = event.state;
    return ACCEPT;
  }

  private advanceTo(milestone: Milestone, elapsedMs: number): void {
    this.currentRank = rankOf(milestone);
    this.display = milestone;
    this.elapsedMs = elapsedMs;
    this.isNewRun = false;
  }
}
