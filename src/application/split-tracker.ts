import type { Logger } from '../core/logging/index.js';
import type { Clock } from '../runtime/ports/clock.js';
import { assertNever } from '../runtime/assert-never.js';
import { abortableSleep } from '../runtime/abortable-sleep.js';
import type { PatternTable } from '../domain/splits/pattern-table.js';
import type { DetectedEvent } from '../domain/splits/detected-event.js';
import type { RunSnapshot, RunStateMachine, TransitionOutcome } from '../domain/splits/run-state-machine.js';
import type { SnapshotObservation } from '../infrastructure/snapshot/snapshot-reader.js';
import { toSnapshotEvents } from '../infrastructure/snapshot/snapshot-reader.js';
import type { SplitPublisher } from '../infrastructure/presence/presence-publisher.js';

/** New complete lines since the previous poll. */
export interface LineSource {
  initialize(): Promise<void>;
  poll(): Promise<string[]>;
}

/** Latest snapshot not older than `cutoffMs`, or null for "no data". */
export interface SnapshotSource {
  read(cutoffMs: number | null): Promise<SnapshotObservation | null>;
}

export interface SplitTrackerDeps {
  readonly machine: RunStateMachine;
  readonly patterns: PatternTable;
  readonly lines: LineSource;
  readonly snapshots: SnapshotSource;
  readonly publisher: SplitPublisher;
  readonly clock: Clock;
  readonly logger: Logger;
}

export interface SplitTrackerConfig {
  readonly streamPollMs: number;
  readonly snapshotPollMs: number;
}

export const DEFAULT_TRACKER_CONFIG: SplitTrackerConfig = {
  streamPollMs: 100,
  snapshotPollMs: 1_000,
};

type TrackerState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'running'; readonly abort: AbortController; readonly loops: Promise<void> }
  | { readonly kind: 'stopping'; readonly done: Promise<void> }
  | { readonly kind: 'stopped' };

function describeEvent(event: DetectedEvent): Record<string, unknown> {
  switch (event.kind) {
    case 'reset':
      return { kind: event.kind, source: event.source };
    case 'advance':
      return { kind: event.kind, source: event.source, milestone: event.milestone, elapsedMs: event.elapsedMs };
    case 'enrich':
      return { kind: event.kind, source: event.source, milestone: event.milestone, elapsedMs: event.elapsedMs };
    case 'display':
      return { kind: event.kind, source: event.source, state: event.state };
    default:
      return assertNever(event);
  }
}

/**
 * Runs the two poll loops against one state machine and forwards accepted
 * transitions to the publisher in order.
 *
 * Sources are read outside the transition; each poll's events go through a
 * single `applyPass`, so a reader suspended on I/O never holds up the other
 * loop's transitions.
 */
export class SplitTracker {
  private readonly config: SplitTrackerConfig;
  private state: TrackerState = { kind: 'idle' };
  private publishChain: Promise<void> = Promise.resolve();
  private readonly unsubscribe: () => void;

  constructor(
    private readonly deps: SplitTrackerDeps,
    config: Partial<SplitTrackerConfig> = {},
  ) {
    this.config = { ...DEFAULT_TRACKER_CONFIG, ...config };
    this.unsubscribe = deps.machine.onTransition((snapshot) => this.enqueuePublish(snapshot));
  }

  get running(): boolean {
    return this.state.kind === 'running';
  }

  /**
   * Positions the stream at end-of-file, publishes the starting state and
   * launches both loops. Resolves once the loops are running.
   */
  async start(): Promise<void> {
    if (this.state.kind !== 'idle') {
      throw new Error(`SplitTracker cannot start from state '${this.state.kind}'`);
    }

    await this.deps.lines.initialize();
    this.enqueuePublish(this.deps.machine.snapshot);

    const abort = new AbortController();
    const loops = Promise.all([
      this.loop('stream', this.config.streamPollMs, () => this.pollStreamOnce(), abort.signal),
      this.loop('snapshot', this.config.snapshotPollMs, () => this.snapshotTick(), abort.signal),
    ]).then(() => undefined);

    this.state = { kind: 'running', abort, loops };
    this.deps.logger.info(
      { streamPollMs: this.config.streamPollMs, snapshotPollMs: this.config.snapshotPollMs },
      'Split tracker started',
    );
  }

  /**
   * Stops both loops at their next sleep boundary, drains pending publishes,
   * then clears and closes the publisher. Safe to call more than once.
   */
  stop(): Promise<void> {
    switch (this.state.kind) {
      case 'stopped':
        return Promise.resolve();
      case 'stopping':
        return this.state.done;
      case 'idle':
      case 'running': {
        const loops = this.state.kind === 'running' ? this.state.loops : Promise.resolve();
        if (this.state.kind === 'running') this.state.abort.abort();
        const done = this.shutdown(loops);
        this.state = { kind: 'stopping', done };
        return done;
      }
      default:
        return assertNever(this.state);
    }
  }

  async pollStreamOnce(): Promise<TransitionOutcome[]> {
    const lines = await this.deps.lines.poll();
    if (lines.length === 0) return [];

    const now = this.deps.clock.nowMs();
    const events: DetectedEvent[] = [];
    for (const line of lines) {
      const event = this.deps.patterns.match(line, now);
      if (event) events.push(event);
    }
    return this.applyPass(events);
  }

  async pollSnapshotOnce(): Promise<TransitionOutcome[]> {
    const observation = await this.deps.snapshots.read(this.deps.machine.snapshotCutoffMs());
    if (!observation) return [];

    // A reset may have been applied while the read was in flight.
    const cutoffMs = this.deps.machine.snapshotCutoffMs();
    if (cutoffMs !== null && observation.mtimeMs < cutoffMs) {
      this.deps.logger.debug(
        { filePath: observation.filePath, mtimeMs: observation.mtimeMs, cutoffMs },
        'Snapshot predates a reset seen during the read, ignoring',
      );
      return [];
    }
    return this.applyPass(toSnapshotEvents(observation.splits, this.deps.clock.nowMs()));
  }

  /**
   * Re-publishes the current state when the last publish did not reach the
   * display, e.g. Discord was not running yet.
   */
  refreshPresence(): void {
    if (this.deps.publisher.needsRetry) {
      this.enqueuePublish(this.deps.machine.snapshot);
    }
  }

  /** Resolves when every publish enqueued so far has settled. */
  flush(): Promise<void> {
    return this.publishChain;
  }

  private async snapshotTick(): Promise<TransitionOutcome[]> {
    const outcomes = await this.pollSnapshotOnce();
    this.refreshPresence();
    return outcomes;
  }

  private applyPass(events: readonly DetectedEvent[]): TransitionOutcome[] {
    if (events.length === 0) return [];
    const outcomes = this.deps.machine.applyPass(events);
    for (const outcome of outcomes) {
      if (outcome.kind === 'accepted') {
        this.deps.logger.info(
          { event: describeEvent(outcome.event), display: outcome.snapshot.display, elapsedMs: outcome.snapshot.elapsedMs },
          'Run state changed',
        );
      } else {
        this.deps.logger.debug({ event: describeEvent(outcome.event), reason: outcome.reason }, 'Event ignored');
      }
    }
    return outcomes;
  }

  private enqueuePublish(snapshot: RunSnapshot): void {
    this.publishChain = this.publishChain
      .then(() => this.deps.publisher.publish(snapshot))
      .catch((error: unknown) => {
        this.deps.logger.error({ err: error, display: snapshot.display }, 'Presence publish failed');
      });
  }

  private async loop(
    name: string,
    intervalMs: number,
    pollOnce: () => Promise<TransitionOutcome[]>,
    signal: AbortSignal,
  ): Promise<void> {
    while (!signal.aborted) {
      try {
        await pollOnce();
      } catch (error) {
        this.deps.logger.error({ err: error, loop: name }, 'Poll failed');
      }
      await abortableSleep(intervalMs, signal);
    }
    this.deps.logger.debug({ loop: name }, 'Poll loop exited');
  }

  private async shutdown(loops: Promise<void>): Promise<void> {
    await loops;
    this.unsubscribe();
    await this.publishChain;

    try {
      await this.deps.publisher.clear();
    } catch (error) {
      this.deps.logger.warn({ err: error }, 'Presence clear failed');
    }
    try {
      await this.deps.publisher.close();
    } catch (error) {
      this.deps.logger.warn({ err: error }, 'Presence close failed');
    }

    this.state = { kind: 'stopped' };
    this.deps.logger.info('Split tracker stopped');
  }
}
