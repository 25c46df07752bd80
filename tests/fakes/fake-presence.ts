import type { RunSnapshot } from '../../src/domain/splits/run-state-machine.js';
import type { SplitPublisher } from '../../src/infrastructure/presence/presence-publisher.js';
import type { PresenceSink } from '../../src/infrastructure/presence/presence-sink.js';
import type { PresenceView } from '../../src/infrastructure/presence/presence-renderer.js';

/**
 * Sink that remembers what it was asked to show. `rejectNext` makes the
 * following `show` calls report failure.
 */
export class FakePresenceSink implements PresenceSink {
  readonly name = 'fake';
  readonly shown: PresenceView[] = [];
  attempts = 0;
  clears = 0;
  closes = 0;
  rejectNext = 0;

  async show(view: PresenceView): Promise<boolean> {
    this.attempts += 1;
    if (this.rejectNext > 0) {
      this.rejectNext -= 1;
      return false;
    }
    this.shown.push(view);
    return true;
  }

  async clear(): Promise<void> {
    this.clears += 1;
  }

  async close(): Promise<void> {
    this.closes += 1;
  }
}

/**
 * Publisher that records snapshots. `failNext` makes the following publishes throw.
 */
export class RecordingPublisher implements SplitPublisher {
  readonly published: RunSnapshot[] = [];
  clears = 0;
  closes = 0;
  failNext = 0;
  needsRetry = false;

  async publish(snapshot: RunSnapshot): Promise<void> {
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new Error('publish failed');
    }
    this.published.push(snapshot);
  }

  async clear(): Promise<void> {
    this.clears += 1;
  }

  async close(): Promise<void> {
    this.closes += 1;
  }
}
