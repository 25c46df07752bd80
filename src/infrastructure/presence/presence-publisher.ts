import type { Logger } from '../../core/logging/index.js';
import type { RunSnapshot } from '../../domain/splits/run-state-machine.js';
import type { PresenceSink } from './presence-sink.js';
import type { PresenceView } from './presence-renderer.js';
import { renderPresence, sameView } from './presence-renderer.js';

/**
 * Consumer of accepted run transitions. The tracker calls it serially.
 */
export interface SplitPublisher {
  publish(snapshot: RunSnapshot): Promise<void>;
  /** The last publish did not reach the display and should be repeated. */
  readonly needsRetry: boolean;
  /** Forget what was shown and blank the display. */
  clear(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Renders snapshots and forwards views that differ from the last one shown.
 * A view only counts as shown once the sink accepted it.
 */
export class PresencePublisher implements SplitPublisher {
  private lastShown: PresenceView | null = null;
  private stale = false;

  constructor(
    private readonly sink: PresenceSink,
    private readonly logger: Logger,
  ) {}

  get current(): PresenceView | null {
    return this.lastShown;
  }

  get needsRetry(): boolean {
    return this.stale;
  }

  async publish(snapshot: RunSnapshot): Promise<void> {
    const view = renderPresence(snapshot);
    if (this.lastShown && sameView(this.lastShown, view)) {
      this.logger.debug({ state: view.state }, 'Presence unchanged, skipping');
      return;
    }

    this.stale = true;
    if (await this.sink.show(view)) {
      this.lastShown = view;
      this.stale = false;
    }
  }

  async clear(): Promise<void> {
    this.lastShown = null;
    this.stale = false;
    await this.sink.clear();
  }

  async close(): Promise<void> {
    await this.sink.close();
  }
}
