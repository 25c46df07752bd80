import type { Logger } from '../../core/logging/index.js';
import type { PresenceSink } from './presence-sink.js';
import type { PresenceView } from './presence-renderer.js';

/**
 * Writes presence changes to the log instead of Discord (`--no-discord`).
 */
export class LogPresenceSink implements PresenceSink {
  readonly name = 'log';

  constructor(private readonly logger: Logger) {}

  async show(view: PresenceView): Promise<boolean> {
    this.logger.info({ state: view.state, details: view.details, image: view.largeImageKey }, 'Presence');
    return true;
  }

  async clear(): Promise<void> {
    this.logger.info('Presence cleared');
  }

  async close(): Promise<void> {}
}
