import type { PresenceView } from './presence-renderer.js';

/**
 * Where a rendered presence ends up. Sinks never throw: a failed `show`
 * returns false and the publisher will try again on the next change.
 */
export interface PresenceSink {
  readonly name: string;
  show(view: PresenceView): Promise<boolean>;
  clear(): Promise<void>;
  close(): Promise<void>;
}
