/**
 * Wall-clock port.
 *
 * The run state machine takes its time from here so tests can step through
 * cooldown windows without sleeping.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch. */
  nowMs(): number;
}
