import type { Clock } from '../../src/runtime/ports/clock.js';

/**
 * Manually stepped clock.
 */
export class FakeClock implements Clock {
  constructor(private currentMs = 1_700_000_000_000) {}

  nowMs(): number {
    return this.currentMs;
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  set(ms: number): void {
    this.currentMs = ms;
  }
}
