import type { ShutdownSignal, Unsubscribe } from './process-signals.js';

export type ShutdownEvent = { readonly kind: 'shutdown_requested'; readonly signal: ShutdownSignal };

/**
 * Typed "please stop" bus. Services listen; only the entrypoint decides
 * how the process ends.
 */
export interface ShutdownEvents {
  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe;
  emit(event: ShutdownEvent): void;
}
