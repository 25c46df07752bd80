import type { ProcessSignals, ShutdownSignal, Unsubscribe } from '../ports/process-signals.js';

/**
 * Node adapter. The signal name Node passes to the handler is dropped.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ShutdownSignal, handler: () => void): Unsubscribe {
    const listener = (): void => handler();
    process.on(signal, listener);
    return () => {
      process.off(signal, listener);
    };
  }
}

/**
 * Test-mode adapter: nothing is installed on the real process.
 */
export class DetachedProcessSignals implements ProcessSignals {
  on(_signal: ShutdownSignal, _handler: () => void): Unsubscribe {
    return () => undefined;
  }
}
