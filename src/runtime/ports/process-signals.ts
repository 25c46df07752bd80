/**
 * Signals that ask the tracker to stop. `process.on` stays behind this port
 * so commands can be driven from tests.
 */
export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export type Unsubscribe = () => void;

export interface ProcessSignals {
  on(signal: ShutdownSignal, handler: () => void): Unsubscribe;
}
