import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

export class ProcessTerminationRequested extends Error {
  constructor(readonly code: ExitCode) {
    super(`process termination requested (${code.kind})`);
    this.name = 'ProcessTerminationRequested';
  }
}

/**
 * Test adapter: turns an exit into an exception the test can assert on.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new ProcessTerminationRequested(code);
  }
}
