/**
 * Vitest setup file
 * Runs before every test file.
 */

// Required for tsyringe DI decorators
import 'reflect-metadata';

import { afterAll } from 'vitest';
import { resetContainer } from '../src/di/container.js';

afterAll(() => {
  resetContainer();
});

// NOTE: Do not register process-level signal handlers in tests.
// Vitest owns the process lifecycle; cleanup happens via test hooks.
