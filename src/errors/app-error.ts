import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type LogNotFoundError = Readonly<{
  readonly _tag: 'LogNotFound';
  readonly searched: readonly string[];
  readonly message: string;
}>;

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | LogNotFoundError | StartupFailedError | UnexpectedError;

/**
 * Branded config type: proves it came through loadConfig.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
