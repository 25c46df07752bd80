/**
 * Ends the process. Entrypoints only.
 */
export type ExitCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' }
  | { readonly kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
