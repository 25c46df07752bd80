/**
 * How the current process runs. Injected, never sniffed from env inside
 * services.
 */
export type RuntimeMode =
  | { readonly kind: 'production' }
  | { readonly kind: 'test' };
