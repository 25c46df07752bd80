/**
 * Nominal marker for values that passed a parser ("parse, don't validate").
 *
 * A string key rather than a `unique symbol`, so exported zod schemas that
 * produce branded values stay nameable in declaration output. Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
