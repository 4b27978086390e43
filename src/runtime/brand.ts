/**
 * A branded type proves parsing happened at a boundary (config, CLI args).
 * String-keyed marker so exported zod-derived types stay nameable.
 * Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
