declare const brand: unique symbol

/** Nominal tag over a primitive so ids of different kinds don't mix. */
export type Brand<T, B extends string> = T & { readonly [brand]: B }
