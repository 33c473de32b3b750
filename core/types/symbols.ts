/**
 * Declared argument counts of a command or environment.
 */
export interface Arity {
  optional: number;
  mandatory: number;
}

/** Compact `[optional, mandatory]` form used by the built-in table and config files */
export type ArityTuple = readonly [number, number];

export type ArityRecord = Record<string, Arity | ArityTuple>;

export const ZERO_ARITY: Arity = Object.freeze({ optional: 0, mandatory: 0 });
