export interface Clock {
  /** Epoch milliseconds. */
  now(): number;
}

/** Uniform random source in [0, 1). */
export interface Rng {
  next(): number;
}
