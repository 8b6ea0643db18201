import {InvalidPrecisionError} from './errors.ts';

// "New cardinality estimation algorithms for HyperLogLog sketches" suggests a
// minimum precision of 8.
export const MIN_PRECISION = 8;
export const MAX_PRECISION = 16;

export function assertValidPrecision(precision: number): void {
  if (
    !Number.isInteger(precision) ||
    precision < MIN_PRECISION ||
    precision > MAX_PRECISION
  ) {
    throw new InvalidPrecisionError(precision, MIN_PRECISION, MAX_PRECISION);
  }
}

/**
 * Largest register value the XXH32 strategy can produce: 1 + the
 * `32 - precision` remaining hash bits + the 32 bits of the re-hash.
 */
export function maxRegisterValue(precision: number): number {
  return 1 + (32 - precision) + 32;
}
