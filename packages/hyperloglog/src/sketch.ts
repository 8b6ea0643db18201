import {MalformedInputError} from './errors.ts';
import {RegisterBuilder, type Registers} from './registers.ts';
import type {HashStrategy} from './variant.ts';

/** Folds `items` into `registers`, copying them at most once. */
export function addItems(
  strategy: HashStrategy,
  precision: number,
  registers: Registers,
  items: Iterable<unknown>,
): Registers {
  let builder: RegisterBuilder | undefined;
  for (const item of items) {
    const {index, value} = strategy.hash(precision, item);
    if (builder === undefined) {
      const current = registers.get(index);
      if (current !== undefined && current >= value) {
        continue;
      }
      builder = new RegisterBuilder(registers);
    }
    builder.set(index, value);
  }
  return builder === undefined ? registers : builder.build();
}

/**
 * Builds registers from `(index, value)` pairs, rejecting indexes outside the
 * sketch and values the hash can never produce. Zero values are dropped and
 * repeated indexes keep the largest value.
 */
export function registersFromEntries(
  precision: number,
  maxValue: number,
  entries: Iterable<readonly [number, number]>,
): Registers {
  const m = 2 ** precision;
  const builder = new RegisterBuilder();
  for (const [index, value] of entries) {
    if (!Number.isInteger(index) || index < 0 || index >= m) {
      throw new MalformedInputError(
        `Register index ${index} is outside [0, ${m})`,
      );
    }
    if (!Number.isInteger(value) || value < 0 || value > maxValue) {
      throw new MalformedInputError(
        `Register value ${value} is outside [0, ${maxValue}]`,
      );
    }
    if (value > 0) {
      builder.set(index, value);
    }
  }
  return builder.build();
}

/** Relative standard error of the estimate, `1.04 / sqrt(2^precision)`. */
export function standardError(precision: number): number {
  return 1.04 / Math.sqrt(2 ** precision);
}
