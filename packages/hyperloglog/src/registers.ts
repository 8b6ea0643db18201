/**
 * Registers are kept sparse: a bucket index that is absent from the map holds
 * zero, and a present index always holds a value >= 1.
 */
export type Registers = ReadonlyMap<number, number>;

export const EMPTY_REGISTERS: Registers = new Map();

/**
 * Mutable accumulator with per-index max semantics. Used internally while a
 * new register set is being assembled; callers only ever see the frozen
 * {@link Registers} returned by {@link build}.
 */
export class RegisterBuilder {
  #map: Map<number, number> | undefined;

  constructor(initial: Registers = EMPTY_REGISTERS) {
    this.#map = new Map(initial);
  }

  get size(): number {
    return this.#live().size;
  }

  has(index: number): boolean {
    return this.#live().has(index);
  }

  /**
   * Raises register `index` to `value`. Returns false if the register already
   * held `value` or more.
   */
  set(index: number, value: number): boolean {
    const map = this.#live();
    const current = map.get(index);
    if (current !== undefined && current >= value) {
      return false;
    }
    map.set(index, value);
    return true;
  }

  build(): Registers {
    const map = this.#live();
    this.#map = undefined;
    return map;
  }

  #live(): Map<number, number> {
    if (this.#map === undefined) {
      throw new Error('RegisterBuilder has already been built');
    }
    return this.#map;
  }
}

/**
 * Returns `registers` with register `index` raised to `value`. The input is
 * returned unchanged when it already holds `value` or more.
 */
export function update(
  registers: Registers,
  index: number,
  value: number,
): Registers {
  const current = registers.get(index);
  if (current !== undefined && current >= value) {
    return registers;
  }
  const builder = new RegisterBuilder(registers);
  builder.set(index, value);
  return builder.build();
}

/**
 * Per-index max of all `maps`. The largest map is copied once and the others
 * are folded into it, smallest last.
 */
export function merge(maps: readonly Registers[]): Registers {
  if (maps.length === 0) {
    return EMPTY_REGISTERS;
  }
  const [largest, ...rest] = [...maps].sort((a, b) => b.size - a.size);
  const builder = new RegisterBuilder(largest);
  for (const map of rest) {
    for (const [index, value] of map) {
      builder.set(index, value);
    }
  }
  return builder.build();
}

export function registersEqual(a: Registers, b: Registers): boolean {
  if (a === b) {
    return true;
  }
  if (a.size !== b.size) {
    return false;
  }
  for (const [index, value] of a) {
    if (b.get(index) !== value) {
      return false;
    }
  }
  return true;
}

/** Register entries in ascending index order. */
export function sortedEntries(registers: Registers): [number, number][] {
  return [...registers].sort((a, b) => a[0] - b[0]);
}
