import {assert} from '../../shared/src/asserts.ts';
import type {CompactCodec} from './compact-codec.ts';
import {compactHash} from './compact-hash.ts';
import {defaultCompactCodec} from './defaults.ts';
import {estimateCardinality} from './estimator.ts';
import {PrecisionMismatchError} from './errors.ts';
import {assertValidPrecision, maxRegisterValue} from './precision.ts';
import {
  EMPTY_REGISTERS,
  merge,
  registersEqual,
  update,
  type Registers,
} from './registers.ts';
import {addItems, registersFromEntries, standardError} from './sketch.ts';

/**
 * General purpose HyperLogLog sketch with a configurable precision between 8
 * and 16.
 *
 * Sketches are immutable values: `add`, `addAll` and `merge` return a new
 * sketch and never change the receiver.
 *
 * @example
 * ```typescript
 * let hll = new HyperLogLog(14);
 * hll = hll.add('foo').add('bar').add('bar');
 * hll.cardinality(); // 2
 *
 * const bytes = hll.encode();
 * HyperLogLog.decode(bytes).equals(hll); // true
 * ```
 */
export class HyperLogLog {
  readonly #precision: number;
  #registers: Registers = EMPTY_REGISTERS;

  /**
   * @param precision Number of index bits. The sketch has `2^precision`
   *   registers and a standard error of about `1.04 / sqrt(2^precision)`.
   */
  constructor(precision: number) {
    assertValidPrecision(precision);
    this.#precision = precision;
  }

  static #of(precision: number, registers: Registers): HyperLogLog {
    const hll = new HyperLogLog(precision);
    hll.#registers = registers;
    return hll;
  }

  /**
   * Builds a sketch from `(index, value)` pairs, e.g. registers read from
   * another system.
   */
  static fromRegisters(
    precision: number,
    entries: Iterable<readonly [number, number]>,
  ): HyperLogLog {
    assertValidPrecision(precision);
    return HyperLogLog.#of(
      precision,
      registersFromEntries(precision, maxRegisterValue(precision), entries),
    );
  }

  /**
   * Union of all `sketches`, which must share the same precision.
   */
  static merge(sketches: readonly HyperLogLog[]): HyperLogLog {
    assert(sketches.length > 0, 'Cannot merge an empty list of sketches');
    const precision = sketches[0].#precision;
    for (const hll of sketches) {
      if (hll.#precision !== precision) {
        throw new PrecisionMismatchError(precision, hll.#precision);
      }
    }
    return HyperLogLog.#of(
      precision,
      merge(sketches.map(hll => hll.#registers)),
    );
  }

  static decode(
    bytes: Uint8Array,
    codec: CompactCodec = defaultCompactCodec(),
  ): HyperLogLog {
    const {precision, registers} = codec.decode(bytes);
    return HyperLogLog.#of(precision, registers);
  }

  get precision(): number {
    return this.#precision;
  }

  get registers(): Registers {
    return this.#registers;
  }

  /** Number of non-empty registers. */
  get size(): number {
    return this.#registers.size;
  }

  isEmpty(): boolean {
    return this.#registers.size === 0;
  }

  add(item: unknown): HyperLogLog {
    const {index, value} = compactHash.hash(this.#precision, item);
    const registers = update(this.#registers, index, value);
    return registers === this.#registers
      ? this
      : HyperLogLog.#of(this.#precision, registers);
  }

  /**
   * Same result as calling {@link add} for every item, without allocating an
   * intermediate sketch per item.
   */
  addAll(items: Iterable<unknown>): HyperLogLog {
    const registers = addItems(
      compactHash,
      this.#precision,
      this.#registers,
      items,
    );
    return registers === this.#registers
      ? this
      : HyperLogLog.#of(this.#precision, registers);
  }

  /** Estimated number of distinct items added. */
  cardinality(): number {
    return estimateCardinality(
      this.#precision,
      this.#registers.size,
      this.#registers.values(),
    );
  }

  standardError(): number {
    return standardError(this.#precision);
  }

  equals(other: HyperLogLog): boolean {
    return (
      this.#precision === other.#precision &&
      registersEqual(this.#registers, other.#registers)
    );
  }

  encode(codec: CompactCodec = defaultCompactCodec()): Uint8Array {
    return codec.encode(this.#precision, this.#registers);
  }
}
