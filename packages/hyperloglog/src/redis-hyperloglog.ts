import {assert} from '../../shared/src/asserts.ts';
import {defaultRedisCodec} from './defaults.ts';
import {estimateCardinality} from './estimator.ts';
import type {RedisCodec} from './redis-codec.ts';
import {
  REDIS_PRECISION,
  REDIS_SATURATED_VALUE,
  redisHash,
} from './redis-hash.ts';
import {
  EMPTY_REGISTERS,
  merge,
  registersEqual,
  update,
  type Registers,
} from './registers.ts';
import {addItems, registersFromEntries, standardError} from './sketch.ts';

/**
 * HyperLogLog sketch that is interchangeable with Redis: same hash
 * (MurmurHash64A), same estimator and the same serialized form as the value
 * of a key written by `PFADD`.
 *
 * Precision is fixed at 14 (16384 registers).
 *
 * @example
 * ```typescript
 * const hll = new RedisHyperLogLog().add('hello');
 * await redis.set('visitors', Buffer.from(hll.encode()));
 * await redis.pfcount('visitors'); // 1
 * ```
 */
export class RedisHyperLogLog {
  static readonly PRECISION = REDIS_PRECISION;

  #registers: Registers = EMPTY_REGISTERS;

  static #of(registers: Registers): RedisHyperLogLog {
    const hll = new RedisHyperLogLog();
    hll.#registers = registers;
    return hll;
  }

  static fromRegisters(
    entries: Iterable<readonly [number, number]>,
  ): RedisHyperLogLog {
    return RedisHyperLogLog.#of(
      registersFromEntries(REDIS_PRECISION, REDIS_SATURATED_VALUE, entries),
    );
  }

  /** Equivalent to `PFMERGE`. */
  static merge(sketches: readonly RedisHyperLogLog[]): RedisHyperLogLog {
    assert(sketches.length > 0, 'Cannot merge an empty list of sketches');
    return RedisHyperLogLog.#of(merge(sketches.map(hll => hll.#registers)));
  }

  /** Reads the value of a Redis HyperLogLog key, sparse or dense. */
  static decode(
    bytes: Uint8Array,
    codec: RedisCodec = defaultRedisCodec(),
  ): RedisHyperLogLog {
    return RedisHyperLogLog.#of(codec.decode(bytes).registers);
  }

  get precision(): number {
    return REDIS_PRECISION;
  }

  get registers(): Registers {
    return this.#registers;
  }

  get size(): number {
    return this.#registers.size;
  }

  isEmpty(): boolean {
    return this.#registers.size === 0;
  }

  /**
   * Strings and byte arrays are hashed as the bytes Redis would receive.
   * Other values are converted first, see {@link toRedisBytes}.
   */
  add(item: unknown): RedisHyperLogLog {
    const {index, value} = redisHash.hash(REDIS_PRECISION, item);
    const registers = update(this.#registers, index, value);
    return registers === this.#registers
      ? this
      : RedisHyperLogLog.#of(registers);
  }

  addAll(items: Iterable<unknown>): RedisHyperLogLog {
    const registers = addItems(
      redisHash,
      REDIS_PRECISION,
      this.#registers,
      items,
    );
    return registers === this.#registers
      ? this
      : RedisHyperLogLog.#of(registers);
  }

  /** Same value `PFCOUNT` reports for the equivalent key. */
  cardinality(): number {
    return estimateCardinality(
      REDIS_PRECISION,
      this.#registers.size,
      this.#registers.values(),
    );
  }

  standardError(): number {
    return standardError(REDIS_PRECISION);
  }

  equals(other: RedisHyperLogLog): boolean {
    return registersEqual(this.#registers, other.#registers);
  }

  encode(codec: RedisCodec = defaultRedisCodec()): Uint8Array {
    return codec.encode(REDIS_PRECISION, this.#registers);
  }
}
