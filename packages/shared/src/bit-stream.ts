import {assert} from './asserts.ts';

/**
 * Packs unsigned integers of arbitrary width (1-24 bits) into bytes, most
 * significant bit first. Fields may straddle byte boundaries.
 */
export class BitWriter {
  readonly #bytes: number[] = [];
  #current = 0;
  #used = 0;

  /** Total number of bits written so far. */
  get bitLength(): number {
    return this.#bytes.length * 8 + this.#used;
  }

  write(value: number, width: number): void {
    assert(width > 0 && width <= 24, () => `Invalid field width ${width}`);
    assert(
      value >= 0 && value < 1 << width,
      () => `Value ${value} does not fit in ${width} bits`,
    );
    let remaining = width;
    while (remaining > 0) {
      const free = 8 - this.#used;
      const take = Math.min(free, remaining);
      const chunk = (value >>> (remaining - take)) & ((1 << take) - 1);
      this.#current |= chunk << (free - take);
      this.#used += take;
      remaining -= take;
      if (this.#used === 8) {
        this.#bytes.push(this.#current);
        this.#current = 0;
        this.#used = 0;
      }
    }
  }

  /**
   * Returns the written bytes. The stream must end on a byte boundary; callers
   * that need padding write it explicitly.
   */
  finish(): Uint8Array {
    assert(
      this.#used === 0,
      () => `Bit stream is not byte aligned (${this.#used} dangling bits)`,
    );
    return Uint8Array.from(this.#bytes);
  }
}

/**
 * Reads MSB-first bit fields out of a byte array, the inverse of
 * {@link BitWriter}.
 */
export class BitReader {
  readonly #bytes: Uint8Array;
  #pos: number;

  constructor(bytes: Uint8Array, byteOffset = 0) {
    assert(byteOffset >= 0 && byteOffset <= bytes.length);
    this.#bytes = bytes;
    this.#pos = byteOffset * 8;
  }

  /** Number of unread bits. */
  get remaining(): number {
    return this.#bytes.length * 8 - this.#pos;
  }

  read(width: number): number {
    assert(width > 0 && width <= 24, () => `Invalid field width ${width}`);
    assert(
      width <= this.remaining,
      () => `Cannot read ${width} bits, only ${this.remaining} left`,
    );
    let result = 0;
    let remaining = width;
    while (remaining > 0) {
      const byte = this.#bytes[this.#pos >>> 3];
      const avail = 8 - (this.#pos & 7);
      const take = Math.min(avail, remaining);
      const chunk = (byte >>> (avail - take)) & ((1 << take) - 1);
      result = (result << take) | chunk;
      this.#pos += take;
      remaining -= take;
    }
    return result;
  }
}
