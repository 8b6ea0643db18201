import xxh from 'xxhashjs';
import {stringifyJSON} from './json.ts';
import type {HashStrategy, RegisterUpdate} from './variant.ts';

const SEED = 0x9747b28c;

/**
 * Serializes an item to a string for hashing. Different types get different
 * prefixes so that e.g. the number 42 and the string "42" land in different
 * registers.
 */
export function serialize(item: unknown): string {
  if (item === null) return '\0null';
  if (item === undefined) return '\0undefined';

  switch (typeof item) {
    case 'string':
      return `s:${item}`;
    case 'number':
      return `n:${item}`;
    case 'boolean':
      return `b:${item}`;
    case 'bigint':
      return `i:${item}`;
  }

  if (item instanceof Uint8Array) {
    return `u:${toHex(item)}`;
  }
  return `j:${stringifyJSON(item)}`;
}

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join('');
}

function hash32(key: string): number {
  return xxh.h32(key, SEED).toNumber() >>> 0;
}

/**
 * Splits a 32 bit hash into a register index (the top `precision` bits) and
 * a count of 1 + the leading zeros of the remaining bits. When the remaining
 * bits are all zero the scan continues into `rehash()`, so the largest
 * possible count is `1 + (32 - precision) + 32`.
 */
export function registerFromHash(
  precision: number,
  hash: number,
  rehash: () => number,
): RegisterUpdate {
  const index = hash >>> (32 - precision);
  const rest = (hash << precision) >>> 0;
  if (rest !== 0) {
    return {index, value: Math.clz32(rest) + 1};
  }
  return {index, value: 32 - precision + Math.clz32(rehash()) + 1};
}

/**
 * XXH32 based strategy used by {@link HyperLogLog}. The exact bits are
 * internal to this library and only need to be stable.
 */
export const compactHash: HashStrategy = {
  hash(precision: number, item: unknown): RegisterUpdate {
    return registerFromHash(precision, hash32(serialize(item)), () =>
      hash32(serialize([item])),
    );
  },
};
