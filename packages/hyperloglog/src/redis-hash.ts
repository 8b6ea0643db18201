import {stringifyJSON} from './json.ts';
import type {HashStrategy, RegisterUpdate} from './variant.ts';

const SEED = 0xadc83b19n;
const M = 0xc6a4a7935bd1e995n;
const R = 47n;

export const REDIS_PRECISION = 14;
/** Register value recorded when all 50 hash bits above the index are zero. */
export const REDIS_SATURATED_VALUE = 51;

const INDEX_MASK = (1n << BigInt(REDIS_PRECISION)) - 1n;

const textEncoder = new TextEncoder();

function mul64(a: bigint, b: bigint): bigint {
  return BigInt.asUintN(64, a * b);
}

/**
 * MurmurHash64A, as used by the Redis HyperLogLog implementation. The input
 * is consumed in little endian 8 byte blocks and the result is an unsigned
 * 64 bit value.
 */
export function murmurHash64A(data: Uint8Array, seed = SEED): bigint {
  const len = data.length;
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  let h = BigInt.asUintN(64, seed ^ mul64(BigInt(len), M));

  const blocks = len - (len % 8);
  for (let offset = 0; offset < blocks; offset += 8) {
    let k = view.getBigUint64(offset, true);
    k = mul64(k, M);
    k ^= k >> R;
    k = mul64(k, M);
    h ^= k;
    h = mul64(h, M);
  }

  if (blocks < len) {
    let tail = 0n;
    for (let i = len - 1; i >= blocks; i--) {
      tail = (tail << 8n) | BigInt(data[i]);
    }
    h = mul64(h ^ tail, M);
  }

  h ^= h >> R;
  h = mul64(h, M);
  h ^= h >> R;
  return h;
}

/**
 * Bytes hashed for an item. Strings are UTF-8 encoded and byte arrays are used
 * as is. Numbers, bigints and booleans are rendered the way a Redis client
 * sends them (`String(item)`), anything else as JSON text with bigints
 * written as `"<digits>n"`.
 */
export function toRedisBytes(item: unknown): Uint8Array {
  if (item instanceof Uint8Array) {
    return item;
  }
  switch (typeof item) {
    case 'string':
      return textEncoder.encode(item);
    case 'number':
    case 'bigint':
    case 'boolean':
      return textEncoder.encode(String(item));
  }
  return textEncoder.encode(stringifyJSON(item) ?? String(item));
}

/**
 * The low 14 bits of the hash select the register. The count is 1 + the
 * number of trailing zeros of the remaining 50 bits, or 51 if they are all
 * zero.
 */
export function registerFromHash64(hash: bigint): RegisterUpdate {
  const index = Number(hash & INDEX_MASK);
  let rest = hash >> BigInt(REDIS_PRECISION);
  if (rest === 0n) {
    return {index, value: REDIS_SATURATED_VALUE};
  }
  let value = 1;
  while ((rest & 1n) === 0n) {
    rest >>= 1n;
    value++;
  }
  return {index, value};
}

export const redisHash: HashStrategy = {
  hash(_precision: number, item: unknown): RegisterUpdate {
    return registerFromHash64(murmurHash64A(toRedisBytes(item)));
  },
};
