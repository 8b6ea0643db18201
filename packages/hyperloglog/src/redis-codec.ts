import type {LogContext} from '@rocicorp/logger';
import {MalformedInputError} from './errors.ts';
import {REDIS_PRECISION, REDIS_SATURATED_VALUE} from './redis-hash.ts';
import {
  RegisterBuilder,
  sortedEntries,
  type Registers,
} from './registers.ts';
import type {DecodedSketch, SketchCodec} from './variant.ts';

// The Redis HyperLogLog string layout (see hyperloglog.c in Redis):
//
//   +------+------+----------+--------------------------------+
//   | HYLL | mode | 10 x 0x0 | 0x80 |  body ...                |
//   +------+------+----------+--------------------------------+
//
// Bytes 8-15 hold the cached cardinality in Redis; we always mark the cache
// as invalid (MSB of byte 15) and ignore it when reading.

const REGISTER_COUNT = 1 << REDIS_PRECISION;
export const HEADER_SIZE = 16;
export const DENSE_SIZE = HEADER_SIZE + (REGISTER_COUNT * 6) / 8;

const MAGIC = [0x48, 0x59, 0x4c, 0x4c]; // "HYLL"
const CACHE_INVALID = 0x80;

enum Mode {
  Dense = 0,
  Sparse = 1,
}

// Sparse opcodes:
//
//   ZERO:  00xxxxxx           run of 1-64 empty registers
//   XZERO: 01xxxxxx xxxxxxxx  run of 1-16384 empty registers
//   VAL:   1vvvvvxx           run of 1-4 registers holding value 1-32
const ZERO_MAX_LEN = 64;
const VAL_MAX_VALUE = 32;
const VAL_MAX_LEN = 4;

/** Matches the Redis default of ~3000 bytes of sparse representation. */
export const DEFAULT_SPARSE_MAX_REGISTERS = 2000;

export type RedisCodecOptions = {
  /**
   * Sketches with more populated registers than this are always encoded
   * dense.
   */
  sparseMaxRegisters: number;
};

function header(mode: Mode): number[] {
  return [...MAGIC, mode, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, CACHE_INVALID];
}

function pushZeros(out: number[], len: number): void {
  if (len <= 0) {
    return;
  }
  const code = len - 1;
  if (len <= ZERO_MAX_LEN) {
    out.push(code);
  } else {
    out.push(0x40 | (code >>> 8), code & 0xff);
  }
}

/**
 * Reads and writes the sketch in the exact byte layout Redis uses for `GET`
 * and `SET`/`RESTORE` of a HyperLogLog key, so sketches can be exchanged with
 * `PFADD`, `PFCOUNT` and `PFMERGE`.
 */
export class RedisCodec implements SketchCodec {
  readonly #lc: LogContext;
  readonly #sparseMaxRegisters: number;

  constructor(
    lc: LogContext,
    options: RedisCodecOptions = {
      sparseMaxRegisters: DEFAULT_SPARSE_MAX_REGISTERS,
    },
  ) {
    this.#lc = lc.withContext('codec', 'redis');
    this.#sparseMaxRegisters = options.sparseMaxRegisters;
  }

  encode(_precision: number, registers: Registers): Uint8Array {
    if (registers.size > this.#sparseMaxRegisters) {
      this.#lc.debug?.(
        `${registers.size} registers exceed the sparse limit of ${
          this.#sparseMaxRegisters
        }, encoding dense`,
      );
      return encodeDense(registers);
    }
    const sparse = encodeSparse(registers);
    if (sparse === undefined) {
      this.#lc.debug?.(
        `register value above ${VAL_MAX_VALUE}, falling back to dense`,
      );
      return encodeDense(registers);
    }
    return sparse;
  }

  decode(bytes: Uint8Array): DecodedSketch {
    if (bytes.length < HEADER_SIZE) {
      throw new MalformedInputError(
        `Expected at least ${HEADER_SIZE} header bytes, got ${bytes.length}`,
      );
    }
    for (let i = 0; i < MAGIC.length; i++) {
      if (bytes[i] !== MAGIC[i]) {
        throw new MalformedInputError('Missing HYLL magic');
      }
    }
    const mode = bytes[MAGIC.length];
    switch (mode) {
      case Mode.Sparse:
        this.#lc.debug?.(`decoding ${bytes.length} byte sparse sketch`);
        return {precision: REDIS_PRECISION, registers: decodeSparse(bytes)};
      case Mode.Dense:
        this.#lc.debug?.(`decoding dense sketch`);
        return {precision: REDIS_PRECISION, registers: decodeDense(bytes)};
      default:
        throw new MalformedInputError(`Unknown encoding mode ${mode}`);
    }
  }
}

/**
 * Returns undefined if some register holds a value that a VAL opcode cannot
 * represent.
 */
function encodeSparse(registers: Registers): Uint8Array | undefined {
  const entries = sortedEntries(registers);
  const out = header(Mode.Sparse);
  let prev = -1;
  let i = 0;
  while (i < entries.length) {
    const [index, value] = entries[i];
    if (value > VAL_MAX_VALUE) {
      return undefined;
    }
    pushZeros(out, index - prev - 1);

    let run = 1;
    while (
      run < VAL_MAX_LEN &&
      i + run < entries.length &&
      entries[i + run][0] === index + run &&
      entries[i + run][1] === value
    ) {
      run++;
    }
    out.push(0x80 | ((value - 1) << 2) | (run - 1));

    prev = index + run - 1;
    i += run;
  }
  pushZeros(out, REGISTER_COUNT - prev - 1);
  return Uint8Array.from(out);
}

function decodeSparse(bytes: Uint8Array): Registers {
  const builder = new RegisterBuilder();
  let index = 0;
  let pos = HEADER_SIZE;
  while (pos < bytes.length) {
    const op = bytes[pos];
    if (op & 0x80) {
      const value = ((op >>> 2) & 0x1f) + 1;
      const len = (op & 0x03) + 1;
      if (index + len > REGISTER_COUNT) {
        throw new MalformedInputError(`VAL opcode at byte ${pos} overruns`);
      }
      for (let j = 0; j < len; j++) {
        builder.set(index + j, value);
      }
      index += len;
      pos++;
    } else if (op & 0x40) {
      if (pos + 1 >= bytes.length) {
        throw new MalformedInputError(`Truncated XZERO opcode at byte ${pos}`);
      }
      index += (((op & 0x3f) << 8) | bytes[pos + 1]) + 1;
      pos += 2;
    } else {
      index += (op & 0x3f) + 1;
      pos++;
    }
    if (index > REGISTER_COUNT) {
      throw new MalformedInputError(
        `Sparse opcodes describe more than ${REGISTER_COUNT} registers`,
      );
    }
  }
  if (index !== REGISTER_COUNT) {
    throw new MalformedInputError(
      `Sparse opcodes describe ${index} of ${REGISTER_COUNT} registers`,
    );
  }
  return builder.build();
}

// Registers are 6 bits wide and stored least significant bit first, so four
// registers share three bytes:
//
//   +--------+--------+--------+
//   |11000000|22221111|33333322|
//   +--------+--------+--------+
function encodeDense(registers: Registers): Uint8Array {
  const out = new Uint8Array(DENSE_SIZE);
  out.set(header(Mode.Dense));
  let pos = HEADER_SIZE;
  for (let index = 0; index < REGISTER_COUNT; index += 4) {
    const r0 = registers.get(index) ?? 0;
    const r1 = registers.get(index + 1) ?? 0;
    const r2 = registers.get(index + 2) ?? 0;
    const r3 = registers.get(index + 3) ?? 0;
    out[pos++] = r0 | ((r1 & 0x03) << 6);
    out[pos++] = (r1 >>> 2) | ((r2 & 0x0f) << 4);
    out[pos++] = (r2 >>> 4) | (r3 << 2);
  }
  return out;
}

function decodeDense(bytes: Uint8Array): Registers {
  if (bytes.length !== DENSE_SIZE) {
    throw new MalformedInputError(
      `Dense sketch must be ${DENSE_SIZE} bytes, got ${bytes.length}`,
    );
  }
  const builder = new RegisterBuilder();
  let pos = HEADER_SIZE;
  for (let index = 0; index < REGISTER_COUNT; index += 4) {
    const b0 = bytes[pos++];
    const b1 = bytes[pos++];
    const b2 = bytes[pos++];
    const values = [
      b0 & 0x3f,
      (b0 >>> 6) | ((b1 & 0x0f) << 2),
      (b1 >>> 4) | ((b2 & 0x03) << 4),
      b2 >>> 2,
    ];
    for (let j = 0; j < 4; j++) {
      const value = values[j];
      if (value > REDIS_SATURATED_VALUE) {
        throw new MalformedInputError(
          `Register ${index + j} holds ${value}, above ${REDIS_SATURATED_VALUE}`,
        );
      }
      if (value !== 0) {
        builder.set(index + j, value);
      }
    }
  }
  return builder.build();
}
