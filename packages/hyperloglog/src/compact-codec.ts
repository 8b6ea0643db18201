import type {LogContext} from '@rocicorp/logger';
import {BitReader, BitWriter} from '../../shared/src/bit-stream.ts';
import {MalformedInputError} from './errors.ts';
import {MAX_PRECISION, MIN_PRECISION, maxRegisterValue} from './precision.ts';
import {
  RegisterBuilder,
  sortedEntries,
  type Registers,
} from './registers.ts';
import type {DecodedSketch, SketchCodec} from './variant.ts';

// Layout:
//
//   sparse: <<0::4, p - 8::4, (index::p, value::6)*, padding>>
//   dense:  <<1::4, p - 8::4, value0::6, value1::6, ... value(2^p - 1)::6>>
//
// Sparse records are written in groups of eight, which always end on a byte
// boundary. A trailing partial group is followed by 1-8 zero bits.

enum Format {
  Sparse = 0,
  Dense = 1,
}

const VALUE_BITS = 6;
const RECORDS_PER_GROUP = 8;
const MAX_PADDING_BITS = 8;

function recordBits(precision: number): number {
  return precision + VALUE_BITS;
}

function denseBodyBytes(precision: number): number {
  return ((1 << precision) * VALUE_BITS) / 8;
}

/**
 * Number of zero bits appended after `count` sparse records so that the body
 * ends on a byte boundary.
 */
export function sparsePaddingBits(precision: number, count: number): number {
  const partial = count % RECORDS_PER_GROUP;
  if (partial === 0) {
    return 0;
  }
  return 8 - ((partial * recordBits(precision)) % 8);
}

/** Sparse is used only when it is strictly smaller than dense. */
export function prefersSparse(precision: number, count: number): boolean {
  return recordBits(precision) * count < VALUE_BITS * (1 << precision);
}

/**
 * The internal binary format of {@link HyperLogLog}. It supports precisions
 * 8 through 16 and picks whichever of its two representations is smaller.
 */
export class CompactCodec implements SketchCodec {
  readonly #lc: LogContext;

  constructor(lc: LogContext) {
    this.#lc = lc.withContext('codec', 'compact');
  }

  encode(precision: number, registers: Registers): Uint8Array {
    const writer = new BitWriter();
    const precisionCode = precision - MIN_PRECISION;
    if (prefersSparse(precision, registers.size)) {
      this.#lc.debug?.(
        `encoding ${registers.size} registers at p=${precision} as sparse`,
      );
      writer.write(Format.Sparse, 4);
      writer.write(precisionCode, 4);
      for (const [index, value] of sortedEntries(registers)) {
        writer.write(index, precision);
        writer.write(value, VALUE_BITS);
      }
      const padding = sparsePaddingBits(precision, registers.size);
      if (padding > 0) {
        writer.write(0, padding);
      }
    } else {
      this.#lc.debug?.(
        `encoding ${registers.size} registers at p=${precision} as dense`,
      );
      writer.write(Format.Dense, 4);
      writer.write(precisionCode, 4);
      const m = 1 << precision;
      for (let index = 0; index < m; index++) {
        writer.write(registers.get(index) ?? 0, VALUE_BITS);
      }
    }
    return writer.finish();
  }

  decode(bytes: Uint8Array): DecodedSketch {
    if (bytes.length === 0) {
      throw new MalformedInputError('Empty buffer');
    }
    const format = bytes[0] >>> 4;
    const precision = (bytes[0] & 0x0f) + MIN_PRECISION;
    if (precision > MAX_PRECISION) {
      throw new MalformedInputError(
        `Unsupported precision code ${bytes[0] & 0x0f}`,
      );
    }
    switch (format) {
      case Format.Sparse:
        return {precision, registers: decodeSparse(precision, bytes)};
      case Format.Dense:
        return {precision, registers: decodeDense(precision, bytes)};
      default:
        throw new MalformedInputError(`Unknown format ${format}`);
    }
  }
}

function checkValue(precision: number, index: number, value: number): void {
  const max = maxRegisterValue(precision);
  if (value > max) {
    throw new MalformedInputError(
      `Register ${index} holds ${value}, above ${max} for p=${precision}`,
    );
  }
}

function decodeSparse(precision: number, bytes: Uint8Array): Registers {
  const reader = new BitReader(bytes, 1);
  const builder = new RegisterBuilder();
  const width = recordBits(precision);
  while (reader.remaining >= width) {
    const index = reader.read(precision);
    const value = reader.read(VALUE_BITS);
    if (value === 0) {
      throw new MalformedInputError(`Sparse record for ${index} has value 0`);
    }
    checkValue(precision, index, value);
    if (builder.has(index)) {
      throw new MalformedInputError(`Duplicate sparse record for ${index}`);
    }
    builder.set(index, value);
  }

  const padding = reader.remaining;
  if (padding > MAX_PADDING_BITS) {
    throw new MalformedInputError(
      `Truncated sparse record: ${padding} trailing bits`,
    );
  }
  if (padding > 0 && reader.read(padding) !== 0) {
    throw new MalformedInputError('Non-zero padding after sparse records');
  }
  return builder.build();
}

function decodeDense(precision: number, bytes: Uint8Array): Registers {
  const expected = denseBodyBytes(precision);
  if (bytes.length - 1 !== expected) {
    throw new MalformedInputError(
      `Dense body for p=${precision} must be ${expected} bytes, got ${
        bytes.length - 1
      }`,
    );
  }
  const reader = new BitReader(bytes, 1);
  const builder = new RegisterBuilder();
  const m = 1 << precision;
  for (let index = 0; index < m; index++) {
    const value = reader.read(VALUE_BITS);
    checkValue(precision, index, value);
    if (value !== 0) {
      builder.set(index, value);
    }
  }
  return builder.build();
}
