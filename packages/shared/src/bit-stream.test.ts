import fc from 'fast-check';
import {describe, expect, test} from 'vitest';
import {BitReader, BitWriter} from './bit-stream.ts';

describe('BitWriter', () => {
  test('packs fields most significant bit first', () => {
    const w = new BitWriter();
    w.write(0, 4);
    w.write(6, 4);
    w.write(617, 14);
    w.write(1, 6);
    w.write(0, 4);
    expect([...w.finish()]).toEqual([6, 9, 164, 16]);
  });

  test('tracks bit length', () => {
    const w = new BitWriter();
    expect(w.bitLength).toBe(0);
    w.write(5, 3);
    expect(w.bitLength).toBe(3);
    w.write(0xff, 8);
    expect(w.bitLength).toBe(11);
  });

  test('writes 6 bit fields back to back', () => {
    const w = new BitWriter();
    for (const v of [1, 2, 3, 4]) {
      w.write(v, 6);
    }
    // 000001 000010 000011 000100
    expect([...w.finish()]).toEqual([0b00000100, 0b00100000, 0b11000100]);
  });

  test('finish requires byte alignment', () => {
    const w = new BitWriter();
    w.write(1, 3);
    expect(() => w.finish()).toThrow('not byte aligned (3 dangling bits)');
  });

  test('rejects values wider than the field', () => {
    const w = new BitWriter();
    expect(() => w.write(64, 6)).toThrow('Value 64 does not fit in 6 bits');
    expect(() => w.write(1, 0)).toThrow('Invalid field width 0');
  });
});

describe('BitReader', () => {
  test('reads fields straddling bytes', () => {
    const r = new BitReader(new Uint8Array([6, 9, 164, 16]));
    expect(r.remaining).toBe(32);
    expect(r.read(4)).toBe(0);
    expect(r.read(4)).toBe(6);
    expect(r.read(14)).toBe(617);
    expect(r.read(6)).toBe(1);
    expect(r.remaining).toBe(4);
    expect(r.read(4)).toBe(0);
    expect(r.remaining).toBe(0);
  });

  test('starts at a byte offset', () => {
    const r = new BitReader(new Uint8Array([0xff, 0x80]), 1);
    expect(r.remaining).toBe(8);
    expect(r.read(1)).toBe(1);
    expect(r.read(7)).toBe(0);
  });

  test('refuses to read past the end', () => {
    const r = new BitReader(new Uint8Array([1]));
    expect(() => r.read(9)).toThrow('Cannot read 9 bits, only 8 left');
  });

  test('reads back whatever was written', () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.integer({min: 1, max: 24}), fc.nat()), {
          minLength: 1,
          maxLength: 50,
        }),
        raw => {
          const fields = raw.map(([width, n]) => [width, n % 2 ** width]);
          const w = new BitWriter();
          for (const [width, value] of fields) {
            w.write(value, width);
          }
          const pad = (8 - (w.bitLength % 8)) % 8;
          if (pad > 0) {
            w.write(0, pad);
          }
          const r = new BitReader(w.finish());
          expect(fields.map(([width]) => r.read(width))).toEqual(
            fields.map(([, value]) => value),
          );
          expect(r.remaining).toBe(pad);
        },
      ),
    );
  });
});
