import fc from 'fast-check';
import {describe, expect, test} from 'vitest';
import {createSilentLogContext} from '../../shared/src/logging-test-utils.ts';
import {CompactCodec} from './compact-codec.ts';
import {defaultCompactCodec} from './defaults.ts';
import {
  ErrorKind,
  InvalidPrecisionError,
  MalformedInputError,
  PrecisionMismatchError,
} from './errors.ts';
import {HyperLogLog} from './hyperloglog.ts';

function range(n: number): number[] {
  return Array.from({length: n}, (_, i) => i + 1);
}

function thrown(f: () => unknown): unknown {
  try {
    f();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error');
}

describe('precision', () => {
  test.each([7, 17, 14.5, NaN, -1])('rejects %s', p => {
    const error = thrown(() => new HyperLogLog(p));
    expect(error).toBeInstanceOf(InvalidPrecisionError);
    expect(error).toHaveProperty('kind', ErrorKind.InvalidPrecision);
    expect(error).toHaveProperty(
      'message',
      `Precision must be an integer between 8 and 16, got ${p}`,
    );
  });

  test('accepts 8 through 16', () => {
    for (let p = 8; p <= 16; p++) {
      const hll = new HyperLogLog(p);
      expect(hll.precision).toBe(p);
      expect(hll.isEmpty()).toBe(true);
      expect(hll.cardinality()).toBe(0);
    }
  });
});

describe('add', () => {
  test('counts distinct items', () => {
    const empty = new HyperLogLog(14);
    const h1 = empty.add('foo');
    expect(h1.cardinality()).toBe(1);
    const h2 = h1.add('bar');
    expect(h2.cardinality()).toBe(2);
    const h3 = h2.add('bar');
    expect(h3.cardinality()).toBe(2);
    const h4 = h3.add('okk');
    expect(h4.cardinality()).toBe(3);
    expect(h4.size).toBe(3);
  });

  test('does not modify the receiver', () => {
    const empty = new HyperLogLog(14);
    const one = empty.add('foo');
    expect(empty.isEmpty()).toBe(true);
    expect(one.isEmpty()).toBe(false);
    expect(one.registers).not.toBe(empty.registers);
  });

  test('returns the same sketch when nothing changes', () => {
    const h = new HyperLogLog(12).add('foo');
    expect(h.add('foo')).toBe(h);
    expect(h.addAll(['foo', 'foo'])).toBe(h);
  });

  test('addAll matches repeated add', () => {
    fc.assert(
      fc.property(fc.array(fc.string(), {maxLength: 30}), items => {
        const folded = items.reduce(
          (hll: HyperLogLog, item) => hll.add(item),
          new HyperLogLog(10),
        );
        expect(new HyperLogLog(10).addAll(items).equals(folded)).toBe(true);
      }),
    );
  });

  test('is idempotent', () => {
    fc.assert(
      fc.property(fc.array(fc.string(), {maxLength: 30}), items => {
        const once = new HyperLogLog(8).addAll(items);
        expect(once.addAll(items).equals(once)).toBe(true);
      }),
    );
  });
});

describe('merge', () => {
  test('is the union', () => {
    const a = new HyperLogLog(14).add('foo');
    const b = new HyperLogLog(14).add('bar');
    const merged = HyperLogLog.merge([a, b]);
    expect(merged.cardinality()).toBe(2);
    expect(merged.equals(new HyperLogLog(14).add('foo').add('bar'))).toBe(true);
    expect(a.size).toBe(1);
    expect(b.size).toBe(1);
  });

  test('p=12 union equals adding both items', () => {
    const merged = HyperLogLog.merge([
      new HyperLogLog(12).add('foo'),
      new HyperLogLog(12).add('bar'),
    ]);
    expect(merged.equals(new HyperLogLog(12).add('foo').add('bar'))).toBe(true);
    expect(merged.precision).toBe(12);
  });

  test('of a single sketch is that sketch', () => {
    const a = new HyperLogLog(9).addAll(range(50));
    expect(HyperLogLog.merge([a]).equals(a)).toBe(true);
  });

  test('is commutative, associative and idempotent', () => {
    const arbSketch = fc
      .array(fc.oneof(fc.string(), fc.integer()), {maxLength: 40})
      .map(items => new HyperLogLog(8).addAll(items));
    fc.assert(
      fc.property(arbSketch, arbSketch, arbSketch, (a, b, c) => {
        const merge = HyperLogLog.merge;
        expect(merge([a, b]).equals(merge([b, a]))).toBe(true);
        expect(
          merge([merge([a, b]), c]).equals(merge([a, merge([b, c])])),
        ).toBe(true);
        expect(merge([a, a]).equals(a)).toBe(true);
        expect(merge([a, new HyperLogLog(8)]).equals(a)).toBe(true);
      }),
    );
  });

  test('rejects different precisions', () => {
    const error = thrown(() =>
      HyperLogLog.merge([new HyperLogLog(12), new HyperLogLog(14)]),
    );
    expect(error).toBeInstanceOf(PrecisionMismatchError);
    expect(error).toHaveProperty('kind', ErrorKind.PrecisionMismatch);
    expect(error).toHaveProperty('expected', 12);
    expect(error).toHaveProperty('actual', 14);
  });

  test('rejects an empty list', () => {
    expect(() => HyperLogLog.merge([])).toThrow(
      'Cannot merge an empty list of sketches',
    );
  });
});

describe('cardinality', () => {
  test.each([
    [10, 1_000],
    [10, 10_000],
    [12, 1_000],
    [12, 10_000],
    [14, 1_000],
    [14, 10_000],
    [16, 1_000],
    [16, 10_000],
  ])('p=%i n=%i is within three standard errors', (p, n) => {
    const hll = new HyperLogLog(p).addAll(range(n));
    const error = Math.abs(hll.cardinality() - n) / n;
    expect(error).toBeLessThan(3 * hll.standardError());
  });

  test('standardError', () => {
    expect(new HyperLogLog(14).standardError()).toBeCloseTo(0.008125, 10);
    expect(new HyperLogLog(8).standardError()).toBeCloseTo(0.065, 10);
  });
});

describe('fromRegisters', () => {
  test('builds a sketch', () => {
    const hll = HyperLogLog.fromRegisters(14, [
      [617, 1],
      [3, 0],
      [9, 2],
      [9, 5],
    ]);
    expect(Object.fromEntries(hll.registers)).toEqual({617: 1, 9: 5});
    expect(hll.cardinality()).toBe(2);
  });

  test.each([
    [14, [16384, 1], 'Register index 16384 is outside [0, 16384)'],
    [8, [-1, 1], 'Register index -1 is outside [0, 256)'],
    [8, [0.5, 1], 'Register index 0.5 is outside [0, 256)'],
    [14, [0, 52], 'Register value 52 is outside [0, 51]'],
    [8, [0, 58], 'Register value 58 is outside [0, 57]'],
  ] satisfies [number, [number, number], string][])(
    'p=%i rejects %j',
    (p, entry, message) => {
      const error = thrown(() => HyperLogLog.fromRegisters(p, [entry]));
      expect(error).toBeInstanceOf(MalformedInputError);
      expect(error).toHaveProperty('message', message);
    },
  );

  test('validates the precision', () => {
    expect(() => HyperLogLog.fromRegisters(17, [])).toThrow(
      InvalidPrecisionError,
    );
  });
});

describe('encode', () => {
  test('sparse layout', () => {
    expect([...HyperLogLog.fromRegisters(14, [[617, 1]]).encode()]).toEqual([
      6, 9, 164, 16,
    ]);
    expect([...new HyperLogLog(14).encode()]).toEqual([6]);
    expect([...new HyperLogLog(8).encode()]).toEqual([0]);
  });

  test('round trips through both representations', () => {
    for (const [p, n] of [
      [8, 50],
      [8, 2_000],
      [12, 100],
      [12, 10_000],
    ]) {
      const hll = new HyperLogLog(p).addAll(range(n));
      const bytes = hll.encode();
      const decoded = HyperLogLog.decode(bytes);
      expect(decoded.precision).toBe(p);
      expect(decoded.equals(hll)).toBe(true);
      expect(decoded.cardinality()).toBe(hll.cardinality());
    }
  });

  test('accepts an explicit codec', () => {
    const codec = new CompactCodec(createSilentLogContext());
    const hll = new HyperLogLog(11).addAll(['a', 'b', 'c']);
    expect(HyperLogLog.decode(hll.encode(codec), codec).equals(hll)).toBe(
      true,
    );
  });

  test('rejects corrupt input', () => {
    expect(() => HyperLogLog.decode(new Uint8Array())).toThrow(
      MalformedInputError,
    );
  });

  test('the default codec is shared', () => {
    expect(defaultCompactCodec()).toBe(defaultCompactCodec());
  });
});

test('equals compares precision and registers', () => {
  expect(new HyperLogLog(10).equals(new HyperLogLog(11))).toBe(false);
  expect(new HyperLogLog(10).add(1).equals(new HyperLogLog(10).add(1))).toBe(
    true,
  );
  expect(new HyperLogLog(10).add(1).equals(new HyperLogLog(10))).toBe(false);
});
