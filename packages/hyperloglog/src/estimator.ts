/**
 * Cardinality estimation following Algorithm 6 of Otmar Ertl, "New
 * cardinality estimation algorithms for HyperLogLog sketches" (2017),
 * computed from the histogram of register values.
 */

const ALPHA_INF = 0.5 / Math.LN2;

/**
 * @param precision Number of index bits, so the sketch has `2^precision`
 *   registers.
 * @param nonEmpty Number of registers holding a value >= 1.
 * @param values The values of the non-empty registers.
 */
export function estimateCardinality(
  precision: number,
  nonEmpty: number,
  values: Iterable<number>,
): number {
  if (nonEmpty === 0) {
    return 0;
  }

  const q = 64 - precision;
  const m = 2 ** precision;

  const histogram = new Map<number, number>();
  for (const value of values) {
    histogram.set(value, (histogram.get(value) ?? 0) + 1);
  }

  let z = m * tau(1 - (histogram.get(q + 1) ?? 0) / m);
  for (let k = q; k >= 1; k--) {
    z = 0.5 * (z + (histogram.get(k) ?? 0));
  }
  // nonEmpty > 0 so the argument is < 1 and the series converges.
  z += m * sigma(1 - nonEmpty / m);

  // Every register saturated: the sketch cannot tell how many items it saw.
  if (z === 0) {
    return Number.MAX_SAFE_INTEGER;
  }
  return Math.round((ALPHA_INF * m * m) / z);
}

/**
 * `x + sum(x^(2^k) * 2^(k-1))` for k >= 1, summed until the accumulator stops
 * changing.
 */
export function sigma(x: number): number {
  let y = 1;
  let z = x;
  for (;;) {
    x *= x;
    const prev = z;
    z += x * y;
    y += y;
    if (prev === z) {
      return z;
    }
  }
}

export function tau(x: number): number {
  if (x === 0 || x === 1) {
    return 0;
  }
  let y = 1;
  let z = 1 - x;
  for (;;) {
    x = Math.sqrt(x);
    const prev = z;
    y *= 0.5;
    z -= (1 - x) ** 2 * y;
    if (prev === z) {
      return z / 3;
    }
  }
}
