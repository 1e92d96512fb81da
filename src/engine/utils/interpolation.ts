/**
 * Numeric helpers shared by the estimation and power-output modules.
 *
 * Everything here operates on plain scalars or number arrays; time-indexing is
 * handled by the callers.
 */

/**
 * One-dimensional piecewise-linear interpolation.
 *
 * `xp` must be strictly increasing and the same length as `fp`.  Values of `x`
 * below the first control point return `fp[0]`; values above the last return
 * the last `fp`.
 */
export function interpolateLinear(x: number, xp: readonly number[], fp: readonly number[]): number {
  if (xp.length === 0 || xp.length !== fp.length) {
    throw new RangeError(`interpolateLinear: expected matching non-empty control points (got ${xp.length} x, ${fp.length} y)`);
  }

  const last = xp.length - 1;
  if (x <= xp[0]) return fp[0];
  if (x >= xp[last]) return fp[last];

  for (let i = 1; i <= last; i++) {
    if (x <= xp[i]) {
      const x0 = xp[i - 1];
      const x1 = xp[i];
      const frac = (x - x0) / (x1 - x0);
      return fp[i - 1] + (fp[i] - fp[i - 1]) * frac;
    }
  }
  return fp[last];
}

/**
 * Sample quantile with linear interpolation between order statistics.
 *
 * position = (n − 1) × q over the ascending-sorted values; the result is
 * interpolated between the two neighbouring observations.
 */
export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0) {
    throw new RangeError('quantile: cannot take a quantile of an empty sample');
  }
  if (q < 0 || q > 1) {
    throw new RangeError(`quantile: q must be within [0, 1] (got ${q})`);
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

/** Arithmetic mean of a non-empty sample. */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('mean: cannot average an empty sample');
  }
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}
