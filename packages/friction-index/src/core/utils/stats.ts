/**
 * Descriptive statistics over plain number arrays
 *
 * Empty input yields 0 rather than NaN so sparse groups never poison a
 * downstream sum or comparison.
 */

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

export function max(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let best = values[0];
  for (const value of values) {
    if (value > best) best = value;
  }
  return best;
}

export function min(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let best = values[0];
  for (const value of values) {
    if (value < best) best = value;
  }
  return best;
}

/**
 * Quantile with linear interpolation between closest ranks.
 *
 * Position `(n - 1) * q` in the sorted values; fractional positions blend the
 * two neighbours.
 */
export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function median(values: readonly number[]): number {
  return quantile(values, 0.5);
}

/**
 * Sample standard deviation (n - 1 denominator); 0 below two values
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Pearson correlation; 0 when either side has no variance
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return 0;

  const meanX = mean(xs.slice(0, n));
  const meanY = mean(ys.slice(0, n));
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;

  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) return 0;
  return covariance / Math.sqrt(varianceX * varianceY);
}
