/**
 * @fileoverview Math utilities and array helpers for the linguistic anomaly engine.
 * Provides descriptive statistics, series transforms, distribution functions,
 * and deterministic sampling used by the baseline, coherence and validation services.
 */

// ============================================================================
// TIME CONSTANTS
// ============================================================================

/**
 * Milliseconds per day constant (24 * 60 * 60 * 1000)
 * Used for day-key arithmetic on daily series.
 */
export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ============================================================================
// DESCRIPTIVE STATISTICS
// ============================================================================

/**
 * Calculates the mean (average) of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * mean([1, 2, 3, 4, 5]) // returns 3
 * mean([]) // returns 0
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Population standard deviation (divides by n).
 * Returns 0 for arrays with < 2 elements.
 *
 * @example
 * stddev([1, 2, 1, 2, 1]) // returns ~0.4899
 * stddev([5]) // returns 0
 */
export function stddev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squareDiffs = values.map((v) => Math.pow(v - avg, 2));
  return Math.sqrt(mean(squareDiffs));
}

/**
 * Sample variance (divides by n - 1).
 * Returns 0 for arrays with < 2 elements.
 *
 * @example
 * sampleVariance([1, 2, 3, 4, 5]) // returns 2.5
 */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squared = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0);
  return squared / (values.length - 1);
}

/**
 * Sample standard deviation (divides by n - 1).
 *
 * @example
 * sampleStddev([1, 2, 3, 4, 5]) // returns ~1.5811
 */
export function sampleStddev(values: readonly number[]): number {
  return Math.sqrt(sampleVariance(values));
}

/**
 * Calculates the pth percentile of an array of numbers.
 * Uses linear interpolation between closest ranks.
 *
 * @param p - Percentile to calculate (0-1, where 0.5 = median)
 * @returns The percentile value, or 0 if empty array
 *
 * @example
 * percentile([1, 2, 3, 4, 5], 0.5) // returns 3 (median)
 * percentile([1, 2, 3, 4, 5], 0.95) // returns 4.8 (95th percentile)
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = p * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index % 1;
  if (lower === upper) return sorted[lower];
  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

/**
 * Percentage (0-100) of reference values strictly below `value`.
 * Returns 0 for an empty reference.
 *
 * @example
 * percentileRank([1, 2, 3, 4], 3.5) // returns 75
 * percentileRank([1, 2, 3, 4], 1) // returns 0
 */
export function percentileRank(reference: readonly number[], value: number): number {
  if (reference.length === 0) return 0;
  const below = reference.filter((v) => v < value).length;
  return (below / reference.length) * 100;
}

/**
 * Largest value of an array, or 0 when empty.
 */
export function maxOf(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((max, v) => (v > max ? v : max), values[0]);
}

// ============================================================================
// NORMALIZATION & ROUNDING
// ============================================================================

/**
 * Min-max normalizes a series to 0-1, leaving gaps (null) in place.
 * Returns zeros for the defined entries when all defined values are equal.
 *
 * @example
 * normalize([1, null, 3]) // returns [0, null, 1]
 * normalize([5, 5]) // returns [0, 0]
 */
export function normalize(values: ReadonlyArray<number | null>): Array<number | null> {
  const defined = values.filter((v): v is number => v !== null);
  if (defined.length === 0) return values.map(() => null);
  const min = Math.min(...defined);
  const max = Math.max(...defined);
  return values.map((v) => {
    if (v === null) return null;
    if (min === max) return 0;
    return (v - min) / (max - min);
  });
}

/**
 * Clamps a value between a minimum and maximum.
 *
 * @example
 * clamp(-5, 0, 10) // returns 0
 * clamp(15, 0, 10) // returns 10
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Rounds a number to a specified number of decimal places.
 *
 * @example
 * round(3.14159, 2) // returns 3.14
 */
export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Rounds a number to 4 decimal places.
 *
 * @example
 * round4(3.14159265) // returns 3.1416
 */
export function round4(value: number): number {
  return round(value, 4);
}

/**
 * Counts whitespace-separated words in a text string.
 *
 * @example
 * countWords("  one  two  three  ") // returns 3
 * countWords("") // returns 0
 */
export function countWords(text: string): number {
  return text.trim().split(/\s+/).filter((word) => word.length > 0).length;
}

// ============================================================================
// SERIES TRANSFORMS
// ============================================================================

/**
 * Day-over-day difference. The first entry, and any entry whose own value or
 * predecessor is missing, is null.
 *
 * @example
 * diff([1, 3, null, 4]) // returns [null, 2, null, null]
 */
export function diff(values: ReadonlyArray<number | null>): Array<number | null> {
  return values.map((value, i) => {
    if (i === 0) return null;
    const previous = values[i - 1];
    if (value === null || previous === null) return null;
    return value - previous;
  });
}

/**
 * Centered moving average. The window spans `floor(window / 2)` entries
 * before each position; positions whose window runs off the series or
 * contains a gap are null.
 *
 * @example
 * centeredMovingAverage([1, 2, 3, 4], 3) // returns [null, 2, 3, null]
 */
export function centeredMovingAverage(
  values: ReadonlyArray<number | null>,
  window: number,
): Array<number | null> {
  const offset = Math.floor(window / 2);
  return values.map((_, i) => {
    const start = i - offset;
    const end = start + window;
    if (start < 0 || end > values.length) return null;
    const slice = values.slice(start, end);
    if (slice.some((v) => v === null)) return null;
    return mean(slice.filter((v): v is number => v !== null));
  });
}

/**
 * Chunks an array into smaller arrays of specified size.
 *
 * @example
 * chunk([1, 2, 3, 4, 5], 2) // returns [[1, 2], [3, 4], [5]]
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

/**
 * Groups items by a computed key, preserving first-seen key order.
 *
 * @example
 * groupBy(["a1", "b1", "a2"], (s) => s[0]) // Map { "a" => ["a1", "a2"], "b" => ["b1"] }
 */
export function groupBy<T, K>(items: readonly T[], keyFn: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyFn(item);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

// ============================================================================
// DISTRIBUTIONS
// ============================================================================

const LANCZOS_COEFFICIENTS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028,
  771.32342877765313, -176.61502916214059, 12.507343278686905,
  -0.13857109526572012, 9.9843695780195716e-6, 1.5056327351493116e-7,
];

/**
 * Natural log of the gamma function (Lanczos approximation, g = 7).
 *
 * @example
 * Math.exp(lnGamma(5)) // returns ~24
 */
export function lnGamma(z: number): number {
  if (z < 0.5) {
    return Math.log(Math.PI / Math.sin(Math.PI * z)) - lnGamma(1 - z);
  }
  const shifted = z - 1;
  let x = LANCZOS_COEFFICIENTS[0];
  for (let i = 1; i < LANCZOS_COEFFICIENTS.length; i++) {
    x += LANCZOS_COEFFICIENTS[i] / (shifted + i);
  }
  const t = shifted + 7.5;
  return 0.5 * Math.log(2 * Math.PI) + (shifted + 0.5) * Math.log(t) - t + Math.log(x);
}

const BETA_MAX_ITERATIONS = 300;
const BETA_EPSILON = 3e-14;
const BETA_FLOOR = 1e-300;

function betaContinuedFraction(a: number, b: number, x: number): number {
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < BETA_FLOOR) d = BETA_FLOOR;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= BETA_MAX_ITERATIONS; m++) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < BETA_FLOOR) d = BETA_FLOOR;
    c = 1 + aa / c;
    if (Math.abs(c) < BETA_FLOOR) c = BETA_FLOOR;
    d = 1 / d;
    h *= d * c;

    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < BETA_FLOOR) d = BETA_FLOOR;
    c = 1 + aa / c;
    if (Math.abs(c) < BETA_FLOOR) c = BETA_FLOOR;
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < BETA_EPSILON) break;
  }

  return h;
}

/**
 * Regularized incomplete beta function I_x(a, b).
 */
export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;
  const front = Math.exp(
    lnGamma(a + b) - lnGamma(a) - lnGamma(b) + a * Math.log(x) + b * Math.log(1 - x),
  );
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/**
 * Two-sided p-value of a Student's t statistic.
 *
 * @example
 * studentTTwoTailedP(0, 10) // returns 1
 * studentTTwoTailedP(1, 1) // returns ~0.5
 */
export function studentTTwoTailedP(t: number, degreesOfFreedom: number): number {
  if (Number.isNaN(t) || degreesOfFreedom <= 0) return 1;
  if (!Number.isFinite(t)) return 0;
  const x = degreesOfFreedom / (degreesOfFreedom + t * t);
  return clamp(regularizedIncompleteBeta(x, degreesOfFreedom / 2, 0.5), 0, 1);
}

// ============================================================================
// DETERMINISTIC SAMPLING
// ============================================================================

/**
 * Seeded uniform [0, 1) generator (mulberry32). The same seed always yields
 * the same sequence, which keeps control-window sampling reproducible.
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random integer in [min, max).
 *
 * @example
 * randomInt(45, 150, createSeededRandom(42)) // deterministic value in 45..149
 */
export function randomInt(min: number, max: number, random: () => number = Math.random): number {
  return min + Math.floor(random() * (max - min));
}
