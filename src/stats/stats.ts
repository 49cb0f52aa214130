import type { DeviceKind, Sample, StatsSnapshot, TestRun } from "../types.js";

export const EMPTY_STATS: StatsSnapshot = {
  count: 0,
  mean: null,
  median: null,
  stdev: null,
  min: null,
  max: null,
};

export function validValues(samples: readonly Sample[]): number[] {
  const values: number[] = [];
  for (const s of samples) {
    if (s.valid && s.value !== null) values.push(s.value);
  }
  return values;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new RangeError("mean of an empty sequence");
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Middle value, or the average of the two middle values for even counts. */
export function median(values: readonly number[]): number {
  if (values.length === 0) throw new RangeError("median of an empty sequence");
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Sample standard deviation (n − 1 denominator); 0 for n ≤ 1. */
export function sampleStdev(values: readonly number[]): number {
  const n = values.length;
  if (n <= 1) return 0;
  const m = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
  return Math.sqrt(squares / (n - 1));
}

export function computeStats(samples: readonly Sample[]): StatsSnapshot {
  const values = validValues(samples);
  if (values.length === 0) return { ...EMPTY_STATS };
  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    stdev: sampleStdev(values),
    min: values.reduce((lo, v) => (v < lo ? v : lo), values[0]),
    max: values.reduce((hi, v) => (v > hi ? v : hi), values[0]),
  };
}

// ---------------------------------------------------------------------------
// Distribution shape — quartiles and 1.5×IQR outliers
// ---------------------------------------------------------------------------

export interface DistributionSummary {
  q1: number;
  q3: number;
  iqr: number;
  lowerFence: number;
  upperFence: number;
  outliers: number[];
}

/** Linear-interpolated quantile of a sorted sequence, q in [0, 1]. */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) throw new RangeError("quantile of an empty sequence");
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function describeDistribution(values: readonly number[]): DistributionSummary | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  const lowerFence = q1 - 1.5 * iqr;
  const upperFence = q3 + 1.5 * iqr;
  return {
    q1,
    q3,
    iqr,
    lowerFence,
    upperFence,
    outliers: values.filter((v) => v < lowerFence || v > upperFence),
  };
}

// ---------------------------------------------------------------------------
// Shape — moments, confidence interval, D'Agostino–Pearson normality
// ---------------------------------------------------------------------------

export interface ShapeSummary {
  /** Biased sample skewness g1; null when every value is equal. */
  skewness: number | null;
  /** Excess (Fisher) kurtosis g2; null when every value is equal. */
  kurtosis: number | null;
  /** Two-sided 95% Student-t interval of the mean; null below two values. */
  confidenceInterval95: [number, number] | null;
  /** p > 0.05 under the K² omnibus test; null below 8 values. */
  normal: boolean | null;
  normalityPValue: number | null;
}

// t(0.975, df) for df = 1..30
const T_975 = [
  12.706205, 4.302653, 3.182446, 2.776445, 2.570582, 2.446912, 2.364624, 2.306004, 2.262157,
  2.228139, 2.200985, 2.178813, 2.160369, 2.144787, 2.13145, 2.119905, 2.109816, 2.100922,
  2.093024, 2.085963, 2.079614, 2.073873, 2.068658, 2.063899, 2.059539, 2.055529, 2.051831,
  2.048407, 2.04523, 2.042272,
];
const Z_975 = 1.959964;

/** Two-sided 95% critical value of Student's t; Cornish–Fisher expansion past the table. */
export function tCritical95(df: number): number {
  if (!Number.isInteger(df) || df < 1) throw new RangeError(`invalid degrees of freedom: ${df}`);
  if (df <= T_975.length) return T_975[df - 1];
  const z = Z_975;
  const z3 = z ** 3;
  const z5 = z ** 5;
  const z7 = z ** 7;
  return (
    z +
    (z3 + z) / (4 * df) +
    (5 * z5 + 16 * z3 + 3 * z) / (96 * df ** 2) +
    (3 * z7 + 19 * z5 + 17 * z3 - 15 * z) / (384 * df ** 3)
  );
}

function centralMoment(values: readonly number[], m: number, order: number): number {
  return values.reduce((sum, v) => sum + (v - m) ** order, 0) / values.length;
}

function skewTestZ(g1: number, n: number): number {
  const y = g1 * Math.sqrt(((n + 1) * (n + 3)) / (6 * (n - 2)));
  const beta2 =
    (3 * (n ** 2 + 27 * n - 70) * (n + 1) * (n + 3)) / ((n - 2) * (n + 5) * (n + 7) * (n + 9));
  const w2 = -1 + Math.sqrt(2 * (beta2 - 1));
  const delta = 1 / Math.sqrt(0.5 * Math.log(w2));
  const alpha = Math.sqrt(2 / (w2 - 1));
  return delta * Math.asinh(y / alpha);
}

function kurtosisTestZ(b2: number, n: number): number {
  const expected = (3 * (n - 1)) / (n + 1);
  const variance = (24 * n * (n - 2) * (n - 3)) / ((n + 1) ** 2 * (n + 3) * (n + 5));
  const x = (b2 - expected) / Math.sqrt(variance);
  const sqrtBeta1 =
    ((6 * (n * n - 5 * n + 2)) / ((n + 7) * (n + 9))) *
    Math.sqrt((6 * (n + 3) * (n + 5)) / (n * (n - 2) * (n - 3)));
  const a = 6 + (8 / sqrtBeta1) * (2 / sqrtBeta1 + Math.sqrt(1 + 4 / sqrtBeta1 ** 2));
  const term1 = 1 - 2 / (9 * a);
  const denom = 1 + x * Math.sqrt(2 / (a - 4));
  const term2 = Math.sign(denom) * Math.cbrt((1 - 2 / a) / Math.abs(denom));
  return (term1 - term2) / Math.sqrt(2 / (9 * a));
}

export function describeShape(values: readonly number[]): ShapeSummary | null {
  const n = values.length;
  if (n === 0) return null;
  const m = mean(values);
  const m2 = centralMoment(values, m, 2);

  const skewness = m2 > 0 ? centralMoment(values, m, 3) / m2 ** 1.5 : null;
  const kurtosis = m2 > 0 ? centralMoment(values, m, 4) / m2 ** 2 - 3 : null;

  let confidenceInterval95: [number, number] | null = null;
  if (n >= 2) {
    const half = (tCritical95(n - 1) * sampleStdev(values)) / Math.sqrt(n);
    confidenceInterval95 = [m - half, m + half];
  }

  let normalityPValue: number | null = null;
  if (n >= 8 && skewness !== null && kurtosis !== null) {
    const k2 = skewTestZ(skewness, n) ** 2 + kurtosisTestZ(kurtosis + 3, n) ** 2;
    // chi-square survival with 2 degrees of freedom
    normalityPValue = Math.exp(-k2 / 2);
  }

  return {
    skewness,
    kurtosis,
    confidenceInterval95,
    normal: normalityPValue === null ? null : normalityPValue > 0.05,
    normalityPValue,
  };
}

// ---------------------------------------------------------------------------
// Cross-device accuracy ranking
// ---------------------------------------------------------------------------

export interface DeviceRanking {
  rank: number; // 1 = closest to the reference
  runId: string;
  kind: DeviceKind;
  mean: number;
  stdev: number;
  deviation: number; // |mean − reference|
}

export interface RankingResult {
  reference: number | null;
  entries: DeviceRanking[];
}

/**
 * Ranks runs by how far each run's mean lies from a common reference.
 * Without a known true current the reference is the median of the runs'
 * medians. Runs with no valid samples are left out.
 */
export function rankDevices(runs: readonly TestRun[], reference?: number): RankingResult {
  const usable: { run: TestRun; mean: number; median: number; stdev: number }[] = [];
  for (const run of runs) {
    const s = run.stats;
    if (!s || s.count === 0 || s.mean === null || s.median === null || s.stdev === null) continue;
    usable.push({ run, mean: s.mean, median: s.median, stdev: s.stdev });
  }
  if (usable.length === 0) return { reference: reference ?? null, entries: [] };

  const ref = reference ?? median(usable.map((u) => u.median));
  const entries = usable
    .map((u) => ({
      runId: u.run.id,
      kind: u.run.kind,
      mean: u.mean,
      stdev: u.stdev,
      deviation: Math.abs(u.mean - ref),
    }))
    .sort((a, b) => a.deviation - b.deviation || a.stdev - b.stdev)
    .map((entry, i) => ({ rank: i + 1, ...entry }));

  return { reference: ref, entries };
}
