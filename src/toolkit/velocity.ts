import { mean } from "./stats.js";

export type TrendLabel =
  | "increasing"
  | "decreasing"
  | "stable"
  | "peak_reached"
  | "insufficient_data";

export interface TrendOptions {
  /** Buckets compared at each end (k). */
  readonly window: number;
  readonly growthFactor: number;
  readonly declineFactor: number;
}

export const DEFAULT_TREND_OPTIONS: TrendOptions = {
  window: 3,
  growthFactor: 1.2,
  declineFactor: 0.8,
};

export interface VelocitySummary {
  readonly trend: TrendLabel;
  readonly bucketCount: number;
  readonly total: number;
  /** Mean count per populated bucket. */
  readonly average: number;
  readonly peakBucket: string | null;
  readonly peakCount: number;
  /** Mean of the last `window` buckets. */
  readonly recentAverage: number;
  readonly earlyAverage: number;
}

/** Group items into buckets; items without a key are skipped. Keys come back sorted. */
export function bucketCounts<T>(
  items: Iterable<T>,
  keyOf: (item: T) => string | null,
): Record<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  const out: Record<string, number> = {};
  for (const key of [...counts.keys()].sort(compareKeys)) {
    out[key] = counts.get(key) ?? 0;
  }
  return out;
}

export function orderedBuckets(velocity: Readonly<Record<string, number>>): Array<[string, number]> {
  return Object.entries(velocity).sort(([a], [b]) => compareKeys(a, b));
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function summarizeVelocity(
  velocity: Readonly<Record<string, number>>,
  options: TrendOptions = DEFAULT_TREND_OPTIONS,
): VelocitySummary {
  const buckets = orderedBuckets(velocity);
  const counts = buckets.map(([, c]) => c);
  const k = options.window;

  let peakIndex = -1;
  let peakCount = 0;
  counts.forEach((c, i) => {
    // strict > keeps the earliest bucket on ties
    if (peakIndex === -1 || c > peakCount) {
      peakIndex = i;
      peakCount = c;
    }
  });

  const total = counts.reduce((acc, c) => acc + c, 0);
  const recentAverage = mean(counts.slice(-k));
  const earlyAverage = mean(counts.slice(0, k));

  let trend: TrendLabel;
  if (counts.length < 2 * k) {
    trend = "insufficient_data";
  } else if (recentAverage > earlyAverage * options.growthFactor) {
    trend = "increasing";
  } else if (recentAverage < earlyAverage * options.declineFactor) {
    trend = "decreasing";
  } else if (peakIndex >= counts.length - k) {
    trend = "peak_reached";
  } else {
    trend = "stable";
  }

  return {
    trend,
    bucketCount: counts.length,
    total,
    average: counts.length === 0 ? 0 : total / counts.length,
    peakBucket: peakIndex === -1 ? null : (buckets[peakIndex]?.[0] ?? null),
    peakCount,
    recentAverage,
    earlyAverage,
  };
}

export function classifyTrend(
  velocity: Readonly<Record<string, number>>,
  options: TrendOptions = DEFAULT_TREND_OPTIONS,
): TrendLabel {
  return summarizeVelocity(velocity, options).trend;
}

/** Compares the means of two halves of a series. */
export function compareHalves(
  early: readonly number[],
  recent: readonly number[],
  growthFactor: number,
  declineFactor: number,
): "increasing" | "decreasing" | "stable" | "insufficient_data" {
  if (early.length === 0 || recent.length === 0) return "insufficient_data";
  const e = mean(early);
  const r = mean(recent);
  if (r > e * growthFactor) return "increasing";
  if (r < e * declineFactor) return "decreasing";
  return "stable";
}
