export type RankedEntry = [string, number];

export type ConcentrationBand = "competitive" | "moderate" | "concentrated";

export function tally<T>(
  items: Iterable<T>,
  keyOf: (item: T) => string | null | undefined,
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null || key === undefined) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/** Highest counts first; equal counts ordered by key so results do not depend on input order. */
export function topEntries(counts: ReadonlyMap<string, number>, n: number): RankedEntry[] {
  return [...counts.entries()]
    .sort(([ka, ca], [kb, cb]) => (cb !== ca ? cb - ca : ka < kb ? -1 : ka > kb ? 1 : 0))
    .slice(0, n)
    .map(([k, c]): RankedEntry => [k, c]);
}

/**
 * Herfindahl-Hirschman index: sum of squared shares, in [0, 1].
 * 1/n for n equal categories, 1 for a single category, 0 when there is nothing to share.
 */
export function herfindahl(counts: Iterable<number>): number {
  const values = [...counts].filter((c) => c > 0);
  const total = values.reduce((acc, c) => acc + c, 0);
  if (total === 0) return 0;
  let hhi = 0;
  for (const c of values) {
    const share = c / total;
    hhi += share * share;
  }
  return hhi;
}

export function describeConcentration(
  hhi: number,
  low = 0.1,
  high = 0.25,
): ConcentrationBand {
  if (hhi < low) return "competitive";
  if (hhi > high) return "concentrated";
  return "moderate";
}

/** HHI with its band, e.g. "0.180 (moderate)". */
export function formatHhi(hhi: number): string {
  return `${hhi.toFixed(3)} (${describeConcentration(hhi)})`;
}
