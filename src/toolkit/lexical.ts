import type { RankedEntry } from "./concentration.js";
import { topEntries } from "./concentration.js";

const TOKEN_PATTERN = /\b[a-z]{4,}\b/g;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export function keywordCounts(
  texts: Iterable<string>,
  stopwords: ReadonlySet<string>,
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const text of texts) {
    for (const token of tokenize(text)) {
      if (stopwords.has(token)) continue;
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }
  return counts;
}

export function topKeywords(
  texts: Iterable<string>,
  stopwords: ReadonlySet<string>,
  limit: number,
): RankedEntry[] {
  return topEntries(keywordCounts(texts, stopwords), limit);
}

export interface KeywordShiftOptions {
  readonly stopwords: ReadonlySet<string>;
  /** Minimum count on the dominant side. */
  readonly minCount: number;
  readonly limit: number;
}

export interface KeywordShift {
  readonly emerging: string[];
  readonly declining: string[];
}

/**
 * Splits a chronologically ordered corpus at floor(n/2) and compares token
 * frequencies between the halves. A token emerges when its recent count is
 * more than double its early count; declining is the mirror image.
 */
export function detectKeywordShift(
  corpus: readonly string[],
  options: KeywordShiftOptions,
): KeywordShift {
  const midpoint = Math.floor(corpus.length / 2);
  const early = keywordCounts(corpus.slice(0, midpoint), options.stopwords);
  const recent = keywordCounts(corpus.slice(midpoint), options.stopwords);

  const emerging = new Map<string, number>();
  for (const [word, count] of recent) {
    if (count >= options.minCount && count > (early.get(word) ?? 0) * 2) {
      emerging.set(word, count);
    }
  }

  const declining = new Map<string, number>();
  for (const [word, count] of early) {
    if (count >= options.minCount && count > (recent.get(word) ?? 0) * 2) {
      declining.set(word, count);
    }
  }

  return {
    emerging: topEntries(emerging, options.limit).map(([w]) => w),
    declining: topEntries(declining, options.limit).map(([w]) => w),
  };
}
