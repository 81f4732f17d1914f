import { parseConfig } from "../../src/config/schema.js";
import type { PhasewatchConfig } from "../../src/config/types.js";
import type { ExtractorOptions } from "../../src/engine/extractor.js";
import { silentLogger } from "../../src/logging/logger.js";
import type { FinanceRecord, PriceRow, TickerProfile } from "../../src/streams/finance/types.js";
import type { NewsArticle } from "../../src/streams/news/types.js";
import type { PaperRecord } from "../../src/streams/paper/types.js";
import type { PatentRecord } from "../../src/streams/patent/types.js";
import type { SocialPost } from "../../src/streams/social/types.js";
import { DEFAULT_TREND_OPTIONS } from "../../src/toolkit/velocity.js";

/** Fixed reference clock for time-window metrics. */
export const NOW = new Date(Date.UTC(2025, 5, 1));

export function makeConfig(raw: unknown = {}): PhasewatchConfig {
  return parseConfig(raw);
}

export function makeExtractorOptions(overrides: Partial<ExtractorOptions> = {}): ExtractorOptions {
  return {
    logger: silentLogger(),
    trend: DEFAULT_TREND_OPTIONS,
    topN: 10,
    topKeywords: 20,
    maxShiftKeywords: 10,
    minShiftCount: 5,
    now: () => NOW,
    ...overrides,
  };
}

export function makePaper(overrides: Partial<PaperRecord> = {}): PaperRecord {
  return {
    paperId: "paper-1",
    title: "Fundamental mechanism of lattice spin",
    year: 2020,
    citationCount: 5,
    abstract: null,
    venue: "Journal of Quantum Matter",
    openAccessPdf: null,
    ...overrides,
  };
}

export function makePatent(overrides: Partial<PatentRecord> = {}): PatentRecord {
  return {
    patentId: "US-0001",
    title: "Electrode assembly",
    abstract: null,
    year: 2020,
    type: "utility",
    forwardCitations: 2,
    backwardCitations: 4,
    assignees: [{ organization: "Acme Cells Inc", firstName: null, lastName: null, country: "us" }],
    ...overrides,
  };
}

export function makePost(overrides: Partial<SocialPost> = {}): SocialPost {
  return {
    postId: "post-1",
    title: "Thoughts on lattice batteries",
    body: null,
    score: 10,
    commentCount: 2,
    author: "reader",
    community: "batteries",
    createdUtc: Date.UTC(2025, 0, 15) / 1000,
    isSelf: true,
    ...overrides,
  };
}

export function makeArticle(overrides: Partial<NewsArticle> = {}): NewsArticle {
  return {
    articleId: "article-1",
    title: "Startup unveils lattice battery",
    description: null,
    content: null,
    publishedAt: "2025-01-15T09:30:00Z",
    sourceName: "Daily Wire Service",
    author: "Staff",
    ...overrides,
  };
}

export function makePriceRow(overrides: Partial<PriceRow> = {}): PriceRow {
  return {
    kind: "price",
    ticker: "LATX",
    date: "2024-01-01",
    open: null,
    high: null,
    low: null,
    close: 100,
    adjClose: 100,
    volume: 1_000_000,
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<TickerProfile> = {}): TickerProfile {
  return {
    kind: "profile",
    ticker: "LATX",
    companyName: "Lattice Energy Corp",
    sector: "Energy",
    industry: "Batteries",
    country: "US",
    marketCap: 1_000_000_000,
    peRatio: 20,
    ...overrides,
  };
}

/** ISO date `offset` days after `start`. */
export function dayAfter(start: string, offset: number): string {
  const ms = Date.parse(`${start}T00:00:00Z`) + offset * 86_400_000;
  return new Date(ms).toISOString().slice(0, 10);
}

/** One price row per day for a ticker, starting at `start`. */
export function priceSeries(
  ticker: string,
  prices: readonly number[],
  volumes: readonly number[] = [],
  start = "2024-01-01",
): PriceRow[] {
  return prices.map((price, i) =>
    makePriceRow({
      ticker,
      date: dayAfter(start, i),
      close: price,
      adjClose: price,
      volume: volumes[i] ?? 1_000_000,
    }),
  );
}

/**
 * 150 papers over 2017-2024 with rising yearly output, nine in ten basic
 * research, five citations each, all in academic journals.
 */
export function earlyStagePapers(): PaperRecord[] {
  const perYear: Array<[number, number]> = [
    [2017, 5],
    [2018, 8],
    [2019, 10],
    [2020, 14],
    [2021, 18],
    [2022, 25],
    [2023, 30],
    [2024, 40],
  ];
  const papers: PaperRecord[] = [];
  for (const [year, count] of perYear) {
    for (let i = 0; i < count; i++) {
      const n = papers.length;
      papers.push(
        makePaper({
          paperId: `p-${n}`,
          year,
          title:
            n % 10 === 9
              ? "Scalable manufacturing process for lattice spin"
              : "Fundamental mechanism of lattice spin",
        }),
      );
    }
  }
  return papers;
}

/**
 * One ticker over 63 trading days: climbs from 88 to a 120 peak, then falls
 * to 66 (a 45% drawdown, -25% over the window) on halved volume.
 */
export function troughMarket(): FinanceRecord[] {
  const prices: number[] = [];
  for (let i = 0; i <= 20; i++) prices.push(88 + 1.6 * i);
  for (let i = 1; i <= 42; i++) prices.push(120 - (54 / 42) * i);
  prices[0] = 88;
  prices[20] = 120;
  prices[62] = 66;
  const volumes = prices.map((_, i) => (i < 31 ? 1_000_000 : 500_000));
  return priceSeries("LATX", prices, volumes);
}
