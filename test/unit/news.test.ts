import { describe, it, expect } from "vitest";
import { PhaseRuleEngine } from "../../src/engine/rule-engine.js";
import { silentLogger } from "../../src/logging/logger.js";
import { NewsExtractor, parsePublishedAt } from "../../src/streams/news/extractor.js";
import { createNewsRules } from "../../src/streams/news/rules.js";
import type { NewsArticle } from "../../src/streams/news/types.js";
import { makeArticle, makeConfig, makeExtractorOptions } from "../helpers/fixtures.js";

function coverage(): NewsArticle[] {
  const rows: Array<Partial<NewsArticle>> = [
    { publishedAt: "2025-01-05T08:00:00Z", author: null },
    { publishedAt: "2025-01-12T08:00:00Z", content: "Full text" },
    { publishedAt: "2025-01-20T08:00:00Z", content: "Full text" },
    { publishedAt: "2025-02-03T08:00:00Z", description: "Summary" },
    { publishedAt: "2025-02-10T08:00:00Z", description: "Summary", author: null },
    { publishedAt: "2025-02-17T08:00:00Z", description: "Summary", sourceName: "Grid Times" },
    { publishedAt: "2025-03-02T08:00:00Z", sourceName: "Grid Times", author: null },
    { publishedAt: "2025-03-09T08:00:00Z", sourceName: "Grid Times" },
    { publishedAt: "2025-03-31T23:30:00-04:00", sourceName: null, author: null },
    { publishedAt: "sometime last spring", sourceName: "  " },
  ];
  return rows.map((row, i) => makeArticle({ articleId: `n-${i}`, ...row }));
}

describe("parsePublishedAt", () => {
  it("reads the wall-clock time as UTC and ignores offsets", () => {
    expect(parsePublishedAt("2025-03-31T23:30:00-04:00")).toBe(Date.UTC(2025, 2, 31, 23, 30, 0));
    expect(parsePublishedAt("2025-03-31T23:30Z")).toBe(Date.UTC(2025, 2, 31, 23, 30, 0));
    expect(parsePublishedAt("2025-03-31")).toBe(Date.UTC(2025, 2, 31));
  });

  it("returns null for missing or unparseable values", () => {
    expect(parsePublishedAt(null)).toBeNull();
    expect(parsePublishedAt("March 31")).toBeNull();
  });
});

describe("NewsExtractor", () => {
  const extractor = new NewsExtractor(makeExtractorOptions());

  it("computes velocity over dated articles only", () => {
    const s = extractor.extract(coverage());
    expect(s.totalArticles).toBe(10);
    expect(s.articleVelocity).toEqual({ "2025-01": 3, "2025-02": 3, "2025-03": 3 });
    expect(s.peakMonth).toBe("2025-01");
    expect(s.velocityTrend).toBe("insufficient_data");
  });

  it("groups sources and reports missing authors", () => {
    const s = extractor.extract(coverage());
    expect(s.uniqueSources).toBe(3);
    expect(s.topSources).toEqual([
      ["Daily Wire Service", 5],
      ["Grid Times", 3],
      ["unknown", 2],
    ]);
    expect(s.uniqueAuthors).toBe(1);
    expect(s.articlesWithoutAuthorPercentage).toBe(40);
  });

  it("measures coverage and activity windows", () => {
    const s = extractor.extract(coverage());
    expect(s.articlesWithContent).toBe(2);
    expect(s.articlesWithDescription).toBe(3);
    expect(s.coveragePercentage).toBe(25);
    expect(s.firstArticleDate).toBe("2025-01-05");
    expect(s.articlesLastMonth).toBe(0);
    expect(s.articlesLast3Months).toBe(2);
    expect(s.articlesFirst3Months).toBe(9);
  });

  it("reports the range of parseable dates", () => {
    expect(extractor.dateRange(coverage())).toEqual({ start: "2025-01-05", end: "2025-03-31" });
  });
});

describe("news rules", () => {
  it("lists the top sources in the rationale", () => {
    const snapshot = new NewsExtractor(makeExtractorOptions()).extract(coverage());
    const engine = new PhaseRuleEngine(createNewsRules(makeConfig().thresholds.news), silentLogger());
    const verdict = engine.determinePhase(snapshot);
    expect(verdict.rationale).toContain(
      "Top news sources:\n  - Daily Wire Service: 5 articles\n  - Grid Times: 3 articles\n  - unknown: 2 articles",
    );
  });
});
