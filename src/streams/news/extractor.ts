import { MetricsExtractor } from "../../engine/extractor.js";
import { herfindahl, tally, topEntries } from "../../toolkit/concentration.js";
import { detectKeywordShift, topKeywords } from "../../toolkit/lexical.js";
import { stopwordsFor } from "../../toolkit/lexicons.js";
import { percentage } from "../../toolkit/stats.js";
import { bucketCounts, summarizeVelocity } from "../../toolkit/velocity.js";
import { activityWindows, monthKey } from "../../toolkit/windows.js";
import { nonBlank } from "../common.js";
import type { NewsArticle, NewsSnapshot } from "./types.js";

const UNKNOWN_SOURCE = "unknown";

const ISO_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?/;

/**
 * Reads the date and wall-clock time of an ISO-8601 string as UTC.
 * Any offset or zone designator is ignored.
 */
export function parsePublishedAt(value: string | null): number | null {
  if (value === null) return null;
  const match = ISO_PREFIX.exec(value.trim());
  if (!match) return null;
  const [, y, mo, d, h, mi, s] = match;
  const ms = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h ?? 0), Number(mi ?? 0), Number(s ?? 0));
  return Number.isNaN(ms) ? null : ms;
}

export class NewsExtractor extends MetricsExtractor<NewsArticle, NewsSnapshot> {
  readonly stream = "news" as const;
  readonly minimumRecords = 10;

  protected observedAt(article: NewsArticle): Date | null {
    const ms = parsePublishedAt(article.publishedAt);
    return ms === null ? null : new Date(ms);
  }

  protected compute(articles: readonly NewsArticle[], now: Date): NewsSnapshot {
    return {
      ...this.volume(articles),
      ...this.sources(articles),
      ...this.authors(articles),
      ...this.keywords(articles),
      ...this.temporal(articles, now),
      ...this.coverage(articles),
    };
  }

  private volume(articles: readonly NewsArticle[]) {
    const articleVelocity = bucketCounts(articles, (a) => {
      const ms = parsePublishedAt(a.publishedAt);
      return ms === null ? null : monthKey(ms);
    });
    const summary = summarizeVelocity(articleVelocity, this.options.trend);
    this.logger.debug({ trend: summary.trend, buckets: summary.bucketCount }, "Article velocity");

    return {
      totalArticles: articles.length,
      articleVelocity,
      velocityTrend: summary.trend,
      avgArticlesPerMonth: summary.average,
      peakMonth: summary.peakBucket,
      peakCount: summary.peakCount,
      recentVelocity: summary.recentAverage,
    };
  }

  private sources(articles: readonly NewsArticle[]) {
    const sources = tally(articles, (a) => (nonBlank(a.sourceName) ? a.sourceName.trim() : UNKNOWN_SOURCE));
    return {
      uniqueSources: sources.size,
      topSources: topEntries(sources, this.options.topN),
      sourceConcentrationHhi: herfindahl(sources.values()),
    };
  }

  private authors(articles: readonly NewsArticle[]) {
    const authors = tally(articles, (a) => (nonBlank(a.author) ? a.author.trim() : null));
    const missing = articles.filter((a) => !nonBlank(a.author)).length;
    return {
      uniqueAuthors: authors.size,
      topAuthors: topEntries(authors, this.options.topN),
      authorConcentrationHhi: herfindahl(authors.values()),
      articlesWithoutAuthorPercentage: percentage(missing, articles.length),
    };
  }

  private keywords(articles: readonly NewsArticle[]) {
    const stopwords = stopwordsFor(this.stream);
    const fullText = articles.map((a) => [a.title, a.description ?? "", a.content ?? ""].join(" "));
    const headlines = articles.map((a) => `${a.title} ${a.description ?? ""}`);
    const shift = detectKeywordShift(headlines, {
      stopwords,
      minCount: this.options.minShiftCount,
      limit: this.options.maxShiftKeywords,
    });
    return {
      topKeywords: topKeywords(fullText, stopwords, this.options.topKeywords),
      emergingKeywords: shift.emerging,
      decliningKeywords: shift.declining,
    };
  }

  private temporal(articles: readonly NewsArticle[], now: Date) {
    const windows = activityWindows(
      articles.flatMap((a) => {
        const ms = parsePublishedAt(a.publishedAt);
        return ms === null ? [] : [ms];
      }),
      now,
    );
    return {
      firstArticleDate: windows.firstDate,
      articlesLastMonth: windows.lastMonth,
      articlesLast3Months: windows.last3Months,
      articlesFirst3Months: windows.first3Months,
      growthRateEarlyVsLate: windows.growthRate,
    };
  }

  private coverage(articles: readonly NewsArticle[]) {
    const articlesWithContent = articles.filter((a) => nonBlank(a.content)).length;
    const articlesWithDescription = articles.filter((a) => nonBlank(a.description)).length;
    return {
      articlesWithContent,
      articlesWithDescription,
      coveragePercentage: percentage(articlesWithContent + articlesWithDescription, articles.length * 2),
    };
  }
}
