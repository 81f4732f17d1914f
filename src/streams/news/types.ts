import { z } from "zod";
import {
  countSchema,
  hhiSchema,
  maybe,
  rankedEntrySchema,
  shareSchema,
  trendLabelSchema,
  velocitySchema,
} from "../common.js";

export const newsArticleSchema = z.object({
  articleId: z.string().min(1),
  title: z.string().default(""),
  description: maybe(z.string()),
  content: maybe(z.string()),
  /** ISO-8601; the wall-clock part is read as UTC. */
  publishedAt: maybe(z.string()),
  sourceName: maybe(z.string()),
  author: maybe(z.string()),
});

export type NewsArticle = z.infer<typeof newsArticleSchema>;

export const newsSnapshotSchema = z.object({
  // volume
  totalArticles: countSchema,
  articleVelocity: velocitySchema,
  velocityTrend: trendLabelSchema,
  avgArticlesPerMonth: z.number().nonnegative(),
  peakMonth: z.string().nullable(),
  peakCount: countSchema,
  recentVelocity: z.number().nonnegative(),
  // sources
  uniqueSources: countSchema,
  topSources: z.array(rankedEntrySchema),
  sourceConcentrationHhi: hhiSchema,
  // authors
  uniqueAuthors: countSchema,
  topAuthors: z.array(rankedEntrySchema),
  authorConcentrationHhi: hhiSchema,
  articlesWithoutAuthorPercentage: shareSchema,
  // lexical
  topKeywords: z.array(rankedEntrySchema),
  emergingKeywords: z.array(z.string()),
  decliningKeywords: z.array(z.string()),
  // temporal
  firstArticleDate: z.string().nullable(),
  articlesLastMonth: countSchema,
  articlesLast3Months: countSchema,
  articlesFirst3Months: countSchema,
  growthRateEarlyVsLate: z.number(),
  // coverage
  articlesWithContent: countSchema,
  articlesWithDescription: countSchema,
  coveragePercentage: shareSchema,
});

export type NewsSnapshot = z.infer<typeof newsSnapshotSchema>;
