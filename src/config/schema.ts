import { z } from "zod";
import type { PhasewatchConfig } from "./types.js";

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const storageSchema = z.object({
  dir: z.string().optional(),
});

const count = (fallback: number) => z.number().int().nonnegative().default(fallback);
const value = (fallback: number) => z.number().default(fallback);
const share = (fallback: number) => z.number().min(0).max(100).default(fallback);
const band = (fallback: number) => z.number().min(0).max(1).default(fallback);

const trendSchema = z
  .object({
    window: z.number().int().positive().default(3),
    growthFactor: z.number().positive().default(1.2),
    declineFactor: z.number().positive().default(0.8),
  })
  .refine((t) => t.declineFactor <= t.growthFactor, {
    message: "declineFactor must not exceed growthFactor",
  });

const lexicalSchema = z.object({
  topKeywords: z.number().int().positive().default(20),
  maxShiftKeywords: z.number().int().positive().default(10),
  minShiftCount: z
    .object({
      paper: count(10),
      patent: count(5),
      social: count(5),
      news: count(5),
      finance: count(5),
    })
    .default({}),
});

const analysisSchema = z.object({
  minimumRecords: z
    .object({
      paper: count(100),
      patent: count(10),
      social: count(10),
      news: count(10),
      finance: count(20),
    })
    .default({}),
  trend: trendSchema.default({}),
  lexical: lexicalSchema.default({}),
  topN: z.number().int().positive().default(10),
});

// ── Per-stream rule thresholds ──

const paperThresholdsSchema = z.object({
  earlyGrowthRate: value(50),
  basicResearchHigh: share(70),
  lowCitationAverage: value(20),
  academicVenueDominance: share(90),
  recentOutputRatio: value(2),
  peakRecencyYears: count(3),
  citationGrowthHigh: value(30),
  citationGrowthModerate: value(10),
  appliedTransitionLow: share(40),
  appliedTransitionHigh: share(60),
  postPeakOutputRatio: value(0.7),
  appliedResearchHigh: share(60),
  appliedResearchVeryHigh: share(80),
  slopePeakAgeMin: count(4),
  slopePeakAgeMax: count(7),
  highCitationAverage: value(50),
  industryVenueShare: share(30),
  plateauPeakAge: count(8),
});

const patentThresholdsSchema = z.object({
  lowPatentCount: count(50),
  highAcademicShare: share(50),
  lowForwardCitations: value(2),
  youngTechnologyYears: count(5),
  matureTechnologyYears: count(15),
  fewAssignees: count(20),
  lowCountrySpread: count(5),
  highCountrySpread: count(20),
  recentPeakYears: count(3),
  corporateTransitionLow: share(40),
  corporateTransitionHigh: share(70),
  lowHhi: band(0.1),
  highHhi: band(0.25),
  velocityBoostRatio: value(1.2),
  troughPeakAgeMax: count(5),
  postPeakOutputRatio: value(0.6),
  lowCitationRatio: value(0.3),
  highCitationRatio: value(1.0),
  entrantDeclineRatio: value(0.8),
  corporateLedLow: share(70),
  corporateLedHigh: share(90),
  slopePeakAgeMin: count(4),
  slopePeakAgeMax: count(10),
  corporateDominance: share(85),
});

const socialThresholdsSchema = z.object({
  lowPostCount: count(50),
  highPostCount: count(500),
  lowCommunityCount: count(3),
  highCommunityCount: count(15),
  lowAvgScore: value(20),
  highAvgScore: value(100),
  fewAuthors: count(30),
  manyHighlyEngaged: count(10),
  lowHhi: band(0.1),
  highHhi: band(0.25),
  declineRate: value(-20),
  recentCollapseRatio: value(0.5),
  linkMixLow: share(30),
  linkMixHigh: share(60),
  linkHeavy: share(40),
  matureCoverage: share(50),
});

const newsThresholdsSchema = z.object({
  lowArticleCount: count(30),
  highArticleCount: count(300),
  lowSourceCount: count(5),
  highSourceCount: count(20),
  fewAuthors: count(20),
  missingAuthorShare: share(40),
  lowHhi: band(0.1),
  highHhi: band(0.25),
  velocityBoostRatio: value(1.2),
  manyEmergingKeywords: count(5),
  declineRate: value(-20),
  recentCollapseRatio: value(0.5),
  slopeCoverage: share(60),
  plateauCoverage: share(70),
});

const financeThresholdsSchema = z.object({
  highVolatility: value(3),
  lowVolatility: value(1),
  fewTickers: count(3),
  lowCorrelation: value(0.3),
  strongBullish: value(30),
  strongBearish: value(-20),
  highReturn: value(50),
  moderateReturnLow: value(5),
  moderateReturnHigh: value(30),
  highPeRatio: value(50),
  fairPeLow: value(10),
  fairPeHigh: value(30),
  severeDrawdown: value(40),
  moderateDrawdown: value(20),
  strongSharpe: value(1),
});

const thresholdsSchema = z.object({
  paper: paperThresholdsSchema.default({}),
  patent: patentThresholdsSchema.default({}),
  social: socialThresholdsSchema.default({}),
  news: newsThresholdsSchema.default({}),
  finance: financeThresholdsSchema.default({}),
});

export const phasewatchConfigSchema = z.object({
  logging: loggingSchema.default({}),
  storage: storageSchema.default({}),
  analysis: analysisSchema.default({}),
  thresholds: thresholdsSchema.default({}),
});

export function parseConfig(raw: unknown): PhasewatchConfig {
  return phasewatchConfigSchema.parse(raw);
}
