import { z } from "zod";
import {
  countSchema,
  hhiSchema,
  maybe,
  rankedEntrySchema,
  shareSchema,
  trendLabelSchema,
  velocitySchema,
  yearSchema,
} from "../common.js";

export const paperRecordSchema = z.object({
  paperId: z.string().min(1),
  title: z.string().default(""),
  year: maybe(yearSchema),
  citationCount: maybe(z.number().int().nonnegative()),
  abstract: maybe(z.string()),
  venue: maybe(z.string()),
  openAccessPdf: maybe(z.string()),
});

export type PaperRecord = z.infer<typeof paperRecordSchema>;

export const researchTypeSchema = z.enum(["basic", "applied", "mixed"]);
export type ResearchType = z.infer<typeof researchTypeSchema>;

export const paperSnapshotSchema = z.object({
  // volume
  totalPapers: countSchema,
  publicationVelocity: velocitySchema,
  velocityTrend: trendLabelSchema,
  avgPapersPerYear: z.number().nonnegative(),
  peakYear: z.number().int().nullable(),
  peakCount: countSchema,
  recentVelocity: z.number().nonnegative(),
  firstYear: z.number().int().nullable(),
  lastYear: z.number().int().nullable(),
  yearsSincePeak: z.number().int().nullable(),
  // citations
  totalCitations: countSchema,
  papersWithCitations: countSchema,
  avgCitationsPerPaper: z.number().nonnegative(),
  medianCitations: z.number().nonnegative(),
  citationGrowthRate: z.number(),
  highlyCitedCount: countSchema,
  // research type
  basicResearchPercentage: shareSchema,
  appliedResearchPercentage: shareSchema,
  mixedResearchPercentage: shareSchema,
  researchTypeTrend: z.enum(["toward_applied", "toward_basic", "stable"]),
  // lexical
  topKeywords: z.array(rankedEntrySchema),
  emergingKeywords: z.array(z.string()),
  decliningKeywords: z.array(z.string()),
  // venues
  academicVenuePercentage: shareSchema,
  industryVenuePercentage: shareSchema,
  conferencePercentage: shareSchema,
  journalPercentage: shareSchema,
  topVenues: z.array(rankedEntrySchema),
  venueConcentrationHhi: hhiSchema,
  // temporal
  papersLastYear: countSchema,
  papersLast2Years: countSchema,
  papersFirst2Years: countSchema,
  growthRateEarlyVsLate: z.number(),
  // coverage
  papersWithAbstracts: countSchema,
  papersWithPdf: countSchema,
  coveragePercentage: shareSchema,
});

export type PaperSnapshot = z.infer<typeof paperSnapshotSchema>;
