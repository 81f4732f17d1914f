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

export const patentAssigneeSchema = z.object({
  organization: maybe(z.string()),
  firstName: maybe(z.string()),
  lastName: maybe(z.string()),
  country: maybe(z.string()),
});

export type PatentAssignee = z.infer<typeof patentAssigneeSchema>;

export const patentRecordSchema = z.object({
  patentId: z.string().min(1),
  title: z.string().default(""),
  abstract: maybe(z.string()),
  year: maybe(yearSchema),
  type: maybe(z.string()),
  forwardCitations: maybe(z.number().int().nonnegative()),
  backwardCitations: maybe(z.number().int().nonnegative()),
  assignees: z.array(patentAssigneeSchema).default([]),
});

export type PatentRecord = z.infer<typeof patentRecordSchema>;

export const assigneeKindSchema = z.enum(["corporate", "academic", "individual"]);
export type AssigneeKind = z.infer<typeof assigneeKindSchema>;

export const patentSnapshotSchema = z.object({
  // volume
  totalPatents: countSchema,
  patentVelocity: velocitySchema,
  velocityTrend: trendLabelSchema,
  avgPatentsPerYear: z.number().nonnegative(),
  peakYear: z.number().int().nullable(),
  peakCount: countSchema,
  recentVelocity: z.number().nonnegative(),
  yearsSincePeak: z.number().int().nullable(),
  // citations
  totalForwardCitations: countSchema,
  totalBackwardCitations: countSchema,
  avgForwardCitations: z.number().nonnegative(),
  avgBackwardCitations: z.number().nonnegative(),
  medianForwardCitations: z.number().nonnegative(),
  citationRatio: z.number().nonnegative(),
  highlyCitedCount: countSchema,
  // assignees
  uniqueAssigneesCount: countSchema,
  topAssignees: z.array(rankedEntrySchema),
  assigneeConcentrationHhi: hhiSchema,
  corporatePercentage: shareSchema,
  academicPercentage: shareSchema,
  individualPercentage: shareSchema,
  newEntrantsByYear: velocitySchema,
  // geography
  countryDistribution: velocitySchema,
  uniqueCountries: countSchema,
  topCountries: z.array(rankedEntrySchema),
  countryConcentrationHhi: hhiSchema,
  // types
  utilityPercentage: shareSchema,
  designPercentage: shareSchema,
  otherTypePercentage: shareSchema,
  // temporal
  firstPatentYear: z.number().int().nullable(),
  technologyAgeYears: z.number().int().nonnegative(),
  patentsLastYear: countSchema,
  patentsLast2Years: countSchema,
  // coverage
  patentsWithAbstract: countSchema,
  coveragePercentage: shareSchema,
});

export type PatentSnapshot = z.infer<typeof patentSnapshotSchema>;
