import { z } from "zod";
import {
  countSchema,
  epochSecondsSchema,
  halvesTrendSchema,
  hhiSchema,
  maybe,
  rankedEntrySchema,
  shareSchema,
  trendLabelSchema,
  velocitySchema,
} from "../common.js";

export const socialPostSchema = z.object({
  postId: z.string().min(1),
  title: z.string().default(""),
  body: maybe(z.string()),
  score: maybe(z.number().int()),
  commentCount: maybe(z.number().int().nonnegative()),
  author: maybe(z.string()),
  community: maybe(z.string()),
  /** Unix seconds. */
  createdUtc: maybe(epochSecondsSchema),
  isSelf: maybe(z.boolean()),
});

export type SocialPost = z.infer<typeof socialPostSchema>;

export const socialSnapshotSchema = z.object({
  // volume
  totalPosts: countSchema,
  postVelocity: velocitySchema,
  velocityTrend: trendLabelSchema,
  avgPostsPerMonth: z.number().nonnegative(),
  peakMonth: z.string().nullable(),
  peakCount: countSchema,
  recentVelocity: z.number().nonnegative(),
  // engagement
  totalScore: z.number(),
  avgScorePerPost: z.number(),
  medianScore: z.number(),
  totalComments: countSchema,
  avgCommentsPerPost: z.number().nonnegative(),
  medianComments: z.number().nonnegative(),
  engagementTrend: halvesTrendSchema,
  highlyEngagedCount: countSchema,
  // communities
  uniqueCommunities: countSchema,
  topCommunities: z.array(rankedEntrySchema),
  communityConcentrationHhi: hhiSchema,
  // authors
  uniqueAuthors: countSchema,
  topAuthors: z.array(rankedEntrySchema),
  authorConcentrationHhi: hhiSchema,
  // post types
  selfPostPercentage: shareSchema,
  linkPostPercentage: shareSchema,
  // lexical
  topKeywords: z.array(rankedEntrySchema),
  emergingKeywords: z.array(z.string()),
  decliningKeywords: z.array(z.string()),
  // temporal
  firstPostDate: z.string().nullable(),
  postsLastMonth: countSchema,
  postsLast3Months: countSchema,
  postsFirst3Months: countSchema,
  growthRateEarlyVsLate: z.number(),
  // coverage
  postsWithBody: countSchema,
  coveragePercentage: shareSchema,
});

export type SocialSnapshot = z.infer<typeof socialSnapshotSchema>;
