import { MetricsExtractor } from "../../engine/extractor.js";
import { herfindahl, tally, topEntries } from "../../toolkit/concentration.js";
import { detectKeywordShift, topKeywords } from "../../toolkit/lexical.js";
import { stopwordsFor } from "../../toolkit/lexicons.js";
import { mean, median, percentage, percentile, sum } from "../../toolkit/stats.js";
import { bucketCounts, compareHalves, summarizeVelocity } from "../../toolkit/velocity.js";
import { activityWindows, isValidTime, monthKey } from "../../toolkit/windows.js";
import { nonBlank } from "../common.js";
import type { SocialPost, SocialSnapshot } from "./types.js";

const HIGHLY_ENGAGED_FLOOR = 100;
/** Recent-half mean score against the early half: above +20% rising, below -20% falling. */
const ENGAGEMENT_GROWTH = 1.2;
const ENGAGEMENT_DECLINE = 0.8;
const UNKNOWN_COMMUNITY = "unknown";
const DELETED_AUTHOR = "[deleted]";

function postedAt(post: SocialPost): number | null {
  if (post.createdUtc === null) return null;
  const ms = post.createdUtc * 1000;
  return isValidTime(ms) ? ms : null;
}

function scoresOf(posts: readonly SocialPost[]): number[] {
  return posts.flatMap((p) => (p.score === null ? [] : [p.score]));
}

export class SocialExtractor extends MetricsExtractor<SocialPost, SocialSnapshot> {
  readonly stream = "social" as const;
  readonly minimumRecords = 10;

  protected observedAt(post: SocialPost): Date | null {
    const ms = postedAt(post);
    return ms === null ? null : new Date(ms);
  }

  protected compute(posts: readonly SocialPost[], now: Date): SocialSnapshot {
    return {
      ...this.volume(posts),
      ...this.engagement(posts),
      ...this.audience(posts),
      ...this.postTypes(posts),
      ...this.keywords(posts),
      ...this.temporal(posts, now),
      ...this.coverage(posts),
    };
  }

  private volume(posts: readonly SocialPost[]) {
    const postVelocity = bucketCounts(posts, (p) => {
      const ms = postedAt(p);
      return ms === null ? null : monthKey(ms);
    });
    const summary = summarizeVelocity(postVelocity, this.options.trend);
    this.logger.debug({ trend: summary.trend, buckets: summary.bucketCount }, "Post velocity");

    return {
      totalPosts: posts.length,
      postVelocity,
      velocityTrend: summary.trend,
      avgPostsPerMonth: summary.average,
      peakMonth: summary.peakBucket,
      peakCount: summary.peakCount,
      recentVelocity: summary.recentAverage,
    };
  }

  private engagement(posts: readonly SocialPost[]) {
    const scores = scoresOf(posts);
    const comments = posts.flatMap((p) => (p.commentCount === null ? [] : [p.commentCount]));
    const threshold = scores.length > 1 ? Math.max(HIGHLY_ENGAGED_FLOOR, percentile(scores, 90)) : HIGHLY_ENGAGED_FLOOR;
    const midpoint = Math.floor(posts.length / 2);

    return {
      totalScore: sum(scores),
      avgScorePerPost: mean(scores),
      medianScore: median(scores),
      totalComments: sum(comments),
      avgCommentsPerPost: mean(comments),
      medianComments: median(comments),
      engagementTrend: compareHalves(
        scoresOf(posts.slice(0, midpoint)),
        scoresOf(posts.slice(midpoint)),
        ENGAGEMENT_GROWTH,
        ENGAGEMENT_DECLINE,
      ),
      highlyEngagedCount: scores.filter((s) => s >= threshold).length,
    };
  }

  private audience(posts: readonly SocialPost[]) {
    const communities = tally(posts, (p) => (nonBlank(p.community) ? p.community.trim() : UNKNOWN_COMMUNITY));
    const authors = tally(posts, (p) => (nonBlank(p.author) ? p.author.trim() : DELETED_AUTHOR));
    return {
      uniqueCommunities: communities.size,
      topCommunities: topEntries(communities, this.options.topN),
      communityConcentrationHhi: herfindahl(communities.values()),
      uniqueAuthors: authors.size,
      topAuthors: topEntries(authors, this.options.topN),
      authorConcentrationHhi: herfindahl(authors.values()),
    };
  }

  private postTypes(posts: readonly SocialPost[]) {
    return {
      selfPostPercentage: percentage(posts.filter((p) => p.isSelf === true).length, posts.length),
      linkPostPercentage: percentage(posts.filter((p) => p.isSelf === false).length, posts.length),
    };
  }

  private keywords(posts: readonly SocialPost[]) {
    const stopwords = stopwordsFor(this.stream);
    const corpus = posts.map((p) => `${p.title} ${p.body ?? ""}`);
    const shift = detectKeywordShift(corpus, {
      stopwords,
      minCount: this.options.minShiftCount,
      limit: this.options.maxShiftKeywords,
    });
    return {
      topKeywords: topKeywords(corpus, stopwords, this.options.topKeywords),
      emergingKeywords: shift.emerging,
      decliningKeywords: shift.declining,
    };
  }

  private temporal(posts: readonly SocialPost[], now: Date) {
    const windows = activityWindows(
      posts.flatMap((p) => {
        const ms = postedAt(p);
        return ms === null ? [] : [ms];
      }),
      now,
    );
    return {
      firstPostDate: windows.firstDate,
      postsLastMonth: windows.lastMonth,
      postsLast3Months: windows.last3Months,
      postsFirst3Months: windows.first3Months,
      growthRateEarlyVsLate: windows.growthRate,
    };
  }

  private coverage(posts: readonly SocialPost[]) {
    const postsWithBody = posts.filter((p) => nonBlank(p.body)).length;
    return {
      postsWithBody,
      coveragePercentage: percentage(postsWithBody, posts.length),
    };
  }
}
