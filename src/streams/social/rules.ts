import type { SocialThresholds } from "../../config/types.js";
import type { StreamRuleSet } from "../../engine/rule-engine.js";
import { formatHhi } from "../../toolkit/concentration.js";
import type { SocialSnapshot } from "./types.js";

const pct = (value: number) => `${value.toFixed(1)}%`;

export function createSocialRules(t: SocialThresholds): StreamRuleSet<SocialSnapshot> {
  const moderateHhi = (s: SocialSnapshot) =>
    s.communityConcentrationHhi >= t.lowHhi && s.communityConcentrationHhi <= t.highHhi;

  return {
    stream: "social",
    table: {
      technology_trigger: [
        {
          id: "few_posts",
          description: `Fewer than ${t.lowPostCount} posts`,
          weight: 0.25,
          test: (s) => s.totalPosts < t.lowPostCount,
        },
        {
          id: "niche_communities",
          description: `Discussed in fewer than ${t.lowCommunityCount} communities`,
          weight: 0.25,
          test: (s) => s.uniqueCommunities < t.lowCommunityCount,
        },
        {
          id: "low_engagement",
          description: `Average score below ${t.lowAvgScore}`,
          weight: 0.2,
          test: (s) => s.avgScorePerPost < t.lowAvgScore,
        },
        {
          id: "few_authors",
          description: `Fewer than ${t.fewAuthors} authors`,
          weight: 0.15,
          test: (s) => s.uniqueAuthors < t.fewAuthors,
        },
        {
          id: "concentrated_authors",
          description: `Author HHI above ${t.highHhi}`,
          weight: 0.15,
          test: (s) => s.authorConcentrationHhi > t.highHhi,
        },
      ],
      peak_inflated_expectations: [
        {
          id: "high_activity",
          description: "Post velocity increasing or at its peak",
          weight: 0.25,
          test: (s) => s.velocityTrend === "increasing" || s.velocityTrend === "peak_reached",
        },
        {
          id: "high_engagement",
          description: `Average score above ${t.highAvgScore}`,
          weight: 0.2,
          test: (s) => s.avgScorePerPost > t.highAvgScore,
        },
        {
          id: "viral_posts",
          description: `More than ${t.manyHighlyEngaged} highly engaged posts`,
          weight: 0.15,
          test: (s) => s.highlyEngagedCount > t.manyHighlyEngaged,
        },
        {
          id: "spreading_communities",
          description: `Discussed in more than ${t.lowCommunityCount} communities`,
          weight: 0.15,
          test: (s) => s.uniqueCommunities > t.lowCommunityCount,
        },
        {
          id: "dispersed_communities",
          description: `Community HHI below ${t.lowHhi}`,
          weight: 0.15,
          test: (s) => s.communityConcentrationHhi < t.lowHhi,
        },
        {
          id: "engagement_rising",
          description: "Engagement increasing",
          weight: 0.1,
          test: (s) => s.engagementTrend === "increasing",
        },
      ],
      trough_disillusionment: [
        {
          id: "declining_velocity",
          description: "Post velocity decreasing",
          weight: 0.3,
          test: (s) => s.velocityTrend === "decreasing",
        },
        {
          id: "engagement_falling",
          description: "Engagement decreasing",
          weight: 0.25,
          test: (s) => s.engagementTrend === "decreasing",
        },
        {
          id: "negative_growth",
          description: `Growth below ${t.declineRate}%`,
          weight: 0.2,
          test: (s) => s.growthRateEarlyVsLate < t.declineRate,
        },
        {
          id: "recent_collapse",
          description: `Last 3 months below ${t.recentCollapseRatio * 100}% of the first 3 months`,
          weight: 0.15,
          test: (s) => s.postsLast3Months < s.postsFirst3Months * t.recentCollapseRatio,
        },
        {
          id: "topics_fading",
          description: "More declining than emerging keywords",
          weight: 0.1,
          test: (s) => s.decliningKeywords.length > s.emergingKeywords.length,
        },
      ],
      slope_enlightenment: [
        {
          id: "stable_velocity",
          description: "Post velocity stable",
          weight: 0.25,
          test: (s) => s.velocityTrend === "stable",
        },
        {
          id: "stable_engagement",
          description: "Engagement stable",
          weight: 0.2,
          test: (s) => s.engagementTrend === "stable",
        },
        {
          id: "focused_communities",
          description: `Between ${t.lowCommunityCount} and ${t.highCommunityCount} communities`,
          weight: 0.2,
          test: (s) => s.uniqueCommunities >= t.lowCommunityCount && s.uniqueCommunities <= t.highCommunityCount,
        },
        {
          id: "practical_links",
          description: `Link posts between ${t.linkMixLow}% and ${t.linkMixHigh}%`,
          weight: 0.15,
          test: (s) => s.linkPostPercentage >= t.linkMixLow && s.linkPostPercentage <= t.linkMixHigh,
        },
        {
          id: "moderate_concentration",
          description: "Community concentration moderate",
          weight: 0.1,
          test: moderateHhi,
        },
        {
          id: "topics_turning_over",
          description: "Both emerging and declining keywords present",
          weight: 0.1,
          test: (s) => s.emergingKeywords.length > 0 && s.decliningKeywords.length > 0,
        },
      ],
      plateau_productivity: [
        {
          id: "many_posts",
          description: `More than ${t.highPostCount} posts`,
          weight: 0.25,
          test: (s) => s.totalPosts > t.highPostCount,
        },
        {
          id: "stable_velocity",
          description: "Post velocity stable",
          weight: 0.2,
          test: (s) => s.velocityTrend === "stable",
        },
        {
          id: "mainstream_communities",
          description: `Discussed in more than ${t.highCommunityCount} communities`,
          weight: 0.2,
          test: (s) => s.uniqueCommunities > t.highCommunityCount,
        },
        {
          id: "stable_engagement",
          description: "Engagement stable",
          weight: 0.15,
          test: (s) => s.engagementTrend === "stable",
        },
        {
          id: "link_heavy",
          description: `Link posts above ${t.linkHeavy}%`,
          weight: 0.1,
          test: (s) => s.linkPostPercentage > t.linkHeavy,
        },
        {
          id: "substantive_posts",
          description: `Posts with body text above ${t.matureCoverage}%`,
          weight: 0.1,
          test: (s) => s.coveragePercentage > t.matureCoverage,
        },
      ],
    },

    keyMetrics(phase, s) {
      switch (phase) {
        case "technology_trigger":
          return [
            `Total posts: ${s.totalPosts}`,
            `Communities: ${s.uniqueCommunities}`,
            `Average score: ${s.avgScorePerPost.toFixed(1)}`,
            `Authors: ${s.uniqueAuthors}`,
          ];
        case "peak_inflated_expectations":
          return [
            `Velocity trend: ${s.velocityTrend}`,
            `Average score: ${s.avgScorePerPost.toFixed(1)}`,
            `Highly engaged posts: ${s.highlyEngagedCount}`,
            `Community HHI: ${formatHhi(s.communityConcentrationHhi)}`,
          ];
        case "trough_disillusionment":
          return [
            `Velocity trend: ${s.velocityTrend}`,
            `Engagement trend: ${s.engagementTrend}`,
            `Growth, last vs first 3 months: ${pct(s.growthRateEarlyVsLate)}`,
            `Declining keywords: ${s.decliningKeywords.length}`,
          ];
        case "slope_enlightenment":
          return [
            `Velocity trend: ${s.velocityTrend}`,
            `Engagement trend: ${s.engagementTrend}`,
            `Communities: ${s.uniqueCommunities}`,
            `Link posts: ${pct(s.linkPostPercentage)}`,
          ];
        case "plateau_productivity":
          return [
            `Total posts: ${s.totalPosts}`,
            `Velocity trend: ${s.velocityTrend}`,
            `Communities: ${s.uniqueCommunities}`,
            `Posts with body text: ${pct(s.coveragePercentage)}`,
          ];
      }
    },

    highlights(s) {
      return {
        title: "Top communities",
        lines: s.topCommunities.slice(0, 5).map(([name, count]) => `r/${name}: ${count} posts`),
      };
    },
  };
}
