import type { NewsThresholds } from "../../config/types.js";
import type { StreamRuleSet } from "../../engine/rule-engine.js";
import { formatHhi } from "../../toolkit/concentration.js";
import type { NewsSnapshot } from "./types.js";

const pct = (value: number) => `${value.toFixed(1)}%`;

export function createNewsRules(t: NewsThresholds): StreamRuleSet<NewsSnapshot> {
  return {
    stream: "news",
    table: {
      technology_trigger: [
        {
          id: "sparse_coverage",
          description: `Fewer than ${t.lowArticleCount} articles`,
          weight: 0.3,
          test: (s) => s.totalArticles < t.lowArticleCount,
        },
        {
          id: "few_sources",
          description: `Fewer than ${t.lowSourceCount} sources`,
          weight: 0.25,
          test: (s) => s.uniqueSources < t.lowSourceCount,
        },
        {
          id: "concentrated_sources",
          description: `Source HHI above ${t.highHhi}`,
          weight: 0.2,
          test: (s) => s.sourceConcentrationHhi > t.highHhi,
        },
        {
          id: "few_authors",
          description: `Fewer than ${t.fewAuthors} authors`,
          weight: 0.15,
          test: (s) => s.uniqueAuthors < t.fewAuthors,
        },
        {
          id: "unattributed",
          description: `Articles without author above ${t.missingAuthorShare}%`,
          weight: 0.1,
          test: (s) => s.articlesWithoutAuthorPercentage > t.missingAuthorShare,
        },
      ],
      peak_inflated_expectations: [
        {
          id: "high_activity",
          description: "Article velocity increasing or at its peak",
          weight: 0.3,
          test: (s) => s.velocityTrend === "increasing" || s.velocityTrend === "peak_reached",
        },
        {
          id: "broad_pickup",
          description: `Covered by more than ${t.lowSourceCount} sources`,
          weight: 0.2,
          test: (s) => s.uniqueSources > t.lowSourceCount,
        },
        {
          id: "dispersed_sources",
          description: `Source HHI below ${t.lowHhi}`,
          weight: 0.2,
          test: (s) => s.sourceConcentrationHhi < t.lowHhi,
        },
        {
          id: "velocity_above_average",
          description: `Recent velocity above ${t.velocityBoostRatio}x the monthly average`,
          weight: 0.15,
          test: (s) => s.recentVelocity > s.avgArticlesPerMonth * t.velocityBoostRatio,
        },
        {
          id: "new_angles",
          description: `More than ${t.manyEmergingKeywords} emerging keywords`,
          weight: 0.15,
          test: (s) => s.emergingKeywords.length > t.manyEmergingKeywords,
        },
      ],
      trough_disillusionment: [
        {
          id: "declining_velocity",
          description: "Article velocity decreasing",
          weight: 0.35,
          test: (s) => s.velocityTrend === "decreasing",
        },
        {
          id: "negative_growth",
          description: `Growth below ${t.declineRate}%`,
          weight: 0.25,
          test: (s) => s.growthRateEarlyVsLate < t.declineRate,
        },
        {
          id: "recent_collapse",
          description: `Last 3 months below ${t.recentCollapseRatio * 100}% of the first 3 months`,
          weight: 0.2,
          test: (s) => s.articlesLast3Months < s.articlesFirst3Months * t.recentCollapseRatio,
        },
        {
          id: "topics_fading",
          description: "More declining than emerging keywords",
          weight: 0.1,
          test: (s) => s.decliningKeywords.length > s.emergingKeywords.length,
        },
        {
          id: "coverage_narrowing",
          description: `Source HHI above ${t.lowHhi}`,
          weight: 0.1,
          test: (s) => s.sourceConcentrationHhi > t.lowHhi,
        },
      ],
      slope_enlightenment: [
        {
          id: "stable_velocity",
          description: "Article velocity stable",
          weight: 0.3,
          test: (s) => s.velocityTrend === "stable",
        },
        {
          id: "steady_sources",
          description: `Between ${t.lowSourceCount} and ${t.highSourceCount} sources`,
          weight: 0.25,
          test: (s) => s.uniqueSources >= t.lowSourceCount && s.uniqueSources <= t.highSourceCount,
        },
        {
          id: "moderate_concentration",
          description: "Source concentration moderate",
          weight: 0.2,
          test: (s) => s.sourceConcentrationHhi >= t.lowHhi && s.sourceConcentrationHhi <= t.highHhi,
        },
        {
          id: "topics_turning_over",
          description: "Both emerging and declining keywords present",
          weight: 0.15,
          test: (s) => s.emergingKeywords.length > 0 && s.decliningKeywords.length > 0,
        },
        {
          id: "in_depth_coverage",
          description: `Content coverage above ${t.slopeCoverage}%`,
          weight: 0.1,
          test: (s) => s.coveragePercentage > t.slopeCoverage,
        },
      ],
      plateau_productivity: [
        {
          id: "sustained_coverage",
          description: `More than ${t.highArticleCount} articles`,
          weight: 0.25,
          test: (s) => s.totalArticles > t.highArticleCount,
        },
        {
          id: "stable_velocity",
          description: "Article velocity stable",
          weight: 0.25,
          test: (s) => s.velocityTrend === "stable",
        },
        {
          id: "mainstream_sources",
          description: `Covered by more than ${t.highSourceCount} sources`,
          weight: 0.2,
          test: (s) => s.uniqueSources > t.highSourceCount,
        },
        {
          id: "dispersed_sources",
          description: `Source HHI below ${t.lowHhi}`,
          weight: 0.15,
          test: (s) => s.sourceConcentrationHhi < t.lowHhi,
        },
        {
          id: "complete_coverage",
          description: `Content coverage above ${t.plateauCoverage}%`,
          weight: 0.15,
          test: (s) => s.coveragePercentage > t.plateauCoverage,
        },
      ],
    },

    keyMetrics(phase, s) {
      switch (phase) {
        case "technology_trigger":
          return [
            `Total articles: ${s.totalArticles}`,
            `Sources: ${s.uniqueSources}`,
            `Source HHI: ${formatHhi(s.sourceConcentrationHhi)}`,
            `Articles without author: ${pct(s.articlesWithoutAuthorPercentage)}`,
          ];
        case "peak_inflated_expectations":
          return [
            `Velocity trend: ${s.velocityTrend}`,
            `Peak month: ${s.peakMonth ?? "n/a"} (${s.peakCount} articles)`,
            `Sources: ${s.uniqueSources}`,
            `Emerging keywords: ${s.emergingKeywords.length}`,
          ];
        case "trough_disillusionment":
          return [
            `Velocity trend: ${s.velocityTrend}`,
            `Growth, last vs first 3 months: ${pct(s.growthRateEarlyVsLate)}`,
            `Articles last 3 months: ${s.articlesLast3Months} (first 3 months ${s.articlesFirst3Months})`,
            `Declining keywords: ${s.decliningKeywords.length}`,
          ];
        case "slope_enlightenment":
          return [
            `Velocity trend: ${s.velocityTrend}`,
            `Sources: ${s.uniqueSources}`,
            `Source HHI: ${formatHhi(s.sourceConcentrationHhi)}`,
            `Content coverage: ${pct(s.coveragePercentage)}`,
          ];
        case "plateau_productivity":
          return [
            `Total articles: ${s.totalArticles}`,
            `Velocity trend: ${s.velocityTrend}`,
            `Sources: ${s.uniqueSources}`,
            `Content coverage: ${pct(s.coveragePercentage)}`,
          ];
      }
    },

    highlights(s) {
      return {
        title: "Top news sources",
        lines: s.topSources.slice(0, 5).map(([name, count]) => `${name}: ${count} articles`),
      };
    },
  };
}
