import type { PaperThresholds } from "../../config/types.js";
import type { StreamRuleSet } from "../../engine/rule-engine.js";
import type { PaperSnapshot } from "./types.js";

const pct = (value: number) => `${value.toFixed(1)}%`;

function withinPeakAge(s: PaperSnapshot, min: number, max: number): boolean {
  return s.yearsSincePeak !== null && s.yearsSincePeak >= min && s.yearsSincePeak <= max;
}

export function createPaperRules(t: PaperThresholds): StreamRuleSet<PaperSnapshot> {
  return {
    stream: "paper",
    table: {
      technology_trigger: [
        {
          id: "early_growth",
          description: `Publication velocity increasing with early-vs-late growth above ${t.earlyGrowthRate}%`,
          weight: 0.3,
          test: (s) => s.velocityTrend === "increasing" && s.growthRateEarlyVsLate > t.earlyGrowthRate,
        },
        {
          id: "basic_research_dominant",
          description: `Basic research above ${t.basicResearchHigh}% of papers`,
          weight: 0.25,
          test: (s) => s.basicResearchPercentage > t.basicResearchHigh,
        },
        {
          id: "low_citations",
          description: `Average citations below ${t.lowCitationAverage}`,
          weight: 0.2,
          test: (s) => s.avgCitationsPerPaper < t.lowCitationAverage,
        },
        {
          id: "academic_venues",
          description: `Academic venues above ${t.academicVenueDominance}%`,
          weight: 0.15,
          test: (s) => s.academicVenuePercentage > t.academicVenueDominance,
        },
        {
          id: "modest_recent_output",
          description: "Output over the last two years still modest against the yearly average",
          weight: 0.1,
          test: (s) =>
            Object.keys(s.publicationVelocity).length > 0 &&
            s.papersLast2Years < s.avgPapersPerYear * t.recentOutputRatio,
        },
      ],
      peak_inflated_expectations: [
        {
          id: "recent_peak",
          description: `Publication peak within the last ${t.peakRecencyYears} years`,
          weight: 0.3,
          test: (s) => withinPeakAge(s, 0, t.peakRecencyYears),
        },
        {
          id: "citation_surge",
          description: `Citation growth above ${t.citationGrowthHigh}%`,
          weight: 0.25,
          test: (s) => s.citationGrowthRate > t.citationGrowthHigh,
        },
        {
          id: "turning_applied",
          description: `Applied research between ${t.appliedTransitionLow}% and ${t.appliedTransitionHigh}% and rising`,
          weight: 0.25,
          test: (s) =>
            s.appliedResearchPercentage >= t.appliedTransitionLow &&
            s.appliedResearchPercentage <= t.appliedTransitionHigh &&
            s.researchTypeTrend === "toward_applied",
        },
        {
          id: "high_activity",
          description: "Publication velocity increasing or at its peak",
          weight: 0.2,
          test: (s) => s.velocityTrend === "increasing" || s.velocityTrend === "peak_reached",
        },
      ],
      trough_disillusionment: [
        {
          id: "declining_velocity",
          description: "Publication velocity decreasing",
          weight: 0.35,
          test: (s) => s.velocityTrend === "decreasing",
        },
        {
          id: "post_peak",
          description: `Peak passed 1 to ${t.peakRecencyYears} years ago`,
          weight: 0.3,
          test: (s) => withinPeakAge(s, 1, t.peakRecencyYears),
        },
        {
          id: "stagnant_citations",
          description: `Citation growth below ${t.citationGrowthModerate}%`,
          weight: 0.2,
          test: (s) => s.citationGrowthRate < t.citationGrowthModerate,
        },
        {
          id: "output_below_peak",
          description: `Last year's output below ${t.postPeakOutputRatio * 100}% of the peak`,
          weight: 0.15,
          test: (s) => s.papersLastYear < s.peakCount * t.postPeakOutputRatio,
        },
      ],
      slope_enlightenment: [
        {
          id: "applied_majority",
          description: `Applied research between ${t.appliedResearchHigh}% and ${t.appliedResearchVeryHigh}%`,
          weight: 0.3,
          test: (s) =>
            s.appliedResearchPercentage >= t.appliedResearchHigh &&
            s.appliedResearchPercentage < t.appliedResearchVeryHigh,
        },
        {
          id: "gradual_growth",
          description: "Stable or increasing velocity with positive growth",
          weight: 0.25,
          test: (s) =>
            (s.velocityTrend === "stable" || s.velocityTrend === "increasing") && s.growthRateEarlyVsLate > 0,
        },
        {
          id: "moderate_citation_growth",
          description: `Citation growth between ${t.citationGrowthModerate}% and ${t.citationGrowthHigh}%`,
          weight: 0.25,
          test: (s) =>
            s.citationGrowthRate >= t.citationGrowthModerate && s.citationGrowthRate < t.citationGrowthHigh,
        },
        {
          id: "settled_after_peak",
          description: `Peak ${t.slopePeakAgeMin} to ${t.slopePeakAgeMax} years ago`,
          weight: 0.2,
          test: (s) => withinPeakAge(s, t.slopePeakAgeMin, t.slopePeakAgeMax),
        },
      ],
      plateau_productivity: [
        {
          id: "applied_dominant",
          description: `Applied research above ${t.appliedResearchVeryHigh}%`,
          weight: 0.35,
          test: (s) => s.appliedResearchPercentage > t.appliedResearchVeryHigh,
        },
        {
          id: "stable_velocity",
          description: "Publication velocity stable",
          weight: 0.25,
          test: (s) => s.velocityTrend === "stable",
        },
        {
          id: "established_citations",
          description: `Average citations above ${t.highCitationAverage}`,
          weight: 0.2,
          test: (s) => s.avgCitationsPerPaper > t.highCitationAverage,
        },
        {
          id: "industry_venues",
          description: `Industry venues above ${t.industryVenueShare}%`,
          weight: 0.1,
          test: (s) => s.industryVenuePercentage > t.industryVenueShare,
        },
        {
          id: "long_after_peak",
          description: `Peak at least ${t.plateauPeakAge} years ago`,
          weight: 0.1,
          test: (s) => s.yearsSincePeak !== null && s.yearsSincePeak >= t.plateauPeakAge,
        },
      ],
    },

    keyMetrics(phase, s) {
      switch (phase) {
        case "technology_trigger":
          return [
            `Basic research share: ${pct(s.basicResearchPercentage)}`,
            `Publication trend: ${s.velocityTrend}`,
            `Average citations: ${s.avgCitationsPerPaper.toFixed(1)}`,
            `Academic venues: ${pct(s.academicVenuePercentage)}`,
          ];
        case "peak_inflated_expectations":
          return [
            `Peak publication year: ${s.peakYear ?? "n/a"} (${s.peakCount} papers)`,
            `Citation growth: ${pct(s.citationGrowthRate)}`,
            `Applied research share: ${pct(s.appliedResearchPercentage)}`,
            `Research type trend: ${s.researchTypeTrend}`,
          ];
        case "trough_disillusionment":
          return [
            `Publication trend: ${s.velocityTrend}`,
            `Peak year: ${s.peakYear ?? "n/a"}`,
            `Papers last year: ${s.papersLastYear} (peak ${s.peakCount})`,
            `Citation growth: ${pct(s.citationGrowthRate)}`,
          ];
        case "slope_enlightenment":
          return [
            `Applied research share: ${pct(s.appliedResearchPercentage)}`,
            `Publication trend: ${s.velocityTrend}`,
            `Citation growth: ${pct(s.citationGrowthRate)}`,
            `Years since peak: ${s.yearsSincePeak ?? "n/a"}`,
          ];
        case "plateau_productivity":
          return [
            `Applied research share: ${pct(s.appliedResearchPercentage)}`,
            `Publication trend: ${s.velocityTrend}`,
            `Average citations: ${s.avgCitationsPerPaper.toFixed(1)}`,
            `Industry venues: ${pct(s.industryVenuePercentage)}`,
          ];
      }
    },

    highlights(s) {
      if (s.emergingKeywords.length === 0) return null;
      return { title: "Emerging keywords", lines: s.emergingKeywords.slice(0, 5) };
    },
  };
}
