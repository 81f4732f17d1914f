import type { PatentThresholds } from "../../config/types.js";
import type { StreamRuleSet } from "../../engine/rule-engine.js";
import { formatHhi } from "../../toolkit/concentration.js";
import { orderedBuckets } from "../../toolkit/velocity.js";
import type { PatentSnapshot } from "./types.js";

const pct = (value: number) => `${value.toFixed(1)}%`;

function peakAgeBetween(s: PatentSnapshot, min: number, max: number): boolean {
  return s.yearsSincePeak !== null && s.yearsSincePeak >= min && s.yearsSincePeak <= max;
}

function moderateConcentration(s: PatentSnapshot, t: PatentThresholds): boolean {
  return s.assigneeConcentrationHhi >= t.lowHhi && s.assigneeConcentrationHhi <= t.highHhi;
}

/**
 * New entrants in the latest two entry years against the year before them.
 * With only two entry years the comparison is against itself and never fires.
 */
export function entrantsDeclining(s: PatentSnapshot, ratio: number): boolean {
  const lastThree = orderedBuckets(s.newEntrantsByYear).slice(-3);
  if (lastThree.length < 2) return false;
  const recent = lastThree.slice(-2).reduce((acc, [, c]) => acc + c, 0);
  const earlier = lastThree.length > 2 ? lastThree.slice(0, -2).reduce((acc, [, c]) => acc + c, 0) : recent;
  return recent < earlier * ratio;
}

export function createPatentRules(t: PatentThresholds): StreamRuleSet<PatentSnapshot> {
  return {
    stream: "patent",
    table: {
      technology_trigger: [
        {
          id: "few_patents",
          description: `Fewer than ${t.lowPatentCount} patents`,
          weight: 0.25,
          test: (s) => s.totalPatents < t.lowPatentCount,
        },
        {
          id: "academic_holders",
          description: `Academic assignees above ${t.highAcademicShare}%`,
          weight: 0.25,
          test: (s) => s.academicPercentage > t.highAcademicShare,
        },
        {
          id: "low_forward_citations",
          description: `Average forward citations below ${t.lowForwardCitations}`,
          weight: 0.15,
          test: (s) => s.avgForwardCitations < t.lowForwardCitations,
        },
        {
          id: "young_technology",
          description: `First patent less than ${t.youngTechnologyYears} years ago`,
          weight: 0.15,
          test: (s) => s.technologyAgeYears < t.youngTechnologyYears,
        },
        {
          id: "few_assignees",
          description: `Fewer than ${t.fewAssignees} distinct assignees`,
          weight: 0.1,
          test: (s) => s.uniqueAssigneesCount < t.fewAssignees,
        },
        {
          id: "narrow_geography",
          description: `Fewer than ${t.lowCountrySpread} countries`,
          weight: 0.1,
          test: (s) => s.uniqueCountries < t.lowCountrySpread,
        },
      ],
      peak_inflated_expectations: [
        {
          id: "recent_peak",
          description: `Filing peak within the last ${t.recentPeakYears} years`,
          weight: 0.25,
          test: (s) => peakAgeBetween(s, 0, t.recentPeakYears),
        },
        {
          id: "high_activity",
          description: "Patent velocity increasing or at its peak",
          weight: 0.25,
          test: (s) => s.velocityTrend === "increasing" || s.velocityTrend === "peak_reached",
        },
        {
          id: "corporate_entry",
          description: `Corporate assignees between ${t.corporateTransitionLow}% and ${t.corporateTransitionHigh}%`,
          weight: 0.15,
          test: (s) =>
            s.corporatePercentage >= t.corporateTransitionLow && s.corporatePercentage <= t.corporateTransitionHigh,
        },
        {
          id: "fragmented_field",
          description: `Assignee HHI below ${t.lowHhi}`,
          weight: 0.15,
          test: (s) => s.assigneeConcentrationHhi < t.lowHhi,
        },
        {
          id: "velocity_above_average",
          description: `Recent velocity above ${t.velocityBoostRatio}x the yearly average`,
          weight: 0.1,
          test: (s) => s.recentVelocity > s.avgPatentsPerYear * t.velocityBoostRatio,
        },
        {
          id: "spreading_geography",
          description: `Between ${t.lowCountrySpread} and ${t.highCountrySpread} countries`,
          weight: 0.1,
          test: (s) => s.uniqueCountries > t.lowCountrySpread && s.uniqueCountries < t.highCountrySpread,
        },
      ],
      trough_disillusionment: [
        {
          id: "declining_velocity",
          description: "Patent velocity decreasing",
          weight: 0.3,
          test: (s) => s.velocityTrend === "decreasing",
        },
        {
          id: "post_peak",
          description: `Peak passed 1 to ${t.troughPeakAgeMax} years ago`,
          weight: 0.25,
          test: (s) => peakAgeBetween(s, 1, t.troughPeakAgeMax),
        },
        {
          id: "output_below_peak",
          description: `Last year's filings below ${t.postPeakOutputRatio * 100}% of the peak`,
          weight: 0.15,
          test: (s) => s.patentsLastYear < s.peakCount * t.postPeakOutputRatio,
        },
        {
          id: "low_citation_ratio",
          description: `Forward/backward citation ratio below ${t.lowCitationRatio}`,
          weight: 0.15,
          test: (s) => s.citationRatio < t.lowCitationRatio,
        },
        {
          id: "consolidating",
          description: "Assignee concentration moderate",
          weight: 0.1,
          test: (s) => moderateConcentration(s, t),
        },
        {
          id: "entrants_declining",
          description: "Fewer new assignees entering",
          weight: 0.05,
          test: (s) => entrantsDeclining(s, t.entrantDeclineRatio),
        },
      ],
      slope_enlightenment: [
        {
          id: "stable_velocity",
          description: "Patent velocity stable",
          weight: 0.25,
          test: (s) => s.velocityTrend === "stable",
        },
        {
          id: "industry_led",
          description: `Corporate assignees between ${t.corporateLedLow}% and ${t.corporateLedHigh}%`,
          weight: 0.2,
          test: (s) => s.corporatePercentage >= t.corporateLedLow && s.corporatePercentage < t.corporateLedHigh,
        },
        {
          id: "settled_after_peak",
          description: `Peak ${t.slopePeakAgeMin} to ${t.slopePeakAgeMax} years ago`,
          weight: 0.2,
          test: (s) => peakAgeBetween(s, t.slopePeakAgeMin, t.slopePeakAgeMax),
        },
        {
          id: "established_players",
          description: "Assignee concentration moderate",
          weight: 0.15,
          test: (s) => moderateConcentration(s, t),
        },
        {
          id: "international",
          description: `At least ${t.lowCountrySpread} countries`,
          weight: 0.1,
          test: (s) => s.uniqueCountries >= t.lowCountrySpread,
        },
        {
          id: "balanced_citations",
          description: `Citation ratio between ${t.lowCitationRatio} and ${t.highCitationRatio}`,
          weight: 0.1,
          test: (s) => s.citationRatio >= t.lowCitationRatio && s.citationRatio <= t.highCitationRatio,
        },
      ],
      plateau_productivity: [
        {
          id: "stable_velocity",
          description: "Patent velocity stable",
          weight: 0.2,
          test: (s) => s.velocityTrend === "stable",
        },
        {
          id: "corporate_dominance",
          description: `Corporate assignees above ${t.corporateDominance}%`,
          weight: 0.2,
          test: (s) => s.corporatePercentage > t.corporateDominance,
        },
        {
          id: "consolidated",
          description: `Assignee HHI above ${t.highHhi}`,
          weight: 0.15,
          test: (s) => s.assigneeConcentrationHhi > t.highHhi,
        },
        {
          id: "mature_technology",
          description: `First patent more than ${t.matureTechnologyYears} years ago`,
          weight: 0.15,
          test: (s) => s.technologyAgeYears > t.matureTechnologyYears,
        },
        {
          id: "global",
          description: `At least ${t.highCountrySpread} countries`,
          weight: 0.1,
          test: (s) => s.uniqueCountries >= t.highCountrySpread,
        },
        {
          id: "cited_upstream",
          description: `Citation ratio above ${t.highCitationRatio}`,
          weight: 0.1,
          test: (s) => s.citationRatio > t.highCitationRatio,
        },
        {
          id: "long_after_peak",
          description: `Peak more than ${t.slopePeakAgeMax} years ago`,
          weight: 0.1,
          test: (s) => s.yearsSincePeak !== null && s.yearsSincePeak > t.slopePeakAgeMax,
        },
      ],
    },

    keyMetrics(phase, s) {
      switch (phase) {
        case "technology_trigger":
          return [
            `Total patents: ${s.totalPatents}`,
            `Academic assignees: ${pct(s.academicPercentage)}`,
            `Technology age: ${s.technologyAgeYears} years`,
            `Average forward citations: ${s.avgForwardCitations.toFixed(1)}`,
            `Distinct assignees: ${s.uniqueAssigneesCount}`,
          ];
        case "peak_inflated_expectations":
          return [
            `Peak year: ${s.peakYear ?? "n/a"}`,
            `Velocity trend: ${s.velocityTrend}`,
            `Corporate assignees: ${pct(s.corporatePercentage)}`,
            `Assignee HHI: ${formatHhi(s.assigneeConcentrationHhi)}`,
            `Recent velocity: ${s.recentVelocity.toFixed(1)} patents/year`,
          ];
        case "trough_disillusionment":
          return [
            `Velocity trend: ${s.velocityTrend}`,
            `Peak year: ${s.peakYear ?? "n/a"}`,
            `Patents last year: ${s.patentsLastYear} (peak ${s.peakCount})`,
            `Citation ratio: ${s.citationRatio.toFixed(2)}`,
          ];
        case "slope_enlightenment":
          return [
            `Velocity trend: ${s.velocityTrend}`,
            `Corporate assignees: ${pct(s.corporatePercentage)}`,
            `Assignee HHI: ${formatHhi(s.assigneeConcentrationHhi)}`,
            `Countries: ${s.uniqueCountries}`,
            `Years since peak: ${s.yearsSincePeak ?? "n/a"}`,
          ];
        case "plateau_productivity":
          return [
            `Velocity trend: ${s.velocityTrend}`,
            `Corporate assignees: ${pct(s.corporatePercentage)}`,
            `Assignee HHI: ${formatHhi(s.assigneeConcentrationHhi)}`,
            `Technology age: ${s.technologyAgeYears} years`,
            `Countries: ${s.uniqueCountries}`,
          ];
      }
    },

    highlights(s) {
      return {
        title: "Top patent holders",
        lines: s.topAssignees.slice(0, 5).map(([name, count]) => `${name}: ${count} patents`),
      };
    },
  };
}
