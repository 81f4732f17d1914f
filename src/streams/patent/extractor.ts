import { MetricsExtractor } from "../../engine/extractor.js";
import { herfindahl, tally, topEntries } from "../../toolkit/concentration.js";
import { LEXICONS, matchesAny } from "../../toolkit/lexicons.js";
import { maxOf, mean, median, minOf, percentage, percentile, sum } from "../../toolkit/stats.js";
import { bucketCounts, summarizeVelocity } from "../../toolkit/velocity.js";
import { startOfYear } from "../../toolkit/windows.js";
import { nonBlank } from "../common.js";
import type { AssigneeKind, PatentAssignee, PatentRecord, PatentSnapshot } from "./types.js";

const HIGHLY_CITED_FLOOR = 50;

export function assigneeName(assignee: PatentAssignee): string | null {
  if (nonBlank(assignee.organization)) return assignee.organization.trim();
  const person = [assignee.firstName, assignee.lastName].filter(nonBlank).map((n) => n.trim());
  return person.length > 0 ? person.join(" ") : null;
}

export function classifyAssignee(assignee: PatentAssignee): AssigneeKind {
  const org = (assignee.organization ?? "").trim().toLowerCase();
  if (org === "" && (nonBlank(assignee.firstName) || nonBlank(assignee.lastName))) {
    return "individual";
  }
  if (matchesAny(org, LEXICONS.assignees.academic)) return "academic";
  if (matchesAny(org, LEXICONS.assignees.corporate)) return "corporate";
  return org === "" ? "individual" : "corporate";
}

export class PatentExtractor extends MetricsExtractor<PatentRecord, PatentSnapshot> {
  readonly stream = "patent" as const;
  readonly minimumRecords = 10;

  protected observedAt(patent: PatentRecord): Date | null {
    return patent.year === null ? null : startOfYear(patent.year);
  }

  protected compute(patents: readonly PatentRecord[], now: Date): PatentSnapshot {
    return {
      ...this.volume(patents),
      ...this.citations(patents),
      ...this.assignees(patents),
      ...this.geography(patents),
      ...this.types(patents),
      ...this.temporal(patents, now.getUTCFullYear()),
      ...this.coverage(patents),
    };
  }

  private volume(patents: readonly PatentRecord[]) {
    const patentVelocity = bucketCounts(patents, (p) => (p.year === null ? null : String(p.year)));
    const summary = summarizeVelocity(patentVelocity, this.options.trend);
    const years = Object.keys(patentVelocity).map(Number);
    const lastYear = maxOf(years);
    const peakYear = summary.peakBucket === null ? null : Number(summary.peakBucket);

    this.logger.debug({ trend: summary.trend, buckets: summary.bucketCount }, "Patent velocity");

    return {
      totalPatents: patents.length,
      patentVelocity,
      velocityTrend: summary.trend,
      avgPatentsPerYear: summary.average,
      peakYear,
      peakCount: summary.peakCount,
      recentVelocity: summary.recentAverage,
      yearsSincePeak: peakYear === null || lastYear === null ? null : lastYear - peakYear,
    };
  }

  private citations(patents: readonly PatentRecord[]) {
    const forward = patents.flatMap((p) => (p.forwardCitations === null ? [] : [p.forwardCitations]));
    const backward = patents.flatMap((p) => (p.backwardCitations === null ? [] : [p.backwardCitations]));
    const totalForward = sum(forward);
    const totalBackward = sum(backward);
    const threshold = Math.max(HIGHLY_CITED_FLOOR, percentile(forward, 90));

    return {
      totalForwardCitations: totalForward,
      totalBackwardCitations: totalBackward,
      avgForwardCitations: mean(forward),
      avgBackwardCitations: mean(backward),
      medianForwardCitations: median(forward),
      citationRatio: totalForward / Math.max(totalBackward, 1),
      highlyCitedCount: forward.filter((c) => c >= threshold).length,
    };
  }

  private assignees(patents: readonly PatentRecord[]) {
    const holders = new Map<string, number>();
    const firstSeen = new Map<string, number>();
    const kinds = new Map<AssigneeKind, number>();
    let classified = 0;

    // patents arrive in year order, so the first dated sighting is the entry year
    for (const patent of patents) {
      for (const assignee of patent.assignees) {
        const name = assigneeName(assignee);
        if (name === null) continue;
        holders.set(name, (holders.get(name) ?? 0) + 1);
        if (!firstSeen.has(name) && patent.year !== null) firstSeen.set(name, patent.year);
        const kind = classifyAssignee(assignee);
        kinds.set(kind, (kinds.get(kind) ?? 0) + 1);
        classified += 1;
      }
    }

    const newEntrantsByYear = bucketCounts(firstSeen.values(), (year) => String(year));

    return {
      uniqueAssigneesCount: holders.size,
      topAssignees: topEntries(holders, this.options.topN),
      assigneeConcentrationHhi: herfindahl(holders.values()),
      corporatePercentage: percentage(kinds.get("corporate") ?? 0, classified),
      academicPercentage: percentage(kinds.get("academic") ?? 0, classified),
      individualPercentage: percentage(kinds.get("individual") ?? 0, classified),
      newEntrantsByYear,
    };
  }

  private geography(patents: readonly PatentRecord[]) {
    const countries = tally(
      patents.flatMap((p) => p.assignees),
      (a) => (nonBlank(a.country) ? a.country.trim().toUpperCase() : null),
    );
    const countryDistribution: Record<string, number> = {};
    for (const [country, count] of topEntries(countries, countries.size)) {
      countryDistribution[country] = count;
    }

    return {
      countryDistribution,
      uniqueCountries: countries.size,
      topCountries: topEntries(countries, this.options.topN),
      countryConcentrationHhi: herfindahl(countries.values()),
    };
  }

  private types(patents: readonly PatentRecord[]) {
    const utility = patents.filter((p) => p.type?.toLowerCase() === "utility").length;
    const design = patents.filter((p) => p.type?.toLowerCase() === "design").length;
    const total = patents.length;
    return {
      utilityPercentage: percentage(utility, total),
      designPercentage: percentage(design, total),
      otherTypePercentage: percentage(total - utility - design, total),
    };
  }

  private temporal(patents: readonly PatentRecord[], currentYear: number) {
    const years = patents.flatMap((p) => (p.year === null ? [] : [p.year]));
    const firstPatentYear = minOf(years);
    return {
      firstPatentYear,
      technologyAgeYears: firstPatentYear === null ? 0 : Math.max(0, currentYear - firstPatentYear),
      patentsLastYear: years.filter((y) => y === currentYear - 1).length,
      patentsLast2Years: years.filter((y) => y >= currentYear - 2).length,
    };
  }

  private coverage(patents: readonly PatentRecord[]) {
    const patentsWithAbstract = patents.filter((p) => nonBlank(p.abstract)).length;
    return {
      patentsWithAbstract,
      coveragePercentage: percentage(patentsWithAbstract, patents.length),
    };
  }
}
