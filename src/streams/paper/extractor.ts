import { MetricsExtractor } from "../../engine/extractor.js";
import { herfindahl, tally, topEntries } from "../../toolkit/concentration.js";
import { detectKeywordShift, topKeywords } from "../../toolkit/lexical.js";
import { LEXICONS, countMatches, matchesAny, stopwordsFor } from "../../toolkit/lexicons.js";
import { maxOf, mean, median, minOf, percentage, percentile, sum } from "../../toolkit/stats.js";
import { bucketCounts, summarizeVelocity } from "../../toolkit/velocity.js";
import { startOfYear } from "../../toolkit/windows.js";
import { nonBlank } from "../common.js";
import type { PaperRecord, PaperSnapshot, ResearchType } from "./types.js";

/** Citation count at or above which a paper is "highly cited", unless p90 is higher. */
const HIGHLY_CITED_FLOOR = 100;

/** Research-type shift between halves, in percentage points. */
const RESEARCH_SHIFT_POINTS = 10;

export function classifyResearchType(paper: PaperRecord): ResearchType {
  const text = `${paper.title} ${paper.abstract ?? ""}`.toLowerCase();
  const basic = countMatches(text, LEXICONS.research.basic);
  const applied = countMatches(text, LEXICONS.research.applied);
  if (basic > applied * 2) return "basic";
  if (applied > basic * 2) return "applied";
  return "mixed";
}

export class PaperExtractor extends MetricsExtractor<PaperRecord, PaperSnapshot> {
  readonly stream = "paper" as const;
  readonly minimumRecords = 1;

  protected observedAt(paper: PaperRecord): Date | null {
    return paper.year === null ? null : startOfYear(paper.year);
  }

  protected compute(papers: readonly PaperRecord[], now: Date): PaperSnapshot {
    return {
      ...this.velocity(papers),
      ...this.citations(papers),
      ...this.researchTypes(papers),
      ...this.keywords(papers),
      ...this.venues(papers),
      ...this.temporal(papers, now.getUTCFullYear()),
      ...this.coverage(papers),
    };
  }

  private velocity(papers: readonly PaperRecord[]) {
    const publicationVelocity = bucketCounts(papers, (p) => (p.year === null ? null : String(p.year)));
    const summary = summarizeVelocity(publicationVelocity, this.options.trend);
    const years = papers.flatMap((p) => (p.year === null ? [] : [p.year]));
    const firstYear = minOf(years);
    const lastYear = maxOf(years);
    const peakYear = summary.peakBucket === null ? null : Number(summary.peakBucket);

    this.logger.debug({ trend: summary.trend, buckets: summary.bucketCount }, "Publication velocity");

    return {
      totalPapers: papers.length,
      publicationVelocity,
      velocityTrend: summary.trend,
      avgPapersPerYear: summary.average,
      peakYear,
      peakCount: summary.peakCount,
      recentVelocity: summary.recentAverage,
      firstYear,
      lastYear,
      yearsSincePeak: peakYear === null || lastYear === null ? null : lastYear - peakYear,
    };
  }

  private citations(papers: readonly PaperRecord[]) {
    const counts = papers.flatMap((p) => (p.citationCount === null ? [] : [p.citationCount]));
    const threshold = Math.max(HIGHLY_CITED_FLOOR, percentile(counts, 90));

    const byYear = new Map<number, number[]>();
    for (const p of papers) {
      if (p.year === null || p.citationCount === null) continue;
      const list = byYear.get(p.year) ?? [];
      list.push(p.citationCount);
      byYear.set(p.year, list);
    }
    const years = [...byYear.keys()].sort((a, b) => a - b);
    let citationGrowthRate = 0;
    if (years.length >= 2) {
      const recent = mean(byYear.get(years[years.length - 1] ?? 0) ?? []);
      const earlier = mean(byYear.get(years[years.length - 2] ?? 0) ?? []);
      citationGrowthRate = ((recent - earlier) / Math.max(earlier, 1)) * 100;
    }

    return {
      totalCitations: sum(counts),
      papersWithCitations: counts.length,
      avgCitationsPerPaper: mean(counts),
      medianCitations: median(counts),
      citationGrowthRate,
      highlyCitedCount: counts.filter((c) => c >= threshold).length,
    };
  }

  private researchTypes(papers: readonly PaperRecord[]) {
    const types = papers.map(classifyResearchType);
    const share = (list: readonly ResearchType[], type: ResearchType) =>
      percentage(list.filter((t) => t === type).length, list.length);

    const midpoint = Math.floor(types.length / 2);
    const earlyApplied = share(types.slice(0, midpoint), "applied");
    const recentApplied = share(types.slice(midpoint), "applied");

    let researchTypeTrend: PaperSnapshot["researchTypeTrend"] = "stable";
    if (recentApplied > earlyApplied + RESEARCH_SHIFT_POINTS) researchTypeTrend = "toward_applied";
    else if (recentApplied < earlyApplied - RESEARCH_SHIFT_POINTS) researchTypeTrend = "toward_basic";

    return {
      basicResearchPercentage: share(types, "basic"),
      appliedResearchPercentage: share(types, "applied"),
      mixedResearchPercentage: share(types, "mixed"),
      researchTypeTrend,
    };
  }

  private keywords(papers: readonly PaperRecord[]) {
    const stopwords = stopwordsFor(this.stream);
    const corpus = papers.map((p) => `${p.title} ${p.abstract ?? ""}`);
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

  private venues(papers: readonly PaperRecord[]) {
    let conference = 0;
    let industry = 0;
    for (const p of papers) {
      const venue = (p.venue ?? "").toLowerCase();
      if (matchesAny(venue, LEXICONS.venues.conference)) conference += 1;
      if (matchesAny(venue, LEXICONS.venues.industry)) industry += 1;
    }
    const total = papers.length;
    const venueCounts = tally(papers, (p) => (nonBlank(p.venue) ? p.venue.trim() : null));

    return {
      academicVenuePercentage: percentage(total - industry, total),
      industryVenuePercentage: percentage(industry, total),
      conferencePercentage: percentage(conference, total),
      journalPercentage: percentage(total - conference, total),
      topVenues: topEntries(venueCounts, this.options.topN),
      venueConcentrationHhi: herfindahl(venueCounts.values()),
    };
  }

  private temporal(papers: readonly PaperRecord[], currentYear: number) {
    const years = papers.flatMap((p) => (p.year === null ? [] : [p.year]));
    const earliest = minOf(years) ?? currentYear;
    const papersLast2Years = years.filter((y) => y >= currentYear - 2).length;
    const papersFirst2Years = years.filter((y) => y <= earliest + 2).length;

    return {
      papersLastYear: years.filter((y) => y === currentYear - 1).length,
      papersLast2Years,
      papersFirst2Years,
      growthRateEarlyVsLate:
        papersFirst2Years > 0 ? ((papersLast2Years - papersFirst2Years) / papersFirst2Years) * 100 : 0,
    };
  }

  private coverage(papers: readonly PaperRecord[]) {
    const papersWithAbstracts = papers.filter((p) => nonBlank(p.abstract)).length;
    const papersWithPdf = papers.filter((p) => nonBlank(p.openAccessPdf)).length;
    return {
      papersWithAbstracts,
      papersWithPdf,
      coveragePercentage: percentage(papersWithAbstracts + papersWithPdf, papers.length * 2),
    };
  }
}
