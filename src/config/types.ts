import type { StreamKind } from "../streams/kinds.js";

export interface PhasewatchConfig {
  readonly logging: LoggingConfig;
  readonly storage: StorageConfig;
  readonly analysis: AnalysisConfig;
  readonly thresholds: ThresholdsConfig;
}

export interface LoggingConfig {
  readonly level?: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface StorageConfig {
  readonly dir?: string;
}

export type PerStream<T> = { readonly [K in StreamKind]: T };

export interface AnalysisConfig {
  /** Caller-side gate: below this many records a stream is reported as insufficient. */
  readonly minimumRecords: PerStream<number>;
  readonly trend: TrendConfig;
  readonly lexical: LexicalConfig;
  readonly topN: number;
}

export interface TrendConfig {
  readonly window: number;
  readonly growthFactor: number;
  readonly declineFactor: number;
}

export interface LexicalConfig {
  readonly topKeywords: number;
  readonly maxShiftKeywords: number;
  readonly minShiftCount: PerStream<number>;
}

export interface ThresholdsConfig {
  readonly paper: PaperThresholds;
  readonly patent: PatentThresholds;
  readonly social: SocialThresholds;
  readonly news: NewsThresholds;
  readonly finance: FinanceThresholds;
}

export interface PaperThresholds {
  readonly earlyGrowthRate: number;
  readonly basicResearchHigh: number;
  readonly lowCitationAverage: number;
  readonly academicVenueDominance: number;
  readonly recentOutputRatio: number;
  readonly peakRecencyYears: number;
  readonly citationGrowthHigh: number;
  readonly citationGrowthModerate: number;
  readonly appliedTransitionLow: number;
  readonly appliedTransitionHigh: number;
  readonly postPeakOutputRatio: number;
  readonly appliedResearchHigh: number;
  readonly appliedResearchVeryHigh: number;
  readonly slopePeakAgeMin: number;
  readonly slopePeakAgeMax: number;
  readonly highCitationAverage: number;
  readonly industryVenueShare: number;
  readonly plateauPeakAge: number;
}

export interface PatentThresholds {
  readonly lowPatentCount: number;
  readonly highAcademicShare: number;
  readonly lowForwardCitations: number;
  readonly youngTechnologyYears: number;
  readonly matureTechnologyYears: number;
  readonly fewAssignees: number;
  readonly lowCountrySpread: number;
  readonly highCountrySpread: number;
  readonly recentPeakYears: number;
  readonly corporateTransitionLow: number;
  readonly corporateTransitionHigh: number;
  readonly lowHhi: number;
  readonly highHhi: number;
  readonly velocityBoostRatio: number;
  readonly troughPeakAgeMax: number;
  readonly postPeakOutputRatio: number;
  readonly lowCitationRatio: number;
  readonly highCitationRatio: number;
  readonly entrantDeclineRatio: number;
  readonly corporateLedLow: number;
  readonly corporateLedHigh: number;
  readonly slopePeakAgeMin: number;
  readonly slopePeakAgeMax: number;
  readonly corporateDominance: number;
}

export interface SocialThresholds {
  readonly lowPostCount: number;
  readonly highPostCount: number;
  readonly lowCommunityCount: number;
  readonly highCommunityCount: number;
  readonly lowAvgScore: number;
  readonly highAvgScore: number;
  readonly fewAuthors: number;
  readonly manyHighlyEngaged: number;
  readonly lowHhi: number;
  readonly highHhi: number;
  readonly declineRate: number;
  readonly recentCollapseRatio: number;
  readonly linkMixLow: number;
  readonly linkMixHigh: number;
  readonly linkHeavy: number;
  readonly matureCoverage: number;
}

export interface NewsThresholds {
  readonly lowArticleCount: number;
  readonly highArticleCount: number;
  readonly lowSourceCount: number;
  readonly highSourceCount: number;
  readonly fewAuthors: number;
  readonly missingAuthorShare: number;
  readonly lowHhi: number;
  readonly highHhi: number;
  readonly velocityBoostRatio: number;
  readonly manyEmergingKeywords: number;
  readonly declineRate: number;
  readonly recentCollapseRatio: number;
  readonly slopeCoverage: number;
  readonly plateauCoverage: number;
}

export interface FinanceThresholds {
  readonly highVolatility: number;
  readonly lowVolatility: number;
  readonly fewTickers: number;
  readonly lowCorrelation: number;
  readonly strongBullish: number;
  readonly strongBearish: number;
  readonly highReturn: number;
  readonly moderateReturnLow: number;
  readonly moderateReturnHigh: number;
  readonly highPeRatio: number;
  readonly fairPeLow: number;
  readonly fairPeHigh: number;
  readonly severeDrawdown: number;
  readonly moderateDrawdown: number;
  readonly strongSharpe: number;
}
