import type { PhasewatchConfig } from "../config/types.js";
import type { ExtractorOptions, MetricsExtractor } from "../engine/extractor.js";
import { PhaseRuleEngine, type StreamRuleSet } from "../engine/rule-engine.js";
import type { Logger } from "../logging/logger.js";
import { isValidTime } from "../toolkit/windows.js";
import type { Decoder } from "./common.js";
import { FinanceExtractor } from "./finance/extractor.js";
import { createFinanceRules } from "./finance/rules.js";
import { financeRecordSchema, financeSnapshotSchema, type FinanceRecord, type FinanceSnapshot } from "./finance/types.js";
import type { StreamKind } from "./kinds.js";
import { NewsExtractor, parsePublishedAt } from "./news/extractor.js";
import { createNewsRules } from "./news/rules.js";
import { newsArticleSchema, newsSnapshotSchema, type NewsArticle, type NewsSnapshot } from "./news/types.js";
import { PaperExtractor } from "./paper/extractor.js";
import { createPaperRules } from "./paper/rules.js";
import { paperRecordSchema, paperSnapshotSchema, type PaperRecord, type PaperSnapshot } from "./paper/types.js";
import { PatentExtractor } from "./patent/extractor.js";
import { createPatentRules } from "./patent/rules.js";
import { patentRecordSchema, patentSnapshotSchema, type PatentRecord, type PatentSnapshot } from "./patent/types.js";
import { SocialExtractor } from "./social/extractor.js";
import { createSocialRules } from "./social/rules.js";
import { socialPostSchema, socialSnapshotSchema, type SocialPost, type SocialSnapshot } from "./social/types.js";

export { STREAM_KINDS, STREAM_LABELS, isStreamKind, type StreamKind } from "./kinds.js";

export interface StreamRecords {
  paper: PaperRecord;
  patent: PatentRecord;
  social: SocialPost;
  news: NewsArticle;
  finance: FinanceRecord;
}

export interface StreamSnapshots {
  paper: PaperSnapshot;
  patent: PatentSnapshot;
  social: SocialSnapshot;
  news: NewsSnapshot;
  finance: FinanceSnapshot;
}

export const recordSchemas: { readonly [K in StreamKind]: Decoder<StreamRecords[K]> } = {
  paper: paperRecordSchema,
  patent: patentRecordSchema,
  social: socialPostSchema,
  news: newsArticleSchema,
  finance: financeRecordSchema,
};

export const snapshotSchemas: { readonly [K in StreamKind]: Decoder<StreamSnapshots[K]> } = {
  paper: paperSnapshotSchema,
  patent: patentSnapshotSchema,
  social: socialSnapshotSchema,
  news: newsSnapshotSchema,
  finance: financeSnapshotSchema,
};

export interface RecordKey {
  /** Identity within (technology, stream); re-importing the same id replaces the record. */
  readonly id: string;
  /** ISO date the record was observed, when known. */
  readonly observedAt: string | null;
}

const isoDay = (ms: number | null) =>
  ms === null || !isValidTime(ms) ? null : new Date(ms).toISOString().slice(0, 10);
const yearStart = (year: number | null) => (year === null ? null : `${String(year).padStart(4, "0")}-01-01`);

export const recordKeys: { readonly [K in StreamKind]: (record: StreamRecords[K]) => RecordKey } = {
  paper: (p) => ({ id: p.paperId, observedAt: yearStart(p.year) }),
  patent: (p) => ({ id: p.patentId, observedAt: yearStart(p.year) }),
  social: (p) => ({ id: p.postId, observedAt: isoDay(p.createdUtc === null ? null : p.createdUtc * 1000) }),
  news: (a) => ({ id: a.articleId, observedAt: isoDay(parsePublishedAt(a.publishedAt)) }),
  finance: (r) =>
    r.kind === "price"
      ? { id: `price:${r.ticker.toUpperCase()}:${r.date}`, observedAt: r.date }
      : { id: `profile:${r.ticker.toUpperCase()}`, observedAt: null },
};

export interface StreamPipeline<R, S> {
  readonly stream: StreamKind;
  readonly extractor: MetricsExtractor<R, S>;
  readonly engine: PhaseRuleEngine<S>;
}

export type StreamPipelines = {
  readonly [K in StreamKind]: StreamPipeline<StreamRecords[K], StreamSnapshots[K]>;
};

/** Wire every stream's extractor and rule engine from one config. */
export function createPipelines(config: PhasewatchConfig, logger: Logger, now?: () => Date): StreamPipelines {
  const { analysis, thresholds } = config;

  const optionsFor = (stream: StreamKind): ExtractorOptions => ({
    logger: logger.child({ stream }),
    trend: analysis.trend,
    topN: analysis.topN,
    topKeywords: analysis.lexical.topKeywords,
    maxShiftKeywords: analysis.lexical.maxShiftKeywords,
    minShiftCount: analysis.lexical.minShiftCount[stream],
    now,
  });

  const engineFor = <S>(rules: StreamRuleSet<S>) =>
    new PhaseRuleEngine(rules, logger.child({ stream: rules.stream }));

  return {
    paper: {
      stream: "paper",
      extractor: new PaperExtractor(optionsFor("paper")),
      engine: engineFor(createPaperRules(thresholds.paper)),
    },
    patent: {
      stream: "patent",
      extractor: new PatentExtractor(optionsFor("patent")),
      engine: engineFor(createPatentRules(thresholds.patent)),
    },
    social: {
      stream: "social",
      extractor: new SocialExtractor(optionsFor("social")),
      engine: engineFor(createSocialRules(thresholds.social)),
    },
    news: {
      stream: "news",
      extractor: new NewsExtractor(optionsFor("news")),
      engine: engineFor(createNewsRules(thresholds.news)),
    },
    finance: {
      stream: "finance",
      extractor: new FinanceExtractor(optionsFor("finance")),
      engine: engineFor(createFinanceRules(thresholds.finance)),
    },
  };
}

export type SnapshotDict = Record<string, unknown>;

function isDict(value: unknown): value is SnapshotDict {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Flat JSON-compatible form of a snapshot; pair lists stay 2-element arrays. */
export function toDict<K extends StreamKind>(stream: K, snapshot: StreamSnapshots[K]): SnapshotDict {
  const plain: unknown = JSON.parse(JSON.stringify(snapshotSchemas[stream].parse(snapshot)));
  if (!isDict(plain)) {
    throw new TypeError(`${stream} snapshot did not serialize to an object`);
  }
  return plain;
}

/** Rebuild and validate a snapshot from its dict form. */
export function fromDict<K extends StreamKind>(stream: K, dict: unknown): StreamSnapshots[K] {
  return snapshotSchemas[stream].parse(dict);
}
