import type { DateRange } from "../engine/extractor.js";
import type { PhaseVerdict } from "../phases/types.js";
import type { StreamKind, StreamRecords, StreamSnapshots } from "../streams/index.js";

/** Where the service reads a technology's already deduplicated records. */
export interface RecordSource {
  load<K extends StreamKind>(technology: string, stream: K): Promise<StreamRecords[K][]>;
}

export interface AnalyzedOutcome<K extends StreamKind = StreamKind> {
  readonly stream: K;
  readonly status: "analyzed";
  readonly snapshot: StreamSnapshots[K];
  readonly verdict: PhaseVerdict;
  readonly recordsAnalyzed: number;
  readonly dateRange: DateRange;
}

export interface InsufficientOutcome<K extends StreamKind = StreamKind> {
  readonly stream: K;
  readonly status: "insufficient_data";
  readonly found: number;
  readonly required: number;
  readonly message: string;
}

export type StreamOutcome<K extends StreamKind = StreamKind> = AnalyzedOutcome<K> | InsufficientOutcome<K>;

export interface AnalysisReport {
  readonly technology: string;
  readonly analyzedAt: string;
  readonly outcomes: StreamOutcome[];
}

/** Persists analyzed outcomes; insufficient ones are never stored. */
export interface AnalysisSink {
  save(technology: string, outcome: AnalyzedOutcome, analyzedAt: string): string;
}
