import type { PhasewatchConfig } from "../config/types.js";
import { InsufficientDataError, isInsufficientDataError } from "../engine/errors.js";
import type { Logger } from "../logging/logger.js";
import { STREAM_KINDS, createPipelines, type StreamKind, type StreamPipelines } from "../streams/index.js";
import type { AnalysisReport, AnalysisSink, RecordSource, StreamOutcome } from "./types.js";

export interface AnalysisServiceDeps {
  readonly config: PhasewatchConfig;
  readonly source: RecordSource;
  readonly logger: Logger;
  readonly sink?: AnalysisSink;
  readonly now?: () => Date;
}

/**
 * Runs the per-stream pipelines for one technology.
 *
 * Streams below the configured record gate are reported as insufficient
 * without calling their extractor. Streams run concurrently and share nothing.
 */
export class AnalysisService {
  private readonly pipelines: StreamPipelines;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: AnalysisServiceDeps) {
    this.logger = deps.logger.child({ component: "analysis" });
    this.clock = deps.now ?? (() => new Date());
    this.pipelines = createPipelines(deps.config, deps.logger, this.clock);
  }

  async analyze(technology: string, streams: readonly StreamKind[] = STREAM_KINDS): Promise<AnalysisReport> {
    const analyzedAt = this.clock().toISOString();
    const selected = STREAM_KINDS.filter((s) => streams.includes(s));

    this.logger.info({ technology, streams: selected }, "Analysis started");
    const outcomes = await Promise.all(selected.map((stream) => this.analyzeStream(technology, stream)));

    for (const outcome of outcomes) {
      if (outcome.status === "analyzed" && this.deps.sink) {
        this.deps.sink.save(technology, outcome, analyzedAt);
      }
    }

    const analyzed = outcomes.filter((o) => o.status === "analyzed").length;
    this.logger.info({ technology, analyzed, skipped: outcomes.length - analyzed }, "Analysis finished");
    return { technology, analyzedAt, outcomes };
  }

  private async analyzeStream<K extends StreamKind>(technology: string, stream: K): Promise<StreamOutcome<K>> {
    const pipeline = this.pipelines[stream];
    const records = await this.deps.source.load(technology, stream);

    const required = this.deps.config.analysis.minimumRecords[stream];
    const found = pipeline.extractor.countable(records);
    if (found < required) {
      return insufficient(stream, new InsufficientDataError(stream, found, required));
    }

    try {
      const snapshot = pipeline.extractor.extract(records);
      const verdict = pipeline.engine.determinePhase(snapshot);
      return {
        stream,
        status: "analyzed",
        snapshot,
        verdict,
        recordsAnalyzed: records.length,
        dateRange: pipeline.extractor.dateRange(records),
      };
    } catch (err) {
      if (isInsufficientDataError(err)) {
        return insufficient(stream, err);
      }
      throw err;
    }
  }
}

function insufficient<K extends StreamKind>(stream: K, err: InsufficientDataError): StreamOutcome<K> {
  return {
    stream,
    status: "insufficient_data",
    found: err.found,
    required: err.required,
    message: err.message,
  };
}
