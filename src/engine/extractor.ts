import type { Logger } from "../logging/logger.js";
import type { StreamKind } from "../streams/kinds.js";
import type { TrendOptions } from "../toolkit/velocity.js";
import { isValidTime } from "../toolkit/windows.js";
import { InsufficientDataError } from "./errors.js";

export interface ExtractorOptions {
  readonly logger: Logger;
  readonly trend: TrendOptions;
  readonly topN: number;
  readonly topKeywords: number;
  readonly maxShiftKeywords: number;
  readonly minShiftCount: number;
  /** Reference clock for "last year" style windows. */
  readonly now?: () => Date;
}

export interface DateRange {
  readonly start: string | null;
  readonly end: string | null;
}

/**
 * Turns a stream's records into a metrics snapshot.
 *
 * Subclasses provide the record floor, each record's timestamp and the
 * stream-specific calculations; the base enforces the floor, orders records
 * chronologically and logs.
 */
export abstract class MetricsExtractor<R, S> {
  abstract readonly stream: StreamKind;
  /** Fewest countable records the extractor accepts. */
  abstract readonly minimumRecords: number;

  protected readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(protected readonly options: ExtractorOptions) {
    this.logger = options.logger;
    this.clock = options.now ?? (() => new Date());
  }

  /** Timestamp used for ordering and time windows; null when unknown. */
  protected abstract observedAt(record: R): Date | null;

  protected abstract compute(records: readonly R[], now: Date): S;

  /** Records that count toward the floor. */
  countable(records: readonly R[]): number {
    return records.length;
  }

  extract(records: readonly R[]): S {
    const found = this.countable(records);
    if (found < this.minimumRecords) {
      throw new InsufficientDataError(this.stream, found, this.minimumRecords);
    }
    if (!records.some((r) => this.timeOf(r) !== null)) {
      throw new InsufficientDataError(this.stream, 0, 1, "no record carries a usable date");
    }

    const snapshot = this.compute(this.chronological(records), this.clock());
    this.logger.info({ stream: this.stream, records: records.length }, "Metrics snapshot computed");
    return snapshot;
  }

  /** Stable sort by timestamp; undated records first. */
  chronological(records: readonly R[]): R[] {
    return records
      .map((record, index) => ({ record, index, at: this.timeOf(record) }))
      .sort((a, b) => {
        if (a.at === b.at) return a.index - b.index;
        if (a.at === null) return -1;
        if (b.at === null) return 1;
        return a.at - b.at;
      })
      .map((entry) => entry.record);
  }

  dateRange(records: readonly R[]): DateRange {
    let start: number | null = null;
    let end: number | null = null;
    for (const record of records) {
      const at = this.timeOf(record);
      if (at === null) continue;
      if (start === null || at < start) start = at;
      if (end === null || at > end) end = at;
    }
    return { start: toIsoDate(start), end: toIsoDate(end) };
  }

  /** Epoch milliseconds of a record, null when unknown or outside the Date range. */
  private timeOf(record: R): number | null {
    const at = this.observedAt(record)?.getTime();
    return at !== undefined && isValidTime(at) ? at : null;
  }
}

function toIsoDate(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString().slice(0, 10);
}
