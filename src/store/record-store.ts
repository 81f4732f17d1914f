import { z } from "zod";
import type { RecordSource } from "../analysis/types.js";
import { RecordDecodeError } from "../engine/errors.js";
import { isStreamKind, recordKeys, recordSchemas, type StreamKind, type StreamRecords } from "../streams/index.js";
import type { PhaseDB } from "./db.js";

const payloadRowSchema = z.object({ record_id: z.string(), payload: z.string() });
const countRowSchema = z.object({ stream: z.string(), total: z.number() });

export interface ImportResult {
  readonly stream: StreamKind;
  readonly imported: number;
}

/** SQLite-backed record source. Records are unique per (technology, stream, id). */
export class RecordStore implements RecordSource {
  private readonly db;

  constructor(phaseDb: PhaseDB) {
    this.db = phaseDb.raw();
  }

  /**
   * Validate and upsert raw records. Nothing is written when any record
   * fails validation.
   */
  insert<K extends StreamKind>(technology: string, stream: K, raw: readonly unknown[]): ImportResult {
    const records = raw.map((item, index) => decodeRecord(stream, item, `#${index}`));
    const keyOf = recordKeys[stream];

    const upsert = this.db.prepare(`
      INSERT INTO records (technology, stream, record_id, observed_at, payload, imported_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(technology, stream, record_id) DO UPDATE SET
        observed_at = excluded.observed_at,
        payload = excluded.payload,
        imported_at = excluded.imported_at
    `);

    const now = Date.now();
    const write = this.db.transaction((batch: readonly StreamRecords[K][]) => {
      for (const record of batch) {
        const key = keyOf(record);
        upsert.run(technology, stream, key.id, key.observedAt, JSON.stringify(record), now);
      }
    });
    write(records);

    return { stream, imported: records.length };
  }

  async load<K extends StreamKind>(technology: string, stream: K): Promise<StreamRecords[K][]> {
    const rows = this.db
      .prepare(
        `SELECT record_id, payload FROM records
         WHERE technology = ? AND stream = ?
         ORDER BY observed_at, record_id`,
      )
      .all(technology, stream);

    return rows.map((row) => {
      const { record_id, payload } = payloadRowSchema.parse(row);
      return decodeRecord(stream, parsePayload(stream, record_id, payload), record_id);
    });
  }

  /** Stored record counts per stream for one technology. */
  counts(technology: string): Partial<Record<StreamKind, number>> {
    const rows = this.db
      .prepare("SELECT stream, COUNT(*) AS total FROM records WHERE technology = ? GROUP BY stream")
      .all(technology);

    const counts: Partial<Record<StreamKind, number>> = {};
    for (const row of rows) {
      const { stream, total } = countRowSchema.parse(row);
      if (isStreamKind(stream)) counts[stream] = total;
    }
    return counts;
  }

  technologies(): string[] {
    return this.db
      .prepare("SELECT DISTINCT technology FROM records ORDER BY technology")
      .all()
      .map((row) => z.object({ technology: z.string() }).parse(row).technology);
  }
}

function parsePayload(stream: StreamKind, recordRef: string, payload: string): unknown {
  try {
    const value: unknown = JSON.parse(payload);
    return value;
  } catch (err) {
    throw new RecordDecodeError(stream, recordRef, err instanceof Error ? err.message : String(err));
  }
}

export function decodeRecord<K extends StreamKind>(stream: K, value: unknown, recordRef: string): StreamRecords[K] {
  const result = recordSchemas[stream].safeParse(value);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new RecordDecodeError(stream, recordRef, reason);
  }
  return result.data;
}
