import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { AnalysisSink, AnalyzedOutcome } from "../analysis/types.js";
import { PHASES, type Phase, type PhaseScores } from "../phases/types.js";
import { STREAM_KINDS, toDict, type SnapshotDict, type StreamKind } from "../streams/index.js";
import type { PhaseDB } from "./db.js";

export interface StoredAnalysis {
  readonly id: string;
  readonly technology: string;
  readonly stream: StreamKind;
  readonly phase: Phase;
  readonly confidence: number;
  readonly scores: PhaseScores;
  readonly rationale: string;
  readonly snapshot: SnapshotDict;
  readonly recordsAnalyzed: number;
  readonly dateRange: { readonly start: string | null; readonly end: string | null };
  readonly analyzedAt: string;
}

const scoresSchema = z.object({
  technology_trigger: z.number(),
  peak_inflated_expectations: z.number(),
  trough_disillusionment: z.number(),
  slope_enlightenment: z.number(),
  plateau_productivity: z.number(),
});

const analysisRowSchema = z.object({
  id: z.string(),
  technology: z.string(),
  stream: z.enum(STREAM_KINDS),
  phase: z.enum(PHASES),
  confidence: z.number(),
  scores: z.string(),
  rationale: z.string(),
  snapshot: z.string(),
  records_analyzed: z.number().int(),
  date_range_start: z.string().nullable(),
  date_range_end: z.string().nullable(),
  analyzed_at: z.string(),
});

const SELECT_COLUMNS = `id, technology, stream, phase, confidence, scores, rationale, snapshot,
  records_analyzed, date_range_start, date_range_end, analyzed_at`;

export class AnalysisStore implements AnalysisSink {
  private readonly db;

  constructor(phaseDb: PhaseDB) {
    this.db = phaseDb.raw();
  }

  save(technology: string, outcome: AnalyzedOutcome, analyzedAt: string): string {
    const id = randomUUID();
    const { verdict, dateRange } = outcome;
    this.db.prepare(`
      INSERT INTO analyses (id, technology, stream, phase, confidence, scores, rationale, snapshot,
        records_analyzed, date_range_start, date_range_end, analyzed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id, technology, outcome.stream, verdict.phase, verdict.confidence,
      JSON.stringify(verdict.scores), verdict.rationale,
      JSON.stringify(toDict(outcome.stream, outcome.snapshot)),
      outcome.recordsAnalyzed, dateRange.start, dateRange.end, analyzedAt,
    );
    return id;
  }

  /** Most recent analysis of each stream. */
  latest(technology: string): StoredAnalysis[] {
    const rows = this.db.prepare(`
      SELECT ${SELECT_COLUMNS} FROM analyses a
      WHERE technology = ?
        AND rowid = (
          SELECT rowid FROM analyses b
          WHERE b.technology = a.technology AND b.stream = a.stream
          ORDER BY b.analyzed_at DESC, b.rowid DESC
          LIMIT 1
        )
    `).all(technology);
    return sortByStream(rows.map(toStoredAnalysis));
  }

  /** All analyses, newest first. */
  history(technology: string, stream?: StreamKind): StoredAnalysis[] {
    const conditions = ["technology = ?"];
    const params: string[] = [technology];
    if (stream) {
      conditions.push("stream = ?");
      params.push(stream);
    }

    const rows = this.db.prepare(`
      SELECT ${SELECT_COLUMNS} FROM analyses
      WHERE ${conditions.join(" AND ")}
      ORDER BY analyzed_at DESC, rowid DESC
    `).all(...params);
    return rows.map(toStoredAnalysis);
  }
}

function toStoredAnalysis(raw: unknown): StoredAnalysis {
  const row = analysisRowSchema.parse(raw);
  const snapshot: unknown = JSON.parse(row.snapshot);
  return {
    id: row.id,
    technology: row.technology,
    stream: row.stream,
    phase: row.phase,
    confidence: row.confidence,
    scores: scoresSchema.parse(JSON.parse(row.scores)),
    rationale: row.rationale,
    snapshot: z.record(z.string(), z.unknown()).parse(snapshot),
    recordsAnalyzed: row.records_analyzed,
    dateRange: { start: row.date_range_start, end: row.date_range_end },
    analyzedAt: row.analyzed_at,
  };
}

function sortByStream(rows: StoredAnalysis[]): StoredAnalysis[] {
  return rows.sort((a, b) => STREAM_KINDS.indexOf(a.stream) - STREAM_KINDS.indexOf(b.stream));
}
