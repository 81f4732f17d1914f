import Database from "better-sqlite3";
import { join } from "node:path";

export const DB_FILENAME = "phasewatch.db";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS records (
  technology  TEXT NOT NULL,
  stream      TEXT NOT NULL CHECK(stream IN ('paper','patent','social','news','finance')),
  record_id   TEXT NOT NULL,
  observed_at TEXT,
  payload     TEXT NOT NULL,
  imported_at INTEGER NOT NULL,
  PRIMARY KEY (technology, stream, record_id)
);
CREATE INDEX IF NOT EXISTS idx_records_observed
  ON records(technology, stream, observed_at);

CREATE TABLE IF NOT EXISTS analyses (
  id               TEXT PRIMARY KEY,
  technology       TEXT NOT NULL,
  stream           TEXT NOT NULL,
  phase            TEXT NOT NULL,
  confidence       REAL NOT NULL,
  scores           TEXT NOT NULL,
  rationale        TEXT NOT NULL,
  snapshot         TEXT NOT NULL,
  records_analyzed INTEGER NOT NULL,
  date_range_start TEXT,
  date_range_end   TEXT,
  analyzed_at      TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_analyses_technology
  ON analyses(technology, stream, analyzed_at);
`;

export class PhaseDB {
  private db: Database.Database;

  constructor(stateDir: string) {
    this.db = new Database(join(stateDir, DB_FILENAME));
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
