import { loadConfig } from "../config/loader.js";
import { ensureDir, resolveStorageDir } from "../config/paths.js";
import type { PhasewatchConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { AnalysisStore } from "../store/analysis-store.js";
import { PhaseDB } from "../store/db.js";
import { RecordStore } from "../store/record-store.js";

export interface Runtime {
  readonly config: PhasewatchConfig;
  readonly logger: Logger;
  readonly db: PhaseDB;
  readonly records: RecordStore;
  readonly analyses: AnalysisStore;
}

/** Config, logger and stores for one command invocation. Caller closes `db`. */
export function openRuntime(): Runtime {
  const config = loadConfig();
  const logger = createLogger(config.logging);
  const db = new PhaseDB(ensureDir(resolveStorageDir(config.storage.dir)));
  return {
    config,
    logger,
    db,
    records: new RecordStore(db),
    analyses: new AnalysisStore(db),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
