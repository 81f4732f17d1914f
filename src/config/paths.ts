import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["PHASEWATCH_STATE_DIR"] ?? join(homedir(), ".phasewatch");
}

export function getConfigPath(): string {
  return process.env["PHASEWATCH_CONFIG_PATH"] ?? "phasewatch.config.json";
}

/** Storage directory from config, falling back to the state dir. */
export function resolveStorageDir(configured?: string): string {
  return configured ?? getStateDir();
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
