import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { PhasewatchConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Parse config text after env substitution. */
export function parseConfigText(content: string): PhasewatchConfig {
  const raw: unknown = JSON.parse(substituteEnv(content));
  return parseConfig(raw);
}

export function loadConfig(path?: string): PhasewatchConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return parseConfig({});
    }
    throw err;
  }

  return parseConfigText(content);
}
