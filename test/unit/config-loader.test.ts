import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, parseConfigText, substituteEnv } from "../../src/config/loader.js";
import { parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_LOG_FILE"] = "/tmp/phasewatch-test.log";
    process.env["TEST_WINDOW"] = "4";
  });

  afterEach(() => {
    delete process.env["TEST_LOG_FILE"];
    delete process.env["TEST_WINDOW"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("file: ${env:TEST_LOG_FILE}")).toBe("file: /tmp/phasewatch-test.log");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_LOG_FILE}:${env:TEST_WINDOW}")).toBe("/tmp/phasewatch-test.log:4");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow("Missing environment variable: MISSING_VAR");
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});
    expect(config.analysis.minimumRecords).toEqual({
      paper: 100,
      patent: 10,
      social: 10,
      news: 10,
      finance: 20,
    });
    expect(config.analysis.trend).toEqual({ window: 3, growthFactor: 1.2, declineFactor: 0.8 });
    expect(config.analysis.lexical.minShiftCount.paper).toBe(10);
    expect(config.analysis.lexical.minShiftCount.news).toBe(5);
    expect(config.analysis.topN).toBe(10);
    expect(config.thresholds.finance.severeDrawdown).toBe(40);
    expect(config.thresholds.paper.basicResearchHigh).toBe(70);
  });

  it("keeps defaults next to partial overrides", () => {
    const config = parseConfig({
      analysis: { trend: { window: 4 } },
      thresholds: { patent: { lowPatentCount: 20 } },
    });
    expect(config.analysis.trend).toEqual({ window: 4, growthFactor: 1.2, declineFactor: 0.8 });
    expect(config.thresholds.patent.lowPatentCount).toBe(20);
    expect(config.analysis.minimumRecords.paper).toBe(100);
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfig({ logging: { level: "verbose" } })).toThrow();
  });

  it("rejects a decline factor above the growth factor", () => {
    expect(() => parseConfig({ analysis: { trend: { growthFactor: 0.9, declineFactor: 1.1 } } })).toThrow();
  });

  it("rejects a negative record minimum", () => {
    expect(() => parseConfig({ analysis: { minimumRecords: { patent: -1 } } })).toThrow();
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "phasewatch-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file does not exist", () => {
    const config = loadConfig(join(dir, "missing.json"));
    expect(config.analysis.minimumRecords.finance).toBe(20);
    expect(config.storage.dir).toBeUndefined();
  });

  it("reads the file and substitutes env vars", () => {
    process.env["TEST_STORAGE_DIR"] = "/var/lib/phasewatch-test";
    const path = join(dir, "phasewatch.config.json");
    writeFileSync(path, JSON.stringify({ storage: { dir: "${env:TEST_STORAGE_DIR}" } }));
    try {
      expect(loadConfig(path).storage.dir).toBe("/var/lib/phasewatch-test");
    } finally {
      delete process.env["TEST_STORAGE_DIR"];
    }
  });

  it("surfaces invalid JSON", () => {
    expect(() => parseConfigText("{ not json")).toThrow(SyntaxError);
  });
});
