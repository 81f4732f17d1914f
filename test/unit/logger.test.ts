import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger, silentLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("defaults to info", () => {
    const logger = createLogger({ json: true });
    expect(logger.level).toBe("info");
  });

  it("honours a custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("creates per-stream child loggers at the parent level", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ stream: "patent" });
    expect(child.level).toBe("warn");
    expect(child.bindings()).toMatchObject({ stream: "patent" });
  });

  it("writes to a file destination", () => {
    dir = mkdtempSync(join(tmpdir(), "phasewatch-log-"));
    const logger = createLogger({ level: "error", file: join(dir, "phasewatch.log") });
    expect(logger.level).toBe("error");
  });
});

describe("silentLogger", () => {
  it("drops everything", () => {
    expect(silentLogger().level).toBe("silent");
  });
});
