import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { AnalyzedOutcome } from "../../src/analysis/types.js";
import { RecordDecodeError } from "../../src/engine/errors.js";
import { silentLogger } from "../../src/logging/logger.js";
import { AnalysisStore } from "../../src/store/analysis-store.js";
import { PhaseDB } from "../../src/store/db.js";
import { RecordStore } from "../../src/store/record-store.js";
import { createPipelines } from "../../src/streams/index.js";
import { makeConfig, NOW, troughMarket } from "../helpers/fixtures.js";

describe("PhaseDB", () => {
  let dir: string;
  let db: PhaseDB;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "phasewatch-db-"));
    db = new PhaseDB(dir);
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("opens and creates its tables", () => {
    expect(db.isOpen()).toBe(true);
    const names = db
      .raw()
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((row) => (typeof row === "object" && row !== null && "name" in row ? row.name : null));
    expect(names).toEqual(["analyses", "records"]);
  });

  it("closes idempotently", () => {
    db.close();
    db.close();
    expect(db.isOpen()).toBe(false);
  });
});

describe("RecordStore", () => {
  let dir: string;
  let db: PhaseDB;
  let store: RecordStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "phasewatch-records-"));
    db = new PhaseDB(dir);
    store = new RecordStore(db);
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("validates, stores and decodes records with defaults", async () => {
    const result = store.insert("sodium-cells", "paper", [
      { paperId: "b", year: 2021, title: "Anode study" },
      { paperId: "a", year: 2019 },
    ]);
    expect(result).toEqual({ stream: "paper", imported: 2 });

    const papers = await store.load("sodium-cells", "paper");
    expect(papers.map((p) => p.paperId)).toEqual(["a", "b"]);
    expect(papers[0]).toEqual({
      paperId: "a",
      title: "",
      year: 2019,
      citationCount: null,
      abstract: null,
      venue: null,
      openAccessPdf: null,
    });
  });

  it("replaces a record re-imported under the same id", async () => {
    store.insert("sodium-cells", "social", [{ postId: "x", score: 1, createdUtc: 1_700_000_000 }]);
    store.insert("sodium-cells", "social", [{ postId: "x", score: 7, createdUtc: 1_700_000_000 }]);
    const posts = await store.load("sodium-cells", "social");
    expect(posts).toHaveLength(1);
    expect(posts[0]?.score).toBe(7);
  });

  it("keeps technologies and streams apart", async () => {
    store.insert("sodium-cells", "news", [{ articleId: "n1" }]);
    store.insert("solid-state", "news", [{ articleId: "n2" }]);
    store.insert("solid-state", "patent", [{ patentId: "US-1" }]);

    expect((await store.load("sodium-cells", "news")).map((a) => a.articleId)).toEqual(["n1"]);
    expect(await store.load("sodium-cells", "patent")).toEqual([]);
    expect(store.counts("solid-state")).toEqual({ news: 1, patent: 1 });
    expect(store.technologies()).toEqual(["sodium-cells", "solid-state"]);
  });

  it("rejects the whole batch when one record is invalid", async () => {
    const batch = [{ paperId: "ok", year: 2020 }, { year: 2021 }];
    expect(() => store.insert("sodium-cells", "paper", batch)).toThrow(RecordDecodeError);
    expect(() => store.insert("sodium-cells", "paper", batch)).toThrow("Invalid paper record #1: paperId: Required");
    expect(await store.load("sodium-cells", "paper")).toEqual([]);
  });

  it("reads finance prices and profiles back as one stream", async () => {
    store.insert("sodium-cells", "finance", [
      { kind: "price", ticker: "latx", date: "2024-01-02", close: 10 },
      { kind: "profile", ticker: "LATX", sector: "Energy" },
      { kind: "price", ticker: "LATX", date: "2024-01-01", close: 9 },
    ]);
    const records = await store.load("sodium-cells", "finance");
    expect(records.map((r) => r.kind)).toEqual(["profile", "price", "price"]);
  });
});

describe("AnalysisStore", () => {
  let dir: string;
  let db: PhaseDB;
  let store: AnalysisStore;

  const pipelines = createPipelines(makeConfig(), silentLogger(), () => NOW);
  const records = troughMarket();
  const snapshot = pipelines.finance.extractor.extract(records);
  const outcome: AnalyzedOutcome<"finance"> = {
    stream: "finance",
    status: "analyzed",
    snapshot,
    verdict: pipelines.finance.engine.determinePhase(snapshot),
    recordsAnalyzed: records.length,
    dateRange: pipelines.finance.extractor.dateRange(records),
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "phasewatch-analyses-"));
    db = new PhaseDB(dir);
    store = new AnalysisStore(db);
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("saves a verdict and reads it back", () => {
    const id = store.save("sodium-cells", outcome, "2025-06-01T00:00:00.000Z");
    const [stored] = store.history("sodium-cells");

    expect(stored?.id).toBe(id);
    expect(stored?.stream).toBe("finance");
    expect(stored?.phase).toBe("trough_disillusionment");
    expect(stored?.confidence).toBe(1);
    expect(stored?.scores).toEqual(outcome.verdict.scores);
    expect(stored?.rationale).toBe(outcome.verdict.rationale);
    expect(stored?.recordsAnalyzed).toBe(63);
    expect(stored?.dateRange).toEqual({ start: "2024-01-01", end: "2024-03-03" });
    expect(stored?.snapshot["maxDrawdown"]).toBe(snapshot.maxDrawdown);
  });

  it("returns history newest first and latest per stream", () => {
    store.save("sodium-cells", outcome, "2025-05-01T00:00:00.000Z");
    const newest = store.save("sodium-cells", outcome, "2025-06-01T00:00:00.000Z");
    store.save("solid-state", outcome, "2025-07-01T00:00:00.000Z");

    expect(store.history("sodium-cells").map((a) => a.analyzedAt)).toEqual([
      "2025-06-01T00:00:00.000Z",
      "2025-05-01T00:00:00.000Z",
    ]);
    expect(store.history("sodium-cells", "paper")).toEqual([]);
    expect(store.latest("sodium-cells").map((a) => a.id)).toEqual([newest]);
  });
});
