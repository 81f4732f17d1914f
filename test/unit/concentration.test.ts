import { describe, it, expect } from "vitest";
import { describeConcentration, formatHhi, herfindahl, tally, topEntries } from "../../src/toolkit/concentration.js";

describe("herfindahl", () => {
  it("is 1/n for n equal categories", () => {
    expect(herfindahl([5, 5, 5, 5])).toBeCloseTo(0.25, 12);
    expect(herfindahl([3, 3, 3])).toBeCloseTo(1 / 3, 12);
  });

  it("is 1 for a single category", () => {
    expect(herfindahl([42])).toBe(1);
  });

  it("is 0 for empty input", () => {
    expect(herfindahl([])).toBe(0);
    expect(herfindahl([0, 0])).toBe(0);
  });

  it("weights dominant categories", () => {
    expect(herfindahl([3, 1])).toBeCloseTo(0.625, 12);
  });
});

describe("topEntries", () => {
  it("orders by count then key and truncates", () => {
    const counts = new Map([
      ["beta", 2],
      ["alpha", 2],
      ["gamma", 5],
      ["delta", 1],
    ]);
    expect(topEntries(counts, 3)).toEqual([
      ["gamma", 5],
      ["alpha", 2],
      ["beta", 2],
    ]);
  });
});

describe("tally", () => {
  it("skips null and undefined keys", () => {
    const counts = tally(["a", null, "b", "a", undefined], (v) => v);
    expect([...counts.entries()]).toEqual([
      ["a", 2],
      ["b", 1],
    ]);
  });
});

describe("describeConcentration", () => {
  it("bands the index", () => {
    expect(describeConcentration(0.05)).toBe("competitive");
    expect(describeConcentration(0.2)).toBe("moderate");
    expect(describeConcentration(0.6)).toBe("concentrated");
  });

  it("formats the index with its band", () => {
    expect(formatHhi(0.18)).toBe("0.180 (moderate)");
    expect(formatHhi(0.05)).toBe("0.050 (competitive)");
  });
});
