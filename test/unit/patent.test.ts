import { describe, it, expect } from "vitest";
import { InsufficientDataError } from "../../src/engine/errors.js";
import { PhaseRuleEngine } from "../../src/engine/rule-engine.js";
import { silentLogger } from "../../src/logging/logger.js";
import { assigneeName, classifyAssignee, PatentExtractor } from "../../src/streams/patent/extractor.js";
import { createPatentRules, entrantsDeclining } from "../../src/streams/patent/rules.js";
import type { PatentAssignee, PatentRecord } from "../../src/streams/patent/types.js";
import { makeConfig, makeExtractorOptions, makePatent } from "../helpers/fixtures.js";

const config = makeConfig();

function assignee(overrides: Partial<PatentAssignee>): PatentAssignee {
  return { organization: null, firstName: null, lastName: null, country: null, ...overrides };
}

const acme = assignee({ organization: "Acme Cells Inc", country: "us" });

function portfolio(): PatentRecord[] {
  const years = [2018, 2018, 2019, 2019, 2020, 2020, 2021, 2021, 2022, 2023];
  return years.map((year, i) => {
    let holder = acme;
    if (i === 1) holder = assignee({ organization: "Northfield University", country: "de" });
    if (i === 3) holder = assignee({ firstName: "Jane", lastName: "Doe" });
    return makePatent({ patentId: `US-${i}`, year, assignees: [holder] });
  });
}

describe("assignees", () => {
  it("names organizations before people", () => {
    expect(assigneeName(assignee({ organization: " Acme Cells Inc " }))).toBe("Acme Cells Inc");
    expect(assigneeName(assignee({ firstName: "Jane", lastName: "Doe" }))).toBe("Jane Doe");
    expect(assigneeName(assignee({}))).toBeNull();
  });

  it("classifies academic, corporate and individual holders", () => {
    expect(classifyAssignee(assignee({ organization: "Northfield University" }))).toBe("academic");
    expect(classifyAssignee(acme)).toBe("corporate");
    expect(classifyAssignee(assignee({ lastName: "Doe" }))).toBe("individual");
    expect(classifyAssignee(assignee({ organization: "Zephyr" }))).toBe("corporate");
  });
});

describe("PatentExtractor", () => {
  const extractor = new PatentExtractor(makeExtractorOptions());

  it("reports too few patents", () => {
    const eight = portfolio().slice(0, 8);
    expect(() => extractor.extract(eight)).toThrow(InsufficientDataError);
    expect(() => extractor.extract(eight)).toThrow("Insufficient patents for analysis: found 8, need at least 10.");
  });

  it("handles very large portfolios", () => {
    const many = Array.from({ length: 140_000 }, (_, i) =>
      makePatent({ patentId: `US-${i}`, year: 2000 + (i % 20), assignees: [acme] }),
    );
    const s = extractor.extract(many);
    expect(s.totalPatents).toBe(140_000);
    expect(s.firstPatentYear).toBe(2000);
    expect(s.peakYear).toBe(2000);
  }, 60_000);

  it("computes volume, holder and geography metrics", () => {
    const s = extractor.extract(portfolio());

    expect(s.totalPatents).toBe(10);
    expect(s.patentVelocity).toEqual({ "2018": 2, "2019": 2, "2020": 2, "2021": 2, "2022": 1, "2023": 1 });
    expect(s.velocityTrend).toBe("decreasing");
    expect(s.peakYear).toBe(2018);
    expect(s.yearsSincePeak).toBe(5);

    expect(s.uniqueAssigneesCount).toBe(3);
    expect(s.topAssignees).toEqual([
      ["Acme Cells Inc", 8],
      ["Jane Doe", 1],
      ["Northfield University", 1],
    ]);
    expect(s.assigneeConcentrationHhi).toBeCloseTo(0.66, 12);
    expect(s.corporatePercentage).toBe(80);
    expect(s.academicPercentage).toBe(10);
    expect(s.individualPercentage).toBe(10);
    expect(s.newEntrantsByYear).toEqual({ "2018": 2, "2019": 1 });

    expect(s.countryDistribution).toEqual({ US: 8, DE: 1 });
    expect(s.uniqueCountries).toBe(2);

    expect(s.avgForwardCitations).toBe(2);
    expect(s.citationRatio).toBe(0.5);
    expect(s.utilityPercentage).toBe(100);
    expect(s.firstPatentYear).toBe(2018);
    expect(s.technologyAgeYears).toBe(7);
    expect(s.patentsLastYear).toBe(0);
    expect(s.patentsLast2Years).toBe(1);
  });
});

describe("patent rules", () => {
  const base = new PatentExtractor(makeExtractorOptions()).extract(portfolio());

  it("detects a falling entrant count over the last entry years", () => {
    expect(entrantsDeclining({ ...base, newEntrantsByYear: { "2019": 10, "2020": 3, "2021": 4 } }, 0.8)).toBe(true);
    expect(entrantsDeclining({ ...base, newEntrantsByYear: { "2019": 5, "2020": 3, "2021": 4 } }, 0.8)).toBe(false);
    expect(entrantsDeclining({ ...base, newEntrantsByYear: { "2020": 3, "2021": 4 } }, 0.8)).toBe(false);
    expect(entrantsDeclining({ ...base, newEntrantsByYear: { "2021": 4 } }, 0.8)).toBe(false);
  });

  it("lists the top holders in the rationale", () => {
    const engine = new PhaseRuleEngine(createPatentRules(config.thresholds.patent), silentLogger());
    const verdict = engine.determinePhase(base);
    expect(verdict.rationale).toContain(
      "Top patent holders:\n  - Acme Cells Inc: 8 patents\n  - Jane Doe: 1 patents\n  - Northfield University: 1 patents",
    );
    expect(verdict.rationale.split("\n")[0]).toMatch(/^Patent-based phase: /);
  });

  it("narrates assignee concentration with its band", () => {
    const rules = createPatentRules(config.thresholds.patent);
    expect(rules.keyMetrics("slope_enlightenment", base)).toContain("Assignee HHI: 0.660 (concentrated)");
  });
});
