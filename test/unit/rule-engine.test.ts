import { describe, it, expect } from "vitest";
import { PhaseRuleEngine, type StreamRuleSet } from "../../src/engine/rule-engine.js";
import { silentLogger } from "../../src/logging/logger.js";
import { PHASES } from "../../src/phases/types.js";

interface Toy {
  a: boolean;
  b: boolean;
}

function toyRules(): StreamRuleSet<Toy> {
  return {
    stream: "news",
    table: {
      technology_trigger: [
        { id: "a", description: "A holds", weight: 0.3, test: (s) => s.a },
        { id: "b", description: "B holds", weight: 0.2, test: (s) => s.b },
      ],
      peak_inflated_expectations: [{ id: "a2", description: "A again", weight: 0.5, test: (s) => s.a }],
      trough_disillusionment: [
        { id: "x1", description: "Always", weight: 0.7, test: () => true },
        { id: "x2", description: "Always too", weight: 0.6, test: () => true },
      ],
      slope_enlightenment: [],
      plateau_productivity: [{ id: "nb", description: "B fails", weight: 0.4, test: (s) => !s.b }],
    },
    keyMetrics: (phase) => [`metric for ${phase}`],
  };
}

describe("PhaseRuleEngine", () => {
  const engine = new PhaseRuleEngine(toyRules(), silentLogger());

  it("sums satisfied weights and caps at 1", () => {
    const { scores } = engine.score({ a: true, b: false });
    expect(scores).toEqual({
      technology_trigger: 0.3,
      peak_inflated_expectations: 0.5,
      trough_disillusionment: 1,
      slope_enlightenment: 0,
      plateau_productivity: 0.4,
    });
  });

  it("records every indicator outcome in canonical phase order", () => {
    const { indicators } = engine.score({ a: false, b: true });
    expect(indicators.map((i) => i.id)).toEqual(["a", "b", "a2", "x1", "x2", "nb"]);
    expect(indicators.filter((i) => i.satisfied).map((i) => i.id)).toEqual(["b", "x1", "x2"]);
  });

  it("keeps every score inside [0, 1]", () => {
    for (const a of [true, false]) {
      for (const b of [true, false]) {
        const { scores } = engine.score({ a, b });
        for (const phase of PHASES) {
          expect(scores[phase]).toBeGreaterThanOrEqual(0);
          expect(scores[phase]).toBeLessThanOrEqual(1);
        }
      }
    }
  });

  it("breaks ties toward the earlier phase", () => {
    const tied = new PhaseRuleEngine(
      {
        ...toyRules(),
        table: {
          technology_trigger: [],
          peak_inflated_expectations: [{ id: "p", description: "P", weight: 0.5, test: () => true }],
          trough_disillusionment: [{ id: "t", description: "T", weight: 0.5, test: () => true }],
          slope_enlightenment: [],
          plateau_productivity: [],
        },
      },
      silentLogger(),
    );
    expect(tied.determinePhase({ a: false, b: false }).phase).toBe("peak_inflated_expectations");
  });

  it("picks the first phase when nothing is satisfied", () => {
    const empty = new PhaseRuleEngine(
      {
        ...toyRules(),
        table: {
          technology_trigger: [],
          peak_inflated_expectations: [],
          trough_disillusionment: [],
          slope_enlightenment: [],
          plateau_productivity: [],
        },
      },
      silentLogger(),
    );
    const verdict = empty.determinePhase({ a: true, b: true });
    expect(verdict.phase).toBe("technology_trigger");
    expect(verdict.confidence).toBe(0);
  });

  it("returns the winner's score as confidence and is deterministic", () => {
    const first = engine.determinePhase({ a: true, b: true });
    const second = engine.determinePhase({ a: true, b: true });
    expect(first.phase).toBe("trough_disillusionment");
    expect(first.confidence).toBe(1);
    expect(second).toEqual(first);
  });
});
