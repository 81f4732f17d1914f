import { describe, it, expect } from "vitest";
import { PhaseRuleEngine } from "../../src/engine/rule-engine.js";
import { silentLogger } from "../../src/logging/logger.js";
import { barPrice, dailyReturns, FinanceExtractor, maxDrawdown } from "../../src/streams/finance/extractor.js";
import { createFinanceRules } from "../../src/streams/finance/rules.js";
import {
  makeConfig,
  makeExtractorOptions,
  makePriceRow,
  makeProfile,
  priceSeries,
  troughMarket,
} from "../helpers/fixtures.js";

const config = makeConfig();

function extractor() {
  return new FinanceExtractor(makeExtractorOptions());
}

describe("price helpers", () => {
  it("prefers the adjusted close and falls back to close", () => {
    expect(barPrice(makePriceRow({ adjClose: 99.5, close: 100 }))).toBe(99.5);
    expect(barPrice(makePriceRow({ adjClose: null, close: 100 }))).toBe(100);
    expect(barPrice(makePriceRow({ adjClose: 0, close: null }))).toBeNull();
  });

  it("computes simple daily returns", () => {
    const returns = dailyReturns([
      { date: "2024-01-01", price: 100 },
      { date: "2024-01-02", price: 110 },
      { date: "2024-01-03", price: 99 },
    ]);
    expect(returns.map((r) => r.date)).toEqual(["2024-01-02", "2024-01-03"]);
    expect(returns[0]?.value).toBeCloseTo(0.1, 12);
    expect(returns[1]?.value).toBeCloseTo(-0.1, 12);
  });

  it("measures the largest peak-to-trough fall", () => {
    expect(maxDrawdown([100, 120, 90, 130, 117])).toBeCloseTo(0.25, 12);
    expect(maxDrawdown([1, 2, 3])).toBe(0);
    expect(maxDrawdown([])).toBe(0);
  });
});

describe("FinanceExtractor", () => {
  it("counts price rows, not profiles, toward the floor", () => {
    const records = [...priceSeries("LATX", Array.from({ length: 19 }, () => 100)), makeProfile()];
    expect(extractor().countable(records)).toBe(19);
    expect(() => extractor().extract(records)).toThrow(
      "Insufficient price records for analysis: found 19, need at least 20.",
    );
  });

  it("summarizes a falling market", () => {
    const s = extractor().extract(troughMarket());
    expect(s.tickersAnalyzed).toEqual(["LATX"]);
    expect(s.totalPriceRecords).toBe(63);
    expect(s.dateRangeStart).toBe("2024-01-01");
    expect(s.dateRangeEnd).toBe("2024-03-03");
    expect(s.maxDrawdown).toBeCloseTo(45, 9);
    expect(s.priceChangeLast3Months).toBeCloseTo(-25, 9);
    expect(s.priceTrend).toBe("bearish");
    expect(s.totalReturn).toBeCloseTo(-25, 9);
    expect(s.volumeTrend).toBe("decreasing");
    expect(s.volumeChangePercentage).toBe(-50);
    expect(s.sharpeRatio).toBeLessThan(0);
    expect(s.avgPeRatio).toBeNull();
    expect(s.avgCorrelationBetweenTickers).toBeNull();
    expect(s.tickerPerformance["LATX"]).toMatchObject({ totalReturnPct: -25, numRecords: 63, latestPrice: 66 });
  });

  it("groups tickers case-insensitively and reads fundamentals from profiles", () => {
    const prices = Array.from({ length: 25 }, (_, i) => 100 + i);
    const records = [
      ...priceSeries("latx", prices),
      ...priceSeries("GRDX", prices.map((p) => p * 2)),
      makeProfile({ ticker: "LATX", peRatio: 20, sector: "Energy", marketCap: 2_000_000_000 }),
      makeProfile({ ticker: "GRDX", peRatio: -4, sector: "Utilities", industry: "Grid", marketCap: null }),
    ];
    const s = extractor().extract(records);

    expect(s.tickersAnalyzed).toEqual(["GRDX", "LATX"]);
    expect(s.avgPeRatio).toBe(20);
    expect(s.avgMarketCap).toBe(2_000_000_000);
    expect(s.sectorsRepresented).toEqual(["Energy", "Utilities"]);
    expect(s.industriesRepresented).toEqual(["Batteries", "Grid"]);
    expect(s.sectorConcentrationHhi).toBe(0.5);
    expect(s.avgCorrelationBetweenTickers).toBeCloseTo(1, 9);
    expect(s.volumeTrend).toBe("stable");
    expect(s.coveragePercentage).toBe(100);
  });
});

describe("finance rules", () => {
  const engine = new PhaseRuleEngine(createFinanceRules(config.thresholds.finance), silentLogger());

  it("places a deep drawdown on falling volume in the trough", () => {
    const verdict = engine.determinePhase(extractor().extract(troughMarket()));
    expect(verdict.phase).toBe("trough_disillusionment");
    expect(verdict.confidence).toBe(1);
    const satisfied = verdict.indicators
      .filter((i) => i.phase === "trough_disillusionment" && i.satisfied)
      .map((i) => i.id);
    expect(satisfied).toEqual(["bearish", "severe_drawdown", "sell_off", "interest_waning", "negative_risk_adjusted"]);
    expect(verdict.rationale).toContain("Ticker performance:\n  - LATX: -25.00% total return");
    expect(verdict.rationale.split("\n")[0]).toBe("Market-based phase: Trough of Disillusionment");
  });
});
