import type { FinanceThresholds } from "../../config/types.js";
import type { StreamRuleSet } from "../../engine/rule-engine.js";
import type { FinanceSnapshot } from "./types.js";

const pct = (value: number) => `${value.toFixed(1)}%`;

export function createFinanceRules(t: FinanceThresholds): StreamRuleSet<FinanceSnapshot> {
  return {
    stream: "finance",
    table: {
      technology_trigger: [
        {
          id: "speculative_volatility",
          description: `Daily volatility above ${t.highVolatility}%`,
          weight: 0.25,
          test: (s) => s.volatility > t.highVolatility,
        },
        {
          id: "few_listed_players",
          description: `At most ${t.fewTickers} tickers`,
          weight: 0.25,
          test: (s) => s.tickersAnalyzed.length <= t.fewTickers,
        },
        {
          id: "thin_trading",
          description: "Trading volume decreasing",
          weight: 0.2,
          test: (s) => s.volumeTrend === "decreasing",
        },
        {
          id: "no_earnings",
          description: "No positive P/E ratio reported",
          weight: 0.15,
          test: (s) => s.avgPeRatio === null,
        },
        {
          id: "uncorrelated",
          description: `Average correlation below ${t.lowCorrelation}`,
          weight: 0.15,
          test: (s) => s.avgCorrelationBetweenTickers !== null && s.avgCorrelationBetweenTickers < t.lowCorrelation,
        },
      ],
      peak_inflated_expectations: [
        {
          id: "bullish",
          description: "Price trend bullish",
          weight: 0.25,
          test: (s) => s.priceTrend === "bullish",
        },
        {
          id: "rally",
          description: `Three-month change above ${t.strongBullish}%`,
          weight: 0.2,
          test: (s) => s.priceChangeLast3Months > t.strongBullish,
        },
        {
          id: "volume_surge",
          description: "Trading volume increasing",
          weight: 0.2,
          test: (s) => s.volumeTrend === "increasing",
        },
        {
          id: "speculative_volatility",
          description: `Daily volatility above ${t.highVolatility}%`,
          weight: 0.15,
          test: (s) => s.volatility > t.highVolatility,
        },
        {
          id: "outsized_return",
          description: `Total return above ${t.highReturn}%`,
          weight: 0.1,
          test: (s) => s.totalReturn > t.highReturn,
        },
        {
          id: "rich_valuation",
          description: `Average P/E above ${t.highPeRatio}`,
          weight: 0.1,
          test: (s) => s.avgPeRatio !== null && s.avgPeRatio > t.highPeRatio,
        },
      ],
      trough_disillusionment: [
        {
          id: "bearish",
          description: "Price trend bearish",
          weight: 0.3,
          test: (s) => s.priceTrend === "bearish",
        },
        {
          id: "severe_drawdown",
          description: `Max drawdown above ${t.severeDrawdown}%`,
          weight: 0.25,
          test: (s) => s.maxDrawdown > t.severeDrawdown,
        },
        {
          id: "sell_off",
          description: `Three-month change below ${t.strongBearish}%`,
          weight: 0.2,
          test: (s) => s.priceChangeLast3Months < t.strongBearish,
        },
        {
          id: "interest_waning",
          description: "Trading volume decreasing",
          weight: 0.15,
          test: (s) => s.volumeTrend === "decreasing",
        },
        {
          id: "negative_risk_adjusted",
          description: "Sharpe ratio negative",
          weight: 0.1,
          test: (s) => s.sharpeRatio < 0,
        },
      ],
      slope_enlightenment: [
        {
          id: "steady_gains",
          description: `Three-month change between ${t.moderateReturnLow}% and ${t.moderateReturnHigh}%`,
          weight: 0.25,
          test: (s) =>
            s.priceChangeLast3Months >= t.moderateReturnLow && s.priceChangeLast3Months <= t.moderateReturnHigh,
        },
        {
          id: "recovering",
          description: "Price trend sideways or bullish",
          weight: 0.2,
          test: (s) => s.priceTrend === "sideways" || s.priceTrend === "bullish",
        },
        {
          id: "stable_volume",
          description: "Trading volume stable",
          weight: 0.2,
          test: (s) => s.volumeTrend === "stable",
        },
        {
          id: "calmer_volatility",
          description: `Daily volatility below ${t.highVolatility}%`,
          weight: 0.15,
          test: (s) => s.volatility < t.highVolatility,
        },
        {
          id: "moderate_drawdown",
          description: `Max drawdown between ${t.moderateDrawdown}% and ${t.severeDrawdown}%`,
          weight: 0.1,
          test: (s) => s.maxDrawdown >= t.moderateDrawdown && s.maxDrawdown < t.severeDrawdown,
        },
        {
          id: "modest_sharpe",
          description: `Sharpe ratio between 0 and ${t.strongSharpe}`,
          weight: 0.1,
          test: (s) => s.sharpeRatio > 0 && s.sharpeRatio < t.strongSharpe,
        },
      ],
      plateau_productivity: [
        {
          id: "sideways",
          description: "Price trend sideways",
          weight: 0.25,
          test: (s) => s.priceTrend === "sideways",
        },
        {
          id: "low_volatility",
          description: `Daily volatility below ${t.lowVolatility}%`,
          weight: 0.2,
          test: (s) => s.volatility < t.lowVolatility,
        },
        {
          id: "stable_volume",
          description: "Trading volume stable",
          weight: 0.2,
          test: (s) => s.volumeTrend === "stable",
        },
        {
          id: "fair_valuation",
          description: `Average P/E between ${t.fairPeLow} and ${t.fairPeHigh}`,
          weight: 0.15,
          test: (s) => s.avgPeRatio !== null && s.avgPeRatio > t.fairPeLow && s.avgPeRatio < t.fairPeHigh,
        },
        {
          id: "strong_sharpe",
          description: `Sharpe ratio at least ${t.strongSharpe}`,
          weight: 0.1,
          test: (s) => s.sharpeRatio >= t.strongSharpe,
        },
        {
          id: "multi_sector",
          description: "Spans more than one sector",
          weight: 0.1,
          test: (s) => s.sectorsRepresented.length > 1,
        },
      ],
    },

    keyMetrics(phase, s) {
      switch (phase) {
        case "technology_trigger":
          return [
            `Tickers: ${s.tickersAnalyzed.length}`,
            `Volatility: ${pct(s.volatility)}`,
            `Volume trend: ${s.volumeTrend}`,
            `Average P/E: ${s.avgPeRatio === null ? "n/a" : s.avgPeRatio.toFixed(1)}`,
          ];
        case "peak_inflated_expectations":
          return [
            `Price trend: ${s.priceTrend}`,
            `Three-month change: ${pct(s.priceChangeLast3Months)}`,
            `Total return: ${pct(s.totalReturn)}`,
            `Volume trend: ${s.volumeTrend}`,
          ];
        case "trough_disillusionment":
          return [
            `Price trend: ${s.priceTrend}`,
            `Max drawdown: ${pct(s.maxDrawdown)}`,
            `Three-month change: ${pct(s.priceChangeLast3Months)}`,
            `Sharpe ratio: ${s.sharpeRatio.toFixed(2)}`,
          ];
        case "slope_enlightenment":
          return [
            `Three-month change: ${pct(s.priceChangeLast3Months)}`,
            `Volatility: ${pct(s.volatility)}`,
            `Max drawdown: ${pct(s.maxDrawdown)}`,
            `Sharpe ratio: ${s.sharpeRatio.toFixed(2)}`,
          ];
        case "plateau_productivity":
          return [
            `Price trend: ${s.priceTrend}`,
            `Volatility: ${pct(s.volatility)}`,
            `Average P/E: ${s.avgPeRatio === null ? "n/a" : s.avgPeRatio.toFixed(1)}`,
            `Sectors: ${s.sectorsRepresented.length}`,
          ];
      }
    },

    highlights(s) {
      const lines = Object.entries(s.tickerPerformance)
        .slice(0, 5)
        .map(
          ([ticker, perf]) =>
            `${ticker}: ${perf.totalReturnPct.toFixed(2)}% total return, ${perf.volatilityPct.toFixed(2)}% volatility`,
        );
      return { title: "Ticker performance", lines };
    },
  };
}
