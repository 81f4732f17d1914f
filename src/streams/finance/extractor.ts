import { MetricsExtractor } from "../../engine/extractor.js";
import { herfindahl, tally, topEntries } from "../../toolkit/concentration.js";
import { mean, pearson, percentage, roundTo, stdDev } from "../../toolkit/stats.js";
import { nonBlank } from "../common.js";
import type { FinanceRecord, FinanceSnapshot, PriceRow, TickerPerformance, TickerProfile } from "./types.js";

const TRADING_DAYS = 252;
const MONTH_BARS = 21;
const QUARTER_BARS = 63;
const MIN_TREND_BARS = 5;
const MIN_COMMON_DATES = 20;
/** Three-month change (percent) separating bullish/bearish from sideways. */
const PRICE_TREND_BAND = 10;
/** Volume change (percent) separating increasing/decreasing from stable. */
const VOLUME_BAND = 20;

interface Bar {
  readonly date: string;
  readonly price: number;
}

interface TickerSeries {
  readonly ticker: string;
  readonly rows: PriceRow[];
  /** Bars with a usable positive price, in date order. */
  readonly bars: Bar[];
}

function isPrice(record: FinanceRecord): record is PriceRow {
  return record.kind === "price";
}

function isProfile(record: FinanceRecord): record is TickerProfile {
  return record.kind === "profile";
}

/** Adjusted close when positive, otherwise close when positive. */
export function barPrice(row: PriceRow): number | null {
  if (row.adjClose !== null && row.adjClose > 0) return row.adjClose;
  if (row.close !== null && row.close > 0) return row.close;
  return null;
}

export function dailyReturns(bars: readonly Bar[]): Array<{ date: string; value: number }> {
  const out: Array<{ date: string; value: number }> = [];
  for (let i = 1; i < bars.length; i++) {
    const prev = bars[i - 1];
    const curr = bars[i];
    if (!prev || !curr) continue;
    out.push({ date: curr.date, value: (curr.price - prev.price) / prev.price });
  }
  return out;
}

/** Largest peak-to-trough decline of one series, as a fraction. */
export function maxDrawdown(prices: readonly number[]): number {
  let peak = prices[0] ?? 0;
  let worst = 0;
  for (const price of prices) {
    if (price > peak) peak = price;
    const drawdown = peak > 0 ? (peak - price) / peak : 0;
    if (drawdown > worst) worst = drawdown;
  }
  return worst;
}

function changeSince(bars: readonly Bar[], barsBack: number): number | null {
  const last = bars[bars.length - 1];
  const then = bars[Math.max(0, bars.length - barsBack)];
  if (!last || !then) return null;
  return ((last.price - then.price) / then.price) * 100;
}

export class FinanceExtractor extends MetricsExtractor<FinanceRecord, FinanceSnapshot> {
  readonly stream = "finance" as const;
  readonly minimumRecords = 20;

  override countable(records: readonly FinanceRecord[]): number {
    return records.filter(isPrice).length;
  }

  protected observedAt(record: FinanceRecord): Date | null {
    return isPrice(record) ? new Date(`${record.date}T00:00:00Z`) : null;
  }

  protected compute(records: readonly FinanceRecord[], _now: Date): FinanceSnapshot {
    const rows = records.filter(isPrice);
    const profiles = records.filter(isProfile);
    const series = this.groupByTicker(rows);

    return {
      ...this.overview(rows, series),
      ...this.returns(series),
      ...this.priceTrend(series),
      ...this.volume(series),
      tickerPerformance: this.tickerPerformance(series),
      ...this.fundamentals(profiles),
      avgCorrelationBetweenTickers: this.correlation(series),
      ...this.coverage(rows),
    };
  }

  private groupByTicker(rows: readonly PriceRow[]): TickerSeries[] {
    const byTicker = new Map<string, PriceRow[]>();
    for (const row of rows) {
      const ticker = row.ticker.trim().toUpperCase();
      const list = byTicker.get(ticker) ?? [];
      list.push(row);
      byTicker.set(ticker, list);
    }
    return [...byTicker.keys()].sort().map((ticker) => {
      const tickerRows = byTicker.get(ticker) ?? [];
      const bars = tickerRows.flatMap((row): Bar[] => {
        const price = barPrice(row);
        return price === null ? [] : [{ date: row.date, price }];
      });
      return { ticker, rows: tickerRows, bars };
    });
  }

  private overview(rows: readonly PriceRow[], series: readonly TickerSeries[]) {
    const dates = rows.map((r) => r.date).sort();
    return {
      tickersAnalyzed: series.map((s) => s.ticker),
      totalPriceRecords: rows.length,
      dateRangeStart: dates[0] ?? null,
      dateRangeEnd: dates[dates.length - 1] ?? null,
    };
  }

  private returns(series: readonly TickerSeries[]) {
    const pooled: number[] = [];
    const totals: number[] = [];
    const drawdowns: number[] = [];

    for (const { bars } of series) {
      if (bars.length < 2) continue;
      pooled.push(...dailyReturns(bars).map((r) => r.value));
      const first = bars[0];
      const last = bars[bars.length - 1];
      if (first && last) totals.push((last.price - first.price) / first.price);
      drawdowns.push(maxDrawdown(bars.map((b) => b.price)));
    }

    const avg = mean(pooled);
    const vol = stdDev(pooled);
    this.logger.debug({ returns: pooled.length, tickers: totals.length }, "Daily returns pooled");

    return {
      avgDailyReturn: avg * 100,
      volatility: vol * 100,
      sharpeRatio: vol > 0 ? (avg * TRADING_DAYS) / (vol * Math.sqrt(TRADING_DAYS)) : 0,
      totalReturn: mean(totals) * 100,
      maxDrawdown: mean(drawdowns) * 100,
    };
  }

  private priceTrend(series: readonly TickerSeries[]) {
    const monthChanges: number[] = [];
    const quarterChanges: number[] = [];
    for (const { bars } of series) {
      if (bars.length < MIN_TREND_BARS) continue;
      const month = changeSince(bars, MONTH_BARS);
      const quarter = changeSince(bars, QUARTER_BARS);
      if (month !== null) monthChanges.push(month);
      if (quarter !== null) quarterChanges.push(quarter);
    }

    const priceChangeLast3Months = mean(quarterChanges);
    let priceTrend: FinanceSnapshot["priceTrend"] = "sideways";
    if (priceChangeLast3Months > PRICE_TREND_BAND) priceTrend = "bullish";
    else if (priceChangeLast3Months < -PRICE_TREND_BAND) priceTrend = "bearish";

    return {
      priceTrend,
      priceChangeLastMonth: mean(monthChanges),
      priceChangeLast3Months,
    };
  }

  private volume(series: readonly TickerSeries[]) {
    const all: number[] = [];
    const early: number[] = [];
    const recent: number[] = [];

    for (const { rows } of series) {
      const volumes = rows.flatMap((r) => (r.volume !== null && r.volume > 0 ? [r.volume] : []));
      const midpoint = Math.floor(volumes.length / 2);
      all.push(...volumes);
      early.push(...volumes.slice(0, midpoint));
      recent.push(...volumes.slice(midpoint));
    }

    if (early.length === 0 || recent.length === 0) {
      return {
        avgDailyVolume: mean(all),
        volumeTrend: "insufficient_data" as const,
        volumeChangePercentage: 0,
      };
    }

    const earlyAvg = mean(early);
    const change = earlyAvg > 0 ? ((mean(recent) - earlyAvg) / earlyAvg) * 100 : 0;
    let volumeTrend: FinanceSnapshot["volumeTrend"] = "stable";
    if (change > VOLUME_BAND) volumeTrend = "increasing";
    else if (change < -VOLUME_BAND) volumeTrend = "decreasing";

    return { avgDailyVolume: mean(all), volumeTrend, volumeChangePercentage: change };
  }

  private tickerPerformance(series: readonly TickerSeries[]): Record<string, TickerPerformance> {
    const out: Record<string, TickerPerformance> = {};
    for (const { ticker, rows, bars } of series) {
      const returns = dailyReturns(bars).map((r) => r.value);
      const first = bars[0];
      const last = bars[bars.length - 1];
      if (returns.length === 0 || !first || !last) continue;
      out[ticker] = {
        totalReturnPct: roundTo(((last.price - first.price) / first.price) * 100, 2),
        avgDailyReturnPct: roundTo(mean(returns) * 100, 4),
        volatilityPct: roundTo(stdDev(returns) * 100, 2),
        numRecords: rows.length,
        latestPrice: last.price,
      };
    }
    return out;
  }

  private fundamentals(profiles: readonly TickerProfile[]) {
    const pe = profiles.flatMap((p) => (p.peRatio !== null && p.peRatio > 0 ? [p.peRatio] : []));
    const caps = profiles.flatMap((p) => (p.marketCap !== null && p.marketCap > 0 ? [p.marketCap] : []));
    const sectors = tally(profiles, (p) => (nonBlank(p.sector) ? p.sector.trim() : null));
    const industries = new Set(profiles.flatMap((p) => (nonBlank(p.industry) ? [p.industry.trim()] : [])));

    return {
      avgPeRatio: pe.length > 0 ? mean(pe) : null,
      avgMarketCap: caps.length > 0 ? mean(caps) : null,
      sectorsRepresented: [...sectors.keys()].sort(),
      industriesRepresented: [...industries].sort(),
      topSectors: topEntries(sectors, this.options.topN),
      sectorConcentrationHhi: herfindahl(sectors.values()),
    };
  }

  /** Mean pairwise correlation of daily returns over pairs sharing enough dates. */
  private correlation(series: readonly TickerSeries[]): number | null {
    const byDate = series
      .map((s) => new Map(dailyReturns(s.bars).map((r): [string, number] => [r.date, r.value])))
      .filter((m) => m.size > 0);

    const correlations: number[] = [];
    for (let i = 0; i < byDate.length; i++) {
      for (let j = i + 1; j < byDate.length; j++) {
        const a = byDate[i];
        const b = byDate[j];
        if (!a || !b) continue;
        const common = [...a.keys()].filter((d) => b.has(d)).sort();
        if (common.length < MIN_COMMON_DATES) continue;
        const r = pearson(
          common.map((d) => a.get(d) ?? 0),
          common.map((d) => b.get(d) ?? 0),
        );
        if (r !== null && !Number.isNaN(r)) correlations.push(r);
      }
    }
    return correlations.length > 0 ? mean(correlations) : null;
  }

  private coverage(rows: readonly PriceRow[]) {
    const recordsWithVolume = rows.filter((r) => r.volume !== null && r.volume > 0).length;
    return {
      recordsWithVolume,
      coveragePercentage: percentage(recordsWithVolume, rows.length),
    };
  }
}
