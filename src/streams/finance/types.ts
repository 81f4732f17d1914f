import { z } from "zod";
import {
  countSchema,
  halvesTrendSchema,
  hhiSchema,
  maybe,
  rankedEntrySchema,
  shareSchema,
} from "../common.js";

export const priceRowSchema = z.object({
  kind: z.literal("price"),
  ticker: z.string().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD"),
  open: maybe(z.number()),
  high: maybe(z.number()),
  low: maybe(z.number()),
  close: maybe(z.number()),
  adjClose: maybe(z.number()),
  volume: maybe(z.number().nonnegative()),
});

export const tickerProfileSchema = z.object({
  kind: z.literal("profile"),
  ticker: z.string().min(1),
  companyName: maybe(z.string()),
  sector: maybe(z.string()),
  industry: maybe(z.string()),
  country: maybe(z.string()),
  marketCap: maybe(z.number()),
  peRatio: maybe(z.number()),
});

export const financeRecordSchema = z.discriminatedUnion("kind", [priceRowSchema, tickerProfileSchema]);

export type PriceRow = z.infer<typeof priceRowSchema>;
export type TickerProfile = z.infer<typeof tickerProfileSchema>;
export type FinanceRecord = z.infer<typeof financeRecordSchema>;

export const tickerPerformanceSchema = z.object({
  totalReturnPct: z.number(),
  avgDailyReturnPct: z.number(),
  volatilityPct: z.number().nonnegative(),
  numRecords: countSchema,
  latestPrice: z.number(),
});

export type TickerPerformance = z.infer<typeof tickerPerformanceSchema>;

export const financeSnapshotSchema = z.object({
  // overview
  tickersAnalyzed: z.array(z.string()),
  totalPriceRecords: countSchema,
  dateRangeStart: z.string().nullable(),
  dateRangeEnd: z.string().nullable(),
  // returns and risk, all in percent except the Sharpe ratio
  avgDailyReturn: z.number(),
  totalReturn: z.number(),
  volatility: z.number().nonnegative(),
  maxDrawdown: z.number().nonnegative(),
  sharpeRatio: z.number(),
  priceTrend: z.enum(["bullish", "bearish", "sideways"]),
  priceChangeLastMonth: z.number(),
  priceChangeLast3Months: z.number(),
  // volume
  avgDailyVolume: z.number().nonnegative(),
  volumeTrend: halvesTrendSchema,
  volumeChangePercentage: z.number(),
  // per ticker
  tickerPerformance: z.record(z.string(), tickerPerformanceSchema),
  // fundamentals
  avgPeRatio: z.number().nullable(),
  avgMarketCap: z.number().nullable(),
  sectorsRepresented: z.array(z.string()),
  industriesRepresented: z.array(z.string()),
  topSectors: z.array(rankedEntrySchema),
  sectorConcentrationHhi: hhiSchema,
  // cross-ticker
  avgCorrelationBetweenTickers: z.number().nullable(),
  // coverage
  recordsWithVolume: countSchema,
  coveragePercentage: shareSchema,
});

export type FinanceSnapshot = z.infer<typeof financeSnapshotSchema>;
