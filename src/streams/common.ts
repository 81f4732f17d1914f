import { z } from "zod";

/** Nullable field that may also be left out of the input. */
export function maybe<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullable().default(null);
}

export const trendLabelSchema = z.enum([
  "increasing",
  "decreasing",
  "stable",
  "peak_reached",
  "insufficient_data",
]);

export const halvesTrendSchema = z.enum(["increasing", "decreasing", "stable", "insufficient_data"]);

export const rankedEntrySchema = z.tuple([z.string(), z.number()]);

export const velocitySchema = z.record(z.string(), z.number().int().nonnegative());

export const countSchema = z.number().int().nonnegative();

export const shareSchema = z.number().min(0).max(100);

export const hhiSchema = z.number().min(0).max(1);

/** Calendar year a Date can represent as "YYYY". */
export const yearSchema = z.number().int().min(0).max(9999);

/** Unix seconds within the Date range. */
export const epochSecondsSchema = z.number().finite().min(-8.64e12).max(8.64e12);

/** Schema whose parsed output is T, whatever it accepts on input. */
export type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function nonBlank(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}
