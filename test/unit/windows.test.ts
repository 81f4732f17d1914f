import { describe, it, expect } from "vitest";
import { activityWindows, isValidTime, monthKey, startOfYear } from "../../src/toolkit/windows.js";

const DAY_MS = 86_400_000;
const now = new Date(Date.UTC(2025, 5, 1));

describe("activityWindows", () => {
  it("counts items relative to now and to the first item", () => {
    const t = now.getTime();
    const w = activityWindows([t - 200 * DAY_MS, t - 150 * DAY_MS, t - 10 * DAY_MS, t - 60 * DAY_MS], now);
    expect(w).toEqual({
      firstDate: "2024-11-13",
      lastMonth: 1,
      last3Months: 2,
      first3Months: 2,
      growthRate: 0,
    });
  });

  it("handles very large inputs", () => {
    const t = now.getTime();
    const timestamps = Array.from({ length: 200_000 }, (_, i) => t - (i % 365) * DAY_MS);
    const w = activityWindows(timestamps, now);
    expect(w.firstDate).toBe("2024-06-02");
    expect(w.lastMonth).toBe(16_988);
  });

  it("ignores timestamps a date cannot hold", () => {
    const t = now.getTime();
    expect(activityWindows([1e16, t], now).firstDate).toBe("2025-06-01");
    expect(activityWindows([1e16], now).firstDate).toBeNull();
  });
});

describe("monthKey", () => {
  it("formats a UTC month and rejects out-of-range values", () => {
    expect(monthKey(Date.UTC(2025, 0, 31, 23, 59))).toBe("2025-01");
    expect(monthKey(1e16)).toBeNull();
    expect(isValidTime(Number.NaN)).toBe(false);
  });
});

describe("startOfYear", () => {
  it("keeps two-digit years literal", () => {
    expect(startOfYear(45).toISOString()).toBe("0045-01-01T00:00:00.000Z");
    expect(startOfYear(2020).toISOString()).toBe("2020-01-01T00:00:00.000Z");
  });
});
