import { describe, expect, it } from "vitest";
import { compareRankingKeys, preferenceTier, rankWindows } from "../src/availability/ranking";
import type { CandidateWindow, NormalizedPreferences, Weekday } from "../src/availability/types";

// 2025-02-03 is a Monday.
const window = (date: string, start: string, end: string): CandidateWindow => ({
  providerId: "p",
  start: new Date(`${date}T${start}:00.000Z`),
  end: new Date(`${date}T${end}:00.000Z`)
});

const mondayMornings: NormalizedPreferences = {
  days: new Set<Weekday>(["monday"]),
  times: [{ startMinute: 9 * 60, endMinute: 12 * 60 }]
};

describe("preference ranking", () => {
  it("assigns tiers by day and time matches", () => {
    expect(preferenceTier(window("2025-02-03", "09:00", "09:30"), "UTC", mondayMornings)).toBe(2);
    expect(preferenceTier(window("2025-02-03", "13:00", "13:30"), "UTC", mondayMornings)).toBe(1);
    expect(preferenceTier(window("2025-02-04", "09:00", "09:30"), "UTC", mondayMornings)).toBe(1);
    expect(preferenceTier(window("2025-02-04", "13:00", "13:30"), "UTC", mondayMornings)).toBe(0);
  });

  it("matches a time window on the slot start, end exclusive", () => {
    expect(preferenceTier(window("2025-02-04", "11:40", "12:10"), "UTC", mondayMornings)).toBe(1);
    expect(preferenceTier(window("2025-02-03", "11:40", "12:10"), "UTC", mondayMornings)).toBe(2);
    expect(preferenceTier(window("2025-02-04", "12:00", "12:30"), "UTC", mondayMornings)).toBe(0);
    expect(preferenceTier(window("2025-02-04", "08:45", "09:15"), "UTC", mondayMornings)).toBe(0);
  });

  it("evaluates weekday and time in the provider zone", () => {
    // 02:00Z Tuesday is 21:00 Monday in New York.
    const late = window("2025-02-04", "02:00", "02:30");
    const evenings: NormalizedPreferences = { days: new Set<Weekday>(["monday"]), times: [{ startMinute: 20 * 60, endMinute: 22 * 60 }] };
    expect(preferenceTier(late, "America/New_York", evenings)).toBe(2);
    expect(preferenceTier(late, "UTC", evenings)).toBe(0);
  });

  it("orders by tier, then by earliest start", () => {
    const ranked = rankWindows(
      [
        window("2025-02-04", "13:00", "13:30"),
        window("2025-02-03", "13:00", "13:30"),
        window("2025-02-04", "09:00", "09:30"),
        window("2025-02-03", "09:00", "09:30")
      ],
      "UTC",
      mondayMornings
    );

    expect(ranked.map((s) => [s.start.toISOString(), s.tier])).toEqual([
      ["2025-02-03T09:00:00.000Z", 2],
      ["2025-02-03T13:00:00.000Z", 1],
      ["2025-02-04T09:00:00.000Z", 1],
      ["2025-02-04T13:00:00.000Z", 0]
    ]);
  });

  it("falls back to earliest start without preferences", () => {
    const ranked = rankWindows([window("2025-02-04", "09:00", "09:30"), window("2025-02-03", "15:00", "15:30")], "UTC", null);
    expect(ranked.map((s) => [s.start.toISOString(), s.tier])).toEqual([
      ["2025-02-03T15:00:00.000Z", 0],
      ["2025-02-04T09:00:00.000Z", 0]
    ]);
  });

  it("compares keys lexicographically", () => {
    expect(compareRankingKeys([2, 500], [1, 100])).toBeLessThan(0);
    expect(compareRankingKeys([1, 100], [1, 500])).toBeLessThan(0);
    expect(compareRankingKeys([1, 100], [1, 100])).toBe(0);
  });
});
