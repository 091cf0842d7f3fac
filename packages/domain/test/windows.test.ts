import { describe, expect, it } from "vitest";
import type { BusinessDay } from "../src/availability/types";
import { generateWindows } from "../src/availability/windows";

const at = (hhmm: string, date = "2025-02-03") => new Date(`${date}T${hhmm}:00.000Z`);
const HALF_HOUR = 30 * 60_000;

function day(...intervals: Array<[string, string]>): BusinessDay {
  return {
    date: "2025-02-03",
    weekday: "monday",
    intervals: intervals.map(([start, end]) => ({ start: at(start), end: at(end) }))
  };
}

const starts = (windows: Iterable<{ start: Date }>) => [...windows].map((w) => w.start.toISOString().slice(11, 16));

describe("generateWindows", () => {
  it("steps contiguously by slot length", () => {
    expect(starts(generateWindows("p", [day(["09:00", "11:00"])], HALF_HOUR))).toEqual(["09:00", "09:30", "10:00", "10:30"]);
  });

  it("emits exactly one window when the interval is one slot wide", () => {
    const windows = [...generateWindows("p", [day(["09:00", "09:30"])], HALF_HOUR)];
    expect(windows).toEqual([{ providerId: "p", start: at("09:00"), end: at("09:30") }]);
  });

  it("drops a trailing remainder shorter than a slot", () => {
    expect(starts(generateWindows("p", [day(["09:00", "10:10"])], HALF_HOUR))).toEqual(["09:00", "09:30"]);
  });

  it("walks every interval of every day in order", () => {
    const days: BusinessDay[] = [
      day(["09:00", "10:00"], ["13:00", "13:30"]),
      { date: "2025-02-04", weekday: "tuesday", intervals: [] },
      {
        date: "2025-02-05",
        weekday: "wednesday",
        intervals: [{ start: at("08:00", "2025-02-05"), end: at("08:30", "2025-02-05") }]
      }
    ];
    const windows = [...generateWindows("p", days, HALF_HOUR)];
    expect(windows.map((w) => w.start.toISOString())).toEqual([
      "2025-02-03T09:00:00.000Z",
      "2025-02-03T09:30:00.000Z",
      "2025-02-03T13:00:00.000Z",
      "2025-02-05T08:00:00.000Z"
    ]);
  });

  it("restarts the grid where a blocked span ends", () => {
    const blocked = [{ start: at("09:50"), end: at("10:40") }];
    expect(starts(generateWindows("p", [day(["09:00", "12:00"])], HALF_HOUR, blocked))).toEqual(["09:00", "10:40", "11:10"]);
  });

  it("is lazy and restartable", () => {
    const days = [day(["09:00", "17:00"])];
    const first = generateWindows("p", days, HALF_HOUR);
    expect(first.next().value?.start).toEqual(at("09:00"));
    expect(first.next().value?.start).toEqual(at("09:30"));

    const again = generateWindows("p", days, HALF_HOUR);
    expect(again.next().value?.start).toEqual(at("09:00"));
  });
});
