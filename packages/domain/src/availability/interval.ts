import type { TimeInterval } from "./types";

export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && b.start < a.end;
}

export function expandInterval(interval: TimeInterval, byMs: number): TimeInterval {
  return {
    start: new Date(interval.start.getTime() - byMs),
    end: new Date(interval.end.getTime() + byMs)
  };
}

/** Sorts and coalesces overlapping or touching intervals. */
export function mergeIntervals(intervals: TimeInterval[]): TimeInterval[] {
  const sorted = [...intervals].sort((a, b) => a.start.getTime() - b.start.getTime());
  const result: TimeInterval[] = [];

  for (const next of sorted) {
    const last = result[result.length - 1];
    if (last && next.start <= last.end) {
      if (next.end > last.end) last.end = next.end;
    } else {
      result.push({ ...next });
    }
  }

  return result;
}

export function subtractIntervals(base: TimeInterval[], busy: TimeInterval[]): TimeInterval[] {
  if (busy.length === 0) return base;
  const sortedBusy = [...busy].sort((a, b) => a.start.getTime() - b.start.getTime());
  const result: TimeInterval[] = [];

  for (const segment of base) {
    let cursor = segment.start;
    for (const b of sortedBusy) {
      if (!overlaps(segment, b)) continue;
      if (b.start > cursor) {
        result.push({ start: cursor, end: b.start });
      }
      if (b.end > cursor) cursor = b.end;
      if (cursor >= segment.end) break;
    }
    if (cursor < segment.end) {
      result.push({ start: cursor, end: segment.end });
    }
  }

  return result.filter((x) => x.end > x.start);
}
