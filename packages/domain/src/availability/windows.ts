import { subtractIntervals } from "./interval";
import type { BusinessDay, CandidateWindow, TimeInterval } from "./types";

/**
 * Lazily walks each business interval in slot-length steps. Steps are
 * contiguous; when a blocked span cuts the interval the grid restarts at the
 * span's end rather than at the next multiple of the slot length.
 */
export function* generateWindows(
  providerId: string,
  days: BusinessDay[],
  slotLengthMs: number,
  blocked: TimeInterval[] = []
): Generator<CandidateWindow> {
  for (const day of days) {
    for (const interval of day.intervals) {
      for (const free of subtractIntervals([interval], blocked)) {
        let cursor = free.start.getTime();
        while (cursor + slotLengthMs <= free.end.getTime()) {
          yield { providerId, start: new Date(cursor), end: new Date(cursor + slotLengthMs) };
          cursor += slotLengthMs;
        }
      }
    }
  }
}
