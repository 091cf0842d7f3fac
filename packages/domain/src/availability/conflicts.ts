import { expandInterval, mergeIntervals, overlaps } from "./interval";
import type { TimeInterval } from "./types";

/**
 * Widens every appointment by the buffer on both sides and merges the result,
 * so a candidate conflicts exactly when it overlaps one of the returned spans.
 */
export function blockedIntervals(appointments: TimeInterval[], bufferMs: number): TimeInterval[] {
  return mergeIntervals(appointments.map((appointment) => expandInterval(appointment, bufferMs)));
}

export function conflictsWithAny(window: TimeInterval, blocked: TimeInterval[]): boolean {
  return blocked.some((span) => overlaps(window, span));
}

export function* filterConflicts<T extends TimeInterval>(windows: Iterable<T>, blocked: TimeInterval[]): Generator<T> {
  for (const window of windows) {
    if (!conflictsWithAny(window, blocked)) yield window;
  }
}
