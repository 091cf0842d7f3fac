import type { Slot } from "./types";

export const MAX_SLOTS = 5;

/** An empty list is the expected answer for a fully booked range. */
export function selectTopSlots(ranked: Slot[], limit = MAX_SLOTS): Slot[] {
  return ranked.slice(0, Math.max(0, limit));
}
