import { DateTime } from "luxon";
import { weekdayOf } from "./normalize";
import type { CandidateWindow, NormalizedPreferences, PreferenceTier, Slot } from "./types";

export type RankingKey = readonly [tier: PreferenceTier, startMs: number];

export function preferenceTier(
  window: CandidateWindow,
  zone: string,
  preferences: NormalizedPreferences | null
): PreferenceTier {
  if (!preferences) return 0;

  const local = DateTime.fromJSDate(window.start, { zone });
  const startMinute = local.hour * 60 + local.minute;

  const dayMatch = preferences.days.has(weekdayOf(local));
  // A slot is in a preferred window when it starts there: [start, end).
  const timeMatch = preferences.times.some((range) => startMinute >= range.startMinute && startMinute < range.endMinute);

  if (dayMatch && timeMatch) return 2;
  if (dayMatch || timeMatch) return 1;
  return 0;
}

export function rankingKey(slot: Slot): RankingKey {
  return [slot.tier, slot.start.getTime()];
}

/** Higher tier first, then earlier start. */
export function compareRankingKeys(a: RankingKey, b: RankingKey): number {
  return b[0] - a[0] || a[1] - b[1];
}

export function rankWindows(
  windows: Iterable<CandidateWindow>,
  zone: string,
  preferences: NormalizedPreferences | null
): Slot[] {
  const slots: Slot[] = [];
  for (const window of windows) {
    slots.push({ ...window, tier: preferenceTier(window, zone, preferences) });
  }
  return slots.sort((a, b) => compareRankingKeys(rankingKey(a), rankingKey(b)));
}
