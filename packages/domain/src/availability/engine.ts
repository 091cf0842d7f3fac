import { blockedIntervals, filterConflicts } from "./conflicts";
import { normalizeRequest } from "./normalize";
import { rankWindows } from "./ranking";
import { MAX_SLOTS, selectTopSlots } from "./selection";
import type { AvailabilityRequest, EngineConfig, Slot } from "./types";
import { generateWindows } from "./windows";

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  slotLengthMinutes: 30,
  bufferMinutes: 10,
  maxSlots: MAX_SLOTS
};

export function computeSlots(request: AvailabilityRequest, config: EngineConfig = DEFAULT_ENGINE_CONFIG): Slot[] {
  const normalized = normalizeRequest(request, config);
  const blocked = blockedIntervals(normalized.appointments, normalized.bufferMs);

  const candidates = generateWindows(normalized.providerId, normalized.days, normalized.slotLengthMs, blocked);
  const ranked = rankWindows(filterConflicts(candidates, blocked), normalized.zone, normalized.preferences);

  return selectTopSlots(ranked, config.maxSlots);
}
