import type { AvailabilityRequestInput } from "@slot-advisor/shared";
import type { AvailabilityRequest, Slot } from "../availability/types";

/** Turns free text into structured availability, or rejects. */
export interface AvailabilityParser {
  parseAvailability(text: string): Promise<AvailabilityRequestInput>;
}

export type SlotExplanationContext = {
  request: AvailabilityRequest;
  /** 1-based position in the returned list. */
  position: number;
  total: number;
};

export interface SlotExplainer {
  explainSlot(slot: Slot, context: SlotExplanationContext): Promise<string>;
}
