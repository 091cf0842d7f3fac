import {
  createLogger,
  DEFAULT_EXPLANATION_TIMEOUT_MS,
  SchedulingError,
  suggestRequestSchema,
  type AvailabilityRequestPayload,
  type Logger,
  type ReasonCode,
  type SuggestedSlotPayload,
  type SuggestResponsePayload
} from "@slot-advisor/shared";
import { DateTime } from "luxon";
import { computeSlots, DEFAULT_ENGINE_CONFIG } from "../availability/engine";
import { parseAvailabilityPayload, toAvailabilityPayload, toAvailabilityRequest } from "../availability/request";
import type { AvailabilityRequest, EngineConfig, Slot } from "../availability/types";
import type { AvailabilityParser, SlotExplainer } from "./ports";

export type SchedulingServiceOptions = {
  engineConfig?: EngineConfig;
  parser?: AvailabilityParser;
  explainer?: SlotExplainer;
  explanationTimeoutMs?: number;
  logger?: Logger;
};

export type SuggestInput = {
  availabilityText?: string;
  structuredAvailability?: unknown;
};

const NO_CAPACITY_REASONS: ReasonCode[] = ["NO_CAPACITY_IN_WINDOW", "SUGGEST_EXPAND_DATE_RANGE"];

async function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function toLocalIso(instant: Date, zone: string): string {
  return DateTime.fromJSDate(instant, { zone }).toISO() ?? instant.toISOString();
}

export class SchedulingService {
  private readonly engineConfig: EngineConfig;
  private readonly explanationTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: SchedulingServiceOptions = {}) {
    this.engineConfig = options.engineConfig ?? DEFAULT_ENGINE_CONFIG;
    this.explanationTimeoutMs = options.explanationTimeoutMs ?? DEFAULT_EXPLANATION_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("scheduling-service");
  }

  async suggest(input: SuggestInput): Promise<SuggestResponsePayload> {
    const payload = await this.resolveAvailability(input);
    const request = toAvailabilityRequest(payload);

    const slots = computeSlots(request, this.engineConfig);
    this.logger.info("computed slots", { providerId: request.providerId, count: slots.length });

    const explanations = await this.explainSlots(slots, request);

    return {
      slots: slots.map((slot, i) => this.toSuggestedSlot(slot, request.timezone, explanations[i] ?? null)),
      reason_codes: slots.length ? [] : [...NO_CAPACITY_REASONS],
      raw_availability_used: toAvailabilityPayload(request)
    };
  }

  /** Entry point for a wire body: `{ availability_text?, structured_availability? }`. */
  async suggestFromBody(body: unknown): Promise<SuggestResponsePayload> {
    const parsed = suggestRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new SchedulingError("InvalidRequest", parsed.error.issues.map((issue) => issue.message).join("; "));
    }

    const { availability_text, structured_availability } = parsed.data;
    return this.suggest({
      ...(availability_text !== undefined ? { availabilityText: availability_text } : {}),
      ...(structured_availability !== undefined ? { structuredAvailability: structured_availability } : {})
    });
  }

  private async resolveAvailability(input: SuggestInput): Promise<AvailabilityRequestPayload> {
    if (input.structuredAvailability !== undefined) {
      return parseAvailabilityPayload(input.structuredAvailability);
    }

    const text = input.availabilityText?.trim();
    if (!text) {
      throw new SchedulingError("InvalidRequest", "Either availability_text or structured_availability is required");
    }
    if (!this.options.parser) {
      throw new SchedulingError("InvalidRequest", "Free-text availability is not supported without a parser");
    }

    return parseAvailabilityPayload(await this.options.parser.parseAvailability(text));
  }

  private async explainSlots(slots: Slot[], request: AvailabilityRequest): Promise<Array<string | null>> {
    const explainer = this.options.explainer;
    if (!explainer || slots.length === 0) return slots.map(() => null);

    const results = await Promise.allSettled(
      slots.map((slot, i) =>
        withTimeout(explainer.explainSlot(slot, { request, position: i + 1, total: slots.length }), this.explanationTimeoutMs)
      )
    );

    return results.map((result, i) => {
      if (result.status === "fulfilled") return result.value;
      this.logger.warn("slot explanation unavailable", {
        providerId: request.providerId,
        position: i + 1,
        error: result.reason instanceof Error ? result.reason.message : String(result.reason)
      });
      return null;
    });
  }

  private toSuggestedSlot(slot: Slot, zone: string, explanation: string | null): SuggestedSlotPayload {
    return {
      provider_id: slot.providerId,
      start_at: toLocalIso(slot.start, zone),
      end_at: toLocalIso(slot.end, zone),
      explanation
    };
  }
}
