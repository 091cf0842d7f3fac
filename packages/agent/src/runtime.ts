import {
  parseAvailabilityPayload,
  weekdayOf,
  type AvailabilityParser,
  type AvailabilityRequest,
  type Slot,
  type SlotExplainer,
  type SlotExplanationContext
} from "@slot-advisor/domain";
import { createLogger, type AvailabilityRequestPayload, type Logger } from "@slot-advisor/shared";
import { DateTime } from "luxon";
import OpenAI from "openai";
import { AgentError } from "./errors";
import { extractJson } from "./json";
import {
  AVAILABILITY_SYSTEM_PROMPT,
  buildAvailabilityPrompt,
  buildExplanationPrompt,
  buildRepairPrompt,
  EXPLANATION_SYSTEM_PROMPT
} from "./prompt/prompts";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type CompletionFn = (messages: ChatMessage[]) => Promise<string>;

export type AgentRuntimeOptions = {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  /** Replaces the OpenAI call, e.g. with a fake in tests. */
  complete?: CompletionFn;
  logger?: Logger;
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodeAvailability(raw: string): AvailabilityRequestPayload {
  return parseAvailabilityPayload(JSON.parse(extractJson(raw)));
}

export function describeBusinessHours(request: AvailabilityRequest): string {
  const days = Object.entries(request.businessHours)
    .filter(([, ranges]) => ranges && ranges.length > 0)
    .map(([day, ranges]) => `${day} ${(ranges ?? []).map((r) => `${r.start}-${r.end}`).join(", ")}`);
  return days.length ? days.join("; ") : "none";
}

export function describePreferences(request: AvailabilityRequest): string {
  const parts: string[] = [];
  if (request.preferences?.days?.length) parts.push(`days: ${request.preferences.days.join(", ")}`);
  if (request.preferences?.times?.length) {
    parts.push(`times: ${request.preferences.times.map((r) => `${r.start}-${r.end}`).join(", ")}`);
  }
  return parts.length ? parts.join("; ") : "none";
}

function describeTier(slot: Slot, request: AvailabilityRequest): string {
  if (slot.tier === 2) return "matches a preferred day and a preferred time";
  if (slot.tier === 1) return "matches a preferred day or a preferred time, not both";
  return request.preferences ? "matches no preference; earliest remaining opening" : "no preferences given; earliest opening";
}

export class AgentRuntime implements AvailabilityParser, SlotExplainer {
  private readonly client: OpenAI | null;
  private readonly model: string;
  private readonly complete: CompletionFn;
  private readonly logger: Logger;

  constructor(options: AgentRuntimeOptions = {}) {
    this.client = options.apiKey
      ? new OpenAI({ apiKey: options.apiKey, ...(options.baseUrl ? { baseURL: options.baseUrl } : {}) })
      : null;
    this.model = options.model ?? "gpt-4o-mini";
    this.complete = options.complete ?? ((messages) => this.respond(messages));
    this.logger = options.logger ?? createLogger("agent-runtime");
  }

  private async respond(messages: ChatMessage[]): Promise<string> {
    if (!this.client) throw new AgentError("MissingApiKey", "OPENAI_API_KEY is required");

    const response = await this.client.responses.create({
      model: this.model,
      input: messages,
      temperature: 0.1
    });

    return response.output_text;
  }

  async parseAvailability(text: string): Promise<AvailabilityRequestPayload> {
    const messages: ChatMessage[] = [
      { role: "system", content: AVAILABILITY_SYSTEM_PROMPT },
      { role: "user", content: buildAvailabilityPrompt(text) }
    ];

    const first = await this.complete(messages);
    try {
      return decodeAvailability(first);
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn("availability JSON rejected, retrying with repair prompt", { reason });

      messages.push({ role: "assistant", content: first }, { role: "user", content: buildRepairPrompt(text, reason) });
      const second = await this.complete(messages);
      try {
        return decodeAvailability(second);
      } catch (retryError) {
        throw new AgentError("AvailabilityParseFailed", `Could not parse availability: ${describeError(retryError)}`, {
          cause: retryError
        });
      }
    }
  }

  async explainSlot(slot: Slot, context: SlotExplanationContext): Promise<string> {
    const { request } = context;
    const localStart = DateTime.fromJSDate(slot.start, { zone: request.timezone });
    const localEnd = DateTime.fromJSDate(slot.end, { zone: request.timezone });

    const prompt = buildExplanationPrompt({
      providerId: slot.providerId,
      timezone: request.timezone,
      localStart: localStart.toFormat("yyyy-LL-dd HH:mm"),
      localEnd: localEnd.toFormat("HH:mm"),
      weekday: weekdayOf(localStart),
      position: context.position,
      total: context.total,
      matchedPreferences: describeTier(slot, request),
      businessHours: describeBusinessHours(request),
      preferences: describePreferences(request)
    });

    const text = (
      await this.complete([
        { role: "system", content: EXPLANATION_SYSTEM_PROMPT },
        { role: "user", content: prompt }
      ])
    ).trim();

    if (!text) throw new AgentError("EmptyExplanation", `Empty explanation for slot ${context.position}`);
    return text;
  }
}
