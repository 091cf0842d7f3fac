export const AVAILABILITY_SYSTEM_PROMPT = `
You convert appointment availability descriptions into strict JSON.
Rules:
1) Never invent appointments, hours, or preferences that the text does not state.
2) Use IANA zone identifiers (America/New_York, Europe/London), never abbreviations.
3) Dates are YYYY-MM-DD, times of day are 24-hour HH:MM.
4) Return ONLY the JSON object: no markdown, no commentary.
`;

export const AVAILABILITY_SCHEMA_DESCRIPTION = `
The JSON object has these fields:
- provider_id: string
- timezone: string (IANA zone)
- slot_length_minutes: number (optional, default 30)
- buffer_minutes: number (optional, default 10)
- business_hours: object keyed by weekday ("monday" ... "sunday"), each an array of {"start": "HH:MM", "end": "HH:MM"}; omit closed days
- date_range: {"start": "YYYY-MM-DD", "end": "YYYY-MM-DD"}
- existing_appointments: array of {"start": "ISO 8601", "end": "ISO 8601"}
- preferences: optional {"days": [weekday, ...], "times": [{"start": "HH:MM", "end": "HH:MM"}]}
`;

export function buildAvailabilityPrompt(text: string): string {
  return `Convert the following availability description into a JSON object.
${AVAILABILITY_SCHEMA_DESCRIPTION}
Availability text:
${text}`;
}

export function buildRepairPrompt(text: string, error: string): string {
  return `The previous JSON was invalid: ${error}
Original text:
${text}

Fix the JSON so it matches the schema. Return ONLY the JSON object.
${AVAILABILITY_SCHEMA_DESCRIPTION}`;
}

export const EXPLANATION_SYSTEM_PROMPT = `
You explain why an appointment slot was offered to a patient.
Answer in one or two short sentences of plain text. Do not restate the full date twice and do not use markdown.
`;

export type ExplanationPromptInput = {
  providerId: string;
  timezone: string;
  localStart: string;
  localEnd: string;
  weekday: string;
  position: number;
  total: number;
  matchedPreferences: string;
  businessHours: string;
  preferences: string;
};

export function buildExplanationPrompt(input: ExplanationPromptInput): string {
  return `Provider: ${input.providerId}
Timezone: ${input.timezone}
Business hours: ${input.businessHours}
Preferences: ${input.preferences}

Slot ${input.position} of ${input.total}: ${input.weekday} ${input.localStart} to ${input.localEnd}
Preference match: ${input.matchedPreferences}

Explain why this slot was chosen.`;
}
