import {
  availabilityRequestSchema,
  SchedulingError,
  type AvailabilityRequestPayload
} from "@slot-advisor/shared";
import type { AvailabilityRequest, Preferences } from "./types";

export function parseAvailabilityPayload(input: unknown): AvailabilityRequestPayload {
  const parsed = availabilityRequestSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    throw new SchedulingError("InvalidRequest", `Invalid structured availability: ${detail}`);
  }
  return parsed.data;
}

export function toAvailabilityRequest(payload: AvailabilityRequestPayload): AvailabilityRequest {
  const preferences: Preferences | undefined = payload.preferences
    ? {
        ...(payload.preferences.days ? { days: payload.preferences.days } : {}),
        ...(payload.preferences.times ? { times: payload.preferences.times } : {})
      }
    : undefined;

  return {
    providerId: payload.provider_id,
    timezone: payload.timezone,
    businessHours: payload.business_hours,
    dateRange: payload.date_range,
    existingAppointments: payload.existing_appointments,
    ...(payload.slot_length_minutes !== undefined ? { slotLengthMinutes: payload.slot_length_minutes } : {}),
    ...(payload.buffer_minutes !== undefined ? { bufferMinutes: payload.buffer_minutes } : {}),
    ...(preferences ? { preferences } : {})
  };
}

export function toAvailabilityPayload(request: AvailabilityRequest): AvailabilityRequestPayload {
  return {
    provider_id: request.providerId,
    timezone: request.timezone,
    business_hours: request.businessHours,
    date_range: request.dateRange,
    existing_appointments: request.existingAppointments,
    ...(request.slotLengthMinutes !== undefined ? { slot_length_minutes: request.slotLengthMinutes } : {}),
    ...(request.bufferMinutes !== undefined ? { buffer_minutes: request.bufferMinutes } : {}),
    ...(request.preferences ? { preferences: request.preferences } : {})
  };
}
