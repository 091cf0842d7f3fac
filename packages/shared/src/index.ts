import { z } from "zod";
export * from "./config";
export * from "./errors";
export * from "./logger";

export const weekdayEnum = z.enum([
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday"
]);

export type Weekday = z.infer<typeof weekdayEnum>;

export const WEEKDAYS: readonly Weekday[] = weekdayEnum.options;

export const localTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");
export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const timeRangeSchema = z.object({
  start: localTimeSchema,
  end: localTimeSchema
});

export const businessHoursSchema = z.record(weekdayEnum, z.array(timeRangeSchema));

export const dateRangeSchema = z.object({
  start: isoDateSchema,
  end: isoDateSchema
});

// Offset-less values are read in the provider's zone, so only presence is checked here.
export const existingAppointmentSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1)
});

export const preferencesSchema = z.object({
  days: z.array(weekdayEnum).optional(),
  times: z.array(timeRangeSchema).optional()
});

export const availabilityRequestSchema = z.object({
  provider_id: z.string().min(1),
  timezone: z.string().min(1),
  slot_length_minutes: z.number().optional(),
  buffer_minutes: z.number().optional(),
  business_hours: businessHoursSchema,
  date_range: dateRangeSchema,
  existing_appointments: z.array(existingAppointmentSchema).default([]),
  preferences: preferencesSchema.optional()
});

export type TimeRangeInput = z.infer<typeof timeRangeSchema>;
export type AvailabilityRequestInput = z.input<typeof availabilityRequestSchema>;
export type AvailabilityRequestPayload = z.infer<typeof availabilityRequestSchema>;

export const suggestRequestSchema = z
  .object({
    availability_text: z.string().optional(),
    structured_availability: availabilityRequestSchema.optional()
  })
  .refine((body) => Boolean(body.availability_text?.trim()) || body.structured_availability !== undefined, {
    message: "Either availability_text or structured_availability is required"
  });

export type SuggestRequestPayload = z.infer<typeof suggestRequestSchema>;

export const suggestedSlotSchema = z.object({
  provider_id: z.string(),
  start_at: z.string().datetime({ offset: true }),
  end_at: z.string().datetime({ offset: true }),
  explanation: z.string().nullable()
});

export const reasonCodeEnum = z.enum(["NO_CAPACITY_IN_WINDOW", "SUGGEST_EXPAND_DATE_RANGE"]);

export const suggestResponseSchema = z.object({
  slots: z.array(suggestedSlotSchema).max(5),
  reason_codes: z.array(reasonCodeEnum),
  raw_availability_used: availabilityRequestSchema
});

export type SuggestedSlotPayload = z.infer<typeof suggestedSlotSchema>;
export type ReasonCode = z.infer<typeof reasonCodeEnum>;
export type SuggestResponsePayload = z.infer<typeof suggestResponseSchema>;
