import type { Weekday } from "@slot-advisor/shared";

export type { Weekday };

export type TimeInterval = {
  start: Date;
  end: Date;
};

/** Wall-clock range within a day, `HH:MM` on both ends. */
export type LocalTimeRange = {
  start: string;
  end: string;
};

export type BusinessHours = Partial<Record<Weekday, LocalTimeRange[]>>;

export type Preferences = {
  days?: Weekday[];
  times?: LocalTimeRange[];
};

export type AvailabilityRequest = {
  providerId: string;
  timezone: string;
  businessHours: BusinessHours;
  dateRange: { start: string; end: string };
  slotLengthMinutes?: number;
  bufferMinutes?: number;
  existingAppointments: Array<{ start: string; end: string }>;
  preferences?: Preferences;
};

/** Defaults applied when a request leaves slot length or buffer unset. */
export type EngineConfig = {
  slotLengthMinutes: number;
  bufferMinutes: number;
  maxSlots: number;
};

export type BusinessDay = {
  date: string;
  weekday: Weekday;
  intervals: TimeInterval[];
};

export type NormalizedPreferences = {
  days: ReadonlySet<Weekday>;
  /** Minute-of-day ranges, end exclusive. */
  times: Array<{ startMinute: number; endMinute: number }>;
};

export type NormalizedRequest = {
  providerId: string;
  zone: string;
  slotLengthMs: number;
  bufferMs: number;
  days: BusinessDay[];
  appointments: TimeInterval[];
  preferences: NormalizedPreferences | null;
};

export type CandidateWindow = TimeInterval & {
  providerId: string;
};

export type PreferenceTier = 0 | 1 | 2;

export type Slot = {
  providerId: string;
  start: Date;
  end: Date;
  tier: PreferenceTier;
};
