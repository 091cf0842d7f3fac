import { SchedulingError, WEEKDAYS } from "@slot-advisor/shared";
import { DateTime, IANAZone } from "luxon";
import type {
  AvailabilityRequest,
  BusinessDay,
  BusinessHours,
  EngineConfig,
  LocalTimeRange,
  NormalizedPreferences,
  NormalizedRequest,
  Preferences,
  TimeInterval,
  Weekday
} from "./types";

type MinuteRange = { startMinute: number; endMinute: number };

export function assertTimeZone(zone: string): void {
  if (!IANAZone.isValidZone(zone)) {
    throw new SchedulingError("InvalidTimeZone", `Unknown time zone "${zone}"`);
  }
}

/** Minutes since local midnight for an `HH:MM` value. */
export function parseLocalTime(value: string): number {
  const match = /^(\d{2}):(\d{2})$/.exec(value);
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (!match || hour > 23 || minute > 59) {
    throw new SchedulingError("InvalidInterval", `Invalid local time "${value}"`);
  }
  return hour * 60 + minute;
}

export function toMinuteRange(range: LocalTimeRange): MinuteRange {
  const startMinute = parseLocalTime(range.start);
  const endMinute = parseLocalTime(range.end);
  if (startMinute >= endMinute) {
    throw new SchedulingError("InvalidInterval", `Time range ${range.start}-${range.end} must start before it ends`);
  }
  return { startMinute, endMinute };
}

export function weekdayOf(dt: DateTime): Weekday {
  const weekday = WEEKDAYS[dt.weekday - 1];
  if (weekday === undefined) {
    throw new SchedulingError("InvalidInterval", `Cannot resolve weekday of ${dt.toString()}`);
  }
  return weekday;
}

function normalizeBusinessHours(hours: BusinessHours): Map<Weekday, MinuteRange[]> {
  const result = new Map<Weekday, MinuteRange[]>();

  for (const weekday of WEEKDAYS) {
    const ranges = (hours[weekday] ?? []).map(toMinuteRange).sort((a, b) => a.startMinute - b.startMinute);
    for (let i = 1; i < ranges.length; i++) {
      const previous = ranges[i - 1];
      const current = ranges[i];
      if (previous && current && current.startMinute < previous.endMinute) {
        throw new SchedulingError("InvalidInterval", `Business hours on ${weekday} overlap`);
      }
    }
    result.set(weekday, ranges);
  }

  return result;
}

/**
 * The instant a wall-clock minute names on `day`. A minute inside a spring-forward
 * gap resolves to the transition itself, the first instant of the day past it.
 */
function atLocalMinute(day: DateTime, minuteOfDay: number): Date {
  const hour = Math.floor(minuteOfDay / 60);
  const minute = minuteOfDay % 60;
  const resolved = day.set({ hour, minute, second: 0, millisecond: 0 });
  if (resolved.hour === hour && resolved.minute === minute) return resolved.toJSDate();

  // set() pushed the time forward by the gap length; walk back to where the new offset begins.
  let transition = resolved;
  while (transition.minus({ minutes: 1 }).offset === resolved.offset) {
    transition = transition.minus({ minutes: 1 });
  }
  return transition.toJSDate();
}

function parseCalendarDate(value: string, zone: string): DateTime {
  const dt = DateTime.fromISO(value, { zone });
  if (!dt.isValid) {
    throw new SchedulingError("InvalidInterval", `Invalid date "${value}"`);
  }
  return dt.startOf("day");
}

export function materializeDays(
  dateRange: AvailabilityRequest["dateRange"],
  zone: string,
  hours: BusinessHours
): BusinessDay[] {
  const weeklyHours = normalizeBusinessHours(hours);
  const firstDay = parseCalendarDate(dateRange.start, zone);
  const lastDay = parseCalendarDate(dateRange.end, zone);
  if (firstDay > lastDay) {
    throw new SchedulingError("InvalidInterval", `Date range ${dateRange.start}..${dateRange.end} ends before it starts`);
  }

  const days: BusinessDay[] = [];
  let cursor = firstDay;
  while (cursor <= lastDay) {
    const weekday = weekdayOf(cursor);
    days.push({
      date: cursor.toISODate() ?? cursor.toString(),
      weekday,
      intervals: (weeklyHours.get(weekday) ?? [])
        .map((range) => ({
          start: atLocalMinute(cursor, range.startMinute),
          end: atLocalMinute(cursor, range.endMinute)
        }))
        .filter((interval) => interval.start < interval.end)
    });
    cursor = cursor.plus({ days: 1 });
  }

  return days;
}

/** Instants with an offset are absolute; offset-less values are wall-clock time in `zone`. */
export function toInstantInterval(appointment: { start: string; end: string }, zone: string): TimeInterval {
  const start = DateTime.fromISO(appointment.start, { zone });
  const end = DateTime.fromISO(appointment.end, { zone });
  if (!start.isValid || !end.isValid) {
    throw new SchedulingError(
      "InvalidInterval",
      `Unparseable appointment ${appointment.start}..${appointment.end}`
    );
  }
  if (start >= end) {
    throw new SchedulingError("InvalidInterval", `Appointment ${appointment.start}..${appointment.end} must start before it ends`);
  }
  return { start: start.toJSDate(), end: end.toJSDate() };
}

function normalizePreferences(preferences: Preferences | undefined): NormalizedPreferences | null {
  if (!preferences) return null;
  const days = new Set(preferences.days ?? []);
  const times = (preferences.times ?? []).map(toMinuteRange);
  if (days.size === 0 && times.length === 0) return null;
  return { days, times };
}

function resolveDuration(value: number | undefined, fallback: number, allowZero: boolean, label: string): number {
  const minutes = value ?? fallback;
  const valid = Number.isFinite(minutes) && (allowZero ? minutes >= 0 : minutes > 0);
  if (!valid) {
    throw new SchedulingError(
      "InvalidDuration",
      `${label} must be a finite ${allowZero ? "non-negative" : "positive"} number of minutes, got ${minutes}`
    );
  }
  return minutes;
}

export function normalizeRequest(request: AvailabilityRequest, config: EngineConfig): NormalizedRequest {
  assertTimeZone(request.timezone);
  const zone = request.timezone;

  const slotLengthMinutes = resolveDuration(request.slotLengthMinutes, config.slotLengthMinutes, false, "Slot length");
  const bufferMinutes = resolveDuration(request.bufferMinutes, config.bufferMinutes, true, "Buffer");

  return {
    providerId: request.providerId,
    zone,
    slotLengthMs: slotLengthMinutes * 60_000,
    bufferMs: bufferMinutes * 60_000,
    days: materializeDays(request.dateRange, zone, request.businessHours),
    appointments: request.existingAppointments.map((appointment) => toInstantInterval(appointment, zone)),
    preferences: normalizePreferences(request.preferences)
  };
}
