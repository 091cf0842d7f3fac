export type SchedulingErrorCode = "InvalidTimeZone" | "InvalidInterval" | "InvalidDuration" | "InvalidRequest";

export class SchedulingError extends Error {
  constructor(
    readonly code: SchedulingErrorCode,
    message: string
  ) {
    super(message);
    this.name = "SchedulingError";
  }
}

