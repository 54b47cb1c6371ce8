import { Timestamp } from "firebase-admin/firestore";

function hasToDate(value: unknown): value is { toDate: () => Date | null } {
  return typeof value === "object"
    && value !== null
    && typeof (value as { toDate?: () => Date | null }).toDate === "function";
}

export function toDate(input: unknown): Date | null {
  if (!input) return null;
  if (input instanceof Date) return Number.isNaN(input.getTime()) ? null : input;
  if (input instanceof Timestamp) return input.toDate();
  if (typeof input === "number") {
    return Number.isFinite(input) ? new Date(input) : null;
  }
  if (typeof input === "string") {
    const parsed = Date.parse(input);
    return Number.isNaN(parsed) ? null : new Date(parsed);
  }
  if (hasToDate(input)) {
    try {
      const result = input.toDate();
      return result instanceof Date ? result : null;
    }
    catch {
      return null;
    }
  }
  return null;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit"
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Local wall-clock time of `instant` in `timeZone`, carried in a Date whose
 * UTC fields equal the local fields. Telemetry last_seen values live in the
 * same frame once the provider offset has been applied.
 */
export function wallClock(instant: Date, timeZone: string): Date {
  const parts: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== "literal") parts[part.type] = Number(part.value);
  }
  return new Date(Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
    instant.getUTCMilliseconds()
  ));
}

export function epochSecondsToWallClock(seconds: number, offsetHours: number): Date {
  return new Date(seconds * 1000 - offsetHours * 3_600_000);
}

export function elapsedWholeMinutes(start: Date, end: Date): number {
  return Math.max(0, Math.floor((end.getTime() - start.getTime()) / 60_000));
}
