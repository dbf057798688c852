/**
 * Timezone-Aware Date Utilities
 *
 * Agency listings publish UK calendar dates, so everything here works in
 * Europe/London and emits plain YYYY-MM-DD strings for storage.
 */
import moment from "moment-timezone";

const TIMEZONE = "Europe/London";
const ISO_DATE = "YYYY-MM-DD";

/** Get current time in London */
export function nowLondon(): moment.Moment {
  return moment().tz(TIMEZONE);
}

/** Today's date (London) as YYYY-MM-DD */
export function todayIso(): string {
  return nowLondon().format(ISO_DATE);
}

/** The date n days before `from` (YYYY-MM-DD) */
export function daysBefore(from: string, days: number): string {
  return moment.tz(from, ISO_DATE, true, TIMEZONE).subtract(days, "days").format(ISO_DATE);
}

/**
 * Parse a listing date by trying each format in order (strict).
 * The first format that matches wins; anything unparsable gives null.
 */
export function parseAgencyDate(
  text: string | null | undefined,
  formats: readonly string[]
): string | null {
  if (!text) return null;
  const trimmed = text.trim();
  if (trimmed === "" || trimmed === "-") return null;

  for (const format of formats) {
    const parsed = moment.tz(trimmed, format, true, TIMEZONE);
    if (parsed.isValid()) {
      return parsed.format(ISO_DATE);
    }
  }

  return null;
}

/** Whole days between two YYYY-MM-DD dates (absolute) */
export function daysBetween(a: string, b: string): number {
  const first = moment.tz(a, ISO_DATE, true, TIMEZONE);
  const second = moment.tz(b, ISO_DATE, true, TIMEZONE);
  return Math.abs(first.diff(second, "days"));
}

/** True when the string is a real YYYY-MM-DD calendar date */
export function isIsoDate(text: string): boolean {
  return moment(text, ISO_DATE, true).isValid();
}

/** Format an instant on the London wall clock */
export function formatLondon(date: Date, format: string): string {
  return moment(date).tz(TIMEZONE).format(format);
}
