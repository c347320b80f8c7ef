import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";

dayjs.extend(customParseFormat);

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ]([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d)(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/** Non-ISO layouts accepted from spreadsheet exports, parsed strictly. */
export const TIMESTAMP_FORMATS: readonly string[] = [
  "YYYY/MM/DD HH:mm:ss",
  "YYYY/MM/DD HH:mm",
  "YYYY/MM/DD",
  "MM/DD/YYYY HH:mm:ss",
  "MM/DD/YYYY HH:mm",
  "MM/DD/YYYY",
];

export function isValidDate(date: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(date) && dayjs(date, "YYYY-MM-DD", true).isValid();
}

/**
 * Truncate a timestamp to its calendar day. ISO timestamps keep the day as
 * written, whatever their UTC offset; other input must match one of
 * TIMESTAMP_FORMATS. Returns null otherwise.
 */
export function toEventDate(timestamp: string): string | null {
  const trimmed = timestamp.trim();
  if (!trimmed) return null;

  const iso = ISO_TIMESTAMP.exec(trimmed);
  if (iso) {
    return isValidDate(iso[1]) ? iso[1] : null;
  }

  const parsed = dayjs(trimmed, [...TIMESTAMP_FORMATS], true);
  return parsed.isValid() ? parsed.format("YYYY-MM-DD") : null;
}

export function isWithinRange(date: string, startDate: string, endDate: string): boolean {
  return date >= startDate && date <= endDate;
}

export function today(): string {
  return dayjs().format("YYYY-MM-DD");
}

export function now(): string {
  return dayjs().toISOString();
}
