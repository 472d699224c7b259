const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Reduce a date-like value to `YYYY-MM-DD`.
 * Date objects use their local calendar day (pg returns `timestamp` columns in local time).
 */
export function toIsoDate(value: string | Date | null | undefined): string | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }

  const match = value.trim().match(ISO_DATE_PREFIX);
  if (!match) return null;
  return `${match[1]}-${match[2]}-${match[3]}`;
}

/** Calendar arithmetic on a `YYYY-MM-DD` string. */
export function addDays(isoDate: string, days: number): string {
  const [year, month, day] = isoDate.split("-").map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

/** Inclusive day count between two `YYYY-MM-DD` dates. */
export function countTripDays(startDate: string, endDate: string): number {
  const start = Date.UTC(...splitIsoDate(startDate));
  const end = Date.UTC(...splitIsoDate(endDate));
  return Math.round((end - start) / 86_400_000) + 1;
}

export function toTimestamp(value: string | Date | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const time = value instanceof Date ? value.getTime() : Date.parse(value);
  return Number.isNaN(time) ? null : time;
}

function splitIsoDate(isoDate: string): [number, number, number] {
  const normalized = toIsoDate(isoDate);
  if (!normalized) {
    throw new Error(`Invalid date: ${isoDate}`);
  }
  const [year, month, day] = normalized.split("-").map(Number);
  return [year, month - 1, day];
}
