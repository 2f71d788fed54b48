/**
 * @calsync/shared -- Integer day keys for archive range queries.
 *
 * A day key is YYYYMMDD as an integer (2025-06-15 -> 20250615); a month-day
 * key is MMDD (0615). Both derive from the stored start timestamp in UTC
 * and sort the same way the dates do, so an index over them answers
 * "everything before/after day X" with a single range scan.
 */

/** YYYYMMDD of a Date in UTC. */
export function dayKeyFromDate(date: Date): number {
  return (
    date.getUTCFullYear() * 10_000 +
    (date.getUTCMonth() + 1) * 100 +
    date.getUTCDate()
  );
}

/** MMDD of a Date in UTC. */
export function monthDayKeyFromDate(date: Date): number {
  return (date.getUTCMonth() + 1) * 100 + date.getUTCDate();
}

/**
 * YYYYMMDD of an ISO 8601 timestamp.
 *
 * @throws RangeError when the timestamp does not parse
 */
export function dayKeyFromIso(iso: string): number {
  return dayKeyFromDate(parseIso(iso));
}

/** MMDD of an ISO 8601 timestamp. */
export function monthDayKeyFromIso(iso: string): number {
  return monthDayKeyFromDate(parseIso(iso));
}

/** Midnight UTC of the day a key names. */
export function dateFromDayKey(dayKey: number): Date {
  const year = Math.floor(dayKey / 10_000);
  const month = Math.floor((dayKey % 10_000) / 100);
  const day = dayKey % 100;
  return new Date(Date.UTC(year, month - 1, day));
}

/** Day key of "today" for the given clock. */
export function todayDayKey(now: Date = new Date()): number {
  return dayKeyFromDate(now);
}

function parseIso(iso: string): Date {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid timestamp: ${iso}`);
  }
  return date;
}
