/**
 * Date/time helpers for the Indian market calendar.
 * India Standard Time has a fixed +05:30 offset and no daylight saving, so
 * conversions are plain arithmetic.
 */

const IST_OFFSET_MS = (5 * 60 + 30) * 60 * 1000;

const MONTH_ABBREVIATIONS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function addUtcDays(date: Date, days: number): Date {
  const next = new Date(date);
  next.setUTCDate(next.getUTCDate() + days);
  return next;
}

function dateKeyFromYmdParts(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/** Wall-clock fields in IST. `weekday` is 0 = Sunday … 6 = Saturday. */
function istDateTimeParts(nowUtc: Date = new Date()) {
  const shifted = new Date(nowUtc.getTime() + IST_OFFSET_MS);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    weekday: shifted.getUTCDay(),
  };
}

function istDateStringFromUnixSeconds(unixSeconds: number): string {
  if (!Number.isFinite(unixSeconds)) return '';
  const p = istDateTimeParts(new Date(unixSeconds * 1000));
  return dateKeyFromYmdParts(p.year, p.month, p.day);
}

function istLocalToUtcMs(year: number, month: number, day: number, hour: number, minute: number): number {
  return Date.UTC(year, month - 1, day, hour, minute, 0) - IST_OFFSET_MS;
}

/** e.g. "19 Oct 2026" */
function formatScanDate(date: Date): string {
  const p = istDateTimeParts(date);
  return `${String(p.day).padStart(2, '0')} ${MONTH_ABBREVIATIONS[p.month - 1]} ${p.year}`;
}

/** e.g. "03:31 PM IST" */
function formatScanTime(date: Date): string {
  const p = istDateTimeParts(date);
  const hour12 = p.hour % 12 === 0 ? 12 : p.hour % 12;
  const period = p.hour < 12 ? 'AM' : 'PM';
  return `${String(hour12).padStart(2, '0')}:${String(p.minute).padStart(2, '0')} ${period} IST`;
}

export {
  addUtcDays,
  dateKeyFromYmdParts,
  istDateTimeParts,
  istDateStringFromUnixSeconds,
  istLocalToUtcMs,
  formatScanDate,
  formatScanTime,
};
