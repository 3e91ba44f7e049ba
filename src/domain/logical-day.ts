/**
 * Logical day
 *
 * A day runs from 04:00 local time to 04:00 the next morning, so a session
 * that crosses midnight stays on one timeline.
 */

export const LOGICAL_DAY_START_HOUR = 4;

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = (date.getMonth() + 1).toString().padStart(2, '0');
  const d = date.getDate().toString().padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function logicalDayFor(
  unixSeconds: number,
  startHour = LOGICAL_DAY_START_HOUR
): string {
  const date = new Date(unixSeconds * 1000);
  if (date.getHours() < startHour) {
    date.setDate(date.getDate() - 1);
  }
  return formatDate(date);
}

export function isLogicalDay(day: string): boolean {
  const match = DAY_PATTERN.exec(day);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Number(y), Number(m) - 1, Number(d));
  return formatDate(date) === day;
}

/**
 * Unix-second range [start, end) of a logical day.
 */
export function logicalDayRange(
  day: string,
  startHour = LOGICAL_DAY_START_HOUR
): { startTs: number; endTs: number } {
  const match = DAY_PATTERN.exec(day);
  if (!match || !isLogicalDay(day)) {
    throw new Error(`Invalid day "${day}". Expected YYYY-MM-DD.`);
  }
  const [, y, m, d] = match;
  // Date arithmetic on calendar fields keeps DST days at 23h/25h
  const start = new Date(Number(y), Number(m) - 1, Number(d), startHour);
  const end = new Date(Number(y), Number(m) - 1, Number(d) + 1, startHour);
  return {
    startTs: Math.floor(start.getTime() / 1000),
    endTs: Math.floor(end.getTime() / 1000),
  };
}
