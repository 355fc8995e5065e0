// src/lib/dates.ts
// Calendar-date and wall-clock helpers on "yyyy-MM-dd" / "HH:mm" strings.
import { addDays, differenceInCalendarDays, format, getDay, isValid, parseISO } from "date-fns";
import { DateTime } from "luxon";

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const WEEKDAYS: Readonly<Record<string, number>> = {
  sun: 0, mon: 1, tue: 2, wed: 3, thu: 4, fri: 5, sat: 6,
};

const pad = (n: number) => n.toString().padStart(2, "0");

export function monthFromToken(token: string): number | null {
  return MONTHS[token.trim().toLowerCase().slice(0, 3)] ?? null;
}

export function weekdayFromToken(token: string): number | null {
  return WEEKDAYS[token.trim().toLowerCase().slice(0, 3)] ?? null;
}

/** yyyy-MM-dd for a real calendar date, null for things like Feb 30 */
export function toDateKey(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || month < 1 || month > 12 || day < 1 || day > 31) return null;
  const d = new Date(year, month - 1, day);
  if (!isValid(d) || d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) {
    return null;
  }
  return `${year.toString().padStart(4, "0")}-${pad(month)}-${pad(day)}`;
}

/** Calendar date of an instant as seen in `zone`; this machine's zone when none is given */
export function dateKeyOf(now: Date, zone?: string): string {
  if (zone === undefined) return format(now, "yyyy-MM-dd");
  const key = DateTime.fromJSDate(now, { zone }).toISODate();
  if (key === null) throw new RangeError(`Unknown time zone: ${zone}`);
  return key;
}

export function weekdayOf(dateKey: string): number {
  return getDay(parseISO(dateKey));
}

export function addDaysToKey(dateKey: string, days: number): string {
  return format(addDays(parseISO(dateKey), days), "yyyy-MM-dd");
}

export function daysBetween(a: string, b: string): number {
  return differenceInCalendarDays(parseISO(a), parseISO(b));
}

/** Expands a two-digit year into this century */
export function fullYear(raw: string): number {
  const n = Number(raw);
  return raw.length <= 2 ? 2000 + n : n;
}

/**
 * First date on or after `today` with this month/day, and this weekday
 * when one is given. Scans 28 years so Feb 29 + weekday combinations resolve.
 */
export function nextOccurrence(month: number, day: number, today: string, weekday?: number): string | null {
  const firstYear = Number(today.slice(0, 4));
  for (let year = firstYear; year <= firstYear + 28; year++) {
    const key = toDateKey(year, month, day);
    if (!key || key < today) continue;
    if (weekday === undefined || weekdayOf(key) === weekday) return key;
  }
  return null;
}

/** Next date strictly after `today` (or from it when `includeToday`) falling on `weekday` */
export function nextWeekday(today: string, weekday: number, includeToday = false): string {
  let offset = (weekday - weekdayOf(today) + 7) % 7;
  if (offset === 0 && !includeToday) offset = 7;
  return addDaysToKey(today, offset);
}

export function toTimeKey(hours: number, minutes: number): string {
  return `${pad(hours)}:${pad(minutes)}`;
}

export function minutesOf(timeKey: string): number {
  const [h = "0", m = "0"] = timeKey.split(":");
  return Number(h) * 60 + Number(m);
}

/** Adds minutes to a wall-clock time, carrying whole days into the date */
export function shiftWallTime(dateKey: string, timeKey: string, minutes: number): { date: string; time: string } {
  const total = minutesOf(timeKey) + minutes;
  const dayOffset = Math.floor(total / 1440);
  const inDay = ((total % 1440) + 1440) % 1440;
  return {
    date: addDaysToKey(dateKey, dayOffset),
    time: toTimeKey(Math.floor(inDay / 60), inDay % 60),
  };
}

export function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}
