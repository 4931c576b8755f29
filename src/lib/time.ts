import { addDays } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})$/;

export function isClinicDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

/** Minutes since midnight for "HH:mm", or null when malformed. */
export function parseClockTime(value: string): number | null {
  const match = TIME_PATTERN.exec(value);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

/** The instant at `minutes` past local midnight of a clinic date. */
export function zonedInstant(date: string, minutes: number, timeZone: string): Date {
  const hh = String(Math.floor(minutes / 60)).padStart(2, '0');
  const mm = String(minutes % 60).padStart(2, '0');
  return fromZonedTime(`${date}T${hh}:${mm}:00`, timeZone);
}

export function clinicDateOf(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, 'yyyy-MM-dd');
}

/** ISO weekday of a clinic date: 1 = Monday … 7 = Sunday. */
export function isoWeekday(date: string): number {
  const day = new Date(`${date}T12:00:00Z`).getUTCDay();
  return day === 0 ? 7 : day;
}

/** Calendar arithmetic on "YYYY-MM-DD" strings, independent of any zone. */
export function addClinicDays(date: string, days: number): string {
  return formatInTimeZone(addDays(new Date(`${date}T12:00:00Z`), days), 'UTC', 'yyyy-MM-dd');
}

export function dayRange(date: string, timeZone: string): { start: Date; end: Date } {
  return {
    start: fromZonedTime(`${date}T00:00:00`, timeZone),
    end: fromZonedTime(`${addClinicDays(date, 1)}T00:00:00`, timeZone),
  };
}

export function formatClinicTime(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, 'EEE d MMM, HH:mm');
}

/** Half-open interval intersection: back-to-back intervals do not overlap. */
export function overlaps(
  a: { start: Date; end: Date },
  b: { start: Date; end: Date }
): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}
