import { InvalidConfigurationError } from '../lib/errors.js';
import { isoWeekday, parseClockTime, zonedInstant } from '../lib/time.js';
import { Slot, WeeklySchedule, WorkingHours } from '../types/index.js';

/**
 * Candidate slots of a clinic day, clipped to working hours, chronological and
 * non-overlapping. The result is lazy and can be iterated more than once.
 */
export function availableSlots(
  date: string,
  workingHours: WorkingHours,
  slotDuration: number,
  timeZone: string
): Iterable<Slot> {
  const window = validateWindow(workingHours, slotDuration);

  return {
    *[Symbol.iterator](): Iterator<Slot> {
      for (let offset = window.start; offset + slotDuration <= window.end; offset += slotDuration) {
        yield Object.freeze({
          start: zonedInstant(date, offset, timeZone),
          end: zonedInstant(date, offset + slotDuration, timeZone),
          durationMinutes: slotDuration,
        });
      }
    },
  };
}

export function validateWindow(
  workingHours: WorkingHours,
  slotDuration: number
): { start: number; end: number } {
  if (!Number.isInteger(slotDuration) || slotDuration <= 0) {
    throw new InvalidConfigurationError('Slot duration must be a positive whole number of minutes', {
      slot_duration: slotDuration,
    });
  }

  const start = parseClockTime(workingHours.start);
  const end = parseClockTime(workingHours.end);
  if (start === null || end === null) {
    throw new InvalidConfigurationError('Working hours must use HH:mm', { ...workingHours });
  }
  if (end <= start) {
    throw new InvalidConfigurationError('Working hours must end after they start', { ...workingHours });
  }
  if ((end - start) % slotDuration !== 0) {
    throw new InvalidConfigurationError(
      `Slot duration ${slotDuration} does not evenly divide ${workingHours.start}-${workingHours.end}`,
      { ...workingHours, slot_duration: slotDuration }
    );
  }

  return { start, end };
}

/**
 * Working hours per day, honouring the weekly schedule and closed dates.
 */
export class ClinicSchedule {
  constructor(
    private readonly weekly: WeeklySchedule,
    private readonly slotDuration: number,
    private readonly timeZone: string,
    private readonly isClosed: (date: string) => boolean = () => false
  ) {
    for (const hours of Object.values(weekly)) {
      if (hours) validateWindow(hours, slotDuration);
    }
  }

  workingHoursFor(date: string): WorkingHours | null {
    if (this.isClosed(date)) return null;
    return this.weekly[isoWeekday(date)] ?? null;
  }

  slotsFor(date: string): Iterable<Slot> {
    const hours = this.workingHoursFor(date);
    if (!hours) return [];
    return availableSlots(date, hours, this.slotDuration, this.timeZone);
  }

  /** True when `slot` is exactly one of the catalog slots of its day. */
  contains(date: string, slot: Slot): boolean {
    for (const candidate of this.slotsFor(date)) {
      if (
        candidate.start.getTime() === slot.start.getTime() &&
        candidate.end.getTime() === slot.end.getTime()
      ) {
        return true;
      }
    }
    return false;
  }

  get zone(): string {
    return this.timeZone;
  }

  get duration(): number {
    return this.slotDuration;
  }
}

export function weeklyScheduleFrom(workingDays: number[], hours: WorkingHours): WeeklySchedule {
  const schedule: WeeklySchedule = {};
  for (let day = 1; day <= 7; day++) {
    schedule[day] = workingDays.includes(day) ? { ...hours } : null;
  }
  return schedule;
}
