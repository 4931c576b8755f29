import { z } from 'zod';
import { ConfigurationError } from './lib/errors.js';
import type { LogLevel } from './lib/logger.js';
import { parseClockTime } from './lib/time.js';
import { validateWindow, weeklyScheduleFrom } from './services/slot-catalog.js';
import type { CalendarCredentials } from './services/google-calendar.transport.js';
import type { WeeklySchedule, WorkingHours } from './types/index.js';

export interface AppConfig {
  port: number;
  databasePath: string;
  timeZone: string;
  logLevel: LogLevel;
  calendar: CalendarCredentials;
  slotDurationMinutes: number;
  weeklySchedule: WeeklySchedule;
  maxActiveAppointmentsPerUser: number;
  sessionTimeoutMs: number;
  tentativeTtlMs: number;
  syncGraceMs: number;
  syncIntervalMs: number;
  syncWindowDays: number;
}

const required = z.string().trim().min(1, 'is required');
const clockTime = z
  .string()
  .trim()
  .refine((value) => parseClockTime(value) !== null, 'must be HH:mm');
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/** "HH:mm-HH:mm" or "closed"; empty means the day follows OPENING_TIME/CLOSING_TIME. */
const dayHours = z
  .string()
  .trim()
  .optional()
  .transform((value, ctx): WorkingHours | null | undefined => {
    if (!value) return undefined;
    if (value.toLowerCase() === 'closed') return null;
    const [start, end, ...rest] = value.split('-').map((part) => part.trim());
    if (rest.length > 0 || !end || parseClockTime(start) === null || parseClockTime(end) === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be HH:mm-HH:mm or closed' });
      return z.NEVER;
    }
    return { start, end };
  });

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  PORT: positiveInt(3000),
  DATABASE_PATH: z.string().trim().min(1).default('data/appointments.db'),
  TIMEZONE: z.string().trim().default('Europe/Minsk').refine(isTimeZone, 'must be an IANA time zone'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  GOOGLE_CLIENT_ID: required,
  GOOGLE_CLIENT_SECRET: required,
  GOOGLE_REFRESH_TOKEN: required,
  GOOGLE_CALENDAR_ID: required,
  GOOGLE_CALENDAR_EMAIL: z.string().trim().email().optional().or(z.literal('')),

  SLOT_DURATION_MINUTES: positiveInt(30),
  OPENING_TIME: clockTime.default('09:00'),
  CLOSING_TIME: clockTime.default('17:00'),
  WORKING_DAYS: z
    .string()
    .default('1,2,3,4,5')
    .transform((value) => value.split(',').map((day) => Number(day.trim())))
    .refine(
      (days) => days.length > 0 && days.every((day) => Number.isInteger(day) && day >= 1 && day <= 7),
      'must list ISO weekdays 1-7'
    ),
  SCHEDULE_1: dayHours,
  SCHEDULE_2: dayHours,
  SCHEDULE_3: dayHours,
  SCHEDULE_4: dayHours,
  SCHEDULE_5: dayHours,
  SCHEDULE_6: dayHours,
  SCHEDULE_7: dayHours,

  MAX_ACTIVE_APPOINTMENTS_PER_USER: positiveInt(1),
  SESSION_TIMEOUT_MINUTES: positiveInt(10),
  TENTATIVE_TTL_SECONDS: positiveInt(120),
  SYNC_GRACE_SECONDS: positiveInt(60),
  SYNC_INTERVAL_SECONDS: positiveInt(300),
  SYNC_WINDOW_DAYS: positiveInt(14),
});

/**
 * Reads configuration from the environment. Every problem is reported at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }
  const vars = parsed.data;

  const weeklySchedule = weeklyScheduleFrom(vars.WORKING_DAYS, { start: vars.OPENING_TIME, end: vars.CLOSING_TIME });
  const overrides = [
    vars.SCHEDULE_1,
    vars.SCHEDULE_2,
    vars.SCHEDULE_3,
    vars.SCHEDULE_4,
    vars.SCHEDULE_5,
    vars.SCHEDULE_6,
    vars.SCHEDULE_7,
  ];
  overrides.forEach((hours, index) => {
    if (hours !== undefined) weeklySchedule[index + 1] = hours;
  });
  for (const hours of Object.values(weeklySchedule)) {
    if (hours) validateWindow(hours, vars.SLOT_DURATION_MINUTES);
  }

  return {
    port: vars.PORT,
    databasePath: vars.DATABASE_PATH,
    timeZone: vars.TIMEZONE,
    logLevel: vars.LOG_LEVEL,
    calendar: {
      clientId: vars.GOOGLE_CLIENT_ID,
      clientSecret: vars.GOOGLE_CLIENT_SECRET,
      refreshToken: vars.GOOGLE_REFRESH_TOKEN,
      calendarId: vars.GOOGLE_CALENDAR_ID,
      accountEmail: vars.GOOGLE_CALENDAR_EMAIL || undefined,
    },
    slotDurationMinutes: vars.SLOT_DURATION_MINUTES,
    weeklySchedule,
    maxActiveAppointmentsPerUser: vars.MAX_ACTIVE_APPOINTMENTS_PER_USER,
    sessionTimeoutMs: vars.SESSION_TIMEOUT_MINUTES * 60_000,
    tentativeTtlMs: vars.TENTATIVE_TTL_SECONDS * 1000,
    syncGraceMs: vars.SYNC_GRACE_SECONDS * 1000,
    syncIntervalMs: vars.SYNC_INTERVAL_SECONDS * 1000,
    syncWindowDays: vars.SYNC_WINDOW_DAYS,
  };
}
