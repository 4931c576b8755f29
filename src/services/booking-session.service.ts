import { formatInTimeZone } from 'date-fns-tz';
import { z } from 'zod';
import type { SqliteDatabase } from '../db/sqlite.js';
import {
  BookingError,
  InvalidSlotError,
  OperationAbortedError,
  SlotConflictError,
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { Clock, clinicDateOf, formatClinicTime, isClinicDate, systemClock } from '../lib/time.js';
import { Appointment, AppointmentView, ErrorCode, Slot, SlotView } from '../types/index.js';
import type { BookOptions } from './reconciliation.service.js';

export type SessionState =
  | 'awaiting_date'
  | 'awaiting_slot'
  | 'confirming'
  | 'confirmed'
  | 'failed'
  | 'cancelled'
  | 'expired';

/** Reply state when the user has no session at all. */
export type ReplyState = SessionState | 'idle';

export type SessionInput =
  | { type: 'start' }
  | { type: 'date'; date: string }
  | { type: 'slot'; start: string }
  | { type: 'cancel' };

export interface SessionReply {
  state: ReplyState;
  prompt: string;
  date?: string;
  slots?: SlotView[];
  appointment?: AppointmentView;
  errorCode?: ErrorCode;
}

/** What the state machine needs from the reconciliation engine. */
export interface BookingEngine {
  listAvailableSlots(date: string): Slot[];
  resolveSlot(start: Date): Slot;
  bookSlot(userId: string, slot: Slot, options?: BookOptions): Promise<Appointment>;
}

/** Persisted per-user conversation state. */
export interface BookingSession {
  user_id: string;
  state: SessionState;
  selected_date: string | null;
  candidate_start: string | null;
  candidate_end: string | null;
  offered_slots: string;
  expires_at: string;
  updated_at: string;
}

interface InFlight {
  controller: AbortController;
  endedAs?: 'cancelled' | 'expired';
}

export interface BookingSessionOptions {
  clock?: Clock;
  timeZone: string;
  timeoutMs?: number;
}

const offeredSlotsSchema = z.array(z.string());

export function toSlotView(slot: Slot): SlotView {
  return {
    start: slot.start.toISOString(),
    end: slot.end.toISOString(),
    duration_minutes: slot.durationMinutes,
  };
}

export function toAppointmentView(appointment: Appointment): AppointmentView {
  return {
    appointment_id: appointment.id,
    user_id: appointment.user_id,
    slot_start: appointment.slot_start,
    slot_end: appointment.slot_end,
    status: appointment.status,
    remote_event_id: appointment.remote_event_id,
  };
}

function prepareStatements(db: SqliteDatabase) {
  return {
    get: db.prepare<[string], BookingSession>(`SELECT * FROM booking_sessions WHERE user_id = ?`),
    upsert: db.prepare<[BookingSession]>(`
      INSERT INTO booking_sessions
        (user_id, state, selected_date, candidate_start, candidate_end, offered_slots, expires_at, updated_at)
      VALUES
        (@user_id, @state, @selected_date, @candidate_start, @candidate_end, @offered_slots, @expires_at, @updated_at)
      ON CONFLICT(user_id) DO UPDATE SET
        state = excluded.state,
        selected_date = excluded.selected_date,
        candidate_start = excluded.candidate_start,
        candidate_end = excluded.candidate_end,
        offered_slots = excluded.offered_slots,
        expires_at = excluded.expires_at,
        updated_at = excluded.updated_at
    `),
    delete: db.prepare<[string]>(`DELETE FROM booking_sessions WHERE user_id = ?`),
    listExpired: db.prepare<[string], BookingSession>(`SELECT * FROM booking_sessions WHERE expires_at <= ?`),
  };
}

const PROMPTS = {
  awaitingDate: 'Which day would you like to come in? Reply with a date as YYYY-MM-DD.',
  confirming: 'Still confirming your appointment, one moment please.',
  cancelled: 'Your booking has been cancelled.',
  expired: 'Your booking session timed out. Send start to begin again.',
  idle: 'Send start to book an appointment.',
  retryLater: 'The clinic calendar is not responding right now. Please try again in a few minutes.',
};

const RETRY_LATER_CODES = new Set<ErrorCode>([
  ErrorCode.TEMPORARILY_UNAVAILABLE,
  ErrorCode.REMOTE_AUTH_ERROR,
  ErrorCode.INTERNAL_ERROR,
]);

/**
 * Per-user booking conversation: AwaitingDate → AwaitingSlot → Confirming →
 * Confirmed | Failed, with Cancelled and Expired reachable from any
 * non-terminal state. Terminal sessions are deleted, except a Failed one
 * that is worth retrying: it keeps its date, and the next start or slot
 * message resumes at AwaitingSlot.
 */
export class BookingSessionMachine {
  private readonly clock: Clock;
  private readonly timeZone: string;
  private readonly timeoutMs: number;
  private readonly inFlight = new Map<string, InFlight>();
  private readonly statements: ReturnType<typeof prepareStatements>;

  constructor(
    db: SqliteDatabase,
    private readonly engine: BookingEngine,
    options: BookingSessionOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.timeZone = options.timeZone;
    this.timeoutMs = options.timeoutMs ?? 10 * 60_000;

    this.statements = prepareStatements(db);
  }

  getSession(userId: string): BookingSession | undefined {
    return this.statements.get.get(userId);
  }

  async handle(userId: string, input: SessionInput): Promise<SessionReply> {
    const session = this.getSession(userId);

    if (session && this.isExpired(session)) {
      this.end(session, 'expired');
      if (input.type !== 'start') {
        return { state: 'expired', prompt: PROMPTS.expired };
      }
      return this.start(userId);
    }

    if (!session) {
      if (input.type === 'start') return this.start(userId);
      return { state: 'idle', prompt: PROMPTS.idle };
    }

    if (input.type === 'cancel') {
      this.end(session, 'cancelled');
      return { state: 'cancelled', prompt: PROMPTS.cancelled };
    }

    // One booking per user at a time.
    if (this.inFlight.has(userId)) {
      return { state: 'confirming', prompt: PROMPTS.confirming };
    }

    switch (session.state) {
      case 'awaiting_date':
        if (input.type === 'date') return this.chooseDate(session, input.date);
        return this.reprompt(session);
      case 'awaiting_slot':
        if (input.type === 'slot') return this.chooseSlot(session, input.start);
        return this.reprompt(session);
      case 'failed':
        if (input.type === 'date') return this.chooseDate(session, input.date);
        return this.resume(session);
      default:
        return this.reprompt(session);
    }
  }

  /**
   * Ends every session idle past its expiry, aborting in-flight bookings.
   */
  expireIdle(): string[] {
    const expired = this.statements.listExpired.all(this.clock().toISOString());
    for (const session of expired) {
      this.end(session, 'expired');
      logger.info(`Booking session for ${session.user_id} expired`);
    }
    return expired.map((session) => session.user_id);
  }

  private start(userId: string): SessionReply {
    this.save({
      user_id: userId,
      state: 'awaiting_date',
      selected_date: null,
      candidate_start: null,
      candidate_end: null,
      offered_slots: '[]',
      expires_at: '',
      updated_at: '',
    });
    return { state: 'awaiting_date', prompt: PROMPTS.awaitingDate };
  }

  private chooseDate(session: BookingSession, date: string): SessionReply {
    if (!isClinicDate(date)) {
      return this.reject(session, 'Please send the date as YYYY-MM-DD.', ErrorCode.VALIDATION_ERROR);
    }
    if (date < clinicDateOf(this.clock(), this.timeZone)) {
      return this.reject(session, 'That date has already passed. Please choose another day.', ErrorCode.INVALID_SLOT);
    }

    const slots = this.engine.listAvailableSlots(date);
    if (slots.length === 0) {
      return this.reject(session, `There are no free times on ${date}. Please choose another day.`, ErrorCode.SLOT_TAKEN);
    }

    const next: BookingSession = {
      ...session,
      state: 'awaiting_slot',
      selected_date: date,
      offered_slots: JSON.stringify(slots.map((slot) => slot.start.toISOString())),
    };
    this.save(next);
    return this.slotReply(date, slots);
  }

  private async chooseSlot(session: BookingSession, start: string): Promise<SessionReply> {
    const date = session.selected_date ?? '';
    const requested = new Date(start);
    const offered = offeredSlotsSchema.parse(JSON.parse(session.offered_slots));

    if (isNaN(requested.getTime()) || !offered.includes(requested.toISOString())) {
      return this.reject(session, 'Please pick one of the offered times.', ErrorCode.INVALID_SLOT);
    }

    let slot: Slot;
    try {
      slot = this.engine.resolveSlot(requested);
    } catch (error) {
      if (!(error instanceof InvalidSlotError)) throw error;
      return this.refreshSlots(session, date, 'That time is no longer offered.', error.code);
    }

    const userId = session.user_id;
    const inFlight: InFlight = { controller: new AbortController() };
    this.inFlight.set(userId, inFlight);
    this.save({
      ...session,
      state: 'confirming',
      candidate_start: slot.start.toISOString(),
      candidate_end: slot.end.toISOString(),
    });

    try {
      const appointment = await this.engine.bookSlot(userId, slot, { signal: inFlight.controller.signal });
      this.statements.delete.run(userId);
      return {
        state: 'confirmed',
        prompt: `You're booked for ${formatClinicTime(slot.start, this.timeZone)}. See you then!`,
        date,
        appointment: toAppointmentView(appointment),
      };
    } catch (error) {
      if (error instanceof OperationAbortedError) {
        const endedAs = inFlight.endedAs ?? 'cancelled';
        return { state: endedAs, prompt: PROMPTS[endedAs] };
      }
      if (error instanceof SlotConflictError || error instanceof InvalidSlotError) {
        const current = this.getSession(userId);
        return this.refreshSlots(current ?? session, date, 'Sorry, that time was just taken.', error.code);
      }
      return this.fail(userId, date, error, this.getSession(userId));
    } finally {
      this.inFlight.delete(userId);
    }
  }

  private refreshSlots(session: BookingSession, date: string, reason?: string, code?: ErrorCode): SessionReply {
    const slots = this.engine.listAvailableSlots(date);
    this.save({
      ...session,
      state: 'awaiting_slot',
      candidate_start: null,
      candidate_end: null,
      offered_slots: JSON.stringify(slots.map((slot) => slot.start.toISOString())),
    });
    const reply = this.slotReply(date, slots);
    if (!reason) return reply;
    return { ...reply, prompt: `${reason} ${reply.prompt}`, errorCode: code };
  }

  private fail(userId: string, date: string, error: unknown, session?: BookingSession): SessionReply {
    let code: ErrorCode = ErrorCode.INTERNAL_ERROR;
    let prompt = PROMPTS.retryLater;
    if (error instanceof BookingError) {
      code = error.code;
      if (!RETRY_LATER_CODES.has(code)) prompt = `${error.message}.`;
    } else {
      logger.error(`Booking for ${userId} failed unexpectedly:`, error);
    }

    if (session && RETRY_LATER_CODES.has(code)) {
      this.save({ ...session, state: 'failed', candidate_start: null, candidate_end: null });
    } else {
      this.statements.delete.run(userId);
    }
    return { state: 'failed', prompt, date, errorCode: code };
  }

  /** Back to AwaitingSlot on the date chosen before a failed attempt. */
  private resume(session: BookingSession): SessionReply {
    if (!session.selected_date) return this.start(session.user_id);
    return this.refreshSlots(session, session.selected_date);
  }

  private slotReply(date: string, slots: Slot[]): SessionReply {
    const times = slots.map((slot) => formatInTimeZone(slot.start, this.timeZone, 'HH:mm'));
    const prompt =
      times.length > 0
        ? `Free times on ${date}: ${times.join(', ')}. Which one suits you?`
        : `No free times remain on ${date}. Send cancel to start over.`;
    return { state: 'awaiting_slot', prompt, date, slots: slots.map(toSlotView) };
  }

  private reprompt(session: BookingSession): SessionReply {
    this.save(session);
    switch (session.state) {
      case 'awaiting_date':
        return { state: 'awaiting_date', prompt: PROMPTS.awaitingDate };
      case 'awaiting_slot': {
        const date = session.selected_date ?? '';
        const offered = offeredSlotsSchema.parse(JSON.parse(session.offered_slots));
        const slots = this.engine
          .listAvailableSlots(date)
          .filter((slot) => offered.includes(slot.start.toISOString()));
        return this.slotReply(date, slots);
      }
      default:
        return { state: session.state, prompt: PROMPTS.confirming };
    }
  }

  private reject(session: BookingSession, prompt: string, errorCode: ErrorCode): SessionReply {
    this.save(session);
    return { state: session.state, prompt, errorCode };
  }

  private save(session: BookingSession): void {
    const now = this.clock();
    this.statements.upsert.run({
      ...session,
      expires_at: new Date(now.getTime() + this.timeoutMs).toISOString(),
      updated_at: now.toISOString(),
    });
  }

  private isExpired(session: BookingSession): boolean {
    return new Date(session.expires_at).getTime() <= this.clock().getTime();
  }

  private end(session: BookingSession, endedAs: 'cancelled' | 'expired'): void {
    this.statements.delete.run(session.user_id);
    const inFlight = this.inFlight.get(session.user_id);
    if (inFlight) {
      inFlight.endedAs = endedAs;
      inFlight.controller.abort();
    }
  }
}
