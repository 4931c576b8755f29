import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { SqliteDatabase } from '../db/sqlite.js';
import { ActiveAppointmentLimitError, NotFoundError, SlotConflictError } from '../lib/errors.js';
import { Clock, systemClock } from '../lib/time.js';
import {
  Appointment,
  BlockedSlot,
  ClosedDate,
  DateRange,
  DriftKind,
  DriftRecord,
  RemoteEvent,
  Slot,
} from '../types/index.js';

interface Interval {
  start: string;
  end: string;
}

export interface AvailabilityStoreOptions {
  clock?: Clock;
  maxActivePerUser?: number;
}

export interface ReserveOptions {
  bookingKey?: string;
  /** Appointment this hold is about to replace; not counted against the user's limit. */
  replacing?: string;
}

function toInterval(range: { start: Date; end: Date }): Interval {
  return { start: range.start.toISOString(), end: range.end.toISOString() };
}

function prepareStatements(db: SqliteDatabase) {
  return {
    getAppointment: db.prepare<[string], Appointment>(`
      SELECT * FROM appointments WHERE id = ?
    `),

    getByRemoteId: db.prepare<[string], Appointment>(`
      SELECT * FROM appointments WHERE remote_event_id = ?
    `),

    getActiveByBookingKey: db.prepare<[string], Appointment>(`
      SELECT * FROM appointments
      WHERE booking_key = ? AND status IN ('tentative', 'confirmed')
      ORDER BY created_at DESC LIMIT 1
    `),

    countActiveOverlapping: db.prepare<[Interval], { count: number }>(`
      SELECT COUNT(*) AS count FROM appointments
      WHERE status IN ('tentative', 'confirmed')
        AND slot_start < @end AND slot_end > @start
    `),

    countBlockedOverlapping: db.prepare<[Interval], { count: number }>(`
      SELECT COUNT(*) AS count FROM blocked_slots
      WHERE slot_start < @end AND slot_end > @start
    `),

    countUpcomingForUser: db.prepare<[string, string, string], { count: number }>(`
      SELECT COUNT(*) AS count FROM appointments
      WHERE user_id = ? AND status IN ('tentative', 'confirmed') AND slot_end > ? AND id != ?
    `),

    insertTentative: db.prepare<[Appointment]>(`
      INSERT INTO appointments
        (id, user_id, slot_start, slot_end, status, remote_event_id, booking_key, created_at, updated_at)
      VALUES
        (@id, @user_id, @slot_start, @slot_end, @status, @remote_event_id, @booking_key, @created_at, @updated_at)
    `),

    confirm: db.prepare<[string, string, string]>(`
      UPDATE appointments SET status = 'confirmed', remote_event_id = ?, updated_at = ?
      WHERE id = ? AND status = 'tentative'
    `),

    release: db.prepare<[string, string]>(`
      UPDATE appointments SET status = 'cancelled', remote_event_id = NULL, updated_at = ?
      WHERE id = ? AND status = 'confirmed'
    `),

    cancel: db.prepare<[string, string]>(`
      UPDATE appointments SET status = 'cancelled', updated_at = ?
      WHERE id = ? AND status != 'cancelled'
    `),

    listInRange: db.prepare<[Interval], Appointment>(`
      SELECT * FROM appointments
      WHERE slot_start < @end AND slot_end > @start
      ORDER BY slot_start
    `),

    listByUser: db.prepare<[string], Appointment>(`
      SELECT * FROM appointments WHERE user_id = ? ORDER BY slot_start
    `),

    listStaleTentative: db.prepare<[string], Appointment>(`
      SELECT * FROM appointments WHERE status = 'tentative' AND created_at <= ?
    `),

    getBlock: db.prepare<[string], BlockedSlot>(`
      SELECT * FROM blocked_slots WHERE remote_event_id = ?
    `),

    upsertBlock: db.prepare<[BlockedSlot]>(`
      INSERT INTO blocked_slots (remote_event_id, slot_start, slot_end, summary, created_at)
      VALUES (@remote_event_id, @slot_start, @slot_end, @summary, @created_at)
      ON CONFLICT(remote_event_id) DO UPDATE SET
        slot_start = excluded.slot_start,
        slot_end = excluded.slot_end,
        summary = excluded.summary
    `),

    deleteBlock: db.prepare<[string]>(`
      DELETE FROM blocked_slots WHERE remote_event_id = ?
    `),

    listBlocksInRange: db.prepare<[Interval], BlockedSlot>(`
      SELECT * FROM blocked_slots
      WHERE slot_start < @end AND slot_end > @start
      ORDER BY slot_start
    `),

    insertDrift: db.prepare<[DriftKind, string | null, string | null, string]>(`
      INSERT INTO drift_records (kind, appointment_id, remote_event_id, detected_at)
      VALUES (?, ?, ?, ?)
    `),

    listOpenDrift: db.prepare<[DriftKind], DriftRecord>(`
      SELECT * FROM drift_records WHERE kind = ? AND resolved_at IS NULL ORDER BY id
    `),

    resolveDrift: db.prepare<[string, number]>(`
      UPDATE drift_records SET resolved_at = ? WHERE id = ? AND resolved_at IS NULL
    `),

    resolveDriftFor: db.prepare<[string, string]>(`
      UPDATE drift_records SET resolved_at = ?
      WHERE remote_event_id = ? AND kind = 'remote_delete_failed' AND resolved_at IS NULL
    `),

    upsertClosedDate: db.prepare<[string, string | null]>(`
      INSERT INTO closed_dates (date, reason) VALUES (?, ?)
      ON CONFLICT(date) DO UPDATE SET reason = excluded.reason
    `),

    deleteClosedDate: db.prepare<[string]>(`
      DELETE FROM closed_dates WHERE date = ?
    `),

    getClosedDate: db.prepare<[string], ClosedDate>(`
      SELECT * FROM closed_dates WHERE date = ?
    `),

    listClosedDates: db.prepare<[], ClosedDate>(`
      SELECT * FROM closed_dates ORDER BY date
    `),
  };
}

/**
 * Durable record of appointments, external blocks and drift, backed by SQLite.
 * better-sqlite3 is synchronous, so every method runs to completion without
 * interleaving; reserveTentative additionally takes the write lock up front so
 * that other processes sharing the file are serialized too.
 */
export class AvailabilityStore {
  private readonly clock: Clock;
  private readonly maxActivePerUser: number;
  private readonly statements: ReturnType<typeof prepareStatements>;
  private readonly reserveTransaction: Database.Transaction<(appointment: Appointment, replacing: string) => void>;
  private readonly transferTransaction: Database.Transaction<
    (fromId: string, toId: string, remoteEventId: string) => void
  >;

  constructor(private readonly db: SqliteDatabase, options: AvailabilityStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.maxActivePerUser = options.maxActivePerUser ?? 1;

    this.statements = prepareStatements(db);

    this.reserveTransaction = db.transaction((appointment: Appointment, replacing: string) => {
      const interval = { start: appointment.slot_start, end: appointment.slot_end };
      if (!this.intervalIsFree(interval)) {
        throw new SlotConflictError('This time slot is already booked', {
          slot_start: appointment.slot_start,
        });
      }

      const upcoming = this.statements.countUpcomingForUser.get(
        appointment.user_id,
        appointment.created_at,
        replacing
      );
      if ((upcoming?.count ?? 0) >= this.maxActivePerUser) {
        throw new ActiveAppointmentLimitError(this.maxActivePerUser);
      }

      this.statements.insertTentative.run(appointment);
    });

    this.transferTransaction = db.transaction((fromId: string, toId: string, remoteEventId: string) => {
      const now = this.now();
      if (this.statements.release.run(now, fromId).changes === 0) {
        throw new NotFoundError(`No confirmed appointment ${fromId}`, { appointment_id: fromId });
      }
      if (this.statements.confirm.run(remoteEventId, now, toId).changes === 0) {
        throw new NotFoundError(`No pending appointment ${toId}`, { appointment_id: toId });
      }
    });
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private intervalIsFree(interval: Interval): boolean {
    const booked = this.statements.countActiveOverlapping.get(interval)?.count ?? 0;
    const blocked = this.statements.countBlockedOverlapping.get(interval)?.count ?? 0;
    return booked === 0 && blocked === 0;
  }

  /** True iff nothing Tentative, Confirmed or externally blocked overlaps the slot. */
  isFree(slot: Slot): boolean {
    return this.intervalIsFree(toInterval(slot));
  }

  /**
   * Atomic check-and-insert of a Tentative hold.
   */
  reserveTentative(slot: Slot, userId: string, options: ReserveOptions = {}): Appointment {
    const now = this.now();
    const appointment: Appointment = {
      id: uuidv4(),
      user_id: userId,
      slot_start: slot.start.toISOString(),
      slot_end: slot.end.toISOString(),
      status: 'tentative',
      remote_event_id: null,
      booking_key: options.bookingKey ?? null,
      created_at: now,
      updated_at: now,
    };

    try {
      this.reserveTransaction.immediate(appointment, options.replacing ?? '');
    } catch (error: unknown) {
      if (error instanceof Error && error.message.includes('UNIQUE constraint failed')) {
        throw new SlotConflictError('This time slot is already booked', {
          slot_start: appointment.slot_start,
        });
      }
      throw error;
    }

    return appointment;
  }

  /** Promotes a Tentative hold. A hold that was reaped or cancelled is NotFound. */
  confirm(appointmentId: string, remoteEventId: string): Appointment {
    const result = this.statements.confirm.run(remoteEventId, this.now(), appointmentId);
    if (result.changes === 0) {
      throw new NotFoundError(`No pending appointment ${appointmentId}`, { appointment_id: appointmentId });
    }
    return this.require(appointmentId);
  }

  /**
   * Hands the remote event of confirmed `fromId` over to the Tentative hold
   * `toId`: the old row is cancelled and the hold confirmed, or neither.
   */
  transferConfirmation(fromId: string, toId: string, remoteEventId: string): Appointment {
    this.transferTransaction.immediate(fromId, toId, remoteEventId);
    return this.require(toId);
  }

  cancel(appointmentId: string): Appointment {
    const existing = this.get(appointmentId);
    if (!existing) {
      throw new NotFoundError(`Appointment ${appointmentId} not found`, { appointment_id: appointmentId });
    }
    this.statements.cancel.run(this.now(), appointmentId);
    return this.require(appointmentId);
  }

  get(appointmentId: string): Appointment | undefined {
    return this.statements.getAppointment.get(appointmentId);
  }

  private require(appointmentId: string): Appointment {
    const appointment = this.get(appointmentId);
    if (!appointment) {
      throw new NotFoundError(`Appointment ${appointmentId} not found`, { appointment_id: appointmentId });
    }
    return appointment;
  }

  listByRemoteId(remoteEventId: string): Appointment | undefined {
    return this.statements.getByRemoteId.get(remoteEventId);
  }

  findActiveByBookingKey(bookingKey: string): Appointment | undefined {
    return this.statements.getActiveByBookingKey.get(bookingKey);
  }

  listInRange(range: DateRange): Appointment[] {
    return this.statements.listInRange.all(toInterval(range));
  }

  listByUser(userId: string): Appointment[] {
    return this.statements.listByUser.all(userId);
  }

  /**
   * Cancels every Tentative hold created at or before `olderThan`.
   */
  reapTentative(olderThan: Date): Appointment[] {
    const reap = this.db.transaction(() => {
      const stale = this.statements.listStaleTentative.all(olderThan.toISOString());
      const now = this.now();
      for (const appointment of stale) {
        this.statements.cancel.run(now, appointment.id);
      }
      return stale;
    });
    return reap.immediate();
  }

  getBlock(remoteEventId: string): BlockedSlot | undefined {
    return this.statements.getBlock.get(remoteEventId);
  }

  blockRemoteEvent(event: RemoteEvent): BlockedSlot {
    const block: BlockedSlot = {
      remote_event_id: event.id,
      slot_start: event.start.toISOString(),
      slot_end: event.end.toISOString(),
      summary: event.summary,
      created_at: this.now(),
    };
    this.statements.upsertBlock.run(block);
    return this.getBlock(event.id) ?? block;
  }

  releaseBlock(remoteEventId: string): boolean {
    return this.statements.deleteBlock.run(remoteEventId).changes > 0;
  }

  listBlocksInRange(range: DateRange): BlockedSlot[] {
    return this.statements.listBlocksInRange.all(toInterval(range));
  }

  recordDrift(kind: DriftKind, refs: { appointmentId?: string; remoteEventId?: string }): void {
    this.statements.insertDrift.run(
      kind,
      refs.appointmentId ?? null,
      refs.remoteEventId ?? null,
      this.now()
    );
  }

  listOpenDrift(kind: DriftKind): DriftRecord[] {
    return this.statements.listOpenDrift.all(kind);
  }

  resolveDrift(id: number): void {
    this.statements.resolveDrift.run(this.now(), id);
  }

  /** Closes every pending remote-delete record for an event that is now gone. */
  resolveDriftFor(remoteEventId: string): void {
    this.statements.resolveDriftFor.run(this.now(), remoteEventId);
  }

  closeDate(date: string, reason?: string): void {
    this.statements.upsertClosedDate.run(date, reason ?? null);
  }

  reopenDate(date: string): boolean {
    return this.statements.deleteClosedDate.run(date).changes > 0;
  }

  isClosed(date: string): boolean {
    return this.statements.getClosedDate.get(date) !== undefined;
  }

  listClosedDates(): ClosedDate[] {
    return this.statements.listClosedDates.all();
  }
}
