import {
  BookingInProgressError,
  InvalidSlotError,
  NotFoundError,
  OperationAbortedError,
  RemoteAuthError,
  RemoteConflictError,
  RemoteUnavailableError,
  SlotConflictError,
  TemporarilyUnavailableError,
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { Clock, clinicDateOf, isClinicDate, overlaps, systemClock } from '../lib/time.js';
import { Appointment, DateRange, DriftKind, RemoteEvent, Slot } from '../types/index.js';
import { AvailabilityStore } from './availability.store.js';
import { RemoteCalendar, remoteEventIdFor } from './calendar.adapter.js';
import { ClinicSchedule } from './slot-catalog.js';

export interface ReconciliationOptions {
  clock?: Clock;
  /** Confirmed appointments younger than this are left alone by sync. */
  syncGraceMs?: number;
  /** Tentative holds older than this are released by the reaper. */
  tentativeTtlMs?: number;
}

export interface BookOptions {
  signal?: AbortSignal;
  /** Client idempotency key; a repeated key returns the earlier booking. */
  bookingKey?: string;
}

export interface SyncReport {
  remoteEvents: number;
  cancelledMissing: string[];
  blocksCreated: string[];
  blocksReleased: string[];
  orphansDeleted: string[];
  deletesRetried: string[];
}

function slotFromAppointment(appointment: Appointment): Slot {
  const start = new Date(appointment.slot_start);
  const end = new Date(appointment.slot_end);
  return { start, end, durationMinutes: Math.round((end.getTime() - start.getTime()) / 60_000) };
}

function describe(appointment: Appointment): string {
  return [`Patient: ${appointment.user_id}`, `Booking reference: ${appointment.id}`].join('\n');
}

/**
 * Two-phase booking (local hold, then remote write) and the compensation
 * around it. This is the only place that rolls local state back.
 */
export class ReconciliationEngine {
  private readonly clock: Clock;
  private readonly syncGraceMs: number;
  private readonly tentativeTtlMs: number;
  private authFailure: RemoteAuthError | null = null;

  constructor(
    private readonly store: AvailabilityStore,
    private calendar: RemoteCalendar,
    private readonly schedule: ClinicSchedule,
    options: ReconciliationOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.syncGraceMs = options.syncGraceMs ?? 60_000;
    this.tentativeTtlMs = options.tentativeTtlMs ?? 120_000;
  }

  /** Installs an adapter built from refreshed credentials and lifts degradation. */
  useCalendar(calendar: RemoteCalendar): void {
    this.calendar = calendar;
    this.authFailure = null;
    logger.info('Calendar adapter replaced');
  }

  get degraded(): boolean {
    return this.authFailure !== null;
  }

  listAvailableSlots(date: string): Slot[] {
    if (!isClinicDate(date)) {
      throw new InvalidSlotError('Date must use YYYY-MM-DD', { date });
    }
    const now = this.clock().getTime();
    const slots: Slot[] = [];
    for (const slot of this.schedule.slotsFor(date)) {
      if (slot.start.getTime() > now && this.store.isFree(slot)) {
        slots.push(slot);
      }
    }
    return slots;
  }

  getAppointment(appointmentId: string): Appointment {
    const appointment = this.store.get(appointmentId);
    if (!appointment) {
      throw new NotFoundError(`Appointment ${appointmentId} not found`, { appointment_id: appointmentId });
    }
    return appointment;
  }

  listUserAppointments(userId: string): Appointment[] {
    return this.store.listByUser(userId);
  }

  /**
   * Resolves the catalog slot starting at `start`, or fails InvalidSlot.
   */
  resolveSlot(start: Date): Slot {
    if (isNaN(start.getTime())) {
      throw new InvalidSlotError('Slot start must be a valid ISO 8601 datetime');
    }
    const date = clinicDateOf(start, this.schedule.zone);
    for (const slot of this.schedule.slotsFor(date)) {
      if (slot.start.getTime() === start.getTime()) return slot;
    }
    throw new InvalidSlotError('That time is not a bookable slot', { slot_start: start.toISOString() });
  }

  private validateSlot(slot: Slot): void {
    if (slot.start.getTime() <= this.clock().getTime()) {
      throw new InvalidSlotError('Cannot book appointments in the past', {
        slot_start: slot.start.toISOString(),
      });
    }
    const date = clinicDateOf(slot.start, this.schedule.zone);
    if (!this.schedule.contains(date, slot)) {
      throw new InvalidSlotError('That time is not a bookable slot', { slot_start: slot.start.toISOString() });
    }
  }

  async bookSlot(userId: string, slot: Slot, options: BookOptions = {}): Promise<Appointment> {
    if (this.authFailure) {
      throw this.authFailure;
    }
    this.validateSlot(slot);

    if (options.bookingKey) {
      const previous = this.store.findActiveByBookingKey(options.bookingKey);
      if (previous?.status === 'confirmed') return previous;
      if (previous) throw new BookingInProgressError(previous.id);
    }

    // Fails fast with SlotConflict before any remote call.
    const hold = this.store.reserveTentative(slot, userId, { bookingKey: options.bookingKey });
    logger.info(`Tentative hold ${hold.id} for ${userId} at ${hold.slot_start}`);

    let remoteEventId: string;
    try {
      remoteEventId = await this.clearingLeftovers(options.signal, () =>
        this.calendar.createEvent(slot, describe(hold), hold.id, options.signal)
      );
    } catch (error) {
      this.rollback(hold, error);
      throw this.toBookingFailure(error, hold);
    }

    if (options.signal?.aborted) {
      // The caller moved on while the remote write was landing.
      this.rollback(hold, new OperationAbortedError());
      await this.deleteRemoteBestEffort(remoteEventId, hold.id, 'remote_delete_failed');
      throw new OperationAbortedError();
    }

    try {
      const confirmed = this.store.confirm(hold.id, remoteEventId);
      logger.info(`Appointment ${confirmed.id} confirmed as remote event ${remoteEventId}`);
      return confirmed;
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      // The hold was reaped while the remote write was in flight.
      logger.warn(`Hold ${hold.id} expired before confirmation, removing remote event ${remoteEventId}`);
      await this.deleteRemoteBestEffort(remoteEventId, hold.id, 'remote_delete_failed');
      throw new SlotConflictError('Your reservation expired before it could be confirmed', {
        slot_start: hold.slot_start,
      });
    }
  }

  /**
   * Moves a Confirmed appointment to `slot`: a new hold is reserved, the remote
   * event is patched onto it and the old row is released. Any failure leaves
   * the original appointment untouched.
   */
  async rescheduleAppointment(appointmentId: string, slot: Slot, options: BookOptions = {}): Promise<Appointment> {
    if (this.authFailure) {
      throw this.authFailure;
    }
    const current = this.getAppointment(appointmentId);
    const remoteEventId = current.remote_event_id;
    if (current.status !== 'confirmed' || !remoteEventId) {
      throw new InvalidSlotError('Only confirmed appointments can be rescheduled', {
        appointment_id: appointmentId,
        status: current.status,
      });
    }
    this.validateSlot(slot);
    if (current.slot_start === slot.start.toISOString()) {
      throw new InvalidSlotError('The appointment is already at that time', { slot_start: current.slot_start });
    }

    const hold = this.store.reserveTentative(slot, current.user_id, { replacing: current.id });
    logger.info(`Tentative hold ${hold.id} to move ${current.id} to ${hold.slot_start}`);

    try {
      await this.clearingLeftovers(options.signal, () =>
        this.calendar.updateEvent(remoteEventId, slot, options.signal)
      );
    } catch (error) {
      this.rollback(hold, error);
      throw this.toBookingFailure(error, hold);
    }

    try {
      if (options.signal?.aborted) throw new OperationAbortedError();
      const moved = this.store.transferConfirmation(current.id, hold.id, remoteEventId);
      logger.info(`Appointment ${current.id} rescheduled as ${moved.id} at ${moved.slot_start}`);
      return moved;
    } catch (error) {
      // Put the remote event back where the original appointment still is.
      this.rollback(hold, error);
      await this.moveRemoteBestEffort(remoteEventId, slotFromAppointment(current));
      if (error instanceof NotFoundError) {
        throw new SlotConflictError('The appointment changed while it was being rescheduled', {
          appointment_id: current.id,
        });
      }
      throw error;
    }
  }

  private async moveRemoteBestEffort(remoteEventId: string, slot: Slot): Promise<void> {
    try {
      await this.calendar.updateEvent(remoteEventId, slot);
    } catch (error) {
      this.noteAuthFailure(error);
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`Could not move remote event ${remoteEventId} back to ${slot.start.toISOString()}: ${reason}`);
    }
  }

  /** Translates a remote failure after rollback into what the caller sees. */
  private toBookingFailure(error: unknown, hold: Appointment): unknown {
    if (error instanceof RemoteConflictError) {
      return new SlotConflictError('This time slot was taken in the clinic calendar', {
        slot_start: hold.slot_start,
      });
    }
    if (error instanceof RemoteUnavailableError) {
      return new TemporarilyUnavailableError();
    }
    this.noteAuthFailure(error);
    return error;
  }

  /**
   * Runs a remote write once more after removing the event it clashed with,
   * when that event belongs to an appointment already cancelled here (a
   * delete that failed earlier). An unknown clashing event is blocked locally
   * right away so the slot stops being offered.
   */
  private async clearingLeftovers<T>(signal: AbortSignal | undefined, write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (error) {
      if (!(error instanceof RemoteConflictError) || !error.clash) throw error;
      const clash = error.clash;

      const owner = this.ownerOf(clash);
      if (owner?.status !== 'cancelled') {
        if (!owner && !this.store.getBlock(clash.id)) {
          this.store.blockRemoteEvent(clash);
          this.store.recordDrift('external_event', { remoteEventId: clash.id });
          logger.info(`Blocked ${clash.start.toISOString()}-${clash.end.toISOString()} for external event ${clash.id}`);
        }
        throw error;
      }

      logger.warn(`Removing leftover remote event ${clash.id} of a cancelled appointment`);
      await this.calendar.deleteEvent(clash.id, signal);
      this.store.resolveDriftFor(clash.id);
      return write();
    }
  }

  /** The local appointment a remote event was written for, if any. */
  private ownerOf(event: RemoteEvent): Appointment | undefined {
    return (
      this.store.listByRemoteId(event.id) ??
      this.store.listInRange(event).find((appointment) => remoteEventIdFor(appointment.id) === event.id)
    );
  }

  private noteAuthFailure(error: unknown): void {
    if (error instanceof RemoteAuthError) {
      this.authFailure = error;
    }
  }

  private rollback(hold: Appointment, cause: unknown): void {
    const reason =
      cause instanceof OperationAbortedError ? 'aborted' : cause instanceof Error ? cause.message : String(cause);
    this.store.cancel(hold.id);
    logger.warn(`Rolled back tentative hold ${hold.id}: ${reason}`);
  }

  /**
   * Deletes a remote event without letting a failure escape. `driftKind`, when
   * given, records the failure for periodicSync to retry.
   */
  private async deleteRemoteBestEffort(
    remoteEventId: string,
    appointmentId: string,
    driftKind: DriftKind | null
  ): Promise<boolean> {
    try {
      await this.calendar.deleteEvent(remoteEventId);
      this.store.resolveDriftFor(remoteEventId);
      return true;
    } catch (error) {
      this.noteAuthFailure(error);
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not delete remote event ${remoteEventId}: ${reason}`);
      if (driftKind) {
        this.store.recordDrift(driftKind, { appointmentId, remoteEventId });
      }
      return false;
    }
  }

  /**
   * Cancels locally no matter what the remote calendar says; a failed remote
   * delete is left as drift for periodicSync.
   */
  async cancelAppointment(appointmentId: string): Promise<Appointment> {
    const appointment = this.getAppointment(appointmentId);
    if (appointment.status === 'cancelled') {
      return appointment;
    }

    if (appointment.status === 'confirmed' && appointment.remote_event_id) {
      await this.deleteRemoteBestEffort(appointment.remote_event_id, appointment.id, 'remote_delete_failed');
    }

    const cancelled = this.store.cancel(appointmentId);
    logger.info(`Appointment ${appointmentId} cancelled`);
    return cancelled;
  }

  /** Releases Tentative holds older than the TTL. */
  reapStaleTentatives(): Appointment[] {
    const cutoff = new Date(this.clock().getTime() - this.tentativeTtlMs);
    const reaped = this.store.reapTentative(cutoff);
    for (const appointment of reaped) {
      logger.warn(`Reaped stale tentative hold ${appointment.id} at ${appointment.slot_start}`);
    }
    return reaped;
  }

  /**
   * Brings local state in line with the remote calendar for `range`. The
   * remote calendar is authoritative for Confirmed appointments and for
   * externally created events.
   */
  async periodicSync(range: DateRange, signal?: AbortSignal): Promise<SyncReport> {
    let remoteEvents: RemoteEvent[];
    try {
      remoteEvents = await this.calendar.listEvents(range, signal);
    } catch (error) {
      this.noteAuthFailure(error);
      throw error;
    }
    const remoteById = new Map<string, RemoteEvent>(remoteEvents.map((event) => [event.id, event]));
    const report: SyncReport = {
      remoteEvents: remoteEvents.length,
      cancelledMissing: [],
      blocksCreated: [],
      blocksReleased: [],
      orphansDeleted: [],
      deletesRetried: [],
    };

    const graceCutoff = this.clock().getTime() - this.syncGraceMs;
    const local = this.store.listInRange(range);
    const pendingIds = new Set<string>();
    const rolledBackIds = new Map<string, string>();

    for (const appointment of local) {
      if (appointment.status === 'tentative') {
        pendingIds.add(remoteEventIdFor(appointment.id));
      } else if (appointment.status === 'cancelled' && !appointment.remote_event_id) {
        rolledBackIds.set(remoteEventIdFor(appointment.id), appointment.id);
      }
    }

    for (const appointment of local) {
      if (appointment.status !== 'confirmed' || !appointment.remote_event_id) continue;
      // Skip anything that may still be racing an in-flight bookSlot.
      if (new Date(appointment.updated_at).getTime() > graceCutoff) continue;
      if (remoteById.has(appointment.remote_event_id)) continue;

      this.store.cancel(appointment.id);
      this.store.recordDrift('remote_event_missing', {
        appointmentId: appointment.id,
        remoteEventId: appointment.remote_event_id,
      });
      report.cancelledMissing.push(appointment.id);
      logger.warn(`Appointment ${appointment.id} lost its remote event, cancelled locally`);
    }

    for (const event of remoteEvents) {
      const owner = this.store.listByRemoteId(event.id);
      if (owner) {
        if (owner.status === 'cancelled' && (await this.deleteRemoteBestEffort(event.id, owner.id, null))) {
          report.deletesRetried.push(event.id);
        }
        continue;
      }
      if (pendingIds.has(event.id)) continue;

      const rolledBack = rolledBackIds.get(event.id);
      if (rolledBack) {
        // A create that landed after its booking was rolled back.
        if (await this.deleteRemoteBestEffort(event.id, rolledBack, null)) {
          report.orphansDeleted.push(event.id);
        }
        continue;
      }

      const existingBlock = this.store.getBlock(event.id);
      this.store.blockRemoteEvent(event);
      if (!existingBlock) {
        this.store.recordDrift('external_event', { remoteEventId: event.id });
        report.blocksCreated.push(event.id);
        logger.info(`Blocked ${event.start.toISOString()}-${event.end.toISOString()} for external event ${event.id}`);
      }
    }

    // The listing holds every event overlapping the range, so an unlisted block is gone remotely.
    for (const block of this.store.listBlocksInRange(range)) {
      if (remoteById.has(block.remote_event_id)) continue;
      this.store.releaseBlock(block.remote_event_id);
      report.blocksReleased.push(block.remote_event_id);
    }

    for (const drift of this.store.listOpenDrift('remote_delete_failed')) {
      if (!drift.remote_event_id || remoteById.has(drift.remote_event_id)) continue;
      const owner = this.store.listByRemoteId(drift.remote_event_id);
      if (!owner || overlaps(slotFromAppointment(owner), range)) {
        this.store.resolveDrift(drift.id);
      }
    }

    logger.info(
      `Sync ${range.start.toISOString()}..${range.end.toISOString()}: ` +
        `${report.cancelledMissing.length} cancelled, ${report.blocksCreated.length} blocked, ` +
        `${report.blocksReleased.length} released, ${report.orphansDeleted.length + report.deletesRetried.length} remote deletes`
    );
    return report;
  }
}
