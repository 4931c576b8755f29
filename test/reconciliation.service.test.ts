import { describe, it, expect, beforeEach } from 'vitest';
import {
  ActiveAppointmentLimitError,
  BookingInProgressError,
  InvalidSlotError,
  NotFoundError,
  OperationAbortedError,
  RemoteAuthError,
  RemoteUnavailableError,
  SlotConflictError,
  TemporarilyUnavailableError,
} from '../src/lib/errors.js';
import { dayRange } from '../src/lib/time.js';
import { RemoteCalendarAdapter, remoteEventIdFor } from '../src/services/calendar.adapter.js';
import type { Appointment, Slot } from '../src/types/index.js';
import { at, BOOKING_DATE, createTestContext, TestContext, TIME_ZONE } from './helpers/context.js';
import { FakeCalendarTransport, noSleep } from './helpers/fake-calendar.js';

const RANGE = dayRange(BOOKING_DATE, TIME_ZONE);

describe('ReconciliationEngine', () => {
  let ctx: TestContext;
  let slot: Slot;

  beforeEach(() => {
    ctx = createTestContext();
    slot = ctx.engine.resolveSlot(at('10:00'));
  });

  describe('listAvailableSlots', () => {
    it('lists every future slot of a free working day', () => {
      const slots = ctx.engine.listAvailableSlots(BOOKING_DATE);

      expect(slots).toHaveLength(16);
      expect(slots[0].start).toEqual(at('09:00'));
    });

    it('omits slots that have started or are taken', async () => {
      await ctx.engine.bookSlot('user-1', ctx.engine.resolveSlot(at('14:00')));
      ctx.clock.set(at('12:00'));

      const starts = ctx.engine.listAvailableSlots(BOOKING_DATE).map((s) => s.start.toISOString());

      expect(starts).toEqual(
        ['12:30', '13:00', '13:30', '14:30', '15:00', '15:30', '16:00', '16:30'].map((t) => at(t).toISOString())
      );
    });

    it('is empty on closed dates and weekends', () => {
      ctx.store.closeDate(BOOKING_DATE, 'Holiday');

      expect(ctx.engine.listAvailableSlots(BOOKING_DATE)).toEqual([]);
      expect(ctx.engine.listAvailableSlots('2026-03-07')).toEqual([]);
    });

    it('rejects malformed dates', () => {
      expect(() => ctx.engine.listAvailableSlots('03/03/2026')).toThrow(InvalidSlotError);
    });
  });

  describe('resolveSlot', () => {
    it('rejects times that are not catalog slots', () => {
      expect(() => ctx.engine.resolveSlot(at('10:15'))).toThrow(InvalidSlotError);
      expect(() => ctx.engine.resolveSlot(at('18:00'))).toThrow(InvalidSlotError);
      expect(() => ctx.engine.resolveSlot(new Date('nope'))).toThrow(InvalidSlotError);
    });
  });

  describe('bookSlot', () => {
    it('confirms an appointment backed by a remote event', async () => {
      const appointment = await ctx.engine.bookSlot('user-1', slot);

      expect(appointment.status).toBe('confirmed');
      expect(appointment.remote_event_id).toBe(remoteEventIdFor(appointment.id));
      expect(ctx.transport.events.has(remoteEventIdFor(appointment.id))).toBe(true);
      expect(ctx.transport.drafts[0].description).toBe(
        `Patient: user-1\nBooking reference: ${appointment.id}`
      );
      expect(ctx.store.isFree(slot)).toBe(false);
    });

    it('gives a contested slot to exactly one of two concurrent bookings', async () => {
      const results = await Promise.allSettled([
        ctx.engine.bookSlot('user-1', slot),
        ctx.engine.bookSlot('user-2', slot),
      ]);

      const confirmed = results.filter((result) => result.status === 'fulfilled');
      const rejected = results.filter(
        (result) => result.status === 'rejected' && result.reason instanceof SlotConflictError
      );
      expect(confirmed).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(ctx.transport.events.size).toBe(1);
      expect(ctx.engine.listUserAppointments('user-2')).toEqual([]);
    });

    it('rolls back and reports TemporarilyUnavailable when the calendar stays down', async () => {
      ctx.transport.failNext('list', new RemoteUnavailableError(), 5);

      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toBeInstanceOf(TemporarilyUnavailableError);

      const [appointment] = ctx.engine.listUserAppointments('user-1');
      expect(appointment.status).toBe('cancelled');
      expect(appointment.remote_event_id).toBeNull();
      expect(ctx.store.isFree(slot)).toBe(true);
      expect(ctx.transport.calls.list).toBe(5);
      expect(ctx.transport.events.size).toBe(0);
    });

    it('succeeds when the calendar recovers within the retry budget', async () => {
      ctx.transport.failNext('list', new RemoteUnavailableError(), 4);

      const appointment = await ctx.engine.bookSlot('user-1', slot);

      expect(appointment.status).toBe('confirmed');
    });

    it('turns a remote clash into SlotConflict and frees the hold', async () => {
      ctx.transport.addExternal('external-1', at('10:00'), at('11:00'));

      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toBeInstanceOf(SlotConflictError);

      expect(ctx.engine.listUserAppointments('user-1')[0].status).toBe('cancelled');
      expect(ctx.transport.events.size).toBe(1);
      expect(ctx.store.getBlock('external-1')).toBeDefined();
      expect(ctx.engine.listAvailableSlots(BOOKING_DATE)).toHaveLength(14);
    });

    it('reclaims a slot whose cancelled appointment still has its remote event', async () => {
      const first = await ctx.engine.bookSlot('user-1', slot);
      ctx.transport.failNext('delete', new RemoteUnavailableError(), 5);
      await ctx.engine.cancelAppointment(first.id);
      expect(ctx.transport.events.has(remoteEventIdFor(first.id))).toBe(true);

      const second = await ctx.engine.bookSlot('user-2', slot);

      expect(second.status).toBe('confirmed');
      expect([...ctx.transport.events.keys()]).toEqual([remoteEventIdFor(second.id)]);
      expect(ctx.store.listOpenDrift('remote_delete_failed')).toEqual([]);
    });

    it('reclaims a slot held by the late event of a rolled-back booking', async () => {
      ctx.transport.failNext('list', new RemoteUnavailableError(), 5);
      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toBeInstanceOf(TemporarilyUnavailableError);
      const [rolledBack] = ctx.engine.listUserAppointments('user-1');
      ctx.transport.addExternal(remoteEventIdFor(rolledBack.id), at('10:00'), at('10:30'), 'Dental appointment');

      const appointment = await ctx.engine.bookSlot('user-1', slot);

      expect([...ctx.transport.events.keys()]).toEqual([remoteEventIdFor(appointment.id)]);
      expect(ctx.store.listBlocksInRange(RANGE)).toEqual([]);
    });

    it('fails fast on a locally taken slot without calling the calendar', async () => {
      ctx.store.reserveTentative(slot, 'user-2');

      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toBeInstanceOf(SlotConflictError);
      expect(ctx.transport.calls.list).toBe(0);
    });

    it('enforces one upcoming appointment per user', async () => {
      await ctx.engine.bookSlot('user-1', slot);

      await expect(ctx.engine.bookSlot('user-1', ctx.engine.resolveSlot(at('11:00')))).rejects.toBeInstanceOf(
        ActiveAppointmentLimitError
      );
      expect(ctx.transport.calls.list).toBe(1);
    });

    it('rejects slots in the past', async () => {
      ctx.clock.set(at('10:00'));

      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toBeInstanceOf(InvalidSlotError);
    });

    it('rejects slots that are not in the catalog', async () => {
      const odd: Slot = { start: at('10:15'), end: at('10:45'), durationMinutes: 30 };

      await expect(ctx.engine.bookSlot('user-1', odd)).rejects.toBeInstanceOf(InvalidSlotError);
    });

    it('returns the same appointment for a repeated booking key', async () => {
      const first = await ctx.engine.bookSlot('user-1', slot, { bookingKey: 'key-1' });
      const second = await ctx.engine.bookSlot('user-1', slot, { bookingKey: 'key-1' });

      expect(second.id).toBe(first.id);
      expect(ctx.transport.calls.insert).toBe(1);
    });

    it('reports a booking key whose hold is still pending', async () => {
      ctx.store.reserveTentative(slot, 'user-1', { bookingKey: 'key-1' });

      await expect(ctx.engine.bookSlot('user-1', slot, { bookingKey: 'key-1' })).rejects.toBeInstanceOf(
        BookingInProgressError
      );
    });

    it('removes the remote event when the hold was reaped mid-flight', async () => {
      ctx.transport.afterInsert = () => {
        ctx.clock.advance(121_000);
        ctx.engine.reapStaleTentatives();
      };

      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toThrow(
        'Your reservation expired before it could be confirmed'
      );

      expect(ctx.transport.events.size).toBe(0);
      expect(ctx.engine.listUserAppointments('user-1')[0].status).toBe('cancelled');
    });

    it('rolls back and removes the remote event when aborted mid-flight', async () => {
      const controller = new AbortController();
      ctx.transport.afterInsert = () => controller.abort();

      await expect(ctx.engine.bookSlot('user-1', slot, { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationAbortedError
      );

      expect(ctx.transport.events.size).toBe(0);
      expect(ctx.store.isFree(slot)).toBe(true);
    });

    it('degrades after an auth failure until a new adapter is installed', async () => {
      ctx.transport.failNext('insert', new RemoteAuthError());

      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toBeInstanceOf(RemoteAuthError);
      expect(ctx.engine.degraded).toBe(true);
      expect(ctx.store.isFree(slot)).toBe(true);

      const listedBefore = ctx.transport.calls.list;
      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toBeInstanceOf(RemoteAuthError);
      expect(ctx.transport.calls.list).toBe(listedBefore);

      const refreshed = new FakeCalendarTransport();
      ctx.engine.useCalendar(new RemoteCalendarAdapter(refreshed, { sleep: noSleep }));

      expect(ctx.engine.degraded).toBe(false);
      expect((await ctx.engine.bookSlot('user-1', slot)).status).toBe('confirmed');
      expect(refreshed.events.size).toBe(1);
    });
  });

  describe('cancelAppointment', () => {
    it('deletes the remote event and frees the slot', async () => {
      const appointment = await ctx.engine.bookSlot('user-1', slot);

      const cancelled = await ctx.engine.cancelAppointment(appointment.id);

      expect(cancelled.status).toBe('cancelled');
      expect(ctx.transport.events.size).toBe(0);
      expect(ctx.store.isFree(slot)).toBe(true);
    });

    it('is idempotent', async () => {
      const appointment = await ctx.engine.bookSlot('user-1', slot);
      await ctx.engine.cancelAppointment(appointment.id);

      const again = await ctx.engine.cancelAppointment(appointment.id);

      expect(again.status).toBe('cancelled');
      expect(ctx.transport.calls.delete).toBe(1);
    });

    it('cancels locally and records drift when the remote delete fails', async () => {
      const appointment = await ctx.engine.bookSlot('user-1', slot);
      ctx.transport.failNext('delete', new RemoteUnavailableError(), 5);

      const cancelled = await ctx.engine.cancelAppointment(appointment.id);

      expect(cancelled.status).toBe('cancelled');
      expect(ctx.transport.events.size).toBe(1);
      expect(ctx.store.listOpenDrift('remote_delete_failed')).toHaveLength(1);
    });

    it('reports unknown appointments', async () => {
      await expect(ctx.engine.cancelAppointment('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('degrades when the calendar rejects the delete', async () => {
      const appointment = await ctx.engine.bookSlot('user-1', slot);
      ctx.transport.failNext('delete', new RemoteAuthError());

      const cancelled = await ctx.engine.cancelAppointment(appointment.id);

      expect(cancelled.status).toBe('cancelled');
      expect(ctx.engine.degraded).toBe(true);
      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toBeInstanceOf(RemoteAuthError);
    });
  });

  describe('rescheduleAppointment', () => {
    let original: Appointment;
    let later: Slot;

    beforeEach(async () => {
      original = await ctx.engine.bookSlot('user-1', slot);
      later = ctx.engine.resolveSlot(at('14:00'));
    });

    it('moves the remote event and hands it to the new appointment', async () => {
      const moved = await ctx.engine.rescheduleAppointment(original.id, later);

      expect(moved).toMatchObject({
        user_id: 'user-1',
        status: 'confirmed',
        slot_start: at('14:00').toISOString(),
        remote_event_id: original.remote_event_id,
      });
      expect(ctx.engine.getAppointment(original.id)).toMatchObject({ status: 'cancelled', remote_event_id: null });
      expect(ctx.transport.events.size).toBe(1);
      expect(ctx.transport.events.get(remoteEventIdFor(original.id))?.start).toEqual(at('14:00'));
      expect(ctx.store.isFree(slot)).toBe(true);
      expect(ctx.store.isFree(later)).toBe(false);
    });

    it('leaves the moved event alone on the next sync', async () => {
      const moved = await ctx.engine.rescheduleAppointment(original.id, later);
      ctx.clock.advance(61_000);

      const report = await ctx.engine.periodicSync(RANGE);

      expect(report).toMatchObject({ cancelledMissing: [], blocksCreated: [], orphansDeleted: [], deletesRetried: [] });
      expect(ctx.engine.getAppointment(moved.id).status).toBe('confirmed');
      expect(ctx.transport.events.size).toBe(1);
    });

    it('keeps the original appointment when the calendar stays down', async () => {
      ctx.transport.failNext('list', new RemoteUnavailableError(), 5);

      await expect(ctx.engine.rescheduleAppointment(original.id, later)).rejects.toBeInstanceOf(
        TemporarilyUnavailableError
      );

      expect(ctx.engine.getAppointment(original.id)).toEqual(original);
      expect(ctx.transport.events.get(remoteEventIdFor(original.id))?.start).toEqual(at('10:00'));
      expect(ctx.store.isFree(later)).toBe(true);
    });

    it('turns a remote clash at the new time into SlotConflict', async () => {
      ctx.transport.addExternal('external-1', at('14:00'), at('14:30'));

      await expect(ctx.engine.rescheduleAppointment(original.id, later)).rejects.toBeInstanceOf(SlotConflictError);

      expect(ctx.engine.getAppointment(original.id).status).toBe('confirmed');
      expect(ctx.transport.calls.patch).toBe(0);
      expect(ctx.store.isFree(later)).toBe(false);
    });

    it('fails fast when the new time is taken locally', async () => {
      await ctx.engine.bookSlot('user-2', later);

      await expect(ctx.engine.rescheduleAppointment(original.id, later)).rejects.toBeInstanceOf(SlotConflictError);
      expect(ctx.transport.calls.patch).toBe(0);
    });

    it('moves the event back when aborted after the move landed', async () => {
      const controller = new AbortController();
      ctx.transport.afterPatch = () => {
        ctx.transport.afterPatch = undefined;
        controller.abort();
      };

      await expect(
        ctx.engine.rescheduleAppointment(original.id, later, { signal: controller.signal })
      ).rejects.toBeInstanceOf(OperationAbortedError);

      expect(ctx.transport.calls.patch).toBe(2);
      expect(ctx.transport.events.get(remoteEventIdFor(original.id))?.start).toEqual(at('10:00'));
      expect(ctx.engine.getAppointment(original.id).status).toBe('confirmed');
      expect(ctx.store.isFree(later)).toBe(true);
    });

    it('only moves confirmed appointments to a different time', async () => {
      await expect(ctx.engine.rescheduleAppointment(original.id, slot)).rejects.toBeInstanceOf(InvalidSlotError);

      await ctx.engine.cancelAppointment(original.id);
      await expect(ctx.engine.rescheduleAppointment(original.id, later)).rejects.toBeInstanceOf(InvalidSlotError);
      await expect(ctx.engine.rescheduleAppointment('missing', later)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('periodicSync', () => {
    it('blocks slots taken by events created outside the system', async () => {
      ctx.transport.addExternal('external-1', at('11:00'), at('11:30'));

      const report = await ctx.engine.periodicSync(RANGE);

      expect(report.blocksCreated).toEqual(['external-1']);
      expect(ctx.store.isFree(ctx.engine.resolveSlot(at('11:00')))).toBe(false);
      expect(ctx.engine.listAvailableSlots(BOOKING_DATE)).toHaveLength(15);
      expect(ctx.store.listOpenDrift('external_event')).toHaveLength(1);
    });

    it('records an external event once and releases it when it disappears', async () => {
      ctx.transport.addExternal('external-1', at('11:00'), at('11:30'));
      await ctx.engine.periodicSync(RANGE);

      const second = await ctx.engine.periodicSync(RANGE);
      expect(second.blocksCreated).toEqual([]);
      expect(ctx.store.listOpenDrift('external_event')).toHaveLength(1);

      ctx.transport.events.delete('external-1');
      const third = await ctx.engine.periodicSync(RANGE);

      expect(third.blocksReleased).toEqual(['external-1']);
      expect(ctx.engine.listAvailableSlots(BOOKING_DATE)).toHaveLength(16);
    });

    it('cancels confirmed appointments whose remote event vanished, after the grace period', async () => {
      const appointment = await ctx.engine.bookSlot('user-1', slot);
      ctx.transport.events.clear();

      const early = await ctx.engine.periodicSync(RANGE);
      expect(early.cancelledMissing).toEqual([]);
      expect(ctx.engine.getAppointment(appointment.id).status).toBe('confirmed');

      ctx.clock.advance(61_000);
      const late = await ctx.engine.periodicSync(RANGE);

      expect(late.cancelledMissing).toEqual([appointment.id]);
      expect(ctx.engine.getAppointment(appointment.id).status).toBe('cancelled');
      expect(ctx.store.listOpenDrift('remote_event_missing')).toHaveLength(1);
      expect(ctx.store.isFree(slot)).toBe(true);
    });

    it('does not block events belonging to confirmed or pending bookings', async () => {
      await ctx.engine.bookSlot('user-1', slot);
      const hold = ctx.store.reserveTentative(ctx.engine.resolveSlot(at('12:00')), 'user-2');
      ctx.transport.addExternal(remoteEventIdFor(hold.id), at('12:00'), at('12:30'), 'Dental appointment');

      const report = await ctx.engine.periodicSync(RANGE);

      expect(report.blocksCreated).toEqual([]);
      expect(ctx.store.listBlocksInRange(RANGE)).toEqual([]);
    });

    it('deletes events left behind by rolled-back bookings', async () => {
      ctx.transport.failNext('list', new RemoteUnavailableError(), 5);
      await expect(ctx.engine.bookSlot('user-1', slot)).rejects.toBeInstanceOf(TemporarilyUnavailableError);
      const [rolledBack] = ctx.engine.listUserAppointments('user-1');
      const orphanId = remoteEventIdFor(rolledBack.id);
      ctx.transport.addExternal(orphanId, at('10:00'), at('10:30'), 'Dental appointment');

      const report = await ctx.engine.periodicSync(RANGE);

      expect(report.orphansDeleted).toEqual([orphanId]);
      expect(report.blocksCreated).toEqual([]);
      expect(ctx.transport.events.size).toBe(0);
      expect(ctx.store.isFree(slot)).toBe(true);
    });

    it('retries remote deletes that failed during cancellation', async () => {
      const appointment = await ctx.engine.bookSlot('user-1', slot);
      ctx.transport.failNext('delete', new RemoteUnavailableError(), 5);
      await ctx.engine.cancelAppointment(appointment.id);

      const report = await ctx.engine.periodicSync(RANGE);

      expect(report.deletesRetried).toEqual([appointment.remote_event_id]);
      expect(ctx.transport.events.size).toBe(0);
      expect(ctx.store.listOpenDrift('remote_delete_failed')).toEqual([]);
    });

    it('degrades when the calendar rejects the listing', async () => {
      ctx.transport.failNext('list', new RemoteAuthError());

      await expect(ctx.engine.periodicSync(RANGE)).rejects.toBeInstanceOf(RemoteAuthError);
      expect(ctx.engine.degraded).toBe(true);
    });
  });

  describe('reapStaleTentatives', () => {
    it('releases holds older than two minutes', () => {
      const hold = ctx.store.reserveTentative(slot, 'user-1');

      ctx.clock.advance(119_000);
      expect(ctx.engine.reapStaleTentatives()).toEqual([]);

      ctx.clock.advance(2_000);
      expect(ctx.engine.reapStaleTentatives().map((appointment) => appointment.id)).toEqual([hold.id]);
      expect(ctx.store.isFree(slot)).toBe(true);
    });
  });
});
