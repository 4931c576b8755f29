import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RemoteUnavailableError } from '../src/lib/errors.js';
import { BookingSessionMachine } from '../src/services/booking-session.service.js';
import { MaintenanceScheduler } from '../src/services/maintenance.service.js';
import { at, createTestContext, TestContext, TIME_ZONE } from './helpers/context.js';

describe('MaintenanceScheduler', () => {
  let ctx: TestContext;
  let scheduler: MaintenanceScheduler;

  beforeEach(() => {
    ctx = createTestContext();
    const sessions = new BookingSessionMachine(ctx.db, ctx.engine, { clock: ctx.clock.now, timeZone: TIME_ZONE });
    scheduler = new MaintenanceScheduler(ctx.engine, sessions, {
      timeZone: TIME_ZONE,
      syncIntervalMs: 300_000,
      syncWindowDays: 14,
      clock: ctx.clock.now,
    });
  });

  it('syncs from the start of the clinic day over the configured window', () => {
    expect(scheduler.syncRange()).toEqual({
      start: new Date('2026-03-01T21:00:00.000Z'),
      end: new Date('2026-03-15T21:00:00.000Z'),
    });
  });

  it('picks up external events across the whole window', async () => {
    ctx.transport.addExternal('external-1', at('11:00', '2026-03-13'), at('12:00', '2026-03-13'));

    await scheduler.syncNow();

    expect(ctx.store.getBlock('external-1')).toBeDefined();
  });

  it('logs job failures instead of throwing', async () => {
    ctx.transport.failNext('list', new RemoteUnavailableError(), 5);

    await expect(scheduler.run('sync', () => scheduler.syncNow())).resolves.toBeUndefined();
  });

  it('skips a job while its previous run is still going', async () => {
    let release: () => void = () => {};
    const job = vi.fn(async () => {});
    job.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );

    const first = scheduler.run('sync', job);
    await scheduler.run('sync', job);
    release();
    await first;
    await scheduler.run('sync', job);

    expect(job).toHaveBeenCalledTimes(2);
  });

  it('runs the reaper on its interval', async () => {
    vi.useFakeTimers();
    try {
      const hold = ctx.store.reserveTentative(ctx.engine.resolveSlot(at('10:00')), 'user-1');
      ctx.clock.advance(121_000);

      scheduler.start();
      await vi.advanceTimersByTimeAsync(30_000);
      scheduler.stop();

      expect(ctx.store.get(hold.id)?.status).toBe('cancelled');
    } finally {
      vi.useRealTimers();
    }
  });
});
