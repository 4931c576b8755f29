import { logger } from '../lib/logger.js';
import { addClinicDays, Clock, clinicDateOf, dayRange, systemClock } from '../lib/time.js';
import type { DateRange } from '../types/index.js';
import type { BookingSessionMachine } from './booking-session.service.js';
import type { ReconciliationEngine } from './reconciliation.service.js';

export interface MaintenanceOptions {
  timeZone: string;
  syncIntervalMs: number;
  syncWindowDays: number;
  reapIntervalMs?: number;
  sessionIntervalMs?: number;
  clock?: Clock;
}

type Job = () => Promise<unknown> | unknown;

/**
 * Background jobs: the tentative reaper, session expiry and periodic sync.
 * Each job is skipped while its previous run is still going.
 */
export class MaintenanceScheduler {
  private readonly timers: NodeJS.Timeout[] = [];
  private readonly running = new Set<string>();
  private readonly clock: Clock;
  private syncController: AbortController | null = null;

  constructor(
    private readonly engine: ReconciliationEngine,
    private readonly sessions: BookingSessionMachine,
    private readonly options: MaintenanceOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  start(): void {
    if (this.timers.length > 0) return;
    this.every('reaper', this.options.reapIntervalMs ?? 30_000, () => this.engine.reapStaleTentatives());
    this.every('sessions', this.options.sessionIntervalMs ?? 60_000, () => this.sessions.expireIdle());
    this.every('sync', this.options.syncIntervalMs, () => this.syncNow());
    logger.info('Background maintenance started');
  }

  stop(): void {
    for (const timer of this.timers) clearInterval(timer);
    this.timers.length = 0;
    this.syncController?.abort();
  }

  /** [today, today + window) in clinic days. */
  syncRange(): DateRange {
    const { timeZone, syncWindowDays } = this.options;
    const today = clinicDateOf(this.clock(), timeZone);
    return {
      start: dayRange(today, timeZone).start,
      end: dayRange(addClinicDays(today, syncWindowDays), timeZone).start,
    };
  }

  async syncNow(): Promise<void> {
    const controller = new AbortController();
    this.syncController = controller;
    try {
      await this.engine.periodicSync(this.syncRange(), controller.signal);
    } finally {
      this.syncController = null;
    }
  }

  /** Runs a job once, unless it is already running. Failures are logged. */
  async run(name: string, job: Job): Promise<void> {
    if (this.running.has(name)) {
      logger.debug(`Skipping ${name}: previous run still in progress`);
      return;
    }
    this.running.add(name);
    try {
      await job();
    } catch (error) {
      logger.error(`Background job ${name} failed:`, error);
    } finally {
      this.running.delete(name);
    }
  }

  private every(name: string, intervalMs: number, job: Job): void {
    const timer = setInterval(() => {
      void this.run(name, job);
    }, intervalMs);
    timer.unref();
    this.timers.push(timer);
  }
}
