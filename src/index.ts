import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { openDatabase } from './db/sqlite.js';
import { logger, setLogLevel } from './lib/logger.js';
import { AvailabilityStore } from './services/availability.store.js';
import { BookingSessionMachine } from './services/booking-session.service.js';
import { RemoteCalendarAdapter } from './services/calendar.adapter.js';
import { createGoogleCalendarTransport } from './services/google-calendar.transport.js';
import { IdempotencyService } from './services/idempotency.service.js';
import { MaintenanceScheduler } from './services/maintenance.service.js';
import { ReconciliationEngine } from './services/reconciliation.service.js';
import { ClinicSchedule } from './services/slot-catalog.js';

// Load environment variables
dotenv.config();

const config = loadConfig();
setLogLevel(config.logLevel);

const db = openDatabase(config.databasePath);
const store = new AvailabilityStore(db, { maxActivePerUser: config.maxActiveAppointmentsPerUser });
const schedule = new ClinicSchedule(
  config.weeklySchedule,
  config.slotDurationMinutes,
  config.timeZone,
  (date) => store.isClosed(date)
);

const calendar = new RemoteCalendarAdapter(createGoogleCalendarTransport(config.calendar, config.timeZone), {
  attendeeEmail: config.calendar.accountEmail,
});
const engine = new ReconciliationEngine(store, calendar, schedule, {
  syncGraceMs: config.syncGraceMs,
  tentativeTtlMs: config.tentativeTtlMs,
});
const sessions = new BookingSessionMachine(db, engine, {
  timeZone: config.timeZone,
  timeoutMs: config.sessionTimeoutMs,
});
const idempotency = new IdempotencyService(db);

const maintenance = new MaintenanceScheduler(engine, sessions, {
  timeZone: config.timeZone,
  syncIntervalMs: config.syncIntervalMs,
  syncWindowDays: config.syncWindowDays,
});

const app = createApp({ engine, sessions, idempotency });

const server = app.listen(config.port, () => {
  logger.info(`Clinic booking API listening on http://localhost:${config.port} (${config.timeZone})`);
  maintenance.start();
  void maintenance.run('sync', () => maintenance.syncNow());
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  maintenance.stop();
  server.close((error) => {
    if (error) {
      logger.error('Error while closing HTTP server:', error);
    }
    db.close();
    process.exit(error ? 1 : 0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
