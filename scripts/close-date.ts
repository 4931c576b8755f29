import dotenv from 'dotenv';
import { openDatabase } from '../src/db/sqlite.js';
import { logger } from '../src/lib/logger.js';
import { isClinicDate } from '../src/lib/time.js';
import { AvailabilityStore } from '../src/services/availability.store.js';

dotenv.config();

const USAGE = `Usage:
  npm run close-date -- <YYYY-MM-DD> [reason...]   close the clinic on a date
  npm run close-date -- --reopen <YYYY-MM-DD>      reopen a closed date
  npm run close-date -- --list                     list closed dates`;

function main(argv: string[]): number {
  const store = new AvailabilityStore(openDatabase(process.env.DATABASE_PATH || 'data/appointments.db'));
  const [first, ...rest] = argv;

  if (first === '--list') {
    const closed = store.listClosedDates();
    if (closed.length === 0) {
      logger.info('No closed dates');
    }
    for (const entry of closed) {
      logger.info(`${entry.date}${entry.reason ? ` (${entry.reason})` : ''}`);
    }
    return 0;
  }

  if (first === '--reopen') {
    const date = rest[0];
    if (!date || !isClinicDate(date)) {
      logger.error(USAGE);
      return 1;
    }
    logger.info(store.reopenDate(date) ? `Reopened ${date}` : `${date} was not closed`);
    return 0;
  }

  if (!first || !isClinicDate(first)) {
    logger.error(USAGE);
    return 1;
  }

  const reason = rest.join(' ').trim();
  store.closeDate(first, reason || undefined);
  logger.info(`Closed ${first}${reason ? `: ${reason}` : ''}. Already confirmed appointments are kept.`);
  return 0;
}

process.exitCode = main(process.argv.slice(2));
