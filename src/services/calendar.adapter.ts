import { createHash } from 'crypto';
import {
  NotFoundError,
  RemoteAuthError,
  RemoteConflictError,
  RemoteDuplicateError,
  isTransientRemoteError,
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy, Sleep, withRetry } from '../lib/retry.js';
import { overlaps } from '../lib/time.js';
import { DateRange, RemoteEvent, Slot } from '../types/index.js';

export interface RemoteEventDraft {
  id: string;
  start: Date;
  end: Date;
  summary: string;
  description: string;
  attendeeEmail?: string;
}

/**
 * Raw access to a calendar API. Implementations translate API failures into
 * RemoteUnavailableError (transient), RemoteAuthError, NotFoundError and
 * RemoteDuplicateError (insert of an id that already exists).
 */
export interface CalendarTransport {
  insertEvent(draft: RemoteEventDraft, signal?: AbortSignal): Promise<RemoteEvent>;
  /** Moves an existing event; NotFoundError when it is gone. */
  patchEvent(eventId: string, range: DateRange, signal?: AbortSignal): Promise<RemoteEvent>;
  deleteEvent(eventId: string, signal?: AbortSignal): Promise<void>;
  listEvents(range: DateRange, signal?: AbortSignal): Promise<RemoteEvent[]>;
}

export interface RemoteCalendar {
  createEvent(slot: Slot, description: string, idempotencyKey: string, signal?: AbortSignal): Promise<string>;
  updateEvent(remoteEventId: string, slot: Slot, signal?: AbortSignal): Promise<void>;
  deleteEvent(remoteEventId: string, signal?: AbortSignal): Promise<void>;
  listEvents(range: DateRange, signal?: AbortSignal): Promise<RemoteEvent[]>;
}

export interface RemoteCalendarAdapterOptions {
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  summary?: string;
  attendeeEmail?: string;
}

/**
 * Event id derived from an idempotency key. Lowercase hex is a subset of the
 * base32hex alphabet calendar APIs accept for client-chosen ids.
 */
export function remoteEventIdFor(idempotencyKey: string): string {
  return createHash('sha256').update(idempotencyKey).digest('hex').slice(0, 32);
}

export class RemoteCalendarAdapter implements RemoteCalendar {
  private readonly retryPolicy: RetryPolicy;
  private readonly summary: string;

  constructor(
    private readonly transport: CalendarTransport,
    private readonly options: RemoteCalendarAdapterOptions = {}
  ) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.summary = options.summary ?? 'Dental appointment';
  }

  /**
   * Creates the event for `slot` at most once per idempotency key. A retry
   * that finds its own event (an earlier attempt landed but the response was
   * lost) returns that event instead of inserting a second one.
   */
  async createEvent(
    slot: Slot,
    description: string,
    idempotencyKey: string,
    signal?: AbortSignal
  ): Promise<string> {
    const eventId = remoteEventIdFor(idempotencyKey);

    return this.call('createEvent', signal, async () => {
      const existing = await this.transport.listEvents({ start: slot.start, end: slot.end }, signal);

      if (existing.some((event) => event.id === eventId)) {
        logger.info(`Remote event ${eventId} already exists, reusing it`);
        return eventId;
      }

      const clash = existing.find((event) => overlaps(event, slot));
      if (clash) {
        throw new RemoteConflictError(clash);
      }

      try {
        const created = await this.transport.insertEvent(
          {
            id: eventId,
            start: slot.start,
            end: slot.end,
            summary: this.summary,
            description,
            attendeeEmail: this.options.attendeeEmail,
          },
          signal
        );
        logger.info(`Remote event created: ${created.id}`);
        return created.id;
      } catch (error) {
        if (error instanceof RemoteDuplicateError) {
          return eventId;
        }
        throw error;
      }
    });
  }

  /**
   * Moves an event to `slot`. Patching to the same times twice is harmless, so
   * retries need no extra bookkeeping.
   */
  async updateEvent(remoteEventId: string, slot: Slot, signal?: AbortSignal): Promise<void> {
    await this.call('updateEvent', signal, async () => {
      const existing = await this.transport.listEvents({ start: slot.start, end: slot.end }, signal);
      const clash = existing.find((event) => event.id !== remoteEventId && overlaps(event, slot));
      if (clash) {
        throw new RemoteConflictError(clash);
      }

      await this.transport.patchEvent(remoteEventId, { start: slot.start, end: slot.end }, signal);
      logger.info(`Remote event ${remoteEventId} moved to ${slot.start.toISOString()}`);
    });
  }

  /** Idempotent: an event that is already gone counts as deleted. */
  async deleteEvent(remoteEventId: string, signal?: AbortSignal): Promise<void> {
    await this.call('deleteEvent', signal, async () => {
      try {
        await this.transport.deleteEvent(remoteEventId, signal);
        logger.info(`Remote event deleted: ${remoteEventId}`);
      } catch (error) {
        if (error instanceof NotFoundError) {
          logger.warn(`Remote event ${remoteEventId} was already gone`);
          return;
        }
        throw error;
      }
    });
  }

  async listEvents(range: DateRange, signal?: AbortSignal): Promise<RemoteEvent[]> {
    return this.call('listEvents', signal, () => this.transport.listEvents(range, signal));
  }

  private async call<T>(name: string, signal: AbortSignal | undefined, operation: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(operation, {
        policy: this.retryPolicy,
        isRetryable: isTransientRemoteError,
        signal,
        sleep: this.options.sleep,
        onRetry: (error, attempt, delayMs) => {
          const reason = error instanceof Error ? error.message : String(error);
          logger.warn(`${name} attempt ${attempt} failed (${reason}), retrying in ${delayMs}ms`);
        },
      });
    } catch (error) {
      if (error instanceof RemoteAuthError) {
        logger.error(`${name} rejected by the calendar: credentials need refreshing`);
      }
      throw error;
    }
  }
}
