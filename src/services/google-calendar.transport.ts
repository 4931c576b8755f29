import { google, calendar_v3 } from 'googleapis';
import { fromZonedTime } from 'date-fns-tz';
import {
  BookingError,
  NotFoundError,
  RemoteAuthError,
  RemoteDuplicateError,
  RemoteUnavailableError,
} from '../lib/errors.js';
import { DateRange, RemoteEvent } from '../types/index.js';
import { CalendarTransport, RemoteEventDraft } from './calendar.adapter.js';

/**
 * Everything needed to reach one calendar. Refreshing credentials means
 * building a new transport (and adapter) from a new value of this object.
 */
export interface CalendarCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  calendarId: string;
  accountEmail?: string;
}

const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded', 'quotaExceeded']);

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if ('response' in error) {
    const response = error.response;
    if (typeof response === 'object' && response !== null && 'status' in response) {
      if (typeof response.status === 'number') return response.status;
    }
  }
  if ('code' in error && typeof error.code === 'number') return error.code;
  if ('status' in error && typeof error.status === 'number') return error.status;
  return undefined;
}

function errorReasonsOf(error: unknown): string[] {
  if (typeof error !== 'object' || error === null || !('errors' in error)) return [];
  const errors = error.errors;
  if (!Array.isArray(errors)) return [];

  const reasons: string[] = [];
  for (const entry of errors) {
    if (typeof entry === 'object' && entry !== null && 'reason' in entry && typeof entry.reason === 'string') {
      reasons.push(entry.reason);
    }
  }
  return reasons;
}

/**
 * Maps a googleapis/gaxios failure onto the adapter's error taxonomy.
 */
export function classifyGoogleError(error: unknown, context: { eventId?: string } = {}): Error {
  if (error instanceof BookingError) return error;

  const status = httpStatusOf(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status === 401 || message.includes('invalid_grant')) {
    return new RemoteAuthError(`Calendar authentication failed: ${message}`);
  }
  if (status === 403) {
    if (errorReasonsOf(error).some((reason) => RATE_LIMIT_REASONS.has(reason))) {
      return new RemoteUnavailableError('Calendar rate limit exceeded', { status });
    }
    return new RemoteAuthError(`Calendar access denied: ${message}`);
  }
  if (status === 404 || status === 410) {
    return new NotFoundError(`Remote event not found: ${message}`, { event_id: context.eventId });
  }
  if (status === 409 && context.eventId) {
    return new RemoteDuplicateError(context.eventId);
  }
  if (status === 429 || (status !== undefined && status >= 500)) {
    return new RemoteUnavailableError(`Calendar service error: ${message}`, { status });
  }
  if (status === undefined) {
    return new RemoteUnavailableError(`Calendar unreachable: ${message}`);
  }
  return error instanceof Error ? error : new Error(message);
}

function toInstant(time: calendar_v3.Schema$EventDateTime | undefined, timeZone: string): Date | null {
  if (time?.dateTime) return new Date(time.dateTime);
  // All-day events carry a bare date; they occupy the whole clinic day.
  if (time?.date) return fromZonedTime(`${time.date}T00:00:00`, timeZone);
  return null;
}

/**
 * Projects an API event, or null for events that do not occupy time.
 */
export function toRemoteEvent(event: calendar_v3.Schema$Event, timeZone: string): RemoteEvent | null {
  if (!event.id || event.status === 'cancelled' || event.transparency === 'transparent') {
    return null;
  }
  const start = toInstant(event.start, timeZone);
  const end = toInstant(event.end, timeZone);
  if (!start || !end || end.getTime() <= start.getTime()) {
    return null;
  }
  return { id: event.id, start, end, summary: event.summary ?? '' };
}

export class GoogleCalendarTransport implements CalendarTransport {
  constructor(
    private readonly api: calendar_v3.Calendar,
    private readonly calendarId: string,
    private readonly timeZone: string
  ) {}

  async insertEvent(draft: RemoteEventDraft, signal?: AbortSignal): Promise<RemoteEvent> {
    const requestBody: calendar_v3.Schema$Event = {
      id: draft.id,
      summary: draft.summary,
      description: draft.description,
      start: { dateTime: draft.start.toISOString(), timeZone: this.timeZone },
      end: { dateTime: draft.end.toISOString(), timeZone: this.timeZone },
    };
    if (draft.attendeeEmail) {
      requestBody.attendees = [{ email: draft.attendeeEmail }];
    }

    try {
      const response = await this.api.events.insert(
        { calendarId: this.calendarId, requestBody },
        { signal }
      );
      return (
        toRemoteEvent(response.data, this.timeZone) ?? {
          id: draft.id,
          start: draft.start,
          end: draft.end,
          summary: draft.summary,
        }
      );
    } catch (error) {
      throw classifyGoogleError(error, { eventId: draft.id });
    }
  }

  async patchEvent(eventId: string, range: DateRange, signal?: AbortSignal): Promise<RemoteEvent> {
    const requestBody: calendar_v3.Schema$Event = {
      start: { dateTime: range.start.toISOString(), timeZone: this.timeZone },
      end: { dateTime: range.end.toISOString(), timeZone: this.timeZone },
    };

    try {
      const response = await this.api.events.patch({ calendarId: this.calendarId, eventId, requestBody }, { signal });
      return (
        toRemoteEvent(response.data, this.timeZone) ?? {
          id: eventId,
          start: range.start,
          end: range.end,
          summary: response.data.summary ?? '',
        }
      );
    } catch (error) {
      throw classifyGoogleError(error, { eventId });
    }
  }

  async deleteEvent(eventId: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.api.events.delete({ calendarId: this.calendarId, eventId }, { signal });
    } catch (error) {
      throw classifyGoogleError(error, { eventId });
    }
  }

  async listEvents(range: DateRange, signal?: AbortSignal): Promise<RemoteEvent[]> {
    const events: RemoteEvent[] = [];
    let pageToken: string | undefined;

    try {
      do {
        const response = await this.api.events.list(
          {
            calendarId: this.calendarId,
            timeMin: range.start.toISOString(),
            timeMax: range.end.toISOString(),
            singleEvents: true,
            orderBy: 'startTime',
            maxResults: 250,
            pageToken,
          },
          { signal }
        );
        for (const item of response.data.items ?? []) {
          const event = toRemoteEvent(item, this.timeZone);
          if (event) events.push(event);
        }
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      throw classifyGoogleError(error);
    }

    return events;
  }
}

export function createGoogleCalendarTransport(
  credentials: CalendarCredentials,
  timeZone: string
): GoogleCalendarTransport {
  const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
  auth.setCredentials({ refresh_token: credentials.refreshToken });

  const api = google.calendar({ version: 'v3', auth });
  return new GoogleCalendarTransport(api, credentials.calendarId, timeZone);
}
