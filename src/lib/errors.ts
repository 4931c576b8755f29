import { ZodError } from 'zod';
import { ApiResponse, ErrorCode, RemoteEvent } from '../types/index.js';

export class BookingError extends Error {
  public readonly code: ErrorCode;
  public readonly status: number;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, status: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class InvalidSlotError extends BookingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.INVALID_SLOT, 400, message, details);
  }
}

export class SlotConflictError extends BookingError {
  constructor(message = 'This time slot is already booked', details?: Record<string, unknown>) {
    super(ErrorCode.SLOT_TAKEN, 409, message, details);
  }
}

export class TemporarilyUnavailableError extends BookingError {
  constructor(message = 'The calendar is temporarily unavailable, please try again later') {
    super(ErrorCode.TEMPORARILY_UNAVAILABLE, 503, message);
  }
}

/** Fatal for the adapter instance: never retried, needs fresh credentials. */
export class RemoteAuthError extends BookingError {
  constructor(message = 'Calendar credentials were rejected') {
    super(ErrorCode.REMOTE_AUTH_ERROR, 503, message);
  }
}

/** Transient remote failure (network, rate limit, 5xx). */
export class RemoteUnavailableError extends BookingError {
  constructor(message = 'Calendar service is unavailable', details?: Record<string, unknown>) {
    super(ErrorCode.REMOTE_UNAVAILABLE, 503, message, details);
  }
}

/** Another remote event occupies the slot; `clash` is the first one found. */
export class RemoteConflictError extends BookingError {
  constructor(
    public readonly clash?: RemoteEvent,
    message = 'The remote calendar already has an event in this slot'
  ) {
    super(ErrorCode.REMOTE_CONFLICT, 409, message, clash ? { remote_event_id: clash.id } : undefined);
  }
}

/** Raised by a transport when an event with the requested id already exists. */
export class RemoteDuplicateError extends BookingError {
  constructor(eventId: string) {
    super(ErrorCode.REMOTE_CONFLICT, 409, `Remote event ${eventId} already exists`, { event_id: eventId });
  }
}

export class NotFoundError extends BookingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.NOT_FOUND, 404, message, details);
  }
}

export class InvalidConfigurationError extends BookingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.INVALID_CONFIGURATION, 500, message, details);
  }
}

export class ActiveAppointmentLimitError extends BookingError {
  constructor(limit: number) {
    super(
      ErrorCode.ACTIVE_APPOINTMENT_LIMIT,
      409,
      `You already have ${limit === 1 ? 'an active appointment' : `${limit} active appointments`}`,
      { limit }
    );
  }
}

export class BookingInProgressError extends BookingError {
  constructor(appointmentId: string) {
    super(ErrorCode.BOOKING_IN_PROGRESS, 409, 'A booking with this key is still being confirmed', {
      appointment_id: appointmentId,
    });
  }
}

export class OperationAbortedError extends BookingError {
  constructor(message = 'The operation was aborted') {
    super(ErrorCode.OPERATION_ABORTED, 499, message);
  }
}

/** Environment variables that failed validation, all reported together. */
export class ConfigurationError extends BookingError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(ErrorCode.INVALID_CONFIGURATION, 500, `Invalid environment configuration: ${problems.join('; ')}`, {
      problems,
    });
    this.problems = problems;
  }
}

/** Errors worth another attempt against the remote calendar. */
export function isTransientRemoteError(error: unknown): boolean {
  return error instanceof RemoteUnavailableError;
}

export interface ErrorResponse {
  status: number;
  body: ApiResponse;
}

/**
 * Maps any thrown value to an HTTP status and envelope. Unknown errors become
 * a generic 500 so internals never reach the client.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof BookingError) {
    return {
      status: error.status,
      body: { success: false, error: { code: error.code, message: error.message, details: error.details } },
    };
  }
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        success: false,
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Request validation failed',
          details: { issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
        },
      },
    };
  }
  if (error instanceof SyntaxError) {
    return {
      status: 400,
      body: { success: false, error: { code: ErrorCode.VALIDATION_ERROR, message: 'Request body is not valid JSON' } },
    };
  }
  return {
    status: 500,
    body: { success: false, error: { code: ErrorCode.INTERNAL_ERROR, message: 'An internal server error occurred' } },
  };
}
