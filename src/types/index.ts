export type AppointmentStatus = 'tentative' | 'confirmed' | 'cancelled';

/**
 * A fixed-duration bookable interval, half-open: [start, end).
 */
export interface Slot {
  readonly start: Date;
  readonly end: Date;
  readonly durationMinutes: number;
}

export interface DateRange {
  start: Date;
  end: Date;
}

export interface Appointment {
  id: string;
  user_id: string;
  slot_start: string;
  slot_end: string;
  status: AppointmentStatus;
  remote_event_id: string | null;
  booking_key: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Projection of an event living in the remote calendar. Never authoritative locally.
 */
export interface RemoteEvent {
  id: string;
  start: Date;
  end: Date;
  summary: string;
}

export interface BlockedSlot {
  remote_event_id: string;
  slot_start: string;
  slot_end: string;
  summary: string;
  created_at: string;
}

export type DriftKind = 'remote_event_missing' | 'remote_delete_failed' | 'external_event';

export interface DriftRecord {
  id: number;
  kind: DriftKind;
  appointment_id: string | null;
  remote_event_id: string | null;
  detected_at: string;
  resolved_at: string | null;
}

export interface ClosedDate {
  date: string;
  reason: string | null;
}

/** Clinic-local "HH:mm" times. */
export interface WorkingHours {
  start: string;
  end: string;
}

/** Keyed by ISO weekday (1 = Monday … 7 = Sunday); null means closed. */
export type WeeklySchedule = Record<number, WorkingHours | null>;

export interface IdempotencyRecord {
  idempotency_key: string;
  request_hash: string;
  response_status: number;
  response_body: string;
  created_at: string;
}

export interface BookingRequest {
  user_id: string;
  slot_start: string;
}

export enum ErrorCode {
  SLOT_TAKEN = 'SLOT_TAKEN',
  INVALID_SLOT = 'INVALID_SLOT',
  TEMPORARILY_UNAVAILABLE = 'TEMPORARILY_UNAVAILABLE',
  REMOTE_AUTH_ERROR = 'REMOTE_AUTH_ERROR',
  REMOTE_UNAVAILABLE = 'REMOTE_UNAVAILABLE',
  REMOTE_CONFLICT = 'REMOTE_CONFLICT',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  ACTIVE_APPOINTMENT_LIMIT = 'ACTIVE_APPOINTMENT_LIMIT',
  BOOKING_IN_PROGRESS = 'BOOKING_IN_PROGRESS',
  OPERATION_ABORTED = 'OPERATION_ABORTED',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  MISSING_IDEMPOTENCY_KEY = 'MISSING_IDEMPOTENCY_KEY',
  IDEMPOTENCY_KEY_MISMATCH = 'IDEMPOTENCY_KEY_MISMATCH',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface SlotView {
  start: string;
  end: string;
  duration_minutes: number;
}

export interface AppointmentView {
  appointment_id: string;
  user_id: string;
  slot_start: string;
  slot_end: string;
  status: AppointmentStatus;
  remote_event_id: string | null;
}
