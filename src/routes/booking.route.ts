import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { toErrorResponse } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { idempotencyKeyOf, validateIdempotencyKey } from '../middleware/idempotency.js';
import { IdempotencyService } from '../services/idempotency.service.js';
import { ReconciliationEngine } from '../services/reconciliation.service.js';
import { toAppointmentView, toSlotView } from '../services/booking-session.service.js';
import { ApiResponse, AppointmentView, BookingRequest, ErrorCode, SlotView } from '../types/index.js';

export interface BookingRouterDeps {
  engine: ReconciliationEngine;
  idempotency: IdempotencyService;
}

const bookingBodySchema = z.object({
  user_id: z.string().trim().min(1, 'user_id is required'),
  slot_start: z.string().datetime({ offset: true, message: 'slot_start must be an ISO 8601 datetime' }),
});

const rescheduleBodySchema = bookingBodySchema.pick({ slot_start: true });

const slotsQuerySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must use YYYY-MM-DD'),
});

const userQuerySchema = z.object({
  user_id: z.string().trim().min(1, 'user_id is required'),
});

/** Outcomes a client should retry with the same key, so they are not cached. */
const RETRYABLE_CODES = new Set<ErrorCode>([
  ErrorCode.TEMPORARILY_UNAVAILABLE,
  ErrorCode.BOOKING_IN_PROGRESS,
  ErrorCode.REMOTE_AUTH_ERROR,
  ErrorCode.INTERNAL_ERROR,
]);

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

/**
 * /api/appointments
 *
 * POST /book          Idempotency-Key: UUID, body { user_id, slot_start }
 *   201 confirmed appointment
 *   400 VALIDATION_ERROR | INVALID_SLOT
 *   409 SLOT_TAKEN | ACTIVE_APPOINTMENT_LIMIT | BOOKING_IN_PROGRESS
 *   422 IDEMPOTENCY_KEY_MISMATCH
 *   503 TEMPORARILY_UNAVAILABLE | REMOTE_AUTH_ERROR
 * GET /?user_id=      appointments of one user
 * GET /:id            one appointment
 * PATCH /:id          body { slot_start }; moves a confirmed appointment and
 *                     answers with its replacement (a new appointment id)
 * DELETE /:id         cancel
 */
export function createBookingRouter({ engine, idempotency }: BookingRouterDeps): Router {
  const router = Router();

  router.post(
    '/book',
    validateIdempotencyKey,
    asyncHandler(async (req, res) => {
      const idempotencyKey = idempotencyKeyOf(res);
      const body = bookingBodySchema.parse(req.body);
      const bookingRequest: BookingRequest = { user_id: body.user_id, slot_start: body.slot_start };

      const cached = idempotency.check<AppointmentView>(idempotencyKey, bookingRequest);
      if (cached.found) {
        if (cached.mismatch) {
          const response: ApiResponse = {
            success: false,
            error: {
              code: ErrorCode.IDEMPOTENCY_KEY_MISMATCH,
              message: 'This Idempotency-Key was already used with different request parameters',
              details: { hint: 'Generate a new Idempotency-Key for requests with different parameters' },
            },
          };
          res.status(422).json(response);
          return;
        }
        res.status(cached.status).json(cached.response);
        return;
      }

      try {
        const slot = engine.resolveSlot(new Date(body.slot_start));
        const appointment = await engine.bookSlot(body.user_id, slot, { bookingKey: idempotencyKey });
        const response: ApiResponse<AppointmentView> = { success: true, data: toAppointmentView(appointment) };
        idempotency.store(idempotencyKey, bookingRequest, 201, response);
        res.status(201).json(response);
      } catch (error) {
        const { status, body: errorBody } = toErrorResponse(error);
        if (status === 500) {
          logger.error('Unexpected error in booking endpoint:', error);
        }
        const code = errorBody.error?.code;
        if (code && !RETRYABLE_CODES.has(code)) {
          idempotency.store(idempotencyKey, bookingRequest, status, errorBody);
        }
        res.status(status).json(errorBody);
      }
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { user_id } = userQuerySchema.parse(req.query);
      const response: ApiResponse<AppointmentView[]> = {
        success: true,
        data: engine.listUserAppointments(user_id).map(toAppointmentView),
      };
      res.json(response);
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const response: ApiResponse<AppointmentView> = {
        success: true,
        data: toAppointmentView(engine.getAppointment(req.params.id)),
      };
      res.json(response);
    })
  );

  router.patch(
    '/:id',
    asyncHandler(async (req, res) => {
      const { slot_start } = rescheduleBodySchema.parse(req.body);
      const slot = engine.resolveSlot(new Date(slot_start));
      const moved = await engine.rescheduleAppointment(req.params.id, slot);
      const response: ApiResponse<AppointmentView> = { success: true, data: toAppointmentView(moved) };
      res.json(response);
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const cancelled = await engine.cancelAppointment(req.params.id);
      const response: ApiResponse<AppointmentView> = { success: true, data: toAppointmentView(cancelled) };
      res.json(response);
    })
  );

  return router;
}

/** GET /api/slots?date=YYYY-MM-DD */
export function createSlotsRouter(engine: ReconciliationEngine): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { date } = slotsQuerySchema.parse(req.query);
      const response: ApiResponse<{ date: string; slots: SlotView[] }> = {
        success: true,
        data: { date, slots: engine.listAvailableSlots(date).map(toSlotView) },
      };
      res.json(response);
    })
  );

  return router;
}
