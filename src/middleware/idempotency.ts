import { Request, Response, NextFunction } from 'express';
import { validate as isUuid } from 'uuid';
import { ApiResponse, ErrorCode } from '../types/index.js';

/**
 * Requires an Idempotency-Key header holding a UUID. Clients reuse the same
 * key when retrying one booking and generate a new one for the next.
 */
export function validateIdempotencyKey(req: Request, res: Response, next: NextFunction): void {
  const idempotencyKey = req.get('Idempotency-Key');

  if (!idempotencyKey) {
    const response: ApiResponse = {
      success: false,
      error: {
        code: ErrorCode.MISSING_IDEMPOTENCY_KEY,
        message: 'Idempotency-Key header is required for this endpoint',
        details: {
          hint: 'Generate a unique UUID for each distinct booking request. Reuse the same key when retrying.',
        },
      },
    };
    res.status(400).json(response);
    return;
  }

  if (!isUuid(idempotencyKey)) {
    const response: ApiResponse = {
      success: false,
      error: {
        code: ErrorCode.MISSING_IDEMPOTENCY_KEY,
        message: 'Idempotency-Key must be a valid UUID',
        details: { received: idempotencyKey },
      },
    };
    res.status(400).json(response);
    return;
  }

  res.locals.idempotencyKey = idempotencyKey.toLowerCase();
  next();
}

/** The key stored by validateIdempotencyKey. */
export function idempotencyKeyOf(res: Response): string {
  const key: unknown = res.locals.idempotencyKey;
  if (typeof key !== 'string') {
    throw new Error('validateIdempotencyKey must run before this handler');
  }
  return key;
}
