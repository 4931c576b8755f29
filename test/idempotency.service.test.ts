import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase } from '../src/db/sqlite.js';
import { IdempotencyService } from '../src/services/idempotency.service.js';
import type { ApiResponse } from '../src/types/index.js';

const KEY = '7b0e9a52-3f7c-4a51-9d2e-5c1f0b8a6d34';
const REQUEST = { user_id: 'user-1', slot_start: '2026-03-03T07:00:00.000Z' };

describe('IdempotencyService', () => {
  let service: IdempotencyService;

  beforeEach(() => {
    service = new IdempotencyService(openDatabase(':memory:'));
  });

  it('knows nothing about a fresh key', () => {
    expect(service.check(KEY, REQUEST)).toEqual({ found: false });
  });

  it('replays the stored response for the same request', () => {
    const response: ApiResponse<{ appointment_id: string }> = { success: true, data: { appointment_id: 'a-1' } };
    service.store(KEY, REQUEST, 201, response);

    expect(service.check(KEY, REQUEST)).toEqual({ found: true, mismatch: false, status: 201, response });
  });

  it('matches the same instant written with a different offset', () => {
    service.store(KEY, REQUEST, 201, { success: true });

    const lookup = service.check(KEY, { user_id: 'user-1', slot_start: '2026-03-03T10:00:00+03:00' });

    expect(lookup.found && !lookup.mismatch).toBe(true);
  });

  it('flags reuse of a key for a different request', () => {
    service.store(KEY, REQUEST, 201, { success: true });

    expect(service.check(KEY, { ...REQUEST, user_id: 'user-2' })).toEqual({ found: true, mismatch: true });
  });

  it('keeps the first response for a key', () => {
    service.store(KEY, REQUEST, 201, { success: true });
    service.store(KEY, REQUEST, 409, { success: false });

    const lookup = service.check(KEY, REQUEST);
    expect(lookup).toMatchObject({ found: true, status: 201 });
  });
});
