import type Database from 'better-sqlite3';
import { createHash } from 'crypto';
import type { SqliteDatabase } from '../db/sqlite.js';
import { logger } from '../lib/logger.js';
import { ApiResponse, BookingRequest, IdempotencyRecord } from '../types/index.js';

export type IdempotencyLookup<T> =
  | { found: false }
  | { found: true; mismatch: true }
  | { found: true; mismatch: false; status: number; response: ApiResponse<T> };

/**
 * Response cache keyed by the client's Idempotency-Key, so a retried booking
 * request replays the first answer instead of booking again.
 */
export class IdempotencyService {
  private readonly getKey: Database.Statement<[string], IdempotencyRecord>;
  private readonly insertKey: Database.Statement<[string, string, number, string]>;

  constructor(db: SqliteDatabase) {
    this.getKey = db.prepare<[string], IdempotencyRecord>(`
      SELECT * FROM idempotency_keys WHERE idempotency_key = ?
    `);
    this.insertKey = db.prepare<[string, string, number, string]>(`
      INSERT OR IGNORE INTO idempotency_keys (idempotency_key, request_hash, response_status, response_body)
      VALUES (?, ?, ?, ?)
    `);
  }

  /**
   * Hash of the request body for idempotency comparison
   */
  private hashRequest(request: BookingRequest): string {
    const start = new Date(request.slot_start);
    const normalized = JSON.stringify({
      user_id: request.user_id,
      slot_start: isNaN(start.getTime()) ? request.slot_start : start.toISOString(),
    });
    return createHash('sha256').update(normalized).digest('hex');
  }

  check<T>(idempotencyKey: string, request: BookingRequest): IdempotencyLookup<T> {
    const row = this.getKey.get(idempotencyKey);
    if (!row) {
      return { found: false };
    }
    if (row.request_hash !== this.hashRequest(request)) {
      return { found: true, mismatch: true };
    }
    const response: ApiResponse<T> = JSON.parse(row.response_body);
    return { found: true, mismatch: false, status: row.response_status, response };
  }

  store<T>(idempotencyKey: string, request: BookingRequest, status: number, response: ApiResponse<T>): void {
    try {
      this.insertKey.run(idempotencyKey, this.hashRequest(request), status, JSON.stringify(response));
    } catch (error) {
      logger.error('Failed to store idempotency key:', error);
    }
  }
}
