import { setTimeout as delay } from 'node:timers/promises';
import { OperationAbortedError } from './errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  factor: 2,
  maxDelayMs: 30_000,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  policy?: RetryPolicy;
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Delay before the attempt following `attempt` (1-based).
 */
export function backoffDelay(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  const raw = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new OperationAbortedError();
    }
    throw error;
  }
};

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationAbortedError();
  }
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const sleep = options.sleep ?? abortableSleep;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await operation(attempt);
    } catch (error) {
      // An abort mid-request surfaces as whatever the client throws; report it as an abort.
      throwIfAborted(options.signal);
      if (attempt >= policy.maxAttempts || !options.isRetryable(error)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, policy);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
