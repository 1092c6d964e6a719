'use strict';

import { TransientPlatformError, classifyPlatformError } from './errors';
import type { PlatformError } from './errors';
import type { Logger } from './logger';
import type { ActionKind, ActionOutcome } from './types';

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 4000,
};

export interface RetryRunner {
  readonly retry: RetryPolicy;
  readonly logger: Logger;
  readonly sleep: (ms: number) => Promise<void>;
}

export type RetryResult<T> =
  | { readonly status: 'ok'; readonly value: T; readonly attempts: number }
  | { readonly status: 'failed'; readonly error: PlatformError; readonly attempts: number };

/** Exponential backoff; a server-supplied `retry-after` wins when longer, both capped. */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy, retryAfterMs: number | null = null): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(exponential, retryAfterMs ?? 0));
}

export function retryAfterOf(error: PlatformError): number | null {
  return error instanceof TransientPlatformError ? error.retryAfterMs : null;
}

export function attemptLimit(policy: RetryPolicy): number {
  return Math.max(1, policy.maxAttempts);
}

/** Logs the pending retry and waits out its backoff. */
export async function backOff(
  runner: RetryRunner,
  attempt: number,
  retryAfterMs: number | null,
  context: Record<string, unknown>,
): Promise<void> {
  const delayMs = computeBackoffDelay(attempt, runner.retry, retryAfterMs);
  runner.logger.info({ ...context, attempt, delayMs }, 'Retrying transient failure');
  await runner.sleep(delayMs);
}

/**
 * Runs a read against the platform, retrying transient failures with
 * backoff. Resolves with the value or the classified final error; never
 * rejects.
 */
export async function retryTransient<T>(
  operation: () => Promise<T>,
  runner: RetryRunner,
  context: Record<string, unknown>,
): Promise<RetryResult<T>> {
  const maxAttempts = attemptLimit(runner.retry);

  for (let attempt = 1; ; attempt++) {
    try {
      return { status: 'ok', value: await operation(), attempts: attempt };
    } catch (error) {
      const classified = classifyPlatformError(error);
      if (classified.kind !== 'transient' || attempt >= maxAttempts) {
        return { status: 'failed', error: classified, attempts: attempt };
      }

      await backOff(runner, attempt, retryAfterOf(classified), context);
    }
  }
}

export function failedOutcome(action: ActionKind, target: string, attempts: number, error: PlatformError): ActionOutcome {
  return { action, target, attempts, result: { status: 'failed', kind: error.kind, message: error.message } };
}
