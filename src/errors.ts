'use strict';

import { TimeoutError } from './core/utils';
import type { FailureKind } from './types';

/** A webhook payload the pipeline cannot handle. Deliveries that raise it are skipped. */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export abstract class PlatformError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Rate limiting, server errors and network trouble. Retried with backoff. */
export class TransientPlatformError extends PlatformError {
  readonly kind = 'transient';

  constructor(
    message: string,
    status: number | null = null,
    readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, status, options);
    this.name = 'TransientPlatformError';
  }
}

/** Permission denied, not found, validation failures. Never retried. */
export class PermanentPlatformError extends PlatformError {
  readonly kind = 'permanent';

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, status, options);
    this.name = 'PermanentPlatformError';
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function readField(value: unknown, field: string): unknown {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }

  return Reflect.get(value, field);
}

function readStatus(error: unknown): number | null {
  const status = readField(error, 'status');
  return typeof status === 'number' ? status : null;
}

function readHeader(error: unknown, name: string): string | null {
  const headers = readField(readField(error, 'response'), 'headers');
  const value = readField(headers, name);
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }

  return null;
}

function readRetryAfterMs(error: unknown, now: number): number | null {
  const retryAfter = readHeader(error, 'retry-after');
  if (retryAfter !== null) {
    const seconds = Number.parseInt(retryAfter, 10);
    if (!Number.isNaN(seconds) && seconds >= 0) {
      return seconds * 1000;
    }
  }

  const reset = readHeader(error, 'x-ratelimit-reset');
  if (reset !== null) {
    const resetEpoch = Number.parseInt(reset, 10);
    if (!Number.isNaN(resetEpoch) && resetEpoch > 0) {
      return Math.max(0, resetEpoch * 1000 - now);
    }
  }

  return null;
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Maps anything a platform call may throw onto the transient/permanent split.
 *
 * Octokit `RequestError`s carry `status` and `response.headers`; a 403 is only
 * transient when it is a rate limit (exhausted quota, `retry-after`, or a
 * secondary-limit message).
 */
export function classifyPlatformError(error: unknown, now = Date.now()): PlatformError {
  if (error instanceof PlatformError) {
    return error;
  }

  const message = describe(error);
  const status = readStatus(error);

  if (status !== null) {
    const rateLimited =
      status === 429 ||
      (status === 403 &&
        (readHeader(error, 'x-ratelimit-remaining') === '0' ||
          readHeader(error, 'retry-after') !== null ||
          /rate limit/i.test(message)));

    if (rateLimited) {
      return new TransientPlatformError(message, status, readRetryAfterMs(error, now), { cause: error });
    }

    if (status >= 500) {
      return new TransientPlatformError(message, status, null, { cause: error });
    }

    return new PermanentPlatformError(message, status, { cause: error });
  }

  if (error instanceof TimeoutError) {
    return new TransientPlatformError(message, null, null, { cause: error });
  }

  const code = readField(error, 'code');
  const name = readField(error, 'name');
  if (
    (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) ||
    name === 'AbortError' ||
    /socket hang up|network|timed out/i.test(message)
  ) {
    return new TransientPlatformError(message, null, null, { cause: error });
  }

  return new PermanentPlatformError(message, null, { cause: error });
}

export function isHttpStatus(error: unknown, status: number): boolean {
  return readStatus(error) === status;
}
