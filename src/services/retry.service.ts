import {
  HttpStatusError,
  PermanentUpstreamFailure,
  RetryExhaustedError,
  TransientUpstreamFailure,
  toError,
} from '../utils/errors';
import { logger } from '../utils/logger';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
  // Ceiling for a server-provided Retry-After; the wait happens inside the conversation lock
  maxRetryAfterMs?: number;
}

export interface RetryContext {
  service: string;
  operation: string;
  maxAttempts?: number;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitterRatio: 0.25,
};

const DEFAULT_MAX_RETRY_AFTER_MS = 30_000;

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET', 'ECONNREFUSED', 'ECONNABORTED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_SOCKET',
]);

// Error names used by fetch, AbortSignal.timeout and the Anthropic/OpenAI SDKs for transport failures
const NETWORK_ERROR_NAMES = new Set([
  'AbortError', 'TimeoutError', 'FetchError', 'APIConnectionError', 'APIConnectionTimeoutError',
]);

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(header: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/** Retry-After carried by an SDK error, as a plain header record or a fetch `Headers`. */
function retryAfterOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('headers' in error)) return undefined;
  const headers = error.headers;

  if (headers instanceof Headers) return parseRetryAfter(headers.get('retry-after'));
  if (typeof headers === 'object' && headers !== null && 'retry-after' in headers) {
    const value = headers['retry-after'];
    return typeof value === 'string' ? parseRetryAfter(value) : undefined;
  }
  return undefined;
}

function codeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isNetworkError(error: Error): boolean {
  if (NETWORK_ERROR_NAMES.has(error.name)) return true;

  const code = codeOf(error) ?? codeOf(error.cause);
  if (code && NETWORK_ERROR_CODES.has(code)) return true;

  // undici rejects with `TypeError: fetch failed` when the connection cannot be made
  return error instanceof TypeError && error.message === 'fetch failed';
}

/**
 * Maps whatever an upstream call threw onto the transient/permanent taxonomy.
 * Unknown failures are permanent.
 */
export function classifyUpstreamError(
  service: string,
  operation: string,
  error: unknown
): TransientUpstreamFailure | PermanentUpstreamFailure {
  if (error instanceof TransientUpstreamFailure || error instanceof PermanentUpstreamFailure) {
    return error;
  }

  const err = toError(error);

  if (err instanceof HttpStatusError) {
    return err.status === 429 || err.status >= 500
      ? new TransientUpstreamFailure(service, operation, err, err.status, err.retryAfterMs)
      : new PermanentUpstreamFailure(service, operation, err, err.status);
  }

  const status = statusOf(err);
  if (status !== undefined) {
    return status === 429 || status >= 500
      ? new TransientUpstreamFailure(service, operation, err, status, retryAfterOf(err))
      : new PermanentUpstreamFailure(service, operation, err, status);
  }

  if (isNetworkError(err)) {
    return new TransientUpstreamFailure(service, operation, err);
  }

  return new PermanentUpstreamFailure(service, operation, err);
}

/**
 * Runs an upstream call with exponential backoff and jitter.
 *
 * Transient failures are retried up to `maxAttempts` in total; permanent ones
 * are thrown on the first occurrence. A server-provided Retry-After takes the
 * place of the computed delay, up to `maxRetryAfterMs`.
 */
export class RetryExecutor {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    hooks: RetryHooks = {}
  ) {
    this.sleep = hooks.sleep ?? defaultSleep;
    this.random = hooks.random ?? Math.random;
  }

  /** Backoff before the retry that follows `attempt` (1-based). */
  computeDelay(attempt: number): number {
    const exponential = Math.min(this.policy.baseDelayMs * Math.pow(2, attempt - 1), this.policy.maxDelayMs);
    const jitter = (this.random() * 2 - 1) * this.policy.jitterRatio * exponential;
    return Math.round(Math.min(Math.max(0, exponential + jitter), this.policy.maxDelayMs));
  }

  /** Wait before the next attempt: the server's Retry-After when given, capped, else the backoff. */
  delayFor(failure: TransientUpstreamFailure, attempt: number): number {
    if (failure.retryAfterMs === undefined) return this.computeDelay(attempt);
    return Math.min(failure.retryAfterMs, this.policy.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS);
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, context: RetryContext): Promise<T> {
    const maxAttempts = Math.max(1, context.maxAttempts ?? this.policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      let failure: TransientUpstreamFailure | PermanentUpstreamFailure;
      try {
        const result = await operation(attempt);
        if (attempt > 1) {
          logger.info('Upstream call succeeded after retry', {
            service: context.service,
            operation: context.operation,
            attempt,
          });
        }
        return result;
      } catch (error) {
        failure = classifyUpstreamError(context.service, context.operation, error);
      }

      if (failure instanceof PermanentUpstreamFailure) {
        logger.warn('Upstream call failed permanently', {
          service: context.service,
          operation: context.operation,
          attempt,
          status: failure.status,
          error: failure.originalError.message,
        });
        throw failure;
      }

      if (attempt >= maxAttempts) {
        logger.error('Upstream call exhausted retries', {
          service: context.service,
          operation: context.operation,
          attempts: attempt,
          error: failure.originalError.message,
        });
        throw new RetryExhaustedError(context.service, context.operation, attempt, failure);
      }

      const delay = this.delayFor(failure, attempt);
      logger.warn('Upstream call failed, retrying', {
        service: context.service,
        operation: context.operation,
        attempt,
        maxAttempts,
        delayMs: delay,
        status: failure.status,
        error: failure.originalError.message,
      });
      await this.sleep(delay);
    }
  }
}
