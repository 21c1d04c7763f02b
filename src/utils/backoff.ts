import { isAxiosError, isCancel } from 'axios';
import { Logger, describeError } from './logger.js';
import { sleep as defaultSleep, throwIfAborted, type SleepFn } from './sleep.js';
import type { RetryPolicy } from './config.js';
import { CancelledError, FatalError, LastfmApiError, RetryableError } from '../types/errors.js';

export type Failure =
  | { kind: 'transient' }
  | { kind: 'server'; status: number }
  | { kind: 'rateLimited'; retryAfterSeconds?: number }
  | { kind: 'fatal' }
  | { kind: 'cancelled' };

export type FailureClassifier = (err: unknown) => Failure;

const TRANSIENT_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK',
]);

// Last.fm: 11 = service offline, 16 = temporarily unavailable, 29 = rate limit exceeded
const LASTFM_TRANSIENT_CODES = new Set([11, 16]);
const LASTFM_RATE_LIMIT_CODE = 29;

export function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
  if (typeof value === 'string' && value.trim().length > 0) {
    const n = Number(value.trim());
    if (Number.isFinite(n) && n >= 0) return n;
  }
  return undefined;
}

function fromStatus(status: number, retryAfter?: number): Failure {
  if (status === 429) return { kind: 'rateLimited', retryAfterSeconds: retryAfter };
  if (status >= 500 && status < 600) return { kind: 'server', status };
  return { kind: 'fatal' };
}

function errorCode(err: Error): string {
  return 'code' in err && typeof err.code === 'string' ? err.code : '';
}

export const classifyFailure: FailureClassifier = (err) => {
  if (err instanceof CancelledError) return { kind: 'cancelled' };
  if (err instanceof FatalError) return { kind: 'fatal' };
  if (err instanceof RetryableError) {
    if (err.status !== undefined) {
      const f = fromStatus(err.status, err.retryAfterSeconds);
      // a RetryableError is never fatal, whatever status it carries
      return f.kind === 'fatal' ? { kind: 'transient' } : f;
    }
    return err.retryAfterSeconds !== undefined
      ? { kind: 'rateLimited', retryAfterSeconds: err.retryAfterSeconds }
      : { kind: 'transient' };
  }
  if (err instanceof LastfmApiError) {
    if (err.code === LASTFM_RATE_LIMIT_CODE) return { kind: 'rateLimited' };
    if (LASTFM_TRANSIENT_CODES.has(err.code)) return { kind: 'transient' };
    return { kind: 'fatal' };
  }
  // Request aborted through its signal
  if (isCancel(err)) return { kind: 'cancelled' };
  if (isAxiosError(err)) {
    if (err.response) {
      return fromStatus(err.response.status, parseRetryAfter(err.response.headers['retry-after']));
    }
    // No response at all: connection level problem
    return { kind: 'transient' };
  }
  if (err instanceof Error) {
    const code = errorCode(err);
    const looksLikeTimeout = /timeout|timed out|ETIMEDOUT/i.test(err.message);
    if (TRANSIENT_CODES.has(code) || looksLikeTimeout) return { kind: 'transient' };
  }
  return { kind: 'fatal' };
};

export interface ExecuteOptions extends RetryPolicy {
  label?: string;
  signal?: AbortSignal;
}

interface BackoffState {
  attempt: number; // attempts already made
  delayMs: number; // next exponential delay
}

export class BackoffExecutor {
  private sleep: SleepFn;
  private classify: FailureClassifier;

  constructor(deps: { sleep?: SleepFn; classify?: FailureClassifier } = {}) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.classify = deps.classify ?? classifyFailure;
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, options: ExecuteOptions): Promise<T> {
    const { maxRetries, backoffFactor, signal } = options;
    const label = options.label ? `${options.label}: ` : '';
    const state: BackoffState = { attempt: 0, delayMs: options.initialDelayMs };
    let lastErr: unknown;

    while (state.attempt < maxRetries) {
      throwIfAborted(signal);
      state.attempt++;
      const attemptsLeft = state.attempt < maxRetries;

      try {
        return await operation(state.attempt);
      } catch (err) {
        lastErr = err;
        const failure = this.classify(err);

        if (failure.kind === 'cancelled') throw err instanceof CancelledError ? err : new CancelledError();

        if (failure.kind === 'fatal') {
          Logger.debug(`${label}non-retryable error: ${describeError(err)}`);
          throw err;
        }

        if (failure.kind === 'rateLimited') {
          // Server-provided wait; the exponential delay is left untouched
          const waitMs = failure.retryAfterSeconds !== undefined ? failure.retryAfterSeconds * 1000 : state.delayMs * 2;
          Logger.warn(`${label}rate limited (429). Waiting ${waitMs / 1000}s...`);
          await this.sleep(waitMs, signal);
          continue;
        }

        const what = failure.kind === 'server' ? `Server error ${failure.status}` : 'Network error';
        if (!attemptsLeft) {
          Logger.warn(`${label}${what}; failed after ${maxRetries} attempts: ${describeError(err)}`);
          break;
        }
        Logger.warn(`${label}${what} (attempt ${state.attempt}/${maxRetries}): ${describeError(err)}`);
        Logger.warn(`${label}retrying in ${state.delayMs / 1000}s...`);
        await this.sleep(state.delayMs, signal);
        state.delayMs *= backoffFactor;
      }
    }

    throw lastErr ?? new Error('Retry failed with no error');
  }
}
