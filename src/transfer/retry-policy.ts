/**
 * Per-file retry policy.
 *
 * Retries cover one file's transfer only. The run deadline is a separate
 * bound: once the run signal aborts, no further attempt or backoff happens
 * and the failure surfaces as RUN.BUDGET_EXCEEDED.
 */

import { RetryConfig } from '../config/acquisition-config';
import {
  AcquisitionError,
  TypedError,
  attemptTimeoutError,
  budgetExceededError,
  retriesExhaustedError,
  toTypedError,
} from '../domain/errors';
import { linkedTimeout, sleep } from '../engine/deadline';
import { Logger, logger as rootLogger } from '../logger';

const JITTER_RATIO = 0.2;

/**
 * Exponential backoff capped at `backoffMaxMs`, with ±20% jitter so
 * concurrent segments do not retry in lockstep.
 */
export function computeBackoff(config: RetryConfig, attempt: number, random: () => number = Math.random): number {
  const raw = config.backoffBaseMs * Math.pow(2, attempt - 1);
  const capped = Math.min(raw, config.backoffMaxMs);
  const jitter = capped * JITTER_RATIO * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

export interface RetryContext {
  identifier: string;
  /** Run-level signal. */
  signal?: AbortSignal;
  /** Run budget, for the error recorded when it expires. */
  budgetMs?: number;
  logger?: Logger;
  random?: () => number;
}

/**
 * Run `attemptFn` until it succeeds, fails non-retryably, or uses up
 * `maxAttempts`. Each attempt gets its own signal bounded by
 * `attemptTimeoutMs` and by the run signal.
 */
export async function withRetry<T>(
  config: RetryConfig,
  context: RetryContext,
  attemptFn: (signal: AbortSignal, attempt: number) => Promise<T>,
): Promise<T> {
  const log = context.logger ?? rootLogger;
  let lastError: TypedError | undefined;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    if (context.signal?.aborted) {
      throw new AcquisitionError(budgetExceededError(context.budgetMs ?? 0, context.identifier));
    }

    const attemptSignal = linkedTimeout(context.signal, config.attemptTimeoutMs);
    try {
      return await attemptFn(attemptSignal.signal, attempt);
    } catch (err) {
      if (context.signal?.aborted) {
        throw new AcquisitionError(budgetExceededError(context.budgetMs ?? 0, context.identifier), { cause: err });
      }
      lastError = attemptSignal.timedOut()
        ? attemptTimeoutError(context.identifier, config.attemptTimeoutMs, attempt)
        : toTypedError(err, context.identifier);

      if (!lastError.retryable) {
        throw err instanceof AcquisitionError ? err : new AcquisitionError(lastError, { cause: err });
      }

      if (attempt < config.maxAttempts) {
        const delay = computeBackoff(config, attempt, context.random);
        log.warn('Transfer attempt failed, will retry', {
          identifier: context.identifier,
          attempt,
          maxAttempts: config.maxAttempts,
          retryDelayMs: delay,
          code: lastError.code,
          error: lastError.message,
        });
        try {
          await sleep(delay, context.signal);
        } catch (sleepErr) {
          throw new AcquisitionError(budgetExceededError(context.budgetMs ?? 0, context.identifier), {
            cause: sleepErr,
          });
        }
      }
    } finally {
      attemptSignal.dispose();
    }
  }

  throw new AcquisitionError(
    retriesExhaustedError(context.identifier, config.maxAttempts, lastError ?? toTypedError('unknown', context.identifier)),
  );
}
