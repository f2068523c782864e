import type { FastifyBaseLogger } from 'fastify';

import {
  isDriveError,
  OperationCancelledError,
  TransferPermanentError,
  TransferRateLimitedError,
  TransferTransientError,
} from '../drive/errors.js';

import { classifyFailure, describeFailure, type FailureClass } from './classifier.js';
import type { ClassifierRules, RetryPolicy } from './config.js';

export interface RetryOptions {
  policy: RetryPolicy;
  rules: ClassifierRules;
  logger: FastifyBaseLogger;
  signal?: AbortSignal;
}

/**
 * Sleep for `ms`, rejecting early with OperationCancelledError if `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError('aborted while waiting'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError('aborted while waiting'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay before the next attempt, given the class of the failure just seen.
 * attempt is 0-based: the first retry waits the base delay.
 */
export function backoffDelay(
  policy: RetryPolicy,
  failure: Exclude<FailureClass, 'permanent'>,
  attempt: number
): number {
  const base = failure === 'rate-limited' ? policy.rateLimitDelayMs : policy.baseDelayMs;
  return Math.min(base * policy.multiplier ** attempt, policy.maxDelayMs);
}

/**
 * Execute an async function with classified exponential backoff.
 *
 * - permanent failures throw TransferPermanentError immediately
 * - transient failures wait baseDelayMs * multiplier^attempt
 * - rate-limited failures wait rateLimitDelayMs * multiplier^attempt
 * Delays are capped at maxDelayMs. After maxAttempts the last failure class
 * decides the terminal error: TransferRateLimitedError or TransferTransientError.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  options: RetryOptions
): Promise<T> {
  const { policy, rules, logger, signal } = options;
  let lastFailure: Exclude<FailureClass, 'permanent'> = 'transient';
  let lastError: unknown;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new OperationCancelledError(label);
    }

    try {
      return await fn();
    } catch (error) {
      // Domain errors raised inside fn (cancellation included) are already final
      if (isDriveError(error)) {
        throw error;
      }
      lastError = error;
      const failure = classifyFailure(error, rules);

      if (failure === 'permanent') {
        throw new TransferPermanentError(label, describeFailure(error));
      }
      lastFailure = failure;

      if (attempt + 1 >= policy.maxAttempts) {
        break;
      }

      const delay = backoffDelay(policy, failure, attempt);
      logger.warn(
        { attempt: attempt + 1, delay, label, classification: failure, reason: describeFailure(error) },
        'Retrying host call after failure'
      );

      await sleep(delay, signal);
    }
  }

  logger.error(
    { label, attempts: policy.maxAttempts, classification: lastFailure, reason: describeFailure(lastError) },
    'Host call failed after retries'
  );

  if (lastFailure === 'rate-limited') {
    throw new TransferRateLimitedError(label);
  }
  throw new TransferTransientError(label);
}
