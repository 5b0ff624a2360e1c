import { setTimeout as delay } from 'timers/promises';
import { CanceledError, ConfigurationError } from './errors';
import { RetryPolicy } from './types';

/**
 * The number of seconds to wait after the given attempt failed.
 * Exponential from the base delay, capped at the max delay: with a base of 2.5 and a
 * max of 90 the waits are 2.5, 5, 10, 20, 40, 80, 90, ..., 90.
 *
 * @param attempt - 1-indexed number of the attempt that just failed
 */
export function getRetryDelay(attempt: number, policy: RetryPolicy): number {
    return Math.min(policy.maxDelaySeconds, policy.baseDelaySeconds * 2 ** (attempt - 1));
}

/**
 * @throws ConfigurationError if the policy cannot drive a retry loop
 */
export function validateRetryPolicy(policy: RetryPolicy): RetryPolicy {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        throw new ConfigurationError(`Retry policy maxAttempts must be an integer of at least 1, got ${policy.maxAttempts}`);
    }
    if (!Number.isFinite(policy.baseDelaySeconds) || policy.baseDelaySeconds < 0) {
        throw new ConfigurationError(`Retry policy baseDelaySeconds must be a non-negative number, got ${policy.baseDelaySeconds}`);
    }
    if (!Number.isFinite(policy.maxDelaySeconds) || policy.maxDelaySeconds < policy.baseDelaySeconds) {
        throw new ConfigurationError(
            `Retry policy maxDelaySeconds must be a number no smaller than baseDelaySeconds, got ${policy.maxDelaySeconds}`,
        );
    }
    return policy;
}

/**
 * Waits for the given number of milliseconds.
 * @throws CanceledError as soon as the signal aborts
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        throw new CanceledError('Canceled before retry delay');
    }
    try {
        await delay(ms, undefined, { signal });
    } catch (error) {
        if (signal?.aborted) {
            throw new CanceledError('Canceled during retry delay');
        }
        throw error;
    }
}
