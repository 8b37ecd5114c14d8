/**
 * Retry with Exponential Backoff
 *
 * Used where the library talks to a server that may come up later than the
 * bot, such as the MongoDB connection check on start.
 */

import { LogEngine } from '@wgtechlabs/log-engine';
import { getErrorMessage } from './errorHandler.js';

export interface RetryOptions {
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    backoffFactor?: number;
    jitterFactor?: number;
}

export interface RetryResult<T> {
    success: boolean;
    result?: T;
    error?: Error;
    attemptCount: number;
    totalTimeMs: number;
}

/**
 * Delay before the given retry (1-based), capped at `maxDelayMs`, with jitter
 */
export function computeBackoffDelay(attempt: number, options: Required<RetryOptions>): number {
    const baseDelay = Math.min(
        options.initialDelayMs * Math.pow(options.backoffFactor, attempt - 1),
        options.maxDelayMs
    );
    const jitter = baseDelay * options.jitterFactor * (Math.random() - 0.5);
    return Math.max(0, Math.round(baseDelay + jitter));
}

/**
 * Runs an async operation until it succeeds or the attempts run out.
 * Never throws; the outcome is reported in the result.
 */
export async function retryWithExponentialBackoff<T>(
    operation: () => Promise<T>,
    options: RetryOptions = {},
    context: string = 'operation'
): Promise<RetryResult<T>> {
    const settings: Required<RetryOptions> = {
        maxAttempts: options.maxAttempts ?? 3,
        initialDelayMs: options.initialDelayMs ?? 100,
        maxDelayMs: options.maxDelayMs ?? 5000,
        backoffFactor: options.backoffFactor ?? 2,
        jitterFactor: options.jitterFactor ?? 0.1
    };

    const startTime = Date.now();
    let lastError: Error = new Error('Unknown error');
    let attemptCount = 0;

    for (let attempt = 1; attempt <= settings.maxAttempts; attempt++) {
        attemptCount = attempt;

        try {
            const result = await operation();
            return {
                success: true,
                result,
                attemptCount,
                totalTimeMs: Date.now() - startTime
            };
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(getErrorMessage(error));

            LogEngine.warn(`${context} failed (attempt ${attempt}/${settings.maxAttempts})`, {
                error: lastError.message
            });

            if (attempt < settings.maxAttempts) {
                const delay = computeBackoffDelay(attempt, settings);
                await new Promise(resolve => setTimeout(resolve, delay));
            }
        }
    }

    LogEngine.error(`${context} failed after all retry attempts`, {
        attemptCount,
        totalTimeMs: Date.now() - startTime,
        finalError: lastError.message
    });

    return {
        success: false,
        error: lastError,
        attemptCount,
        totalTimeMs: Date.now() - startTime
    };
}

/**
 * Retry profile for storage connection checks
 */
export async function retryStorageOperation<T>(
    operation: () => Promise<T>,
    context: string = 'storage operation',
    options: RetryOptions = {}
): Promise<RetryResult<T>> {
    return retryWithExponentialBackoff(operation, {
        maxAttempts: 5,
        initialDelayMs: 200,
        maxDelayMs: 5000,
        backoffFactor: 2,
        jitterFactor: 0.2,
        ...options
    }, context);
}
