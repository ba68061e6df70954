/**
 * Retry utility for transient failures of model and store calls
 */

import { APICallError } from 'ai'
import { createFlowLogger } from './logger'
import { hasProperty } from './guards'

const logger = createFlowLogger('retry')

export interface RetryOptions {
    /** Total attempts including the first one */
    maxAttempts: number
    /** Lower bound of a single wait */
    minDelayMs: number
    /** Upper bound of a single wait */
    maxDelayMs: number
    /** Scales the exponential ceiling: multiplier * minDelayMs * 2^attempt */
    multiplier?: number
    /** Errors for which this returns false are thrown without further attempts */
    retryIf?: (error: unknown) => boolean
    onRetry?: (attempt: number, error: unknown) => void | Promise<void>
    /** Label used in log records */
    operation?: string
}

export const GENERATION_RETRY: RetryOptions = {
    maxAttempts: 6,
    minDelayMs: 1_000,
    maxDelayMs: 30_000,
}

export const TOPIC_GENERATION_RETRY: RetryOptions = {
    maxAttempts: 6,
    minDelayMs: 5_000,
    maxDelayMs: 90_000,
    multiplier: 1.5,
}

/**
 * Randomized exponential wait: uniform in [0, ceiling], clamped to [min, max]
 */
export function computeBackoffDelay(attempt: number, options: RetryOptions, random: () => number = Math.random): number {
    const multiplier = options.multiplier ?? 1
    const ceiling = Math.min(options.maxDelayMs, options.minDelayMs * multiplier * Math.pow(2, attempt))
    const jittered = random() * ceiling
    return Math.min(options.maxDelayMs, Math.max(options.minDelayMs, jittered))
}

/**
 * Retry an async operation with randomized exponential backoff
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
    const { maxAttempts, retryIf, onRetry } = options
    let lastError: unknown

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
        try {
            return await operation()
        } catch (error) {
            lastError = error

            if (attempt === maxAttempts - 1 || (retryIf && !retryIf(error))) {
                throw error
            }

            const delay = computeBackoffDelay(attempt, options)

            logger.debug(
                { operation: options.operation, attempt: attempt + 1, maxAttempts, delay, err: error },
                'Operation failed, retrying...'
            )

            if (onRetry) {
                await onRetry(attempt + 1, error)
            }

            await new Promise((resolve) => setTimeout(resolve, delay))
        }
    }

    // Only reachable with maxAttempts < 1
    throw lastError
}

/**
 * Check if an error is retryable (transient network/API errors)
 */
export function isRetryableError(error: unknown): boolean {
    if (!error || typeof error !== 'object') {
        return false
    }

    if (APICallError.isInstance(error)) {
        return error.isRetryable
    }

    // Network errors
    if (hasProperty(error, 'code') && (error.code === 'ECONNRESET' || error.code === 'ETIMEDOUT')) {
        return true
    }

    if (hasProperty(error, 'status') && typeof error.status === 'number') {
        // HTTP 5xx and 429
        if ((error.status >= 500 && error.status < 600) || error.status === 429) {
            return true
        }
    }

    if (hasProperty(error, 'retryable') && error.retryable === true) {
        return true
    }

    return false
}
