/**
 * Rate Limiter Utility
 *
 * Sliding window per key: each key keeps the timestamps of its recent events,
 * entries older than the window are discarded on every check, and a key at its
 * quota is denied without consuming a slot.
 */

import { createFlowLogger } from './logger'

const logger = createFlowLogger('rate-limiter')

export interface RateLimiter {
    allow(key: string): boolean
}

export interface SlidingWindowConfig {
    maxRequests: number
    windowMs: number
    /** Upper bound on tracked keys before idle keys are dropped */
    maxKeys?: number
    now?: () => number
}

export class SlidingWindowRateLimiter implements RateLimiter {
    private readonly windows = new Map<string, number[]>()
    private readonly maxRequests: number
    private readonly windowMs: number
    private readonly maxKeys: number
    private readonly now: () => number

    constructor(config: SlidingWindowConfig) {
        this.maxRequests = config.maxRequests
        this.windowMs = config.windowMs
        this.maxKeys = config.maxKeys ?? 10_000
        this.now = config.now ?? Date.now
    }

    /**
     * @returns true if allowed, false if rate limited
     */
    allow(key: string): boolean {
        const now = this.now()
        const recent = (this.windows.get(key) ?? []).filter((t) => now - t < this.windowMs)

        if (recent.length >= this.maxRequests) {
            this.windows.set(key, recent)
            logger.warn(
                { key, count: recent.length, maxRequests: this.maxRequests, windowMs: this.windowMs },
                'Rate limit exceeded'
            )
            return false
        }

        recent.push(now)
        this.windows.set(key, recent)

        if (this.windows.size > this.maxKeys) {
            this.cleanup()
        }

        return true
    }

    /**
     * Remaining events the key may send in the current window
     */
    remaining(key: string): number {
        const now = this.now()
        const recent = (this.windows.get(key) ?? []).filter((t) => now - t < this.windowMs)
        return Math.max(0, this.maxRequests - recent.length)
    }

    reset(key: string): void {
        this.windows.delete(key)
    }

    /**
     * Drop keys with no event inside the window
     */
    cleanup(): void {
        const now = this.now()
        let cleaned = 0

        for (const [key, timestamps] of this.windows) {
            if (timestamps.every((t) => now - t >= this.windowMs)) {
                this.windows.delete(key)
                cleaned++
            }
        }

        if (cleaned > 0) {
            logger.debug({ cleaned }, 'Rate limiter cleanup completed')
        }
    }
}
