/**
 * Duplicate-delivery guard
 *
 * Remembers message ids for a bounded time so a webhook delivered twice is
 * handled once. Process-local: state resets on restart.
 */

import { Mutex } from './mutex'
import { createFlowLogger } from './logger'

const logger = createFlowLogger('dedup-cache')

export interface DedupCache {
    /**
     * Returns true when the key was already seen within the TTL,
     * otherwise records it and returns false
     */
    seen(key: string): Promise<boolean>
}

export interface TtlDedupCacheOptions {
    ttlMs: number
    maxSize?: number
    now?: () => number
}

export class TtlDedupCache implements DedupCache {
    private readonly entries = new Map<string, number>() // key -> expiresAt
    private readonly lock = new Mutex()
    private readonly ttlMs: number
    private readonly maxSize: number
    private readonly now: () => number

    constructor(options: TtlDedupCacheOptions) {
        this.ttlMs = options.ttlMs
        this.maxSize = options.maxSize ?? 1000
        this.now = options.now ?? Date.now
    }

    seen(key: string): Promise<boolean> {
        return this.lock.runExclusive(() => {
            const now = this.now()
            this.purgeExpired(now)

            if (this.entries.has(key)) {
                logger.debug({ key }, 'Key already in dedup cache')
                return true
            }

            this.entries.set(key, now + this.ttlMs)

            // Map keeps insertion order, so the first key is the oldest
            while (this.entries.size > this.maxSize) {
                const oldest = this.entries.keys().next()
                if (oldest.done) break
                this.entries.delete(oldest.value)
            }

            return false
        })
    }

    size(): number {
        return this.entries.size
    }

    private purgeExpired(now: number): void {
        for (const [key, expiresAt] of this.entries) {
            if (expiresAt <= now) {
                this.entries.delete(key)
            }
        }
    }
}
