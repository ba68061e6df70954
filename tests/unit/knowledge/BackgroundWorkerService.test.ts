/**
 * Background worker tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { BackgroundWorkerService } from '~/features/knowledge/services/BackgroundWorkerService'
import type { IngestionReport } from '~/features/knowledge/services/TopicIngestionService'
import type { CommunityDigestReport } from '~/features/summary/services/GroupSummaryService'

describe('BackgroundWorkerService', () => {
    const ingestAllGroups = vi.fn(async (): Promise<IngestionReport> => ({ results: [], failures: [] }))
    const syncCommunitySummaries = vi.fn(
        async (): Promise<CommunityDigestReport> => ({ sent: [], skipped: [], failed: [] })
    )

    beforeEach(() => {
        ingestAllGroups.mockClear()
        syncCommunitySummaries.mockClear()
    })

    afterEach(() => {
        vi.useRealTimers()
    })

    function worker(enabled = true) {
        return new BackgroundWorkerService(
            { ingestAllGroups },
            { syncCommunitySummaries },
            { enabled, ingestIntervalMs: 1_000, summarySyncIntervalMs: 5_000 }
        )
    }

    it('runs each job on its own interval', async () => {
        vi.useFakeTimers()
        const service = worker()

        service.start()
        await vi.advanceTimersByTimeAsync(5_000)
        service.stop()

        expect(ingestAllGroups).toHaveBeenCalledTimes(5)
        expect(syncCommunitySummaries).toHaveBeenCalledTimes(1)
    })

    it('stays idle when disabled', async () => {
        vi.useFakeTimers()
        const service = worker(false)

        service.start()
        await vi.advanceTimersByTimeAsync(10_000)

        expect(ingestAllGroups).not.toHaveBeenCalled()
    })

    it('skips a run while the previous one is still going', async () => {
        let finish: () => void = () => {}
        ingestAllGroups.mockImplementationOnce(
            () =>
                new Promise<IngestionReport>((resolve) => {
                    finish = () => resolve({ results: [], failures: [] })
                })
        )
        const service = worker()

        const first = service.runJob('ingest')
        expect(await service.runJob('ingest')).toBe(false)

        finish()
        expect(await first).toBe(true)
        expect(ingestAllGroups).toHaveBeenCalledTimes(1)
    })

    it('records a failed run and keeps going', async () => {
        syncCommunitySummaries.mockRejectedValueOnce(new Error('database unavailable'))
        const service = worker()

        await service.runJob('summary-sync')
        await service.runJob('summary-sync')

        const stats = service.getStats()
        expect(stats.failedRuns).toBe(1)
        expect(stats.summarySyncRuns).toBe(1)
        expect(stats.lastError).toBe('database unavailable')
    })
})
