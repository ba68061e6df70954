import { env } from '~/config/env'
import { createFlowLogger, logPerformance } from '~/core/utils/logger'
import type { TopicIngestionService } from './TopicIngestionService'
import type { GroupSummaryService } from '~/features/summary/services/GroupSummaryService'

const workerLogger = createFlowLogger('background-worker')

export interface WorkerConfig {
    enabled: boolean
    /** How often topic ingestion runs for all managed groups */
    ingestIntervalMs: number
    /** How often community digests are sent */
    summarySyncIntervalMs: number
}

export interface WorkerStats {
    ingestRuns: number
    summarySyncRuns: number
    failedRuns: number
    lastIngestAt: Date | null
    lastSummarySyncAt: Date | null
    lastError: string | null
}

type JobName = 'ingest' | 'summary-sync'

/**
 * Background Worker Service
 * Periodic topic ingestion and community summary sync
 */
export class BackgroundWorkerService {
    private readonly config: WorkerConfig
    private readonly stats: WorkerStats = {
        ingestRuns: 0,
        summarySyncRuns: 0,
        failedRuns: 0,
        lastIngestAt: null,
        lastSummarySyncAt: null,
        lastError: null,
    }
    private readonly handles: NodeJS.Timeout[] = []
    private readonly running = new Set<JobName>()

    constructor(
        private readonly ingestion: Pick<TopicIngestionService, 'ingestAllGroups'>,
        private readonly summaries: Pick<GroupSummaryService, 'syncCommunitySummaries'>,
        config?: Partial<WorkerConfig>
    ) {
        this.config = {
            enabled: env.WORKER_ENABLED,
            ingestIntervalMs: env.INGEST_INTERVAL_MS,
            summarySyncIntervalMs: env.SUMMARY_SYNC_INTERVAL_MS,
            ...config,
        }
    }

    /**
     * Start the periodic jobs. The first runs happen after one interval.
     */
    start(): void {
        if (!this.config.enabled) {
            workerLogger.warn('Background worker is disabled in configuration')
            return
        }

        if (this.handles.length > 0) {
            workerLogger.warn('Background worker already running')
            return
        }

        this.handles.push(
            setInterval(() => {
                this.runJob('ingest').catch((error) => {
                    workerLogger.error({ err: error }, 'Error in scheduled ingestion run')
                })
            }, this.config.ingestIntervalMs),
            setInterval(() => {
                this.runJob('summary-sync').catch((error) => {
                    workerLogger.error({ err: error }, 'Error in scheduled summary sync run')
                })
            }, this.config.summarySyncIntervalMs)
        )

        workerLogger.info({ config: this.config }, 'Background worker started')
    }

    stop(): void {
        if (this.handles.length === 0) {
            return
        }

        for (const handle of this.handles.splice(0)) {
            clearInterval(handle)
        }
        workerLogger.info('Background worker stopped')
    }

    getStats(): Readonly<WorkerStats> {
        return { ...this.stats }
    }

    /**
     * Run one job now. A job still running from its previous tick is skipped.
     * @returns false when skipped
     */
    async runJob(job: JobName): Promise<boolean> {
        if (this.running.has(job)) {
            workerLogger.warn({ job }, 'Job still in progress, skipping this run')
            return false
        }

        this.running.add(job)
        const startTime = Date.now()

        try {
            if (job === 'ingest') {
                const report = await this.ingestion.ingestAllGroups()
                this.stats.ingestRuns++
                this.stats.lastIngestAt = new Date()
                workerLogger.info(
                    { groups: report.results.length, failed: report.failures.length, durationMs: Date.now() - startTime },
                    'Ingestion run completed'
                )
            } else {
                const report = await this.summaries.syncCommunitySummaries()
                this.stats.summarySyncRuns++
                this.stats.lastSummarySyncAt = new Date()
                workerLogger.info(
                    { sent: report.sent.length, failed: report.failed.length, durationMs: Date.now() - startTime },
                    'Summary sync run completed'
                )
            }
            logPerformance(`worker.${job}`, Date.now() - startTime)
            return true
        } catch (error) {
            this.stats.failedRuns++
            this.stats.lastError = error instanceof Error ? error.message : String(error)
            workerLogger.error({ err: error, job }, 'Background job failed')
            return true
        } finally {
            this.running.delete(job)
        }
    }
}
