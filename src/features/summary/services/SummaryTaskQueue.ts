/**
 * At most one automatic summary in flight per group.
 *
 * The in-progress set is the queue's own dedup: a group is marked before its
 * task is scheduled and released when the task settles, whatever the outcome.
 */

import { createFlowLogger } from '~/core/utils/logger'

const logger = createFlowLogger('summary-task-queue')

export type SummaryTask = (groupId: string) => Promise<unknown>

export class SummaryTaskQueue {
    private readonly inProgress = new Set<string>()
    private readonly pending = new Set<Promise<void>>()

    constructor(private readonly task: SummaryTask) {}

    isInProgress(groupId: string): boolean {
        return this.inProgress.has(groupId)
    }

    /**
     * Mark a group as in progress; false if it already was
     */
    tryAcquire(groupId: string): boolean {
        if (this.inProgress.has(groupId)) {
            return false
        }
        this.inProgress.add(groupId)
        return true
    }

    release(groupId: string): void {
        this.inProgress.delete(groupId)
    }

    /**
     * Start the group's summary in the background without waiting for it
     * @returns false when one is already running for the group
     */
    enqueue(groupId: string): boolean {
        if (!this.tryAcquire(groupId)) {
            logger.debug({ groupId }, 'Summary already in progress, not scheduling another')
            return false
        }

        // execute() never rejects
        const run: Promise<void> = this.execute(groupId).then(() => {
            this.pending.delete(run)
        })
        this.pending.add(run)

        logger.info({ groupId }, 'Auto-summary scheduled')
        return true
    }

    /**
     * Resolves once every scheduled task has settled
     */
    async drain(): Promise<void> {
        await Promise.allSettled([...this.pending])
    }

    private async execute(groupId: string): Promise<void> {
        try {
            await this.task(groupId)
            logger.info({ groupId }, 'Auto-summary finished')
        } catch (error) {
            logger.error({ err: error, groupId }, 'Auto-summary failed')
        } finally {
            this.release(groupId)
        }
    }
}
