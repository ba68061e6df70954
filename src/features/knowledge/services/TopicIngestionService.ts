/**
 * Topic Ingestion Service
 *
 * Drives the synthesizer over every message a group received since its last
 * ingestion. Chunks are processed in order; the watermark moves once, after
 * the whole run succeeded.
 */

import { env } from '~/config/env'
import { createFlowLogger } from '~/core/utils/logger'
import { groupRepository, type GroupRepository } from '~/database/repositories/groupRepository'
import { messageRepository, type MessageRepository } from '~/database/repositories/messageRepository'
import type { Group } from '~/database/schemas/group'
import { splitConversation, type SplitOptions } from '../utils/conversationSegmenter'
import { TopicSynthesisError, type TopicSynthesizer } from './TopicSynthesizer'

const logger = createFlowLogger('topic-ingestion')

export interface GroupIngestionResult {
    groupId: string
    messages: number
    chunks: number
    topics: number
    skipped: number
}

export interface IngestionFailure {
    groupId: string
    error: unknown
}

export interface IngestionReport {
    results: GroupIngestionResult[]
    failures: IngestionFailure[]
}

export interface TopicIngestionDeps {
    synthesizer: Pick<TopicSynthesizer, 'synthesize'>
    messages?: Pick<MessageRepository, 'getGroupMessagesSince'>
    groups?: Pick<GroupRepository, 'getManagedGroups' | 'updateLastIngest'>
    botJid?: string
    splitOptions?: SplitOptions
    now?: () => Date
}

export class TopicIngestionService {
    private readonly messages: Pick<MessageRepository, 'getGroupMessagesSince'>
    private readonly groups: Pick<GroupRepository, 'getManagedGroups' | 'updateLastIngest'>
    private readonly botJid: string
    private readonly now: () => Date

    constructor(private readonly deps: TopicIngestionDeps) {
        this.messages = deps.messages ?? messageRepository
        this.groups = deps.groups ?? groupRepository
        this.botJid = deps.botJid ?? env.BOT_JID
        this.now = deps.now ?? (() => new Date())
    }

    /**
     * Ingest one group's new messages into topics
     */
    async ingestGroup(group: Group): Promise<GroupIngestionResult> {
        const startedAt = this.now()
        const result: GroupIngestionResult = { groupId: group.group_id, messages: 0, chunks: 0, topics: 0, skipped: 0 }

        const messages = await this.messages.getGroupMessagesSince(group.group_id, group.last_ingest, this.botJid)
        result.messages = messages.length

        if (messages.length === 0) {
            logger.info({ groupId: group.group_id, groupName: group.group_name }, 'No new messages to ingest')
            return result
        }

        const chunks = splitConversation(messages, this.deps.splitOptions)
        result.chunks = chunks.length

        logger.info(
            { groupId: group.group_id, messages: messages.length, chunks: chunks.length },
            'Split messages into conversation chunks'
        )

        for (const [index, chunk] of chunks.entries()) {
            try {
                const topic = await this.deps.synthesizer.synthesize(group, chunk, { advanceWatermark: false })
                if (topic) {
                    result.topics++
                }
            } catch (error) {
                if (error instanceof TopicSynthesisError && !error.retryable) {
                    result.skipped++
                    logger.warn(
                        { err: error, groupId: group.group_id, chunk: index + 1, size: chunk.length },
                        'Skipping chunk with unusable topic'
                    )
                    continue
                }

                logger.error(
                    { err: error, groupId: group.group_id, chunk: index + 1 },
                    'Topic ingestion aborted, watermark left in place'
                )
                throw error
            }
        }

        await this.groups.updateLastIngest(group.group_id, startedAt)

        logger.info({ ...result }, 'Group ingestion completed')
        return result
    }

    /**
     * Ingest every managed group; one group's failure does not stop the others
     */
    async ingestAllGroups(): Promise<IngestionReport> {
        const groups = await this.groups.getManagedGroups()
        const settled = await Promise.allSettled(groups.map((group) => this.ingestGroup(group)))

        const report: IngestionReport = { results: [], failures: [] }

        settled.forEach((outcome, index) => {
            const groupId = groups[index].group_id
            if (outcome.status === 'fulfilled') {
                report.results.push(outcome.value)
            } else {
                report.failures.push({ groupId, error: outcome.reason })
                logger.error({ err: outcome.reason, groupId }, 'Group ingestion failed')
            }
        })

        logger.info(
            { groups: groups.length, failed: report.failures.length },
            'Ingestion pass for all managed groups completed'
        )

        return report
    }
}
