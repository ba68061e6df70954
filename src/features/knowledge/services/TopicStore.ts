import { transactionManager, type TransactionRunner } from '~/database/transactionManager'
import { topicRepository, type TopicRepository } from '~/database/repositories/topicRepository'
import { messageRepository, type MessageRepository } from '~/database/repositories/messageRepository'
import { groupRepository, type GroupRepository } from '~/database/repositories/groupRepository'
import type { UpsertKBTopic } from '~/database/schemas/kbTopic'
import { ServiceError } from '~/core/errors/ServiceError'
import { hasProperty } from '~/core/utils/guards'

// serialization_failure, deadlock_detected, query_canceled, admin_shutdown,
// too_many_connections, connection_exception family, socket errors
const TRANSIENT_CODES = new Set([
    '40001',
    '40P01',
    '57014',
    '57P01',
    '53300',
    '08000',
    '08003',
    '08006',
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
])

/**
 * Persists a synthesized topic together with its message links
 */
export interface TopicWriter {
    /**
     * Upsert the topic, link its messages and, when `ingestedAt` is given,
     * move the group's ingestion watermark, all in one transaction
     */
    saveTopic(topic: UpsertKBTopic, messageIds: string[], ingestedAt?: Date): Promise<void>
}

export class TopicStore implements TopicWriter {
    constructor(
        private readonly transactions: TransactionRunner = transactionManager,
        private readonly topics: TopicRepository = topicRepository,
        private readonly messages: MessageRepository = messageRepository,
        private readonly groups: GroupRepository = groupRepository
    ) {}

    /**
     * @throws ServiceError flagged retryable when the database failure is transient
     */
    async saveTopic(topic: UpsertKBTopic, messageIds: string[], ingestedAt?: Date): Promise<void> {
        try {
            await this.transactions.withTransaction(async (client) => {
                const topics = this.topics.withClient(client)
                await topics.upsert(topic)
                await topics.linkMessages(topic.id, messageIds)
                await this.messages.withClient(client).linkToTopic(messageIds, topic.id)

                if (ingestedAt) {
                    await this.groups.withClient(client).updateLastIngest(topic.group_id, ingestedAt)
                }
            })
        } catch (error) {
            const code = hasProperty(error, 'code') && typeof error.code === 'string' ? error.code : undefined

            if (code && TRANSIENT_CODES.has(code)) {
                throw ServiceError.retryable('TopicStore', 'Topic store temporarily unavailable', 'STORE_UNAVAILABLE', error)
            }
            throw ServiceError.fatal('TopicStore', `Failed to store topic ${topic.id}`, 'STORE_FAILED', error)
        }
    }
}

export const topicStore = new TopicStore()
