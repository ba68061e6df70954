/**
 * Hybrid Retriever
 *
 * Two legs over the knowledge base: vector similarity on topic embeddings and
 * full-text search on the raw messages. Keyword hits are resolved back to the
 * topics their messages were absorbed into, so a topic whose summary misses a
 * word still surfaces when one of its messages has it.
 */

import { createFlowLogger } from '~/core/utils/logger'
import { topicRepository, type TopicRepository } from '~/database/repositories/topicRepository'
import { messageRepository, type MessageRepository } from '~/database/repositories/messageRepository'
import type { KBTopic } from '~/database/schemas/kbTopic'
import type { KeywordMatch, Message } from '~/database/schemas/message'
import { displaySender, type OptOutDisplayMap } from '~/features/privacy/utils/displayName'

const logger = createFlowLogger('hybrid-retriever')

/** Distance given to topics found by the keyword leg only */
export const KEYWORD_ONLY_DISTANCE = 1.0
export const KEYWORD_LIMIT = 20
export const NO_RESULTS_TEXT = 'No related topics found.'

const MESSAGE_PREVIEW_LENGTH = 200

export interface RetrievalResult {
    topic: KBTopic
    messages: Message[]
    /** Cosine distance, or KEYWORD_ONLY_DISTANCE */
    distance: number
    /** 0 for vector hits, 1 for topics reached through keyword hits only */
    keywordRank: number
}

export interface SearchOptions {
    vectorLimit?: number
    messagesPerTopic?: number
}

export interface HybridRetrieverDeps {
    topics?: Pick<TopicRepository, 'vectorSearch' | 'getByIds' | 'getTopicIdsForMessages' | 'getMessagesForTopics'>
    messages?: Pick<MessageRepository, 'keywordSearch'>
}

export class HybridRetriever {
    private readonly topics: NonNullable<HybridRetrieverDeps['topics']>
    private readonly messages: NonNullable<HybridRetrieverDeps['messages']>

    constructor(deps: HybridRetrieverDeps = {}) {
        this.topics = deps.topics ?? topicRepository
        this.messages = deps.messages ?? messageRepository
    }

    /**
     * @param groupScope - groups to search in; null searches everything
     */
    async search(
        queryText: string,
        queryEmbedding: number[],
        groupScope: string[] | null,
        options: SearchOptions = {}
    ): Promise<RetrievalResult[]> {
        const { vectorLimit = 10, messagesPerTopic = 5 } = options

        const [vectorHits, keywordHits] = await Promise.all([
            this.topics.vectorSearch(queryEmbedding, groupScope, vectorLimit),
            queryText.trim() ? this.messages.keywordSearch(queryText, groupScope, KEYWORD_LIMIT) : Promise.resolve<KeywordMatch[]>([]),
        ])

        const fused = new Map<string, Omit<RetrievalResult, 'messages'>>()
        for (const hit of vectorHits) {
            fused.set(hit.topic.id, { topic: hit.topic, distance: hit.distance, keywordRank: 0 })
        }

        // Keyword hits arrive best rank first; keep that order for topics they add
        const links = await this.topics.getTopicIdsForMessages(keywordHits.map((hit) => hit.message_id))
        const messageOrder = new Map(keywordHits.map((hit, index) => [hit.message_id, index]))
        const keywordOnlyIds = [
            ...new Set(
                [...links]
                    .sort(
                        (a, b) =>
                            (messageOrder.get(a.message_id) ?? Infinity) - (messageOrder.get(b.message_id) ?? Infinity)
                    )
                    .map((link) => link.kb_topic_id)
                    .filter((topicId) => !fused.has(topicId))
            ),
        ]

        const keywordTopics = new Map((await this.topics.getByIds(keywordOnlyIds)).map((topic) => [topic.id, topic]))
        for (const topicId of keywordOnlyIds) {
            const topic = keywordTopics.get(topicId)
            if (topic) {
                fused.set(topicId, { topic, distance: KEYWORD_ONLY_DISTANCE, keywordRank: 1 })
            }
        }

        const linked = await this.topics.getMessagesForTopics([...fused.keys()], messagesPerTopic)
        const messagesByTopic = new Map<string, Message[]>()
        for (const { topicId, message } of linked) {
            const list = messagesByTopic.get(topicId) ?? []
            if (list.length < messagesPerTopic) {
                list.push(message)
            }
            messagesByTopic.set(topicId, list)
        }

        const results = [...fused.values()]
            .map((entry) => ({ ...entry, messages: messagesByTopic.get(entry.topic.id) ?? [] }))
            .sort((a, b) => a.distance - b.distance)

        logger.debug(
            {
                vectorHits: vectorHits.length,
                keywordHits: keywordHits.length,
                keywordOnlyTopics: keywordOnlyIds.length,
                results: results.length,
            },
            'Hybrid search completed'
        )

        return results
    }

    /**
     * Search and render the results as model context. The opt-out map is
     * resolved for the senders of the returned messages.
     */
    async searchForPrompt(
        queryText: string,
        queryEmbedding: number[],
        groupScope: string[] | null,
        resolveOptOuts: (senderIds: string[]) => Promise<OptOutDisplayMap>,
        options: SearchOptions = {}
    ): Promise<{ results: RetrievalResult[]; promptText: string }> {
        const results = await this.search(queryText, queryEmbedding, groupScope, options)
        const senderIds = results.flatMap((result) => result.messages.map((message) => message.sender_id))
        const optOuts = senderIds.length > 0 ? await resolveOptOuts(senderIds) : new Map<string, string>()
        return { results, promptText: formatForPrompt(results, optOuts) }
    }
}

function preview(text: string): string {
    return text.length > MESSAGE_PREVIEW_LENGTH ? `${text.slice(0, MESSAGE_PREVIEW_LENGTH)}...` : text
}

export function formatForPrompt(results: RetrievalResult[], optOuts: OptOutDisplayMap): string {
    if (results.length === 0) {
        return NO_RESULTS_TEXT
    }

    return results
        .map(({ topic, messages }) => {
            let block = `## ${topic.subject}\n${topic.summary}`

            const lines = messages
                .filter((message) => message.text)
                .map((message) => `- ${displaySender(message.sender_id, optOuts)}: ${preview(message.text ?? '')}`)

            if (lines.length > 0) {
                block += `\n\n### Related Messages:\n${lines.join('\n')}`
            }

            return block
        })
        .join('\n\n---\n\n')
}

export const hybridRetriever = new HybridRetriever()
