/**
 * Topic Synthesizer
 *
 * Turns one conversation chunk into a stored knowledge base topic:
 * pseudonymize, generate {subject, summary}, re-identify the referenced
 * speakers, embed, then persist the topic and its message links.
 */

import { createHash } from 'crypto'
import { env } from '~/config/env'
import { ServiceError } from '~/core/errors/ServiceError'
import { createFlowLogger } from '~/core/utils/logger'
import type { ConversationMessage } from '~/database/schemas/message'
import type { KBTopic } from '~/database/schemas/kbTopic'
import type { Group } from '~/database/schemas/group'
import type { GenerationService } from '~/features/ai/services/GenerationService'
import type { EmbeddingService } from '~/features/ai/services/EmbeddingService'
import { pseudonymize, referencedTokens, reidentify } from '../utils/identityCodec'
import type { TopicWriter } from './TopicStore'

const logger = createFlowLogger('topic-synthesizer')

export class TopicSynthesisError extends ServiceError {
    constructor(message: string, code: string, cause?: unknown, retryable: boolean = false) {
        super('TopicSynthesis', message, code, cause, retryable)
    }
}

export interface TopicSynthesizerDeps {
    generator: Pick<GenerationService, 'extractTopic'>
    embedder: Pick<EmbeddingService, 'embedText'>
    store: TopicWriter
    botJid?: string
    now?: () => Date
}

export interface SynthesizeOptions {
    /** Move the group's last_ingest in the same transaction (default true) */
    advanceWatermark?: boolean
}

export interface SynthesizedTopic extends KBTopic {
    messageIds: string[]
}

export function topicId(groupId: string, startTime: Date, subject: string): string {
    return createHash('sha256').update(`${groupId}_${startTime.toISOString()}_${subject}`).digest('hex')
}

export class TopicSynthesizer {
    private readonly botJid: string
    private readonly now: () => Date

    constructor(private readonly deps: TopicSynthesizerDeps) {
        this.botJid = deps.botJid ?? env.BOT_JID
        this.now = deps.now ?? (() => new Date())
    }

    /**
     * @returns the stored topic, or null when the chunk has no text
     * @throws TopicSynthesisError (not retryable) when the model output is unusable
     */
    async synthesize(
        group: Pick<Group, 'group_id'>,
        chunk: ConversationMessage[],
        options: SynthesizeOptions = {}
    ): Promise<SynthesizedTopic | null> {
        const { text, map } = pseudonymize(chunk, this.botJid)
        if (!text) {
            logger.debug({ groupId: group.group_id, size: chunk.length }, 'Chunk has no text, skipping')
            return null
        }

        const draft = await this.generateDraft(text)

        // Only speakers the model actually referenced end up in the topic
        const speakerMap = map.restrictTo(referencedTokens(draft.subject, draft.summary))
        const subject = reidentify(draft.subject, speakerMap)
        const summary = reidentify(draft.summary, speakerMap)

        const startTime = chunk.reduce(
            (earliest, message) => (message.timestamp < earliest ? message.timestamp : earliest),
            chunk[0].timestamp
        )

        const topic: SynthesizedTopic = {
            id: topicId(group.group_id, startTime, subject),
            group_id: group.group_id,
            start_time: startTime,
            speakers: [...speakerMap.values()].join(','),
            subject,
            summary,
            messageIds: chunk.map((message) => message.message_id),
        }

        const embedding = await this.deps.embedder.embedText(`${subject}\n${summary}`)

        await this.deps.store.saveTopic(
            {
                id: topic.id,
                group_id: topic.group_id,
                start_time: topic.start_time,
                speakers: topic.speakers,
                subject: topic.subject,
                summary: topic.summary,
                embedding,
            },
            topic.messageIds,
            options.advanceWatermark === false ? undefined : this.now()
        )

        logger.info(
            { groupId: group.group_id, topicId: topic.id, subject, messages: chunk.length },
            'Topic stored'
        )

        return topic
    }

    private async generateDraft(conversation: string): Promise<{ subject: string; summary: string }> {
        let draft: { subject: string; summary: string }

        try {
            draft = await this.deps.generator.extractTopic(conversation)
        } catch (error) {
            if (error instanceof ServiceError && error.code === 'NO_OBJECT') {
                throw new TopicSynthesisError('Model returned no usable topic', 'INVALID_RESULT', error, false)
            }
            throw error
        }

        const subject = draft.subject.trim()
        const summary = draft.summary.trim()

        if (!subject || !summary) {
            throw new TopicSynthesisError('Model returned an empty subject or summary', 'EMPTY_RESULT')
        }

        return { subject, summary }
    }
}
