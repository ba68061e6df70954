/**
 * Topic synthesizer tests
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest'
import { GenerationServiceError, type TopicDraft } from '~/features/ai/services/GenerationService'
import { TopicSynthesisError, TopicSynthesizer, topicId } from '~/features/knowledge/services/TopicSynthesizer'
import { InMemoryKnowledgeStore } from '../../utils/InMemoryKnowledgeStore'
import { BOT_JID, GROUP_ID, buildGroup, buildMessage, hoursAfterBase } from '../../utils/factories'

const ALICE = '972501111111@s.whatsapp.net'
const BOB = '972502222222@s.whatsapp.net'
const INGESTED_AT = new Date('2024-03-02T00:00:00.000Z')

describe('TopicSynthesizer', () => {
    let store: InMemoryKnowledgeStore
    let extractTopic: Mock<(conversation: string) => Promise<TopicDraft>>
    let embedText: Mock<(text: string) => Promise<number[]>>
    let synthesizer: TopicSynthesizer

    const chunk = [
        buildMessage({ message_id: 'c1', sender_id: ALICE, timestamp: hoursAfterBase(0.5), text: 'Ship on Friday?' }),
        buildMessage({ message_id: 'c2', sender_id: BOB, timestamp: hoursAfterBase(0), text: 'Release plan first' }),
        buildMessage({ message_id: 'c3', sender_id: BOB, timestamp: hoursAfterBase(1), text: 'Agreed' }),
    ]

    beforeEach(() => {
        store = new InMemoryKnowledgeStore()
        store.addGroup(buildGroup())
        chunk.forEach((message) => store.addMessage({ ...message }))

        extractTopic = vi.fn<(conversation: string) => Promise<TopicDraft>>().mockResolvedValue({
            subject: 'Release plan',
            summary: '@user_1 proposed shipping on Friday and @user_2 agreed',
        })
        embedText = vi.fn<(text: string) => Promise<number[]>>().mockResolvedValue([0.1, 0.2, 0.3])

        synthesizer = new TopicSynthesizer({
            generator: { extractTopic },
            embedder: { embedText },
            store,
            botJid: BOT_JID,
            now: () => INGESTED_AT,
        })
    })

    it('stores a re-identified topic linked to every message of the chunk', async () => {
        const topic = await synthesizer.synthesize(buildGroup(), chunk)

        expect(topic).toEqual({
            id: topicId(GROUP_ID, hoursAfterBase(0), 'Release plan'),
            group_id: GROUP_ID,
            start_time: hoursAfterBase(0),
            speakers: '972501111111,972502222222',
            subject: 'Release plan',
            summary: '@972501111111 proposed shipping on Friday and @972502222222 agreed',
            messageIds: ['c1', 'c2', 'c3'],
        })
        expect(store.links).toHaveLength(3)
        expect(store.messages.get('c2')?.kb_topic_id).toBe(topic?.id)
    })

    it('sends the pseudonymized conversation to the model', async () => {
        await synthesizer.synthesize(buildGroup(), chunk)

        expect(extractTopic).toHaveBeenCalledWith(
            [
                '2024-03-01T10:30:00.000Z: @user_1: Ship on Friday?',
                '2024-03-01T10:00:00.000Z: @user_2: Release plan first',
                '2024-03-01T11:00:00.000Z: @user_2: Agreed',
            ].join('\n')
        )
    })

    it('embeds subject and summary together', async () => {
        await synthesizer.synthesize(buildGroup(), chunk)

        expect(embedText).toHaveBeenCalledWith(
            'Release plan\n@972501111111 proposed shipping on Friday and @972502222222 agreed'
        )
        expect(store.topics.values().next().value?.embedding).toEqual([0.1, 0.2, 0.3])
    })

    it('keeps only referenced speakers', async () => {
        extractTopic.mockResolvedValue({ subject: 'Release plan', summary: '@user_2 set the plan' })

        const topic = await synthesizer.synthesize(buildGroup(), chunk)

        expect(topic?.speakers).toBe('972502222222')
    })

    it('stores one topic when the same chunk is synthesized twice', async () => {
        await synthesizer.synthesize(buildGroup(), chunk)
        await synthesizer.synthesize(buildGroup(), chunk)

        expect(store.topics.size).toBe(1)
        expect(store.links).toHaveLength(3)
    })

    it('advances the watermark unless told not to', async () => {
        await synthesizer.synthesize(buildGroup(), chunk, { advanceWatermark: false })
        expect(store.groups.get(GROUP_ID)?.last_ingest).toEqual(new Date(0))

        await synthesizer.synthesize(buildGroup(), chunk)
        expect(store.groups.get(GROUP_ID)?.last_ingest).toEqual(INGESTED_AT)
    })

    it('skips a chunk without text', async () => {
        const topic = await synthesizer.synthesize(buildGroup(), [buildMessage({ text: null })])

        expect(topic).toBeNull()
        expect(extractTopic).not.toHaveBeenCalled()
    })

    it('rejects an empty summary without storing anything', async () => {
        extractTopic.mockResolvedValue({ subject: 'Release plan', summary: '   ' })

        await expect(synthesizer.synthesize(buildGroup(), chunk)).rejects.toMatchObject({
            code: 'EMPTY_RESULT',
            retryable: false,
        })
        expect(store.topics.size).toBe(0)
    })

    it('turns an unparseable model result into a non-retryable synthesis error', async () => {
        extractTopic.mockRejectedValue(new GenerationServiceError('no object', 'NO_OBJECT'))

        const error = await synthesizer.synthesize(buildGroup(), chunk).catch((caught: unknown) => caught)

        expect(error).toBeInstanceOf(TopicSynthesisError)
        expect(error).toMatchObject({ code: 'INVALID_RESULT', retryable: false })
    })

    it('passes other generation failures through', async () => {
        const failure = new GenerationServiceError('upstream down', 'GENERATION_FAILED', undefined, true)
        extractTopic.mockRejectedValue(failure)

        await expect(synthesizer.synthesize(buildGroup(), chunk)).rejects.toBe(failure)
    })
})

describe('topicId', () => {
    it('is a stable sha256 hex digest', () => {
        const id = topicId(GROUP_ID, hoursAfterBase(0), 'Release plan')

        expect(id).toMatch(/^[0-9a-f]{64}$/)
        expect(topicId(GROUP_ID, hoursAfterBase(0), 'Release plan')).toBe(id)
        expect(topicId(GROUP_ID, hoursAfterBase(0), 'Other subject')).not.toBe(id)
    })
})
