/**
 * Message router tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import type { Route } from '~/features/ai/services/GenerationService'
import { HEY_REPLY, MessageRouter } from '~/features/routing/services/MessageRouter'
import type { KnowledgeBaseAnswer } from '~/features/knowledge/services/KnowledgeBaseAnswerService'
import type { InboundMessage } from '~/features/messages/schemas/inboundMessage'
import { RecordingGateway } from '../../utils/RecordingGateway'
import { BASE_TIME, GROUP_ID } from '../../utils/factories'

const message: InboundMessage = {
    messageId: 'route-1',
    chatId: GROUP_ID,
    senderId: '972501111111@s.whatsapp.net',
    groupId: GROUP_ID,
    pushName: 'Alice',
    timestamp: BASE_TIME,
    text: '@972500000000 hi',
    mediaUrl: null,
    replyToId: null,
}

describe('MessageRouter', () => {
    let gateway: RecordingGateway
    const replyWithTodaySummary = vi.fn(async () => 'summary')
    const answerAndSend = vi.fn(async (): Promise<KnowledgeBaseAnswer> => ({ text: 'answer', query: 'q', results: [] }))

    function routerFor(route: Route) {
        return new MessageRouter({
            generator: { classifyRoute: async () => route },
            gateway,
            summaries: { replyWithTodaySummary },
            answers: { answerAndSend },
        })
    }

    beforeEach(() => {
        gateway = new RecordingGateway()
        replyWithTodaySummary.mockClear()
        answerAndSend.mockClear()
    })

    it('greets back on HEY', async () => {
        await routerFor('HEY').route(message)

        expect(gateway.sent).toEqual([{ recipient: GROUP_ID, text: HEY_REPLY }])
    })

    it('summarizes on SUMMARIZE', async () => {
        await routerFor('SUMMARIZE').route(message)

        expect(replyWithTodaySummary).toHaveBeenCalledWith(message)
        expect(answerAndSend).not.toHaveBeenCalled()
    })

    it('answers from the knowledge base on ASK_QUESTION', async () => {
        await routerFor('ASK_QUESTION').route(message)

        expect(answerAndSend).toHaveBeenCalledWith(message)
    })

    it('stays silent on IGNORE', async () => {
        const route = await routerFor('IGNORE').route(message)

        expect(route).toBe('IGNORE')
        expect(gateway.sent).toEqual([])
        expect(replyWithTodaySummary).not.toHaveBeenCalled()
        expect(answerAndSend).not.toHaveBeenCalled()
    })
})
