import type { OutboundGateway } from '~/core/gateway/OutboundGateway'
import { createFlowLogger } from '~/core/utils/logger'
import type { GenerationService, Route } from '~/features/ai/services/GenerationService'
import type { GroupSummaryService } from '~/features/summary/services/GroupSummaryService'
import type { KnowledgeBaseAnswerService } from '~/features/knowledge/services/KnowledgeBaseAnswerService'
import type { InboundMessage } from '~/features/messages/schemas/inboundMessage'

const logger = createFlowLogger('message-router')

export const HEY_REPLY = 'Who is calling my name?'

export interface MessageRouterDeps {
    generator: Pick<GenerationService, 'classifyRoute'>
    gateway: OutboundGateway
    summaries: Pick<GroupSummaryService, 'replyWithTodaySummary'>
    answers: Pick<KnowledgeBaseAnswerService, 'answerAndSend'>
}

/**
 * Routes a message addressed to the bot to the handler for its intent
 */
export class MessageRouter {
    constructor(private readonly deps: MessageRouterDeps) {}

    async route(message: InboundMessage): Promise<Route> {
        const route = await this.deps.generator.classifyRoute(message.text ?? '')
        logger.info({ messageId: message.messageId, route }, 'Message routed')

        switch (route) {
            case 'HEY':
                await this.deps.gateway.send(message.chatId, HEY_REPLY)
                break
            case 'SUMMARIZE':
                await this.deps.summaries.replyWithTodaySummary(message)
                break
            case 'ASK_QUESTION':
                await this.deps.answers.answerAndSend(message)
                break
            case 'IGNORE':
                break
        }

        return route
    }
}
