/**
 * Knowledge Base Answers
 *
 * Rephrase the question with the recent chat as context, embed it, search the
 * group's (and its community's) topics and answer from what was found.
 */

import { env } from '~/config/env'
import type { OutboundGateway } from '~/core/gateway/OutboundGateway'
import { createFlowLogger } from '~/core/utils/logger'
import { jidUser } from '~/core/utils/jid'
import { groupRepository, type GroupRepository } from '~/database/repositories/groupRepository'
import { messageRepository, type MessageRepository } from '~/database/repositories/messageRepository'
import type { GenerationService } from '~/features/ai/services/GenerationService'
import type { EmbeddingService } from '~/features/ai/services/EmbeddingService'
import { ANSWER_SYSTEM_PROMPT, REPHRASE_SYSTEM_PROMPT } from '~/features/ai/prompts'
import type { OptOutService } from '~/features/privacy/services/OptOutService'
import { displaySender, renderChatLines } from '~/features/privacy/utils/displayName'
import type { InboundMessage } from '~/features/messages/schemas/inboundMessage'
import type { HybridRetriever, RetrievalResult } from './HybridRetriever'

const logger = createFlowLogger('kb-answers')

export const HISTORY_SIZE = 7

export type AnswerRequest = Pick<InboundMessage, 'chatId' | 'senderId' | 'groupId' | 'text'>

export interface AnswerOptions {
    /** Answer from this group's knowledge base instead of the chat's own */
    scopeGroupId?: string
}

export interface KnowledgeBaseAnswer {
    text: string
    query: string
    results: RetrievalResult[]
}

export interface KnowledgeBaseAnswerDeps {
    generator: Pick<GenerationService, 'generateText'>
    embedder: Pick<EmbeddingService, 'embedText'>
    retriever: Pick<HybridRetriever, 'searchForPrompt'>
    gateway: OutboundGateway
    optOut: Pick<OptOutService, 'getOptOutMap'>
    messages?: Pick<MessageRepository, 'getRecentByChat'>
    groups?: Pick<GroupRepository, 'getById' | 'getCommunityGroups'>
    botJid?: string
}

export class KnowledgeBaseAnswerService {
    private readonly messages: NonNullable<KnowledgeBaseAnswerDeps['messages']>
    private readonly groups: NonNullable<KnowledgeBaseAnswerDeps['groups']>
    private readonly botJid: string

    constructor(private readonly deps: KnowledgeBaseAnswerDeps) {
        this.messages = deps.messages ?? messageRepository
        this.groups = deps.groups ?? groupRepository
        this.botJid = deps.botJid ?? env.BOT_JID
    }

    async answer(request: AnswerRequest, options: AnswerOptions = {}): Promise<KnowledgeBaseAnswer> {
        const history = await this.messages.getRecentByChat(request.chatId, HISTORY_SIZE)
        const optOuts = await this.deps.optOut.getOptOutMap([
            request.senderId,
            ...history.map((message) => message.sender_id),
        ])

        const historyText = renderChatLines(history, optOuts)
        const asked = `${displaySender(request.senderId, optOuts)}: ${request.text ?? ''}`

        const query = await this.deps.generator.generateText({
            system: REPHRASE_SYSTEM_PROMPT(jidUser(this.botJid)),
            prompt: `${asked}\n\n# Recent chat history:\n${historyText}`,
        })

        const embedding = await this.deps.embedder.embedText(query)
        const scope = await this.resolveScope(options.scopeGroupId ?? request.groupId)

        const { results, promptText } = await this.deps.retriever.searchForPrompt(query, embedding, scope, (senderIds) =>
            this.deps.optOut.getOptOutMap(senderIds)
        )

        const text = await this.deps.generator.generateText({
            system: ANSWER_SYSTEM_PROMPT,
            prompt: `# Related Topics:\n${promptText}\n\n# Recent chat history:\n${historyText}\n\n# Query:\n${asked}`,
        })

        logger.info({ chatId: request.chatId, scope, results: results.length }, 'Knowledge base answer generated')
        return { text, query, results }
    }

    /**
     * Answer and post the reply to the chat the question came from
     */
    async answerAndSend(request: AnswerRequest, options: AnswerOptions = {}): Promise<KnowledgeBaseAnswer> {
        const answer = await this.answer(request, options)
        await this.deps.gateway.send(request.chatId, answer.text)
        return answer
    }

    /**
     * The group plus its community groups; null (no filter) outside groups
     */
    private async resolveScope(groupId: string | null): Promise<string[] | null> {
        if (!groupId) {
            return null
        }

        const group = await this.groups.getById(groupId)
        if (!group) {
            return [groupId]
        }

        const community = await this.groups.getCommunityGroups(group)
        return [group.group_id, ...community.map((member) => member.group_id)]
    }
}
