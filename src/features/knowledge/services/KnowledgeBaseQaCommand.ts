/**
 * `/kb_qa group: <name>, question: <question>`
 *
 * Lets QA testers ask another group's knowledge base from a test group.
 */

import type { OutboundGateway } from '~/core/gateway/OutboundGateway'
import { createFlowLogger } from '~/core/utils/logger'
import { groupRepository, type GroupRepository } from '~/database/repositories/groupRepository'
import type { InboundMessage } from '~/features/messages/schemas/inboundMessage'
import type { KnowledgeBaseAnswerService } from './KnowledgeBaseAnswerService'

const logger = createFlowLogger('kb-qa-command')

export const KB_QA_COMMAND = '/kb_qa'

export const KB_QA_USAGE = [
    'Usage: /kb_qa group: <group name>, question: <question>',
    "Answers the question from the named group's knowledge base.",
    'Example: /kb_qa group: Builders, question: When is the next meetup?',
].join('\n')

export type KbQaRequest = { kind: 'help' } | { kind: 'query'; groupName: string; question: string }

const ARGUMENTS_PATTERN = /^group:\s*(.+?)\s*,\s*question:\s*([\s\S]+)$/i

export function isKbQaCommand(text: string): boolean {
    const trimmed = text.trim()
    return trimmed === KB_QA_COMMAND || trimmed.startsWith(`${KB_QA_COMMAND} `)
}

/**
 * Parse the arguments after the command; anything unparseable asks for help
 */
export function parseKbQa(text: string): KbQaRequest {
    const args = text.trim().slice(KB_QA_COMMAND.length).trim()

    if (!args || args === '--help' || args === '-h') {
        return { kind: 'help' }
    }

    const match = ARGUMENTS_PATTERN.exec(args)
    if (!match) {
        return { kind: 'help' }
    }

    const groupName = match[1].trim()
    const question = match[2].trim()
    return groupName && question ? { kind: 'query', groupName, question } : { kind: 'help' }
}

export interface KnowledgeBaseQaDeps {
    answers: Pick<KnowledgeBaseAnswerService, 'answer'>
    gateway: OutboundGateway
    groups?: Pick<GroupRepository, 'getByName'>
}

export class KnowledgeBaseQaCommand {
    private readonly groups: Pick<GroupRepository, 'getByName'>

    constructor(private readonly deps: KnowledgeBaseQaDeps) {
        this.groups = deps.groups ?? groupRepository
    }

    /**
     * Run the command and reply in the chat it came from
     * @returns the reply text
     */
    async execute(message: InboundMessage): Promise<string> {
        const request = parseKbQa(message.text ?? '')
        const reply = await this.replyFor(message, request)
        await this.deps.gateway.send(message.chatId, reply)
        return reply
    }

    private async replyFor(message: InboundMessage, request: KbQaRequest): Promise<string> {
        if (request.kind === 'help') {
            return KB_QA_USAGE
        }

        const group = await this.groups.getByName(request.groupName)
        if (!group || !group.managed) {
            logger.info({ groupName: request.groupName }, 'QA command for unknown or unmanaged group')
            return `Error: group "${request.groupName}" was not found or is not managed.`
        }

        const answer = await this.deps.answers.answer(
            { chatId: message.chatId, senderId: message.senderId, groupId: message.groupId, text: request.question },
            { scopeGroupId: group.group_id }
        )

        logger.info({ groupId: group.group_id, results: answer.results.length }, 'QA command answered')
        return answer.text
    }
}
