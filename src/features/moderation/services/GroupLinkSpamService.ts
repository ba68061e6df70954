/**
 * Scores messages that share a group-invite link and alerts the group owner
 */

import type { OutboundGateway } from '~/core/gateway/OutboundGateway'
import { ServiceError } from '~/core/errors/ServiceError'
import { createFlowLogger } from '~/core/utils/logger'
import { jidUser } from '~/core/utils/jid'
import type { Group } from '~/database/schemas/group'
import type { GenerationService, SpamScore } from '~/features/ai/services/GenerationService'
import type { InboundMessage } from '~/features/messages/schemas/inboundMessage'

const logger = createFlowLogger('group-link-spam')

export const INVITE_LINK_PREFIX = 'https://chat.whatsapp.com/'

export function containsInviteLink(text: string | null): boolean {
    return text !== null && text.includes(INVITE_LINK_PREFIX)
}

export function formatSpamAlert(ownerId: string, result: SpamScore): string {
    return (
        `@${jidUser(ownerId)} - A group invite link was shared in the group. ` +
        'This might be spam. Please check and remove it if it is.\n\n' +
        `Spam confidence level: *${result.score}*  (1 not spam - 5 spam)\n` +
        `Explanation: ${result.explanation}`
    )
}

export interface GroupLinkSpamDeps {
    generator: Pick<GenerationService, 'scoreSpam'>
    gateway: OutboundGateway
}

export class GroupLinkSpamService {
    constructor(private readonly deps: GroupLinkSpamDeps) {}

    /**
     * @throws ServiceError GROUP_OWNER_MISSING when the group has no owner to alert
     */
    async check(message: InboundMessage, group: Group): Promise<SpamScore> {
        const ownerId = group.owner_id
        if (!ownerId) {
            throw ServiceError.fatal(
                'GroupLinkSpam',
                `Group ${group.group_id} has no owner to alert`,
                'GROUP_OWNER_MISSING'
            )
        }

        const result = await this.deps.generator.scoreSpam(
            `@${jidUser(message.senderId)}: ${message.text ?? ''}\n` +
                `The message is from a group chat. The group name is ${group.group_name ?? 'Unknown'} ` +
                `and the group description is ${group.group_topic ?? 'Unknown'}`
        )

        await this.deps.gateway.send(message.chatId, formatSpamAlert(ownerId, result))

        logger.info({ groupId: group.group_id, score: result.score }, 'Spam alert sent')
        return result
    }
}
