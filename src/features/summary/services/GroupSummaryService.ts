/**
 * Group Summary Service
 *
 * - automatic summaries sent to a group once enough messages piled up
 * - "summarize today" replies
 * - periodic digests sent to the groups of the same community
 */

import { env } from '~/config/env'
import type { OutboundGateway } from '~/core/gateway/OutboundGateway'
import { createFlowLogger } from '~/core/utils/logger'
import { jidUser } from '~/core/utils/jid'
import { groupRepository, type GroupRepository } from '~/database/repositories/groupRepository'
import { messageRepository, type MessageRepository } from '~/database/repositories/messageRepository'
import type { Group } from '~/database/schemas/group'
import type { GenerationService } from '~/features/ai/services/GenerationService'
import {
    AUTO_SUMMARY_SYSTEM_PROMPT,
    COMMUNITY_DIGEST_SYSTEM_PROMPT,
    SUMMARIZE_SYSTEM_PROMPT,
} from '~/features/ai/prompts'
import type { OptOutService } from '~/features/privacy/services/OptOutService'
import { renderChatLines } from '~/features/privacy/utils/displayName'
import type { InboundMessage } from '~/features/messages/schemas/inboundMessage'

const logger = createFlowLogger('group-summary')

const DAY_MS = 24 * 60 * 60 * 1000

/** New messages a group needs before a community digest is sent */
export const COMMUNITY_DIGEST_MIN_MESSAGES = 7

export interface CommunityDigestReport {
    sent: string[]
    skipped: string[]
    failed: string[]
}

export interface GroupSummaryDeps {
    generator: Pick<GenerationService, 'generateText'>
    gateway: OutboundGateway
    optOut: Pick<OptOutService, 'getOptOutMap'>
    messages?: Pick<MessageRepository, 'getGroupMessagesAfter' | 'getChatMessagesSince'>
    groups?: Pick<GroupRepository, 'getById' | 'getManagedGroups' | 'getCommunityGroups' | 'updateLastSummarySync'>
    botJid?: string
    now?: () => Date
}

export class GroupSummaryService {
    private readonly messages: NonNullable<GroupSummaryDeps['messages']>
    private readonly groups: NonNullable<GroupSummaryDeps['groups']>
    private readonly botJid: string
    private readonly now: () => Date

    constructor(private readonly deps: GroupSummaryDeps) {
        this.messages = deps.messages ?? messageRepository
        this.groups = deps.groups ?? groupRepository
        this.botJid = deps.botJid ?? env.BOT_JID
        this.now = deps.now ?? (() => new Date())
    }

    /**
     * Summarize everything since the last summary and post it to the group
     * @returns false when there was nothing to summarize
     */
    async summarizeAndSendToGroup(groupId: string): Promise<boolean> {
        const group = await this.groups.getById(groupId)
        if (!group) {
            logger.warn({ groupId }, 'Group not found for auto-summary')
            return false
        }

        const syncedAt = this.now()
        const messages = await this.messages.getGroupMessagesAfter(groupId, group.last_summary_sync, this.botJid)
        if (messages.length === 0) {
            logger.info({ groupId }, 'No new messages to summarize')
            return false
        }

        const optOuts = await this.deps.optOut.getOptOutMap(messages.map((message) => message.sender_id))
        const summary = await this.deps.generator.generateText({
            system: AUTO_SUMMARY_SYSTEM_PROMPT,
            prompt: renderChatLines(messages, optOuts),
        })

        await this.deps.gateway.send(groupId, summary)
        await this.groups.updateLastSummarySync(groupId, syncedAt)

        logger.info({ groupId, messages: messages.length }, 'Auto-summary sent')
        return true
    }

    /**
     * Reply to a "summarize" request with a summary of the chat's last 24 hours
     */
    async replyWithTodaySummary(request: InboundMessage): Promise<string> {
        const since = new Date(this.now().getTime() - DAY_MS)
        const messages = await this.messages.getChatMessagesSince(request.chatId, since)
        const optOuts = await this.deps.optOut.getOptOutMap([
            request.senderId,
            ...messages.map((message) => message.sender_id),
        ])

        const requester = optOuts.get(jidUser(request.senderId)) ?? `@${jidUser(request.senderId)}`
        const summary = await this.deps.generator.generateText({
            system: SUMMARIZE_SYSTEM_PROMPT,
            prompt: `@${jidUser(this.botJid)} is you.\n\nRequest from ${requester}: ${request.text ?? ''}\n\n# Messages:\n${renderChatLines(messages, optOuts)}`,
        })

        await this.deps.gateway.send(request.chatId, summary)
        logger.info({ chatId: request.chatId, messages: messages.length }, 'Daily summary sent')
        return summary
    }

    /**
     * Send each managed group's recent activity to its community groups
     */
    async syncCommunitySummaries(): Promise<CommunityDigestReport> {
        const groups = await this.groups.getManagedGroups()
        const report: CommunityDigestReport = { sent: [], skipped: [], failed: [] }

        const settled = await Promise.allSettled(groups.map((group) => this.sendCommunityDigest(group)))

        settled.forEach((outcome, index) => {
            const groupId = groups[index].group_id
            if (outcome.status === 'rejected') {
                report.failed.push(groupId)
                logger.error({ err: outcome.reason, groupId }, 'Community digest failed')
            } else if (outcome.value) {
                report.sent.push(groupId)
            } else {
                report.skipped.push(groupId)
            }
        })

        logger.info(
            { sent: report.sent.length, skipped: report.skipped.length, failed: report.failed.length },
            'Community summary sync completed'
        )
        return report
    }

    private async sendCommunityDigest(group: Group): Promise<boolean> {
        const community = await this.groups.getCommunityGroups(group)
        if (community.length === 0) {
            return false
        }

        const syncedAt = this.now()
        const messages = await this.messages.getGroupMessagesAfter(group.group_id, group.last_summary_sync, this.botJid)
        if (messages.length < COMMUNITY_DIGEST_MIN_MESSAGES) {
            logger.debug({ groupId: group.group_id, messages: messages.length }, 'Not enough messages for a digest')
            return false
        }

        const optOuts = await this.deps.optOut.getOptOutMap(messages.map((message) => message.sender_id))
        const digest = await this.deps.generator.generateText({
            system: COMMUNITY_DIGEST_SYSTEM_PROMPT,
            prompt: `Group: ${group.group_name ?? group.group_id}\n\n# Messages:\n${renderChatLines(messages, optOuts)}`,
        })

        for (const target of community) {
            await this.deps.gateway.send(target.group_id, digest)
        }

        await this.groups.updateLastSummarySync(group.group_id, syncedAt)
        logger.info({ groupId: group.group_id, recipients: community.length }, 'Community digest sent')
        return true
    }
}
