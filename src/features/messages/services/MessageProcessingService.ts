/**
 * Message Processing Service
 *
 * Entry point for every inbound chat message. In order:
 * validate, store, drop duplicate deliveries, trigger the group's automatic
 * summary when due, then dispatch. Rate limits are charged only for messages
 * the bot is about to answer.
 * Automatic summaries run in the background and are never awaited here.
 */

import { env } from '~/config/env'
import type { OutboundGateway } from '~/core/gateway/OutboundGateway'
import type { DedupCache } from '~/core/utils/dedupCache'
import type { RateLimiter } from '~/core/utils/rateLimiter'
import { createFlowLogger } from '~/core/utils/logger'
import { jidUser, normalizeJid } from '~/core/utils/jid'
import { groupRepository, type GroupRepository } from '~/database/repositories/groupRepository'
import { messageRepository, type MessageRepository } from '~/database/repositories/messageRepository'
import { senderRepository, type SenderRepository } from '~/database/repositories/senderRepository'
import type { Group } from '~/database/schemas/group'
import { isKbQaCommand, type KnowledgeBaseQaCommand } from '~/features/knowledge/services/KnowledgeBaseQaCommand'
import { containsInviteLink, type GroupLinkSpamService } from '~/features/moderation/services/GroupLinkSpamService'
import type { OptOutService } from '~/features/privacy/services/OptOutService'
import type { MessageRouter } from '~/features/routing/services/MessageRouter'
import type { SummaryTaskQueue } from '~/features/summary/services/SummaryTaskQueue'
import { inboundMessageSchema, type InboundMessage } from '../schemas/inboundMessage'

const logger = createFlowLogger('message-processing')

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

export type ProcessingOutcome = 'invalid' | 'stored' | 'duplicate' | 'rate_limited' | 'ignored' | 'handled' | 'failed'

export interface ProcessingConfig {
    botJid: string
    dmAutoreplyEnabled: boolean
    dmAutoreplyMessage: string
    qaTesters: string[]
    qaTestGroups: string[]
}

export interface MessageProcessingDeps {
    dedup: DedupCache
    userLimiter: RateLimiter
    groupLimiter: RateLimiter
    summaryQueue: Pick<SummaryTaskQueue, 'isInProgress' | 'enqueue'>
    router: Pick<MessageRouter, 'route'>
    optOut: Pick<OptOutService, 'parseCommand' | 'handleCommand'>
    spam: Pick<GroupLinkSpamService, 'check'>
    kbQa: Pick<KnowledgeBaseQaCommand, 'execute'>
    gateway: OutboundGateway
    messages?: Pick<MessageRepository, 'create' | 'countGroupMessagesAfter'>
    senders?: Pick<SenderRepository, 'upsert'>
    groups?: Pick<GroupRepository, 'upsert'>
    config?: Partial<ProcessingConfig>
}

export class MessageProcessingService {
    private readonly messages: NonNullable<MessageProcessingDeps['messages']>
    private readonly senders: NonNullable<MessageProcessingDeps['senders']>
    private readonly groups: NonNullable<MessageProcessingDeps['groups']>
    private readonly config: ProcessingConfig
    private readonly botMention: RegExp

    constructor(private readonly deps: MessageProcessingDeps) {
        this.messages = deps.messages ?? messageRepository
        this.senders = deps.senders ?? senderRepository
        this.groups = deps.groups ?? groupRepository

        const config = {
            botJid: env.BOT_JID,
            dmAutoreplyEnabled: env.DM_AUTOREPLY_ENABLED,
            dmAutoreplyMessage: env.DM_AUTOREPLY_MESSAGE,
            qaTesters: env.QA_TESTERS,
            qaTestGroups: env.QA_TEST_GROUPS,
            ...deps.config,
        }

        this.config = {
            ...config,
            botJid: normalizeJid(config.botJid),
            qaTesters: config.qaTesters.map(normalizeJid),
            qaTestGroups: config.qaTestGroups.map(normalizeJid),
        }
        // A longer number sharing the bot's digits is someone else
        this.botMention = new RegExp(`@${escapeRegExp(jidUser(this.config.botJid))}(?!\\d)`)
    }

    async handle(event: unknown): Promise<ProcessingOutcome> {
        const parsed = inboundMessageSchema.safeParse(event)
        if (!parsed.success) {
            logger.warn({ issues: parsed.error.issues }, 'Dropping malformed inbound message')
            return 'invalid'
        }

        const message = parsed.data
        const group = await this.store(message)

        if (!message.text) {
            return 'stored'
        }

        if (await this.deps.dedup.seen(message.messageId)) {
            logger.info({ messageId: message.messageId }, 'Duplicate delivery, skipping')
            return 'duplicate'
        }

        if (group) {
            await this.checkAutoSummary(group)
        }

        if (message.senderId === this.config.botJid) {
            return 'ignored'
        }

        try {
            return group ? await this.dispatchGroupMessage(message, group) : await this.dispatchDirectMessage(message)
        } catch (error) {
            logger.error({ err: error, messageId: message.messageId, chatId: message.chatId }, 'Message handling failed')
            return 'failed'
        }
    }

    private async store(message: InboundMessage): Promise<Group | null> {
        await this.senders.upsert(message.senderId, message.pushName)
        const group = message.groupId ? await this.groups.upsert({ group_id: message.groupId }) : null

        const inserted = await this.messages.create({
            message_id: message.messageId,
            chat_id: message.chatId,
            sender_id: message.senderId,
            group_id: message.groupId,
            timestamp: message.timestamp,
            text: message.text,
            media_url: message.mediaUrl,
            reply_to_id: message.replyToId,
        })

        logger.debug({ messageId: message.messageId, inserted }, 'Message stored')
        return group
    }

    private mentionsBot(message: InboundMessage): boolean {
        return this.botMention.test(message.text ?? '')
    }

    private withinRateLimits(message: InboundMessage): boolean {
        if (!this.deps.userLimiter.allow(message.senderId)) {
            logger.warn({ senderId: message.senderId }, 'User rate limit exceeded')
            return false
        }

        if (message.groupId && !this.deps.groupLimiter.allow(message.groupId)) {
            logger.warn({ groupId: message.groupId }, 'Group rate limit exceeded')
            return false
        }

        return true
    }

    private async checkAutoSummary(group: Group): Promise<void> {
        const threshold = group.auto_summary_threshold
        if (!threshold || this.deps.summaryQueue.isInProgress(group.group_id)) {
            return
        }

        try {
            // Live count rather than a counter, so concurrent deliveries agree
            const count = await this.messages.countGroupMessagesAfter(
                group.group_id,
                group.last_summary_sync,
                this.config.botJid
            )

            logger.debug({ groupId: group.group_id, count, threshold }, 'Auto-summary check')

            if (count >= threshold) {
                this.deps.summaryQueue.enqueue(group.group_id)
            }
        } catch (error) {
            logger.error({ err: error, groupId: group.group_id }, 'Auto-summary check failed')
        }
    }

    private async dispatchDirectMessage(message: InboundMessage): Promise<ProcessingOutcome> {
        if (!this.withinRateLimits(message)) {
            return 'rate_limited'
        }

        const command = this.deps.optOut.parseCommand(message.text ?? '')
        if (command) {
            const reply = await this.deps.optOut.handleCommand(message.senderId, command)
            await this.deps.gateway.send(message.chatId, reply)
            return 'handled'
        }

        if (this.config.dmAutoreplyEnabled) {
            await this.deps.gateway.send(message.chatId, this.config.dmAutoreplyMessage)
            return 'handled'
        }

        logger.info({ senderId: message.senderId }, 'Autoreply disabled, ignoring direct message')
        return 'ignored'
    }

    private async dispatchGroupMessage(message: InboundMessage, group: Group): Promise<ProcessingOutcome> {
        const text = message.text ?? ''

        if (isKbQaCommand(text)) {
            if (
                !this.config.qaTestGroups.includes(message.chatId) ||
                !this.config.qaTesters.includes(message.senderId)
            ) {
                logger.warn({ chatId: message.chatId, senderId: message.senderId }, 'Unauthorized QA command')
                return 'ignored'
            }

            await this.deps.kbQa.execute(message)
            return 'handled'
        }

        if (!group.managed) {
            logger.debug({ groupId: group.group_id }, 'Ignoring message from unmanaged group')
            return 'ignored'
        }

        if (this.mentionsBot(message)) {
            if (!this.withinRateLimits(message)) {
                return 'rate_limited'
            }

            await this.deps.router.route(message)
            return 'handled'
        }

        if (group.notify_on_spam && containsInviteLink(text)) {
            await this.deps.spam.check(message, group)
            return 'handled'
        }

        return 'ignored'
    }
}
