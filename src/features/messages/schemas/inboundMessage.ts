import { z } from 'zod'
import { isGroupJid, normalizeJid } from '~/core/utils/jid'

const jid = z
    .string()
    .trim()
    .min(1)
    .refine((value) => value.includes('@'), 'Expected an id of the form user@server')
    .transform(normalizeJid)

/**
 * Inbound chat message as delivered by the gateway webhook, normalized
 */
export const inboundMessageSchema = z
    .object({
        messageId: z.string().trim().min(1),
        chatId: jid,
        senderId: jid,
        pushName: z.string().trim().min(1).nullish(),
        timestamp: z.coerce.date().refine((date) => !Number.isNaN(date.getTime()), 'Invalid timestamp'),
        text: z.string().nullish(),
        mediaUrl: z.string().url().nullish(),
        replyToId: z.string().min(1).nullish(),
    })
    .transform((event) => ({
        messageId: event.messageId,
        chatId: event.chatId,
        senderId: event.senderId,
        groupId: isGroupJid(event.chatId) ? event.chatId : null,
        pushName: event.pushName ?? null,
        timestamp: event.timestamp,
        text: event.text ?? null,
        mediaUrl: event.mediaUrl ?? null,
        replyToId: event.replyToId ?? null,
    }))

export type InboundMessageEvent = z.input<typeof inboundMessageSchema>
export type InboundMessage = z.output<typeof inboundMessageSchema>
