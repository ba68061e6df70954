import { jidUser } from '~/core/utils/jid'

/**
 * user part -> display text, for senders who opted out of being tagged
 */
export type OptOutDisplayMap = ReadonlyMap<string, string>

/**
 * `972501234567` -> `972 501234567`, so the chat does not render a mention
 */
export function untaggableNumber(user: string): string {
    return user.length > 3 ? `${user.slice(0, 3)} ${user.slice(3)}` : user
}

/**
 * How a sender is shown in text for a model or a user: a tag, unless they opted out
 */
export function displaySender(senderId: string, optOuts: OptOutDisplayMap): string {
    const user = jidUser(senderId)
    return optOuts.get(user) ?? `@${user}`
}

/**
 * Chat history as `{ISO time}: {sender}: {text}` lines, skipping messages without text
 */
export function renderChatLines(
    messages: Array<{ sender_id: string; timestamp: Date; text: string | null }>,
    optOuts: OptOutDisplayMap
): string {
    return messages
        .filter((message) => message.text)
        .map((message) => `${message.timestamp.toISOString()}: ${displaySender(message.sender_id, optOuts)}: ${message.text}`)
        .join('\n')
}
