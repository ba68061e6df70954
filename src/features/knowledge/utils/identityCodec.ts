/**
 * Identity Codec
 *
 * Replaces participant identifiers with opaque tokens (`user_1`, `user_2`, ...,
 * and `bot` for the bot itself) before conversation text reaches a model, and
 * maps the tokens in model output back to identifiers afterwards.
 *
 * Identifiers are keyed by their user part, so a sender id
 * `972501234567@s.whatsapp.net` and a mention `@972501234567` share one token.
 */

import { jidUser } from '~/core/utils/jid'
import type { ConversationMessage } from '~/database/schemas/message'

export const BOT_TOKEN = 'bot'

// Whole `@<digits>` words only; email addresses and `@12ab` are not mentions
const MENTION_PATTERN = /(?<!\w)@(\d+)(?!\w)/g
const TOKEN_PATTERN = /@(user_\d+|bot)\b/g
const USER_TOKEN_PATTERN = /@(user_\d+)\b/g

/**
 * Bidirectional raw id <-> token record built by pseudonymize
 */
export class PseudonymMap {
    private readonly forwardMap = new Map<string, string>()
    private readonly reverseMap = new Map<string, string>()
    private nextIndex = 1

    constructor(selfUser?: string) {
        if (selfUser) {
            this.bind(selfUser, BOT_TOKEN)
        }
    }

    /** raw user part -> token */
    get forward(): ReadonlyMap<string, string> {
        return this.forwardMap
    }

    /** token -> raw user part */
    get reverse(): ReadonlyMap<string, string> {
        return this.reverseMap
    }

    /**
     * Token for a raw user part, assigning the next `user_<n>` on first sight
     */
    assign(rawUser: string): string {
        const existing = this.forwardMap.get(rawUser)
        if (existing) {
            return existing
        }

        const token = `user_${this.nextIndex++}`
        this.bind(rawUser, token)
        return token
    }

    tokenFor(rawUser: string): string | undefined {
        return this.forwardMap.get(rawUser)
    }

    rawFor(token: string): string | undefined {
        return this.reverseMap.get(token)
    }

    /**
     * Reverse map holding only the given tokens
     */
    restrictTo(tokens: Iterable<string>): Map<string, string> {
        const restricted = new Map<string, string>()
        for (const token of tokens) {
            const raw = this.reverseMap.get(token)
            if (raw !== undefined) {
                restricted.set(token, raw)
            }
        }
        return restricted
    }

    private bind(rawUser: string, token: string): void {
        this.forwardMap.set(rawUser, token)
        this.reverseMap.set(token, rawUser)
    }
}

export interface PseudonymizedConversation {
    text: string
    map: PseudonymMap
}

/**
 * Render messages as `{ISO time}: @{token}: {text}` lines with every sender and
 * `@<digits>` mention replaced by its token. Messages without text are left out.
 */
export function pseudonymize(messages: ConversationMessage[], selfId: string): PseudonymizedConversation {
    const map = new PseudonymMap(jidUser(selfId))

    for (const message of messages) {
        map.assign(jidUser(message.sender_id))
    }

    for (const message of messages) {
        for (const match of (message.text ?? '').matchAll(MENTION_PATTERN)) {
            map.assign(match[1])
        }
    }

    const lines = messages
        .filter((message) => message.text)
        .map((message) => {
            const speaker = map.assign(jidUser(message.sender_id))
            const body = (message.text ?? '').replace(MENTION_PATTERN, (_match, digits: string) => `@${map.assign(digits)}`)
            return `${message.timestamp.toISOString()}: @${speaker}: ${body}`
        })

    return { text: lines.join('\n'), map }
}

/**
 * Replace `@user_<n>` and `@bot` with `@<raw id>`; unknown tokens stay as they are
 */
export function reidentify(text: string, reverse: ReadonlyMap<string, string>): string
export function reidentify(texts: string[], reverse: ReadonlyMap<string, string>): string[]
export function reidentify(input: string | string[], reverse: ReadonlyMap<string, string>): string | string[] {
    if (Array.isArray(input)) {
        return input.map((text) => reidentify(text, reverse))
    }

    return input.replace(TOKEN_PATTERN, (match, token: string) => {
        const raw = reverse.get(token)
        return raw === undefined ? match : `@${raw}`
    })
}

/**
 * The `user_<n>` tokens mentioned in the given texts, in first-seen order
 */
export function referencedTokens(...texts: string[]): string[] {
    const tokens = new Set<string>()
    for (const text of texts) {
        for (const match of text.matchAll(USER_TOKEN_PATTERN)) {
            tokens.add(match[1])
        }
    }
    return [...tokens]
}
