/**
 * Chat participant identifiers
 *
 * Identifiers look like `<user>[:<device>]@<server>`, e.g.
 * `972501234567:12@s.whatsapp.net` or `120363025246125486@g.us`.
 */

export const GROUP_SERVER = 'g.us'
export const DEFAULT_USER_SERVER = 's.whatsapp.net'

export interface ParsedJid {
    user: string
    device?: string
    server: string
}

export function parseJid(jid: string): ParsedJid {
    const trimmed = jid.trim()
    const atIndex = trimmed.lastIndexOf('@')
    const local = atIndex === -1 ? trimmed : trimmed.slice(0, atIndex)
    const server = atIndex === -1 ? DEFAULT_USER_SERVER : trimmed.slice(atIndex + 1).toLowerCase()

    const colonIndex = local.indexOf(':')
    if (colonIndex === -1) {
        return { user: local, server }
    }

    return {
        user: local.slice(0, colonIndex),
        device: local.slice(colonIndex + 1),
        server,
    }
}

/**
 * Drop the device suffix so every device of a participant maps to one id
 */
export function normalizeJid(jid: string): string {
    const { user, server } = parseJid(jid)
    return `${user}@${server}`
}

/**
 * The part before `@` (and before any device suffix)
 */
export function jidUser(jid: string): string {
    return parseJid(jid).user
}

export function isGroupJid(jid: string): boolean {
    return parseJid(jid).server === GROUP_SERVER
}
