/**
 * Participant id tests
 */

import { describe, it, expect } from 'vitest'
import { isGroupJid, jidUser, normalizeJid, parseJid } from '~/core/utils/jid'

describe('jid helpers', () => {
    it('parses user, device and server', () => {
        expect(parseJid('972501234567:12@s.whatsapp.net')).toEqual({
            user: '972501234567',
            device: '12',
            server: 's.whatsapp.net',
        })
    })

    it('drops the device when normalizing', () => {
        expect(normalizeJid('972501234567:12@S.WhatsApp.net')).toBe('972501234567@s.whatsapp.net')
        expect(normalizeJid('972501234567')).toBe('972501234567@s.whatsapp.net')
    })

    it('returns the user part', () => {
        expect(jidUser('972501234567:3@s.whatsapp.net')).toBe('972501234567')
    })

    it('recognizes group ids', () => {
        expect(isGroupJid('120363025246125486@g.us')).toBe(true)
        expect(isGroupJid('972501234567@s.whatsapp.net')).toBe(false)
    })
})
