/**
 * Identity codec tests
 */

import { describe, it, expect } from 'vitest'
import {
    BOT_TOKEN,
    PseudonymMap,
    pseudonymize,
    referencedTokens,
    reidentify,
} from '~/features/knowledge/utils/identityCodec'
import { BOT_JID, buildMessage, hoursAfterBase } from '../../utils/factories'

const ALICE = '972501111111@s.whatsapp.net'
const BOB = '972502222222@s.whatsapp.net'

describe('pseudonymize', () => {
    const messages = [
        buildMessage({ sender_id: ALICE, timestamp: hoursAfterBase(0), text: 'Can @972502222222 review the plan?' }),
        buildMessage({ sender_id: BOB, timestamp: hoursAfterBase(0.5), text: 'Sure, @972503333333 helps too' }),
        buildMessage({ sender_id: BOT_JID, timestamp: hoursAfterBase(1), text: 'Noted' }),
        buildMessage({ sender_id: ALICE, timestamp: hoursAfterBase(1.5), text: null }),
    ]

    it('replaces senders and mentions with tokens', () => {
        const { text } = pseudonymize(messages, BOT_JID)

        expect(text).toBe(
            [
                '2024-03-01T10:00:00.000Z: @user_1: Can @user_2 review the plan?',
                '2024-03-01T10:30:00.000Z: @user_2: Sure, @user_3 helps too',
                '2024-03-01T11:00:00.000Z: @bot: Noted',
            ].join('\n')
        )
    })

    it('assigns sender tokens before mention tokens', () => {
        const { map } = pseudonymize(messages, BOT_JID)

        expect(map.tokenFor('972501111111')).toBe('user_1')
        expect(map.tokenFor('972502222222')).toBe('user_2')
        expect(map.tokenFor('972503333333')).toBe('user_3')
        expect(map.tokenFor('972500000000')).toBe(BOT_TOKEN)
    })

    it('restores every identifier when reversed', () => {
        const { text, map } = pseudonymize(messages, BOT_JID)

        expect(reidentify(text, map.reverse)).toBe(
            [
                '2024-03-01T10:00:00.000Z: @972501111111: Can @972502222222 review the plan?',
                '2024-03-01T10:30:00.000Z: @972502222222: Sure, @972503333333 helps too',
                '2024-03-01T11:00:00.000Z: @972500000000: Noted',
            ].join('\n')
        )
    })

    it('keeps one token per participant across devices', () => {
        const { map } = pseudonymize(
            [
                buildMessage({ sender_id: '972501111111:3@s.whatsapp.net', text: 'from phone' }),
                buildMessage({ sender_id: ALICE, text: 'from desktop' }),
            ],
            BOT_JID
        )

        expect([...map.forward.entries()]).toEqual([
            ['972500000000', 'bot'],
            ['972501111111', 'user_1'],
        ])
    })

    it('leaves email addresses and alphanumeric handles alone', () => {
        const { text, map } = pseudonymize(
            [buildMessage({ sender_id: ALICE, text: 'Mail support@123.com or ask @12ab' })],
            BOT_JID
        )

        expect(text).toBe('2024-03-01T10:00:00.000Z: @user_1: Mail support@123.com or ask @12ab')
        expect(map.tokenFor('123')).toBeUndefined()
        expect(map.tokenFor('12')).toBeUndefined()
    })
})

describe('reidentify', () => {
    it('leaves unknown tokens untouched', () => {
        const reverse = new Map([['user_1', '972501111111']])

        expect(reidentify('@user_1 and @user_9 agreed', reverse)).toBe('@972501111111 and @user_9 agreed')
    })

    it('maps every text of a list', () => {
        const reverse = new Map([['user_2', '972502222222']])

        expect(reidentify(['@user_2 said', 'nothing here'], reverse)).toEqual(['@972502222222 said', 'nothing here'])
    })

    it('does not treat a longer token as a prefix match', () => {
        const reverse = new Map([['user_1', '972501111111']])

        expect(reidentify('@user_12 spoke', reverse)).toBe('@user_12 spoke')
    })
})

describe('referencedTokens', () => {
    it('lists user tokens once in first-seen order', () => {
        expect(referencedTokens('@user_2 thanked @user_1', 'and @user_2 again, @bot too')).toEqual(['user_2', 'user_1'])
    })
})

describe('PseudonymMap', () => {
    it('restricts the reverse map to the given tokens', () => {
        const map = new PseudonymMap('972500000000')
        map.assign('972501111111')
        map.assign('972502222222')

        expect([...map.restrictTo(['user_2', 'user_7']).entries()]).toEqual([['user_2', '972502222222']])
    })
})
