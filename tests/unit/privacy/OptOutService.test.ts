/**
 * Opt-out tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { OPT_OUT_REPLIES, OptOutService } from '~/features/privacy/services/OptOutService'
import { displaySender, renderChatLines, untaggableNumber } from '~/features/privacy/utils/displayName'
import { hoursAfterBase } from '../../utils/factories'

const ALICE = '972501111111@s.whatsapp.net'
const BOB = '972502222222@s.whatsapp.net'

describe('OptOutService', () => {
    let optedOut: Set<string>
    let service: OptOutService

    beforeEach(() => {
        optedOut = new Set()
        service = new OptOutService({
            optOuts: {
                isOptedOut: async (senderId) => optedOut.has(senderId),
                create: async (senderId) => {
                    if (optedOut.has(senderId)) {
                        return false
                    }
                    optedOut.add(senderId)
                    return true
                },
                delete: async (senderId) => optedOut.delete(senderId),
                filterOptedOut: async (senderIds) => senderIds.filter((senderId) => optedOut.has(senderId)),
            },
            senders: {
                getByIds: async (senderIds) =>
                    senderIds.includes(ALICE) ? [{ sender_id: ALICE, push_name: 'Alice' }] : [],
            },
        })
    })

    describe('parseCommand', () => {
        it('recognizes the commands regardless of case and spacing', () => {
            expect(service.parseCommand('  Opt-Out ')).toBe('opt-out')
            expect(service.parseCommand('OPT-IN')).toBe('opt-in')
            expect(service.parseCommand('status')).toBe('status')
        })

        it('ignores anything else', () => {
            expect(service.parseCommand('opt out')).toBeNull()
            expect(service.parseCommand('please opt-out')).toBeNull()
        })
    })

    describe('handleCommand', () => {
        it('opts out once', async () => {
            expect(await service.handleCommand(ALICE, 'opt-out')).toBe(OPT_OUT_REPLIES.optedOut)
            expect(await service.handleCommand(ALICE, 'opt-out')).toBe(OPT_OUT_REPLIES.alreadyOptedOut)
            expect(await service.handleCommand(ALICE, 'status')).toBe(OPT_OUT_REPLIES.statusOut)
        })

        it('opts back in', async () => {
            optedOut.add(ALICE)

            expect(await service.handleCommand(ALICE, 'opt-in')).toBe(OPT_OUT_REPLIES.optedIn)
            expect(await service.handleCommand(ALICE, 'opt-in')).toBe(OPT_OUT_REPLIES.alreadyOptedIn)
            expect(await service.handleCommand(ALICE, 'status')).toBe(OPT_OUT_REPLIES.statusIn)
        })
    })

    describe('getOptOutMap', () => {
        it('maps opted-out senders to their name or an untaggable number', async () => {
            optedOut.add(ALICE)
            optedOut.add(BOB)

            const map = await service.getOptOutMap([ALICE, '972502222222:4@s.whatsapp.net', ALICE])

            expect([...map.entries()]).toEqual([
                ['972501111111', 'Alice'],
                ['972502222222', '972 502222222'],
            ])
        })

        it('is empty when nobody opted out', async () => {
            expect((await service.getOptOutMap([ALICE, BOB])).size).toBe(0)
        })
    })
})

describe('display names', () => {
    const optOuts = new Map([['972501111111', 'Alice']])

    it('tags senders who did not opt out', () => {
        expect(displaySender(BOB, optOuts)).toBe('@972502222222')
        expect(displaySender(ALICE, optOuts)).toBe('Alice')
    })

    it('splits numbers so they do not render as mentions', () => {
        expect(untaggableNumber('972501111111')).toBe('972 501111111')
        expect(untaggableNumber('123')).toBe('123')
    })

    it('renders chat lines without empty messages', () => {
        const lines = renderChatLines(
            [
                { sender_id: ALICE, timestamp: hoursAfterBase(0), text: 'hello' },
                { sender_id: BOB, timestamp: hoursAfterBase(1), text: null },
                { sender_id: BOB, timestamp: hoursAfterBase(2), text: 'hi' },
            ],
            optOuts
        )

        expect(lines).toBe('2024-03-01T10:00:00.000Z: Alice: hello\n2024-03-01T12:00:00.000Z: @972502222222: hi')
    })
})
