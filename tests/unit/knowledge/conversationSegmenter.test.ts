/**
 * Conversation segmenter tests
 */

import { describe, it, expect } from 'vitest'
import { splitConversation } from '~/features/knowledge/utils/conversationSegmenter'
import { buildMessage, hoursAfterBase } from '../../utils/factories'

function atHours(offsets: number[]) {
    return offsets.map((hours, index) => buildMessage({ message_id: `m${index}`, timestamp: hoursAfterBase(hours) }))
}

function ids(chunks: Array<Array<{ message_id: string }>>): string[][] {
    return chunks.map((chunk) => chunk.map((message) => message.message_id))
}

describe('splitConversation', () => {
    it('returns no chunks for no messages', () => {
        expect(splitConversation([])).toEqual([])
    })

    it('keeps a small history in a single chunk', () => {
        const chunks = splitConversation(atHours([0, 0.1, 0.2, 3.5, 3.6]))

        expect(ids(chunks)).toEqual([['m0', 'm1', 'm2', 'm3', 'm4']])
    })

    it('splits on silences of at least the gap', () => {
        const chunks = splitConversation(atHours([0, 0.1, 0.2, 3.5, 3.6]), { minSize: 1, overlap: 0 })

        expect(ids(chunks)).toEqual([
            ['m0', 'm1', 'm2'],
            ['m3', 'm4'],
        ])
    })

    it('prefixes later chunks with the tail of the previous one', () => {
        const chunks = splitConversation(atHours([0, 0.1, 0.2, 3.5, 3.6]), { minSize: 1, overlap: 5 })

        expect(chunks.map((chunk) => chunk.length)).toEqual([3, 5])
        expect(ids(chunks)[1]).toEqual(['m0', 'm1', 'm2', 'm3', 'm4'])
    })

    it('treats a silence of exactly the gap as a split', () => {
        const chunks = splitConversation(atHours([0, 2]), { minSize: 1, overlap: 0 })

        expect(ids(chunks)).toEqual([['m0'], ['m1']])
    })

    it('merges segments until they reach the minimum size', () => {
        const chunks = splitConversation(atHours([0, 3, 6, 9, 12]), { minSize: 2, overlap: 0 })

        expect(ids(chunks)).toEqual([['m0', 'm1'], ['m2', 'm3'], ['m4']])
    })

    it('caps chunks at the maximum size', () => {
        const offsets = Array.from({ length: 7 }, (_, index) => index * 0.01)
        const chunks = splitConversation(atHours(offsets), { maxSize: 3, overlap: 0 })

        expect(chunks.map((chunk) => chunk.length)).toEqual([3, 3, 1])
    })

    it('sorts input by timestamp', () => {
        const [late, early] = atHours([1, 0])
        const chunks = splitConversation([late, early])

        expect(ids(chunks)).toEqual([[early.message_id, late.message_id]])
    })

    it('partitions the history once the overlap is removed', () => {
        const offsets = [
            ...Array.from({ length: 30 }, (_, index) => index * 0.05),
            ...Array.from({ length: 40 }, (_, index) => 10 + index * 0.05),
        ]
        const messages = atHours(offsets)
        const overlap = 4

        const chunks = splitConversation(messages, { minSize: 10, maxSize: 25, overlap })
        const withoutOverlap = chunks.flatMap((chunk, index) => (index === 0 ? chunk : chunk.slice(overlap)))

        expect(withoutOverlap.map((message) => message.message_id)).toEqual(messages.map((message) => message.message_id))
        expect(chunks.every((chunk, index) => index === 0 || chunk.length <= 25 + overlap)).toBe(true)
    })
})
