/**
 * Splits a message history into overlapping conversation chunks
 */

export interface SplitOptions {
    /** A silence at least this long starts a new segment */
    gapHours?: number
    /** Segments shorter than this are merged with the following ones */
    minSize?: number
    maxSize?: number
    /** Trailing messages of the previous chunk repeated at the start of the next */
    overlap?: number
}

export const DEFAULT_SPLIT_OPTIONS: Required<SplitOptions> = {
    gapHours: 2,
    minSize: 25,
    maxSize: 200,
    overlap: 5,
}

const HOUR_MS = 60 * 60 * 1000

export function splitConversation<T extends { timestamp: Date }>(messages: T[], options: SplitOptions = {}): T[][] {
    if (messages.length === 0) {
        return []
    }

    const { gapHours, minSize, maxSize, overlap } = { ...DEFAULT_SPLIT_OPTIONS, ...options }
    const sorted = [...messages].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())

    const segments = splitOnGaps(sorted, gapHours * HOUR_MS)
    const merged = mergeSmallSegments(segments, minSize)
    const bounded = merged.flatMap((segment) => splitLargeSegment(segment, Math.max(1, maxSize)))

    return bounded.map((chunk, index) => {
        const previous = bounded[index - 1]
        if (!previous || overlap <= 0) {
            return chunk
        }
        return [...previous.slice(-overlap), ...chunk]
    })
}

function splitOnGaps<T extends { timestamp: Date }>(sorted: T[], gapMs: number): T[][] {
    const segments: T[][] = []
    let current: T[] = []

    sorted.forEach((message, index) => {
        const previous = sorted[index - 1]
        if (previous && message.timestamp.getTime() - previous.timestamp.getTime() >= gapMs) {
            segments.push(current)
            current = []
        }
        current.push(message)
    })

    segments.push(current)
    return segments
}

function mergeSmallSegments<T>(segments: T[][], minSize: number): T[][] {
    const merged: T[][] = []
    let buffer: T[] = []

    for (const segment of segments) {
        if (buffer.length < minSize) {
            buffer.push(...segment)
        } else {
            merged.push(buffer)
            buffer = [...segment]
        }
    }

    if (buffer.length > 0) {
        merged.push(buffer)
    }

    return merged
}

function splitLargeSegment<T>(segment: T[], maxSize: number): T[][] {
    const pieces: T[][] = []
    for (let start = 0; start < segment.length; start += maxSize) {
        pieces.push(segment.slice(start, start + maxSize))
    }
    return pieces
}
