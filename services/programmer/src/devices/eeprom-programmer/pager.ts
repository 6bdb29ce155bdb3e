import type { AddressRange } from './types.js'
import { isPowerOfTwo } from './geometry.js'

/**
 * Number of bytes from `current` to the end of its page, clipped to
 * `remaining`. A page write built from the result never spans two pages.
 *
 * Same value as `(current | (pageSize - 1)) - current + 1`, computed with
 * arithmetic so addresses above 2^31 stay unsigned.
 */
export function nextChunk(current: number, remaining: number, pageSizeBytes: number): number {
    if (!isPowerOfTwo(pageSizeBytes)) {
        throw new RangeError(`page size must be a power of two, got ${pageSizeBytes}`)
    }
    if (!Number.isInteger(remaining) || remaining < 1) {
        throw new RangeError(`remaining must be at least 1, got ${remaining}`)
    }
    const toPageEnd = pageSizeBytes - (current % pageSizeBytes)
    return Math.min(toPageEnd, remaining)
}

/**
 * Inclusive page-write ranges covering `totalLength` bytes from `start`,
 * strictly increasing and contiguous.
 */
export function* planChunks(start: number, totalLength: number, pageSizeBytes: number): Generator<AddressRange> {
    let current = start
    let remaining = totalLength
    while (remaining > 0) {
        const length = nextChunk(current, remaining, pageSizeBytes)
        yield { start: current, end: current + length - 1 }
        current += length
        remaining -= length
    }
}
