import { describe, it, expect } from 'vitest'
import { makeClientBuffer } from './buffer.js'
import { LogChannel, type ClientLog } from './types.js'

function entry(message: string): ClientLog {
    return { ts: 0, channel: LogChannel.app, emoji: '📦', color: 'blue', level: 'info', message }
}

describe('makeClientBuffer', () => {
    it('should keep only the newest entries up to its limit', () => {
        const buf = makeClientBuffer(3)
        for (const m of ['a', 'b', 'c', 'd', 'e']) buf.push(entry(m))

        expect(buf.getLatest(10).map((l) => l.message)).toEqual(['c', 'd', 'e'])
        expect(buf.getLatest(2).map((l) => l.message)).toEqual(['d', 'e'])
    })

    it('should return nothing for a non-positive count', () => {
        const buf = makeClientBuffer(3)
        buf.push(entry('a'))
        expect(buf.getLatest(0)).toEqual([])
        expect(buf.getLatest(-1)).toEqual([])
    })

    it('should fall back to 500 entries for an unusable limit', () => {
        const buf = makeClientBuffer(0)
        for (let i = 0; i < 501; i++) buf.push(entry(String(i)))

        const all = buf.getLatest(1000)
        expect(all).toHaveLength(500)
        expect(all[0]?.message).toBe('1')
    })

    it('should notify subscribers until they unsubscribe', () => {
        const buf = makeClientBuffer(10)
        const seen: string[] = []
        const unsubscribe = buf.subscribe((l) => seen.push(l.message))

        buf.push(entry('first'))
        unsubscribe()
        buf.push(entry('second'))

        expect(seen).toEqual(['first'])
    })
})
