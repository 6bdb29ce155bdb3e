import { describe, it, expect } from 'vitest'
import { VerificationEngine, type RangeReader } from './VerificationEngine.js'
import { TransferEngine } from './TransferEngine.js'
import { bufferSource } from './sources.js'
import { TransferError } from './errors.js'
import { FakeProgrammer } from '../../testing/FakeProgrammer.js'
import type { ProgressSink } from './types.js'

const quiet: ProgressSink = { report: () => undefined }

function stubReader(chunks: number[][]): RangeReader {
    return {
        async *read() {
            for (const c of chunks) yield Uint8Array.from(c)
        },
    }
}

describe('VerificationEngine', () => {
    it('should accept a matching readback', async () => {
        const verifier = new VerificationEngine(stubReader([[1, 2], [3, 4, 5]]))
        const result = await verifier.verify({ start: 0, end: 4 }, bufferSource(Uint8Array.from([1, 2, 3, 4, 5])), quiet)
        expect(result).toEqual({ kind: 'ok' })
    })

    it('should report offsets relative to the range start', async () => {
        const verifier = new VerificationEngine(stubReader([[1, 2], [3, 9]]))
        const result = await verifier.verify(
            { start: 0x200, end: 0x203 },
            bufferSource(Uint8Array.from([1, 2, 3, 4])),
            quiet
        )
        expect(result).toEqual({ kind: 'mismatch', offset: 0x203, expected: 4, actual: 9 })
    })

    it('should fail when the expected data runs out first', async () => {
        const verifier = new VerificationEngine(stubReader([[1, 2, 3, 4]]))
        await expect(
            verifier.verify({ start: 0, end: 3 }, bufferSource(Uint8Array.from([1, 2])), quiet)
        ).rejects.toThrow(TransferError)
    })

    it('should stop reading the device at the first differing byte', async () => {
        const fake = new FakeProgrammer({ capacityBytes: 256, maxBytesPerRead: 16 })
        const expected = Uint8Array.from({ length: 256 }, (_, i) => i)
        fake.memory.set(expected)
        fake.memory[20] = 0xaa
        const engine = new TransferEngine(await fake.open(), { maxIdleReads: 50 })

        const result = await new VerificationEngine(engine).verify({ start: 0, end: 255 }, bufferSource(expected), quiet)

        expect(result).toEqual({ kind: 'mismatch', offset: 20, expected: 20, actual: 0xaa })
        expect(fake.bytesServed).toBe(32)
        expect(fake.acksRead).toEqual([])
    })
})
