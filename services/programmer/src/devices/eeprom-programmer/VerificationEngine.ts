import type {
    AddressRange,
    ByteSource,
    ProgressPhase,
    ProgressSink,
    VerificationResult,
} from './types.js'
import { TransferError } from './errors.js'

/** The read half of TransferEngine, which is all readback needs. */
export interface RangeReader {
    read(range: AddressRange, progress: ProgressSink, phase?: ProgressPhase): AsyncGenerator<Uint8Array>
}

/**
 * Write-then-readback check. Re-reads exactly the written range and compares
 * it in order with the source; there is no checksum in the protocol.
 */
export class VerificationEngine {
    constructor(private readonly reader: RangeReader) {}

    /**
     * Stops at the first differing byte. The ranged read is abandoned without
     * draining its trailing acknowledgment, so the caller must close the Link
     * rather than issue further commands after a mismatch.
     */
    async verify(range: AddressRange, expected: ByteSource, progress: ProgressSink): Promise<VerificationResult> {
        let offset = range.start

        for await (const chunk of this.reader.read(range, progress, 'verifying')) {
            const want = await expected.read(chunk.length)
            if (want.length < chunk.length) {
                throw new TransferError(
                    `expected data ended at 0x${(offset + want.length).toString(16)} before the verified range`
                )
            }

            for (let i = 0; i < chunk.length; i++) {
                const actual = chunk[i]
                const wanted = want[i]
                if (actual !== wanted) {
                    return { kind: 'mismatch', offset: offset + i, expected: wanted, actual }
                }
            }
            offset += chunk.length
        }

        return { kind: 'ok' }
    }
}
