// services/programmer/src/devices/eeprom-programmer/TransferEngine.ts

import type { ChannelLogger } from '@romlink/logging'
import { OPCODES, type Link } from '../../core/link/types.js'
import type {
    AddressRange,
    DeviceFamily,
    ProgressPhase,
    ProgressSink,
    TransferRequest,
    WriteResult,
} from './types.js'
import {
    asTransferStep,
    CapacityExceededError,
    InvalidRangeError,
    TransferCancelledError,
    TransferError,
} from './errors.js'
import { formatRange, rangeLength, validateProfile } from './geometry.js'
import { planChunks } from './pager.js'
import { VerificationEngine, type RangeReader } from './VerificationEngine.js'

export interface TransferEngineOptions {
    /**
     * Consecutive empty reads tolerated in one ranged read before the device
     * is considered stalled. 0 or negative disables the limit.
     */
    maxIdleReads: number
    /** Polled between chunks only; an in-flight chunk always completes. */
    signal?: AbortSignal
    log?: ChannelLogger
}

export function percentOf(done: number, total: number): number {
    if (total <= 0) return 100
    return Math.floor((done * 100) / total)
}

/**
 * TransferEngine
 *
 * Drives one Link through paged writes and ranged reads. Every command
 * waits for its acknowledgment before the next is sent, so chunks land in
 * strictly increasing address order.
 */
export class TransferEngine implements RangeReader {
    private readonly link: Link
    private readonly options: TransferEngineOptions
    private readonly verifier: VerificationEngine

    constructor(link: Link, options: TransferEngineOptions) {
        this.link = link
        this.options = options
        this.verifier = new VerificationEngine(this)
    }

    /* ---------------------------------------------------------------------- */
    /*  Write path                                                            */
    /* ---------------------------------------------------------------------- */

    /**
     * Select family (unlocking EEPROM), write page-aligned chunks from offset
     * 0, re-lock EEPROM, then read the span back for verification.
     *
     * A transport failure aborts without rollback; a cancel finishes the
     * current chunk, re-locks, and throws TransferCancelledError. A source
     * that runs short also re-locks before its TransferError is thrown.
     */
    async write(request: TransferRequest, progress: ProgressSink): Promise<WriteResult> {
        const { data, totalLength } = request
        const profile = validateProfile(request.profile)

        if (!Number.isInteger(totalLength) || totalLength < 0) {
            throw new InvalidRangeError(`invalid transfer length ${totalLength}`)
        }
        if (totalLength > profile.capacityBytes) {
            throw new CapacityExceededError(totalLength, profile.capacityBytes)
        }
        if (totalLength === 0) {
            return { bytesWritten: 0, verification: { kind: 'ok' } }
        }
        this.throwIfCancelled(0)

        await this.beginSession(profile.family)

        let written = 0
        let cancelled = false
        let shortSource: TransferError | null = null
        progress.report({ phase: 'writing', percent: 0 })

        for (const chunk of planChunks(0, totalLength, profile.pageSizeBytes)) {
            if (this.options.signal?.aborted) {
                cancelled = true
                break
            }

            const length = rangeLength(chunk)
            // Source is read before the command so a short file never leaves
            // the programmer waiting for payload.
            const payload = await data.read(length)
            if (payload.length !== length) {
                // The channel is still in sync here, so the lock below can run.
                shortSource = new TransferError(
                    `source ended at offset ${chunk.start + payload.length}, expected ${totalLength} bytes`
                )
                break
            }

            await asTransferStep(`page write ${formatRange(chunk)}`, async () => {
                await this.link.sendCommand(OPCODES.pageWrite, chunk)
                await this.link.writeBytes(payload)
                await this.link.readAck()
            })

            written += length
            progress.report({ phase: 'writing', percent: percentOf(written, totalLength) })
        }

        // Protection is restored regardless of what verification finds.
        if (profile.family === 'eeprom') {
            await asTransferStep('lock', async () => {
                await this.link.sendCommand(OPCODES.lock)
                await this.link.readAck()
            })
        }

        if (shortSource) throw shortSource

        if (cancelled) {
            this.options.log?.warn(`write cancelled after bytes=${written} of total=${totalLength}`)
            throw new TransferCancelledError(written)
        }

        this.options.log?.debug(`write complete bytes=${written}; verifying`)
        await data.rewind()
        const verification = await this.verifier.verify({ start: 0, end: written - 1 }, data, progress)
        return { bytesWritten: written, verification }
    }

    private async beginSession(family: DeviceFamily): Promise<void> {
        const opcode = family === 'eeprom' ? OPCODES.selectEeprom : OPCODES.selectFlash
        await asTransferStep(family === 'eeprom' ? 'unlock' : 'flash select', async () => {
            await this.link.sendCommand(opcode)
            await this.link.readAck()
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Read path                                                             */
    /* ---------------------------------------------------------------------- */

    /**
     * Lazy, single-pass sequence of exactly `end - start + 1` bytes, yielded
     * in chunks as the Link delivers them. Empty reads are retried; the
     * trailing acknowledgment is consumed after the last byte.
     */
    async *read(range: AddressRange, progress: ProgressSink, phase: ProgressPhase = 'reading'): AsyncGenerator<Uint8Array> {
        if (!Number.isInteger(range.start) || range.start < 0 || range.end < range.start) {
            throw new InvalidRangeError(`invalid read range ${formatRange(range)}`)
        }

        const total = rangeLength(range)
        const maxIdle = this.options.maxIdleReads
        let received = 0
        let idle = 0

        await asTransferStep(`read ${formatRange(range)}`, () => this.link.sendCommand(OPCODES.read, range))
        progress.report({ phase, percent: 0 })

        while (received < total) {
            this.throwIfCancelled(received)

            let bytes = await asTransferStep('read', () => this.link.readBytes(total - received))
            if (bytes.length === 0) {
                idle += 1
                if (maxIdle > 0 && idle >= maxIdle) {
                    throw new TransferError(
                        `device stalled after ${received} of ${total} bytes (${idle} empty reads)`
                    )
                }
                continue
            }
            idle = 0

            if (bytes.length > total - received) {
                bytes = bytes.subarray(0, total - received)
            }
            received += bytes.length
            progress.report({ phase, percent: percentOf(received, total) })
            yield bytes
        }

        await asTransferStep('read acknowledgment', () => this.link.readAck())
    }

    private throwIfCancelled(bytesTransferred: number): void {
        if (this.options.signal?.aborted) {
            throw new TransferCancelledError(bytesTransferred)
        }
    }
}
