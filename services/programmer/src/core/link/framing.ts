// services/programmer/src/core/link/framing.ts

import type { AddressRange } from '../../devices/eeprom-programmer/types.js'
import { InvalidRangeError } from '../../devices/eeprom-programmer/errors.js'
import type { Opcode } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Outgoing commands                                                         */
/* -------------------------------------------------------------------------- */

const MAX_ADDRESS = 0xffff_ffff
const LF = 0x0a
const CR = 0x0d

function formatAddress(address: number): string {
    if (!Number.isInteger(address) || address < 0 || address > MAX_ADDRESS) {
        throw new InvalidRangeError(`address ${address} is not a 32-bit unsigned integer`)
    }
    return address.toString(16)
}

/**
 * Encode one command line.
 *
 *   e\n
 *   p,100,17f\n        (page write 0x100..0x17f inclusive)
 *
 * Addresses are lowercase hex without a prefix.
 */
export function encodeCommand(opcode: Opcode, range?: AddressRange): Buffer {
    if (!range) return Buffer.from(`${opcode}\n`, 'latin1')
    if (range.end < range.start) {
        throw new InvalidRangeError(`range end ${range.end} precedes start ${range.start}`)
    }
    const line = `${opcode},${formatAddress(range.start)},${formatAddress(range.end)}\n`
    return Buffer.from(line, 'latin1')
}

/* -------------------------------------------------------------------------- */
/*  Incoming byte buffer                                                      */
/* -------------------------------------------------------------------------- */

/**
 * Receive buffer shared by raw data and acknowledgment lines. Data bytes of
 * a ranged read arrive first, then the trailing ack, so both are taken from
 * the same queue in arrival order.
 */
export class RxBuffer {
    private chunks: Buffer[] = []
    private size = 0

    get length(): number {
        return this.size
    }

    push(chunk: Buffer): void {
        if (chunk.length === 0) return
        this.chunks.push(chunk)
        this.size += chunk.length
    }

    /** Remove and return up to n bytes. */
    take(n: number): Uint8Array {
        const count = Math.min(n, this.size)
        if (count <= 0) return new Uint8Array(0)

        const out = new Uint8Array(count)
        let filled = 0
        while (filled < count) {
            const head = this.chunks[0]
            if (!head) break
            const want = count - filled
            if (head.length <= want) {
                out.set(head, filled)
                filled += head.length
                this.chunks.shift()
            } else {
                out.set(head.subarray(0, want), filled)
                filled += want
                this.chunks[0] = head.subarray(want)
            }
        }
        this.size -= filled
        return out
    }

    /**
     * Remove and return the next complete line without its terminator
     * (trailing CR stripped), or null while no LF has arrived.
     */
    takeLine(): string | null {
        let scanned = 0
        for (const chunk of this.chunks) {
            const idx = chunk.indexOf(LF)
            if (idx >= 0) {
                const raw = this.take(scanned + idx + 1)
                let end = raw.length - 1
                if (end > 0 && raw[end - 1] === CR) end -= 1
                return Buffer.from(raw.subarray(0, end)).toString('latin1')
            }
            scanned += chunk.length
        }
        return null
    }

    clear(): void {
        this.chunks = []
        this.size = 0
    }
}
