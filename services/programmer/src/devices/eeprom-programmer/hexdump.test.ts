import { describe, it, expect } from 'vitest'
import { dumpLines, formatDumpLine } from './hexdump.js'

async function* chunked(bytes: number[], sizes: number[]): AsyncGenerator<Uint8Array> {
    let at = 0
    for (const size of sizes) {
        yield Uint8Array.from(bytes.slice(at, at + size))
        at += size
    }
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
    const out: string[] = []
    for await (const line of lines) out.push(line)
    return out
}

function range(from: number, count: number): number[] {
    return Array.from({ length: count }, (_, i) => from + i)
}

describe('formatDumpLine', () => {
    it('should render offset, hex bytes and printable text', () => {
        expect(formatDumpLine(0x10, Uint8Array.from(range(0x41, 16)))).toBe(
            '00010:  41 42 43 44 45 46 47 48 49 4a 4b 4c 4d 4e 4f 50  ABCDEFGHIJKLMNOP'
        )
    })

    it('should show non-printable bytes as dots', () => {
        expect(formatDumpLine(0, Uint8Array.from(range(0, 16)))).toBe(
            '00000:  00 01 02 03 04 05 06 07 08 09 0a 0b 0c 0d 0e 0f  ................'
        )
    })

    it('should pad a short row so the text column lines up', () => {
        const line = formatDumpLine(0x20, Uint8Array.from([0x41, 0x7f, 0x20]))
        expect(line).toBe('00020:  41 7f 20 ' + ' '.repeat(39) + ' A. ')
        expect(line.indexOf('A. ')).toBe(formatDumpLine(0, new Uint8Array(16)).lastIndexOf('  ') + 2)
    })

    it('should widen the offset past five digits', () => {
        expect(formatDumpLine(0x123450, Uint8Array.from([0x30])).startsWith('123450:  30 ')).toBe(true)
    })
})

describe('dumpLines', () => {
    it('should regroup uneven chunks into 16-byte rows', async () => {
        const bytes = [...range(0x00, 16), ...range(0x41, 16)]
        const lines = await collect(dumpLines(0, chunked(bytes, [5, 20, 7])))

        expect(lines).toEqual([
            '00000:  00 01 02 03 04 05 06 07 08 09 0a 0b 0c 0d 0e 0f  ................',
            '00010:  41 42 43 44 45 46 47 48 49 4a 4b 4c 4d 4e 4f 50  ABCDEFGHIJKLMNOP',
        ])
    })

    it('should number rows from the range start and flush a short tail', async () => {
        const lines = await collect(dumpLines(0x100, chunked(range(0x61, 20), [20])))

        expect(lines).toHaveLength(2)
        expect(lines[0]?.startsWith('00100:  61 62')).toBe(true)
        expect(lines[1]).toBe('00110:  71 72 73 74 ' + ' '.repeat(36) + ' qrst')
    })
})
