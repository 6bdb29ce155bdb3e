export const DUMP_ROW_BYTES = 16

function isPrintable(byte: number): boolean {
    return byte >= 0x20 && byte <= 0x7e
}

/**
 * One viewer row: `00010:  41 42 ... 50  ABCD...`.
 * A short final row is padded in the hex column so the gutter lines up.
 */
export function formatDumpLine(offset: number, bytes: Uint8Array): string {
    let hex = ''
    let ascii = ''
    for (const b of bytes) {
        hex += `${b.toString(16).padStart(2, '0')} `
        ascii += isPrintable(b) ? String.fromCharCode(b) : '.'
    }
    hex += '   '.repeat(Math.max(0, DUMP_ROW_BYTES - bytes.length))
    return `${offset.toString(16).padStart(5, '0')}:  ${hex} ${ascii}`
}

/** Regroup a chunked byte stream into 16-byte dump rows. */
export async function* dumpLines(start: number, chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
    const row = new Uint8Array(DUMP_ROW_BYTES)
    let fill = 0
    let offset = start

    for await (const chunk of chunks) {
        for (const b of chunk) {
            row[fill++] = b
            if (fill === DUMP_ROW_BYTES) {
                yield formatDumpLine(offset, row)
                offset += DUMP_ROW_BYTES
                fill = 0
            }
        }
    }

    if (fill > 0) yield formatDumpLine(offset, row.subarray(0, fill))
}
