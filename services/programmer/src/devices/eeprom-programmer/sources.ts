import { open, type FileHandle } from 'node:fs/promises'
import type { ByteSource } from './types.js'
import { errorMessage, FileAccessError } from './errors.js'

/** In-memory ByteSource over a fixed buffer. */
export function bufferSource(bytes: Uint8Array): ByteSource {
    let cursor = 0
    return {
        async read(n: number): Promise<Uint8Array> {
            const chunk = bytes.subarray(cursor, cursor + n)
            cursor += chunk.length
            return chunk
        },
        async rewind(): Promise<void> {
            cursor = 0
        },
    }
}

/**
 * Binary file read sequentially from offset 0. Size is taken once at open;
 * reads past it return short.
 */
export class FileByteSource implements ByteSource {
    private position = 0

    private constructor(
        private readonly handle: FileHandle,
        public readonly path: string,
        public readonly size: number
    ) {}

    static async open(path: string): Promise<FileByteSource> {
        let handle: FileHandle
        try {
            handle = await open(path, 'r')
        } catch (err) {
            throw new FileAccessError(path, `could not open ${path}: ${errorMessage(err)}`, { cause: err })
        }

        try {
            const stat = await handle.stat()
            if (!stat.isFile()) {
                throw new FileAccessError(path, `${path} is not a regular file`)
            }
            return new FileByteSource(handle, path, stat.size)
        } catch (err) {
            await handle.close()
            if (err instanceof FileAccessError) throw err
            throw new FileAccessError(path, `could not stat ${path}: ${errorMessage(err)}`, { cause: err })
        }
    }

    async read(n: number): Promise<Uint8Array> {
        const want = Math.max(0, Math.min(n, this.size - this.position))
        const buffer = new Uint8Array(want)
        let filled = 0
        while (filled < want) {
            const { bytesRead } = await this.handle.read(buffer, filled, want - filled, this.position + filled)
            if (bytesRead === 0) break
            filled += bytesRead
        }
        this.position += filled
        return filled === want ? buffer : buffer.subarray(0, filled)
    }

    async rewind(): Promise<void> {
        this.position = 0
    }

    async close(): Promise<void> {
        await this.handle.close()
    }
}
