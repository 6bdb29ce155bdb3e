export class ProgrammerError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'ProgrammerError'
    }
}

/** Programmer not found, failed to open, or failed the identify handshake. */
export class ConnectionError extends ProgrammerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'ConnectionError'
    }
}

export class CapacityExceededError extends ProgrammerError {
    constructor(
        public readonly totalLength: number,
        public readonly capacityBytes: number
    ) {
        super(`${totalLength} bytes do not fit into a ${capacityBytes} byte device`)
        this.name = 'CapacityExceededError'
    }
}

export class InvalidProfileError extends ProgrammerError {
    constructor(message: string) {
        super(message)
        this.name = 'InvalidProfileError'
    }
}

export class InvalidRangeError extends ProgrammerError {
    constructor(message: string) {
        super(message)
        this.name = 'InvalidRangeError'
    }
}

/**
 * A send/acknowledge round trip failed mid-operation. Chunks written before
 * the failure stay on the device.
 */
export class TransferError extends ProgrammerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'TransferError'
    }
}

/** Raised between chunks after cancel(); device contents are indeterminate. */
export class TransferCancelledError extends ProgrammerError {
    constructor(public readonly bytesTransferred: number) {
        super(`transfer cancelled after ${bytesTransferred} bytes; re-verify the device before trusting it`)
        this.name = 'TransferCancelledError'
    }
}

export class VerificationMismatchError extends ProgrammerError {
    constructor(
        public readonly offset: number,
        public readonly expected: number,
        public readonly actual: number
    ) {
        super(
            `verification failed at 0x${offset.toString(16)}: expected 0x${hexByte(expected)}, read 0x${hexByte(actual)}`
        )
        this.name = 'VerificationMismatchError'
    }
}

export class FileAccessError extends ProgrammerError {
    constructor(
        public readonly path: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options)
        this.name = 'FileAccessError'
    }
}

export class ProgrammerBusyError extends ProgrammerError {
    constructor(public readonly activeOp: string) {
        super(`programmer is busy with ${activeOp}`)
        this.name = 'ProgrammerBusyError'
    }
}

function hexByte(value: number): string {
    return value.toString(16).padStart(2, '0')
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

/**
 * Runs one Link interaction, turning anything that is not already one of
 * ours into a TransferError naming the step that failed.
 */
export async function asTransferStep<T>(step: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn()
    } catch (err) {
        if (err instanceof ProgrammerError) throw err
        throw new TransferError(`${step} failed: ${errorMessage(err)}`, { cause: err })
    }
}

export function toHttpStatus(err: unknown): number {
    if (
        err instanceof InvalidProfileError ||
        err instanceof InvalidRangeError ||
        err instanceof FileAccessError
    ) return 400
    if (err instanceof CapacityExceededError) return 413
    if (err instanceof ProgrammerBusyError) return 409
    if (err instanceof VerificationMismatchError) return 422
    if (err instanceof TransferCancelledError) return 499
    if (err instanceof ConnectionError) return 503
    if (err instanceof TransferError) return 502
    return 500
}

/** Extra fields an HTTP error body carries for the typed errors. */
export function errorDetail(err: unknown): Record<string, unknown> {
    if (err instanceof VerificationMismatchError) {
        return { offset: err.offset, expected: err.expected, actual: err.actual }
    }
    if (err instanceof CapacityExceededError) {
        return { totalLength: err.totalLength, capacityBytes: err.capacityBytes }
    }
    if (err instanceof TransferCancelledError) {
        return { bytesTransferred: err.bytesTransferred }
    }
    return {}
}
