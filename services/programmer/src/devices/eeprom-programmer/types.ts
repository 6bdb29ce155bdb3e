// services/programmer/src/devices/eeprom-programmer/types.ts

/* -------------------------------------------------------------------------- */
/*  Device geometry                                                           */
/* -------------------------------------------------------------------------- */

export type DeviceFamily = 'eeprom' | 'flash'

/**
 * Geometry of the chip in the programmer socket. Supplied fresh by the caller
 * for every operation and never mutated.
 */
export interface DeviceProfile {
    readonly capacityBytes: number
    /** Power of two in [1, capacityBytes]. */
    readonly pageSizeBytes: number
    readonly family: DeviceFamily
}

/** Inclusive on both ends: start <= end < capacityBytes. */
export interface AddressRange {
    readonly start: number
    readonly end: number
}

/* -------------------------------------------------------------------------- */
/*  Transfers                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Sequential byte source for uploads. `read(n)` returns fewer than n bytes
 * only at end of data; `rewind()` restarts from offset 0 (used by readback).
 */
export interface ByteSource {
    read(n: number): Promise<Uint8Array>
    rewind(): Promise<void>
}

export interface TransferRequest {
    profile: DeviceProfile
    data: ByteSource
    totalLength: number
}

export type VerificationResult =
    | { kind: 'ok' }
    | { kind: 'mismatch'; offset: number; expected: number; actual: number }

export interface WriteResult {
    bytesWritten: number
    verification: VerificationResult
}

/* -------------------------------------------------------------------------- */
/*  Progress                                                                  */
/* -------------------------------------------------------------------------- */

export type ProgressPhase = 'erasing' | 'writing' | 'reading' | 'verifying'

export interface ProgressEvent {
    phase: ProgressPhase
    /** Integer in [0, 100]. */
    percent: number
}

export interface ProgressSink {
    report(evt: ProgressEvent): void
}

/* -------------------------------------------------------------------------- */
/*  Config                                                                    */
/* -------------------------------------------------------------------------- */

export interface LinkConfig {
    /** Explicit serial path; when unset the port is located by VID/PID. */
    portPath?: string
    vendorId: string
    productId: string
    baudRate: number
    /** Send `i` on open and require `identity` as the reply. */
    identify: boolean
    identity: string
    ackTimeoutMs: number
    /** Longest a single readBytes() waits before returning an empty read. */
    readPollMs: number
}

export interface ProgrammerConfig {
    link: LinkConfig
    /**
     * Consecutive empty reads tolerated inside one ranged read before the
     * transfer is declared stalled. 0 or negative means unbounded.
     */
    maxIdleReads: number
    /** Root for upload/download files; nothing outside it is touched. */
    filesRoot: string
}

/* -------------------------------------------------------------------------- */
/*  Operations + events                                                       */
/* -------------------------------------------------------------------------- */

export type ProgrammerOpKind = 'erase' | 'dump' | 'upload' | 'download'

export interface ProgrammerCurrentOp {
    kind: ProgrammerOpKind
    /** File name for upload/download, hex range for dump, 'device' for erase. */
    target: string
    startedAt: string
    phase: ProgressPhase | null
    percent: number
}

export interface ProgrammerStatus {
    phase: 'idle' | 'busy'
    currentOp?: ProgrammerCurrentOp
    lastResult?: {
        kind: ProgrammerOpKind
        ok: boolean
        message: string
        at: string
    }
}

export interface ProgrammerEventSink {
    publish(evt: ProgrammerEvent): void
}

export type ProgrammerEvent =
    | {
          kind: 'op-started'
          at: number
          op: ProgrammerCurrentOp
      }
    | {
          kind: 'op-progress'
          at: number
          op: ProgrammerCurrentOp
      }
    | {
          kind: 'op-completed'
          at: number
          op: ProgrammerCurrentOp
          summary: string
      }
    | {
          kind: 'op-failed'
          at: number
          op: ProgrammerCurrentOp
          errorName: string
          error: string
      }
