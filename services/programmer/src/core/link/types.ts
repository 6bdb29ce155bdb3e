// services/programmer/src/core/link/types.ts

import type { AddressRange } from '../../devices/eeprom-programmer/types.js'

/**
 * Single-character opcodes understood by the programmer firmware.
 */
export const OPCODES = {
    erase: 'e',
    read: 'r',
    pageWrite: 'p',
    /** Selects EEPROM and runs the write-protect unlock sequence. */
    selectEeprom: 'E',
    /** Selects Flash; sent once before a Flash write session. */
    selectFlash: 'F',
    /** Restores EEPROM write protection. */
    lock: 'l',
    identify: 'i',
} as const

export type Opcode = (typeof OPCODES)[keyof typeof OPCODES]

/**
 * Everything the transfer engine needs from the serial connection. The
 * engine never encodes addresses itself; framing belongs to the Link.
 */
export interface Link {
    sendCommand(opcode: Opcode, range?: AddressRange): Promise<void>
    /** Up to n bytes; an empty result means nothing arrived yet, not EOF. */
    readBytes(n: number): Promise<Uint8Array>
    /** Next line-terminated acknowledgment, without its terminator. */
    readAck(): Promise<string>
    writeBytes(bytes: Uint8Array): Promise<void>
    close(): Promise<void>
}

/** Opens a fresh Link for one operation; rejects with ConnectionError. */
export type LinkOpener = () => Promise<Link>

type ErrorCallback = (err: Error | null) => void

/**
 * The slice of a serialport stream SerialLink drives. Both `SerialPort` and
 * `SerialPortMock` satisfy it.
 */
export interface PortHandle {
    readonly isOpen: boolean
    open(cb?: ErrorCallback): void
    write(data: Buffer, cb?: (err: Error | null | undefined) => void): boolean
    drain(cb?: ErrorCallback): void
    close(cb?: ErrorCallback): void
    on(event: 'data', listener: (chunk: Buffer) => void): unknown
    on(event: 'error', listener: (err: Error) => void): unknown
    on(event: 'close', listener: () => void): unknown
}

export interface PortOpenOptions {
    path: string
    baudRate: number
    autoOpen: false
}

export interface PortListing {
    path: string
    vendorId?: string
    productId?: string
}
