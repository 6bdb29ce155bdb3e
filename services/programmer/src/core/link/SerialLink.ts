// services/programmer/src/core/link/SerialLink.ts

import type { ChannelLogger } from '@romlink/logging'
import type { AddressRange } from '../../devices/eeprom-programmer/types.js'
import { TransferError } from '../../devices/eeprom-programmer/errors.js'
import { encodeCommand, RxBuffer } from './framing.js'
import type { Link, Opcode, PortHandle } from './types.js'

export interface SerialLinkOptions {
    /** Label used in log lines and errors (usually the device path). */
    path: string
    ackTimeoutMs: number
    readPollMs: number
}

/**
 * Link over an already opened serialport stream.
 *
 * Incoming bytes are buffered as they arrive; readBytes() and readAck()
 * consume from that buffer and only wait when it has nothing to offer.
 * Exactly one operation owns a SerialLink, so at most one read is pending.
 */
export class SerialLink implements Link {
    private readonly port: PortHandle
    private readonly options: SerialLinkOptions
    private readonly log?: ChannelLogger

    private readonly rx = new RxBuffer()
    private wake: (() => void) | null = null
    private failure: Error | null = null
    private closed = false

    constructor(port: PortHandle, options: SerialLinkOptions, log?: ChannelLogger) {
        this.port = port
        this.options = options
        this.log = log

        port.on('data', (chunk: Buffer) => {
            this.rx.push(chunk)
            this.notify()
        })

        port.on('error', (err: Error) => {
            this.log?.warn(`serial error path=${this.options.path} err="${err.message}"`)
            this.failure = err
            this.notify()
        })

        port.on('close', () => {
            if (!this.closed && !this.failure) {
                this.failure = new Error('port closed unexpectedly')
            }
            this.notify()
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Link                                                                  */
    /* ---------------------------------------------------------------------- */

    public async sendCommand(opcode: Opcode, range?: AddressRange): Promise<void> {
        const frame = encodeCommand(opcode, range)
        this.log?.debug(`tx path=${this.options.path} cmd=${frame.toString('latin1').trimEnd()}`)
        await this.writeRaw(frame)
    }

    public async writeBytes(bytes: Uint8Array): Promise<void> {
        await this.writeRaw(Buffer.from(bytes))
    }

    public async readBytes(n: number): Promise<Uint8Array> {
        this.assertUsable()
        if (this.rx.length === 0) {
            await this.waitForData(this.options.readPollMs)
            this.assertUsable()
        }
        return this.rx.take(n)
    }

    public async readAck(): Promise<string> {
        const deadline = Date.now() + this.options.ackTimeoutMs

        for (;;) {
            this.assertUsable()
            const line = this.rx.takeLine()
            if (line !== null) {
                this.log?.debug(`ack path=${this.options.path} line="${line}"`)
                return line
            }

            const remaining = deadline - Date.now()
            if (remaining <= 0) {
                throw new TransferError(
                    `no acknowledgment from ${this.options.path} within ${this.options.ackTimeoutMs} ms`
                )
            }
            await this.waitForData(remaining)
        }
    }

    public async close(): Promise<void> {
        if (this.closed) return
        this.closed = true
        this.rx.clear()
        this.notify()

        if (!this.port.isOpen) return

        await new Promise<void>((resolve) => {
            this.port.close((err) => {
                if (err) {
                    this.log?.warn(`error closing port path=${this.options.path} err="${err.message}"`)
                }
                resolve()
            })
        })
        this.log?.debug(`closed path=${this.options.path}`)
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                             */
    /* ---------------------------------------------------------------------- */

    private assertUsable(): void {
        if (this.closed) {
            throw new TransferError(`link to ${this.options.path} is closed`)
        }
        if (this.failure) {
            throw new TransferError(
                `serial failure on ${this.options.path}: ${this.failure.message}`,
                { cause: this.failure }
            )
        }
    }

    private writeRaw(data: Buffer): Promise<void> {
        this.assertUsable()
        return new Promise<void>((resolve, reject) => {
            this.port.write(data, (err) => {
                if (err) {
                    reject(new TransferError(`write to ${this.options.path} failed: ${err.message}`, { cause: err }))
                    return
                }
                this.port.drain((drainErr) => {
                    if (drainErr) {
                        reject(new TransferError(`drain on ${this.options.path} failed: ${drainErr.message}`, { cause: drainErr }))
                        return
                    }
                    resolve()
                })
            })
        })
    }

    /** Resolves on the next data/error/close event or after `ms`. */
    private waitForData(ms: number): Promise<void> {
        return new Promise<void>((resolve) => {
            const timer = setTimeout(() => {
                this.wake = null
                resolve()
            }, ms)
            this.wake = () => {
                clearTimeout(timer)
                this.wake = null
                resolve()
            }
        })
    }

    private notify(): void {
        const wake = this.wake
        if (wake) wake()
    }
}
