// services/programmer/src/core/link/openSerialLink.ts

import { SerialPort } from 'serialport'
import type { ChannelLogger } from '@romlink/logging'
import type { LinkConfig } from '../../devices/eeprom-programmer/types.js'
import { ConnectionError, errorMessage } from '../../devices/eeprom-programmer/errors.js'
import { SerialLink } from './SerialLink.js'
import {
    OPCODES,
    type Link,
    type PortHandle,
    type PortListing,
    type PortOpenOptions,
} from './types.js'

export interface OpenSerialLinkDeps {
    log?: ChannelLogger
    /** Defaults to a real `SerialPort`; tests pass a `SerialPortMock` factory. */
    createPort?: (options: PortOpenOptions) => PortHandle
    listPorts?: () => Promise<PortListing[]>
}

/**
 * macOS lists /dev/tty.* but outgoing use wants the /dev/cu.* node.
 */
export function toCallOutPath(path: string): string {
    if (path.startsWith('/dev/tty.')) {
        return '/dev/cu.' + path.slice('/dev/tty.'.length)
    }
    return path
}

/**
 * Candidate ports for the programmer: the configured path alone when set,
 * otherwise every listed port whose VID/PID match (case-insensitive), in
 * listing order. Generic USB-serial bridges share IDs, so more than one may
 * match.
 */
export async function resolvePortCandidates(
    config: LinkConfig,
    listPorts: () => Promise<PortListing[]>
): Promise<string[]> {
    if (config.portPath) return [toCallOutPath(config.portPath)]

    let ports: PortListing[]
    try {
        ports = await listPorts()
    } catch (err) {
        throw new ConnectionError(`could not list serial ports: ${errorMessage(err)}`, { cause: err })
    }

    const vid = config.vendorId.toLowerCase()
    const pid = config.productId.toLowerCase()
    const matches = ports.filter(
        (p) => p.vendorId?.toLowerCase() === vid && p.productId?.toLowerCase() === pid
    )
    if (matches.length === 0) {
        throw new ConnectionError(`EEPROM programmer not found (no port with vid=${vid} pid=${pid})`)
    }
    return matches.map((p) => toCallOutPath(p.path))
}

function openPort(port: PortHandle, path: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        port.open((err) => {
            if (err) {
                reject(new ConnectionError(`failed to open ${path}: ${err.message}`, { cause: err }))
                return
            }
            resolve()
        })
    })
}

/**
 * Open the programmer for one operation. With `identify` enabled the
 * firmware must answer `i` with the configured identity line. When several
 * ports match, each is tried in turn until one answers; a single candidate
 * fails with its own ConnectionError.
 */
export async function openSerialLink(config: LinkConfig, deps: OpenSerialLinkDeps = {}): Promise<Link> {
    const listPorts = deps.listPorts ?? (() => SerialPort.list())
    const createPort = deps.createPort ?? ((options: PortOpenOptions) => new SerialPort(options))

    const candidates = await resolvePortCandidates(config, listPorts)
    const failures: string[] = []

    for (const path of candidates) {
        try {
            return await openCandidate(config, path, createPort, deps.log)
        } catch (err) {
            if (candidates.length === 1) throw err
            deps.log?.warn(`no programmer on path=${path} err="${errorMessage(err)}"`)
            failures.push(errorMessage(err))
        }
    }

    throw new ConnectionError(`EEPROM programmer not found on ${candidates.join(', ')}: ${failures.join('; ')}`)
}

async function openCandidate(
    config: LinkConfig,
    path: string,
    createPort: (options: PortOpenOptions) => PortHandle,
    log?: ChannelLogger
): Promise<Link> {
    const port = createPort({ path, baudRate: config.baudRate, autoOpen: false })
    await openPort(port, path)

    const link = new SerialLink(
        port,
        { path, ackTimeoutMs: config.ackTimeoutMs, readPollMs: config.readPollMs },
        log
    )
    log?.debug(`opened path=${path} baud=${config.baudRate}`)

    if (!config.identify) return link

    try {
        await link.sendCommand(OPCODES.identify)
        const reply = (await link.readAck()).trim()
        if (reply !== config.identity) {
            throw new ConnectionError(`device on ${path} identified as "${reply}", expected "${config.identity}"`)
        }
    } catch (err) {
        await link.close()
        if (err instanceof ConnectionError) throw err
        throw new ConnectionError(`identify handshake failed on ${path}: ${errorMessage(err)}`, { cause: err })
    }

    return link
}
