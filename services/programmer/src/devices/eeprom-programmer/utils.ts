// services/programmer/src/devices/eeprom-programmer/utils.ts

import { resolve, relative, normalize, isAbsolute } from 'node:path'
import type { ProgrammerConfig } from './types.js'
import { FileAccessError } from './errors.js'

/* -------------------------------------------------------------------------- */
/*  Env → config                                                              */
/* -------------------------------------------------------------------------- */

/**
 * Build a ProgrammerConfig from process.env-style input.
 *
 * Expected env vars (see .env.example):
 *   - PROGRAMMER_PORT_PATH
 *   - PROGRAMMER_USB_VENDOR_ID / PROGRAMMER_USB_PRODUCT_ID
 *   - PROGRAMMER_BAUD
 *   - PROGRAMMER_IDENTIFY / PROGRAMMER_IDENTITY
 *   - PROGRAMMER_ACK_TIMEOUT_MS
 *   - PROGRAMMER_READ_POLL_MS
 *   - PROGRAMMER_MAX_IDLE_READS
 *   - PROGRAMMER_FILES_ROOT
 */
export function buildProgrammerConfigFromEnv(env: NodeJS.ProcessEnv): ProgrammerConfig {
    const portPath = (env.PROGRAMMER_PORT_PATH ?? '').trim() || undefined

    return {
        link: {
            portPath,
            // CH340 USB-serial bridge on the programmer board
            vendorId: (env.PROGRAMMER_USB_VENDOR_ID ?? '').trim() || '1a86',
            productId: (env.PROGRAMMER_USB_PRODUCT_ID ?? '').trim() || '7523',
            baudRate: parseIntSafe(env.PROGRAMMER_BAUD, 1_000_000),
            identify: parseBoolSafe(env.PROGRAMMER_IDENTIFY, true),
            identity: (env.PROGRAMMER_IDENTITY ?? '').trim() || 'EEPROM Programmer',
            ackTimeoutMs: Math.max(1, parseIntSafe(env.PROGRAMMER_ACK_TIMEOUT_MS, 5000)),
            readPollMs: Math.max(1, parseIntSafe(env.PROGRAMMER_READ_POLL_MS, 100)),
        },
        maxIdleReads: parseIntSafe(env.PROGRAMMER_MAX_IDLE_READS, 50),
        filesRoot: resolveTilde((env.PROGRAMMER_FILES_ROOT ?? '').trim() || './images'),
    }
}

function parseIntSafe(value: string | undefined, fallback: number): number {
    if (!value) return fallback
    const n = Number.parseInt(value, 10)
    return Number.isNaN(n) ? fallback : n
}

function parseBoolSafe(value: string | undefined, fallback: boolean): boolean {
    if (value == null || value === '') return fallback
    const v = value.toLowerCase()
    if (v === 'true' || v === '1' || v === 'yes') return true
    if (v === 'false' || v === '0' || v === 'no') return false
    return fallback
}

function resolveTilde(p: string): string {
    if (!p.startsWith('~')) return resolve(p)
    const home = process.env.HOME || process.env.USERPROFILE || ''
    if (!home) return resolve(p.slice(1))
    return resolve(p.replace(/^~(?=$|\/|\\)/, home))
}

/* -------------------------------------------------------------------------- */
/*  Root-constrained paths                                                    */
/* -------------------------------------------------------------------------- */

/**
 * Resolve a caller-supplied file name inside rootDir. Absolute paths and
 * anything that climbs out of the root are rejected.
 */
export function resolveUnderRoot(rootDir: string, rel: string): string {
    const trimmed = rel.trim()
    if (trimmed === '' || isAbsolute(trimmed)) {
        throw new FileAccessError(rel, `file "${rel}" must be a path relative to the files root`)
    }

    const root = normalize(resolve(rootDir))
    const abs = normalize(resolve(root, trimmed))
    const relFromRoot = relative(root, abs)
    if (relFromRoot === '' || relFromRoot.startsWith('..') || isAbsolute(relFromRoot)) {
        throw new FileAccessError(rel, `file "${rel}" escapes the files root`)
    }
    return abs
}
