// services/programmer/src/devices/eeprom-programmer/geometry.ts

import type { AddressRange, DeviceFamily, DeviceProfile } from './types.js'
import { InvalidProfileError, InvalidRangeError } from './errors.js'

/* -------------------------------------------------------------------------- */
/*  Selectable geometry                                                       */
/* -------------------------------------------------------------------------- */

export const CAPACITY_LABELS = ['8k', '16k', '32k', '64k', '128k', '256k', '512k', '1M'] as const
export type CapacityLabel = (typeof CAPACITY_LABELS)[number]

export const PAGE_SIZES = [1, 2, 4, 8, 16, 32, 64, 128, 256, 512] as const

export const DEVICE_FAMILIES: readonly DeviceFamily[] = ['eeprom', 'flash']

/** Page size of the 28C-series parts the programmer was built around. */
export const DEFAULT_PAGE_SIZE = 128

/**
 * Parse a capacity label such as "8k", "1M" or "512b" into a byte count.
 * Returns null for anything unrecognised.
 */
export function parseCapacity(label: string): number | null {
    const m = /^(\d+)([bkM])$/.exec(label.trim())
    if (!m) return null
    const n = Number.parseInt(m[1] ?? '', 10)
    if (!Number.isFinite(n) || n <= 0) return null
    switch (m[2]) {
        case 'b': return n
        case 'k': return n * 1024
        case 'M': return n * 1024 * 1024
        default: return null
    }
}

export function formatCapacity(bytes: number): string {
    if (bytes % (1024 * 1024) === 0) return `${bytes / (1024 * 1024)}M`
    if (bytes % 1024 === 0) return `${bytes / 1024}k`
    return `${bytes}b`
}

export function isPowerOfTwo(n: number): boolean {
    return Number.isInteger(n) && n > 0 && Number.isInteger(Math.log2(n))
}

/* -------------------------------------------------------------------------- */
/*  Validation                                                                */
/* -------------------------------------------------------------------------- */

const MAX_U32 = 0xffff_ffff

export function validateProfile(profile: DeviceProfile): DeviceProfile {
    const { capacityBytes, pageSizeBytes, family } = profile
    if (!Number.isInteger(capacityBytes) || capacityBytes < 1 || capacityBytes > MAX_U32) {
        throw new InvalidProfileError(`capacity must be a positive integer, got ${capacityBytes}`)
    }
    if (!isPowerOfTwo(pageSizeBytes) || pageSizeBytes > capacityBytes) {
        throw new InvalidProfileError(
            `page size must be a power of two in [1, ${capacityBytes}], got ${pageSizeBytes}`
        )
    }
    if (!DEVICE_FAMILIES.includes(family)) {
        throw new InvalidProfileError(`unknown device family "${String(family)}"`)
    }
    return profile
}

export interface ProfileInput {
    capacity: string
    pageSize?: number
    family?: DeviceFamily
}

/** Build a validated DeviceProfile from the selection surface's values. */
export function profileFromInput(input: ProfileInput): DeviceProfile {
    const capacityBytes = parseCapacity(input.capacity)
    if (capacityBytes == null) {
        throw new InvalidProfileError(`unrecognised capacity "${input.capacity}"`)
    }
    return validateProfile({
        capacityBytes,
        pageSizeBytes: input.pageSize ?? DEFAULT_PAGE_SIZE,
        family: input.family ?? 'eeprom',
    })
}

/**
 * Resolve an optional start/end pair against a profile. Missing bounds
 * default to the whole device.
 */
export function resolveRange(profile: DeviceProfile, start?: number, end?: number): AddressRange {
    const s = start ?? 0
    const e = end ?? profile.capacityBytes - 1
    if (!Number.isInteger(s) || !Number.isInteger(e) || s < 0 || e < s) {
        throw new InvalidRangeError(`invalid range ${s}..${e}`)
    }
    if (e >= profile.capacityBytes) {
        throw new InvalidRangeError(
            `range end 0x${e.toString(16)} lies beyond the ${profile.capacityBytes} byte device`
        )
    }
    return { start: s, end: e }
}

export function rangeLength(range: AddressRange): number {
    return range.end - range.start + 1
}

export function formatRange(range: AddressRange): string {
    return `0x${range.start.toString(16)}-0x${range.end.toString(16)}`
}
