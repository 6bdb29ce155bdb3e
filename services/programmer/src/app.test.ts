import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { FastifyInstance } from 'fastify'
import type { ClientLog } from '@romlink/logging'
import { buildApp } from './app.js'
import { FakeProgrammer } from './testing/FakeProgrammer.js'
import type { ProgrammerStatus } from './devices/eeprom-programmer/types.js'

interface OpResponse {
    ok: boolean
    error?: string
    errorName?: string
    [key: string]: unknown
}

describe('programmer HTTP API', () => {
    let root: string
    let fake: FakeProgrammer
    let app: FastifyInstance

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'romlink-api-'))
        fake = new FakeProgrammer({ capacityBytes: 8192 })
        app = buildApp({ openLink: () => fake.open(), env: { PROGRAMMER_FILES_ROOT: root } })
        await app.ready()
    })

    afterEach(async () => {
        await app.close()
        await rm(root, { recursive: true, force: true })
    })

    it('should answer health and version', async () => {
        const health = await app.inject({ method: 'GET', url: '/health' })
        expect(health.json()).toEqual({ status: 'ok' })

        const version = await app.inject({ method: 'GET', url: '/version' })
        expect(version.json()).toEqual({ name: 'romlink-programmer', version: '0.1.0' })
    })

    it('should list the selectable geometry', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/programmer/geometry' })

        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({
            capacities: ['8k', '16k', '32k', '64k', '128k', '256k', '512k', '1M'],
            pageSizes: [1, 2, 4, 8, 16, 32, 64, 128, 256, 512],
            families: ['eeprom', 'flash'],
            defaultPageSize: 128,
        })
    })

    it('should dump a range as viewer rows', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/api/programmer/dump',
            payload: { profile: { capacity: '8k' }, start: 0, end: 15 },
        })

        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({
            ok: true,
            lines: ['00000:  ' + 'ff '.repeat(16) + ' ' + '.'.repeat(16)],
        })
        expect(fake.commands).toEqual([{ opcode: 'r', range: { start: 0, end: 15 } }])
    })

    it('should reject an unknown capacity label', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/api/programmer/dump',
            payload: { profile: { capacity: '3x' } },
        })

        expect(res.statusCode).toBe(400)
        expect(fake.opens).toBe(0)
    })

    it('should map a range past the device to 400', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/api/programmer/dump',
            payload: { profile: { capacity: '8k' }, start: 0, end: 0x2000 },
        })

        expect(res.statusCode).toBe(400)
        expect(res.json<OpResponse>()).toEqual({
            ok: false,
            errorName: 'InvalidRangeError',
            error: 'range end 0x2000 lies beyond the 8192 byte device',
        })
    })

    it('should upload a file and report it in the status', async () => {
        await writeFile(join(root, 'rom.bin'), Uint8Array.from({ length: 300 }, (_, i) => i & 0xff))

        const res = await app.inject({
            method: 'POST',
            url: '/api/programmer/upload',
            payload: { profile: { capacity: '8k', pageSize: 64 }, file: 'rom.bin' },
        })
        expect(res.json()).toEqual({ ok: true, bytesWritten: 300 })
        expect(fake.opcodes()).toBe('Eppppplr')

        const status = await app.inject({ method: 'GET', url: '/api/programmer/status' })
        expect(status.json<ProgrammerStatus>()).toMatchObject({
            phase: 'idle',
            lastResult: { kind: 'upload', ok: true, message: 'bytes=300 verified' },
        })
    })

    it('should answer an oversized upload with 413', async () => {
        await writeFile(join(root, 'big.bin'), new Uint8Array(9000))

        const res = await app.inject({
            method: 'POST',
            url: '/api/programmer/upload',
            payload: { profile: { capacity: '8k' }, file: 'big.bin' },
        })

        expect(res.statusCode).toBe(413)
        expect(res.json<OpResponse>()).toMatchObject({
            ok: false,
            errorName: 'CapacityExceededError',
            totalLength: 9000,
            capacityBytes: 8192,
        })
        expect(fake.opens).toBe(0)
    })

    it('should download a range into the files root', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/api/programmer/download',
            payload: { profile: { capacity: '8k', family: 'flash' }, file: 'out.bin', start: 16, end: 47 },
        })

        expect(res.json()).toEqual({ ok: true, bytesRead: 32 })
    })

    it('should erase the chip', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/api/programmer/erase',
            payload: { profile: { capacity: '8k' } },
        })

        expect(res.json<OpResponse>()).toMatchObject({ ok: true })
        expect(fake.opcodes()).toBe('e')
    })

    it('should have nothing to cancel when idle', async () => {
        const res = await app.inject({ method: 'POST', url: '/api/programmer/cancel' })
        expect(res.json()).toEqual({ ok: true, cancelled: false })
    })

    it('should serve the recent client logs', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/logs?n=5' })
        const { logs } = res.json<{ logs: ClientLog[] }>()

        expect(logs.length).toBeGreaterThan(0)
        expect(logs.length).toBeLessThanOrEqual(5)
        expect(logs.at(-1)?.message).toBe('GET /api/logs?n=5')
    })
})
