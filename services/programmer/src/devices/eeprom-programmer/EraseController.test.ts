import { describe, it, expect } from 'vitest'
import { EraseController } from './EraseController.js'
import { TransferError } from './errors.js'
import { FakeProgrammer } from '../../testing/FakeProgrammer.js'
import type { Link } from '../../core/link/types.js'
import type { ProgressEvent } from './types.js'

describe('EraseController', () => {
    for (const capacityBytes of [8192, 32768, 1048576]) {
        it(`should send one erase and await one ack (${capacityBytes} bytes)`, async () => {
            const fake = new FakeProgrammer({ capacityBytes })
            fake.memory.fill(0x00)
            const events: ProgressEvent[] = []

            await new EraseController(await fake.open()).erase({ report: (e) => events.push(e) })

            expect(fake.opcodes()).toBe('e')
            expect(fake.acksRead).toEqual(['ok'])
            expect(fake.memory.every((b) => b === 0xff)).toBe(true)
            expect(events).toEqual([
                { phase: 'erasing', percent: 0 },
                { phase: 'erasing', percent: 100 },
            ])
        })
    }

    it('should pass transfer errors through unchanged', async () => {
        const fake = new FakeProgrammer({ capacityBytes: 8192 })
        const link = await fake.open()
        fake.failOnCommand(1)

        await expect(new EraseController(link).erase()).rejects.toThrow(
            new TransferError('injected transport failure on command e')
        )
    })

    it('should wrap other link failures as TransferError', async () => {
        const broken: Link = {
            sendCommand: async () => {
                throw new Error('EIO')
            },
            readBytes: async () => new Uint8Array(0),
            readAck: async () => 'ok',
            writeBytes: async () => undefined,
            close: async () => undefined,
        }

        const failure = new EraseController(broken).erase()
        await expect(failure).rejects.toThrow(TransferError)
        await expect(failure).rejects.toThrow('chip erase failed: EIO')
    })
})
