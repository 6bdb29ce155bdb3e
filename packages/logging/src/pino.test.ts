import { describe, it, expect } from 'vitest'
import { createLogger } from './pino.js'
import { makeClientBuffer } from './buffer.js'
import { CHANNELS } from './channels.js'
import { LogChannel } from './types.js'

describe('createLogger', () => {
    it('should mirror channel log calls into the client buffer', () => {
        const buf = makeClientBuffer(10)
        const { channel } = createLogger('test', buf)

        channel(LogChannel.transfer).warn('device stalled')
        channel(LogChannel.link).info('opened path=/dev/ttyUSB0', { baud: 1000000 })

        const [first, second] = buf.getLatest(2)
        expect(first).toMatchObject({
            channel: LogChannel.transfer,
            level: 'warn',
            message: 'device stalled',
            emoji: CHANNELS[LogChannel.transfer].emoji,
            color: CHANNELS[LogChannel.transfer].color,
        })
        expect(second).toMatchObject({
            channel: LogChannel.link,
            level: 'info',
            message: 'opened path=/dev/ttyUSB0',
        })
    })

    it('should expose a custom level per channel on the base logger', () => {
        const { base } = createLogger('test')
        for (const ch of Object.values(LogChannel)) {
            expect(typeof base[ch]).toBe('function')
        }
    })
})
