import { describe, it, expect } from 'vitest'
import { join, resolve } from 'node:path'
import { buildProgrammerConfigFromEnv, resolveUnderRoot } from './utils.js'
import { FileAccessError } from './errors.js'

describe('buildProgrammerConfigFromEnv', () => {
    it('should default to the CH340 board at 1 Mbaud', () => {
        const config = buildProgrammerConfigFromEnv({})

        expect(config).toEqual({
            link: {
                portPath: undefined,
                vendorId: '1a86',
                productId: '7523',
                baudRate: 1000000,
                identify: true,
                identity: 'EEPROM Programmer',
                ackTimeoutMs: 5000,
                readPollMs: 100,
            },
            maxIdleReads: 50,
            filesRoot: resolve('./images'),
        })
    })

    it('should read overrides and ignore unparsable numbers', () => {
        const config = buildProgrammerConfigFromEnv({
            PROGRAMMER_PORT_PATH: ' /dev/ttyUSB1 ',
            PROGRAMMER_BAUD: 'fast',
            PROGRAMMER_IDENTIFY: 'no',
            PROGRAMMER_ACK_TIMEOUT_MS: '0',
            PROGRAMMER_MAX_IDLE_READS: '0',
            PROGRAMMER_FILES_ROOT: '/srv/roms',
        })

        expect(config.link.portPath).toBe('/dev/ttyUSB1')
        expect(config.link.baudRate).toBe(1000000)
        expect(config.link.identify).toBe(false)
        expect(config.link.ackTimeoutMs).toBe(1)
        expect(config.maxIdleReads).toBe(0)
        expect(config.filesRoot).toBe(resolve('/srv/roms'))
    })
})

describe('resolveUnderRoot', () => {
    const root = resolve('/srv/roms')

    it('should resolve relative names inside the root', () => {
        expect(resolveUnderRoot(root, 'bios.bin')).toBe(join(root, 'bios.bin'))
        expect(resolveUnderRoot(root, 'sets/../bios.bin')).toBe(join(root, 'bios.bin'))
    })

    it('should reject absolute, escaping and empty names', () => {
        expect(() => resolveUnderRoot(root, '/etc/passwd')).toThrow(FileAccessError)
        expect(() => resolveUnderRoot(root, '../outside.bin')).toThrow('file "../outside.bin" escapes the files root')
        expect(() => resolveUnderRoot(root, '.')).toThrow(FileAccessError)
        expect(() => resolveUnderRoot(root, '  ')).toThrow(FileAccessError)
    })
})
