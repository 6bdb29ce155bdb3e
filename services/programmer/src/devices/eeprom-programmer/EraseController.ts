import { OPCODES, type Link } from '../../core/link/types.js'
import type { ProgressSink } from './types.js'
import { asTransferStep } from './errors.js'

/**
 * Chip erase. The firmware acknowledges once the erase cycle has been
 * issued; it gives no "erased" confirmation, so success is assumed. A dump
 * of the device (all bytes 0xff) is the way to check.
 */
export class EraseController {
    constructor(private readonly link: Link) {}

    async erase(progress?: ProgressSink): Promise<void> {
        progress?.report({ phase: 'erasing', percent: 0 })
        await asTransferStep('chip erase', async () => {
            await this.link.sendCommand(OPCODES.erase)
            await this.link.readAck()
        })
        progress?.report({ phase: 'erasing', percent: 100 })
    }
}
