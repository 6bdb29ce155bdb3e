import type {
    ProgrammerEvent,
    ProgrammerStatus,
} from '../devices/eeprom-programmer/types.js'

/**
 * ProgrammerStateAdapter
 *
 * Mirrors ProgrammerEvent objects into a status snapshot for
 * GET /api/programmer/status. Always trusts the latest event payload.
 */
export class ProgrammerStateAdapter {
    private status: ProgrammerStatus = { phase: 'idle' }

    getSnapshot(): ProgrammerStatus {
        return {
            ...this.status,
            currentOp: this.status.currentOp ? { ...this.status.currentOp } : undefined,
        }
    }

    handle(evt: ProgrammerEvent): void {
        switch (evt.kind) {
            case 'op-started':
            case 'op-progress': {
                this.status = {
                    ...this.status,
                    phase: 'busy',
                    currentOp: evt.op,
                }
                return
            }

            case 'op-completed': {
                this.status = {
                    phase: 'idle',
                    lastResult: {
                        kind: evt.op.kind,
                        ok: true,
                        message: evt.summary,
                        at: new Date(evt.at).toISOString(),
                    },
                }
                return
            }

            case 'op-failed': {
                this.status = {
                    phase: 'idle',
                    lastResult: {
                        kind: evt.op.kind,
                        ok: false,
                        message: `${evt.errorName}: ${evt.error}`,
                        at: new Date(evt.at).toISOString(),
                    },
                }
                return
            }
        }
    }
}
