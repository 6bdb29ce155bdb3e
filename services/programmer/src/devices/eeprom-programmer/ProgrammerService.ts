// services/programmer/src/devices/eeprom-programmer/ProgrammerService.ts

import { open, rename, rm, type FileHandle } from 'node:fs/promises'
import type { ChannelLogger } from '@romlink/logging'
import type { Link, LinkOpener } from '../../core/link/types.js'
import type {
    AddressRange,
    DeviceProfile,
    ProgrammerConfig,
    ProgrammerCurrentOp,
    ProgrammerEventSink,
    ProgrammerOpKind,
    ProgressSink,
} from './types.js'
import {
    CapacityExceededError,
    errorMessage,
    FileAccessError,
    ProgrammerBusyError,
    VerificationMismatchError,
} from './errors.js'
import { formatRange, rangeLength, resolveRange, validateProfile } from './geometry.js'
import { dumpLines } from './hexdump.js'
import { FileByteSource } from './sources.js'
import { TransferEngine } from './TransferEngine.js'
import { EraseController } from './EraseController.js'
import { resolveUnderRoot } from './utils.js'

interface ProgrammerServiceDeps {
    events: ProgrammerEventSink
    openLink: LinkOpener
    log?: ChannelLogger
}

interface OpContext {
    signal: AbortSignal
    progress: ProgressSink
}

interface ActiveOp {
    op: ProgrammerCurrentOp
    controller: AbortController
    /** Resolves once the operation has closed its Link, whatever the outcome. */
    settled: Promise<void>
}

/**
 * ProgrammerService
 *
 * Runs the user-level operations (erase / dump / upload / download) one at
 * a time. Each operation opens its own Link and closes it on every exit
 * path; nothing about the connection survives between operations.
 *
 * Inputs and files are checked before the Link is opened, so a bad profile,
 * an oversized file or an unwritable destination never touches the device.
 */
export class ProgrammerService {
    private readonly config: ProgrammerConfig
    private readonly deps: ProgrammerServiceDeps

    private active: ActiveOp | null = null

    constructor(config: ProgrammerConfig, deps: ProgrammerServiceDeps) {
        this.config = config
        this.deps = deps
    }

    /* ---------------------------------------------------------------------- */
    /*  Public API                                                            */
    /* ---------------------------------------------------------------------- */

    public isBusy(): boolean {
        return this.active !== null
    }

    /**
     * Request cooperative cancellation of the running operation. Returns
     * false when nothing is running.
     */
    public cancel(): boolean {
        if (!this.active) return false
        this.deps.log?.warn(`cancel requested op=${this.active.op.kind} target=${this.active.op.target}`)
        this.active.controller.abort()
        return true
    }

    /**
     * Cancel the running operation and wait for it to wind down: the
     * current chunk finishes, an EEPROM is re-locked and the Link is closed.
     */
    public async stop(): Promise<void> {
        const active = this.active
        if (!active) return
        this.cancel()
        await active.settled
    }

    public async erase(profile: DeviceProfile): Promise<void> {
        validateProfile(profile)
        await this.runExclusive('erase', 'device', async ({ progress }) => {
            await this.withLink((link) => new EraseController(link).erase(progress))
            return 'chip erase issued (not device-confirmed)'
        })
    }

    public async dump(profile: DeviceProfile, range?: Partial<AddressRange>): Promise<string[]> {
        validateProfile(profile)
        const r = resolveRange(profile, range?.start, range?.end)

        const lines: string[] = []
        await this.runExclusive('dump', formatRange(r), async (ctx) => {
            await this.withLink(async (link) => {
                const engine = this.engineFor(link, ctx)
                for await (const line of dumpLines(r.start, engine.read(r, ctx.progress))) {
                    lines.push(line)
                }
            })
            return `lines=${lines.length}`
        })
        return lines
    }

    public async upload(profile: DeviceProfile, file: string): Promise<{ bytesWritten: number }> {
        validateProfile(profile)
        const path = resolveUnderRoot(this.config.filesRoot, file)

        let bytesWritten = 0
        await this.runExclusive('upload', file, async (ctx) => {
            const source = await FileByteSource.open(path)
            try {
                if (source.size > profile.capacityBytes) {
                    throw new CapacityExceededError(source.size, profile.capacityBytes)
                }

                const result = await this.withLink((link) =>
                    this.engineFor(link, ctx).write(
                        { profile, data: source, totalLength: source.size },
                        ctx.progress
                    )
                )

                if (result.verification.kind === 'mismatch') {
                    const { offset, expected, actual } = result.verification
                    throw new VerificationMismatchError(offset, expected, actual)
                }
                bytesWritten = result.bytesWritten
            } finally {
                await source.close()
            }
            return `bytes=${bytesWritten} verified`
        })
        return { bytesWritten }
    }

    /**
     * Stream a range into `file` under the files root. Data goes to a
     * `.part` sibling that is renamed on success and removed on failure.
     */
    public async download(
        profile: DeviceProfile,
        file: string,
        range?: Partial<AddressRange>
    ): Promise<{ bytesRead: number }> {
        validateProfile(profile)
        const r = resolveRange(profile, range?.start, range?.end)
        const path = resolveUnderRoot(this.config.filesRoot, file)
        const partPath = `${path}.part`

        let bytesRead = 0
        await this.runExclusive('download', file, async (ctx) => {
            const handle: FileHandle = await open(partPath, 'w').catch((err: unknown) => {
                throw new FileAccessError(file, `could not open ${file} for writing: ${errorMessage(err)}`, { cause: err })
            })

            let handleOpen = true
            try {
                await this.withLink(async (link) => {
                    for await (const chunk of this.engineFor(link, ctx).read(r, ctx.progress)) {
                        await handle.write(chunk)
                        bytesRead += chunk.length
                    }
                })
                handleOpen = false
                await handle.close()
                await rename(partPath, path)
            } catch (err) {
                if (handleOpen) await handle.close()
                await rm(partPath, { force: true })
                throw err
            }
            return `bytes=${bytesRead} of ${rangeLength(r)}`
        })
        return { bytesRead }
    }

    /* ---------------------------------------------------------------------- */
    /*  Operation plumbing                                                    */
    /* ---------------------------------------------------------------------- */

    private engineFor(link: Link, ctx: OpContext): TransferEngine {
        return new TransferEngine(link, {
            maxIdleReads: this.config.maxIdleReads,
            signal: ctx.signal,
            log: this.deps.log,
        })
    }

    private async withLink<T>(fn: (link: Link) => Promise<T>): Promise<T> {
        const link = await this.deps.openLink()
        try {
            return await fn(link)
        } finally {
            await link.close()
        }
    }

    private async runExclusive(
        kind: ProgrammerOpKind,
        target: string,
        body: (ctx: OpContext) => Promise<string>
    ): Promise<void> {
        if (this.active) throw new ProgrammerBusyError(this.active.op.kind)

        const op: ProgrammerCurrentOp = {
            kind,
            target,
            startedAt: new Date().toISOString(),
            phase: null,
            percent: 0,
        }
        let settle = (): void => undefined
        const settled = new Promise<void>((resolve) => {
            settle = () => resolve()
        })
        const active: ActiveOp = { op, controller: new AbortController(), settled }
        this.active = active

        const progress: ProgressSink = {
            report: (evt) => {
                if (evt.phase === op.phase && evt.percent === op.percent) return
                op.phase = evt.phase
                op.percent = evt.percent
                this.deps.events.publish({ kind: 'op-progress', at: Date.now(), op: { ...op } })
            },
        }

        this.deps.events.publish({ kind: 'op-started', at: Date.now(), op: { ...op } })

        try {
            const summary = await body({ signal: active.controller.signal, progress })
            this.deps.events.publish({ kind: 'op-completed', at: Date.now(), op: { ...op }, summary })
        } catch (err) {
            this.deps.events.publish({
                kind: 'op-failed',
                at: Date.now(),
                op: { ...op },
                errorName: err instanceof Error ? err.name : 'Error',
                error: errorMessage(err),
            })
            throw err
        } finally {
            this.active = null
            settle()
        }
    }
}
