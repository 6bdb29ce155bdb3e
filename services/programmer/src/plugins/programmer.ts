// services/programmer/src/plugins/programmer.ts

import type { FastifyInstance, FastifyPluginAsync, FastifyReply } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
    type ClientLogBuffer,
} from '@romlink/logging'

import { ProgrammerService } from '../devices/eeprom-programmer/ProgrammerService.js'
import { ProgrammerStateAdapter } from '../adapters/programmer.adapter.js'
import type {
    DeviceFamily,
    ProgrammerEvent,
    ProgrammerEventSink,
} from '../devices/eeprom-programmer/types.js'
import { buildProgrammerConfigFromEnv } from '../devices/eeprom-programmer/utils.js'
import {
    CAPACITY_LABELS,
    DEFAULT_PAGE_SIZE,
    DEVICE_FAMILIES,
    PAGE_SIZES,
    profileFromInput,
    type ProfileInput,
} from '../devices/eeprom-programmer/geometry.js'
import { errorDetail, errorMessage, toHttpStatus } from '../devices/eeprom-programmer/errors.js'
import { openSerialLink } from '../core/link/openSerialLink.js'
import type { LinkOpener } from '../core/link/types.js'

declare module 'fastify' {
    interface FastifyInstance {
        programmer: ProgrammerService
        programmerStatus: ProgrammerStateAdapter
        clientBuf: ClientLogBuffer
    }
}

export interface ProgrammerPluginOptions {
    /** Replaces the serial Link (tests plug in a fake programmer here). */
    openLink?: LinkOpener
    env?: NodeJS.ProcessEnv
}

// ---- Event sink using service logging --------------------------------------

class ProgrammerLoggerEventSink implements ProgrammerEventSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: ProgrammerEvent): void {
        const ts = new Date(evt.at).toISOString()
        const op = evt.op

        switch (evt.kind) {
            case 'op-started': {
                this.log.info(`kind=${evt.kind} ts=${ts} op=${op.kind} target=${op.target}`)
                break
            }

            case 'op-progress': {
                // Every percent step would flood the log; keep tens only.
                if (op.percent % 10 === 0) {
                    this.log.debug(`kind=${evt.kind} op=${op.kind} phase=${op.phase ?? 'n/a'} pct=${op.percent}`)
                }
                break
            }

            case 'op-completed': {
                const durationMs = evt.at - Date.parse(op.startedAt)
                this.log.info(
                    `kind=${evt.kind} ts=${ts} op=${op.kind} target=${op.target} ${evt.summary} durationMs=${durationMs}`
                )
                break
            }

            case 'op-failed': {
                this.log.error(
                    `kind=${evt.kind} ts=${ts} op=${op.kind} target=${op.target} error=${evt.errorName} msg="${evt.error}"`
                )
                break
            }
        }
    }
}

// ---- Fanout sink: logger + state adapter -----------------------------------

class FanoutProgrammerEventSink implements ProgrammerEventSink {
    private readonly sinks: ProgrammerEventSink[]

    constructor(private readonly log: ChannelLogger, ...sinks: ProgrammerEventSink[]) {
        this.sinks = sinks
    }

    publish(evt: ProgrammerEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                // A failing consumer must not abort a transfer mid-page.
                this.log.warn(`event sink failed kind=${evt.kind} err="${errorMessage(err)}"`)
            }
        }
    }
}

// ---- Request schemas -------------------------------------------------------

const profileSchema = {
    type: 'object',
    required: ['capacity'],
    additionalProperties: false,
    properties: {
        capacity: { type: 'string', enum: [...CAPACITY_LABELS] },
        pageSize: { type: 'integer', enum: [...PAGE_SIZES], default: DEFAULT_PAGE_SIZE },
        family: { type: 'string', enum: [...DEVICE_FAMILIES], default: 'eeprom' },
    },
} as const

const addressSchema = { type: 'integer', minimum: 0, maximum: 0xffff_ffff } as const

interface ProfileBody {
    profile: { capacity: string; pageSize?: number; family?: DeviceFamily }
}

interface RangeBody extends ProfileBody {
    start?: number
    end?: number
}

interface FileBody extends RangeBody {
    file: string
}

const eraseBodySchema = {
    type: 'object',
    required: ['profile'],
    properties: { profile: profileSchema },
} as const

const dumpBodySchema = {
    type: 'object',
    required: ['profile'],
    properties: { profile: profileSchema, start: addressSchema, end: addressSchema },
} as const

const uploadBodySchema = {
    type: 'object',
    required: ['profile', 'file'],
    properties: { profile: profileSchema, file: { type: 'string', minLength: 1 } },
} as const

const downloadBodySchema = {
    type: 'object',
    required: ['profile', 'file'],
    properties: {
        profile: profileSchema,
        file: { type: 'string', minLength: 1 },
        start: addressSchema,
        end: addressSchema,
    },
} as const

// ---- Plugin implementation -------------------------------------------------

const programmerPlugin: FastifyPluginAsync<ProgrammerPluginOptions> = async (
    app: FastifyInstance,
    opts: ProgrammerPluginOptions
) => {
    const env = opts.env ?? process.env
    const { channel } = createLogger('programmer', app.clientBuf)
    const logProg = channel(LogChannel.programmer)
    const logLink = channel(LogChannel.link)
    const logTransfer = channel(LogChannel.transfer)

    const config = buildProgrammerConfigFromEnv(env)
    const link = config.link

    logProg.info(
        `programmer config port=${link.portPath ?? `vid:${link.vendorId}/pid:${link.productId}`} baud=${link.baudRate} identify=${link.identify} ackTimeoutMs=${link.ackTimeoutMs} maxIdleReads=${config.maxIdleReads} filesRoot=${config.filesRoot}`
    )

    const stateAdapter = new ProgrammerStateAdapter()
    const events: ProgrammerEventSink = new FanoutProgrammerEventSink(
        logProg,
        new ProgrammerLoggerEventSink(logProg),
        {
            publish(evt: ProgrammerEvent): void {
                stateAdapter.handle(evt)
            },
        }
    )

    const openLink: LinkOpener = opts.openLink ?? (() => openSerialLink(link, { log: logLink }))

    const programmer = new ProgrammerService(config, {
        events,
        openLink,
        log: logTransfer,
    })

    app.decorate('programmer', programmer)
    app.decorate('programmerStatus', stateAdapter)

    const fail = (reply: FastifyReply, err: unknown) => {
        const status = toHttpStatus(err)
        if (status >= 500) logProg.error(`request failed status=${status} err="${errorMessage(err)}"`)
        else logProg.warn(`request rejected status=${status} err="${errorMessage(err)}"`)
        reply.code(status)
        return {
            ok: false,
            error: errorMessage(err),
            errorName: err instanceof Error ? err.name : 'Error',
            ...errorDetail(err),
        }
    }

    const toProfile = (body: ProfileBody) => {
        const input: ProfileInput = body.profile
        return profileFromInput(input)
    }

    // ---------- Routes ----------

    app.get('/api/programmer/geometry', async () => ({
        capacities: CAPACITY_LABELS,
        pageSizes: PAGE_SIZES,
        families: DEVICE_FAMILIES,
        defaultPageSize: DEFAULT_PAGE_SIZE,
    }))

    app.get('/api/programmer/status', async () => stateAdapter.getSnapshot())

    app.post<{ Body: ProfileBody }>(
        '/api/programmer/erase',
        { schema: { body: eraseBodySchema } },
        async (req, reply) => {
            try {
                await programmer.erase(toProfile(req.body))
                return {
                    ok: true,
                    // The firmware gives no erase confirmation.
                    note: 'Assuming the chip erase worked; dump the device to check that all bytes read ff.',
                }
            } catch (err) {
                return fail(reply, err)
            }
        }
    )

    app.post<{ Body: RangeBody }>(
        '/api/programmer/dump',
        { schema: { body: dumpBodySchema } },
        async (req, reply) => {
            try {
                const { start, end } = req.body
                const lines = await programmer.dump(toProfile(req.body), { start, end })
                return { ok: true, lines }
            } catch (err) {
                return fail(reply, err)
            }
        }
    )

    app.post<{ Body: FileBody }>(
        '/api/programmer/upload',
        { schema: { body: uploadBodySchema } },
        async (req, reply) => {
            try {
                const { bytesWritten } = await programmer.upload(toProfile(req.body), req.body.file)
                return { ok: true, bytesWritten }
            } catch (err) {
                return fail(reply, err)
            }
        }
    )

    app.post<{ Body: FileBody }>(
        '/api/programmer/download',
        { schema: { body: downloadBodySchema } },
        async (req, reply) => {
            try {
                const { start, end, file } = req.body
                const { bytesRead } = await programmer.download(toProfile(req.body), file, { start, end })
                return { ok: true, bytesRead }
            } catch (err) {
                return fail(reply, err)
            }
        }
    )

    app.post('/api/programmer/cancel', async () => ({ ok: true, cancelled: programmer.cancel() }))

    // ---------- Lifecycle ----------

    app.addHook('onClose', async () => {
        logProg.info('stopping programmer service')
        await programmer.stop()
    })
}

export default fp(programmerPlugin, {
    name: 'programmer-plugin',
})
