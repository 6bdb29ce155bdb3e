import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@romlink/logging'

import programmerPlugin, { type ProgrammerPluginOptions } from './plugins/programmer.js'

interface LogsQuery {
    n?: number
}

export interface BuildAppOptions extends ProgrammerPluginOptions {
    fastify?: FastifyServerOptions
    clientBuf?: ClientLogBuffer
}

const SERVICE_NAME = 'romlink-programmer'
const SERVICE_VERSION = '0.1.0'

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const env = opts.env ?? process.env

    // ---- Request logging config (env) ----
    const REQUEST_VERBOSE = String(env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
    const REQUEST_SAMPLE = Math.max(1, Number(env.REQUEST_SAMPLE ?? '1') || 1)
    // --------------------------------------

    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger(SERVICE_NAME, clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    void app.register(cors, { origin: true })

    void app.register(programmerPlugin, { openLink: opts.openLink, env })

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        if (++reqCounter % REQUEST_SAMPLE !== 0) return

        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)
        if (REQUEST_VERBOSE) logReq.debug('request detail', { id: req.id, ip: req.ip })
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)

        logReq.info(`${req.method} ${req.url} → ${reply.statusCode} (${Date.now() - start} ms)`)
    })
    // ---------------------------------------------------

    app.get('/health', async () => ({ status: 'ok' }))
    app.get('/version', async () => ({ name: SERVICE_NAME, version: SERVICE_VERSION }))

    app.get<{ Querystring: LogsQuery }>(
        '/api/logs',
        {
            schema: {
                querystring: {
                    type: 'object',
                    properties: { n: { type: 'integer', minimum: 0, default: 100 } }
                }
            }
        },
        async (req) => ({ logs: clientBuf.getLatest(req.query.n ?? 100) })
    )

    logApp.info('programmer app built')
    return app
}
