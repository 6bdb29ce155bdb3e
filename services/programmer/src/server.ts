import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { createLogger, LogChannel } from '@romlink/logging'
import { buildApp } from './app.js'
import { errorMessage } from './devices/eeprom-programmer/errors.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
function loadEnv(): void {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
}

async function start(): Promise<void> {
    loadEnv()

    const { channel } = createLogger('romlink-programmer')
    const logApp = channel(LogChannel.app)

    const PORT = Number(process.env.API_PORT ?? 3000)
    const HOST = process.env.API_HOST ?? '0.0.0.0'

    const app: FastifyInstance = buildApp()

    try {
        await app.listen({ port: PORT, host: HOST })
        logApp.info(`listening host=${HOST} port=${PORT} env=${process.env.NODE_ENV ?? 'development'}`)
    } catch (err) {
        logApp.error(`failed to start err="${errorMessage(err)}"`)
        await app.close().catch((closeErr: unknown) => {
            logApp.error(`close after failed start err="${errorMessage(closeErr)}"`)
        })
        process.exit(1)
    }

    // Graceful shutdown; app.close() waits for a cancelled transfer to wind down.
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        try {
            logApp.info(`received ${signal}, shutting down`)
            await app.close()
            logApp.info('programmer service closed')
            process.exit(0)
        } catch (err) {
            logApp.error('error during shutdown', { err: errorMessage(err) })
            process.exit(1)
        }
    }
    process.on('SIGINT', () => void shutdown('SIGINT'))
    process.on('SIGTERM', () => void shutdown('SIGTERM'))
}

void start()
