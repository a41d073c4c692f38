// services/relay/src/server.ts

import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { createLogger, LogChannel } from '@serial-relay/logging'
import { buildApp } from './app.js'
import { errorMessage } from './core/errors.js'
import { parseIntEnv, parseStringEnv } from './utils/env.js'

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
        path.resolve(cwd, '.env.local'),
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
}

async function start(): Promise<void> {
    loadEnv()

    const { channel } = createLogger('relay')
    const logRelay = channel(LogChannel.relay)

    const PORT = parseIntEnv(process.env.API_PORT, 3000)
    const HOST = parseStringEnv(process.env.API_HOST, '0.0.0.0')

    let app: FastifyInstance | null = null

    try {
        app = buildApp()
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logRelay.info(`listening host=${HOST} port=${PORT} env=${env}`)

        // Graceful shutdown
        const running = app
        const shutdown = async (signal: NodeJS.Signals) => {
            try {
                logRelay.info(`received ${signal}, shutting down`)
                await running.close()
                logRelay.info('relay closed')
                process.exit(0)
            } catch (err) {
                logRelay.error('error during shutdown', { err: errorMessage(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        logRelay.error(`failed to start err=${JSON.stringify(errorMessage(err))}`)
        await app?.close().catch((closeErr: unknown) => {
            logRelay.error(`close after failed start err=${JSON.stringify(errorMessage(closeErr))}`)
        })
        process.exit(1)
    }
}

void start()
