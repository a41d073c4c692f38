// services/relay/src/app.ts

import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply,
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    isClientLogLevel,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer,
    type ClientLogFilter,
} from '@serial-relay/logging'

import relayPlugin, { type RelayPluginOptions } from './plugins/relay.js'
import wsPlugin from './plugins/ws.js'
import serialRoutes from './routes/serial.js'
import channelRoutes from './routes/channels.js'
import { buildRelayConfigFromEnv } from './config.js'
import { parseBoolEnv, parseIntEnv } from './utils/env.js'

export const APP_NAME = 'serial-relay'
export const APP_VERSION = '0.1.0'

interface LogsQuery {
    n?: string
    channel?: string
    level?: string
}

function logFilter(query: LogsQuery): ClientLogFilter {
    const channel = Object.values(LogChannel).find((c) => c === query.channel)
    const level = query.level !== undefined && isClientLogLevel(query.level) ? query.level : undefined
    return { channel, minLevel: level }
}

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    relay?: RelayPluginOptions
    clientBuf?: ClientLogBuffer
}

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    // ---- Request logging config (env) ----
    const REQUEST_VERBOSE = parseBoolEnv(process.env.REQUEST_VERBOSE, false)
    const REQUEST_SAMPLE = Math.max(1, parseIntEnv(process.env.REQUEST_SAMPLE, 1))
    // --------------------------------------

    const config = opts.relay?.config ?? buildRelayConfigFromEnv(process.env)
    const clientBuf = opts.clientBuf ?? makeClientBuffer({ limit: config.clientLogLimit })
    const { channel } = createLogger(APP_NAME, clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    void app.register(cors, { origin: true })

    // Relay services first; the gateway and routes read app.relay
    void app.register(relayPlugin, { ...opts.relay, config })
    void app.register(wsPlugin)
    void app.register(serialRoutes)
    void app.register(channelRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        if (++reqCounter % REQUEST_SAMPLE !== 0) return
        startedAt.set(req.id, Date.now())
        if (REQUEST_VERBOSE) logReq.debug(`${req.method} ${req.url}`, { id: req.id, ip: req.ip })
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)
        logReq.info(`${req.method} ${req.url} → ${reply.statusCode} (${Date.now() - start} ms)`)
    })
    // ---------------------------------------------------

    app.get('/health', async () => ({ status: 'ok' }))
    app.get('/version', async () => ({ name: APP_NAME, version: APP_VERSION }))

    app.get<{ Querystring: LogsQuery }>('/api/logs', async (req) => {
        const n = Math.max(0, parseIntEnv(req.query.n, 200))
        return { ok: true, entries: clientBuf.getLatest(n, logFilter(req.query)) }
    })

    logApp.info('kind=app-built')
    return app
}
