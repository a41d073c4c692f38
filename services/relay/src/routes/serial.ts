// services/relay/src/routes/serial.ts

import type { FastifyPluginAsync } from 'fastify'
import { badRequest, replyError } from './errors.js'

type SettingParams = { name: string }
type SettingBody = { value?: unknown } | undefined
type EncodingBody = { encoding?: unknown; errors?: unknown } | undefined

const optionalString = (v: unknown): string | undefined => (typeof v === 'string' ? v : undefined)

const serialRoutes: FastifyPluginAsync = async (app) => {
    const { connection, sessions } = app.relay

    app.get('/api/serial/settings', async () => ({ ok: true, settings: connection.getSettings() }))

    app.get('/api/serial/status', async () => ({
        ok: true,
        ...connection.status(),
        session: sessions.getActive(),
        queued: sessions.queued,
    }))

    app.post('/api/serial/connect', async (_req, reply) => {
        try {
            return { ok: true, status: await connection.connect() }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.post('/api/serial/disconnect', async (_req, reply) => {
        try {
            await connection.disconnect()
            return { ok: true, status: connection.status() }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.post('/api/serial/flush', async (_req, reply) => {
        try {
            await connection.flush()
            return { ok: true }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.put<{ Params: SettingParams; Body: SettingBody }>('/api/serial/settings/:name', async (req, reply) => {
        const value = req.body?.value
        if (typeof value !== 'string' && typeof value !== 'number') {
            return badRequest(reply, 'value (string or number) required')
        }
        try {
            return { ok: true, settings: connection.setParameter(req.params.name, String(value)) }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.put<{ Body: EncodingBody }>('/api/serial/encoding', async (req, reply) => {
        try {
            const settings = connection.setEncoding(optionalString(req.body?.encoding), optionalString(req.body?.errors))
            return { ok: true, settings }
        } catch (err) {
            return replyError(reply, err)
        }
    })
}

export default serialRoutes
