// services/relay/src/routes/channels.ts

import type { FastifyPluginAsync } from 'fastify'
import { parseArgs, parseAuthor } from '../core/chat/protocol.js'
import { badRequest, replyError } from './errors.js'

type ChannelParams = { channelId: string }
type MessageParams = ChannelParams & { messageId: string }
type CommandParams = ChannelParams & { name: string }
type HistoryQuery = { n?: string }
type PostBody = { text?: unknown; author?: unknown } | undefined
type CommandBody = { args?: unknown } | undefined

const channelRoutes: FastifyPluginAsync = async (app) => {
    const { hub, sinks, commands } = app.relay

    app.get('/api/channels', async () => {
        const ids = [...new Set([...hub.channelIds(), ...sinks.channels()])]
        return {
            ok: true,
            channels: ids.map((id) => ({
                id,
                plain: sinks.isPlain(id),
                live: sinks.isLive(id),
                liveMessageId: sinks.liveMessageId(id),
            })),
        }
    })

    app.get<{ Params: ChannelParams; Querystring: HistoryQuery }>('/api/channels/:channelId/messages', async (req) => {
        const n = req.query.n === undefined ? undefined : Math.max(0, Number.parseInt(req.query.n, 10) || 0)
        return { ok: true, messages: hub.history(req.params.channelId, n) }
    })

    // Posting is the same as typing into the channel: the router picks the
    // message up and answers asynchronously.
    app.post<{ Params: ChannelParams; Body: PostBody }>('/api/channels/:channelId/messages', async (req, reply) => {
        const text = req.body?.text
        if (typeof text !== 'string' || !text.trim()) return badRequest(reply, 'text (string) required')

        const message = hub.post(req.params.channelId, text, parseAuthor(req.body?.author, 'http'))
        reply.code(202)
        return { ok: true, message }
    })

    app.delete<{ Params: MessageParams }>('/api/channels/:channelId/messages/:messageId', async (req, reply) => {
        try {
            await hub.deleteMessage(req.params.channelId, req.params.messageId)
            return { ok: true }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.post<{ Params: CommandParams; Body: CommandBody }>('/api/channels/:channelId/commands/:name', async (req, reply) => {
        const { channelId, name } = req.params
        const result = await commands.run(channelId, name, parseArgs(req.body?.args))
        await hub.sendMessage(channelId, result.reply)
        if (!result.ok) reply.code(400)
        return result
    })
}

export default channelRoutes
