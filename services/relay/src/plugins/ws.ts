// services/relay/src/plugins/ws.ts

import fp from 'fastify-plugin'
import websocket from '@fastify/websocket'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import type { RawData, WebSocket as WSSocket } from 'ws'
import {
    createLogger,
    LogChannel,
    type ClientLog,
} from '@serial-relay/logging'
import { parseClientFrame, type ClientFrame } from '../core/chat/protocol.js'
import type { ChatMessage, HubEvent } from '../core/chat/types.js'
import { errorMessage } from '../core/errors.js'
import { parseBoolEnv, parseIntEnv } from '../utils/env.js'

// 💓 heartbeat logging toggle
const HB_LOG = parseBoolEnv(process.env.WS_HEARTBEAT_LOG, false)
const LOGS_SNAPSHOT_DEFAULT = 200

type ServerFrame =
    | { type: 'welcome'; serverTime: string; channels: string[] }
    | { type: 'ack'; ok: true; for: ClientFrame['type']; messageId?: string }
    | { type: 'pong'; ts: number }
    | { type: 'logs.history'; entries: ClientLog[] }
    | { type: 'logs.append'; entries: ClientLog[] }
    | { type: 'channel.history'; channelId: string; messages: ChatMessage[] }
    | HubEvent
    | { type: 'command.result'; channelId: string; name: string; ok: boolean; reply: string }
    | { type: 'error'; error: string }

function send(socket: WSSocket, frame: ServerFrame): void {
    if (socket.readyState !== socket.OPEN) return
    socket.send(JSON.stringify(frame))
}

function decode(data: RawData): unknown {
    let text: string
    if (Array.isArray(data)) text = Buffer.concat(data).toString('utf8')
    else if (Buffer.isBuffer(data)) text = data.toString('utf8')
    else text = Buffer.from(data).toString('utf8')
    return JSON.parse(text)
}

/**
 * WebSocket gateway onto the channel hub. Clients subscribe to channels,
 * post messages (which the relay routes like any chat message) and run
 * commands; every hub change in a subscribed channel is pushed back.
 */
export default fp(async function wsPlugin(app: FastifyInstance) {
    const clientBuf = app.clientBuf
    const { channel } = createLogger('relay:ws', clientBuf)
    const logWs = channel(LogChannel.websocket)
    const { hub, commands } = app.relay

    await app.register(websocket, {
        options: {
            perMessageDeflate: true,
            clientTracking: true,
        },
    })

    const sockets = new Set<WSSocket>()

    // Live logs -> broadcast
    const unsubscribeLogs = clientBuf.subscribe((entry: ClientLog) => {
        const payload: ServerFrame = { type: 'logs.append', entries: [entry] }
        for (const ws of sockets) {
            try {
                send(ws, payload)
            } catch (e) {
                logWs.debug(`kind=ws-send-failed frame=logs.append err=${JSON.stringify(errorMessage(e))}`)
            }
        }
    })

    app.get('/ws', { websocket: true }, (socket: WSSocket, req: FastifyRequest) => {
        sockets.add(socket)
        const subscriptions = new Map<string, () => void>()

        const subscribe = (channelId: string, history: number) => {
            if (!subscriptions.has(channelId)) {
                subscriptions.set(
                    channelId,
                    hub.subscribe(channelId, (evt) => send(socket, evt)),
                )
            }
            send(socket, { type: 'channel.history', channelId, messages: hub.history(channelId, history) })
        }

        const unsubscribe = (channelId: string) => {
            subscriptions.get(channelId)?.()
            subscriptions.delete(channelId)
        }

        const handle = async (frame: ClientFrame): Promise<void> => {
            switch (frame.type) {
                case 'hello':
                    send(socket, { type: 'ack', ok: true, for: frame.type })
                    return
                case 'ping':
                    send(socket, { type: 'pong', ts: Date.now() })
                    if (HB_LOG) logWs.debug('kind=ws-heartbeat pong sent')
                    return
                case 'subscribe':
                    subscribe(frame.channelId, frame.history)
                    return
                case 'unsubscribe':
                    unsubscribe(frame.channelId)
                    send(socket, { type: 'ack', ok: true, for: frame.type })
                    return
                case 'message.send': {
                    const message = hub.post(frame.channelId, frame.text, frame.author)
                    send(socket, { type: 'ack', ok: true, for: frame.type, messageId: message.id })
                    return
                }
                case 'message.delete':
                    await hub.deleteMessage(frame.channelId, frame.messageId)
                    send(socket, { type: 'ack', ok: true, for: frame.type, messageId: frame.messageId })
                    return
                case 'command': {
                    const result = await commands.run(frame.channelId, frame.name, frame.args)
                    await hub.sendMessage(frame.channelId, result.reply)
                    send(socket, { type: 'command.result', channelId: frame.channelId, name: frame.name, ...result })
                    return
                }
            }
        }

        try {
            send(socket, { type: 'welcome', serverTime: new Date().toISOString(), channels: hub.channelIds() })

            const snapshotCount = Math.max(0, parseIntEnv(process.env.CLIENT_LOGS_SNAPSHOT, LOGS_SNAPSHOT_DEFAULT))
            const entries = clientBuf.getLatest(snapshotCount)
            if (entries.length > 0) send(socket, { type: 'logs.history', entries })

            logWs.info(`kind=ws-client-connected ip=${req.ip}`)
        } catch (e) {
            logWs.error(`kind=ws-initial-frames-failed err=${JSON.stringify(errorMessage(e))}`)
        }

        socket.on('message', (data: RawData) => {
            let raw: unknown
            try {
                raw = decode(data)
            } catch {
                send(socket, { type: 'error', error: 'invalid JSON' })
                return
            }

            const parsed = parseClientFrame(raw)
            if (!parsed.ok) {
                send(socket, { type: 'error', error: parsed.error })
                return
            }

            handle(parsed.frame).catch((e: unknown) => {
                const error = errorMessage(e)
                logWs.warn(`kind=ws-frame-failed type=${parsed.frame.type} err=${JSON.stringify(error)}`)
                send(socket, { type: 'error', error })
            })
        })

        socket.on('close', () => {
            sockets.delete(socket)
            for (const stop of subscriptions.values()) stop()
            subscriptions.clear()
            logWs.info('kind=ws-client-disconnected')
        })
    })

    app.addHook('onClose', async () => {
        unsubscribeLogs()
        for (const ws of sockets) ws.close()
        sockets.clear()
    })
}, { name: 'ws-plugin', dependencies: ['relay-plugin'] })
