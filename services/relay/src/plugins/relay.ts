// services/relay/src/plugins/relay.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
    type ClientLogBuffer,
} from '@serial-relay/logging'
import { buildRelayConfigFromEnv, type RelayConfig } from '../config.js'
import { ChannelHub } from '../core/chat/ChannelHub.js'
import { MessageRouter } from '../core/chat/MessageRouter.js'
import type { ChatEvent, ChatEventSink } from '../core/chat/types.js'
import { CommandSurface } from '../core/commands/CommandSurface.js'
import { errorMessage } from '../core/errors.js'
import { ConnectionService, type TransportFactory } from '../core/serial/ConnectionService.js'
import { JsonFileSettingsStore, type SettingsStore } from '../core/serial/settings-store.js'
import type { ConnectionEvent, ConnectionEventSink } from '../core/serial/types.js'
import { SessionManager } from '../core/session/SessionManager.js'
import type { Clock } from '../core/session/clock.js'
import type { SessionEvent, SessionEventSink } from '../core/session/types.js'
import { SinkRegistry } from '../core/sinks/SinkRegistry.js'
import type { SinkEvent, SinkEventSink } from '../core/sinks/types.js'

// ---- Fastify decoration ----------------------------------------------------

export interface RelayServices {
    config: RelayConfig
    hub: ChannelHub
    connection: ConnectionService
    sessions: SessionManager
    sinks: SinkRegistry
    commands: CommandSurface
    router: MessageRouter
}

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
        relay: RelayServices
    }
}

export interface RelayPluginOptions {
    config?: RelayConfig
    store?: SettingsStore
    createTransport?: TransportFactory
    clock?: Clock
}

// ---- Event sinks using relay logging ---------------------------------------

type Log = ChannelLogger

const iso = (at: number) => new Date(at).toISOString()

class SerialLoggerEventSink implements ConnectionEventSink {
    constructor(private readonly log: Log) {}

    publish(evt: ConnectionEvent): void {
        const ts = iso(evt.at)
        switch (evt.kind) {
            case 'serial-settings-loaded':
                if (evt.rejected.length > 0) {
                    this.log.warn(`ts=${ts} kind=${evt.kind} rejected=${evt.rejected.join(',')}`)
                } else {
                    this.log.info(`ts=${ts} kind=${evt.kind}`)
                }
                break
            case 'serial-connected':
                this.log.info(`ts=${ts} kind=${evt.kind} path=${evt.path} baud=${evt.baudRate}`)
                break
            case 'serial-open-failed':
                this.log.error(
                    `ts=${ts} kind=${evt.kind} path=${evt.path} err=${JSON.stringify(evt.error)}` +
                        (evt.closeError ? ` closeErr=${JSON.stringify(evt.closeError)}` : ''),
                )
                break
            case 'serial-stale-released':
                this.log.warn(
                    `ts=${ts} kind=${evt.kind} path=${evt.path}` +
                        (evt.error ? ` err=${JSON.stringify(evt.error)}` : ''),
                )
                break
            case 'serial-disconnected':
                this.log.warn(`ts=${ts} kind=${evt.kind} path=${evt.path} reason=${evt.reason}`)
                break
            case 'serial-buffers-flushed':
                this.log.info(`ts=${ts} kind=${evt.kind} path=${evt.path}`)
                break
            case 'serial-setting-changed':
                this.log.info(`ts=${ts} kind=${evt.kind} name=${evt.name} value=${JSON.stringify(evt.value)}`)
                break
        }
    }
}

class SessionLoggerEventSink implements SessionEventSink {
    constructor(private readonly log: Log) {}

    publish(evt: SessionEvent): void {
        const ts = iso(evt.at)
        switch (evt.kind) {
            case 'session-queued':
                this.log.info(`ts=${ts} kind=${evt.kind} channel=${evt.channelId} queued=${evt.queued}`)
                break
            case 'session-start':
                this.log.info(`ts=${ts} kind=${evt.kind} id=${evt.id} channel=${evt.channelId} cmd=${JSON.stringify(evt.command)}`)
                break
            case 'session-echo':
                this.log.debug(`ts=${ts} kind=${evt.kind} id=${evt.id} echo=${JSON.stringify(evt.echo)}`)
                break
            case 'session-timeout-selected':
                this.log.info(`ts=${ts} kind=${evt.kind} id=${evt.id} timeoutSec=${evt.timeoutSec} rule=${evt.rule}`)
                break
            case 'session-line':
                this.log.debug(`ts=${ts} kind=${evt.kind} id=${evt.id} line=${JSON.stringify(evt.line)}`)
                break
            case 'session-decode-fallback':
                this.log.warn(`ts=${ts} kind=${evt.kind} id=${evt.id} reason=${JSON.stringify(evt.reason)}`)
                break
            case 'session-completion-seen':
                this.log.debug(`ts=${ts} kind=${evt.kind} id=${evt.id} indicator=${evt.indicator}`)
                break
            case 'session-still-waiting':
                this.log.info(`ts=${ts} kind=${evt.kind} id=${evt.id} idleMs=${evt.idleMs}`)
                break
            case 'session-end':
                this.log.info(
                    `ts=${ts} kind=${evt.kind} id=${evt.id} outcome=${evt.outcome} lines=${evt.lines} ms=${evt.elapsedMs}`,
                )
                break
            case 'session-aborted':
                this.log.error(`ts=${ts} kind=${evt.kind} id=${evt.id} err=${JSON.stringify(evt.error)}`)
                break
            case 'session-listener-error':
                this.log.warn(`ts=${ts} kind=${evt.kind} id=${evt.id} err=${JSON.stringify(evt.error)}`)
                break
        }
    }
}

class SinkLoggerEventSink implements SinkEventSink {
    constructor(private readonly log: Log) {}

    publish(evt: SinkEvent): void {
        const ts = iso(evt.at)
        switch (evt.kind) {
            case 'sink-registered':
                this.log.info(
                    `ts=${ts} kind=${evt.kind} channel=${evt.channelId} sink=${evt.sink}` +
                        (evt.messageId ? ` message=${evt.messageId}` : ''),
                )
                break
            case 'sink-unregistered':
                this.log.info(`ts=${ts} kind=${evt.kind} channel=${evt.channelId} sink=${evt.sink} reason=${evt.reason}`)
                break
            case 'sink-delivered':
                this.log.debug(
                    `ts=${ts} kind=${evt.kind} channel=${evt.channelId} sink=${evt.sink} snapshot=${evt.snapshot} outcome=${evt.outcome}`,
                )
                break
            case 'sink-failed':
                this.log.warn(`ts=${ts} kind=${evt.kind} channel=${evt.channelId} sink=${evt.sink} err=${JSON.stringify(evt.error)}`)
                break
            case 'sink-cleanup-failed':
                this.log.warn(
                    `ts=${ts} kind=${evt.kind} channel=${evt.channelId} message=${evt.messageId} err=${JSON.stringify(evt.error)}`,
                )
                break
        }
    }
}

class ChatLoggerEventSink implements ChatEventSink {
    constructor(private readonly log: Log) {}

    publish(evt: ChatEvent): void {
        const ts = iso(evt.at)
        switch (evt.kind) {
            case 'chat-message-created':
                this.log.debug(
                    `ts=${ts} kind=${evt.kind} channel=${evt.channelId} message=${evt.messageId} author=${evt.author} bot=${evt.bot}`,
                )
                break
            case 'chat-message-edited':
            case 'chat-message-deleted':
                this.log.debug(`ts=${ts} kind=${evt.kind} channel=${evt.channelId} message=${evt.messageId}`)
                break
            case 'chat-route':
                this.log.debug(`ts=${ts} kind=${evt.kind} channel=${evt.channelId} route=${evt.route}`)
                break
            case 'chat-listener-error':
            case 'chat-route-failed':
                this.log.warn(`ts=${ts} kind=${evt.kind} channel=${evt.channelId} err=${JSON.stringify(evt.error)}`)
                break
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const relayPlugin: FastifyPluginAsync<RelayPluginOptions> = async (app: FastifyInstance, opts) => {
    const { channel } = createLogger('relay', app.clientBuf)
    const logPlugin = channel(LogChannel.relay)

    // 1) Config
    const config = opts.config ?? buildRelayConfigFromEnv(process.env)
    const store = opts.store ?? new JsonFileSettingsStore(config.configFile)

    // 2) Services, leaf first
    const hub = new ChannelHub({
        botName: config.botName,
        historyLimit: config.historyLimit,
        events: new ChatLoggerEventSink(channel(LogChannel.chat)),
    })

    const connection = new ConnectionService({
        store,
        events: new SerialLoggerEventSink(channel(LogChannel.serial)),
        createTransport: opts.createTransport,
    })

    const sessions = new SessionManager({
        connection,
        clock: opts.clock,
        timings: config.timings,
        events: new SessionLoggerEventSink(channel(LogChannel.session)),
    })

    const sinks = new SinkRegistry({
        platform: hub,
        clock: opts.clock,
        throttleMs: config.liveThrottleMs,
        windowLines: config.liveWindowLines,
        events: new SinkLoggerEventSink(channel(LogChannel.sinks)),
    })

    const commands = new CommandSurface({ connection, sinks })
    const router = new MessageRouter({
        sessions,
        sinks,
        commands,
        platform: hub,
        events: new ChatLoggerEventSink(channel(LogChannel.chat)),
    })

    // 3) Inbound chat → router
    const unsubscribe = hub.subscribeAll((evt) => {
        if (evt.type !== 'message.created') return
        void router.handle(evt.message)
    })

    app.decorate('relay', { config, hub, connection, sessions, sinks, commands, router })

    logPlugin.info(
        `kind=relay-ready configFile=${config.configFile} port=${connection.getSettings().port} throttleMs=${config.liveThrottleMs}`,
    )

    // 4) Lifecycle hooks
    app.addHook('onClose', async () => {
        unsubscribe()
        if (!connection.isConnected()) return
        logPlugin.info('kind=relay-shutdown closing serial port')
        await connection.disconnect('shutdown').catch((err: unknown) => {
            logPlugin.warn(`kind=relay-shutdown-failed err=${JSON.stringify(errorMessage(err))}`)
        })
    })
}

export default fp(relayPlugin, {
    name: 'relay-plugin',
})
