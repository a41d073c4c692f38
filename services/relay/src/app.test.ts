import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { FastifyInstance } from 'fastify'
import WebSocket from 'ws'
import { buildApp } from './app.js'
import { buildRelayConfigFromEnv } from './config.js'
import { MemorySettingsStore } from './core/serial/settings-store.js'
import { ManualClock } from './core/session/clock.js'
import { FakeTransport } from './testing/FakeTransport.js'

describe('relay app', () => {
    let app: FastifyInstance
    let transport: FakeTransport
    let store: MemorySettingsStore

    beforeEach(async () => {
        const clock = new ManualClock()
        transport = new FakeTransport(clock)
        store = new MemorySettingsStore({ port: '/dev/ttyFAKE0' })
        app = buildApp({
            relay: {
                config: { ...buildRelayConfigFromEnv({}, '/tmp'), liveThrottleMs: 0 },
                store,
                createTransport: () => transport,
                clock,
            },
        })
        await app.ready()
    })

    afterEach(async () => {
        await app.close()
    })

    const lastText = async (channelId: string) => {
        const res = await app.inject({ method: 'GET', url: `/api/channels/${channelId}/messages?n=1` })
        const body: { messages: Array<{ text: string }> } = res.json()
        return body.messages[0]?.text
    }

    it('reports health and version', async () => {
        expect((await app.inject({ method: 'GET', url: '/health' })).json()).toEqual({ status: 'ok' })
        expect((await app.inject({ method: 'GET', url: '/version' })).json()).toEqual({ name: 'serial-relay', version: '0.1.0' })
    })

    it('serves recent log entries', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/logs?n=50' })
        const body: { ok: boolean; entries: Array<{ message: string; channel: string }> } = res.json()

        expect(body.ok).toBe(true)
        expect(body.entries).toContainEqual(expect.objectContaining({ channel: 'app', message: 'kind=app-built' }))
    })

    it('narrows log entries by channel and level', async () => {
        const byChannel = await app.inject({ method: 'GET', url: '/api/logs?channel=app' })
        const body: { entries: Array<{ message: string; channel: string }> } = byChannel.json()
        expect(body.entries.map((e) => e.channel)).toEqual(['app'])
        expect(body.entries[0]?.message).toBe('kind=app-built')

        const errorsOnly = await app.inject({ method: 'GET', url: '/api/logs?channel=app&level=error' })
        expect(errorsOnly.json()).toEqual({ ok: true, entries: [] })
    })

    it('exposes settings and status', async () => {
        const settings = await app.inject({ method: 'GET', url: '/api/serial/settings' })
        expect(settings.json()).toMatchObject({ ok: true, settings: { port: '/dev/ttyFAKE0', baudrate: 9600 } })

        const status = await app.inject({ method: 'GET', url: '/api/serial/status' })
        expect(status.json()).toEqual({
            ok: true,
            connected: false,
            port: '/dev/ttyFAKE0',
            baudrate: 9600,
            session: null,
            queued: 0,
        })
    })

    it('maps connection errors to conflict responses', async () => {
        const first = await app.inject({ method: 'POST', url: '/api/serial/connect' })
        expect(first.statusCode).toBe(200)
        expect(first.json()).toEqual({ ok: true, status: { connected: true, port: '/dev/ttyFAKE0', baudrate: 9600 } })

        const second = await app.inject({ method: 'POST', url: '/api/serial/connect' })
        expect(second.statusCode).toBe(409)
        expect(second.json()).toEqual({ ok: false, error: 'Already connected to serial device!', code: 'already-connected' })

        await app.inject({ method: 'POST', url: '/api/serial/disconnect' })
        const again = await app.inject({ method: 'POST', url: '/api/serial/disconnect' })
        expect(again.statusCode).toBe(409)
        expect(again.json()).toMatchObject({ code: 'not-connected' })
    })

    it('reports a port that will not open as a device error', async () => {
        transport.failNext('open', new Error('ENOENT: no such file or directory'))

        const res = await app.inject({ method: 'POST', url: '/api/serial/connect' })

        expect(res.statusCode).toBe(502)
        expect(res.json()).toEqual({ ok: false, error: 'ENOENT: no such file or directory', code: 'device-open' })
    })

    it('validates and persists parameter changes', async () => {
        const bad = await app.inject({ method: 'PUT', url: '/api/serial/settings/baudrate', payload: { value: 'fast' } })
        expect(bad.statusCode).toBe(400)
        expect(bad.json()).toEqual({ ok: false, error: 'Invalid value format for baudrate', code: 'invalid-value' })

        const missing = await app.inject({ method: 'PUT', url: '/api/serial/settings/baudrate', payload: {} })
        expect(missing.statusCode).toBe(400)

        const good = await app.inject({ method: 'PUT', url: '/api/serial/settings/baudrate', payload: { value: 115200 } })
        expect(good.statusCode).toBe(200)
        expect(good.json()).toMatchObject({ settings: { baudrate: 115200 } })
        expect(store.saves).toBe(1)
    })

    it('sets the encoding with a default error policy', async () => {
        const res = await app.inject({ method: 'PUT', url: '/api/serial/encoding', payload: { encoding: 'latin1' } })

        expect(res.json()).toMatchObject({ ok: true, settings: { encoding: 'latin1', encoding_errors: 'replace' } })
    })

    it('runs commands and posts the reply to the channel', async () => {
        const res = await app.inject({ method: 'POST', url: '/api/channels/bench/commands/terminal' })
        expect(res.json()).toEqual({ ok: true, reply: 'Terminal mode enabled in this channel' })
        expect(await lastText('bench')).toBe('Terminal mode enabled in this channel')

        const channels = await app.inject({ method: 'GET', url: '/api/channels' })
        expect(channels.json()).toEqual({
            ok: true,
            channels: [{ id: 'bench', plain: true, live: false, liveMessageId: null }],
        })

        const unknown = await app.inject({ method: 'POST', url: '/api/channels/bench/commands/reboot' })
        expect(unknown.statusCode).toBe(400)
    })

    it('relays a posted message to the device and answers in the channel', async () => {
        await app.inject({ method: 'POST', url: '/api/channels/bench/commands/terminal' })
        await app.inject({ method: 'POST', url: '/api/serial/connect' })
        transport.reply('AT+GMR', 'AT version:2.2.0\r\n', 'OK\r\n')

        const res = await app.inject({ method: 'POST', url: '/api/channels/bench/messages', payload: { text: 'AT+GMR' } })
        expect(res.statusCode).toBe(202)
        expect(res.json()).toMatchObject({ ok: true, message: { text: 'AT+GMR', author: { name: 'http', bot: false } } })

        await vi.waitFor(async () => {
            expect(await lastText('bench')).toBe('```\nAT version:2.2.0\nOK\n```')
        })
    })

    it('rejects an empty message and a missing one', async () => {
        const empty = await app.inject({ method: 'POST', url: '/api/channels/bench/messages', payload: { text: ' ' } })
        expect(empty.statusCode).toBe(400)

        const gone = await app.inject({ method: 'DELETE', url: '/api/channels/bench/messages/m999' })
        expect(gone.statusCode).toBe(404)
        expect(gone.json()).toEqual({ ok: false, error: 'Message m999 not found in channel bench', code: 'message-not-found' })
    })
})

describe('relay websocket gateway', () => {
    let app: FastifyInstance
    let socket: WebSocket
    let frames: Array<Record<string, unknown>>

    beforeEach(async () => {
        const clock = new ManualClock()
        app = buildApp({
            relay: {
                config: { ...buildRelayConfigFromEnv({}, '/tmp'), liveThrottleMs: 0 },
                store: new MemorySettingsStore({ port: '/dev/ttyFAKE0' }),
                createTransport: () => new FakeTransport(clock),
                clock,
            },
        })
        await app.listen({ port: 0, host: '127.0.0.1' })
        const address = app.server.address()
        const port = typeof address === 'object' && address !== null ? address.port : 0

        frames = []
        socket = new WebSocket(`ws://127.0.0.1:${port}/ws`)
        socket.on('message', (data) => {
            const parsed: unknown = JSON.parse(data.toString())
            if (typeof parsed === 'object' && parsed !== null) frames.push({ ...parsed })
        })
        await new Promise<void>((resolve, reject) => {
            socket.once('open', () => resolve())
            socket.once('error', reject)
        })
    })

    afterEach(async () => {
        socket.close()
        await app.close()
    })

    const waitForFrame = (match: (f: Record<string, unknown>) => boolean) =>
        vi.waitFor(() => {
            const found = frames.find(match)
            if (!found) throw new Error('frame not received yet')
            return found
        })

    const textOf = (f: Record<string, unknown>): unknown => {
        const message = f.message
        return typeof message === 'object' && message !== null && 'text' in message ? message.text : undefined
    }

    it('greets the client and answers heartbeats', async () => {
        await waitForFrame((f) => f.type === 'welcome')

        socket.send(JSON.stringify({ type: 'ping' }))
        await waitForFrame((f) => f.type === 'pong')

        socket.send('not json')
        expect(await waitForFrame((f) => f.type === 'error')).toEqual({ type: 'error', error: 'invalid JSON' })
    })

    it('routes channel traffic through the relay', async () => {
        socket.send(JSON.stringify({ type: 'subscribe', channelId: 'bench' }))
        expect(await waitForFrame((f) => f.type === 'channel.history')).toEqual({
            type: 'channel.history',
            channelId: 'bench',
            messages: [],
        })

        socket.send(JSON.stringify({ type: 'command', channelId: 'bench', name: 'terminal' }))
        expect(await waitForFrame((f) => f.type === 'command.result')).toEqual({
            type: 'command.result',
            channelId: 'bench',
            name: 'terminal',
            ok: true,
            reply: 'Terminal mode enabled in this channel',
        })

        socket.send(JSON.stringify({ type: 'message.send', channelId: 'bench', text: 'AT', author: { name: 'ada' } }))
        await waitForFrame((f) => f.type === 'message.created' && textOf(f) === 'Not connected to serial device')
    })
})
