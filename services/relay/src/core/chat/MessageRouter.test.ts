import { describe, it, expect, beforeEach } from 'vitest'
import { MessageRouter } from './MessageRouter.js'
import { ChannelHub } from './ChannelHub.js'
import type { ChatAuthor } from './types.js'
import { CommandSurface } from '../commands/CommandSurface.js'
import { ConnectionService } from '../serial/ConnectionService.js'
import { MemorySettingsStore } from '../serial/settings-store.js'
import { SessionManager } from '../session/SessionManager.js'
import { ManualClock } from '../session/clock.js'
import { SinkRegistry } from '../sinks/SinkRegistry.js'
import { FakeTransport } from '../../testing/FakeTransport.js'

const CHANNEL = 'bench'
const ada: ChatAuthor = { name: 'ada' }

describe('MessageRouter', () => {
    let hub: ChannelHub
    let transport: FakeTransport
    let sinks: SinkRegistry
    let router: MessageRouter

    const say = (text: string, author: ChatAuthor = ada) => router.handle(hub.post(CHANNEL, text, author))
    const texts = () => hub.history(CHANNEL).map((m) => m.text)

    beforeEach(() => {
        const clock = new ManualClock()
        hub = new ChannelHub()
        transport = new FakeTransport(clock)
        const connection = new ConnectionService({
            store: new MemorySettingsStore({ port: '/dev/ttyFAKE0' }),
            events: { publish: () => undefined },
            createTransport: () => transport,
        })
        const sessions = new SessionManager({ connection, clock })
        sinks = new SinkRegistry({ platform: hub, clock: new ManualClock(), throttleMs: 0 })
        const commands = new CommandSurface({ connection, sinks })
        router = new MessageRouter({ sessions, sinks, commands, platform: hub })
    })

    it('ignores bot-authored messages', async () => {
        expect(await say('/terminal', { name: 'other-bot', bot: true })).toEqual({ route: 'ignored', reason: 'bot' })
        expect(sinks.hasAny(CHANNEL)).toBe(false)
    })

    it('ignores device text in a channel without a terminal', async () => {
        expect(await say('AT')).toEqual({ route: 'ignored', reason: 'no-terminal' })
        expect(transport.log).toEqual([])
    })

    it('ignores blank messages', async () => {
        expect(await say('   ')).toEqual({ route: 'ignored', reason: 'empty' })
    })

    it('answers slash commands in the channel', async () => {
        const result = await say('/terminal')

        expect(result).toEqual({
            route: 'command',
            name: 'terminal',
            result: { ok: true, reply: 'Terminal mode enabled in this channel' },
        })
        expect(texts()).toEqual(['/terminal', 'Terminal mode enabled in this channel'])
    })

    it('relays a device command to the plain terminal', async () => {
        await say('/terminal')
        await say('/connect')
        transport.reply('AT+GMR', 'AT version:2.2.0\r\n', 'OK\r\n')

        const result = await say('AT+GMR')

        expect(result.route).toBe('session')
        expect(texts().slice(-2)).toEqual(['AT+GMR', '```\nAT version:2.2.0\nOK\n```'])
    })

    it('reports a missing connection to the channel', async () => {
        await say('/terminal')

        const result = await say('AT')

        expect(result).toMatchObject({ route: 'session', snapshot: { status: 'not-connected' } })
        expect(texts().at(-1)).toBe('Not connected to serial device')
    })

    it('updates the live terminal message in place', async () => {
        await say('/connect')
        await say('/liveterminal')
        const messageId = sinks.liveMessageId(CHANNEL)
        transport.reply('AT+CWJAP?', '+CWJAP:"lab"\r\n', 'OK\r\n')

        await say('AT+CWJAP?')

        expect(messageId).not.toBeNull()
        const live = hub.history(CHANNEL).find((m) => m.id === messageId)
        expect(live?.text).toBe('```\n+CWJAP:"lab"\nOK\n```')
    })
})
