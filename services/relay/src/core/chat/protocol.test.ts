import { describe, it, expect } from 'vitest'
import { parseArgs, parseAuthor, parseClientFrame } from './protocol.js'

describe('parseClientFrame', () => {
    it('accepts bare frames', () => {
        expect(parseClientFrame({ type: 'ping' })).toEqual({ ok: true, frame: { type: 'ping' } })
        expect(parseClientFrame({ type: 'hello', client: 'x' })).toEqual({ ok: true, frame: { type: 'hello' } })
    })

    it('requires a channel for channel frames', () => {
        expect(parseClientFrame({ type: 'subscribe' })).toEqual({ ok: false, error: 'subscribe: channelId is required' })
        expect(parseClientFrame({ type: 'subscribe', channelId: '  ' })).toEqual({
            ok: false,
            error: 'subscribe: channelId is required',
        })
    })

    it('defaults the subscribe history size', () => {
        expect(parseClientFrame({ type: 'subscribe', channelId: 'bench' })).toEqual({
            ok: true,
            frame: { type: 'subscribe', channelId: 'bench', history: 50 },
        })
        expect(parseClientFrame({ type: 'subscribe', channelId: 'bench', history: 3.7 })).toEqual({
            ok: true,
            frame: { type: 'subscribe', channelId: 'bench', history: 3 },
        })
    })

    it('parses message.send with an author', () => {
        expect(parseClientFrame({ type: 'message.send', channelId: 'bench', text: 'AT', author: { name: 'ada' } })).toEqual({
            ok: true,
            frame: { type: 'message.send', channelId: 'bench', text: 'AT', author: { name: 'ada', bot: false } },
        })
        expect(parseClientFrame({ type: 'message.send', channelId: 'bench', text: ' ' })).toEqual({
            ok: false,
            error: 'message.send: text is required',
        })
    })

    it('parses commands with string or array args', () => {
        expect(parseClientFrame({ type: 'command', channelId: 'bench', name: 'set', args: 'baudrate 115200' })).toEqual({
            ok: true,
            frame: { type: 'command', channelId: 'bench', name: 'set', args: ['baudrate', '115200'] },
        })
        expect(parseClientFrame({ type: 'command', channelId: 'bench', name: 'set', args: ['baudrate', 9600] })).toEqual({
            ok: true,
            frame: { type: 'command', channelId: 'bench', name: 'set', args: ['baudrate', '9600'] },
        })
    })

    it('rejects unknown or malformed frames', () => {
        expect(parseClientFrame('ping')).toEqual({ ok: false, error: 'frame must be a JSON object' })
        expect(parseClientFrame({ channelId: 'bench' })).toEqual({ ok: false, error: 'frame type is required' })
        expect(parseClientFrame({ type: 'reboot', channelId: 'bench' })).toEqual({ ok: false, error: 'unknown frame type: reboot' })
    })
})

describe('parseAuthor', () => {
    it('falls back when no usable name is given', () => {
        expect(parseAuthor(undefined)).toEqual({ name: 'web' })
        expect(parseAuthor({ name: '' }, 'http')).toEqual({ name: 'http' })
    })

    it('passes the bot flag through', () => {
        expect(parseAuthor({ name: 'ci', bot: true })).toEqual({ name: 'ci', bot: true })
    })
})

describe('parseArgs', () => {
    it('ignores values that are not strings or numbers', () => {
        expect(parseArgs(['a', 1, null, { x: 1 }])).toEqual(['a', '1'])
        expect(parseArgs(undefined)).toEqual([])
    })
})
