// services/relay/src/core/chat/protocol.ts

import type { ChatAuthor } from './types.js'

/** Frames a WebSocket client may send. */
export type ClientFrame =
    | { type: 'hello' }
    | { type: 'ping' }
    | { type: 'subscribe'; channelId: string; history: number }
    | { type: 'unsubscribe'; channelId: string }
    | { type: 'message.send'; channelId: string; text: string; author: ChatAuthor }
    | { type: 'message.delete'; channelId: string; messageId: string }
    | { type: 'command'; channelId: string; name: string; args: string[] }

export type FrameParseResult =
    | { ok: true; frame: ClientFrame }
    | { ok: false; error: string }

type Fields = Record<string, unknown>

function isFields(value: unknown): value is Fields {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function str(fields: Fields, key: string): string | null {
    const v = fields[key]
    if (typeof v !== 'string') return null
    const t = v.trim()
    return t.length > 0 ? t : null
}

/** Author supplied by a client, or `fallback` when it gave none. */
export function parseAuthor(value: unknown, fallback = 'web'): ChatAuthor {
    if (isFields(value)) {
        const name = str(value, 'name')
        if (name) return { name, bot: value.bot === true }
    }
    return { name: fallback }
}

export function parseArgs(value: unknown): string[] {
    if (typeof value === 'string') return value.split(/\s+/).filter((a) => a.length > 0)
    if (!Array.isArray(value)) return []
    return value.filter((a): a is string | number => typeof a === 'string' || typeof a === 'number').map(String)
}

/**
 * Validate a decoded JSON payload. Channel-scoped frames need a non-empty
 * `channelId`; `message.send` needs `text`.
 */
export function parseClientFrame(raw: unknown): FrameParseResult {
    if (!isFields(raw)) return { ok: false, error: 'frame must be a JSON object' }
    const type = raw.type

    if (type === 'hello' || type === 'ping') return { ok: true, frame: { type } }
    if (typeof type !== 'string') return { ok: false, error: 'frame type is required' }

    const channelId = str(raw, 'channelId')
    if (!channelId) return { ok: false, error: `${type}: channelId is required` }

    switch (type) {
        case 'subscribe': {
            const history = typeof raw.history === 'number' && raw.history >= 0 ? Math.floor(raw.history) : 50
            return { ok: true, frame: { type, channelId, history } }
        }
        case 'unsubscribe':
            return { ok: true, frame: { type, channelId } }
        case 'message.send': {
            const text = typeof raw.text === 'string' ? raw.text : ''
            if (!text.trim()) return { ok: false, error: 'message.send: text is required' }
            return { ok: true, frame: { type, channelId, text, author: parseAuthor(raw.author) } }
        }
        case 'message.delete': {
            const messageId = str(raw, 'messageId')
            if (!messageId) return { ok: false, error: 'message.delete: messageId is required' }
            return { ok: true, frame: { type, channelId, messageId } }
        }
        case 'command': {
            const name = str(raw, 'name')
            if (!name) return { ok: false, error: 'command: name is required' }
            return { ok: true, frame: { type, channelId, name, args: parseArgs(raw.args) } }
        }
        default:
            return { ok: false, error: `unknown frame type: ${type}` }
    }
}
