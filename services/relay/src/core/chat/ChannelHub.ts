// services/relay/src/core/chat/ChannelHub.ts

import { MessageNotFoundError, errorMessage } from '../errors.js'
import type {
    ChatAuthor,
    ChatEventSink,
    ChatMessage,
    ChatPlatform,
    HubEvent,
    HubListener,
} from './types.js'

interface ChannelHubOptions {
    /** Author used for messages the relay itself posts. */
    botName?: string
    /** Messages kept per channel; older ones are dropped from history. */
    historyLimit?: number
    events?: ChatEventSink
    now?: () => number
}

const ALL = '*'

/**
 * ChannelHub
 *
 * In-process chat platform: named channels holding ordered messages. Every
 * change is fanned out to listeners of that channel and to listeners of
 * all channels (the message router, the WebSocket gateway).
 */
export class ChannelHub implements ChatPlatform {
    readonly botName: string

    private readonly historyLimit: number
    private readonly events: ChatEventSink | null
    private readonly now: () => number

    private readonly channels = new Map<string, ChatMessage[]>()
    private readonly listeners = new Map<string, Set<HubListener>>()
    private nextId = 1

    constructor(opts: ChannelHubOptions = {}) {
        this.botName = opts.botName ?? 'serial-relay'
        this.historyLimit = Math.max(1, opts.historyLimit ?? 200)
        this.events = opts.events ?? null
        this.now = opts.now ?? Date.now
    }

    /* ---------------------------------------------------------------------- */
    /*  Inbound                                                               */
    /* ---------------------------------------------------------------------- */

    post(channelId: string, text: string, author: ChatAuthor): ChatMessage {
        const message: ChatMessage = {
            id: `m${this.nextId++}`,
            channelId,
            author: { name: author.name, bot: author.bot === true },
            text,
            createdAt: this.now(),
            editedAt: null,
        }

        const history = this.channel(channelId)
        history.push(message)
        if (history.length > this.historyLimit) history.splice(0, history.length - this.historyLimit)

        this.events?.publish({
            kind: 'chat-message-created',
            at: message.createdAt,
            channelId,
            messageId: message.id,
            author: message.author.name,
            bot: message.author.bot === true,
        })
        this.emit(channelId, { type: 'message.created', message: { ...message } })
        return { ...message }
    }

    history(channelId: string, limit?: number): ChatMessage[] {
        const messages = this.channels.get(channelId) ?? []
        const slice = limit !== undefined && limit >= 0 ? messages.slice(-limit) : messages
        return slice.map((m) => ({ ...m }))
    }

    channelIds(): string[] {
        return [...this.channels.keys()]
    }

    /* ---------------------------------------------------------------------- */
    /*  ChatPlatform                                                          */
    /* ---------------------------------------------------------------------- */

    async sendMessage(channelId: string, text: string): Promise<string> {
        return this.post(channelId, text, { name: this.botName, bot: true }).id
    }

    async editMessage(channelId: string, messageId: string, text: string): Promise<void> {
        const message = this.find(channelId, messageId)
        message.text = text
        message.editedAt = this.now()

        this.events?.publish({ kind: 'chat-message-edited', at: message.editedAt, channelId, messageId })
        this.emit(channelId, { type: 'message.updated', message: { ...message } })
    }

    async fetchMessage(channelId: string, messageId: string): Promise<string> {
        return this.find(channelId, messageId).text
    }

    async deleteMessage(channelId: string, messageId: string): Promise<void> {
        const history = this.channels.get(channelId) ?? []
        const idx = history.findIndex((m) => m.id === messageId)
        if (idx < 0) throw new MessageNotFoundError(channelId, messageId)
        history.splice(idx, 1)

        this.events?.publish({ kind: 'chat-message-deleted', at: this.now(), channelId, messageId })
        this.emit(channelId, { type: 'message.deleted', channelId, messageId })
    }

    /* ---------------------------------------------------------------------- */
    /*  Listeners                                                             */
    /* ---------------------------------------------------------------------- */

    /** Listen to one channel. Returns an unsubscribe function. */
    subscribe(channelId: string, listener: HubListener): () => void {
        let set = this.listeners.get(channelId)
        if (!set) {
            set = new Set()
            this.listeners.set(channelId, set)
        }
        set.add(listener)

        return () => {
            const current = this.listeners.get(channelId)
            if (!current) return
            current.delete(listener)
            if (current.size === 0) this.listeners.delete(channelId)
        }
    }

    /** Listen to every channel. */
    subscribeAll(listener: HubListener): () => void {
        return this.subscribe(ALL, listener)
    }

    private emit(channelId: string, evt: HubEvent): void {
        const targets = [...(this.listeners.get(channelId) ?? []), ...(this.listeners.get(ALL) ?? [])]
        for (const listener of targets) {
            try {
                listener(evt)
            } catch (err) {
                this.events?.publish({ kind: 'chat-listener-error', at: this.now(), channelId, error: errorMessage(err) })
            }
        }
    }

    private channel(channelId: string): ChatMessage[] {
        let history = this.channels.get(channelId)
        if (!history) {
            history = []
            this.channels.set(channelId, history)
        }
        return history
    }

    private find(channelId: string, messageId: string): ChatMessage {
        const message = this.channels.get(channelId)?.find((m) => m.id === messageId)
        if (!message) throw new MessageNotFoundError(channelId, messageId)
        return message
    }
}
