// services/relay/src/core/chat/types.ts

/**
 * Outbound side of the chat platform. The sink registry and the command
 * surface only ever talk to a channel through this interface.
 */
export interface ChatPlatform {
    /** Post a new message, resolving with its id. */
    sendMessage(channelId: string, text: string): Promise<string>
    editMessage(channelId: string, messageId: string, text: string): Promise<void>
    /** Current text of a message. Fails with MessageNotFoundError. */
    fetchMessage(channelId: string, messageId: string): Promise<string>
    deleteMessage(channelId: string, messageId: string): Promise<void>
}

export interface ChatAuthor {
    name: string
    bot?: boolean
}

export interface ChatMessage {
    id: string
    channelId: string
    author: ChatAuthor
    text: string
    createdAt: number
    editedAt: number | null
}

export type HubEvent =
    | { type: 'message.created'; message: ChatMessage }
    | { type: 'message.updated'; message: ChatMessage }
    | { type: 'message.deleted'; channelId: string; messageId: string }

export type HubListener = (evt: HubEvent) => void

export interface ChatEventSink {
    publish(evt: ChatEvent): void
}

export type ChatEvent =
    | { kind: 'chat-message-created'; at: number; channelId: string; messageId: string; author: string; bot: boolean }
    | { kind: 'chat-message-edited'; at: number; channelId: string; messageId: string }
    | { kind: 'chat-message-deleted'; at: number; channelId: string; messageId: string }
    | { kind: 'chat-listener-error'; at: number; channelId: string; error: string }
    | { kind: 'chat-route'; at: number; channelId: string; route: string }
    | { kind: 'chat-route-failed'; at: number; channelId: string; error: string }
