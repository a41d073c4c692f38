// services/relay/src/core/chat/MessageRouter.ts

import { parseCommandLine, type CommandResult, type CommandSurface } from '../commands/CommandSurface.js'
import { errorMessage } from '../errors.js'
import type { SnapshotListener, TerminalSnapshot } from '../session/types.js'
import type { SinkRegistry } from '../sinks/SinkRegistry.js'
import type { ChatEventSink, ChatMessage, ChatPlatform } from './types.js'

/** What the router needs from the session manager. */
export interface CommandExecutor {
    execute(command: string, channelId: string, onSnapshot?: SnapshotListener): Promise<TerminalSnapshot>
}

interface MessageRouterDeps {
    sessions: CommandExecutor
    sinks: SinkRegistry
    commands: CommandSurface
    platform: ChatPlatform
    events?: ChatEventSink
    now?: () => number
}

export type RouteResult =
    | { route: 'ignored'; reason: 'bot' | 'empty' | 'no-terminal' }
    | { route: 'command'; name: string; result: CommandResult }
    | { route: 'session'; snapshot: TerminalSnapshot }
    | { route: 'failed'; error: string }

/**
 * Decides what an inbound chat message is:
 * - authored by a bot: ignored
 * - starts with "/": a command, answered with a reply message
 * - anything else in a channel with a terminal: a device command
 */
export class MessageRouter {
    private readonly deps: MessageRouterDeps
    private readonly now: () => number

    constructor(deps: MessageRouterDeps) {
        this.deps = deps
        this.now = deps.now ?? Date.now
    }

    async handle(message: ChatMessage): Promise<RouteResult> {
        const { channelId } = message
        const result = await this.route(message).catch((err: unknown): RouteResult => ({
            route: 'failed',
            error: errorMessage(err),
        }))

        if (result.route === 'failed') {
            this.deps.events?.publish({ kind: 'chat-route-failed', at: this.now(), channelId, error: result.error })
        } else {
            this.deps.events?.publish({ kind: 'chat-route', at: this.now(), channelId, route: describe(result) })
        }
        return result
    }

    private async route(message: ChatMessage): Promise<RouteResult> {
        const { channelId } = message
        if (message.author.bot) return { route: 'ignored', reason: 'bot' }

        const text = message.text.trim()
        if (!text) return { route: 'ignored', reason: 'empty' }

        const invocation = parseCommandLine(text)
        if (invocation) {
            const result = await this.deps.commands.run(channelId, invocation.name, invocation.args)
            await this.deps.platform.sendMessage(channelId, result.reply)
            return { route: 'command', name: invocation.name, result }
        }

        const { sinks, sessions } = this.deps
        if (!sinks.hasAny(channelId)) return { route: 'ignored', reason: 'no-terminal' }

        const snapshot = await sessions.execute(text, channelId, (s) => {
            void sinks.onSnapshot(channelId, s)
        })
        await sinks.idle(channelId)
        return { route: 'session', snapshot }
    }
}

function describe(result: Exclude<RouteResult, { route: 'failed' }>): string {
    switch (result.route) {
        case 'ignored':
            return `ignored:${result.reason}`
        case 'command':
            return `command:${result.name}`
        case 'session':
            return `session:${result.snapshot.status}`
    }
}
