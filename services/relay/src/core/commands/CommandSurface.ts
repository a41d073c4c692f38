// services/relay/src/core/commands/CommandSurface.ts

import { RelayError, errorMessage } from '../errors.js'
import type { ConnectionService } from '../serial/ConnectionService.js'
import { formatSettings, isSettingName } from '../serial/settings.js'
import { codeBlock } from '../sinks/render.js'
import type { SinkRegistry } from '../sinks/SinkRegistry.js'

export const COMMAND_NAMES = [
    'connect',
    'disconnect',
    'set',
    'settings',
    'terminal',
    'liveterminal',
    'encoding',
    'flush',
] as const

export type CommandName = typeof COMMAND_NAMES[number]

export function isCommandName(name: string): name is CommandName {
    return COMMAND_NAMES.some((n) => n === name)
}

export interface CommandResult {
    ok: boolean
    reply: string
}

interface CommandSurfaceDeps {
    connection: ConnectionService
    sinks: SinkRegistry
}

type Handler = (channelId: string, args: readonly string[]) => Promise<string>

/** Malformed arguments; the message is the usage line. */
class UsageError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'UsageError'
    }
}

const ok = (reply: string): CommandResult => ({ ok: true, reply })
const fail = (reply: string): CommandResult => ({ ok: false, reply })

/**
 * Parse "/set baudrate 9600" into a name and arguments. Returns null for
 * text that is not a command invocation.
 */
export function parseCommandLine(text: string): { name: string; args: string[] } | null {
    const trimmed = text.trim()
    if (!trimmed.startsWith('/')) return null
    const [name = '', ...args] = trimmed.slice(1).split(/\s+/)
    return { name: name.toLowerCase(), args: args.filter((a) => a.length > 0) }
}

/**
 * The user-facing commands. Every outcome, including failures, becomes a
 * one-line (or fenced) reply; nothing here throws to the caller.
 */
export class CommandSurface {
    private readonly connection: ConnectionService
    private readonly sinks: SinkRegistry
    private readonly handlers: Record<CommandName, Handler>

    constructor(deps: CommandSurfaceDeps) {
        this.connection = deps.connection
        this.sinks = deps.sinks
        this.handlers = {
            connect: () => this.connect(),
            disconnect: () => this.disconnect(),
            set: (_channelId, args) => this.set(args),
            settings: async () => `Current settings:\n${codeBlock(formatSettings(this.connection.getSettings()))}`,
            terminal: async (channelId) => this.toggleTerminal(channelId),
            liveterminal: (channelId) => this.toggleLiveTerminal(channelId),
            encoding: async (_channelId, args) => this.encoding(args),
            flush: () => this.flush(),
        }
    }

    async run(channelId: string, name: string, args: readonly string[] = []): Promise<CommandResult> {
        const key = name.toLowerCase()
        if (!isCommandName(key)) {
            return fail(`Unknown command: ${name}. Available commands: ${COMMAND_NAMES.join(', ')}`)
        }

        try {
            return ok(await this.handlers[key](channelId, args))
        } catch (err) {
            return fail(this.describe(key, err))
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Handlers                                                              */
    /* ---------------------------------------------------------------------- */

    private async connect(): Promise<string> {
        const status = await this.connection.connect()
        return `Connected to ${status.port} at ${status.baudrate} baud`
    }

    private async disconnect(): Promise<string> {
        await this.connection.disconnect()
        return 'Disconnected from serial device'
    }

    private async set(args: readonly string[]): Promise<string> {
        const [parameter, ...rest] = args
        const value = rest.join(' ')
        if (!parameter || !value) throw new UsageError('Usage: /set <parameter> <value>')

        const settings = this.connection.setParameter(parameter, value)
        const applied = isSettingName(parameter) ? settings[parameter] : value
        return `Set ${parameter} to ${applied}`
    }

    private toggleTerminal(channelId: string): string {
        if (this.sinks.unregisterPlain(channelId)) return 'Terminal mode disabled in this channel'
        this.sinks.registerPlain(channelId)
        return 'Terminal mode enabled in this channel'
    }

    private async toggleLiveTerminal(channelId: string): Promise<string> {
        if (await this.sinks.unregisterLive(channelId)) return 'Live terminal mode disabled in this channel'
        await this.sinks.registerLive(channelId)
        return 'Live terminal mode enabled in this channel'
    }

    private encoding(args: readonly string[]): string {
        const [encoding, errors] = args
        const settings = this.connection.setEncoding(encoding, errors)
        return `Set encoding to ${settings.encoding} with ${settings.encoding_errors} error handling`
    }

    private async flush(): Promise<string> {
        await this.connection.flush()
        return 'Serial buffers flushed'
    }

    private describe(name: CommandName, err: unknown): string {
        if (err instanceof RelayError || err instanceof UsageError) {
            if (name === 'connect' && err instanceof RelayError && err.code === 'device-open') {
                return `Error connecting to serial device: ${err.message}`
            }
            if (name === 'flush' && err instanceof RelayError && err.code === 'device-io') {
                return `Error flushing buffers: ${err.message}`
            }
            return err.message
        }
        return `Error: ${errorMessage(err)}`
    }
}
