// packages/logging/src/types.ts

export enum LogChannel {
    relay = 'relay',
    serial = 'serial',
    session = 'session',
    sinks = 'sinks',
    chat = 'chat',
    websocket = 'websocket',
    app = 'app',
    request = 'request',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'green'
    | 'magenta'
    | 'cyan'
    | 'red'
    | 'white'
    | 'purple'

export type ClientLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ClientLog {
    ts: number
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: ClientLogLevel
    message: string
}

export type ClientLogListener = (log: ClientLog) => void

export interface ClientLogFilter {
    channel?: LogChannel
    /** Drop entries below this level. */
    minLevel?: ClientLogLevel
}

export interface ClientLogBuffer {
    readonly capacity: number
    push: (log: ClientLog) => void
    /** Up to `n` of the newest matching entries, oldest first. */
    getLatest: (n: number, filter?: ClientLogFilter) => ClientLog[]
    subscribe: (listener: ClientLogListener) => () => void
}

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: import('pino').Logger<LogChannel>
    channel: (ch: LogChannel) => ChannelLogger
}
