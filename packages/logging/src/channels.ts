import { type ChannelColor, LogChannel } from './types.js'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.relay]:     { emoji: '🛰️', color: 'blue' },
    // Raw port lifecycle + settings
    [LogChannel.serial]:    { emoji: '🔌', color: 'yellow' },
    [LogChannel.session]:   { emoji: '⏱️', color: 'green' },
    [LogChannel.sinks]:     { emoji: '🖥️', color: 'magenta' },
    [LogChannel.chat]:      { emoji: '💬', color: 'white' },
    [LogChannel.websocket]: { emoji: '🔗', color: 'cyan' },
    [LogChannel.app]:       { emoji: '📦', color: 'blue' },
    [LogChannel.request]:   { emoji: '📝', color: 'purple' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.relay]:     30,
    [LogChannel.serial]:    30,
    [LogChannel.session]:   30,
    [LogChannel.sinks]:     30,
    [LogChannel.chat]:      30,
    [LogChannel.websocket]: 30,
    [LogChannel.app]:       30,
    [LogChannel.request]:   30,
}
