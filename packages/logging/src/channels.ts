import { type ChannelColor, LogChannel } from './types.js'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.app]:        { emoji: '📦', color: 'blue' },
    [LogChannel.request]:    { emoji: '📝', color: 'purple' },
    // Operation lifecycle (erase / dump / upload / download)
    [LogChannel.programmer]: { emoji: '🔥', color: 'yellow' },
    [LogChannel.link]:       { emoji: '🔌', color: 'cyan' },
    [LogChannel.transfer]:   { emoji: '📼', color: 'green' },
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

// Values sit just above info (30) and must not reuse a built-in level value.
export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.app]:        31,
    [LogChannel.request]:    32,
    [LogChannel.programmer]: 33,
    [LogChannel.link]:       34,
    [LogChannel.transfer]:   35,
}
