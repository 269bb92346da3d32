import { type ChannelColor, type ChannelMeta, LogChannel } from './types.js'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, ChannelMeta> = {
    [LogChannel.server]:        { emoji: '🛰️', color: 'blue' },
    [LogChannel.app]:           { emoji: '📦', color: 'blue' },
    [LogChannel.request]:       { emoji: '📝', color: 'purple' },
    [LogChannel.list]:          { emoji: '🛒', color: 'green' },
    [LogChannel.sessions]:      { emoji: '🪪', color: 'cyan' },
    [LogChannel.google_sheets]: { emoji: '📊', color: 'yellow' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    cyan: '\x1b[36m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

// Channel levels sit between info (30) and warn (40); pino rejects reuse of a built-in value.
export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.server]:        31,
    [LogChannel.app]:           32,
    [LogChannel.request]:       33,
    [LogChannel.list]:          34,
    [LogChannel.sessions]:      35,
    [LogChannel.google_sheets]: 36,
}
