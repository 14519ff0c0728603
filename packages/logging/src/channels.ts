import { type ChannelColor, LogChannel } from './types.js'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.app]:    { emoji: '📦', color: 'blue' },
    [LogChannel.sync]:   { emoji: '🔁', color: 'green' },
    // Google Sheets transport
    [LogChannel.sheets]: { emoji: '📊', color: 'cyan' },
    // local SQLite store
    [LogChannel.store]:  { emoji: '🗄️', color: 'yellow' },
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
    [LogChannel.app]:    30,
    [LogChannel.sync]:   30,
    [LogChannel.sheets]: 30,
    [LogChannel.store]:  30,
}

export function channelPrefix(ch: LogChannel): string {
    const meta = CHANNELS[ch]
    return `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`
}

export function isLogChannel(v: unknown): v is LogChannel {
    return typeof v === 'string' && Object.prototype.hasOwnProperty.call(CHANNELS, v)
}
