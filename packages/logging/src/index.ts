export { createLogger, createSilentLogger } from './pino.js'
export { CHANNELS, channelPrefix, isLogChannel } from './channels.js'
export { LogChannel } from './types.js'
export type { ChannelColor, ChannelLogger, LoggerBundle, LogLevel } from './types.js'
