// packages/logging/src/types.ts
import type { Logger } from 'pino'

export enum LogChannel {
    app = 'app',
    sync = 'sync',
    sheets = 'sheets',
    store = 'store',
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

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: Logger<LogChannel>
    channel: (ch: LogChannel) => ChannelLogger
}
