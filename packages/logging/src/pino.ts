import pino, { type Logger, type LoggerOptions, type LogFn } from 'pino'
import {
    type ChannelLogger,
    type LoggerBundle,
    LogChannel
} from './types.js'
import { CUSTOM_LEVELS, CHANNEL_AS_LEVEL, channelPrefix, isLogChannel } from './channels.js'

// levelKey exists at runtime but is missing from pino's typings
type PinoOptionsExt = LoggerOptions<LogChannel> & { levelKey?: string }

export type CreateLoggerOptions = {
    level?: string
    pretty?: boolean
}

export function createLogger(service: string, opts: CreateLoggerOptions = {}): LoggerBundle {
    const PRETTY = opts.pretty ?? String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = opts.level ?? process.env.LOG_LEVEL ?? 'info'

    let base: Logger<LogChannel>

    const options: PinoOptionsExt = {
        levelKey: 'lvl',                          // hide default 'level' from pino-pretty
        level: LOG_LEVEL,
        base: { service },
        customLevels: CUSTOM_LEVELS,
        useOnlyCustomLevels: false,
        formatters: {
            level() { return { lvl: '' } },      // suppress textual level in JSON
            log(obj) { return obj }
        },
        hooks: {
            logMethod(args: unknown[], method: LogFn): void {
                let ch: LogChannel | undefined

                const first = args[0]
                if (typeof first === 'object' && first !== null && 'channel' in first) {
                    if (isLogChannel(first.channel)) ch = first.channel
                }

                if (ch) {
                    const prefix = channelPrefix(ch)

                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${String(args[1])}`
                    } else if (args.length >= 1 && typeof args[0] === 'string') {
                        args[0] = `${prefix} ${String(args[0])}`
                    } else {
                        args.push(prefix)
                    }
                }

                Reflect.apply(method, base, args)
            }
        }
    }

    // pino-pretty runs as a pino transport (worker thread) so the main thread only serializes
    const destination = PRETTY
        ? pino.transport({
            target: 'pino-pretty',
            options: {
                translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
                colorize: true,
                singleLine: false,
                ignore: 'pid,hostname,service,channel,lvl'
            }
        })
        : undefined

    base = destination ? pino<LogChannel>(options, destination) : pino<LogChannel>(options)

    const callCustomLevel = (ch: LogChannel, message: string, extra?: Record<string, unknown>): void => {
        base[ch](extra ? { channel: ch, ...extra } : { channel: ch }, message)
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg: string, extra?: Record<string, unknown>): void => {
            base.debug(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
        },
        info: (msg: string, extra?: Record<string, unknown>): void => {
            if (CHANNEL_AS_LEVEL) {
                callCustomLevel(ch, msg, extra)
            } else {
                base.info(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            }
        },
        warn: (msg: string, extra?: Record<string, unknown>): void => {
            base.warn(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
        },
        error: (msg: string, extra?: Record<string, unknown>): void => {
            base.error(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
        },
        fatal: (msg: string, extra?: Record<string, unknown>): void => {
            base.fatal(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
        }
    })

    return { base, channel }
}

/**
 * Logger that drops every line. Handy for library callers and tests that
 * don't want pino output.
 */
export function createSilentLogger(): ChannelLogger {
    const noop = (): void => {}
    return { debug: noop, info: noop, warn: noop, error: noop, fatal: noop }
}
