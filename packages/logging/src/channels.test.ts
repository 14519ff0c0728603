import { describe, expect, it } from 'vitest'

import { CHANNELS, channelPrefix, isLogChannel } from './channels.js'
import { createLogger, createSilentLogger } from './pino.js'
import { LogChannel } from './types.js'

describe('channels', () => {
    it('prefixes messages with the channel emoji and colour', () => {
        expect(channelPrefix(LogChannel.sync)).toBe('\x1b[32m🔁 [sync]:\x1b[0m')
    })

    it('declares every channel', () => {
        expect(Object.keys(CHANNELS).sort()).toEqual(['app', 'sheets', 'store', 'sync'])
    })

    it('recognises channel names only', () => {
        expect(isLogChannel('sheets')).toBe(true)
        expect(isLogChannel('ffmpeg')).toBe(false)
        expect(isLogChannel(42)).toBe(false)
    })
})

describe('createLogger', () => {
    it('honours the requested level without pretty output', () => {
        const { base, channel } = createLogger('test', { level: 'warn', pretty: false })
        expect(base.level).toBe('warn')

        const log = channel(LogChannel.store)
        expect(typeof log.info).toBe('function')
        expect(() => log.debug('hidden')).not.toThrow()
    })

    it('silent logger accepts every level', () => {
        const log = createSilentLogger()
        expect(() => {
            log.debug('a')
            log.info('b', { n: 1 })
            log.warn('c')
            log.error('d')
            log.fatal('e')
        }).not.toThrow()
    })
})
