import { pino, type Logger, type LoggerOptions, type LogFn } from 'pino'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET, CUSTOM_LEVELS, CHANNEL_AS_LEVEL } from './channels.js'

// levelKey is read by pino at runtime but is missing from its typings
type PinoOptionsExt = LoggerOptions<LogChannel> & { levelKey?: string }

const CHANNEL_NAMES = new Set<string>(Object.values(LogChannel))

function isLogChannel(v: unknown): v is LogChannel {
    return typeof v === 'string' && CHANNEL_NAMES.has(v)
}

export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

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
                if (typeof first === 'object' && first !== null && 'channel' in first && isLogChannel(first.channel)) {
                    ch = first.channel
                }

                if (ch) {
                    const meta = CHANNELS[ch]
                    const prefix = `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`

                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${args[1]}`
                    } else if (args.length >= 1 && typeof args[0] === 'string') {
                        args[0] = `${prefix} ${args[0]}`
                    } else {
                        args.push(prefix)
                    }
                }

                Reflect.apply(method, base, args)
            }
        }
    }

    if (PRETTY) {
        // pino-pretty runs as a transport (worker thread) so the main thread only serializes
        options.transport = {
            target: 'pino-pretty',
            options: {
                translateTime: 'SYS:standard',
                colorize: true,
                singleLine: false,
                ignore: 'pid,hostname,service,channel,lvl'
            }
        }
    }

    base = pino<LogChannel>(options)

    const toClient = (ch: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        const { emoji, color } = CHANNELS[ch]
        clientBuf.push({ ts: Date.now(), channel: ch, emoji, color, level, message })
    }

    // info goes out on the channel's own level so pino-pretty can tell channels apart
    const writerFor = (ch: LogChannel, level: ClientLogLevel): LogFn => {
        if (level === 'info' && CHANNEL_AS_LEVEL && typeof base[ch] === 'function') {
            return base[ch].bind(base)
        }
        return base[level].bind(base)
    }

    const emit = (ch: LogChannel, level: ClientLogLevel, msg: string, extra?: Record<string, unknown>): void => {
        writerFor(ch, level)({ ...extra, channel: ch }, msg)
        toClient(ch, level, msg)
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg, extra) => emit(ch, 'debug', msg, extra),
        info: (msg, extra) => emit(ch, 'info', msg, extra),
        warn: (msg, extra) => emit(ch, 'warn', msg, extra),
        error: (msg, extra) => emit(ch, 'error', msg, extra),
        fatal: (msg, extra) => emit(ch, 'fatal', msg, extra),
    })

    return { base, channel }
}
