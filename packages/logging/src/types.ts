// packages/logging/src/types.ts
import type { Logger } from 'pino'

/** Subsystems that log. Each one is also registered as a pino custom level. */
export enum LogChannel {
    server = 'server',
    app = 'app',
    request = 'request',
    list = 'list',
    sessions = 'sessions',
    google_sheets = 'google-sheets',
}

export type ChannelColor = 'blue' | 'purple' | 'green' | 'cyan' | 'yellow'

export type ChannelMeta = { emoji: string; color: ChannelColor }

export type ClientLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** One entry of the client log buffer. */
export type ClientLog = ChannelMeta & {
    ts: number
    channel: LogChannel
    level: ClientLogLevel
    message: string
}

export interface ClientLogBuffer {
    push(log: ClientLog): void
    /** The newest `n` entries, oldest first. */
    getLatest(n: number): ClientLog[]
}

export type ChannelLogFn = (msg: string, extra?: Record<string, unknown>) => void

export type ChannelLogger = Record<ClientLogLevel, ChannelLogFn>

export interface LoggerBundle {
    base: Logger<LogChannel>
    channel(ch: LogChannel): ChannelLogger
}
