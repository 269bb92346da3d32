import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { createLogger, makeClientBuffer, LogChannel, type ChannelLogger } from '@grocery-sheets/logging'

import { APP_NAME, buildApp } from './app.js'
import { readServerConfigFromEnv } from './core/serverConfig.js'

/** .env, then .env.{NODE_ENV}, then .env.local; later files win. */
function loadEnvFiles(cwd: string, nodeEnv: string): string[] {
    const loaded: string[] = []
    for (const name of ['.env', `.env.${nodeEnv}`, '.env.local']) {
        const file = path.resolve(cwd, name)
        if (!fs.existsSync(file)) continue
        dotenvConfig({ path: file, override: true })
        loaded.push(name)
    }
    return loaded
}

function errText(err: unknown): string {
    return JSON.stringify(err instanceof Error ? err.message : String(err))
}

function closeOnSignals(app: FastifyInstance, log: ChannelLogger): void {
    let closing = false
    const onSignal = (signal: NodeJS.Signals): void => {
        if (closing) return
        closing = true
        log.info(`kind=shutdown signal=${signal}`)
        app.close().then(
            () => {
                log.info('kind=shutdown-complete')
                process.exit(0)
            },
            (err: unknown) => {
                log.error(`kind=shutdown-failed err=${errText(err)}`)
                process.exit(1)
            }
        )
    }
    process.once('SIGINT', onSignal)
    process.once('SIGTERM', onSignal)
}

async function main(): Promise<void> {
    const nodeEnv = process.env.NODE_ENV ?? 'development'
    const envFiles = loadEnvFiles(process.cwd(), nodeEnv)

    // one logger (and one pino-pretty transport) for the whole process
    const clientBuf = makeClientBuffer()
    const logger = createLogger(APP_NAME, clientBuf)
    const log = logger.channel(LogChannel.server)
    const cfg = readServerConfigFromEnv()

    const app = buildApp({ clientBuf, logger })
    try {
        await app.listen({ host: cfg.host, port: cfg.port })
    } catch (err) {
        log.fatal(`kind=listen-failed host=${cfg.host} port=${cfg.port} err=${errText(err)}`)
        await app.close().catch((closeErr: unknown) => {
            log.warn(`kind=close-after-failed-listen err=${errText(closeErr)}`)
        })
        process.exit(1)
    }

    log.info(`kind=listening host=${cfg.host} port=${cfg.port} env=${nodeEnv} envFiles=${envFiles.join(',') || 'none'}`)
    closeOnSignals(app, log)
}

void main()
