import Fastify, {
    type FastifyError,
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer,
    type LoggerBundle
} from '@grocery-sheets/logging'

import groceryListPlugin, { type GroceryListPluginOptions } from './plugins/groceryList.js'
import listRoutes from './routes/list.js'
import { ListError, toErrorShape, type ListErrorCode } from './core/list/list.errors.js'
import { readServerConfigFromEnv } from './core/serverConfig.js'
import { RequestSampler } from './core/requestSampler.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
    }
}

interface LogsQuery {
    n?: string
}

export type BuildAppOptions = Omit<GroceryListPluginOptions, 'logger'> & {
    fastify?: FastifyServerOptions
    clientBuf?: ClientLogBuffer
    /** One logger for the whole app; built over `clientBuf` when absent. */
    logger?: LoggerBundle
}

const STATUS_BY_CODE: Record<ListErrorCode, number> = {
    validation: 400,
    precondition: 409,
    persistence: 502,
}

export const APP_NAME = 'grocery-sheets-list-api'
export const APP_VERSION = '0.1.0'

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const env = opts.env ?? process.env
    const serverCfg = readServerConfigFromEnv(env)
    const clientBuf = opts.clientBuf ?? makeClientBuffer()

    const logger = opts.logger ?? createLogger(APP_NAME, clientBuf)
    const { channel } = logger
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const sampler = new RequestSampler({ every: serverCfg.request.sample })

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    void app.register(cors, { origin: true })

    void app.register(groceryListPlugin, {
        env,
        logger,
        store: opts.store,
        sheetsClient: opts.sheetsClient,
        now: opts.now
    })
    void app.register(listRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        if (!sampler.begin(req.id)) return
        logReq.info(`${req.method} ${req.url}`)

        if (serverCfg.request.verbose) {
            const detail: Record<string, unknown> = { id: req.id, ip: req.ip }
            if (serverCfg.request.logHeaders) {
                const { host, 'user-agent': ua, accept, referer } = req.headers
                detail.headers = { host, 'user-agent': ua, accept, referer }
            }
            logReq.debug('request detail', detail)
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const ms = sampler.end(req.id)
        if (ms === null) return
        logReq.info(`${req.method} ${req.url} → ${reply.statusCode} (${ms} ms)`)
    })

    // aborted requests never reach onResponse
    app.addHook('onRequestAbort', async (req: FastifyRequest) => {
        if (sampler.drop(req.id)) logReq.warn(`kind=request-aborted ${req.method} ${req.url}`)
    })
    // ---------------------------------------------------

    app.setErrorHandler((err: FastifyError, req, reply) => {
        if (err instanceof ListError) {
            const status = STATUS_BY_CODE[err.code]
            const line = `kind=request-failed code=${err.code} ${req.method} ${req.url} err=${JSON.stringify(err.message)}`
            if (err.code === 'validation') logReq.warn(line)
            else logReq.error(line)
            void reply.code(status).send({ ok: false, error: toErrorShape(err) })
            return
        }

        // Fastify's own 4xx (bad JSON, unsupported media type, ...)
        const status = typeof err.statusCode === 'number' ? err.statusCode : 500
        if (status < 500) {
            logReq.warn(`kind=request-rejected status=${status} ${req.method} ${req.url} err=${JSON.stringify(err.message)}`)
            void reply.code(status).send({ ok: false, error: { code: 'validation', message: err.message } })
            return
        }

        logReq.error(`kind=request-error ${req.method} ${req.url} err=${JSON.stringify(err.message)}`)
        void reply.code(500).send({ ok: false, error: toErrorShape(err) })
    })

    // Latest client log entries (newest last)
    app.get<{ Querystring: LogsQuery }>('/api/logs', async (req) => {
        const n = Number(req.query.n ?? '100')
        const count = Number.isFinite(n) ? Math.max(0, Math.min(1_000, Math.floor(n))) : 100
        return { ok: true, logs: clientBuf.getLatest(count) }
    })

    // Health / ready
    app.get('/health', async () => ({ status: 'ok' }))

    app.get('/ready', async () => {
        const cfg = app.sheetsConfig
        return {
            ready: true,
            store: app.listSessions.getStore().kind,
            sessions: app.listSessions.size(),
            sheets: {
                enabled: cfg.enabled,
                dryRun: cfg.dryRun,
                tab: cfg.tab,
                spreadsheetIdPresent: Boolean(cfg.spreadsheetId)
            }
        }
    })

    app.get('/version', async () => ({ name: APP_NAME, version: APP_VERSION }))

    app.setNotFoundHandler((_req, reply) => {
        void reply.status(404).send({ ok: false, error: { code: 'not_found', message: 'Not found' } })
    })

    logApp.info('kind=app-built')
    return app
}
