// services/list-api/src/routes/list.ts
import type { FastifyPluginAsync, FastifyRequest } from 'fastify'

import { DEFAULT_FILTER } from '../core/list/list.filter.js'
import { ValidationError } from '../core/list/list.errors.js'
import { isUrgency, type RowInput } from '../core/list/list.rows.js'
import { CSV_FILE_NAME } from '../core/list/list.csv.js'
import { URGENCIES, type ListFilter, type Urgency } from '../core/list/list.types.js'
import type { AddItemInput, ListController } from '../core/list/list.controller.js'
import { parseSessionId } from '../core/sessions/list-sessions.js'

export const SESSION_HEADER = 'x-list-session'

interface ViewQuery {
    urgency?: string | string[]
    showCompleted?: string
    q?: string
}

/* -------------------------
   Minimal validation helpers
--------------------------*/
function isObject(x: unknown): x is Record<string, unknown> {
    return x !== null && typeof x === 'object' && !Array.isArray(x)
}

function optionalText(v: unknown, field: string): string | undefined {
    if (v === undefined || v === null) return undefined
    if (typeof v === 'string') return v
    if (typeof v === 'number' && Number.isFinite(v)) return String(v)
    throw new ValidationError(`${field} must be a string`)
}

function optionalUrgency(v: unknown): Urgency | undefined {
    if (v === undefined || v === null || v === '') return undefined
    if (isUrgency(v)) return v
    throw new ValidationError(`urgency must be one of ${URGENCIES.join(', ')}`)
}

function optionalBool(v: unknown, field: string): boolean | undefined {
    if (v === undefined || v === null) return undefined
    if (typeof v === 'boolean') return v
    throw new ValidationError(`${field} must be a boolean`)
}

export function parseAddItemBody(body: unknown): AddItemInput {
    if (!isObject(body)) throw new ValidationError('request body must be a JSON object')
    return {
        itemNeeded: optionalText(body.itemNeeded, 'itemNeeded') ?? '',
        quantity: optionalText(body.quantity, 'quantity'),
        whereToGet: optionalText(body.whereToGet, 'whereToGet'),
        urgency: optionalUrgency(body.urgency),
    }
}

/**
 * Urgency selection from a query value.
 * Absent -> all values; present -> comma-separated, unknown names ignored, blank -> none.
 */
export function parseUrgencyParam(raw: string | string[] | undefined): Urgency[] {
    if (raw === undefined) return [...URGENCIES]
    const parts = (Array.isArray(raw) ? raw : [raw]).flatMap((s) => s.split(','))
    const picked = parts.map((s) => s.trim()).filter(isUrgency)
    return Array.from(new Set(picked))
}

function parseShowCompletedParam(raw: string | undefined): boolean {
    if (raw === undefined) return true
    const v = raw.trim().toLowerCase()
    return !(v === 'false' || v === '0' || v === 'no')
}

export function parseViewQuery(q: ViewQuery): ListFilter {
    return {
        urgencies: parseUrgencyParam(q.urgency),
        showCompleted: parseShowCompletedParam(q.showCompleted),
        searchText: q.q ?? '',
    }
}

export function parseFilterBody(v: unknown): ListFilter {
    if (v === undefined || v === null) return { ...DEFAULT_FILTER, urgencies: [...DEFAULT_FILTER.urgencies] }
    if (!isObject(v)) throw new ValidationError('filter must be an object')

    let urgencies: Urgency[] = [...URGENCIES]
    if (v.urgencies !== undefined) {
        if (!Array.isArray(v.urgencies)) throw new ValidationError('filter.urgencies must be an array')
        urgencies = Array.from(new Set(v.urgencies.filter(isUrgency)))
    }

    return {
        urgencies,
        showCompleted: optionalBool(v.showCompleted, 'filter.showCompleted') ?? true,
        searchText: optionalText(v.searchText, 'filter.searchText') ?? '',
    }
}

/**
 * Edited rows as sent by an editable grid. Fields left out are filled by
 * normalizeRow() when written, which overwrites them in the list.
 */
export function parseEditedRows(v: unknown): RowInput[] {
    if (!Array.isArray(v)) throw new ValidationError('rows must be an array')
    return v.map((r: unknown, i) => {
        if (!isObject(r)) throw new ValidationError(`rows[${i}] must be an object`)
        const row: RowInput = {}
        const dateAdded = optionalText(r.dateAdded, `rows[${i}].dateAdded`)
        const itemNeeded = optionalText(r.itemNeeded, `rows[${i}].itemNeeded`)
        const quantity = optionalText(r.quantity, `rows[${i}].quantity`)
        const whereToGet = optionalText(r.whereToGet, `rows[${i}].whereToGet`)
        const urgency = optionalUrgency(r.urgency)
        const completed = optionalBool(r.completed, `rows[${i}].completed`)
        if (dateAdded !== undefined) row.dateAdded = dateAdded
        if (itemNeeded !== undefined) row.itemNeeded = itemNeeded
        if (quantity !== undefined) row.quantity = quantity
        if (whereToGet !== undefined) row.whereToGet = whereToGet
        if (urgency !== undefined) row.urgency = urgency
        if (completed !== undefined) row.completed = completed
        return row
    })
}

/**
 * List routes. Every handler opens the caller's session first, which loads
 * the list on the session's first request.
 */
const listRoutes: FastifyPluginAsync = async (app) => {
    const open = async (req: FastifyRequest): Promise<ListController> => {
        const sessionId = parseSessionId(req.headers[SESSION_HEADER])
        return await app.listSessions.open(sessionId)
    }

    app.get('/api/list', async (req) => {
        const list = await open(req)
        return { ok: true, rows: list.getTable(), status: list.status() }
    })

    app.post('/api/list/new', async (req) => {
        const list = await open(req)
        await list.createNewList()
        return { ok: true, rows: list.getTable(), status: list.status() }
    })

    app.post('/api/list/items', async (req, reply) => {
        const input = parseAddItemBody(req.body)
        const list = await open(req)
        const row = await list.addItem(input)
        reply.code(201)
        return { ok: true, row, status: list.status() }
    })

    app.get<{ Querystring: ViewQuery }>('/api/list/view', async (req) => {
        const filter = parseViewQuery(req.query)
        const list = await open(req)
        return { ok: true, view: list.computeFilteredView(filter) }
    })

    // Body: { filter, rows }. The view is recomputed from `filter` against the
    // current list, then rows are written back by position.
    app.put('/api/list/view', async (req) => {
        const body: unknown = req.body
        if (!isObject(body)) throw new ValidationError('request body must be a JSON object')
        const filter = parseFilterBody(body.filter)
        const rows = parseEditedRows(body.rows)

        const list = await open(req)
        const view = list.computeFilteredView(filter)
        await list.applyEdits(view, rows)
        return { ok: true, view: list.computeFilteredView(filter), status: list.status() }
    })

    app.post('/api/list/sync', async (req) => {
        const list = await open(req)
        const status = await list.sync()
        return { ok: true, status }
    })

    app.get('/api/list/export.csv', async (req, reply) => {
        const list = await open(req)
        const csv = list.exportCsv()
        if (csv === null) {
            reply.code(204)
            return reply.send()
        }
        reply
            .header('content-type', 'text/csv; charset=utf-8')
            .header('content-disposition', `attachment; filename="${CSV_FILE_NAME}"`)
        return csv
    })

    app.delete('/api/list/session', async (req) => {
        const sessionId = parseSessionId(req.headers[SESSION_HEADER])
        return { ok: true, ended: app.listSessions.end(sessionId) }
    })
}

export default listRoutes
