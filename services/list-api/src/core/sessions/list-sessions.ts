// services/list-api/src/core/sessions/list-sessions.ts
import { TtlCache } from '../cache/ttl.cache.js'
import { ListController } from '../list/list.controller.js'
import { ValidationError } from '../list/list.errors.js'
import { noopLogger, type ListStore, type LoggerLike } from '../list/list.types.js'

export const DEFAULT_SESSION_ID = 'default'

const SESSION_ID = /^[A-Za-z0-9_-]{1,64}$/

/**
 * Accepts a header value; absent or blank means the default session.
 */
export function parseSessionId(raw: unknown): string {
  if (raw === undefined || raw === null) return DEFAULT_SESSION_ID
  const v = String(raw).trim()
  if (!v) return DEFAULT_SESSION_ID
  if (!SESSION_ID.test(v)) {
    throw new ValidationError('session id must be 1-64 characters of [A-Za-z0-9_-]')
  }
  return v
}

/**
 * ListSessions
 *
 * One ListController per session id, created on first use and dropped after
 * idleTtlMs without access (or when maxEntries is exceeded, oldest first).
 * All controllers share one store, so its load cache covers a burst of new sessions.
 */
export class ListSessions {
  private readonly store: ListStore
  private readonly idleTtlMs: number
  private readonly log: LoggerLike
  private readonly controllerLog: LoggerLike
  private readonly now: () => number
  private readonly clock: () => Date
  private readonly sessions: TtlCache<ListController>

  constructor(opts: {
    store: ListStore
    idleTtlMs: number
    maxEntries: number
    logger?: LoggerLike
    controllerLogger?: LoggerLike
    now?: () => number
  }) {
    this.store = opts.store
    this.idleTtlMs = opts.idleTtlMs
    this.log = opts.logger ?? noopLogger
    this.controllerLog = opts.controllerLogger ?? this.log
    this.now = opts.now ?? Date.now
    this.clock = () => new Date(this.now())
    this.sessions = new TtlCache<ListController>({
      maxEntries: opts.maxEntries,
      onEvict: (id) => this.log.info(`kind=session-evicted session=${id}`),
    })
  }

  getStore(): ListStore {
    return this.store
  }

  /** Controller for `sessionId`, refreshing its idle TTL. */
  get(sessionId: string): ListController {
    const now = this.now()
    let controller = this.sessions.get(sessionId, now)

    if (!controller) {
      controller = new ListController({
        store: this.store,
        logger: this.controllerLog,
        now: this.clock,
        sessionId,
      })
      this.log.info(`kind=session-created session=${sessionId}`)
    }

    this.sessions.set(sessionId, controller, this.idleTtlMs, now)
    return controller
  }

  /** Ready controller for `sessionId`; the first call loads the list. */
  async open(sessionId: string): Promise<ListController> {
    const controller = this.get(sessionId)
    await controller.initialize()
    return controller
  }

  end(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId)
    if (removed) this.log.info(`kind=session-ended session=${sessionId}`)
    return removed
  }

  prune(): number {
    return this.sessions.prune(this.now())
  }

  size(): number {
    return this.sessions.size()
  }
}
