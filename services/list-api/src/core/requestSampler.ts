// services/list-api/src/core/requestSampler.ts

/**
 * Picks every Nth request for logging and times the picked ones.
 * Every begin() that returns true is matched by end() or drop().
 */
export class RequestSampler {
  private readonly every: number
  private readonly now: () => number
  private readonly started = new Map<string, number>()
  private seen = 0

  constructor(opts: { every: number; now?: () => number }) {
    this.every = Math.max(1, Math.floor(opts.every))
    this.now = opts.now ?? Date.now
  }

  begin(id: string): boolean {
    this.seen++
    if (this.seen % this.every !== 0) return false
    this.started.set(id, this.now())
    return true
  }

  /** Elapsed ms for a sampled request, null when it was not sampled. */
  end(id: string): number | null {
    const start = this.started.get(id)
    if (start === undefined) return null
    this.started.delete(id)
    return this.now() - start
  }

  /** Forget a request that will never complete (client abort). */
  drop(id: string): boolean {
    return this.started.delete(id)
  }
}
