// services/list-api/src/core/list/list.lock.ts

/**
 * Async mutex: callers run strictly one after another, in call order.
 * Each caller waits on the previous caller's release promise.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined
    const done = new Promise<void>((resolve) => {
      release = resolve
    })

    const previous = this.tail
    this.tail = done

    try {
      await previous
      return await fn()
    } finally {
      release()
    }
  }
}
