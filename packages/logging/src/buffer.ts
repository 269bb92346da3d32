import type { ClientLog, ClientLogBuffer } from './types.js'

const DEFAULT_CAPACITY = 500

function capacityFrom(limit: number): number {
    return Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : DEFAULT_CAPACITY
}

/**
 * Fixed-size ring of the newest client log entries, served by GET /api/logs.
 * Capacity defaults to CLIENT_LOGS_TO_KEEP.
 */
export function makeClientBuffer(limit: number = Number(process.env.CLIENT_LOGS_TO_KEEP ?? DEFAULT_CAPACITY)): ClientLogBuffer {
    const capacity = capacityFrom(limit)
    const ring: Array<ClientLog | undefined> = new Array(capacity)
    let next = 0
    let count = 0

    return {
        push(log) {
            ring[next] = log
            next = (next + 1) % capacity
            count = Math.min(count + 1, capacity)
        },

        // oldest first
        getLatest(n) {
            const take = Math.min(Math.max(0, Math.floor(n)), count)
            const out: ClientLog[] = []
            for (let i = take; i > 0; i--) {
                const entry = ring[(next - i + capacity) % capacity]
                if (entry) out.push(entry)
            }
            return out
        },
    }
}
