// packages/logging/src/buffer.ts

import type {
    ClientLog,
    ClientLogBuffer,
    ClientLogFilter,
    ClientLogLevel,
    ClientLogListener,
} from './types.js'

const LEVEL_RANK: Record<ClientLogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    fatal: 4,
}

export interface ClientBufferOptions {
    /** Entries kept for clients that connect later. */
    limit: number
}

function matches(log: ClientLog, filter: ClientLogFilter): boolean {
    if (filter.channel !== undefined && log.channel !== filter.channel) return false
    if (filter.minLevel !== undefined && LEVEL_RANK[log.level] < LEVEL_RANK[filter.minLevel]) return false
    return true
}

/**
 * Fixed-size ring of recent log entries with live fan-out. Readers get the
 * newest entries in arrival order, optionally narrowed by channel or level.
 */
export function makeClientBuffer(opts: ClientBufferOptions): ClientLogBuffer {
    const capacity = Math.max(1, Math.floor(opts.limit))
    const ring: Array<ClientLog | undefined> = new Array(capacity)
    let head = 0
    let size = 0
    const listeners = new Set<ClientLogListener>()

    const push = (log: ClientLog): void => {
        ring[(head + size) % capacity] = log
        if (size < capacity) size += 1
        else head = (head + 1) % capacity

        for (const l of Array.from(listeners)) l(log)
    }

    const getLatest = (n: number, filter: ClientLogFilter = {}): ClientLog[] => {
        const out: ClientLog[] = []
        for (let i = size - 1; i >= 0 && out.length < n; i--) {
            const log = ring[(head + i) % capacity]
            if (log && matches(log, filter)) out.push(log)
        }
        return out.reverse()
    }

    const subscribe = (listener: ClientLogListener): () => void => {
        listeners.add(listener)
        return () => { listeners.delete(listener) }
    }

    return { capacity, push, getLatest, subscribe }
}

export function isClientLogLevel(value: string): value is ClientLogLevel {
    return Object.hasOwn(LEVEL_RANK, value)
}
