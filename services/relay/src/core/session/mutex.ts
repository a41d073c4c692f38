// services/relay/src/core/session/mutex.ts

/**
 * FIFO mutex. Waiters are served strictly in the order they called acquire();
 * release hands ownership straight to the next waiter.
 */
export class Mutex {
    private locked = false
    private readonly waiters: Array<(release: () => void) => void> = []

    get isLocked(): boolean {
        return this.locked
    }

    /** Callers currently waiting behind the holder. */
    get queued(): number {
        return this.waiters.length
    }

    async acquire(): Promise<() => void> {
        if (!this.locked) {
            this.locked = true
            return this.releaser()
        }

        return await new Promise<() => void>((resolve) => {
            this.waiters.push(resolve)
        })
    }

    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire()
        try {
            return await fn()
        } finally {
            release()
        }
    }

    private releaser(): () => void {
        let released = false
        return () => {
            if (released) return
            released = true
            this.release()
        }
    }

    private release(): void {
        const next = this.waiters.shift()
        if (next) {
            // still locked, transfer ownership
            next(this.releaser())
            return
        }
        this.locked = false
    }
}
