// services/relay/src/core/session/clock.ts

/** Time source for the read loop and sink throttling. */
export interface Clock {
    now(): number
    sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
}

/**
 * Virtual clock: sleep() advances time by `ms` and resolves on the next
 * microtask, so timeout and debounce paths run without real delays.
 */
export class ManualClock implements Clock {
    private t: number

    constructor(start = 0) {
        this.t = start
    }

    now(): number {
        return this.t
    }

    async sleep(ms: number): Promise<void> {
        this.t += Math.max(0, ms)
    }

    advance(ms: number): void {
        this.t += ms
    }
}
