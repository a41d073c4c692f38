// services/relay/src/config.ts

import path from 'node:path'
import { DEFAULT_SESSION_TIMINGS, type SessionTimings } from './core/session/types.js'
import { parseIntEnv, parseStringEnv } from './utils/env.js'

export interface RelayConfig {
    /** JSON file holding the persisted serial parameters. */
    configFile: string
    timings: SessionTimings
    liveThrottleMs: number
    liveWindowLines: number
    botName: string
    historyLimit: number
    /** Log entries kept for /api/logs and WebSocket clients. */
    clientLogLimit: number
}

function nonNegative(value: string | undefined, fallback: number): number {
    return Math.max(0, parseIntEnv(value, fallback))
}

/**
 * Build relay configuration from environment variables. Unset or malformed
 * values fall back to the defaults.
 */
export function buildRelayConfigFromEnv(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): RelayConfig {
    const d = DEFAULT_SESSION_TIMINGS

    const timings: SessionTimings = {
        settleMs: nonNegative(env.SESSION_SETTLE_MS, d.settleMs),
        pollMs: Math.max(1, parseIntEnv(env.SESSION_POLL_MS, d.pollMs)),
        idlePollThreshold: nonNegative(env.SESSION_IDLE_POLLS, d.idlePollThreshold),
        debounceMs: nonNegative(env.SESSION_DEBOUNCE_MS, d.debounceMs),
        graceMs: nonNegative(env.SESSION_GRACE_MS, d.graceMs),
        periodicMs: Math.max(1, parseIntEnv(env.SESSION_PERIODIC_MS, d.periodicMs)),
        windowLines: Math.max(1, parseIntEnv(env.LIVE_WINDOW_LINES, d.windowLines)),
    }

    // Completion must be able to settle before the liveness check kicks in.
    if (timings.graceMs < timings.debounceMs) timings.graceMs = timings.debounceMs

    return {
        configFile: path.resolve(cwd, parseStringEnv(env.SERIAL_CONFIG_FILE, 'serial_config.json')),
        timings,
        liveThrottleMs: nonNegative(env.LIVE_THROTTLE_MS, 100),
        liveWindowLines: timings.windowLines,
        botName: parseStringEnv(env.RELAY_BOT_NAME, 'serial-relay'),
        historyLimit: Math.max(1, parseIntEnv(env.CHANNEL_HISTORY_LIMIT, 200)),
        clientLogLimit: Math.max(1, parseIntEnv(env.CLIENT_LOGS_TO_KEEP, 500)),
    }
}
