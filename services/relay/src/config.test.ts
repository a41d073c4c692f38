import { describe, it, expect } from 'vitest'
import { buildRelayConfigFromEnv } from './config.js'

describe('buildRelayConfigFromEnv', () => {
    it('uses defaults for an empty environment', () => {
        const cfg = buildRelayConfigFromEnv({}, '/srv/relay')

        expect(cfg).toEqual({
            configFile: '/srv/relay/serial_config.json',
            timings: {
                settleMs: 500,
                pollMs: 100,
                idlePollThreshold: 20,
                debounceMs: 2000,
                graceMs: 5000,
                periodicMs: 5000,
                windowLines: 20,
            },
            liveThrottleMs: 100,
            liveWindowLines: 20,
            botName: 'serial-relay',
            historyLimit: 200,
            clientLogLimit: 500,
        })
    })

    it('reads overrides and ignores malformed values', () => {
        const cfg = buildRelayConfigFromEnv(
            {
                SERIAL_CONFIG_FILE: 'conf/bench.json',
                SESSION_SETTLE_MS: '250',
                SESSION_POLL_MS: 'often',
                LIVE_THROTTLE_MS: '-5',
                LIVE_WINDOW_LINES: '10',
                CLIENT_LOGS_TO_KEEP: '50',
            },
            '/srv/relay',
        )

        expect(cfg.configFile).toBe('/srv/relay/conf/bench.json')
        expect(cfg.timings.settleMs).toBe(250)
        expect(cfg.timings.pollMs).toBe(100)
        expect(cfg.liveThrottleMs).toBe(0)
        expect(cfg.liveWindowLines).toBe(10)
        expect(cfg.clientLogLimit).toBe(50)
    })

    it('keeps the grace period at least as long as the debounce', () => {
        const cfg = buildRelayConfigFromEnv({ SESSION_DEBOUNCE_MS: '3000', SESSION_GRACE_MS: '1000' })

        expect(cfg.timings.graceMs).toBe(3000)
    })
})
