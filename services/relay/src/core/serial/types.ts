// services/relay/src/core/serial/types.ts

import type { SerialSettings, SettingName } from './settings.js'

export interface ConnectionEventSink {
    publish(evt: ConnectionEvent): void
}

/**
 * Events emitted by the ConnectionService.
 */
export type ConnectionEvent =
    | {
        kind: 'serial-settings-loaded'
        at: number
        rejected: SettingName[]
    }
    | {
        kind: 'serial-connected'
        at: number
        path: string
        baudRate: number
    }
    | {
        kind: 'serial-open-failed'
        at: number
        path: string
        error: string
        closeError?: string
    }
    | {
        kind: 'serial-stale-released'
        at: number
        path: string
        error?: string
    }
    | {
        kind: 'serial-disconnected'
        at: number
        path: string
        reason: 'explicit-close' | 'shutdown'
    }
    | {
        kind: 'serial-buffers-flushed'
        at: number
        path: string
    }
    | {
        kind: 'serial-setting-changed'
        at: number
        name: SettingName
        value: SerialSettings[SettingName]
    }

export interface ConnectionStatus {
    connected: boolean
    port: string
    baudrate: number
}
