// services/relay/src/core/serial/ConnectionService.ts

import {
    AlreadyConnectedError,
    DeviceOpenError,
    InvalidValueError,
    NotConnectedError,
    errorMessage,
} from '../errors.js'
import {
    applySetting,
    isDecodeErrorPolicy,
    isSupportedEncoding,
    isSettingName,
    type SerialSettings,
} from './settings.js'
import type { SettingsStore } from './settings-store.js'
import { SerialTransport, type Transport } from './SerialTransport.js'
import type { ConnectionEventSink, ConnectionStatus } from './types.js'

export type TransportFactory = (settings: SerialSettings) => Transport

interface ConnectionServiceDeps {
    store: SettingsStore
    events: ConnectionEventSink
    createTransport?: TransportFactory
}

/**
 * ConnectionService
 *
 * Owns the single Transport and the persisted serial settings. The session
 * manager only ever borrows the transport through getTransport().
 *
 * Settings changes apply to the next connect(); an open port keeps the
 * parameters it was opened with.
 */
export class ConnectionService {
    private readonly store: SettingsStore
    private readonly events: ConnectionEventSink
    private readonly createTransport: TransportFactory

    private settings: SerialSettings
    private transport: Transport | null = null
    private connecting = false

    constructor(deps: ConnectionServiceDeps) {
        this.store = deps.store
        this.events = deps.events
        this.createTransport = deps.createTransport ?? ((settings) => new SerialTransport(settings))

        const { settings, rejected } = this.store.load()
        this.settings = settings
        this.events.publish({ kind: 'serial-settings-loaded', at: Date.now(), rejected })
    }

    /* ---------------------------------------------------------------------- */
    /*  Queries                                                               */
    /* ---------------------------------------------------------------------- */

    getSettings(): SerialSettings {
        return { ...this.settings }
    }

    /** The open transport, or null when disconnected (or the port dropped). */
    getTransport(): Transport | null {
        const t = this.transport
        return t && t.isOpen ? t : null
    }

    isConnected(): boolean {
        return this.getTransport() !== null
    }

    status(): ConnectionStatus {
        const t = this.getTransport()
        return {
            connected: t !== null,
            port: t?.path ?? this.settings.port,
            baudrate: this.settings.baudrate,
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    /**
     * Open a fresh transport with the current settings. A second call while
     * one is still opening fails with AlreadyConnectedError.
     */
    async connect(): Promise<ConnectionStatus> {
        if (this.connecting || this.isConnected()) throw new AlreadyConnectedError()

        this.connecting = true
        try {
            return await this.open()
        } finally {
            this.connecting = false
        }
    }

    private async open(): Promise<ConnectionStatus> {
        // A port that dropped on its own still holds its listeners.
        const stale = this.transport
        this.transport = null
        if (stale) await this.releaseStale(stale)

        const settings = this.getSettings()
        const transport = this.createTransport(settings)

        try {
            await transport.open()
            await transport.resetInputBuffer()
            await transport.resetOutputBuffer()
        } catch (err) {
            const closeError = await transport.close().then(
                () => undefined,
                (closeErr: unknown) => errorMessage(closeErr),
            )
            this.events.publish({
                kind: 'serial-open-failed',
                at: Date.now(),
                path: settings.port,
                error: errorMessage(err),
                closeError,
            })
            if (err instanceof DeviceOpenError) throw err
            throw new DeviceOpenError(errorMessage(err), { cause: err })
        }

        this.transport = transport
        this.events.publish({
            kind: 'serial-connected',
            at: Date.now(),
            path: settings.port,
            baudRate: settings.baudrate,
        })
        return this.status()
    }

    private async releaseStale(stale: Transport): Promise<void> {
        const error = await stale.close().then(
            () => undefined,
            (closeErr: unknown) => errorMessage(closeErr),
        )
        this.events.publish({ kind: 'serial-stale-released', at: Date.now(), path: stale.path, error })
    }

    /**
     * Close the port. A session that is mid-read fails on its next transport
     * call and reports the error to its channel.
     */
    async disconnect(reason: 'explicit-close' | 'shutdown' = 'explicit-close'): Promise<void> {
        const transport = this.transport
        this.transport = null

        if (!transport || !transport.isOpen) {
            if (transport) await this.releaseStale(transport)
            throw new NotConnectedError('Not connected to any serial device')
        }

        await transport.close()
        this.events.publish({
            kind: 'serial-disconnected',
            at: Date.now(),
            path: transport.path,
            reason,
        })
    }

    async flush(): Promise<void> {
        const transport = this.getTransport()
        if (!transport) throw new NotConnectedError()

        await transport.resetInputBuffer()
        await transport.resetOutputBuffer()
        this.events.publish({ kind: 'serial-buffers-flushed', at: Date.now(), path: transport.path })
    }

    /* ---------------------------------------------------------------------- */
    /*  Settings                                                              */
    /* ---------------------------------------------------------------------- */

    /**
     * Coerce and persist one parameter. Throws UnknownParameterError or
     * InvalidValueError without touching the stored settings.
     */
    setParameter(name: string, value: string): SerialSettings {
        const next = applySetting(this.settings, name, value)
        this.commit(next)
        if (isSettingName(name)) {
            this.events.publish({ kind: 'serial-setting-changed', at: Date.now(), name, value: next[name] })
        }
        return this.getSettings()
    }

    setEncoding(encoding = 'utf-8', errors = 'replace'): SerialSettings {
        const enc = encoding.trim()
        const policy = errors.trim().toLowerCase()
        if (!isSupportedEncoding(enc)) {
            throw new InvalidValueError('encoding', `Invalid encoding: ${encoding}`)
        }
        if (!isDecodeErrorPolicy(policy)) {
            throw new InvalidValueError('encoding_errors', `Invalid error handling: ${errors}`)
        }

        this.commit({ ...this.settings, encoding: enc, encoding_errors: policy })
        this.events.publish({ kind: 'serial-setting-changed', at: Date.now(), name: 'encoding', value: enc })
        this.events.publish({ kind: 'serial-setting-changed', at: Date.now(), name: 'encoding_errors', value: policy })
        return this.getSettings()
    }

    private commit(next: SerialSettings): void {
        this.store.save(next)
        this.settings = next
    }
}
