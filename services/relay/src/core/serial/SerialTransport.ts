// services/relay/src/core/serial/SerialTransport.ts

import { SerialPort } from 'serialport'
import { DeviceIOError, DeviceOpenError, errorMessage } from '../errors.js'
import type { SerialSettings } from './settings.js'

/**
 * Byte-level access to the one serial connection. Every method fails with
 * DeviceIOError once the port is closed.
 */
export interface Transport {
    readonly path: string
    readonly isOpen: boolean
    open(): Promise<void>
    write(data: Buffer): Promise<void>
    /** Wait until written bytes have been handed to the OS. */
    flush(): Promise<void>
    bytesAvailable(): number
    /**
     * Resolve with the next line, terminator included. On timeout, resolve with
     * whatever partial bytes arrived (possibly none).
     */
    readLine(timeoutMs: number): Promise<Buffer>
    resetInputBuffer(): Promise<void>
    resetOutputBuffer(): Promise<void>
    close(): Promise<void>
}

type ErrorCallback = (err: Error | null) => void

/** The subset of SerialPort (and SerialPortMock) the transport drives. */
export interface SerialPortLike {
    readonly isOpen: boolean
    open(callback?: ErrorCallback): void
    write(data: Buffer, callback: (err: Error | null | undefined) => void): boolean
    drain(callback?: ErrorCallback): void
    flush(callback?: ErrorCallback): void
    close(callback?: ErrorCallback): void
    on(event: 'data', listener: (chunk: Buffer) => void): unknown
    on(event: 'error', listener: (err: Error) => void): unknown
    on(event: 'close', listener: () => void): unknown
    removeAllListeners(): unknown
}

export interface SerialPortOpenOptions {
    path: string
    baudRate: number
    dataBits: 5 | 6 | 7 | 8
    parity: 'none' | 'even' | 'odd' | 'mark' | 'space'
    stopBits: 1 | 1.5 | 2
    rtscts: boolean
    xon: boolean
    xoff: boolean
}

export type SerialPortFactory = (opts: SerialPortOpenOptions) => SerialPortLike

const PARITY_NAMES = {
    N: 'none',
    E: 'even',
    O: 'odd',
    M: 'mark',
    S: 'space',
} as const

export function toPortOptions(settings: SerialSettings): SerialPortOpenOptions {
    return {
        path: settings.port,
        baudRate: settings.baudrate,
        dataBits: settings.bytesize,
        parity: PARITY_NAMES[settings.parity],
        stopBits: settings.stopbits,
        // No software or hardware flow control.
        rtscts: false,
        xon: false,
        xoff: false,
    }
}

export const defaultPortFactory: SerialPortFactory = (opts) =>
    new SerialPort({ ...opts, autoOpen: false })

const NEWLINE = 0x0a

export class SerialTransport implements Transport {
    private readonly options: SerialPortOpenOptions
    private readonly createPort: SerialPortFactory

    private port: SerialPortLike | null = null
    private rx: Buffer = Buffer.alloc(0)
    private lastError: Error | null = null
    private waiters = new Set<() => void>()

    constructor(settings: SerialSettings, createPort: SerialPortFactory = defaultPortFactory) {
        this.options = toPortOptions(settings)
        this.createPort = createPort
    }

    get path(): string {
        return this.options.path
    }

    get isOpen(): boolean {
        return this.port !== null && this.port.isOpen
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    async open(): Promise<void> {
        if (this.port) throw new DeviceOpenError(`Port ${this.path} is already open`)

        const port = this.createPort(this.options)

        await new Promise<void>((resolve, reject) => {
            port.open((err) => {
                if (err) reject(new DeviceOpenError(err.message, { cause: err }))
                else resolve()
            })
        })

        port.on('data', (chunk: Buffer) => {
            this.rx = this.rx.length === 0 ? chunk : Buffer.concat([this.rx, chunk])
            this.wake()
        })
        port.on('error', (err: Error) => {
            this.lastError = err
            this.wake()
        })
        port.on('close', () => {
            this.wake()
        })

        this.port = port
        this.rx = Buffer.alloc(0)
        this.lastError = null
    }

    async close(): Promise<void> {
        const port = this.port
        this.port = null
        this.rx = Buffer.alloc(0)

        try {
            if (port && port.isOpen) await this.callback(port, 'close')
        } finally {
            port?.removeAllListeners()
            this.wake()
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  I/O                                                                   */
    /* ---------------------------------------------------------------------- */

    async write(data: Buffer): Promise<void> {
        const port = this.requirePort('write')
        await new Promise<void>((resolve, reject) => {
            port.write(data, (err) => {
                if (err) reject(new DeviceIOError(`write failed: ${err.message}`, { cause: err }))
                else resolve()
            })
        })
    }

    async flush(): Promise<void> {
        const port = this.requirePort('flush')
        await this.callback(port, 'drain')
    }

    bytesAvailable(): number {
        this.requirePort('read')
        return this.rx.length
    }

    async readLine(timeoutMs: number): Promise<Buffer> {
        this.requirePort('read')
        const deadline = Date.now() + timeoutMs

        for (;;) {
            const idx = this.rx.indexOf(NEWLINE)
            if (idx >= 0) return this.take(idx + 1)

            const remaining = deadline - Date.now()
            if (remaining <= 0) return this.take(this.rx.length)

            await this.waitForData(remaining)
            this.requirePort('read')
        }
    }

    async resetInputBuffer(): Promise<void> {
        const port = this.requirePort('reset input buffer')
        this.rx = Buffer.alloc(0)
        await this.callback(port, 'flush')
    }

    async resetOutputBuffer(): Promise<void> {
        const port = this.requirePort('reset output buffer')
        await this.callback(port, 'flush')
    }

    /* ---------------------------------------------------------------------- */
    /*  Helpers                                                               */
    /* ---------------------------------------------------------------------- */

    private requirePort(op: string): SerialPortLike {
        const port = this.port
        if (!port || !port.isOpen) {
            throw new DeviceIOError(`${op} failed: serial port is not open`)
        }
        if (this.lastError) {
            const err = this.lastError
            this.lastError = null
            throw new DeviceIOError(`${op} failed: ${err.message}`, { cause: err })
        }
        return port
    }

    private take(n: number): Buffer {
        const out = this.rx.subarray(0, n)
        this.rx = this.rx.subarray(n)
        return Buffer.from(out)
    }

    private waitForData(timeoutMs: number): Promise<void> {
        return new Promise<void>((resolve) => {
            const done = () => {
                clearTimeout(timer)
                this.waiters.delete(done)
                resolve()
            }
            const timer = setTimeout(done, timeoutMs)
            this.waiters.add(done)
        })
    }

    private wake(): void {
        for (const w of Array.from(this.waiters)) w()
    }

    private callback(port: SerialPortLike, op: 'drain' | 'flush' | 'close'): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            port[op]((err) => {
                if (err) reject(new DeviceIOError(`${op} failed: ${errorMessage(err)}`, { cause: err }))
                else resolve()
            })
        })
    }
}
