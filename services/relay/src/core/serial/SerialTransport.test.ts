import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { SerialPortMock } from 'serialport'
import { SerialTransport, toPortOptions, type SerialPortFactory } from './SerialTransport.js'
import { DEFAULT_SETTINGS, type SerialSettings } from './settings.js'
import { DeviceIOError, DeviceOpenError } from '../errors.js'

const PATH = '/dev/ttyMOCK0'

describe('toPortOptions', () => {
    it('maps persisted settings onto serialport options without flow control', () => {
        const settings: SerialSettings = { ...DEFAULT_SETTINGS, port: '/dev/ttyS3', baudrate: 115200, parity: 'E', stopbits: 2 }
        expect(toPortOptions(settings)).toEqual({
            path: '/dev/ttyS3',
            baudRate: 115200,
            dataBits: 8,
            parity: 'even',
            stopBits: 2,
            rtscts: false,
            xon: false,
            xoff: false,
        })
    })
})

describe('SerialTransport', () => {
    let mock: SerialPortMock | null = null
    let transport: SerialTransport

    const factory: SerialPortFactory = (opts) => {
        mock = new SerialPortMock({ path: opts.path, baudRate: opts.baudRate, autoOpen: false })
        return mock
    }

    const emit = (data: string | Buffer) => {
        mock?.port?.emitData(typeof data === 'string' ? Buffer.from(data) : data)
    }

    beforeEach(() => {
        SerialPortMock.binding.reset()
        SerialPortMock.binding.createPort(PATH, { echo: false, record: true })
        transport = new SerialTransport({ ...DEFAULT_SETTINGS, port: PATH }, factory)
    })

    afterEach(async () => {
        await transport.close()
        mock = null
    })

    it('opens the configured path', async () => {
        await transport.open()
        expect(transport.isOpen).toBe(true)
        expect(transport.path).toBe(PATH)
    })

    it('wraps open failures in DeviceOpenError', async () => {
        const missing = new SerialTransport({ ...DEFAULT_SETTINGS, port: '/dev/ttyMISSING' }, factory)
        await expect(missing.open()).rejects.toBeInstanceOf(DeviceOpenError)
        expect(missing.isOpen).toBe(false)
    })

    it('writes bytes to the port', async () => {
        await transport.open()
        await transport.write(Buffer.from('AT+GMR\r\n'))
        await transport.flush()

        expect(mock?.port?.recording.toString()).toBe('AT+GMR\r\n')
    })

    it('returns one line per readLine call, terminator included', async () => {
        await transport.open()
        emit('OK\r\nready\r\n')

        expect((await transport.readLine(1000)).toString()).toBe('OK\r\n')
        expect((await transport.readLine(1000)).toString()).toBe('ready\r\n')
    })

    it('returns partial bytes when no terminator arrives before the timeout', async () => {
        await transport.open()
        emit('>')

        const line = await transport.readLine(100)
        expect(line.toString()).toBe('>')
        expect(transport.bytesAvailable()).toBe(0)
    })

    it('reports buffered bytes and drops them on input reset', async () => {
        await transport.open()
        emit('+CWLAP:1\r\n')

        await vi.waitFor(() => expect(transport.bytesAvailable()).toBe(10))

        await transport.resetInputBuffer()
        expect(transport.bytesAvailable()).toBe(0)
    })

    it('fails every operation with DeviceIOError once closed', async () => {
        await transport.open()
        await transport.close()

        expect(() => transport.bytesAvailable()).toThrow(DeviceIOError)
        await expect(transport.write(Buffer.from('AT\r\n'))).rejects.toBeInstanceOf(DeviceIOError)
        await expect(transport.readLine(10)).rejects.toThrow('serial port is not open')
    })
})
