// services/relay/src/core/serial/settings.ts

import { InvalidValueError, UnknownParameterError } from '../errors.js'

export type Parity = 'N' | 'E' | 'O' | 'M' | 'S'
export type DataBits = 5 | 6 | 7 | 8
export type StopBits = 1 | 1.5 | 2
export type DecodeErrorPolicy = 'strict' | 'ignore' | 'replace'

/**
 * Persisted serial parameters. Key names match the on-disk JSON file and the
 * names users pass to the `set` command.
 */
export interface SerialSettings {
    port: string
    baudrate: number
    bytesize: DataBits
    parity: Parity
    stopbits: StopBits
    /** Base read timeout in seconds (echo read, per-line reads). */
    timeout: number
    encoding: string
    encoding_errors: DecodeErrorPolicy
}

export const SETTING_NAMES = [
    'port',
    'baudrate',
    'bytesize',
    'parity',
    'stopbits',
    'timeout',
    'encoding',
    'encoding_errors',
] as const

export type SettingName = typeof SETTING_NAMES[number]

export const DEFAULT_SETTINGS: Readonly<SerialSettings> = Object.freeze({
    port: '/dev/ttyUSB0',
    baudrate: 9600,
    bytesize: 8,
    parity: 'N',
    stopbits: 1,
    timeout: 1,
    encoding: 'utf-8',
    encoding_errors: 'replace',
})

export function isSettingName(name: string): name is SettingName {
    return SETTING_NAMES.some((n) => n === name)
}

/* -------------------------------------------------------------------------- */
/*  Coercion                                                                  */
/* -------------------------------------------------------------------------- */

const INTEGER_RE = /^[+-]?\d+$/

function toInteger(name: SettingName, raw: string): number {
    const v = raw.trim()
    if (!INTEGER_RE.test(v)) throw new InvalidValueError(name)
    return Number.parseInt(v, 10)
}

function toFractional(name: SettingName, raw: string): number {
    const v = raw.trim()
    const n = Number(v)
    if (v === '' || !Number.isFinite(n)) throw new InvalidValueError(name)
    return n
}

function isDataBits(n: number): n is DataBits {
    return n === 5 || n === 6 || n === 7 || n === 8
}

function isStopBits(n: number): n is StopBits {
    return n === 1 || n === 1.5 || n === 2
}

function isParity(v: string): v is Parity {
    return v === 'N' || v === 'E' || v === 'O' || v === 'M' || v === 'S'
}

export function isDecodeErrorPolicy(v: string): v is DecodeErrorPolicy {
    return v === 'strict' || v === 'ignore' || v === 'replace'
}

export function isSupportedEncoding(encoding: string): boolean {
    try {
        new TextDecoder(encoding)
        return true
    } catch {
        return false
    }
}

type SettingParsers = { [K in SettingName]: (raw: string) => SerialSettings[K] }

const PARSERS: SettingParsers = {
    port: (raw) => {
        const v = raw.trim()
        if (!v) throw new InvalidValueError('port', 'Port must not be empty')
        return v
    },
    baudrate: (raw) => {
        const n = toInteger('baudrate', raw)
        if (n <= 0) throw new InvalidValueError('baudrate', 'Baud rate must be positive')
        return n
    },
    bytesize: (raw) => {
        const n = toInteger('bytesize', raw)
        if (!isDataBits(n)) throw new InvalidValueError('bytesize', 'Byte size must be one of 5, 6, 7, 8')
        return n
    },
    parity: (raw) => {
        const v = raw.trim().toUpperCase()
        if (!isParity(v)) throw new InvalidValueError('parity', 'Parity must be one of N, E, O, M, S')
        return v
    },
    stopbits: (raw) => {
        const n = toFractional('stopbits', raw)
        if (!isStopBits(n)) throw new InvalidValueError('stopbits', 'Stop bits must be one of 1, 1.5, 2')
        return n
    },
    timeout: (raw) => {
        const n = toFractional('timeout', raw)
        if (n <= 0) throw new InvalidValueError('timeout', 'Timeout must be positive')
        return n
    },
    encoding: (raw) => {
        const v = raw.trim()
        if (!isSupportedEncoding(v)) throw new InvalidValueError('encoding', `Invalid encoding: ${v}`)
        return v
    },
    encoding_errors: (raw) => {
        const v = raw.trim().toLowerCase()
        if (!isDecodeErrorPolicy(v)) {
            throw new InvalidValueError('encoding_errors', 'Error handling must be one of strict, ignore, replace')
        }
        return v
    },
}

export function parseSettingValue<K extends SettingName>(name: K, raw: string): SerialSettings[K] {
    return PARSERS[name](raw)
}

/**
 * Returns a copy of `settings` with `name` set to the coerced `raw` value.
 * The input object is never modified, so a failed coercion leaves it intact.
 */
export function applySetting(settings: SerialSettings, name: string, raw: string): SerialSettings {
    if (!isSettingName(name)) throw new UnknownParameterError(name, SETTING_NAMES)
    return assign(settings, name, raw)
}

function assign<K extends SettingName>(settings: SerialSettings, name: K, raw: string): SerialSettings {
    const next: SerialSettings = { ...settings }
    next[name] = parseSettingValue(name, raw)
    return next
}

/**
 * Normalize an untrusted object (the JSON file) into settings. Unknown keys
 * are dropped; bad values fall back to defaults and are reported.
 */
export function normalizeSettings(input: unknown): { settings: SerialSettings; rejected: SettingName[] } {
    let settings: SerialSettings = { ...DEFAULT_SETTINGS }
    const rejected: SettingName[] = []
    if (typeof input !== 'object' || input === null) return { settings, rejected }

    for (const [key, value] of Object.entries(input)) {
        if (!isSettingName(key)) continue
        if (typeof value !== 'string' && typeof value !== 'number') {
            rejected.push(key)
            continue
        }
        try {
            settings = assign(settings, key, String(value))
        } catch {
            rejected.push(key)
        }
    }

    return { settings, rejected }
}

export function formatSettings(settings: SerialSettings): string {
    return SETTING_NAMES.map((name) => `${name}: ${settings[name]}`).join('\n')
}
