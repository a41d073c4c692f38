// services/relay/src/core/errors.ts

export type RelayErrorCode =
    | 'not-connected'
    | 'already-connected'
    | 'device-io'
    | 'device-open'
    | 'unknown-parameter'
    | 'invalid-value'
    | 'message-not-found'

/**
 * Base class for every failure the relay reports to a user. `message` is
 * always a short human-readable line suitable for a chat reply.
 */
export class RelayError extends Error {
    readonly code: RelayErrorCode

    constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
        this.code = code
    }
}

export class NotConnectedError extends RelayError {
    constructor(message = 'Not connected to serial device') {
        super('not-connected', message)
    }
}

export class AlreadyConnectedError extends RelayError {
    constructor(message = 'Already connected to serial device!') {
        super('already-connected', message)
    }
}

/** Any open/write/read/flush failure on the serial port. */
export class DeviceIOError extends RelayError {
    constructor(message: string, options?: { cause?: unknown; code?: 'device-io' | 'device-open' }) {
        super(options?.code ?? 'device-io', message, options)
    }
}

export class DeviceOpenError extends DeviceIOError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, { ...options, code: 'device-open' })
    }
}

export class UnknownParameterError extends RelayError {
    readonly parameter: string

    constructor(parameter: string, available: readonly string[]) {
        super('unknown-parameter', `Invalid parameter. Available parameters: ${available.join(', ')}`)
        this.parameter = parameter
    }
}

export class InvalidValueError extends RelayError {
    readonly parameter: string

    constructor(parameter: string, message?: string) {
        super('invalid-value', message ?? `Invalid value format for ${parameter}`)
        this.parameter = parameter
    }
}

/** The chat message a sink points at no longer exists. */
export class MessageNotFoundError extends RelayError {
    constructor(channelId: string, messageId: string) {
        super('message-not-found', `Message ${messageId} not found in channel ${channelId}`)
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
