// services/relay/src/routes/errors.ts

import type { FastifyReply } from 'fastify'
import { RelayError, errorMessage, type RelayErrorCode } from '../core/errors.js'

const STATUS_BY_CODE: Record<RelayErrorCode, number> = {
    'unknown-parameter': 400,
    'invalid-value': 400,
    'message-not-found': 404,
    'not-connected': 409,
    'already-connected': 409,
    'device-open': 502,
    'device-io': 502,
}

export interface ErrorBody {
    ok: false
    error: string
    code?: RelayErrorCode
}

export function statusFor(err: unknown): number {
    return err instanceof RelayError ? STATUS_BY_CODE[err.code] : 500
}

/** Set the status code for `err` and return the JSON body to send. */
export function replyError(reply: FastifyReply, err: unknown): ErrorBody {
    reply.code(statusFor(err))
    if (err instanceof RelayError) return { ok: false, error: err.message, code: err.code }
    return { ok: false, error: errorMessage(err) }
}

export function badRequest(reply: FastifyReply, error: string): ErrorBody {
    reply.code(400)
    return { ok: false, error }
}
