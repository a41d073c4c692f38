// services/relay/src/core/serial/decode.ts

import type { DecodeErrorPolicy } from './settings.js'

/**
 * Outcome of decoding one raw line. A failed decode is not an error: the
 * caller still gets a printable line, rendered from the raw bytes.
 */
export type DecodedLine =
    | { kind: 'text'; text: string }
    | { kind: 'hex'; text: string; reason: string }

const REPLACEMENT_CHAR = /�/g

export function hexFallback(raw: Uint8Array): string {
    const bytes = Array.from(raw, (b) => b.toString(16).padStart(2, '0'))
    return `Raw hex data: ${bytes.join(' ')}`
}

/**
 * Decode `raw` with `encoding`. `strict` fails on malformed input, `replace`
 * substitutes U+FFFD, `ignore` drops malformed sequences. Surrounding
 * whitespace (including the line terminator) is trimmed from text results.
 */
export function decodeLine(raw: Uint8Array, encoding: string, policy: DecodeErrorPolicy): DecodedLine {
    let decoder: InstanceType<typeof TextDecoder>
    try {
        decoder = new TextDecoder(encoding, { fatal: policy === 'strict' })
    } catch {
        return { kind: 'hex', text: hexFallback(raw), reason: `unsupported encoding ${encoding}` }
    }

    try {
        const decoded = decoder.decode(raw)
        const text = policy === 'ignore' ? decoded.replace(REPLACEMENT_CHAR, '') : decoded
        return { kind: 'text', text: text.trim() }
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err)
        return { kind: 'hex', text: hexFallback(raw), reason }
    }
}
