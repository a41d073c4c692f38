import { describe, it, expect } from 'vitest'
import { decodeLine, hexFallback } from './decode.js'

describe('decodeLine', () => {
    it('decodes and trims a well-formed line', () => {
        const raw = Buffer.from('+CWJAP:"home",1\r\n', 'utf8')
        expect(decodeLine(raw, 'utf-8', 'strict')).toEqual({ kind: 'text', text: '+CWJAP:"home",1' })
    })

    it('falls back to hex under the strict policy', () => {
        const raw = Uint8Array.from([0xff, 0xfe, 0x41, 0x0d, 0x0a])
        const out = decodeLine(raw, 'utf-8', 'strict')

        expect(out.kind).toBe('hex')
        expect(out.text).toBe('Raw hex data: ff fe 41 0d 0a')
    })

    it('substitutes replacement characters under the replace policy', () => {
        const raw = Uint8Array.from([0x41, 0xff, 0x42])
        expect(decodeLine(raw, 'utf-8', 'replace')).toEqual({ kind: 'text', text: 'A�B' })
    })

    it('drops malformed bytes under the ignore policy', () => {
        const raw = Uint8Array.from([0x41, 0xff, 0x42])
        expect(decodeLine(raw, 'utf-8', 'ignore')).toEqual({ kind: 'text', text: 'AB' })
    })

    it('decodes single-byte encodings', () => {
        const raw = Uint8Array.from([0x63, 0x61, 0x66, 0xe9])
        expect(decodeLine(raw, 'latin1', 'strict')).toEqual({ kind: 'text', text: 'café' })
    })

    it('renders an unknown encoding as hex instead of throwing', () => {
        const out = decodeLine(Uint8Array.from([0x4f, 0x4b]), 'not-an-encoding', 'replace')
        expect(out).toMatchObject({ kind: 'hex', text: 'Raw hex data: 4f 4b' })
    })
})

describe('hexFallback', () => {
    it('pads every byte to two lower-case digits', () => {
        expect(hexFallback(Uint8Array.from([0x00, 0x0a, 0xab]))).toBe('Raw hex data: 00 0a ab')
    })
})
