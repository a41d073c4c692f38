// services/relay/src/utils/env.ts

export function parseIntEnv(value: string | undefined, fallback: number): number {
    if (value === undefined || value === '') return fallback
    const n = Number.parseInt(value, 10)
    return Number.isNaN(n) ? fallback : n
}

export function parseBoolEnv(value: string | undefined, fallback: boolean): boolean {
    if (value == null || value === '') return fallback
    const v = value.trim().toLowerCase()
    if (v === 'true' || v === '1' || v === 'yes' || v === 'on') return true
    if (v === 'false' || v === '0' || v === 'no' || v === 'off') return false
    return fallback
}

export function parseStringEnv(value: string | undefined, fallback: string): string {
    if (value === undefined) return fallback
    const v = value.trim()
    return v.length > 0 ? v : fallback
}
