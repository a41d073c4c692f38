// services/relay/src/core/serial/settings-store.ts

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { normalizeSettings, type SerialSettings, type SettingName, DEFAULT_SETTINGS, SETTING_NAMES } from './settings.js'

export interface SettingsStore {
    load(): { settings: SerialSettings; rejected: SettingName[] }
    save(settings: SerialSettings): void
}

/**
 * JSON file store. A missing file yields the defaults; the file is only
 * written on an explicit save.
 */
export class JsonFileSettingsStore implements SettingsStore {
    constructor(private readonly filePath: string) {}

    get path(): string {
        return this.filePath
    }

    load(): { settings: SerialSettings; rejected: SettingName[] } {
        if (!existsSync(this.filePath)) {
            return { settings: { ...DEFAULT_SETTINGS }, rejected: [] }
        }
        let raw: unknown
        try {
            raw = JSON.parse(readFileSync(this.filePath, 'utf8'))
        } catch (err) {
            if (!(err instanceof SyntaxError)) throw err
            // Unparseable file: every entry falls back.
            return { settings: { ...DEFAULT_SETTINGS }, rejected: [...SETTING_NAMES] }
        }
        return normalizeSettings(raw)
    }

    save(settings: SerialSettings): void {
        mkdirSync(dirname(this.filePath), { recursive: true })
        writeFileSync(this.filePath, JSON.stringify(settings, null, 4) + '\n', 'utf8')
    }
}

/** Keeps settings in memory only; used by tests and ephemeral runs. */
export class MemorySettingsStore implements SettingsStore {
    private current: SerialSettings
    saves = 0

    constructor(initial: Partial<SerialSettings> = {}) {
        this.current = { ...DEFAULT_SETTINGS, ...initial }
    }

    load(): { settings: SerialSettings; rejected: SettingName[] } {
        return { settings: { ...this.current }, rejected: [] }
    }

    save(settings: SerialSettings): void {
        this.current = { ...settings }
        this.saves += 1
    }
}
