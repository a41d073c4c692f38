// services/relay/src/core/session/classifier.ts

/**
 * A command whose upper-cased text contains `marker` gets `timeoutSec`.
 * Rules are checked in table order; the first match wins.
 */
export interface TimeoutRule {
    marker: string
    timeoutSec: number
    label: string
}

export const DEFAULT_TIMEOUT_SEC = 15

export const DEFAULT_TIMEOUT_RULES: readonly TimeoutRule[] = [
    // Joining an access point routinely takes 10-30s on ESP modules.
    { marker: 'CWJAP', timeoutSec: 45, label: 'wifi-join' },
    { marker: 'CWLAP', timeoutSec: 20, label: 'wifi-scan' },
]

export const DEFAULT_COMPLETION_INDICATORS: readonly string[] = ['OK', 'FAIL', 'ERROR']

export interface ClassifierOptions {
    rules?: readonly TimeoutRule[]
    defaultTimeoutSec?: number
    completionIndicators?: readonly string[]
}

export class ResponseClassifier {
    private readonly rules: readonly TimeoutRule[]
    private readonly defaultTimeoutSec: number
    private readonly indicators: ReadonlySet<string>

    constructor(opts: ClassifierOptions = {}) {
        this.rules = opts.rules ?? DEFAULT_TIMEOUT_RULES
        this.defaultTimeoutSec = opts.defaultTimeoutSec ?? DEFAULT_TIMEOUT_SEC
        this.indicators = new Set(opts.completionIndicators ?? DEFAULT_COMPLETION_INDICATORS)
    }

    /** Timeout budget in seconds for an upper-cased command. */
    timeoutFor(commandUpper: string): number {
        return this.ruleFor(commandUpper)?.timeoutSec ?? this.defaultTimeoutSec
    }

    ruleFor(commandUpper: string): TimeoutRule | undefined {
        return this.rules.find((r) => commandUpper.includes(r.marker))
    }

    isCompletionIndicator(line: string): boolean {
        return this.indicators.has(line.trim())
    }
}
