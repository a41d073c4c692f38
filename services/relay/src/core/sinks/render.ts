// services/relay/src/core/sinks/render.ts

import type { Snapshot, TerminalSnapshot } from '../session/types.js'

const FENCE = '```'

export function codeBlock(text: string): string {
    return `${FENCE}\n${text}\n${FENCE}`
}

function emptyOutcome(snapshot: TerminalSnapshot): string {
    if (snapshot.status === 'timeout' && snapshot.timeoutSeconds !== null) {
        return `No response from device (timed out after ${snapshot.timeoutSeconds}s)`
    }
    return 'No response from device'
}

/**
 * Message text for a plain terminal. Device output goes in a code block;
 * errors and the not-connected notice are sent as-is.
 */
export function renderPlain(snapshot: TerminalSnapshot): string {
    if (snapshot.status === 'error' || snapshot.status === 'not-connected') {
        return snapshot.lines.join('\n')
    }
    if (snapshot.lines.length === 0) return emptyOutcome(snapshot)
    return codeBlock(snapshot.lines.join('\n'))
}

/** Body of the live terminal message (before fencing). */
export function renderLive(snapshot: Snapshot, windowLines: number): string {
    const recent = snapshot.lines.slice(-windowLines)

    switch (snapshot.kind) {
        case 'started':
            return `Processing command (timeout: ${snapshot.timeoutSeconds}s)...`
        case 'periodic': {
            const head = `Command running for ${snapshot.elapsedSeconds}s...`
            return recent.length > 0 ? `${head}\n${recent.join('\n')}` : head
        }
        case 'intermediate':
            return recent.join('\n')
        case 'terminal':
            return recent.length > 0 ? recent.join('\n') : emptyOutcome(snapshot)
    }
}
