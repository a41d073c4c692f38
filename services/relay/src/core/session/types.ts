// services/relay/src/core/session/types.ts

export type SessionPhase =
    | 'AwaitingEcho'
    | 'Settling'
    | 'Polling'
    | 'Draining'
    | 'Completed'
    | 'Aborted'

export type SessionOutcome = 'completed' | 'timeout' | 'not-connected' | 'error'

interface SnapshotBase {
    sessionId: number
    channelId: string
    command: string
    lines: readonly string[]
    elapsedSeconds: number
}

/**
 * Immutable view of a session's output at one point in time.
 *
 * - started:      command written, echo consumed, timeout chosen
 * - intermediate: a new line was accepted (window of recent lines)
 * - periodic:     liveness tick during long commands (window of recent lines)
 * - terminal:     last snapshot of the session (all lines)
 */
export type Snapshot =
    | (SnapshotBase & { kind: 'started'; terminal: false; timeoutSeconds: number })
    | (SnapshotBase & { kind: 'intermediate'; terminal: false })
    | (SnapshotBase & { kind: 'periodic'; terminal: false })
    | TerminalSnapshot

export type TerminalSnapshot = SnapshotBase & {
    kind: 'terminal'
    terminal: true
    status: SessionOutcome
    /** null when the session ended before a timeout was chosen. */
    timeoutSeconds: number | null
}

export type SnapshotListener = (snapshot: Snapshot) => void

export interface SessionTimings {
    /** Pause after the echo before the first poll. */
    settleMs: number
    /** Sleep between polls of an empty buffer. */
    pollMs: number
    /** Consecutive empty polls required before idleness is considered. */
    idlePollThreshold: number
    /** Quiet time after a completion indicator before the session ends. */
    debounceMs: number
    /** Quiet time without an indicator after which the idle counter resets. */
    graceMs: number
    /** Interval between periodic status snapshots. */
    periodicMs: number
    /** Lines carried by intermediate and periodic snapshots. */
    windowLines: number
}

export const DEFAULT_SESSION_TIMINGS: Readonly<SessionTimings> = Object.freeze({
    settleMs: 500,
    pollMs: 100,
    idlePollThreshold: 20,
    debounceMs: 2000,
    graceMs: 5000,
    periodicMs: 5000,
    windowLines: 20,
})

export interface ActiveSessionInfo {
    id: number
    channelId: string
    command: string
    phase: SessionPhase
    startedAt: number
}

export interface SessionEventSink {
    publish(evt: SessionEvent): void
}

export type SessionEvent =
    | { kind: 'session-queued'; at: number; channelId: string; command: string; queued: number }
    | { kind: 'session-start'; at: number; id: number; channelId: string; command: string }
    | { kind: 'session-echo'; at: number; id: number; echo: string }
    | { kind: 'session-timeout-selected'; at: number; id: number; timeoutSec: number; rule: string }
    | { kind: 'session-line'; at: number; id: number; line: string }
    | { kind: 'session-decode-fallback'; at: number; id: number; reason: string }
    | { kind: 'session-completion-seen'; at: number; id: number; indicator: string }
    | { kind: 'session-still-waiting'; at: number; id: number; idleMs: number }
    | { kind: 'session-end'; at: number; id: number; outcome: SessionOutcome; lines: number; elapsedMs: number }
    | { kind: 'session-aborted'; at: number; id: number; error: string }
    | { kind: 'session-listener-error'; at: number; id: number; error: string }
