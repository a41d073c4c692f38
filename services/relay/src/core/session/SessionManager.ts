// services/relay/src/core/session/SessionManager.ts

import { DeviceIOError, errorMessage } from '../errors.js'
import { decodeLine } from '../serial/decode.js'
import type { SerialSettings } from '../serial/settings.js'
import type { Transport } from '../serial/SerialTransport.js'
import { ResponseClassifier } from './classifier.js'
import { systemClock, type Clock } from './clock.js'
import { Mutex } from './mutex.js'
import {
    DEFAULT_SESSION_TIMINGS,
    type ActiveSessionInfo,
    type SessionEventSink,
    type SessionOutcome,
    type SessionPhase,
    type SessionTimings,
    type Snapshot,
    type SnapshotListener,
    type TerminalSnapshot,
} from './types.js'

/** Non-owning view of the connection the manager borrows per session. */
export interface TransportProvider {
    getTransport(): Transport | null
    getSettings(): SerialSettings
}

interface SessionManagerDeps {
    connection: TransportProvider
    classifier?: ResponseClassifier
    clock?: Clock
    timings?: Partial<SessionTimings>
    events?: SessionEventSink
}

const NOT_CONNECTED_LINE = 'Not connected to serial device'

const noopEvents: SessionEventSink = { publish: () => undefined }

/** Mutable state of the one in-flight session. */
class Session {
    readonly lines: string[] = []
    phase: SessionPhase = 'AwaitingEcho'
    completed = false
    timeoutSec: number | null = null
    startedAt: number

    constructor(
        readonly id: number,
        readonly channelId: string,
        readonly command: string,
        now: number,
    ) {
        this.startedAt = now
    }

    get commandUpper(): string {
        return this.command.toUpperCase()
    }
}

/**
 * SessionManager
 *
 * Runs one command/response exchange at a time over the shared transport.
 * Callers queue in arrival order; each gets a stream of snapshots through
 * its listener and the terminal snapshot as the resolved value.
 *
 * Phases: AwaitingEcho → Settling → Polling ⇄ Draining → Completed | Aborted
 */
export class SessionManager {
    private readonly connection: TransportProvider
    private readonly classifier: ResponseClassifier
    private readonly clock: Clock
    private readonly timings: SessionTimings
    private readonly events: SessionEventSink

    private readonly mutex = new Mutex()
    private active: Session | null = null
    private nextId = 1

    constructor(deps: SessionManagerDeps) {
        this.connection = deps.connection
        this.classifier = deps.classifier ?? new ResponseClassifier()
        this.clock = deps.clock ?? systemClock
        this.timings = { ...DEFAULT_SESSION_TIMINGS, ...(deps.timings ?? {}) }
        this.events = deps.events ?? noopEvents
    }

    /* ---------------------------------------------------------------------- */
    /*  Public API                                                            */
    /* ---------------------------------------------------------------------- */

    execute(command: string, channelId: string, onSnapshot: SnapshotListener = () => undefined): Promise<TerminalSnapshot> {
        if (this.mutex.isLocked) {
            this.events.publish({
                kind: 'session-queued',
                at: this.clock.now(),
                channelId,
                command,
                queued: this.mutex.queued + 1,
            })
        }
        return this.mutex.runExclusive(() => this.run(command, channelId, onSnapshot))
    }

    getActive(): ActiveSessionInfo | null {
        const s = this.active
        if (!s) return null
        return { id: s.id, channelId: s.channelId, command: s.command, phase: s.phase, startedAt: s.startedAt }
    }

    /** Sessions waiting for the transport (excluding the active one). */
    get queued(): number {
        return this.mutex.queued
    }

    /* ---------------------------------------------------------------------- */
    /*  Session body                                                          */
    /* ---------------------------------------------------------------------- */

    private async run(command: string, channelId: string, listener: SnapshotListener): Promise<TerminalSnapshot> {
        const session = new Session(this.nextId++, channelId, command, this.clock.now())
        const emit = (snapshot: Snapshot): void => {
            try {
                listener(snapshot)
            } catch (err) {
                this.events.publish({
                    kind: 'session-listener-error',
                    at: this.clock.now(),
                    id: session.id,
                    error: errorMessage(err),
                })
            }
        }

        const transport = this.connection.getTransport()
        if (!transport) {
            session.phase = 'Aborted'
            return this.finish(session, 'not-connected', [NOT_CONNECTED_LINE], emit)
        }

        this.active = session
        this.events.publish({ kind: 'session-start', at: session.startedAt, id: session.id, channelId, command })

        try {
            const settings = this.connection.getSettings()
            const readTimeoutMs = Math.max(1, Math.round(settings.timeout * 1000))

            // AwaitingEcho
            await transport.write(Buffer.from(`${command}\r\n`, 'utf8'))
            await transport.flush()
            const echo = await transport.readLine(readTimeoutMs)
            this.events.publish({ kind: 'session-echo', at: this.clock.now(), id: session.id, echo: echo.toString('latin1').trim() })

            const rule = this.classifier.ruleFor(session.commandUpper)
            session.timeoutSec = this.classifier.timeoutFor(session.commandUpper)
            session.startedAt = this.clock.now()
            this.events.publish({
                kind: 'session-timeout-selected',
                at: session.startedAt,
                id: session.id,
                timeoutSec: session.timeoutSec,
                rule: rule?.label ?? 'default',
            })
            session.phase = 'Settling'
            emit({ ...this.base(session, []), kind: 'started', terminal: false, timeoutSeconds: session.timeoutSec })
            await this.clock.sleep(this.timings.settleMs)

            const outcome = await this.poll(session, transport, settings, readTimeoutMs, emit)
            session.phase = 'Completed'
            return this.finish(session, outcome, session.lines, emit)
        } catch (err) {
            session.phase = 'Aborted'
            const message = errorMessage(err)
            this.events.publish({
                kind: 'session-aborted',
                at: this.clock.now(),
                id: session.id,
                error: err instanceof DeviceIOError ? message : `unexpected: ${message}`,
            })
            return this.finish(session, 'error', [`Error: ${message}`], emit)
        } finally {
            this.active = null
        }
    }

    /**
     * Polling ⇄ Draining until the deadline, or until a completion indicator
     * has been followed by `debounceMs` of quiet.
     */
    private async poll(
        session: Session,
        transport: Transport,
        settings: SerialSettings,
        readTimeoutMs: number,
        emit: SnapshotListener,
    ): Promise<SessionOutcome> {
        const { pollMs, idlePollThreshold, debounceMs, graceMs, periodicMs } = this.timings
        const timeoutMs = (session.timeoutSec ?? 0) * 1000

        let lastRead = this.clock.now()
        let lastUpdate = lastRead
        let idlePolls = 0

        session.phase = 'Polling'

        while (this.clock.now() - session.startedAt < timeoutMs) {
            const current = this.clock.now()

            if (current - lastUpdate >= periodicMs) {
                emit({ ...this.base(session, this.window(session)), kind: 'periodic', terminal: false })
                lastUpdate = current
            }

            if (transport.bytesAvailable() > 0) {
                session.phase = 'Draining'
                idlePolls = 0
                await this.drain(session, transport, settings, readTimeoutMs, emit)
                lastRead = current
                session.phase = 'Polling'
                continue
            }

            await this.clock.sleep(pollMs)
            idlePolls += 1

            const idleMs = current - lastRead
            if (idlePolls > idlePollThreshold && idleMs > debounceMs) {
                if (session.completed) break
                if (idleMs > graceMs) {
                    this.events.publish({ kind: 'session-still-waiting', at: current, id: session.id, idleMs })
                    idlePolls = 0
                }
            }
        }

        return session.completed ? 'completed' : 'timeout'
    }

    private async drain(
        session: Session,
        transport: Transport,
        settings: SerialSettings,
        readTimeoutMs: number,
        emit: SnapshotListener,
    ): Promise<void> {
        const command = session.command.trim()

        while (transport.bytesAvailable() > 0) {
            const raw = await transport.readLine(readTimeoutMs)
            if (raw.length === 0) return

            const decoded = decodeLine(raw, settings.encoding, settings.encoding_errors)
            if (decoded.kind === 'hex') {
                this.events.publish({ kind: 'session-decode-fallback', at: this.clock.now(), id: session.id, reason: decoded.reason })
                this.accept(session, decoded.text, emit)
                continue
            }

            const line = decoded.text
            if (!line || line === command) continue

            this.accept(session, line, emit)

            if (this.classifier.isCompletionIndicator(line)) {
                session.completed = true
                this.events.publish({ kind: 'session-completion-seen', at: this.clock.now(), id: session.id, indicator: line })
                return
            }
        }
    }

    private accept(session: Session, line: string, emit: SnapshotListener): void {
        session.lines.push(line)
        this.events.publish({ kind: 'session-line', at: this.clock.now(), id: session.id, line })
        emit({ ...this.base(session, this.window(session)), kind: 'intermediate', terminal: false })
    }

    /* ---------------------------------------------------------------------- */
    /*  Snapshot helpers                                                      */
    /* ---------------------------------------------------------------------- */

    private finish(
        session: Session,
        status: SessionOutcome,
        lines: readonly string[],
        emit: SnapshotListener,
    ): TerminalSnapshot {
        const snapshot: TerminalSnapshot = {
            ...this.base(session, [...lines]),
            kind: 'terminal',
            terminal: true,
            status,
            timeoutSeconds: session.timeoutSec,
        }
        this.events.publish({
            kind: 'session-end',
            at: this.clock.now(),
            id: session.id,
            outcome: status,
            lines: snapshot.lines.length,
            elapsedMs: this.clock.now() - session.startedAt,
        })
        emit(snapshot)
        return snapshot
    }

    private base(session: Session, lines: readonly string[]) {
        return {
            sessionId: session.id,
            channelId: session.channelId,
            command: session.command,
            lines,
            elapsedSeconds: Math.floor((this.clock.now() - session.startedAt) / 1000),
        }
    }

    private window(session: Session): string[] {
        return session.lines.slice(-this.timings.windowLines)
    }
}
