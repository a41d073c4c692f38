// services/relay/src/core/sinks/SinkRegistry.ts

import type { ChatPlatform } from '../chat/types.js'
import { MessageNotFoundError, errorMessage } from '../errors.js'
import { systemClock, type Clock } from '../session/clock.js'
import type { Snapshot } from '../session/types.js'
import { LiveSink } from './LiveSink.js'
import { PlainSink } from './PlainSink.js'
import { codeBlock } from './render.js'
import type { SinkEventSink, TerminalSink } from './types.js'

export const WAITING_FOR_OUTPUT = 'Waiting for output...'

interface SinkRegistryDeps {
    platform: ChatPlatform
    clock?: Clock
    throttleMs?: number
    windowLines?: number
    events?: SinkEventSink
}

const noopEvents: SinkEventSink = { publish: () => undefined }

/**
 * SinkRegistry
 *
 * Tracks which channels have a plain and/or live terminal and delivers
 * session snapshots to them.
 *
 * Responsibilities:
 * - Per-channel FIFO delivery: snapshots for one channel are rendered in
 *   the order they were produced, and a live sink's throttle only delays
 *   that channel's queue (never the session's read loop).
 * - Best-effort fanout: one sink failing does not stop the other.
 * - Drop a live registration whose message has been deleted.
 */
export class SinkRegistry {
    private readonly platform: ChatPlatform
    private readonly clock: Clock
    private readonly throttleMs: number
    private readonly windowLines: number
    private readonly events: SinkEventSink

    private readonly plain = new Map<string, PlainSink>()
    private readonly live = new Map<string, LiveSink>()
    private readonly queues = new Map<string, Promise<void>>()

    constructor(deps: SinkRegistryDeps) {
        this.platform = deps.platform
        this.clock = deps.clock ?? systemClock
        this.throttleMs = Math.max(0, deps.throttleMs ?? 100)
        this.windowLines = Math.max(1, deps.windowLines ?? 20)
        this.events = deps.events ?? noopEvents
    }

    /* ---------------------------------------------------------------------- */
    /*  Registration                                                          */
    /* ---------------------------------------------------------------------- */

    /** Returns false when the channel already had a plain terminal. */
    registerPlain(channelId: string): boolean {
        if (this.plain.has(channelId)) return false
        this.plain.set(channelId, new PlainSink(channelId, this.platform))
        this.events.publish({ kind: 'sink-registered', at: this.clock.now(), channelId, sink: 'plain' })
        return true
    }

    unregisterPlain(channelId: string): boolean {
        if (!this.plain.delete(channelId)) return false
        this.events.publish({ kind: 'sink-unregistered', at: this.clock.now(), channelId, sink: 'plain', reason: 'command' })
        return true
    }

    /**
     * Post the placeholder message and start editing it in place. An existing
     * live terminal for the channel is kept and its message id returned.
     */
    async registerLive(channelId: string): Promise<string> {
        const existing = this.live.get(channelId)
        if (existing) return existing.messageId

        const placeholder = codeBlock(WAITING_FOR_OUTPUT)
        const messageId = await this.platform.sendMessage(channelId, placeholder)
        this.live.set(
            channelId,
            new LiveSink(channelId, messageId, this.platform, {
                clock: this.clock,
                throttleMs: this.throttleMs,
                windowLines: this.windowLines,
                initialBody: placeholder,
            }),
        )
        this.events.publish({ kind: 'sink-registered', at: this.clock.now(), channelId, sink: 'live', messageId })
        return messageId
    }

    /** Stop the live terminal and delete its message if it still exists. */
    async unregisterLive(channelId: string): Promise<boolean> {
        const sink = this.live.get(channelId)
        if (!sink) return false
        this.live.delete(channelId)
        this.events.publish({ kind: 'sink-unregistered', at: this.clock.now(), channelId, sink: 'live', reason: 'command' })

        try {
            await this.platform.deleteMessage(channelId, sink.messageId)
        } catch (err) {
            if (!(err instanceof MessageNotFoundError)) {
                this.events.publish({
                    kind: 'sink-cleanup-failed',
                    at: this.clock.now(),
                    channelId,
                    messageId: sink.messageId,
                    error: errorMessage(err),
                })
            }
        }
        return true
    }

    /* ---------------------------------------------------------------------- */
    /*  Queries                                                               */
    /* ---------------------------------------------------------------------- */

    isPlain(channelId: string): boolean {
        return this.plain.has(channelId)
    }

    isLive(channelId: string): boolean {
        return this.live.has(channelId)
    }

    hasAny(channelId: string): boolean {
        return this.isPlain(channelId) || this.isLive(channelId)
    }

    liveMessageId(channelId: string): string | null {
        return this.live.get(channelId)?.messageId ?? null
    }

    /** Every channel with at least one registration. */
    channels(): string[] {
        return [...new Set([...this.plain.keys(), ...this.live.keys()])]
    }

    /* ---------------------------------------------------------------------- */
    /*  Delivery                                                              */
    /* ---------------------------------------------------------------------- */

    /**
     * Queue a snapshot for the channel's sinks. The returned promise settles
     * when this snapshot has been delivered; it never rejects.
     */
    onSnapshot(channelId: string, snapshot: Snapshot): Promise<void> {
        const prev = this.queues.get(channelId) ?? Promise.resolve()
        const next = prev.then(() => this.deliver(channelId, snapshot))
        this.queues.set(channelId, next)
        void next.then(() => {
            if (this.queues.get(channelId) === next) this.queues.delete(channelId)
        })
        return next
    }

    /** Resolves once every snapshot queued for the channel has been delivered. */
    async idle(channelId: string): Promise<void> {
        let pending = this.queues.get(channelId)
        while (pending) {
            await pending
            const latest = this.queues.get(channelId)
            pending = latest === pending ? undefined : latest
        }
    }

    private async deliver(channelId: string, snapshot: Snapshot): Promise<void> {
        // Resolved per snapshot so registrations made mid-session take effect.
        const sinks: TerminalSink[] = []
        const plain = this.plain.get(channelId)
        if (plain) sinks.push(plain)
        const live = this.live.get(channelId)
        if (live) sinks.push(live)

        for (const sink of sinks) {
            try {
                const outcome = await sink.deliver(snapshot)
                this.events.publish({
                    kind: 'sink-delivered',
                    at: this.clock.now(),
                    channelId,
                    sink: sink.kind,
                    snapshot: snapshot.kind,
                    outcome,
                })
                if (outcome === 'gone' && this.live.get(channelId) === sink) {
                    this.live.delete(channelId)
                    this.events.publish({
                        kind: 'sink-unregistered',
                        at: this.clock.now(),
                        channelId,
                        sink: 'live',
                        reason: 'message-gone',
                    })
                }
            } catch (err) {
                this.events.publish({
                    kind: 'sink-failed',
                    at: this.clock.now(),
                    channelId,
                    sink: sink.kind,
                    error: errorMessage(err),
                })
            }
        }
    }
}
