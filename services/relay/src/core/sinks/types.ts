// services/relay/src/core/sinks/types.ts

import type { Snapshot } from '../session/types.js'

/**
 * - delivered: something was posted or edited
 * - skipped:   this sink does not render this kind of snapshot
 * - unchanged: rendered content equals what the channel already shows
 * - gone:      the message backing the sink no longer exists
 */
export type SinkOutcome = 'delivered' | 'skipped' | 'unchanged' | 'gone'

export type SinkKind = 'plain' | 'live'

export interface TerminalSink {
    readonly kind: SinkKind
    readonly channelId: string
    deliver(snapshot: Snapshot): Promise<SinkOutcome>
}

export interface SinkEventSink {
    publish(evt: SinkEvent): void
}

export type SinkEvent =
    | { kind: 'sink-registered'; at: number; channelId: string; sink: SinkKind; messageId?: string }
    | { kind: 'sink-unregistered'; at: number; channelId: string; sink: SinkKind; reason: 'command' | 'message-gone' }
    | { kind: 'sink-delivered'; at: number; channelId: string; sink: SinkKind; snapshot: Snapshot['kind']; outcome: SinkOutcome }
    | { kind: 'sink-failed'; at: number; channelId: string; sink: SinkKind; error: string }
    | { kind: 'sink-cleanup-failed'; at: number; channelId: string; messageId: string; error: string }
