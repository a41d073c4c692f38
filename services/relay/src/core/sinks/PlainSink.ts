// services/relay/src/core/sinks/PlainSink.ts

import type { ChatPlatform } from '../chat/types.js'
import type { Snapshot } from '../session/types.js'
import { renderPlain } from './render.js'
import type { SinkOutcome, TerminalSink } from './types.js'

/** One new message per finished command. */
export class PlainSink implements TerminalSink {
    readonly kind = 'plain'

    constructor(
        readonly channelId: string,
        private readonly platform: ChatPlatform,
    ) {}

    async deliver(snapshot: Snapshot): Promise<SinkOutcome> {
        if (!snapshot.terminal) return 'skipped'
        await this.platform.sendMessage(this.channelId, renderPlain(snapshot))
        return 'delivered'
    }
}
