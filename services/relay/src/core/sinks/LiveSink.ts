// services/relay/src/core/sinks/LiveSink.ts

import type { ChatPlatform } from '../chat/types.js'
import { MessageNotFoundError } from '../errors.js'
import type { Clock } from '../session/clock.js'
import type { Snapshot } from '../session/types.js'
import { codeBlock, renderLive } from './render.js'
import type { SinkOutcome, TerminalSink } from './types.js'

export interface LiveSinkOptions {
    clock: Clock
    /** Pause after a content-changing edit before the next snapshot renders. */
    throttleMs: number
    windowLines: number
    /** Body of the message as it was posted. */
    initialBody: string
}

/**
 * LiveSink
 *
 * Keeps a single message per channel up to date with the running command.
 * The message is fetched before every edit; if it has been deleted the sink
 * reports `gone` and the registry drops it. Edits are skipped when the new
 * body matches the last one this sink wrote.
 */
export class LiveSink implements TerminalSink {
    readonly kind = 'live'
    private rendered: string

    constructor(
        readonly channelId: string,
        readonly messageId: string,
        private readonly platform: ChatPlatform,
        private readonly opts: LiveSinkOptions,
    ) {
        this.rendered = opts.initialBody
    }

    async deliver(snapshot: Snapshot): Promise<SinkOutcome> {
        const body = codeBlock(renderLive(snapshot, this.opts.windowLines))

        try {
            await this.platform.fetchMessage(this.channelId, this.messageId)
            if (body === this.rendered) return 'unchanged'
            await this.platform.editMessage(this.channelId, this.messageId, body)
        } catch (err) {
            if (err instanceof MessageNotFoundError) return 'gone'
            throw err
        }

        this.rendered = body
        await this.opts.clock.sleep(this.opts.throttleMs)
        return 'delivered'
    }
}
