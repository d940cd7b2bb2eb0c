/**
 * @fileoverview Message Store
 *
 * Append-only, insertion-ordered history of processed messages. One
 * store belongs to one engine; nothing is persisted.
 *
 * @module @triage/engine/store/MessageStore
 */

import type { ProcessedMessage } from "../contracts/Message.js";

export class MessageStore {
    private readonly messages: ProcessedMessage[] = [];
    private readonly ids: Set<string> = new Set();

    /**
     * Append a processed message. Ids may repeat (derived ids of
     * identical records); `has` answers for any of them.
     */
    append(message: ProcessedMessage): void {
        this.messages.push(message);
        this.ids.add(message.id);
    }

    /**
     * All stored messages in insertion order.
     */
    all(): readonly ProcessedMessage[] {
        return this.messages;
    }

    has(id: string): boolean {
        return this.ids.has(id);
    }

    get size(): number {
        return this.messages.length;
    }
}
