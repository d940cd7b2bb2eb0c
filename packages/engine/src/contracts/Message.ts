/**
 * @fileoverview Message Contracts
 *
 * Input records, pipeline messages and processed results.
 *
 * @module @triage/engine/contracts/Message
 */

import type { Entity } from "./Entity.js";
import type { SimilarityMatch } from "./SimilarityMatch.js";

/**
 * Raw record as supplied by an ingestion collaborator (chat export,
 * webhook, test fixture). Every field but `text` is optional and even
 * `text` may be missing on malformed input.
 */
export interface RawMessageRecord {
    readonly id?: string;
    readonly text?: string;
    readonly user?: string;
    readonly channel?: string;

    /** Epoch seconds (number or numeric string) or an ISO-8601 string */
    readonly ts?: number | string;

    readonly thread_ts?: string;
    readonly reactions?: readonly string[];
}

/**
 * Chat metadata carried by every message.
 */
export interface MessageMetadata {
    /** Author, `"unknown"` when the record had none */
    readonly user: string;

    /** Channel, `"general"` when the record had none */
    readonly channel: string;

    /** When the message was posted (processing time if unknown) */
    readonly timestamp: Date;

    /** Parent thread reference, if any */
    readonly threadTs?: string;

    /** Reaction tags, possibly empty */
    readonly reactions: readonly string[];
}

/**
 * A message entering the pipeline.
 */
export interface TriageMessage extends Entity<MessageMetadata> {
    /** Entity type discriminator */
    readonly type: "triage-message";
}

/**
 * A message after categorization, scoring and similarity search.
 * This is what the store holds and what the engine returns.
 */
export interface ProcessedMessage extends TriageMessage {
    /** Output of the text normalizer, reused for similarity search */
    readonly normalizedText: string;

    /** Winning category name */
    readonly category: string;

    /** Normalized categorization strength in [0, 1] */
    readonly confidence: number;

    /** Capped additive priority in [0, 1] */
    readonly priorityScore: number;

    /** Display color of the category */
    readonly color: string;

    /** Ranked similar prior messages, at most top-K */
    readonly similarTickets: readonly SimilarityMatch[];
}

/**
 * Output record handed to rendering and export collaborators.
 * Field names follow the chat-export convention of the input record.
 */
export interface OutputRecord {
    readonly id: string;
    readonly text: string;
    readonly user: string;
    readonly channel: string;

    /** Epoch seconds */
    readonly ts: number;

    readonly thread_ts?: string;
    readonly reactions: readonly string[];
    readonly category: string;
    readonly confidence: number;
    readonly priority_score: number;
    readonly color: string;
    readonly similar_tickets: ReadonlyArray<{
        readonly ticket_id: string;
        readonly similarity_score: number;
        readonly category: string;
        readonly key_phrases: readonly string[];
        readonly text_preview: string;
    }>;
}
