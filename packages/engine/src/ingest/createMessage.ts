/**
 * @fileoverview Message construction
 *
 * Turns loosely-typed raw records into pipeline messages, applying the
 * defaults for missing fields, and processed messages back into output
 * records.
 *
 * @module @triage/engine/ingest/createMessage
 */

import { createHash } from "crypto";
import type {
    OutputRecord,
    ProcessedMessage,
    RawMessageRecord,
    TriageMessage,
} from "../contracts/Message.js";

const kDEFAULT_USER = "unknown";
const kDEFAULT_CHANNEL = "general";
const kID_HASH_LENGTH = 16;

const kNUMERIC_TS = /^-?\d+(\.\d+)?$/;

function stringField(value: unknown): string | undefined {
    return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Derive a stable id from channel, user and text.
 *
 * The same author posting the same text in the same channel yields the
 * same id.
 *
 * @example
 * ```typescript
 * deriveMessageId("C1", "U1", "deploy is stuck");
 * // => "msg_" followed by 16 hex characters
 * ```
 */
export function deriveMessageId(channel: string, user: string, text: string): string {
    const digest = createHash("sha256")
        .update(`${channel}\n${user}\n${text}`)
        .digest("hex");

    return `msg_${digest.slice(0, kID_HASH_LENGTH)}`;
}

/**
 * Parse a record timestamp.
 *
 * Numbers and numeric strings are epoch seconds (chat-export style,
 * fractional part allowed); other strings go through `Date.parse`.
 *
 * @returns The parsed date, or `undefined` when absent or unparsable
 */
export function parseTimestamp(ts: unknown): Date | undefined {
    let millis: number;

    if (typeof ts === "number") {
        millis = ts * 1000;
    }
    else if (typeof ts === "string") {
        const trimmed = ts.trim();
        if (trimmed.length === 0) {
            return undefined;
        }
        millis = kNUMERIC_TS.test(trimmed)
            ? Number.parseFloat(trimmed) * 1000
            : Date.parse(trimmed);
    }
    else {
        return undefined;
    }

    if (!Number.isFinite(millis)) {
        return undefined;
    }

    const date = new Date(millis);
    return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Build a pipeline message from a raw record. Never throws: missing or
 * malformed fields take their defaults.
 *
 * @param record - Raw input record
 * @param now - Timestamp used when the record has none
 */
export function createTriageMessage(record: RawMessageRecord, now: Date = new Date()): TriageMessage {
    const text    = typeof record.text === "string" ? record.text : "";
    const user    = stringField(record.user) ?? kDEFAULT_USER;
    const channel = stringField(record.channel) ?? kDEFAULT_CHANNEL;
    const threadTs = stringField(record.thread_ts);

    const reactions = Array.isArray(record.reactions)
        ? record.reactions.filter((reaction): reaction is string => typeof reaction === "string")
        : [];

    return Object.freeze({
        id      : stringField(record.id) ?? deriveMessageId(channel, user, text),
        type    : "triage-message",
        content : text,
        metadata: Object.freeze({
            user,
            channel,
            timestamp: parseTimestamp(record.ts) ?? now,
            reactions: Object.freeze(reactions),
            ...(threadTs !== undefined ? { threadTs } : {}),
        }),
    });
}

/**
 * Flatten a processed message into the output record shape.
 */
export function toOutputRecord(message: ProcessedMessage): OutputRecord {
    const { metadata } = message;

    return {
        id            : message.id,
        text          : message.content,
        user          : metadata.user,
        channel       : metadata.channel,
        ts            : metadata.timestamp.getTime() / 1000,
        ...(metadata.threadTs !== undefined ? { thread_ts: metadata.threadTs } : {}),
        reactions     : metadata.reactions,
        category      : message.category,
        confidence    : message.confidence,
        priority_score: message.priorityScore,
        color         : message.color,
        similar_tickets: message.similarTickets.map((match) => ({
            ticket_id       : match.ticketId,
            similarity_score: match.similarityScore,
            category        : match.category,
            key_phrases     : match.keyPhrases,
            text_preview    : match.textPreview,
        })),
    };
}
