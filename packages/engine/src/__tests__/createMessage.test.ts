/**
 * @fileoverview Unit tests for message construction and output records
 *
 * @module @triage/engine/__tests__/createMessage
 */

import { describe, it, expect } from "vitest";
import type { ProcessedMessage, RawMessageRecord } from "../contracts/Message.js";
import {
    createTriageMessage,
    deriveMessageId,
    parseTimestamp,
    toOutputRecord,
} from "../ingest/createMessage.js";

const kNOW = new Date("2025-03-03T12:00:00.000Z");

describe("parseTimestamp", () => {
    // Scenario: Epoch seconds as number or numeric string
    it("should read epoch seconds", () => {
        expect(parseTimestamp(1741000000)?.getTime()).toBe(1741000000000);
        expect(parseTimestamp("1741000000.5")?.getTime()).toBe(1741000000500);
    });

    // Scenario: ISO-8601 strings
    it("should read ISO-8601 strings", () => {
        expect(parseTimestamp("2025-03-03T10:00:00Z")?.toISOString()).toBe("2025-03-03T10:00:00.000Z");
    });

    // Scenario: Anything else is unparsable
    it("should return undefined for unparsable values", () => {
        expect(parseTimestamp("last tuesday")).toBeUndefined();
        expect(parseTimestamp("")).toBeUndefined();
        expect(parseTimestamp(undefined)).toBeUndefined();
        expect(parseTimestamp(Number.NaN)).toBeUndefined();
        expect(parseTimestamp(Number.POSITIVE_INFINITY)).toBeUndefined();
        expect(parseTimestamp({ seconds: 1 })).toBeUndefined();
    });
});

describe("deriveMessageId", () => {
    // Scenario: Same source, same id
    it("should be stable for identical channel, user and text", () => {
        const id = deriveMessageId("C1", "U1", "deploy is stuck");

        expect(id).toMatch(/^msg_[0-9a-f]{16}$/);
        expect(deriveMessageId("C1", "U1", "deploy is stuck")).toBe(id);
        expect(deriveMessageId("C2", "U1", "deploy is stuck")).not.toBe(id);
    });
});

describe("createTriageMessage", () => {
    // Scenario: Complete record
    it("should copy the record fields", () => {
        const message = createTriageMessage({
            id       : "m1",
            text     : "Need access to Grafana",
            user     : "U42",
            channel  : "C7",
            ts       : 1741000000,
            thread_ts: "1740999000.000100",
            reactions: ["eyes"],
        }, kNOW);

        expect(message).toEqual({
            id      : "m1",
            type    : "triage-message",
            content : "Need access to Grafana",
            metadata: {
                user     : "U42",
                channel  : "C7",
                timestamp: new Date(1741000000000),
                threadTs : "1740999000.000100",
                reactions: ["eyes"],
            },
        });
        expect(Object.isFrozen(message)).toBe(true);
    });

    // Scenario: Sparse record takes defaults
    it("should apply defaults for missing fields", () => {
        const message = createTriageMessage({ text: "hi team" }, kNOW);

        expect(message.id).toBe(deriveMessageId("general", "unknown", "hi team"));
        expect(message.metadata).toEqual({
            user     : "unknown",
            channel  : "general",
            timestamp: kNOW,
            reactions: [],
        });
    });

    // Scenario: Record without text and with junk fields
    it("should never throw on malformed records", () => {
        const record: RawMessageRecord = JSON.parse('{"user":"","reactions":["+1",3,null],"ts":"soon"}');
        const message = createTriageMessage(record, kNOW);

        expect(message.content).toBe("");
        expect(message.metadata.user).toBe("unknown");
        expect(message.metadata.reactions).toEqual(["+1"]);
        expect(message.metadata.timestamp).toEqual(kNOW);
    });
});

describe("toOutputRecord", () => {
    // Scenario: Processed message flattened for export
    it("should use export field names and epoch seconds", () => {
        const processed: ProcessedMessage = {
            id            : "m2",
            type          : "triage-message",
            content       : "build failed on main",
            metadata      : {
                user     : "U1",
                channel  : "C1",
                timestamp: new Date(1741000000000),
                reactions: [],
            },
            normalizedText: "build failed on main",
            category      : "deployment",
            confidence    : 0.6,
            priorityScore : 0.45,
            color         : "#FFA726",
            similarTickets: [{
                ticketId       : "m1",
                similarityScore: 0.6,
                category       : "deployment",
                keyPhrases     : ["build failed"],
                textPreview    : "build failed again",
            }],
        };

        expect(toOutputRecord(processed)).toEqual({
            id             : "m2",
            text           : "build failed on main",
            user           : "U1",
            channel        : "C1",
            ts             : 1741000000,
            reactions      : [],
            category       : "deployment",
            confidence     : 0.6,
            priority_score : 0.45,
            color          : "#FFA726",
            similar_tickets: [{
                ticket_id       : "m1",
                similarity_score: 0.6,
                category        : "deployment",
                key_phrases     : ["build failed"],
                text_preview    : "build failed again",
            }],
        });
    });
});
