/**
 * @fileoverview Unit tests for JsonRecordProvider
 *
 * @module slack-triage/__tests__/JsonRecordProvider
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("fs/promises", () => ({
    readFile: vi.fn(),
}));

import { readFile } from "fs/promises";
import { JsonRecordProvider, isSystemMessage, toRawRecord } from "../providers/JsonRecordProvider.js";

const mockReadFile = vi.mocked(readFile);

/**
 * Fixed provider clock: 1741003200 epoch seconds.
 */
const TEST_TIME = new Date("2025-03-03T12:00:00.000Z");

function createMockLogger() {
    return {
        info: vi.fn(),
        warn: vi.fn(),
    };
}

describe("toRawRecord", () => {
    // Scenario: Well-typed fields are copied under their record names
    it("should keep known fields", () => {
        const record = toRawRecord({
            id       : "m1",
            text     : "deploy is stuck",
            user     : "U01",
            channel  : "ops",
            ts       : "1700000000.000100",
            thread_ts: "1699999999.000000",
            reactions: ["eyes", 3, "fire"],
            extra    : true,
        }, TEST_TIME);

        expect(record).toEqual({
            id       : "m1",
            text     : "deploy is stuck",
            user     : "U01",
            channel  : "ops",
            ts       : "1700000000.000100",
            thread_ts: "1699999999.000000",
            reactions: ["eyes", "fire"],
        });
    });

    // Scenario: Mistyped fields are dropped so the engine applies its defaults
    it("should drop mistyped fields", () => {
        expect(toRawRecord({ text: "hello", user: 42, channel: null, reactions: "eyes" }, TEST_TIME))
            .toEqual({ text: "hello" });
    });

    // Scenario: Slack export reactions are objects carrying the emoji name
    it("should take reaction names from export reaction objects", () => {
        const record = toRawRecord({
            text     : "hi",
            reactions: [
                { name: "eyes", count: 2, users: ["U01", "U02"] },
                { name: "+1", count: 1, users: ["U03"] },
                { count: 4 },
            ],
        }, TEST_TIME);

        expect(record).toEqual({ text: "hi", reactions: ["eyes", "+1"] });
    });

    // Scenario: Export entries identify themselves by client_msg_id
    it("should fall back to client_msg_id for the id", () => {
        expect(toRawRecord({ client_msg_id: "c-1", text: "hi" }, TEST_TIME)).toEqual({ id: "c-1", text: "hi" });
        expect(toRawRecord({ id: "m1", client_msg_id: "c-1" }, TEST_TIME)).toEqual({ id: "m1" });
    });

    // Scenario: hours_ago becomes an epoch-seconds timestamp
    it("should derive ts from hours_ago", () => {
        expect(toRawRecord({ text: "hello", hours_ago: 2 }, TEST_TIME)).toEqual({
            text: "hello",
            ts  : 1740996000,
        });
    });

    // Scenario: Explicit ts wins over hours_ago
    it("should prefer ts over hours_ago", () => {
        expect(toRawRecord({ ts: 1700000000, hours_ago: 2 }, TEST_TIME)).toEqual({ ts: 1700000000 });
    });
});

describe("isSystemMessage", () => {
    // Scenario: Bot posts and membership notices are not user messages
    it("should flag bot and channel membership subtypes", () => {
        expect(isSystemMessage({ subtype: "bot_message", text: "build #12 passed" })).toBe(true);
        expect(isSystemMessage({ subtype: "channel_join" })).toBe(true);
        expect(isSystemMessage({ subtype: "channel_leave" })).toBe(true);
        expect(isSystemMessage({ subtype: "thread_broadcast", text: "hi" })).toBe(false);
        expect(isSystemMessage({ text: "hi" })).toBe(false);
    });
});

describe("JsonRecordProvider", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    // Scenario: Wrapped record list, read in pages
    it("should page through records", async () => {
        mockReadFile.mockResolvedValue(JSON.stringify({
            messages: [
                { id: "a", text: "first" },
                "not a record",
                { id: "b", text: "second", hours_ago: 1 },
                { id: "c", text: "third" },
            ],
        }));
        const logger = createMockLogger();
        const provider = new JsonRecordProvider({ filePath: "/data/export.json", now: () => TEST_TIME, logger });

        await provider.initialize();

        expect(mockReadFile).toHaveBeenCalledWith("/data/export.json", "utf-8");
        expect(logger.warn).toHaveBeenCalledWith("Skipped entries that are not objects", {
            filePath: "/data/export.json",
            skipped : 1,
        });

        expect(await provider.getRecords({ limit: 2 })).toEqual({
            records: [
                { id: "a", text: "first" },
                { id: "b", text: "second", ts: 1740999600 },
            ],
            cursor : "2",
            hasMore: true,
        });
        expect(await provider.getRecords({ limit: 2 })).toEqual({
            records: [{ id: "c", text: "third" }],
            cursor : "3",
            hasMore: false,
        });
    });

    // Scenario: Export with a bot post and a join notice
    it("should skip bot and channel membership messages", async () => {
        mockReadFile.mockResolvedValue(JSON.stringify([
            { client_msg_id: "c-1", text: "deploy is stuck", reactions: [{ name: "eyes", count: 1 }] },
            { subtype: "bot_message", text: "build #12 passed" },
            { subtype: "channel_join", text: "<@U02> has joined the channel" },
        ]));
        const logger = createMockLogger();
        const provider = new JsonRecordProvider({ filePath: "/data/slack.json", logger });

        await provider.initialize();

        expect(await provider.getRecords()).toEqual({
            records: [{ id: "c-1", text: "deploy is stuck", reactions: ["eyes"] }],
            cursor : "1",
            hasMore: false,
        });
        expect(logger.info).toHaveBeenCalledWith("Skipped bot and channel membership messages", {
            filePath: "/data/slack.json",
            skipped : 2,
        });
        expect(logger.warn).not.toHaveBeenCalled();
    });

    // Scenario: Bare array file
    it("should accept a bare array", async () => {
        mockReadFile.mockResolvedValue(JSON.stringify([{ text: "only" }]));
        const provider = new JsonRecordProvider({ filePath: "/data/list.json" });

        await provider.initialize();

        expect(await provider.getRecords()).toEqual({
            records: [{ text: "only" }],
            cursor : "1",
            hasMore: false,
        });
    });

    // Scenario: File with another shape
    it("should reject a file that is not a record list", async () => {
        mockReadFile.mockResolvedValue(JSON.stringify({ items: [] }));
        const provider = new JsonRecordProvider({ filePath: "/data/bad.json" });

        await expect(provider.initialize()).rejects.toThrow(
            "Invalid record file /data/bad.json: expected an array or { \"messages\": [...] }"
        );
    });

    // Scenario: Reading before initialize, and after shutdown
    it("should require initialize before getRecords", async () => {
        mockReadFile.mockResolvedValue("[]");
        const provider = new JsonRecordProvider({ filePath: "/data/empty.json" });

        await expect(provider.getRecords()).rejects.toThrow(
            "JsonRecordProvider not initialized. Call initialize() first."
        );

        await provider.initialize();
        await provider.shutdown();

        await expect(provider.getRecords()).rejects.toThrow(
            "JsonRecordProvider not initialized. Call initialize() first."
        );
    });
});
