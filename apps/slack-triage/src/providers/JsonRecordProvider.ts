/**
 * @fileoverview JSON Record Provider
 *
 * Serves message records from a chat-export style JSON file, either a
 * bare array of records or `{ "messages": [...] }`.
 *
 * Entries follow the Slack export shape: reactions are `{ name, count }`
 * objects (plain strings are accepted too), `client_msg_id` stands in for
 * a missing `id`, and bot or join/leave messages are skipped.
 *
 * Besides the regular record fields an entry may carry `hours_ago`
 * instead of `ts`; it is turned into an epoch-seconds timestamp relative
 * to the provider clock so fixtures stay fresh.
 *
 * @module slack-triage/providers/JsonRecordProvider
 */

import { readFile } from "fs/promises";
import type {
    EngineLogger,
    FetchOptions,
    FetchResult,
    RawMessageRecord,
    RecordProvider,
} from "@triage/engine";

const kDEFAULT_LIMIT = 50;

/** Export message subtypes that are not user messages */
const kSKIPPED_SUBTYPES: ReadonlySet<string> = new Set(["bot_message", "channel_join", "channel_leave"]);

/**
 * Configuration for the JSON record provider
 */
export interface JsonRecordProviderConfig {
    /** Path to the JSON file */
    readonly filePath: string;

    /** Clock for `hours_ago` entries (default: system time) */
    readonly now?: () => Date;

    /** Reports skipped entries */
    readonly logger?: Pick<EngineLogger, "info" | "warn">;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
    return typeof value === "string" ? value : undefined;
}

function reactionName(reaction: unknown): string | undefined {
    if (typeof reaction === "string") {
        return reaction;
    }
    return isObject(reaction) ? optionalString(reaction.name) : undefined;
}

/**
 * Whether an export entry is a bot or channel membership message.
 */
export function isSystemMessage(entry: JsonObject): boolean {
    return typeof entry.subtype === "string" && kSKIPPED_SUBTYPES.has(entry.subtype);
}

/**
 * Keep the fields the engine understands, each only when well-typed.
 */
export function toRawRecord(entry: JsonObject, now: Date): RawMessageRecord {
    let ts: number | string | undefined;
    if (typeof entry.ts === "number" || typeof entry.ts === "string") {
        ts = entry.ts;
    }
    else if (typeof entry.hours_ago === "number" && Number.isFinite(entry.hours_ago)) {
        ts = now.getTime() / 1000 - entry.hours_ago * 3600;
    }

    const reactions = Array.isArray(entry.reactions)
        ? entry.reactions.flatMap((reaction: unknown) => {
            const name = reactionName(reaction);
            return name === undefined ? [] : [name];
        })
        : undefined;

    const id       = optionalString(entry.id) ?? optionalString(entry.client_msg_id);
    const text     = optionalString(entry.text);
    const user     = optionalString(entry.user);
    const channel  = optionalString(entry.channel);
    const threadTs = optionalString(entry.thread_ts);

    return {
        ...(id !== undefined && { id }),
        ...(text !== undefined && { text }),
        ...(user !== undefined && { user }),
        ...(channel !== undefined && { channel }),
        ...(ts !== undefined && { ts }),
        ...(threadTs !== undefined && { thread_ts: threadTs }),
        ...(reactions !== undefined && { reactions }),
    };
}

/**
 * Record provider over a JSON file.
 *
 * @example
 * ```typescript
 * const provider = new JsonRecordProvider({ filePath: "./data/export.json" });
 * const processed = await engine.drain(provider);
 * ```
 */
export class JsonRecordProvider implements RecordProvider {
    readonly id = "json-file";
    readonly name = "JSON Record File";

    private readonly config: JsonRecordProviderConfig;
    private records: RawMessageRecord[] | null = null;
    private offset = 0;

    constructor(config: JsonRecordProviderConfig) {
        this.config = config;
    }

    /**
     * Read and parse the file.
     *
     * @throws Error if the file is unreadable or not a record list
     */
    async initialize(): Promise<void> {
        const content = await readFile(this.config.filePath, "utf-8");
        const parsed: unknown = JSON.parse(content);

        let entries: unknown[];
        if (Array.isArray(parsed)) {
            entries = parsed;
        }
        else if (isObject(parsed) && Array.isArray(parsed.messages)) {
            entries = parsed.messages;
        }
        else {
            throw new Error(`Invalid record file ${this.config.filePath}: expected an array or { "messages": [...] }`);
        }

        const now = this.config.now?.() ?? new Date();
        const objects = entries.filter(isObject);
        const records = objects
            .filter((entry) => !isSystemMessage(entry))
            .map((entry) => toRawRecord(entry, now));

        const malformed = entries.length - objects.length;
        if (malformed > 0) {
            this.config.logger?.warn("Skipped entries that are not objects", {
                filePath: this.config.filePath,
                skipped : malformed,
            });
        }

        const system = objects.length - records.length;
        if (system > 0) {
            this.config.logger?.info("Skipped bot and channel membership messages", {
                filePath: this.config.filePath,
                skipped : system,
            });
        }

        this.records = records;
        this.offset = 0;
    }

    async getRecords(options: FetchOptions = {}): Promise<FetchResult> {
        if (this.records === null) {
            throw new Error("JsonRecordProvider not initialized. Call initialize() first.");
        }

        const limit = options.limit ?? kDEFAULT_LIMIT;
        const records = this.records.slice(this.offset, this.offset + limit);
        this.offset += records.length;

        return {
            records,
            cursor : String(this.offset),
            hasMore: this.offset < this.records.length,
        };
    }

    async shutdown(): Promise<void> {
        this.records = null;
        this.offset = 0;
    }
}
