/**
 * RecordProvider Contract
 *
 * Record providers are passive data sources. The engine pulls raw
 * records from a provider in batches when draining it.
 *
 * Design principles:
 * - Passive: providers don't push; the engine pulls
 * - Cursor-tracking: providers remember what they already handed out
 * - Async at the edge only: fetching may do I/O, processing never does
 */

import type { RawMessageRecord } from "./Message.js";

/**
 * Options for fetching records.
 */
export interface FetchOptions {
    /** Maximum number of records to fetch */
    readonly limit?: number;
}

/**
 * Result of fetching records.
 */
export interface FetchResult {
    /** Records fetched, in source order */
    readonly records: readonly RawMessageRecord[];

    /** Cursor for the next fetch (provider-specific) */
    readonly cursor?: string;

    /** Whether there are more records available */
    readonly hasMore: boolean;
}

/**
 * RecordProvider interface.
 *
 * @example
 * ```typescript
 * class ExportFileProvider implements RecordProvider {
 *     readonly id = "export-file";
 *     readonly name = "Chat export file";
 *
 *     async getRecords(options?: FetchOptions) {
 *         const page = this.rows.slice(this.offset, this.offset + (options?.limit ?? 50));
 *         this.offset += page.length;
 *         return { records: page, hasMore: this.offset < this.rows.length };
 *     }
 * }
 * ```
 */
export interface RecordProvider {
    /** Unique identifier for this provider */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /**
     * Initialize the provider.
     * Called once before the first fetch.
     */
    initialize?(): Promise<void>;

    /**
     * Fetch the next batch of records.
     *
     * @param options - Fetch options
     * @returns Fetch result with records and cursor
     */
    getRecords(options?: FetchOptions): Promise<FetchResult>;

    /**
     * Shutdown the provider.
     * Called once after the last fetch.
     */
    shutdown?(): Promise<void>;
}
