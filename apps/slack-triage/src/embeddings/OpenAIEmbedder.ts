/**
 * OpenAI embedding capability
 *
 * Fetches sentence embeddings in batches ahead of processing, then
 * serves them synchronously from memory.
 */

import OpenAI from "openai";
import { textPreview, type Embedder, type EngineLogger } from "@triage/engine";

/**
 * Configuration options for the OpenAI embedder
 */
export interface OpenAIEmbedderConfig {
    /** OpenAI API key (defaults to OPENAI_API_KEY env var) */
    apiKey?: string;

    /** Embedding model (default: text-embedding-3-small) */
    model?: string;

    /** Vector length requested from the model (default: 1536) */
    dimensions?: number;

    /** Texts per API request (default: 100) */
    batchSize?: number;

    /** Reports texts dropped after a failed request */
    logger?: Pick<EngineLogger, "warn">;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Embedder backed by the OpenAI embeddings endpoint.
 *
 * `embed` never calls the network: texts must have gone through
 * `prefetch` first. Empty text maps to the zero vector, which the API
 * would reject.
 *
 * When a batch request fails, its texts are retried one per request so
 * a single rejected text (too long, say) stays uncached on its own. If
 * every text of the batch fails alone as well, the last error is thrown.
 */
export class OpenAIEmbedder implements Embedder {
    readonly id: string;
    readonly dimensions: number;

    private client: OpenAI;
    private readonly model: string;
    private readonly batchSize: number;
    private readonly logger?: Pick<EngineLogger, "warn">;
    private readonly vectors: Map<string, readonly number[]> = new Map();

    constructor(config: OpenAIEmbedderConfig = {}) {
        this.client = new OpenAI({
            apiKey: config.apiKey ?? process.env.OPENAI_API_KEY,
        });

        this.model      = config.model ?? "text-embedding-3-small";
        this.dimensions = config.dimensions ?? 1536;
        this.batchSize  = config.batchSize ?? 100;
        this.id         = `openai:${this.model}`;
        this.logger     = config.logger;
    }

    /**
     * Fetch embeddings for every text not cached yet.
     */
    async prefetch(texts: readonly string[]): Promise<void> {
        const pending = [...new Set(texts)].filter((text) => text.length > 0 && !this.vectors.has(text));

        for (let start = 0; start < pending.length; start += this.batchSize) {
            const batch = pending.slice(start, start + this.batchSize);

            try {
                await this.request(batch);
            }
            catch (error) {
                if (batch.length === 1) {
                    throw error;
                }
                await this.requestEach(batch);
            }
        }
    }

    private async request(batch: readonly string[]): Promise<void> {
        const response = await this.client.embeddings.create({
            model     : this.model,
            input     : [...batch],
            dimensions: this.dimensions,
        });

        for (const item of response.data) {
            const text = batch[item.index];
            if (text === undefined) {
                throw new Error(`OpenAI returned an embedding for unknown input index ${item.index}`);
            }
            this.vectors.set(text, item.embedding);
        }
    }

    private async requestEach(batch: readonly string[]): Promise<void> {
        let lastError: unknown;
        let failed = 0;

        for (const text of batch) {
            try {
                await this.request([text]);
            }
            catch (error) {
                lastError = error;
                failed++;
                this.logger?.warn("Embedding request failed, text left uncached", {
                    text : textPreview(text),
                    error: errorMessage(error),
                });
            }
        }

        if (failed === batch.length) {
            throw lastError;
        }
    }

    /**
     * @throws Error if the text was never prefetched
     */
    embed(text: string): readonly number[] {
        if (text.length === 0) {
            return new Array<number>(this.dimensions).fill(0);
        }

        const vector = this.vectors.get(text);
        if (!vector) {
            throw new Error(`No embedding prefetched for "${textPreview(text)}"`);
        }
        return vector;
    }

    /**
     * Number of texts with a cached embedding.
     */
    get size(): number {
        return this.vectors.size;
    }
}
