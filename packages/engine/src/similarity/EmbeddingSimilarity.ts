/**
 * @fileoverview Embedding Similarity
 *
 * Blends cosine similarity of sentence embeddings with an edit-distance
 * signal. Vectors are cached per normalized text, so each distinct text
 * is embedded once for the lifetime of the strategy.
 *
 * @module @triage/engine/similarity/EmbeddingSimilarity
 */

import type { Embedder } from "../contracts/Embedder.js";
import type { SimilarityStrategy } from "../contracts/SimilarityStrategy.js";

/**
 * Cosine similarity of two vectors; 0 for mismatched or zero vectors.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length || a.length === 0) {
        return 0;
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot   += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    return denominator === 0 ? 0 : dot / denominator;
}

/**
 * Levenshtein edit distance (insert, delete, substitute all cost 1).
 */
export function levenshteinDistance(a: string, b: string): number {
    if (a === b) {
        return 0;
    }
    if (a.length === 0) {
        return b.length;
    }
    if (b.length === 0) {
        return a.length;
    }

    // Two rolling rows over the shorter string
    const [long, short] = a.length >= b.length ? [a, b] : [b, a];
    let previous = Array.from({ length: short.length + 1 }, (_, j) => j);
    let current  = new Array<number>(short.length + 1).fill(0);

    for (let i = 1; i <= long.length; i++) {
        current[0] = i;
        for (let j = 1; j <= short.length; j++) {
            const substitution = long[i - 1] === short[j - 1] ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,
                current[j - 1] + 1,
                previous[j - 1] + substitution
            );
        }
        [previous, current] = [current, previous];
    }

    return previous[short.length];
}

/**
 * Edit-distance similarity normalized to [0, 1]: 1 − distance / longer length.
 * Two empty strings are identical (1).
 */
export function fuzzySimilarity(a: string, b: string): number {
    const longest = Math.max(a.length, b.length);
    if (longest === 0) {
        return 1;
    }
    return 1 - levenshteinDistance(a, b) / longest;
}

/**
 * Options for the embedding strategy.
 */
export interface EmbeddingSimilarityOptions {
    /** Blended score threshold */
    readonly minSimilarity: number;

    /** Weight of the cosine signal */
    readonly semanticWeight: number;

    /** Weight of the edit-distance signal */
    readonly fuzzyWeight: number;
}

/**
 * Embedding-augmented similarity strategy.
 *
 * score = (semanticWeight × cosine + fuzzyWeight × fuzzy) / (semanticWeight + fuzzyWeight),
 * clamped to [0, 1]. With the default 0.7 / 0.3 weights the divisor is 1.
 *
 * @example
 * ```typescript
 * const strategy = new EmbeddingSimilarity(embedder, {
 *     minSimilarity : 0.3,
 *     semanticWeight: 0.7,
 *     fuzzyWeight   : 0.3,
 * });
 * ```
 */
export class EmbeddingSimilarity implements SimilarityStrategy {
    readonly id: string;
    readonly minSimilarity: number;

    private readonly embedder: Embedder;
    private readonly semanticWeight: number;
    private readonly fuzzyWeight: number;
    private readonly vectors: Map<string, readonly number[]> = new Map();

    constructor(embedder: Embedder, options: EmbeddingSimilarityOptions) {
        this.id             = `embedding:${embedder.id}`;
        this.embedder       = embedder;
        this.minSimilarity  = options.minSimilarity;
        this.semanticWeight = options.semanticWeight;
        this.fuzzyWeight    = options.fuzzyWeight;
    }

    async prepare(texts: readonly string[]): Promise<void> {
        const missing = [...new Set(texts)].filter((text) => !this.vectors.has(text));
        if (missing.length > 0 && this.embedder.prefetch) {
            await this.embedder.prefetch(missing);
        }
    }

    similarity(a: string, b: string): number {
        const semantic = cosineSimilarity(this.vector(a), this.vector(b));
        const fuzzy    = fuzzySimilarity(a, b);
        const blended  = (this.semanticWeight * semantic + this.fuzzyWeight * fuzzy)
            / (this.semanticWeight + this.fuzzyWeight);

        return Math.min(Math.max(blended, 0), 1);
    }

    /**
     * Number of distinct texts embedded so far.
     */
    get cachedVectors(): number {
        return this.vectors.size;
    }

    private vector(text: string): readonly number[] {
        const cached = this.vectors.get(text);
        if (cached) {
            return cached;
        }

        const vector = this.embedder.embed(text);
        if (vector.length !== this.embedder.dimensions) {
            throw new Error(
                `Embedder ${this.embedder.id} returned ${vector.length} dimensions, expected ${this.embedder.dimensions}`
            );
        }

        this.vectors.set(text, vector);
        return vector;
    }
}
