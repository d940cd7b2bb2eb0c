/**
 * @fileoverview Similarity Engine
 *
 * Ranks stored messages by similarity to a query message.
 *
 * Ranking rules:
 * - Candidates scoring below the strategy threshold are dropped
 * - Highest score first; equal scores keep store (insertion) order
 * - Messages sharing the query's id are never returned
 *
 * Every query scans the whole store, so a batch of n messages costs
 * O(n²) comparisons.
 *
 * @module @triage/engine/similarity/SimilarityEngine
 */

import type { SimilarityMatch } from "../contracts/SimilarityMatch.js";
import type { SimilarityStrategy } from "../contracts/SimilarityStrategy.js";
import type { MessageStore } from "../store/MessageStore.js";
import { extractSharedKeyPhrases, textPreview } from "../text/tokens.js";

/**
 * Query shape: only the id and normalized text are needed.
 */
export interface SimilarityQuery {
    readonly id: string;
    readonly normalizedText: string;
}

/**
 * Round to three decimals for reporting.
 */
function roundScore(score: number): number {
    return Math.round(score * 1000) / 1000;
}

export class SimilarityEngine {
    readonly strategy: SimilarityStrategy;

    private readonly store: MessageStore;
    private readonly defaultTopK: number;

    /**
     * @param store - Messages to search
     * @param strategy - Lexical or embedding-augmented scoring
     * @param defaultTopK - Result count when `findSimilar` gets none
     */
    constructor(store: MessageStore, strategy: SimilarityStrategy, defaultTopK = 5) {
        this.store       = store;
        this.strategy    = strategy;
        this.defaultTopK = defaultTopK;
    }

    /**
     * Find the stored messages most similar to `message`.
     *
     * @param message - Query message (need not be in the store)
     * @param topK - Maximum number of matches
     * @returns Matches ranked by score, at most `topK`; `[]` for an empty store
     */
    findSimilar(message: SimilarityQuery, topK: number = this.defaultTopK): SimilarityMatch[] {
        if (topK <= 0) {
            return [];
        }

        const scored: Array<{ index: number; score: number }> = [];
        const candidates = this.store.all();

        candidates.forEach((candidate, index) => {
            if (candidate.id === message.id) {
                return;
            }

            const score = this.strategy.similarity(message.normalizedText, candidate.normalizedText);
            if (score >= this.strategy.minSimilarity) {
                scored.push({ index, score });
            }
        });

        // Array.prototype.sort is stable, so equal scores stay in store order
        scored.sort((a, b) => b.score - a.score);

        return scored.slice(0, topK).map(({ index, score }) => {
            const candidate = candidates[index];
            return {
                ticketId       : candidate.id,
                similarityScore: roundScore(score),
                category       : candidate.category,
                keyPhrases     : extractSharedKeyPhrases(message.normalizedText, candidate.normalizedText),
                textPreview    : textPreview(candidate.content),
            };
        });
    }
}
