/**
 * @fileoverview Lexical Similarity
 *
 * Word-overlap (Jaccard) comparison. Needs no model, so it is the
 * default strategy.
 *
 * @module @triage/engine/similarity/LexicalSimilarity
 */

import type { SimilarityStrategy } from "../contracts/SimilarityStrategy.js";
import { splitWords } from "../text/tokens.js";

/**
 * Jaccard similarity of the word sets of two normalized texts.
 *
 * @returns |A ∩ B| / |A ∪ B|, or 0 when either text has no words
 */
export function jaccardSimilarity(a: string, b: string): number {
    const wordsA = new Set(splitWords(a));
    const wordsB = new Set(splitWords(b));

    if (wordsA.size === 0 || wordsB.size === 0) {
        return 0;
    }

    let intersection = 0;
    for (const word of wordsA) {
        if (wordsB.has(word)) {
            intersection++;
        }
    }

    return intersection / (wordsA.size + wordsB.size - intersection);
}

/**
 * Lexical-only similarity strategy.
 */
export class LexicalSimilarity implements SimilarityStrategy {
    readonly id = "lexical";
    readonly minSimilarity: number;

    /**
     * @param minSimilarity - Candidates below this Jaccard score are dropped
     */
    constructor(minSimilarity: number) {
        this.minSimilarity = minSimilarity;
    }

    similarity(a: string, b: string): number {
        return jaccardSimilarity(a, b);
    }
}
