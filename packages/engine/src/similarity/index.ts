/**
 * @fileoverview Similarity exports
 *
 * @module @triage/engine/similarity
 */

export { SimilarityEngine } from "./SimilarityEngine.js";
export type { SimilarityQuery } from "./SimilarityEngine.js";
export { LexicalSimilarity, jaccardSimilarity } from "./LexicalSimilarity.js";
export {
    EmbeddingSimilarity,
    cosineSimilarity,
    levenshteinDistance,
    fuzzySimilarity,
} from "./EmbeddingSimilarity.js";
export type { EmbeddingSimilarityOptions } from "./EmbeddingSimilarity.js";
