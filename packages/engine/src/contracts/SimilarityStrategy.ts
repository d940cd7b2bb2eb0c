/**
 * @fileoverview Similarity Strategy Contract
 *
 * How two normalized texts are compared. The similarity engine is
 * polymorphic over this: lexical-only and embedding-augmented modes are
 * two implementations, selected at construction.
 *
 * @module @triage/engine/contracts/SimilarityStrategy
 */

export interface SimilarityStrategy {
    /** Identifier used in logs and events */
    readonly id: string;

    /** Candidates scoring below this are discarded */
    readonly minSimilarity: number;

    /**
     * Combined similarity of two normalized texts, in [0, 1].
     * Must be symmetric in its arguments.
     */
    similarity(a: string, b: string): number;

    /**
     * Optional asynchronous warm-up with the normalized texts of an
     * upcoming batch. Awaited by the engine before processing starts.
     */
    prepare?(texts: readonly string[]): Promise<void>;
}
