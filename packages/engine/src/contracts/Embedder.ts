/**
 * @fileoverview Embedder Contract
 *
 * Sentence-embedding capability used by the embedding-augmented
 * similarity strategy. The engine never depends on a model directly.
 *
 * @module @triage/engine/contracts/Embedder
 */

/**
 * Maps text to a fixed-length dense vector.
 *
 * `embed` is synchronous because the pipeline is. Embedders backed by a
 * remote model fetch vectors ahead of time in `prefetch`, which the
 * engine awaits before each batch, and serve `embed` from that cache.
 *
 * @example
 * ```typescript
 * const embedder: Embedder = {
 *     id        : "fixed",
 *     dimensions: 3,
 *     embed     : (text) => text.includes("down") ? [1, 0, 0] : [0, 1, 0],
 * };
 * ```
 */
export interface Embedder {
    /** Identifier used in logs */
    readonly id: string;

    /** Length of every vector returned by `embed` */
    readonly dimensions: number;

    /**
     * Embed one normalized text.
     *
     * @throws Error if the vector is unavailable (e.g. not prefetched)
     */
    embed(text: string): readonly number[];

    /**
     * Fetch vectors for texts that are about to be embedded.
     */
    prefetch?(texts: readonly string[]): Promise<void>;
}
