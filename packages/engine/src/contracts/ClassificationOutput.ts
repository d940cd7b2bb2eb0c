/**
 * Classification Output
 *
 * What a single category classifier reports about a message.
 * The categorizer compares raw scores across classifiers; confidence
 * is derived afterwards from the winning score.
 *
 * Design principles:
 * - Simple: the category is just a string
 * - Immutable: treat as read-only after creation
 * - Explainable: `matched` lists the rules that fired
 */

/**
 * Category label. Examples: "bug_report", "urgent", "question".
 */
export type CategoryName = string;

/**
 * Output from a ClassificationPlugin.
 *
 * @example
 * ```typescript
 * // Two keywords and one pattern matched
 * { type: "urgent", score: 4, matched: ["asap", "down", "production.*down"] }
 * ```
 */
export interface ClassificationOutput {
    /** The category this classifier speaks for */
    readonly type: CategoryName;

    /**
     * Raw rule score: keyword hits plus weighted pattern hits.
     * Always > 0; a classifier with nothing to report returns null.
     */
    readonly score: number;

    /**
     * Keywords and pattern sources that matched.
     * Informational only, never used to pick a winner.
     */
    readonly matched?: readonly string[];
}

/**
 * Factory function to create a ClassificationOutput.
 * Ensures the object is frozen (immutable).
 *
 * @param type - The category name
 * @param score - Raw rule score
 * @param matched - Optional list of rules that fired
 * @returns Frozen ClassificationOutput object
 */
export function createClassificationOutput(
    type: CategoryName,
    score: number,
    matched?: readonly string[]
): ClassificationOutput {
    const output: ClassificationOutput = {
        type,
        score,
        ...(matched && { matched: Object.freeze([...matched]) }),
    };

    return Object.freeze(output);
}
