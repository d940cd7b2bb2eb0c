/**
 * @fileoverview Category Definition
 *
 * One entry of the fixed, ordered category rule set. Order matters:
 * on equal scores the category listed first wins.
 *
 * @module @triage/engine/contracts/CategoryDefinition
 */

/**
 * Category rule set entry.
 *
 * @example
 * ```typescript
 * const urgent: CategoryDefinition = {
 *     name         : "urgent",
 *     keywords     : ["urgent", "asap", "outage"],
 *     patterns     : ["production.*down"],
 *     priorityBoost: 0.8,
 *     color        : "#FF4757",
 * };
 * ```
 */
export interface CategoryDefinition {
    /** Category label, unique within the set */
    readonly name: string;

    /** Substrings counted once each when present in normalized text */
    readonly keywords: readonly string[];

    /** Regular expression sources, matched case-insensitively */
    readonly patterns: readonly string[];

    /** Added to the priority score of messages in this category */
    readonly priorityBoost: number;

    /** Display color (hex) */
    readonly color: string;

    /**
     * Marks the category assigned when no rule matches.
     * Exactly one category must set this, and its boost must be 0.
     */
    readonly fallback?: boolean;
}
