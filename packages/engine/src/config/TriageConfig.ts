/**
 * @fileoverview Triage Configuration
 *
 * Everything that used to be hard-coded in the analyzer: category rules,
 * the priority weight table and similarity thresholds.
 *
 * @module @triage/engine/config/TriageConfig
 */

import type { CategoryDefinition } from "../contracts/CategoryDefinition.js";

/**
 * Categorizer calibration.
 */
export interface CategorizerSettings {
    /** Score added per matching regex pattern (keywords add 1) */
    readonly patternWeight: number;

    /** Confidence = min(score / normalization, 1) */
    readonly normalization: number;

    /** Confidence reported when the fallback category is forced */
    readonly fallbackConfidence: number;
}

/**
 * Bonus applied when normalized text is longer than `minLength`.
 */
export interface LengthTier {
    readonly minLength: number;
    readonly bonus: number;
}

/**
 * Bonus applied when the message is younger than `maxAgeHours`.
 */
export interface RecencyTier {
    readonly maxAgeHours: number;
    readonly bonus: number;
}

/**
 * Priority weight table.
 */
export interface PriorityWeights {
    /** Any one of these present adds `urgencyBonus` once */
    readonly urgentTerms: readonly string[];
    readonly urgencyBonus: number;

    readonly questionStep: number;
    readonly questionCap: number;

    readonly exclamationStep: number;
    readonly exclamationCap: number;

    /** Only the highest tier exceeded applies */
    readonly lengthTiers: readonly LengthTier[];

    /** Only the tightest tier satisfied applies */
    readonly recencyTiers: readonly RecencyTier[];

    readonly reactionStep: number;
    readonly reactionCap: number;

    /** Reactions count only from this many on */
    readonly reactionMinCount: number;
}

/**
 * Similarity search settings.
 */
export interface SimilaritySettings {
    /** Default number of matches returned */
    readonly topK: number;

    /** Minimum Jaccard score in lexical mode */
    readonly lexicalThreshold: number;

    /** Minimum blended score in embedding mode */
    readonly embeddingThreshold: number;

    /** Weight of embedding cosine in embedding mode */
    readonly semanticWeight: number;

    /** Weight of edit-distance similarity in embedding mode */
    readonly fuzzyWeight: number;
}

/**
 * Complete engine configuration.
 */
export interface TriageConfig {
    /** Ordered category rule set */
    readonly categories: readonly CategoryDefinition[];

    readonly categorizer: CategorizerSettings;
    readonly priority: PriorityWeights;
    readonly similarity: SimilaritySettings;
}

function isUnitInterval(value: number): boolean {
    return Number.isFinite(value) && value >= 0 && value <= 1;
}

function isNonNegative(value: number): boolean {
    return Number.isFinite(value) && value >= 0;
}

/**
 * Check a configuration for problems that would leave categorization,
 * scoring or search undefined.
 *
 * @param config - Configuration to check
 * @returns Problems found; empty when the configuration is usable
 */
export function validateTriageConfig(config: TriageConfig): string[] {
    const issues: string[] = [];
    const { categories, categorizer, priority, similarity } = config;

    if (categories.length === 0) {
        issues.push("category set is empty");
    }

    const seen = new Set<string>();
    for (const category of categories) {
        if (!category.name) {
            issues.push("category with empty name");
            continue;
        }
        if (seen.has(category.name)) {
            issues.push(`duplicate category '${category.name}'`);
        }
        seen.add(category.name);

        if (!isUnitInterval(category.priorityBoost)) {
            issues.push(`category '${category.name}': priority boost must be within [0, 1]`);
        }

        for (const pattern of category.patterns) {
            try {
                new RegExp(pattern, "i");
            }
            catch (error) {
                issues.push(`category '${category.name}': invalid pattern '${pattern}' (${error instanceof Error ? error.message : String(error)})`);
            }
        }
    }

    const fallbacks = categories.filter((category) => category.fallback === true);
    if (categories.length > 0 && fallbacks.length === 0) {
        issues.push("no fallback category");
    }
    else if (fallbacks.length > 1) {
        issues.push(`more than one fallback category: ${fallbacks.map((c) => c.name).join(", ")}`);
    }
    for (const fallback of fallbacks) {
        if (fallback.priorityBoost !== 0) {
            issues.push(`fallback category '${fallback.name}' must have a zero priority boost`);
        }
    }

    if (!(categorizer.normalization > 0)) {
        issues.push("categorizer normalization must be positive");
    }
    if (!isNonNegative(categorizer.patternWeight)) {
        issues.push("categorizer pattern weight must be non-negative");
    }
    if (!isUnitInterval(categorizer.fallbackConfidence)) {
        issues.push("fallback confidence must be within [0, 1]");
    }

    const weights: Array<[string, number]> = [
        ["urgency bonus", priority.urgencyBonus],
        ["question step", priority.questionStep],
        ["question cap", priority.questionCap],
        ["exclamation step", priority.exclamationStep],
        ["exclamation cap", priority.exclamationCap],
        ["reaction step", priority.reactionStep],
        ["reaction cap", priority.reactionCap],
        ["reaction minimum count", priority.reactionMinCount],
        ...priority.lengthTiers.flatMap((tier): Array<[string, number]> => [
            ["length tier threshold", tier.minLength],
            ["length tier bonus", tier.bonus],
        ]),
        ...priority.recencyTiers.flatMap((tier): Array<[string, number]> => [
            ["recency tier age", tier.maxAgeHours],
            ["recency tier bonus", tier.bonus],
        ]),
    ];
    for (const [label, value] of weights) {
        if (!isNonNegative(value)) {
            issues.push(`priority ${label} must be non-negative`);
        }
    }

    if (!Number.isInteger(similarity.topK) || similarity.topK < 1) {
        issues.push("similarity top_k must be a positive integer");
    }
    if (!isUnitInterval(similarity.lexicalThreshold) || !isUnitInterval(similarity.embeddingThreshold)) {
        issues.push("similarity thresholds must be within [0, 1]");
    }
    if (!isNonNegative(similarity.semanticWeight) || !isNonNegative(similarity.fuzzyWeight)
        || similarity.semanticWeight + similarity.fuzzyWeight === 0) {
        issues.push("similarity weights must be non-negative and not both zero");
    }

    return issues;
}
