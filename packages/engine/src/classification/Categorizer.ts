/**
 * @fileoverview Categorizer
 *
 * Scores normalized text against every category and picks one.
 *
 * Selection rules:
 * - Highest raw score wins
 * - On equal scores the category listed first in the configuration wins
 * - Nothing matched: the fallback category, at the fallback confidence
 *
 * @module @triage/engine/classification/Categorizer
 */

import type { CategoryDefinition } from "../contracts/CategoryDefinition.js";
import type { ClassificationContext, ClassificationPlugin } from "../contracts/ClassificationPlugin.js";
import type { CategorizerSettings } from "../config/TriageConfig.js";
import { ConfigurationError } from "../errors/ConfigurationError.js";
import { createCategoryClassifier } from "./RuleClassifier.js";

/**
 * Result of categorizing one text.
 */
export interface CategoryAssignment {
    /** Winning category name */
    readonly category: string;

    /** min(score / normalization, 1), or the fallback confidence */
    readonly confidence: number;

    /** Raw winning score (0 when the fallback was forced) */
    readonly score: number;

    /** Rules of the winning category that matched */
    readonly matched: readonly string[];
}

/**
 * Rule-based categorizer over a fixed, ordered category set.
 *
 * @example
 * ```typescript
 * const categorizer = new Categorizer(config.categories, config.categorizer);
 *
 * categorizer.categorize(normalizeText("Production is DOWN, urgent help!"));
 * // => { category: "urgent", confidence: 1, score: 7, matched: [...] }
 * ```
 */
export class Categorizer {
    private readonly classifiers: readonly ClassificationPlugin[];
    private readonly fallback: CategoryDefinition;
    private readonly settings: CategorizerSettings;

    /**
     * @param categories - Ordered category rule set (must contain one fallback)
     * @param settings - Pattern weight and confidence calibration
     * @throws ConfigurationError if no fallback category is configured
     */
    constructor(categories: readonly CategoryDefinition[], settings: CategorizerSettings) {
        const fallback = categories.find((category) => category.fallback === true);
        if (!fallback) {
            throw new ConfigurationError("no fallback category");
        }

        this.fallback = fallback;
        this.settings = settings;
        this.classifiers = categories.map((category) =>
            createCategoryClassifier(category, { patternWeight: settings.patternWeight })
        );
    }

    /**
     * Categorize normalized text.
     *
     * Never throws; every text gets exactly one category.
     *
     * @param text - Output of the text normalizer
     * @param context - Optional logger and trace ID for rule-level debugging
     */
    categorize(text: string, context?: ClassificationContext): CategoryAssignment {
        let winner: { type: string; score: number; matched: readonly string[] } | null = null;

        // Strict comparison keeps the earliest category on ties
        for (const classifier of this.classifiers) {
            const output = classifier.classify(text, context);
            if (output && (winner === null || output.score > winner.score)) {
                winner = {
                    type   : output.type,
                    score  : output.score,
                    matched: output.matched ?? [],
                };
            }
        }

        if (winner === null) {
            return {
                category  : this.fallback.name,
                confidence: this.settings.fallbackConfidence,
                score     : 0,
                matched   : [],
            };
        }

        return {
            category  : winner.type,
            confidence: Math.min(winner.score / this.settings.normalization, 1.0),
            score     : winner.score,
            matched   : winner.matched,
        };
    }
}
