/**
 * @fileoverview Category Rule Classifier
 *
 * Turns one CategoryDefinition into a ClassificationPlugin that scores
 * normalized text by keyword and pattern hits.
 *
 * @module @triage/engine/classification/RuleClassifier
 */

import type { CategoryDefinition } from "../contracts/CategoryDefinition.js";
import type { ClassificationPlugin, ClassificationContext } from "../contracts/ClassificationPlugin.js";
import type { ClassificationOutput } from "../contracts/ClassificationOutput.js";
import { createClassificationOutput } from "../contracts/ClassificationOutput.js";
import { normalizeText } from "../text/normalize.js";

/**
 * Options for rule classifiers.
 */
export interface RuleClassifierOptions {
    /** Score per matching pattern; each matching keyword scores 1 */
    readonly patternWeight: number;
}

/**
 * Create a ClassificationPlugin from a category definition.
 *
 * Keywords go through the text normalizer once here, so a keyword such
 * as `ci/cd` is compared in the same form as the text (`ci cd`). Each
 * keyword counts once however often it occurs. Patterns are compiled
 * case-insensitively and tested against the normalized text.
 *
 * @param category - Category rules
 * @param options - Scoring weights
 * @returns ClassificationPlugin scoring text for this category
 *
 * @example
 * ```typescript
 * const classifier = createCategoryClassifier(
 *     { name: "urgent", keywords: ["asap"], patterns: ["production.*down"], priorityBoost: 0.8, color: "#FF4757" },
 *     { patternWeight: 2 }
 * );
 *
 * classifier.classify("production is down fix asap");
 * // => { type: "urgent", score: 3, matched: ["asap", "production.*down"] }
 * ```
 */
export function createCategoryClassifier(
    category: CategoryDefinition,
    options: RuleClassifierOptions
): ClassificationPlugin {
    const keywords = category.keywords
        .map((keyword) => normalizeText(keyword))
        .filter((keyword) => keyword.length > 0);
    const patterns = category.patterns.map((source) => ({
        source,
        regex: new RegExp(source, "i"),
    }));

    return {
        id  : `category:${category.name}`,
        name: category.name,

        classify(text: string, context?: ClassificationContext): ClassificationOutput | null {
            const matched: string[] = [];
            let score = 0;

            for (const keyword of keywords) {
                if (text.includes(keyword)) {
                    score += 1;
                    matched.push(keyword);
                }
            }

            for (const pattern of patterns) {
                if (pattern.regex.test(text)) {
                    score += options.patternWeight;
                    matched.push(pattern.source);
                }
            }

            if (score === 0) {
                return null;
            }

            context?.logger.debug("Category rules matched", {
                category: category.name,
                score,
                matched,
            });

            return createClassificationOutput(category.name, score, matched);
        },
    };
}
