/**
 * @fileoverview Priority Scorer
 *
 * Additive urgency estimate over independent signals. Each signal is
 * capped on its own and the total is clamped to [0, 1].
 *
 * @module @triage/engine/scoring/PriorityScorer
 */

import type { CategoryDefinition } from "../contracts/CategoryDefinition.js";
import type { MessageMetadata } from "../contracts/Message.js";
import type { PriorityWeights } from "../config/TriageConfig.js";
import { normalizeText } from "../text/normalize.js";

const kMS_PER_HOUR = 60 * 60 * 1000;

/**
 * What the scorer needs to know about a message.
 * Timestamp and reactions are optional; absent signals contribute 0.
 */
export interface ScoringInput {
    /** Normalized message text */
    readonly text: string;

    readonly timestamp?: MessageMetadata["timestamp"];
    readonly reactions?: MessageMetadata["reactions"];
}

/**
 * Contribution of each signal, for logging and explanation.
 */
export interface PriorityBreakdown {
    readonly categoryBoost: number;
    readonly urgency: number;
    readonly questions: number;
    readonly exclamations: number;
    readonly length: number;
    readonly recency: number;
    readonly reactions: number;

    /** Sum of all signals clamped to [0, 1] */
    readonly total: number;
}

function countOccurrences(text: string, character: string): number {
    let count = 0;
    for (const c of text) {
        if (c === character) {
            count++;
        }
    }
    return count;
}

function clamp01(value: number): number {
    return Math.min(Math.max(value, 0), 1);
}

/**
 * Priority scorer with a configurable weight table.
 *
 * @example
 * ```typescript
 * const scorer = new PriorityScorer(config.priority);
 *
 * scorer.score({ text: "is the api down?", timestamp: new Date() }, urgentCategory);
 * // => 1  (0.8 boost + 0.2 urgency + 0.1 question + 0.15 recency, clamped)
 * ```
 */
export class PriorityScorer {
    private readonly weights: PriorityWeights;
    private readonly now: () => Date;
    private readonly urgentTerms: readonly string[];
    private readonly lengthTiers: PriorityWeights["lengthTiers"];
    private readonly recencyTiers: PriorityWeights["recencyTiers"];

    /**
     * @param weights - Weight table
     * @param now - Clock used for the recency signal
     */
    constructor(weights: PriorityWeights, now: () => Date = () => new Date()) {
        this.weights = weights;
        this.now = now;

        // Compared against normalized text, so normalized the same way
        this.urgentTerms = weights.urgentTerms
            .map((term) => normalizeText(term))
            .filter((term) => term.length > 0);

        // Highest length threshold first, youngest age limit first
        this.lengthTiers  = [...weights.lengthTiers].sort((a, b) => b.minLength - a.minLength);
        this.recencyTiers = [...weights.recencyTiers].sort((a, b) => a.maxAgeHours - b.maxAgeHours);
    }

    /**
     * Score a message.
     *
     * @param input - Normalized text plus optional timestamp and reactions
     * @param category - Assigned category (supplies the boost)
     * @returns Priority in [0, 1]
     */
    score(input: ScoringInput, category: CategoryDefinition | undefined): number {
        return this.explain(input, category).total;
    }

    /**
     * Score a message and report each signal's contribution.
     */
    explain(input: ScoringInput, category: CategoryDefinition | undefined): PriorityBreakdown {
        const { text } = input;
        const w = this.weights;

        const categoryBoost = category?.priorityBoost ?? 0;

        // Once, however many urgent terms appear
        const urgency = this.urgentTerms.some((term) => text.includes(term)) ? w.urgencyBonus : 0;

        const questions    = Math.min(countOccurrences(text, "?") * w.questionStep, w.questionCap);
        const exclamations = Math.min(countOccurrences(text, "!") * w.exclamationStep, w.exclamationCap);

        const length = this.lengthTiers.find((tier) => text.length > tier.minLength)?.bonus ?? 0;

        const recency = this.recencyBonus(input.timestamp);

        const reactionCount = input.reactions?.length ?? 0;
        const reactions = reactionCount >= w.reactionMinCount
            ? Math.min(reactionCount * w.reactionStep, w.reactionCap)
            : 0;

        const total = clamp01(categoryBoost + urgency + questions + exclamations + length + recency + reactions);

        return { categoryBoost, urgency, questions, exclamations, length, recency, reactions, total };
    }

    private recencyBonus(timestamp: Date | undefined): number {
        if (!timestamp || Number.isNaN(timestamp.getTime())) {
            return 0;
        }

        const hoursOld = (this.now().getTime() - timestamp.getTime()) / kMS_PER_HOUR;
        return this.recencyTiers.find((tier) => hoursOld < tier.maxAgeHours)?.bonus ?? 0;
    }
}
