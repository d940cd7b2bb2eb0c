/**
 * @fileoverview Batch summary
 *
 * Histograms and top-N rankings over processed messages.
 *
 * @module @triage/engine/analytics/summarize
 */

import type { ProcessedMessage } from "../contracts/Message.js";
import { splitWords } from "../text/tokens.js";

const kHIGH_PRIORITY = 0.7;
const kMEDIUM_PRIORITY = 0.3;
const kRECENT_WINDOW_MS = 24 * 60 * 60 * 1000;

/**
 * A key with its occurrence count.
 */
export interface RankedCount {
    readonly key: string;
    readonly count: number;
}

/**
 * Message counts per priority tier.
 * high: p > 0.7, medium: 0.3 < p ≤ 0.7, low: p ≤ 0.3
 */
export interface PriorityDistribution {
    readonly high: number;
    readonly medium: number;
    readonly low: number;
}

export interface BatchSummary {
    readonly totalMessages: number;

    /** Count per category, in order of first appearance */
    readonly categories: Readonly<Record<string, number>>;

    readonly priorityDistribution: PriorityDistribution;
    readonly topUsers: readonly RankedCount[];
    readonly topChannels: readonly RankedCount[];
    readonly topWords: readonly RankedCount[];

    /** Mean priority score, 0 when there are no messages */
    readonly averagePriority: number;

    /** Messages posted in the 24 hours before `now` */
    readonly recentMessages: number;
}

export interface SummaryOptions {
    /** Reference time for the recent-message window (default: system time) */
    readonly now?: Date;

    /** Default 5 */
    readonly topUsers?: number;

    /** Default 5 */
    readonly topChannels?: number;

    /** Default 10 */
    readonly topWords?: number;
}

/**
 * Rank keys by count, descending. Equal counts keep first-seen order.
 */
function topN(counts: ReadonlyMap<string, number>, limit: number): RankedCount[] {
    return [...counts.entries()]
        .map(([key, count]) => ({ key, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, Math.max(limit, 0));
}

function increment(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Words counted for the top-words ranking: normalized words with the
 * sentence punctuation the normalizer keeps stripped off.
 */
function countableWords(normalizedText: string): string[] {
    return splitWords(normalizedText)
        .map((word) => word.replace(/^[?!.]+|[?!.]+$/g, ""))
        .filter((word) => word.length > 0);
}

/**
 * Summarize processed messages.
 *
 * @example
 * ```typescript
 * const summary = summarizeMessages(engine.getMessages());
 * summary.priorityDistribution;
 * // => { high: 2, medium: 5, low: 3 }
 * ```
 */
export function summarizeMessages(
    messages: readonly ProcessedMessage[],
    options: SummaryOptions = {}
): BatchSummary {
    const now = options.now ?? new Date();

    const categories = new Map<string, number>();
    const users      = new Map<string, number>();
    const channels   = new Map<string, number>();
    const words      = new Map<string, number>();

    let high = 0;
    let medium = 0;
    let low = 0;
    let recentMessages = 0;
    let prioritySum = 0;

    for (const message of messages) {
        increment(categories, message.category);
        increment(users, message.metadata.user);
        increment(channels, message.metadata.channel);
        for (const word of countableWords(message.normalizedText)) {
            increment(words, word);
        }

        const priority = message.priorityScore;
        prioritySum += priority;
        if (priority > kHIGH_PRIORITY) {
            high++;
        }
        else if (priority > kMEDIUM_PRIORITY) {
            medium++;
        }
        else {
            low++;
        }

        const age = now.getTime() - message.metadata.timestamp.getTime();
        if (age < kRECENT_WINDOW_MS) {
            recentMessages++;
        }
    }

    return {
        totalMessages       : messages.length,
        categories          : Object.fromEntries(categories),
        priorityDistribution: { high, medium, low },
        topUsers            : topN(users, options.topUsers ?? 5),
        topChannels         : topN(channels, options.topChannels ?? 5),
        topWords            : topN(words, options.topWords ?? 10),
        averagePriority     : messages.length > 0 ? prioritySum / messages.length : 0,
        recentMessages,
    };
}
