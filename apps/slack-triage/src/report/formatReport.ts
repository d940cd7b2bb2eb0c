/**
 * @fileoverview Console report for a triaged batch.
 *
 * @module slack-triage/report/formatReport
 */

import type { BatchSummary, ProcessedMessage, RankedCount } from "@triage/engine";
import type { AutomationSuggestion } from "../automation/suggestAutomations.js";

const kTEXT_WIDTH = 60;

function percent(value: number): string {
    return `${(value * 100).toFixed(0)}%`;
}

function truncate(text: string, width: number): string {
    return text.length > width ? `${text.slice(0, width - 3)}...` : text;
}

function ranked(counts: readonly RankedCount[]): string {
    return counts.length > 0
        ? counts.map(({ key, count }) => `${key} (${count})`).join(", ")
        : "-";
}

/**
 * One line per message: priority, category, confidence, text, similar count.
 *
 * @example
 * ```typescript
 * formatMessageLine(message);
 * // => "[1.00] urgent           100%  Production checkout is down (+1 similar)"
 * ```
 */
export function formatMessageLine(message: ProcessedMessage): string {
    const similar = message.similarTickets.length > 0
        ? ` (+${message.similarTickets.length} similar)`
        : "";

    return `[${message.priorityScore.toFixed(2)}] ${message.category.padEnd(16)} `
        + `${percent(message.confidence).padStart(4)}  ${truncate(message.content, kTEXT_WIDTH)}${similar}`;
}

/**
 * Full report: messages by descending priority, summary, suggestions.
 */
export function formatReport(
    messages: readonly ProcessedMessage[],
    summary: BatchSummary,
    suggestions: readonly AutomationSuggestion[]
): string[] {
    const lines: string[] = [];

    lines.push(`Messages (${messages.length}), highest priority first:`);
    const byPriority = [...messages].sort((a, b) => b.priorityScore - a.priorityScore);
    for (const message of byPriority) {
        lines.push(`  ${formatMessageLine(message)}`);
    }

    lines.push("");
    lines.push("Summary:");
    lines.push(`  Total: ${summary.totalMessages}, last 24h: ${summary.recentMessages}, `
        + `average priority: ${summary.averagePriority.toFixed(2)}`);
    lines.push(`  Priority: high ${summary.priorityDistribution.high}, `
        + `medium ${summary.priorityDistribution.medium}, low ${summary.priorityDistribution.low}`);
    lines.push(`  Categories: ${Object.entries(summary.categories).map(([name, count]) => `${name} (${count})`).join(", ") || "-"}`);
    lines.push(`  Top users: ${ranked(summary.topUsers)}`);
    lines.push(`  Top channels: ${ranked(summary.topChannels)}`);
    lines.push(`  Top words: ${ranked(summary.topWords)}`);

    lines.push("");
    lines.push(`Automation suggestions (${suggestions.length}):`);
    for (const suggestion of suggestions) {
        lines.push(`  - ${suggestion.title} [${suggestion.priority} priority, ${suggestion.effort} effort]`);
        lines.push(`    ${suggestion.description}`);
    }

    return lines;
}
