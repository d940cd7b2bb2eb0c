/**
 * @fileoverview Automation suggestions
 *
 * Turns category counts and high-priority counts of a processed batch
 * into suggestions for automating recurring work. Rules live in YAML.
 *
 * @module slack-triage/automation/suggestAutomations
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { ConfigurationError, type ProcessedMessage } from "@triage/engine";

export type SuggestionPriority = "Critical" | "High" | "Medium" | "Low";

export type SuggestionEffort = "High" | "Medium" | "Low";

const kPRIORITIES: readonly SuggestionPriority[] = ["Critical", "High", "Medium", "Low"];
const kEFFORTS: readonly SuggestionEffort[] = ["High", "Medium", "Low"];

/**
 * One automation rule.
 */
export interface AutomationRule {
    readonly id: string;
    readonly title: string;

    /** Category whose messages qualify */
    readonly category: string;

    /** When set, messages qualify by priority score above this instead */
    readonly minPriority?: number;

    /** Qualifying messages needed for the rule to fire */
    readonly minCount: number;

    readonly priority: SuggestionPriority;
    readonly effort: SuggestionEffort;
    readonly impact: string;

    /** `{count}` is replaced by the qualifying message count */
    readonly description: string;
}

export interface AutomationSuggestion {
    readonly id: string;
    readonly title: string;
    readonly description: string;
    readonly category: string;
    readonly priority: SuggestionPriority;
    readonly effort: SuggestionEffort;
    readonly impact: string;

    /** Qualifying messages */
    readonly count: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick<T extends string>(value: unknown, allowed: readonly T[]): T | undefined {
    return allowed.find((candidate) => candidate === value);
}

/**
 * Parse automation rules from YAML.
 *
 * @throws ConfigurationError listing every invalid rule
 */
export function parseAutomationRules(content: string): AutomationRule[] {
    const parsed: unknown = parseYaml(content);

    if (!isRecord(parsed) || !Array.isArray(parsed.automations)) {
        throw new ConfigurationError("invalid automations file: expected { automations: [...] }");
    }

    const issues: string[] = [];
    const rules: AutomationRule[] = [];

    parsed.automations.forEach((raw: unknown, index: number) => {
        if (!isRecord(raw)) {
            issues.push(`automation at index ${index}: expected a mapping`);
            return;
        }

        const label = typeof raw.id === "string" ? raw.id : `#${index}`;
        const priority = pick(raw.priority, kPRIORITIES);
        const effort = pick(raw.effort, kEFFORTS);

        const strings = {
            id         : raw.id,
            title      : raw.title,
            category   : raw.category,
            impact     : raw.impact,
            description: raw.description,
        };
        for (const [key, value] of Object.entries(strings)) {
            if (typeof value !== "string" || value.length === 0) {
                issues.push(`automation ${label}: '${key}' must be a non-empty string`);
            }
        }
        if (typeof raw.min_count !== "number" || !Number.isInteger(raw.min_count) || raw.min_count < 1) {
            issues.push(`automation ${label}: 'min_count' must be a positive integer`);
        }
        if (raw.min_priority !== undefined
            && (typeof raw.min_priority !== "number" || raw.min_priority < 0 || raw.min_priority > 1)) {
            issues.push(`automation ${label}: 'min_priority' must be within [0, 1]`);
        }
        if (!priority) {
            issues.push(`automation ${label}: 'priority' must be one of ${kPRIORITIES.join(", ")}`);
        }
        if (!effort) {
            issues.push(`automation ${label}: 'effort' must be one of ${kEFFORTS.join(", ")}`);
        }

        if (typeof raw.id === "string" && typeof raw.title === "string" && typeof raw.category === "string"
            && typeof raw.impact === "string" && typeof raw.description === "string"
            && typeof raw.min_count === "number" && priority && effort) {
            rules.push({
                id         : raw.id,
                title      : raw.title,
                category   : raw.category,
                ...(typeof raw.min_priority === "number" && { minPriority: raw.min_priority }),
                minCount   : raw.min_count,
                priority,
                effort,
                impact     : raw.impact,
                description: raw.description,
            });
        }
    });

    if (issues.length > 0) {
        throw new ConfigurationError(issues);
    }

    return rules;
}

/**
 * Load automation rules from a YAML file.
 *
 * @throws ConfigurationError if the file is missing or invalid
 */
export function loadAutomationRules(filePath: string): AutomationRule[] {
    if (!existsSync(filePath)) {
        throw new ConfigurationError(`automations file not found: ${filePath}`);
    }

    return parseAutomationRules(readFileSync(filePath, "utf-8"));
}

/**
 * Evaluate rules against processed messages, in rule order.
 *
 * @example
 * ```typescript
 * const suggestions = suggestAutomations(engine.getMessages(), loadAutomationRules(path));
 * // => [{ id: "bug_triage", title: "Automated Bug Triage", count: 3, ... }]
 * ```
 */
export function suggestAutomations(
    messages: readonly ProcessedMessage[],
    rules: readonly AutomationRule[]
): AutomationSuggestion[] {
    const suggestions: AutomationSuggestion[] = [];

    for (const rule of rules) {
        const { minPriority } = rule;
        const count = messages.filter((message) =>
            minPriority !== undefined
                ? message.priorityScore > minPriority
                : message.category === rule.category
        ).length;

        if (count < rule.minCount) {
            continue;
        }

        suggestions.push({
            id         : rule.id,
            title      : rule.title,
            description: rule.description.replaceAll("{count}", String(count)),
            category   : rule.category,
            priority   : rule.priority,
            effort     : rule.effort,
            impact     : rule.impact,
            count,
        });
    }

    return suggestions;
}
