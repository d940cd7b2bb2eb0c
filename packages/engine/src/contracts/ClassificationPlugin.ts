/**
 * Classification Plugin Contract
 *
 * Plugins that score normalized message text for one category.
 * The categorizer runs ALL plugins, in configuration order, and keeps
 * the highest score.
 *
 * Design principles:
 * - Pure: no side effects, no message mutation
 * - Deterministic: same text produces same output
 * - Synchronous: nothing in the pipeline yields mid-computation
 */

import type { ClassificationOutput } from "./ClassificationOutput.js";

/**
 * Context provided to classification plugins during evaluation.
 */
export interface ClassificationContext {
    /**
     * Logger for the plugin.
     */
    readonly logger: PluginLogger;

    /**
     * Trace ID of the message being processed.
     */
    readonly traceId: string;
}

/**
 * Logger interface for plugins.
 */
export interface PluginLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Classification Plugin interface.
 *
 * Rules:
 * - Receives text that has already been through the normalizer
 * - Returns ClassificationOutput, or null when nothing matched
 * - Must not throw for any string input
 *
 * @example
 * ```typescript
 * const deployClassifier: ClassificationPlugin = {
 *     id: "category:deployment",
 *     classify(text) {
 *         return text.includes("deploy")
 *             ? { type: "deployment", score: 1, matched: ["deploy"] }
 *             : null;
 *     }
 * };
 * ```
 */
export interface ClassificationPlugin {
    /**
     * Unique identifier for this plugin.
     */
    readonly id: string;

    /**
     * Optional human-readable name.
     */
    readonly name?: string;

    /**
     * Evaluate normalized text.
     *
     * @param text - Normalized message text
     * @param context - Optional evaluation context (logger, traceId)
     * @returns ClassificationOutput if any rule matched, or null
     */
    classify(text: string, context?: ClassificationContext): ClassificationOutput | null;
}
