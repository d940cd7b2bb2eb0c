/**
 * @fileoverview Configuration Error
 *
 * Raised when a triage configuration cannot produce well-defined
 * categorization behavior. The engine refuses to start on these.
 *
 * @module @triage/engine/errors/ConfigurationError
 */

/**
 * Fatal configuration problem detected while loading or constructing.
 *
 * @example
 * ```typescript
 * try {
 *     new TriageEngine({ config: { ...config, categories: [] } });
 * }
 * catch (error) {
 *     if (error instanceof ConfigurationError) {
 *         console.error(error.issues);
 *     }
 * }
 * ```
 */
export class ConfigurationError extends Error {
    /** Every problem found, in the order they were detected */
    readonly issues: readonly string[];

    constructor(issues: readonly string[] | string) {
        const list = typeof issues === "string" ? [issues] : [...issues];
        super(`Invalid triage configuration: ${list.join("; ")}`);
        this.name = "ConfigurationError";
        this.issues = Object.freeze(list);
    }
}
