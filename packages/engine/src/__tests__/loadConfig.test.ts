/**
 * @fileoverview Unit tests for the YAML configuration loader
 *
 * @module @triage/engine/__tests__/loadConfig
 */

import { describe, it, expect } from "vitest";
import {
    loadDefaultTriageConfig,
    loadTriageConfig,
    parseTriageConfig,
} from "../config/loadConfig.js";
import { ConfigurationError } from "../errors/ConfigurationError.js";

function configurationError(load: () => unknown): ConfigurationError {
    try {
        load();
    }
    catch (error) {
        if (error instanceof ConfigurationError) {
            return error;
        }
        throw error;
    }
    throw new Error("expected a ConfigurationError");
}

describe("loadDefaultTriageConfig", () => {
    const config = loadDefaultTriageConfig();

    // Scenario: Built-in rule set
    it("should load seven categories in order with one fallback", () => {
        expect(config.categories.map((category) => category.name)).toEqual([
            "bug_report",
            "feature_request",
            "question",
            "urgent",
            "deployment",
            "access_request",
            "general",
        ]);
        expect(config.categories.filter((category) => category.fallback)).toHaveLength(1);
        expect(config.categories[6].priorityBoost).toBe(0);
    });

    // Scenario: Numeric keywords arrive as strings
    it("should read quoted numeric keywords as strings", () => {
        expect(config.categories[0].keywords).toContain("500");
    });

    // Scenario: Canonical weight table
    it("should carry the default weights", () => {
        expect(config.categorizer).toEqual({ patternWeight: 2, normalization: 5, fallbackConfidence: 0.1 });
        expect(config.priority.urgencyBonus).toBe(0.2);
        expect(config.priority.lengthTiers).toEqual([
            { minLength: 200, bonus: 0.2 },
            { minLength: 100, bonus: 0.1 },
        ]);
        expect(config.priority.reactionMinCount).toBe(2);
        expect(config.similarity).toEqual({
            topK              : 5,
            lexicalThreshold  : 0.2,
            embeddingThreshold: 0.3,
            semanticWeight    : 0.7,
            fuzzyWeight       : 0.3,
        });
    });
});

describe("parseTriageConfig", () => {
    const base = loadDefaultTriageConfig();

    // Scenario: Omitted sections come from the base configuration
    it("should fill omitted sections from the base", () => {
        const config = parseTriageConfig([
            "categories:",
            "  - name: outage",
            "    keywords: [down, 503]",
            "    priority_boost: 0.9",
            "  - name: other",
            "    fallback: true",
            "similarity:",
            "  top_k: 3",
        ].join("\n"), base);

        expect(config.categories).toEqual([
            { name: "outage", keywords: ["down", "503"], patterns: [], priorityBoost: 0.9, color: "#999999" },
            { name: "other", keywords: [], patterns: [], priorityBoost: 0, color: "#999999", fallback: true },
        ]);
        expect(config.similarity.topK).toBe(3);
        expect(config.similarity.lexicalThreshold).toBe(0.2);
        expect(config.priority).toEqual(base.priority);
    });

    // Scenario: Without a base every section is required
    it("should report missing numbers when there is no base", () => {
        const error = configurationError(() => parseTriageConfig([
            "categories:",
            "  - name: other",
            "    fallback: true",
        ].join("\n")));

        expect(error.issues).toContain("'categorizer.pattern_weight' must be a number");
        expect(error.issues).toContain("'similarity.top_k' must be a number");
    });

    // Scenario: Broken YAML
    it("should wrap YAML syntax errors", () => {
        const error = configurationError(() => parseTriageConfig("categories: [unclosed", base));

        expect(error.message.startsWith("Invalid triage configuration: YAML parse error:")).toBe(true);
    });

    // Scenario: Document is not a mapping
    it("should reject a non-mapping document", () => {
        const error = configurationError(() => parseTriageConfig("- a\n- b", base));

        expect(error.issues).toEqual(["expected a mapping with a 'categories' list"]);
    });

    // Scenario: No fallback category
    it("should require a fallback category", () => {
        const error = configurationError(() => parseTriageConfig([
            "categories:",
            "  - name: only",
            "    keywords: [x]",
        ].join("\n"), base));

        expect(error.issues).toEqual(["no fallback category"]);
        expect(error.message).toBe("Invalid triage configuration: no fallback category");
    });

    // Scenario: Several fallbacks, one with a boost
    it("should reject several fallbacks and a boosted fallback", () => {
        const error = configurationError(() => parseTriageConfig([
            "categories:",
            "  - name: a",
            "    fallback: true",
            "  - name: b",
            "    fallback: true",
            "    priority_boost: 0.5",
        ].join("\n"), base));

        expect(error.issues).toEqual([
            "more than one fallback category: a, b",
            "fallback category 'b' must have a zero priority boost",
        ]);
    });

    // Scenario: Duplicate names and an invalid regex
    it("should report duplicate names and invalid patterns", () => {
        const error = configurationError(() => parseTriageConfig([
            "categories:",
            "  - name: dup",
            "    patterns: [\"([\"]",
            "  - name: dup",
            "  - name: other",
            "    fallback: true",
        ].join("\n"), base));

        expect(error.issues).toContain("duplicate category 'dup'");
        expect(error.issues.some((issue) => issue.startsWith("category 'dup': invalid pattern '(['"))).toBe(true);
    });

    // Scenario: Out-of-range values
    it("should reject out-of-range weights", () => {
        const error = configurationError(() => parseTriageConfig([
            "categories:",
            "  - name: loud",
            "    priority_boost: 1.5",
            "  - name: other",
            "    fallback: true",
            "similarity:",
            "  top_k: 0",
        ].join("\n"), base));

        expect(error.issues).toEqual([
            "category 'loud': priority boost must be within [0, 1]",
            "similarity top_k must be a positive integer",
        ]);
    });
});

describe("loadTriageConfig", () => {
    // Scenario: File does not exist
    it("should reject a missing file", () => {
        const error = configurationError(() => loadTriageConfig("/nonexistent/triage.yml"));

        expect(error.issues).toEqual(["configuration file not found: /nonexistent/triage.yml"]);
    });
});
