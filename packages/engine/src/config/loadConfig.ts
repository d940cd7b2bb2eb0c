/**
 * @fileoverview Triage Configuration Loader
 *
 * Loads category rules, priority weights and similarity settings from
 * YAML. Sections missing from a file are taken from a base configuration
 * (the built-in default unless told otherwise), so a file that only
 * redefines the categories is complete.
 *
 * @module @triage/engine/config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { fileURLToPath } from "url";
import { parse as parseYaml } from "yaml";
import type { CategoryDefinition } from "../contracts/CategoryDefinition.js";
import { ConfigurationError } from "../errors/ConfigurationError.js";
import {
    validateTriageConfig,
    type CategorizerSettings,
    type LengthTier,
    type PriorityWeights,
    type RecencyTier,
    type SimilaritySettings,
    type TriageConfig,
} from "./TriageConfig.js";

/**
 * Location of the configuration shipped with the engine.
 */
export const DEFAULT_CONFIG_PATH = fileURLToPath(
    new URL("../../config/default-triage.yml", import.meta.url)
);

type YamlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is YamlRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Collects problems while reading one document so they can be reported together.
 */
class FieldReader {
    readonly issues: string[] = [];

    section(root: YamlRecord, key: string): YamlRecord | undefined {
        const value = root[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        if (!isRecord(value)) {
            this.issues.push(`'${key}' must be a mapping`);
            return undefined;
        }
        return value;
    }

    number(section: YamlRecord | undefined, key: string, path: string, fallback?: number): number {
        const value = section?.[key];
        if (typeof value === "number") {
            return value;
        }
        if (value === undefined && fallback !== undefined) {
            return fallback;
        }
        this.issues.push(`'${path}.${key}' must be a number`);
        return Number.NaN;
    }

    strings(value: unknown, path: string, fallback?: readonly string[]): string[] {
        if (value === undefined && fallback !== undefined) {
            return [...fallback];
        }
        if (value === undefined || value === null) {
            return [];
        }
        if (!Array.isArray(value)) {
            this.issues.push(`'${path}' must be a list`);
            return [];
        }
        const result: string[] = [];
        for (const item of value) {
            if (typeof item === "string" || typeof item === "number") {
                result.push(String(item));
            }
            else {
                this.issues.push(`'${path}' may only contain strings`);
            }
        }
        return result;
    }

    list(value: unknown, path: string): YamlRecord[] | undefined {
        if (value === undefined) {
            return undefined;
        }
        if (!Array.isArray(value) || !value.every(isRecord)) {
            this.issues.push(`'${path}' must be a list of mappings`);
            return [];
        }
        return value;
    }
}

function readCategories(reader: FieldReader, raw: YamlRecord[]): CategoryDefinition[] {
    return raw.map((entry, index) => {
        const name = typeof entry.name === "string" ? entry.name : "";
        if (!name) {
            reader.issues.push(`category at index ${index}: missing or invalid 'name'`);
        }
        const path = `categories.${name || index}`;

        const category: CategoryDefinition = {
            name,
            keywords     : reader.strings(entry.keywords, `${path}.keywords`),
            patterns     : reader.strings(entry.patterns, `${path}.patterns`),
            priorityBoost: reader.number(entry, "priority_boost", path, 0),
            color        : typeof entry.color === "string" ? entry.color : "#999999",
            ...(entry.fallback === true && { fallback: true }),
        };

        return category;
    });
}

function readCategorizer(
    reader: FieldReader,
    raw: YamlRecord | undefined,
    base: CategorizerSettings | undefined
): CategorizerSettings {
    return {
        patternWeight     : reader.number(raw, "pattern_weight", "categorizer", base?.patternWeight),
        normalization     : reader.number(raw, "normalization", "categorizer", base?.normalization),
        fallbackConfidence: reader.number(raw, "fallback_confidence", "categorizer", base?.fallbackConfidence),
    };
}

function readPriority(
    reader: FieldReader,
    raw: YamlRecord | undefined,
    base: PriorityWeights | undefined
): PriorityWeights {
    const lengthTiers = reader.list(raw?.length_tiers, "priority.length_tiers")
        ?.map((tier): LengthTier => ({
            minLength: reader.number(tier, "min_length", "priority.length_tiers"),
            bonus    : reader.number(tier, "bonus", "priority.length_tiers"),
        }));
    const recencyTiers = reader.list(raw?.recency_tiers, "priority.recency_tiers")
        ?.map((tier): RecencyTier => ({
            maxAgeHours: reader.number(tier, "max_age_hours", "priority.recency_tiers"),
            bonus      : reader.number(tier, "bonus", "priority.recency_tiers"),
        }));

    return {
        urgentTerms     : reader.strings(raw?.urgent_terms, "priority.urgent_terms", base?.urgentTerms),
        urgencyBonus    : reader.number(raw, "urgency_bonus", "priority", base?.urgencyBonus),
        questionStep    : reader.number(raw, "question_step", "priority", base?.questionStep),
        questionCap     : reader.number(raw, "question_cap", "priority", base?.questionCap),
        exclamationStep : reader.number(raw, "exclamation_step", "priority", base?.exclamationStep),
        exclamationCap  : reader.number(raw, "exclamation_cap", "priority", base?.exclamationCap),
        lengthTiers     : lengthTiers ?? base?.lengthTiers ?? [],
        recencyTiers    : recencyTiers ?? base?.recencyTiers ?? [],
        reactionStep    : reader.number(raw, "reaction_step", "priority", base?.reactionStep),
        reactionCap     : reader.number(raw, "reaction_cap", "priority", base?.reactionCap),
        reactionMinCount: reader.number(raw, "reaction_min_count", "priority", base?.reactionMinCount),
    };
}

function readSimilarity(
    reader: FieldReader,
    raw: YamlRecord | undefined,
    base: SimilaritySettings | undefined
): SimilaritySettings {
    return {
        topK              : reader.number(raw, "top_k", "similarity", base?.topK),
        lexicalThreshold  : reader.number(raw, "lexical_threshold", "similarity", base?.lexicalThreshold),
        embeddingThreshold: reader.number(raw, "embedding_threshold", "similarity", base?.embeddingThreshold),
        semanticWeight    : reader.number(raw, "semantic_weight", "similarity", base?.semanticWeight),
        fuzzyWeight       : reader.number(raw, "fuzzy_weight", "similarity", base?.fuzzyWeight),
    };
}

/**
 * Parse a YAML configuration document.
 *
 * @param content - YAML text
 * @param base - Configuration supplying any section the document omits
 * @returns Validated configuration
 * @throws ConfigurationError listing every problem found
 *
 * @example
 * ```typescript
 * const config = parseTriageConfig(`
 * categories:
 *   - name: outage
 *     keywords: [down, outage]
 *     priority_boost: 0.8
 *   - name: other
 *     fallback: true
 * `, loadDefaultTriageConfig());
 * ```
 */
export function parseTriageConfig(content: string, base?: TriageConfig): TriageConfig {
    let parsed: unknown;
    try {
        parsed = parseYaml(content);
    }
    catch (error) {
        throw new ConfigurationError(`YAML parse error: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!isRecord(parsed)) {
        throw new ConfigurationError("expected a mapping with a 'categories' list");
    }

    const reader = new FieldReader();

    const rawCategories = reader.list(parsed.categories, "categories");
    const categories = rawCategories
        ? readCategories(reader, rawCategories)
        : base?.categories;

    if (!categories) {
        reader.issues.push("'categories' is required");
    }

    const config: TriageConfig = {
        categories : categories ?? [],
        categorizer: readCategorizer(reader, reader.section(parsed, "categorizer"), base?.categorizer),
        priority   : readPriority(reader, reader.section(parsed, "priority"), base?.priority),
        similarity : readSimilarity(reader, reader.section(parsed, "similarity"), base?.similarity),
    };

    const issues = [...reader.issues, ...validateTriageConfig(config)];
    if (issues.length > 0) {
        throw new ConfigurationError(issues);
    }

    return config;
}

/**
 * Load the configuration shipped with the engine.
 *
 * @returns Default configuration (seven categories, canonical weight table)
 */
export function loadDefaultTriageConfig(): TriageConfig {
    return parseTriageConfig(readFileSync(DEFAULT_CONFIG_PATH, "utf-8"));
}

/**
 * Load a configuration file, filling omitted sections from `base`.
 *
 * @param filePath - Path to a YAML file
 * @param base - Defaults for omitted sections (built-in default if not given)
 * @returns Validated configuration
 * @throws ConfigurationError if the file is missing or invalid
 */
export function loadTriageConfig(filePath: string, base?: TriageConfig): TriageConfig {
    if (!existsSync(filePath)) {
        throw new ConfigurationError(`configuration file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    return parseTriageConfig(content, base ?? loadDefaultTriageConfig());
}
