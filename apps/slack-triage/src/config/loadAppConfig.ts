/**
 * @fileoverview Application configuration
 *
 * Reads the environment (populated from `.env` by dotenv) into a typed
 * configuration.
 *
 * Variables:
 * - TRIAGE_CONFIG: YAML rule file replacing the built-in defaults
 * - TRIAGE_TOP_K: similar messages kept per message
 * - TRIAGE_SIMILARITY: `lexical` (default) or `embedding`
 * - TRIAGE_DATA: JSON record file (default: bundled sample data)
 * - TRIAGE_EXPORT: write output records to this JSON file
 * - TRIAGE_LOG_LEVEL: `debug`, `info` (default), `warn` or `error`
 * - OPENAI_API_KEY, OPENAI_EMBEDDING_MODEL: embedding mode only
 *
 * @module slack-triage/config/loadAppConfig
 */

import { fileURLToPath } from "url";
import { ConfigurationError } from "@triage/engine";

export type SimilarityMode = "lexical" | "embedding";

export type LogLevel = "debug" | "info" | "warn" | "error";

const kSIMILARITY_MODES: readonly SimilarityMode[] = ["lexical", "embedding"];
const kLOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const DEFAULT_DATA_PATH = fileURLToPath(new URL("../../data/sample-messages.json", import.meta.url));
export const DEFAULT_AUTOMATIONS_PATH = fileURLToPath(new URL("../../config/automations.yml", import.meta.url));
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

/**
 * Application configuration
 */
export interface AppConfig {
    /** Rule file; built-in defaults when absent */
    readonly configPath?: string;

    /** Overrides `similarity.top_k` of the rule file */
    readonly topK?: number;

    readonly similarity: SimilarityMode;
    readonly openaiApiKey?: string;
    readonly embeddingModel: string;

    /** Record file to triage */
    readonly dataPath: string;

    /** Automation rule file */
    readonly automationsPath: string;

    /** Where to write output records, if anywhere */
    readonly exportPath?: string;

    readonly logLevel: LogLevel;
}

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function oneOf<T extends string>(value: string, allowed: readonly T[]): T | undefined {
    return allowed.find((candidate) => candidate === value);
}

/**
 * Build the application configuration from environment variables.
 *
 * @param env - Environment to read (default: process.env)
 * @throws ConfigurationError listing every invalid variable
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const issues: string[] = [];

    let topK: number | undefined;
    const rawTopK = nonEmpty(env.TRIAGE_TOP_K);
    if (rawTopK !== undefined) {
        topK = Number(rawTopK);
        if (!Number.isInteger(topK) || topK < 1) {
            issues.push(`TRIAGE_TOP_K must be a positive integer, got '${rawTopK}'`);
        }
    }

    const rawSimilarity = nonEmpty(env.TRIAGE_SIMILARITY)?.toLowerCase() ?? "lexical";
    const similarity = oneOf(rawSimilarity, kSIMILARITY_MODES);
    if (!similarity) {
        issues.push(`TRIAGE_SIMILARITY must be one of ${kSIMILARITY_MODES.join(", ")}, got '${rawSimilarity}'`);
    }

    const openaiApiKey = nonEmpty(env.OPENAI_API_KEY);
    if (similarity === "embedding" && !openaiApiKey) {
        issues.push("TRIAGE_SIMILARITY=embedding requires OPENAI_API_KEY");
    }

    const rawLogLevel = nonEmpty(env.TRIAGE_LOG_LEVEL)?.toLowerCase() ?? "info";
    const logLevel = oneOf(rawLogLevel, kLOG_LEVELS);
    if (!logLevel) {
        issues.push(`TRIAGE_LOG_LEVEL must be one of ${kLOG_LEVELS.join(", ")}, got '${rawLogLevel}'`);
    }

    if (issues.length > 0 || !similarity || !logLevel) {
        throw new ConfigurationError(issues);
    }

    const configPath = nonEmpty(env.TRIAGE_CONFIG);
    const exportPath = nonEmpty(env.TRIAGE_EXPORT);

    return {
        ...(configPath !== undefined && { configPath }),
        ...(topK !== undefined && { topK }),
        similarity,
        ...(openaiApiKey !== undefined && { openaiApiKey }),
        embeddingModel : nonEmpty(env.OPENAI_EMBEDDING_MODEL) ?? DEFAULT_EMBEDDING_MODEL,
        dataPath       : nonEmpty(env.TRIAGE_DATA) ?? DEFAULT_DATA_PATH,
        automationsPath: DEFAULT_AUTOMATIONS_PATH,
        ...(exportPath !== undefined && { exportPath }),
        logLevel,
    };
}
