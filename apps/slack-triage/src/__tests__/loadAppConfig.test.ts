/**
 * @fileoverview Unit tests for the environment-driven application config
 *
 * @module slack-triage/__tests__/loadAppConfig
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@triage/engine";
import {
    loadAppConfig,
    DEFAULT_AUTOMATIONS_PATH,
    DEFAULT_DATA_PATH,
    DEFAULT_EMBEDDING_MODEL,
} from "../config/loadAppConfig.js";

function issuesOf(env: NodeJS.ProcessEnv): readonly string[] {
    try {
        loadAppConfig(env);
    }
    catch (error) {
        if (error instanceof ConfigurationError) {
            return error.issues;
        }
        throw error;
    }
    throw new Error("expected a ConfigurationError");
}

describe("loadAppConfig", () => {
    // Scenario: Empty environment gives lexical similarity and bundled files
    it("should apply defaults", () => {
        expect(loadAppConfig({})).toEqual({
            similarity     : "lexical",
            embeddingModel : DEFAULT_EMBEDDING_MODEL,
            dataPath       : DEFAULT_DATA_PATH,
            automationsPath: DEFAULT_AUTOMATIONS_PATH,
            logLevel       : "info",
        });
    });

    // Scenario: Bundled files resolve next to the app sources
    it("should point the defaults at the app data and config directories", () => {
        expect(DEFAULT_DATA_PATH.endsWith("slack-triage/data/sample-messages.json")).toBe(true);
        expect(DEFAULT_AUTOMATIONS_PATH.endsWith("slack-triage/config/automations.yml")).toBe(true);
    });

    // Scenario: Every variable set
    it("should read all variables", () => {
        const config = loadAppConfig({
            TRIAGE_CONFIG         : "./rules.yml",
            TRIAGE_TOP_K          : "3",
            TRIAGE_SIMILARITY     : " Embedding ",
            TRIAGE_DATA           : "./export.json",
            TRIAGE_EXPORT         : "./out.json",
            TRIAGE_LOG_LEVEL      : "DEBUG",
            OPENAI_API_KEY        : "test-secret",
            OPENAI_EMBEDDING_MODEL: "text-embedding-3-large",
        });

        expect(config).toEqual({
            configPath     : "./rules.yml",
            topK           : 3,
            similarity     : "embedding",
            openaiApiKey   : "test-secret",
            embeddingModel : "text-embedding-3-large",
            dataPath       : "./export.json",
            automationsPath: DEFAULT_AUTOMATIONS_PATH,
            exportPath     : "./out.json",
            logLevel       : "debug",
        });
    });

    // Scenario: Blank values count as unset
    it("should ignore blank values", () => {
        const config = loadAppConfig({ TRIAGE_CONFIG: "  ", TRIAGE_TOP_K: "", TRIAGE_EXPORT: "" });

        expect(config.configPath).toBeUndefined();
        expect(config.topK).toBeUndefined();
        expect(config.exportPath).toBeUndefined();
    });

    // Scenario: All invalid variables are reported together
    it("should list every invalid variable", () => {
        expect(issuesOf({
            TRIAGE_TOP_K     : "0",
            TRIAGE_SIMILARITY: "vector",
            TRIAGE_LOG_LEVEL : "loud",
        })).toEqual([
            "TRIAGE_TOP_K must be a positive integer, got '0'",
            "TRIAGE_SIMILARITY must be one of lexical, embedding, got 'vector'",
            "TRIAGE_LOG_LEVEL must be one of debug, info, warn, error, got 'loud'",
        ]);
    });

    // Scenario: Fractional top-K
    it("should reject a fractional top-K", () => {
        expect(issuesOf({ TRIAGE_TOP_K: "2.5" })).toEqual([
            "TRIAGE_TOP_K must be a positive integer, got '2.5'",
        ]);
    });

    // Scenario: Embedding mode needs a key
    it("should require OPENAI_API_KEY for embedding similarity", () => {
        expect(issuesOf({ TRIAGE_SIMILARITY: "embedding" })).toEqual([
            "TRIAGE_SIMILARITY=embedding requires OPENAI_API_KEY",
        ]);
    });
});
