/**
 * @fileoverview Triage run
 *
 * Builds the engine from the application configuration, drains the
 * record file through it and derives the summary and suggestions.
 *
 * @module slack-triage/runTriage
 */

import { writeFile } from "fs/promises";
import {
    TriageEngine,
    loadDefaultTriageConfig,
    loadTriageConfig,
    toOutputRecord,
    type BatchSummary,
    type EngineLogger,
    type ProcessedMessage,
} from "@triage/engine";

import type { AppConfig } from "./config/loadAppConfig.js";
import { OpenAIEmbedder } from "./embeddings/OpenAIEmbedder.js";
import { JsonRecordProvider } from "./providers/JsonRecordProvider.js";
import {
    loadAutomationRules,
    suggestAutomations,
    type AutomationSuggestion,
} from "./automation/suggestAutomations.js";

/**
 * Everything a triage run produces.
 */
export interface TriageRun {
    readonly messages: readonly ProcessedMessage[];
    readonly summary: BatchSummary;
    readonly suggestions: readonly AutomationSuggestion[];
}

/**
 * Create the engine described by the application configuration.
 */
export function createEngine(config: AppConfig, logger: EngineLogger): TriageEngine {
    const triageConfig = config.configPath
        ? loadTriageConfig(config.configPath)
        : loadDefaultTriageConfig();

    const embedder = config.similarity === "embedding"
        ? new OpenAIEmbedder({ apiKey: config.openaiApiKey, model: config.embeddingModel, logger })
        : undefined;

    const engine = new TriageEngine({
        config: triageConfig,
        embedder,
        topK  : config.topK,
        logger,
    });

    engine.eventBus.subscribe("message:categorized", (event) => {
        logger.debug("Categorized", { ...event.data, traceId: event.traceId });
    });

    return engine;
}

/**
 * Triage the configured record file.
 */
export async function runTriage(config: AppConfig, logger: EngineLogger): Promise<TriageRun> {
    const engine = createEngine(config, logger);
    const provider = new JsonRecordProvider({ filePath: config.dataPath, logger });

    const messages = await engine.drain(provider);
    const summary = engine.getSummary();
    const suggestions = suggestAutomations(messages, loadAutomationRules(config.automationsPath));

    if (config.exportPath) {
        await writeFile(config.exportPath, JSON.stringify(messages.map(toOutputRecord), null, 2), "utf-8");
        logger.info("Exported output records", { path: config.exportPath, count: messages.length });
    }

    return { messages, summary, suggestions };
}
