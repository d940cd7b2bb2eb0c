/**
 * @fileoverview Slack Triage - Main Entry Point
 *
 * Triages a chat export with the TriageEngine: every message gets a
 * category, a priority score and a list of similar earlier messages;
 * the batch gets a summary and automation suggestions.
 *
 * @module slack-triage
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { loadAppConfig } from "./config/loadAppConfig.js";
import { runTriage } from "./runTriage.js";
import { formatReport } from "./report/formatReport.js";
import { createLogger } from "./logging.js";

/**
 * Main entry point
 */
async function main(): Promise<void> {
    console.log("=".repeat(60));
    console.log("Slack Triage");
    console.log("=".repeat(60));

    const config = loadAppConfig();
    const logger = createLogger(config.logLevel);

    logger.info("Starting triage", {
        dataPath  : config.dataPath,
        similarity: config.similarity,
        rules     : config.configPath ?? "built-in",
    });

    const { messages, summary, suggestions } = await runTriage(config, logger);

    console.log("");
    for (const line of formatReport(messages, summary, suggestions)) {
        console.log(line);
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL] Triage failed:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
