/**
 * @fileoverview Engine logging
 *
 * @module @triage/engine/engine/logger
 */

import type { PluginLogger } from "../contracts/ClassificationPlugin.js";

/**
 * Logger interface for the engine.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const defaultLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Logger that prefixes every line with `[engine:<stage>]` and adds the
 * trace ID to the data.
 */
export function createStageLogger(logger: EngineLogger, stage: string, traceId: string): PluginLogger {
    const prefix = `[engine:${stage}]`;
    return {
        debug: (msg, data) => logger.debug(`${prefix} ${msg}`, { ...data, traceId }),
        info : (msg, data) => logger.info(`${prefix} ${msg}`, { ...data, traceId }),
        warn : (msg, data) => logger.warn(`${prefix} ${msg}`, { ...data, traceId }),
        error: (msg, data) => logger.error(`${prefix} ${msg}`, { ...data, traceId }),
    };
}
