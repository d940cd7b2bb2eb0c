/**
 * @fileoverview Level-filtered console logger for the application.
 *
 * @module slack-triage/logging
 */

import { defaultLogger, type EngineLogger } from "@triage/engine";
import type { LogLevel } from "./config/loadAppConfig.js";

const kLEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info : 1,
    warn : 2,
    error: 3,
};

/**
 * Logger that drops messages below `level` and forwards the rest.
 *
 * @param level - Lowest level written
 * @param target - Where kept messages go (default: console)
 */
export function createLogger(level: LogLevel, target: EngineLogger = defaultLogger): EngineLogger {
    const enabled = (messageLevel: LogLevel) => kLEVEL_RANK[messageLevel] >= kLEVEL_RANK[level];

    return {
        debug: (msg, data) => {
            if (enabled("debug")) {
                target.debug(msg, data);
            }
        },
        info: (msg, data) => {
            if (enabled("info")) {
                target.info(msg, data);
            }
        },
        warn: (msg, data) => {
            if (enabled("warn")) {
                target.warn(msg, data);
            }
        },
        error: (msg, data) => {
            if (enabled("error")) {
                target.error(msg, data);
            }
        },
    };
}
