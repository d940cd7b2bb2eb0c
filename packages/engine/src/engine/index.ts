/**
 * @fileoverview Engine barrel exports
 *
 * @module @triage/engine/engine
 */

export {
    TriageEngine,
    type TriageEngineConfig,
    type DrainOptions,
} from "./TriageEngine.js";
export {
    createStageLogger,
    defaultLogger,
    type EngineLogger,
} from "./logger.js";
