/**
 * @fileoverview Contract barrel exports
 *
 * All interfaces and types that define the triage engine contract.
 *
 * @module @triage/engine/contracts
 */

// Entity contract
export type { Entity } from "./Entity.js";

// Messages
export type {
    RawMessageRecord,
    MessageMetadata,
    TriageMessage,
    ProcessedMessage,
    OutputRecord,
} from "./Message.js";

// Category rules
export type { CategoryDefinition } from "./CategoryDefinition.js";

// Classification output
export type {
    ClassificationOutput,
    CategoryName,
} from "./ClassificationOutput.js";
export { createClassificationOutput } from "./ClassificationOutput.js";

// Classification plugin contract
export type {
    ClassificationPlugin,
    ClassificationContext,
    PluginLogger,
} from "./ClassificationPlugin.js";

// Similarity
export type { SimilarityMatch } from "./SimilarityMatch.js";
export type { SimilarityStrategy } from "./SimilarityStrategy.js";
export type { Embedder } from "./Embedder.js";

// RecordProvider contract
export type {
    RecordProvider,
    FetchOptions,
    FetchResult,
} from "./RecordProvider.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
