/**
 * @fileoverview Triage Engine
 *
 * Rule-based categorization, priority scoring and similar-message
 * retrieval for short chat messages.
 *
 * The engine provides:
 * - A text normalizer shared by every stage
 * - Ordered category rules with a deterministic tie-break and a fallback
 * - An additive, capped priority model over a configurable weight table
 * - Lexical or embedding-augmented similarity search over an append-only store
 * - Batch processing with per-record failure isolation
 *
 * @module @triage/engine
 * @example
 * ```typescript
 * import { TriageEngine, summarizeMessages } from "@triage/engine";
 *
 * const engine = new TriageEngine();
 * const processed = engine.processBatch(records);
 * const summary = summarizeMessages(processed);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    Entity,
    RawMessageRecord,
    MessageMetadata,
    TriageMessage,
    ProcessedMessage,
    OutputRecord,
    CategoryDefinition,
    ClassificationOutput,
    CategoryName,
    ClassificationPlugin,
    ClassificationContext,
    PluginLogger,
    SimilarityMatch,
    SimilarityStrategy,
    Embedder,
    RecordProvider,
    FetchOptions,
    FetchResult,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./contracts/index.js";
export { createClassificationOutput, createEvent } from "./contracts/index.js";

// ============================================================================
// Configuration
// ============================================================================

export {
    DEFAULT_CONFIG_PATH,
    loadDefaultTriageConfig,
    loadTriageConfig,
    parseTriageConfig,
} from "./config/loadConfig.js";
export {
    validateTriageConfig,
    type TriageConfig,
    type CategorizerSettings,
    type PriorityWeights,
    type LengthTier,
    type RecencyTier,
    type SimilaritySettings,
} from "./config/TriageConfig.js";
export { ConfigurationError } from "./errors/ConfigurationError.js";

// ============================================================================
// Pipeline stages
// ============================================================================

export { normalizeText } from "./text/normalize.js";
export { splitWords, extractSharedKeyPhrases, textPreview } from "./text/tokens.js";
export { createCategoryClassifier, type RuleClassifierOptions } from "./classification/RuleClassifier.js";
export { Categorizer, type CategoryAssignment } from "./classification/Categorizer.js";
export { PriorityScorer, type ScoringInput, type PriorityBreakdown } from "./scoring/PriorityScorer.js";
export * from "./similarity/index.js";
export { MessageStore } from "./store/MessageStore.js";
export {
    createTriageMessage,
    deriveMessageId,
    parseTimestamp,
    toOutputRecord,
} from "./ingest/createMessage.js";
export {
    summarizeMessages,
    type BatchSummary,
    type SummaryOptions,
    type RankedCount,
    type PriorityDistribution,
} from "./analytics/summarize.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./events/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";
