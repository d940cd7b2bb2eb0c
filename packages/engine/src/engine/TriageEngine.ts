/**
 * @fileoverview TriageEngine
 *
 * Orchestrates the triage pipeline over one message store.
 *
 * Pipeline per record:
 * 1. Build the message (defaults, derived id, timestamp)
 * 2. Normalize the text
 * 3. Categorize
 * 4. Score priority
 * 5. Search the store for similar messages
 * 6. Freeze the processed message and append it to the store
 *
 * Design principles:
 * - Synchronous per record: search-then-append cannot interleave
 * - Observable: emits events at each stage
 * - Isolated failures: one bad record never aborts a batch
 *
 * @module @triage/engine/engine/TriageEngine
 */

import { Categorizer } from "../classification/Categorizer.js";
import { loadDefaultTriageConfig } from "../config/loadConfig.js";
import { validateTriageConfig, type TriageConfig } from "../config/TriageConfig.js";
import type { CategoryDefinition } from "../contracts/CategoryDefinition.js";
import type { Embedder } from "../contracts/Embedder.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { ProcessedMessage, RawMessageRecord } from "../contracts/Message.js";
import type { RecordProvider } from "../contracts/RecordProvider.js";
import type { SimilarityMatch } from "../contracts/SimilarityMatch.js";
import type { SimilarityStrategy } from "../contracts/SimilarityStrategy.js";
import { summarizeMessages, type BatchSummary, type SummaryOptions } from "../analytics/summarize.js";
import { ConfigurationError } from "../errors/ConfigurationError.js";
import { InMemoryEventBus } from "../events/InMemoryEventBus.js";
import { createTriageMessage, parseTimestamp } from "../ingest/createMessage.js";
import { PriorityScorer } from "../scoring/PriorityScorer.js";
import { EmbeddingSimilarity } from "../similarity/EmbeddingSimilarity.js";
import { LexicalSimilarity } from "../similarity/LexicalSimilarity.js";
import { SimilarityEngine, type SimilarityQuery } from "../similarity/SimilarityEngine.js";
import { MessageStore } from "../store/MessageStore.js";
import { normalizeText } from "../text/normalize.js";
import { createStageLogger, defaultLogger, type EngineLogger } from "./logger.js";

const kUNKNOWN_COLOR = "#999999";
const kDEFAULT_DRAIN_BATCH_SIZE = 50;

/**
 * Engine configuration options.
 */
export interface TriageEngineConfig {
    /** Rules and weights (default: the built-in default-triage.yml) */
    readonly config?: TriageConfig;

    /** Similarity strategy; overrides `embedder` */
    readonly strategy?: SimilarityStrategy;

    /** When given (and no strategy), similarity is embedding-augmented */
    readonly embedder?: Embedder;

    /** Matches kept per message (default: `similarity.topK` of the config) */
    readonly topK?: number;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;

    /** Clock for defaults and recency (default: system time) */
    readonly now?: () => Date;
}

/**
 * Options for draining a record provider.
 */
export interface DrainOptions {
    /** Records requested per fetch (default: 50) */
    readonly batchSize?: number;
}

/**
 * Generate a unique trace ID for message processing.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * TriageEngine - categorizes, scores and cross-references chat messages.
 *
 * @example
 * ```typescript
 * const engine = new TriageEngine();
 *
 * engine.eventBus.subscribe("message:processed", (event) => {
 *     console.log("Processed:", event.data);
 * });
 *
 * const results = engine.processBatch([
 *     { id: "m1", text: "production is down, URGENT!!!", user: "U1", channel: "C1" },
 * ]);
 * ```
 */
export class TriageEngine {
    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    /** Validated configuration in use */
    public readonly config: TriageConfig;

    private readonly logger: EngineLogger;
    private readonly now: () => Date;
    private readonly topK: number;
    private readonly categorizer: Categorizer;
    private readonly scorer: PriorityScorer;
    private readonly store: MessageStore = new MessageStore();
    private readonly similarity: SimilarityEngine;
    private readonly categories: Map<string, CategoryDefinition>;

    /**
     * @throws ConfigurationError if the configuration or topK is unusable
     */
    constructor(options: TriageEngineConfig = {}) {
        const config = options.config ?? loadDefaultTriageConfig();
        const issues = validateTriageConfig(config);

        const topK = options.topK ?? config.similarity.topK;
        if (!Number.isInteger(topK) || topK < 1) {
            issues.push(`topK must be a positive integer, got ${topK}`);
        }
        if (issues.length > 0) {
            throw new ConfigurationError(issues);
        }

        this.config   = config;
        this.topK     = topK;
        this.eventBus = options.eventBus ?? new InMemoryEventBus();
        this.logger   = options.logger ?? defaultLogger;
        this.now      = options.now ?? (() => new Date());

        this.categories  = new Map(config.categories.map((category) => [category.name, category]));
        this.categorizer = new Categorizer(config.categories, config.categorizer);
        this.scorer      = new PriorityScorer(config.priority, this.now);

        const strategy = options.strategy ?? this.createStrategy(options.embedder);
        this.similarity = new SimilarityEngine(this.store, strategy, topK);

        this.emit(createEvent("engine:configured", {
            categories: config.categories.map((category) => category.name),
            strategy  : strategy.id,
            topK,
        }));

        this.logger.info("Triage engine configured", {
            categories: config.categories.length,
            strategy  : strategy.id,
            topK,
        });
    }

    /**
     * Identifier of the similarity strategy in use.
     */
    get strategyId(): string {
        return this.similarity.strategy.id;
    }

    /**
     * Number of messages processed so far.
     */
    get size(): number {
        return this.store.size;
    }

    /**
     * Process one record.
     *
     * @param record - Raw input record
     * @returns The processed message, also appended to the store
     * @throws Whatever a similarity strategy throws; `processBatch` isolates it
     */
    process(record: RawMessageRecord): ProcessedMessage {
        const traceId = generateTraceId();
        const startTime = Date.now();

        const message = createTriageMessage(record, this.now());

        this.emit(createEvent("message:received", {
            messageId: message.id,
            channel  : message.metadata.channel,
        }, traceId));

        if (record.ts !== undefined && parseTimestamp(record.ts) === undefined) {
            this.logger.debug("Unparsable timestamp, using processing time", {
                messageId: message.id,
                ts       : record.ts,
                traceId,
            });
        }

        const normalizedText = normalizeText(message.content);

        const assignment = this.categorizer.categorize(normalizedText, {
            logger: createStageLogger(this.logger, "categorizer", traceId),
            traceId,
        });
        const category = this.categories.get(assignment.category);

        this.emit(createEvent("message:categorized", {
            messageId : message.id,
            category  : assignment.category,
            confidence: assignment.confidence,
            score     : assignment.score,
        }, traceId));

        const priorityScore = this.scorer.score({
            text     : normalizedText,
            timestamp: message.metadata.timestamp,
            reactions: message.metadata.reactions,
        }, category);

        this.emit(createEvent("message:scored", {
            messageId: message.id,
            priorityScore,
        }, traceId));

        const similarTickets = this.similarity.findSimilar({ id: message.id, normalizedText }, this.topK);

        this.emit(createEvent("message:matched", {
            messageId: message.id,
            matches  : similarTickets.length,
            strategy : this.strategyId,
        }, traceId));

        const processed: ProcessedMessage = Object.freeze({
            ...message,
            traceId,
            normalizedText,
            category      : assignment.category,
            confidence    : assignment.confidence,
            priorityScore,
            color         : category?.color ?? kUNKNOWN_COLOR,
            similarTickets: Object.freeze(similarTickets),
        });

        this.store.append(processed);

        const duration = Date.now() - startTime;
        this.emit(createEvent("message:processed", {
            messageId    : processed.id,
            category     : processed.category,
            priorityScore: processed.priorityScore,
            duration,
        }, traceId));

        this.logger.debug("Message processed", {
            messageId: processed.id,
            category : processed.category,
            traceId,
            duration,
        });

        return processed;
    }

    /**
     * Process records in input order.
     *
     * A record that fails is logged, reported as `message:error` and
     * skipped; the rest of the batch continues.
     *
     * @returns Successfully processed messages, in input order
     */
    processBatch(records: readonly RawMessageRecord[]): ProcessedMessage[] {
        const startTime = Date.now();
        const processed: ProcessedMessage[] = [];
        let failed = 0;

        this.emit(createEvent("batch:started", { size: records.length }));

        records.forEach((record, index) => {
            try {
                processed.push(this.process(record));
            }
            catch (error) {
                failed++;

                this.emit(createEvent("message:error", {
                    index,
                    recordId: record?.id,
                    error   : errorMessage(error),
                }));

                this.logger.error("Message processing error", {
                    index,
                    recordId: record?.id,
                    error   : errorMessage(error),
                });
            }
        });

        const duration = Date.now() - startTime;
        this.emit(createEvent("batch:completed", {
            processed: processed.length,
            failed,
            duration,
        }));

        this.logger.info("Batch completed", {
            processed: processed.length,
            failed,
            duration,
        });

        return processed;
    }

    /**
     * Let the similarity strategy do its asynchronous preparation
     * (embedding prefetch) for a batch, then process it.
     *
     * A failed preparation does not abort the batch: records the strategy
     * cannot score fail one by one inside `processBatch`.
     */
    async processRecords(records: readonly RawMessageRecord[]): Promise<ProcessedMessage[]> {
        const strategy = this.similarity.strategy;

        if (strategy.prepare) {
            const texts = records.map((record) =>
                normalizeText(typeof record?.text === "string" ? record.text : "")
            );
            try {
                await strategy.prepare(texts);
            }
            catch (error) {
                this.logger.warn("Similarity preparation failed", {
                    strategy: strategy.id,
                    records : records.length,
                    error   : errorMessage(error),
                });
            }
        }

        return this.processBatch(records);
    }

    /**
     * Pull every record a provider has and process them batch by batch.
     *
     * @param provider - Record source
     * @param options - Fetch size
     * @returns All processed messages, in provider order
     */
    async drain(provider: RecordProvider, options: DrainOptions = {}): Promise<ProcessedMessage[]> {
        const batchSize = options.batchSize ?? kDEFAULT_DRAIN_BATCH_SIZE;
        const processed: ProcessedMessage[] = [];

        try {
            if (provider.initialize) {
                await provider.initialize();
            }
            this.logger.info("Provider initialized", { providerId: provider.id });
        }
        catch (error) {
            this.logger.error("Provider initialization failed", {
                providerId: provider.id,
                error     : errorMessage(error),
            });
            throw error;
        }

        try {
            let hasMore = true;
            while (hasMore) {
                const result = await provider.getRecords({ limit: batchSize });
                if (result.records.length === 0) {
                    break;
                }

                this.logger.debug("Fetched records", {
                    providerId: provider.id,
                    count     : result.records.length,
                });

                processed.push(...await this.processRecords(result.records));
                hasMore = result.hasMore;
            }
        }
        finally {
            if (provider.shutdown) {
                try {
                    await provider.shutdown();
                }
                catch (error) {
                    this.logger.error("Provider shutdown error", {
                        providerId: provider.id,
                        error     : errorMessage(error),
                    });
                }
            }
        }

        return processed;
    }

    /**
     * Rank stored messages against an arbitrary query.
     */
    findSimilar(query: SimilarityQuery, topK: number = this.topK): SimilarityMatch[] {
        return this.similarity.findSimilar(query, topK);
    }

    /**
     * All processed messages, in processing order.
     */
    getMessages(): readonly ProcessedMessage[] {
        return this.store.all();
    }

    /**
     * Summary analytics over everything processed so far.
     */
    getSummary(options: Omit<SummaryOptions, "now"> = {}): BatchSummary {
        return summarizeMessages(this.store.all(), { ...options, now: this.now() });
    }

    private createStrategy(embedder: Embedder | undefined): SimilarityStrategy {
        const settings = this.config.similarity;

        if (embedder) {
            return new EmbeddingSimilarity(embedder, {
                minSimilarity : settings.embeddingThreshold,
                semanticWeight: settings.semanticWeight,
                fuzzyWeight   : settings.fuzzyWeight,
            });
        }

        return new LexicalSimilarity(settings.lexicalThreshold);
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
