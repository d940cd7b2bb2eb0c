/**
 * Entity Contract
 *
 * The base shape of anything that flows through the triage pipeline.
 * Messages extend this with chat metadata (author, channel, reactions).
 *
 * Entities are immutable within the pipeline. Each stage receives an
 * entity and produces new values; the processed result is a new object.
 */

/**
 * Base entity that all pipeline inputs satisfy.
 *
 * @typeParam TMetadata - Source-specific metadata type
 *
 * @example
 * ```typescript
 * interface TicketMetadata {
 *     reporter: string;
 *     openedAt: Date;
 * }
 *
 * interface TicketEntity extends Entity<TicketMetadata> {}
 * ```
 */
export interface Entity<TMetadata extends object = Record<string, unknown>> {
    /** Identifier, caller-supplied or derived from content */
    readonly id: string;

    /** Raw text to be triaged */
    readonly content: string;

    /** Source-specific metadata */
    readonly metadata: TMetadata;

    /** Trace ID assigned by the engine for log correlation */
    readonly traceId?: string;
}
