/**
 * A prior message judged related to a query message.
 *
 * Produced per query and kept only as part of the querying
 * message's result.
 */
export interface SimilarityMatch {
    /** Identifier of the stored message */
    readonly ticketId: string;

    /** Combined similarity in [0, 1] */
    readonly similarityScore: number;

    /** Category the stored message was assigned */
    readonly category: string;

    /** Up to three shared word pairs, for display only */
    readonly keyPhrases: readonly string[];

    /** Leading part of the stored message's raw text */
    readonly textPreview: string;
}
