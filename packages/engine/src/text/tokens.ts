/**
 * @fileoverview Token helpers
 *
 * Word splitting, key phrase extraction and previews over normalized text.
 *
 * @module @triage/engine/text/tokens
 */

/** Words must be longer than this to take part in a key phrase */
const kKEY_PHRASE_MIN_WORD_LENGTH = 3;

const kMAX_KEY_PHRASES = 3;

const kPREVIEW_LENGTH = 100;

/**
 * Split normalized text into words.
 */
export function splitWords(normalizedText: string): string[] {
    return normalizedText.split(" ").filter((word) => word.length > 0);
}

/**
 * Contiguous word pairs where both words exceed the minimum length.
 */
function wordPairs(words: readonly string[]): string[] {
    const pairs: string[] = [];

    for (let i = 0; i < words.length - 1; i++) {
        const first  = words[i];
        const second = words[i + 1];

        if (first.length > kKEY_PHRASE_MIN_WORD_LENGTH && second.length > kKEY_PHRASE_MIN_WORD_LENGTH) {
            pairs.push(`${first} ${second}`);
        }
    }

    return pairs;
}

/**
 * Extract key phrases shared by two normalized texts.
 *
 * Phrases are returned in the order they occur in `matchedText`,
 * without duplicates, at most three.
 *
 * @param queryText - Normalized text of the query message
 * @param matchedText - Normalized text of the stored message
 * @returns Shared two-word phrases
 *
 * @example
 * ```typescript
 * extractSharedKeyPhrases("login page broken again", "the login page broken since monday");
 * // => ["login page", "page broken"]
 * ```
 */
export function extractSharedKeyPhrases(queryText: string, matchedText: string): string[] {
    const queryPairs = new Set(wordPairs(splitWords(queryText)));
    const shared     = new Set<string>();

    for (const pair of wordPairs(splitWords(matchedText))) {
        if (queryPairs.has(pair)) {
            shared.add(pair);
            if (shared.size === kMAX_KEY_PHRASES) {
                break;
            }
        }
    }

    return [...shared];
}

/**
 * First 100 characters of a raw text, with `...` appended when cut.
 */
export function textPreview(text: string): string {
    return text.length > kPREVIEW_LENGTH
        ? `${text.slice(0, kPREVIEW_LENGTH)}...`
        : text;
}
