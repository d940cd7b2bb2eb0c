/**
 * @fileoverview Text Normalizer
 *
 * Strips chat noise (links, mentions, emoji shortcodes, punctuation) so
 * rule matching and similarity work on comparable text.
 *
 * @module @triage/engine/text/normalize
 */

const kURL_PATTERN = /https?:\/\/\S+/g;

/** `<@U123ABC>` and `<@U123ABC|display-name>` */
const kUSER_MENTION_PATTERN = /<@[A-Z0-9]+(?:\|[^>]*)?>/g;

/** `<#C123ABC|channel-name>` and the bare `<#C123ABC>` */
const kCHANNEL_MENTION_PATTERN = /<#[A-Z0-9]+(?:\|[^>]*)?>/g;

const kEMOJI_SHORTCODE_PATTERN = /:[a-zA-Z0-9_-]+:/g;

/** Anything that is not a letter, digit, whitespace, `?`, `!` or `.` */
const kNOISE_CHARACTER_PATTERN = /[^\p{L}\p{N}\s?!.]/gu;

const kWHITESPACE_RUN_PATTERN = /\s+/g;

/**
 * Normalize raw message text.
 *
 * Total and idempotent: `normalizeText(normalizeText(t)) === normalizeText(t)`.
 * Lowercasing happens before the character filter so that case mappings
 * which produce combining marks are filtered in the same pass.
 *
 * @param text - Raw message text
 * @returns Lowercase text with single spaces and no leading/trailing space
 *
 * @example
 * ```typescript
 * normalizeText("Hey <@U024BE7LH> :wave: see https://status.example.com, it's DOWN!");
 * // => "hey see it s down!"
 * ```
 */
export function normalizeText(text: string): string {
    if (!text) {
        return "";
    }

    return text
        .replace(kURL_PATTERN, " ")
        .replace(kUSER_MENTION_PATTERN, " ")
        .replace(kCHANNEL_MENTION_PATTERN, " ")
        .replace(kEMOJI_SHORTCODE_PATTERN, " ")
        .toLowerCase()
        .replace(kNOISE_CHARACTER_PATTERN, " ")
        .replace(kWHITESPACE_RUN_PATTERN, " ")
        .trim();
}
