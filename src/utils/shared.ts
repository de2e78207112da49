/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// String utilities
// =============================================================================

/** Matches maximal runs of decimal digits in any script (Unicode Nd), e.g. "12", "١٢", "１２" */
export const DIGIT_RUN_PATTERN = /\p{Nd}+/gu;

/** Placeholder substituted for every digit run during normalization */
export const DIGIT_PLACEHOLDER = "@";

// \s plus the separators \x1c-\x1f and NEL (\x85), which line-oriented text tools also split on
const WHITESPACE_RUN_PATTERN = /[\s\x1c-\x1f\x85]+/g;
const VISIBLE_CHAR_PATTERN = /[^\s\x1c-\x1f\x85]/;

/**
 * Normalize whitespace in text: collapse multiple spaces to single, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(WHITESPACE_RUN_PATTERN, " ").trim();
}

/**
 * True if the text contains at least one non-whitespace character
 */
export function hasVisibleText(text: string): boolean {
    return VISIBLE_CHAR_PATTERN.test(text);
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

// =============================================================================
// Math utilities
// =============================================================================

/**
 * Largest value in a list
 * Returns 0 for empty arrays
 */
export function maxOf(values: readonly number[]): number {
    if (values.length === 0) return 0;

    let max = -Infinity;
    for (const value of values) {
        if (value > max) max = value;
    }
    return max;
}

/**
 * Format a score for display: integers stay bare, fractions get up to 3 decimals
 */
export function formatScore(score: number): string {
    if (Number.isInteger(score)) return String(score);
    return String(Number(score.toFixed(3)));
}
