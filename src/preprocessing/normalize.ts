import {
    DIGIT_PLACEHOLDER,
    DIGIT_RUN_PATTERN,
    hasVisibleText,
    normalizeWhitespace,
} from "../utils/shared";

/**
 * Check if a line can be a header/footer candidate (not blank)
 */
export function isCandidateLine(text: string): boolean {
    return hasVisibleText(text);
}

/**
 * Normalize a line for cross-page comparison
 * Collapses whitespace, trims, then replaces each digit run with a placeholder,
 * e.g. "Page  123" → "Page @", "2024-01-15" → "@-@-@"
 */
export function normalizeLine(text: string): string {
    return normalizeWhitespace(text).replace(DIGIT_RUN_PATTERN, DIGIT_PLACEHOLDER);
}
