import type { AnnotatedPage, DetectionResult, LineRecord } from "../types";
import { formatScore, truncateText } from "../utils/shared";

/** Separates pages in plain-text output, as pdftotext does */
export const PAGE_SEPARATOR = "\f";

/**
 * Drop header and footer lines, keeping body lines in their original order
 */
export function keepBodyLines(pages: readonly AnnotatedPage[]): string[][] {
    return pages.map(page =>
        page.filter(line => line.lineType === "body").map(line => line.text)
    );
}

/**
 * Candidate flags for display: H = header candidate, F = footer candidate
 */
function candidateFlags(line: LineRecord): string {
    return `${line.isHeaderCandidate ? "H" : "-"}${line.isFooterCandidate ? "F" : "-"}`;
}

/**
 * One table row per line: type, candidate flags, scores, text
 */
export function formatLine(line: LineRecord, maxTextLength: number = 80): string {
    const scores = `h=${formatScore(line.headerScore).padEnd(6)} f=${formatScore(line.footerScore).padEnd(6)}`;
    return `${line.lineType.padEnd(6)} ${candidateFlags(line)} ${scores} | ${truncateText(line.text, maxTextLength)}`;
}

/**
 * Format classified pages for display
 */
export function formatAnnotated(result: DetectionResult): string {
    const lines: string[] = [];

    lines.push(summarize(result));
    if (!result.validation.ok) {
        lines.push(`Warning: ${result.validation.warning}`);
    }
    lines.push("");

    for (let i = 0; i < result.pages.length; i++) {
        const page = result.pages[i];
        if (page === undefined) continue;

        lines.push(`--- Page ${i + 1} (${page.length} lines) ---`);
        for (const line of page) {
            lines.push(formatLine(line));
        }
        lines.push("");
    }

    return lines.join("\n");
}

/**
 * One-line count of classified lines
 */
export function summarize(result: DetectionResult): string {
    let headers = 0;
    let footers = 0;
    let body = 0;

    for (const page of result.pages) {
        for (const line of page) {
            if (line.lineType === "header") headers++;
            else if (line.lineType === "footer") footers++;
            else body++;
        }
    }

    return `Pages: ${result.pages.length}, header lines: ${headers}, footer lines: ${footers}, body lines: ${body}`;
}

/**
 * Join stripped pages into plain text, each page's lines newline-terminated
 * and pages separated by form feeds
 */
export function formatStripped(pages: readonly (readonly string[])[]): string {
    return pages
        .map(page => (page.length > 0 ? page.join("\n") + "\n" : ""))
        .join(PAGE_SEPARATOR);
}
