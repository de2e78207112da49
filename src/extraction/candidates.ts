import type { Document, LineRecord, Page } from "../types";
import { isCandidateLine, normalizeLine } from "../preprocessing/normalize";

/**
 * Create an untagged body record for a line
 */
function createLineRecord(text: string, lineIndex: number): LineRecord {
    return {
        text,
        cleanedText: "",
        lineIndex,
        isHeaderCandidate: false,
        isFooterCandidate: false,
        headerScore: 0,
        footerScore: 0,
        lineType: "body",
    };
}

/**
 * Indices of the first `count` non-blank lines, scanning top to bottom
 */
export function headerCandidateIndices(lines: Page, count: number): number[] {
    const indices: number[] = [];
    for (let i = 0; i < lines.length && indices.length < count; i++) {
        const line = lines[i];
        if (line !== undefined && isCandidateLine(line)) {
            indices.push(i);
        }
    }
    return indices;
}

/**
 * Indices of the last `count` non-blank lines, scanning bottom to top
 * Returned bottom-first: [lastCandidate, secondToLast, ...]
 */
export function footerCandidateIndices(lines: Page, count: number): number[] {
    const indices: number[] = [];
    for (let i = lines.length - 1; i >= 0 && indices.length < count; i--) {
        const line = lines[i];
        if (line !== undefined && isCandidateLine(line)) {
            indices.push(i);
        }
    }
    return indices;
}

/**
 * Tag header and footer candidates on a single page
 * Blank lines are skipped, never treated as a boundary. On short pages the
 * same line may be tagged as both a header and a footer candidate.
 */
export function tagPage(lines: Page, candidateCount: number): LineRecord[] {
    const headers = new Set(headerCandidateIndices(lines, candidateCount));
    const footers = new Set(footerCandidateIndices(lines, candidateCount));

    return lines.map((text, lineIndex) => {
        const isHeaderCandidate = headers.has(lineIndex);
        const isFooterCandidate = footers.has(lineIndex);
        const record = createLineRecord(text, lineIndex);

        if (!isHeaderCandidate && !isFooterCandidate) {
            return record;
        }

        return {
            ...record,
            isHeaderCandidate,
            isFooterCandidate,
            cleanedText: normalizeLine(text),
        };
    });
}

/**
 * Tag every page of a document
 * Pages with zero lines are dropped; pages of blank lines are kept untagged.
 */
export function tagDocument(doc: Document, candidateCount: number): LineRecord[][] {
    return doc
        .filter(page => page.length > 0)
        .map(page => tagPage(page, candidateCount));
}
