import type { LineRecord, LineType } from "../types";

export interface Thresholds {
    headerThreshold: number;
    footerThreshold: number;
}

/**
 * Copy window scores from the score matrices onto a page's candidate lines
 * Header scores are read top-down from slot 0; footer scores bottom-up from slot K-1.
 */
export function applyScores(
    page: readonly LineRecord[],
    headerScores: readonly number[],
    footerScores: readonly number[]
): LineRecord[] {
    const headerByLine = new Map<number, number>();
    const footerByLine = new Map<number, number>();

    let headerSlot = 0;
    for (const line of page) {
        if (!line.isHeaderCandidate) continue;
        headerByLine.set(line.lineIndex, headerScores[headerSlot] ?? 0);
        headerSlot++;
    }

    let footerSlot = footerScores.length - 1;
    for (let i = page.length - 1; i >= 0; i--) {
        const line = page[i];
        if (line === undefined || !line.isFooterCandidate) continue;
        footerByLine.set(line.lineIndex, footerScores[footerSlot] ?? 0);
        footerSlot--;
    }

    return page.map(line => ({
        ...line,
        headerScore: headerByLine.get(line.lineIndex) ?? line.headerScore,
        footerScore: footerByLine.get(line.lineIndex) ?? line.footerScore,
    }));
}

/**
 * Decide a scored line's type
 * Header check first; a footer must also beat the line's own header score,
 * which is 0 for lines that were never header candidates.
 */
export function classifyLine(line: LineRecord, thresholds: Thresholds): LineType {
    let lineType: LineType = "body";

    if (line.isHeaderCandidate && line.headerScore >= thresholds.headerThreshold) {
        lineType = "header";
    }

    if (
        line.isFooterCandidate &&
        line.footerScore >= thresholds.footerThreshold &&
        line.footerScore > line.headerScore
    ) {
        lineType = "footer";
    }

    return lineType;
}

/**
 * Score and classify every line on a page
 */
export function classifyPage(
    page: readonly LineRecord[],
    headerScores: readonly number[],
    footerScores: readonly number[],
    thresholds: Thresholds
): LineRecord[] {
    return applyScores(page, headerScores, footerScores).map(line => ({
        ...line,
        lineType: classifyLine(line, thresholds),
    }));
}
