import type { CandidateMatrices, LineRecord } from "../types";

/**
 * Header slots for one page: candidates top-down from slot 0, "" padding after
 */
export function headerSlots(page: readonly LineRecord[], candidateCount: number): string[] {
    const slots = new Array<string>(candidateCount).fill("");
    let slot = 0;

    for (const line of page) {
        if (slot >= candidateCount) break;
        if (line.isHeaderCandidate) {
            slots[slot] = line.cleanedText;
            slot++;
        }
    }

    return slots;
}

/**
 * Footer slots for one page: candidates bottom-up from slot K-1, "" padding before
 */
export function footerSlots(page: readonly LineRecord[], candidateCount: number): string[] {
    const slots = new Array<string>(candidateCount).fill("");
    let slot = candidateCount - 1;

    for (let i = page.length - 1; i >= 0 && slot >= 0; i--) {
        const line = page[i];
        if (line?.isFooterCandidate) {
            slots[slot] = line.cleanedText;
            slot--;
        }
    }

    return slots;
}

/**
 * Build the header and footer candidate matrices (pages x K)
 * Column s holds structurally analogous lines across pages regardless of page length.
 */
export function buildCandidateMatrices(
    pages: readonly (readonly LineRecord[])[],
    candidateCount: number
): CandidateMatrices {
    return {
        header: pages.map(page => headerSlots(page, candidateCount)),
        footer: pages.map(page => footerSlots(page, candidateCount)),
    };
}
