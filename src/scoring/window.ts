import type { CandidateMatrix, EmptySlotPolicy, ScoreMatrix, SimilarityFn } from "../types";
import { indelRatio } from "./similarity";

export interface WindowScoreConfig {
    windowSize?: number;
    similarity?: SimilarityFn;
    emptySlots?: EmptySlotPolicy;
}

const DEFAULT_CONFIG: Required<WindowScoreConfig> = {
    windowSize: 8,
    similarity: indelRatio,
    emptySlots: "compare",
};

export interface PageWindow {
    start: number; // inclusive
    end: number; // inclusive
}

/**
 * Inclusive range of pages compared against `page`, clipped to the document
 */
export function pageWindow(page: number, pageCount: number, windowSize: number): PageWindow {
    return {
        start: Math.max(0, page - windowSize),
        end: Math.min(pageCount - 1, page + windowSize),
    };
}

/**
 * Score a single (page, slot) cell against the same slot on every page in its window
 * The window includes the page itself, so a filled slot always gains weight * 1.
 */
export function scoreCell(
    matrix: CandidateMatrix,
    page: number,
    slot: number,
    weight: number,
    config: Required<WindowScoreConfig>
): number {
    const current = matrix[page]?.[slot] ?? "";
    const skipEmpty = config.emptySlots === "skip";

    if (skipEmpty && current === "") {
        return 0;
    }

    const { start, end } = pageWindow(page, matrix.length, config.windowSize);
    let score = 0;

    for (let q = start; q <= end; q++) {
        const other = matrix[q]?.[slot] ?? "";
        if (skipEmpty && other === "") continue;
        score += config.similarity(current, other) * weight;
    }

    return score;
}

/**
 * Score every cell of a candidate matrix
 * Pure: the matrix is only read, and a new score matrix of the same shape is returned.
 */
export function scoreCandidateMatrix(
    matrix: CandidateMatrix,
    weights: readonly number[],
    config: WindowScoreConfig = {}
): ScoreMatrix {
    const cfg: Required<WindowScoreConfig> = {
        windowSize: config.windowSize ?? DEFAULT_CONFIG.windowSize,
        similarity: config.similarity ?? DEFAULT_CONFIG.similarity,
        emptySlots: config.emptySlots ?? DEFAULT_CONFIG.emptySlots,
    };

    return matrix.map((row, page) =>
        row.map((_, slot) => scoreCell(matrix, page, slot, weights[slot] ?? 0, cfg))
    );
}

/**
 * Weights aligned to footer slots: the heaviest weight lands on slot K-1,
 * the candidate closest to the bottom edge
 */
export function footerWeights(weights: readonly number[]): number[] {
    return [...weights].reverse();
}
