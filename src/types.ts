export type LineType = "header" | "footer" | "body";

/** A page is an ordered list of raw line strings */
export type Page = readonly string[];

/** A document is an ordered list of pages */
export type Document = readonly Page[];

export interface LineRecord {
    readonly text: string;
    readonly cleanedText: string; // "" unless the line is a header or footer candidate
    readonly lineIndex: number;
    readonly isHeaderCandidate: boolean;
    readonly isFooterCandidate: boolean;
    readonly headerScore: number;
    readonly footerScore: number;
    readonly lineType: LineType;
}

export type AnnotatedPage = readonly LineRecord[];

/** pages x K grid of cleaned candidate texts ("" for unfilled slots) */
export type CandidateMatrix = readonly (readonly string[])[];

/** pages x K grid of window scores */
export type ScoreMatrix = readonly (readonly number[])[];

export interface CandidateMatrices {
    header: CandidateMatrix;
    footer: CandidateMatrix;
}

/**
 * Normalized similarity between two strings, in [0, 1].
 * Must be symmetric and return 1 for identical inputs (including "").
 */
export type SimilarityFn = (a: string, b: string) => number;

export type EmptySlotPolicy = "compare" | "skip";

export type ConfigValidation =
    | { ok: true }
    | { ok: false; warning: string };

export interface DetectionStats {
    inputPages: number;
    retainedPages: number;
    lineCount: number;
    headerCandidates: number;
    footerCandidates: number;
    headerLines: number;
    footerLines: number;
    maxPossibleScore: number;
    similarityCalls: number;
    similarityCacheHits: number;
}

export interface DetectionResult {
    pages: AnnotatedPage[];
    validation: ConfigValidation;
    debug?: DetectionStats;
}
