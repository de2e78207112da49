import type {
    AnnotatedPage,
    ConfigValidation,
    DetectionResult,
    DetectionStats,
    Document,
    LineRecord,
} from "./types";
import {
    maxPossibleScore,
    resolveConfig,
    validateConfig,
    type DetectorConfig,
    type ResolvedConfig,
} from "./config";
import { tagDocument } from "./extraction/candidates";
import { buildCandidateMatrices } from "./extraction/matrix";
import { createCachedSimilarity } from "./scoring/similarity";
import { footerWeights, scoreCandidateMatrix } from "./scoring/window";
import { classifyPage } from "./scoring/classify";
import { keepBodyLines } from "./output/format";
import Logger from "./utils/logger";

export interface DetectorOptions {
    /** Log the threshold warning (if any) when the detector is created */
    warn?: boolean;
}

export interface Detector {
    config: ResolvedConfig;
    validation: ConfigValidation;
    /** Classify every line of a document */
    annotate: (doc: Document) => DetectionResult;
    /** Return only the body lines of each retained page */
    strip: (doc: Document) => string[][];
}

/**
 * Count lines matching a predicate across all pages
 */
function countLines(pages: readonly AnnotatedPage[], predicate: (line: LineRecord) => boolean): number {
    let count = 0;
    for (const page of pages) {
        for (const line of page) {
            if (predicate(line)) count++;
        }
    }
    return count;
}

function buildStats(
    doc: Document,
    pages: readonly AnnotatedPage[],
    cfg: ResolvedConfig,
    cache: { calls: number; hits: number }
): DetectionStats {
    return {
        inputPages: doc.length,
        retainedPages: pages.length,
        lineCount: countLines(pages, () => true),
        headerCandidates: countLines(pages, l => l.isHeaderCandidate),
        footerCandidates: countLines(pages, l => l.isFooterCandidate),
        headerLines: countLines(pages, l => l.lineType === "header"),
        footerLines: countLines(pages, l => l.lineType === "footer"),
        maxPossibleScore: maxPossibleScore(cfg),
        similarityCalls: cache.calls,
        similarityCacheHits: cache.hits,
    };
}

/**
 * Run tag → matrix → score → classify over a document with a resolved config
 */
function runDetection(doc: Document, cfg: ResolvedConfig, validation: ConfigValidation): DetectionResult {
    const logger = Logger.getInstance();
    const candidateCount = cfg.weights.length;

    // Step 1: Tag header/footer candidates (drops zero-line pages)
    const tagged = logger.time("1. Tag candidates", () => tagDocument(doc, candidateCount));

    // Step 2: Align candidates into pages x K matrices
    const matrices = logger.time("2. Build matrices", () => buildCandidateMatrices(tagged, candidateCount));

    // Step 3-4: Window scores; one similarity cache shared by both passes
    const cache = createCachedSimilarity(cfg.similarity);
    const scoreConfig = {
        windowSize: cfg.windowSize,
        similarity: cache.similarity,
        emptySlots: cfg.emptySlots,
    };
    const headerScores = logger.time("3. Score headers", () =>
        scoreCandidateMatrix(matrices.header, cfg.weights, scoreConfig)
    );
    const footerScores = logger.time("4. Score footers", () =>
        scoreCandidateMatrix(matrices.footer, footerWeights(cfg.weights), scoreConfig)
    );

    // Step 5: Classify, strictly after all scores are final
    const thresholds = { headerThreshold: cfg.headerThreshold, footerThreshold: cfg.footerThreshold };
    const pages = logger.time("5. Classify", () =>
        tagged.map((page, i) => classifyPage(page, headerScores[i] ?? [], footerScores[i] ?? [], thresholds))
    );

    if (!cfg.debug) {
        return { pages, validation };
    }

    const debug = buildStats(doc, pages, cfg, cache.stats());
    logger.debug(
        `Classified ${debug.lineCount} lines on ${debug.retainedPages}/${debug.inputPages} pages: ` +
        `${debug.headerLines} header, ${debug.footerLines} footer ` +
        `(similarity calls ${debug.similarityCalls}, cache hits ${debug.similarityCacheHits})`
    );
    return { pages, validation, debug };
}

/**
 * Create a reusable detector
 * Invalid options throw a ConfigError; unreachable thresholds only set `validation`.
 */
export function createDetector(config: DetectorConfig = {}, options: DetectorOptions = {}): Detector {
    const cfg = resolveConfig(config);
    const validation = validateConfig(cfg);

    if (options.warn && !validation.ok) {
        Logger.getInstance().warn(validation.warning);
    }

    function annotate(doc: Document): DetectionResult {
        return runDetection(doc, cfg, validation);
    }

    function strip(doc: Document): string[][] {
        return keepBodyLines(annotate(doc).pages);
    }

    return {
        config: cfg,
        validation,
        annotate,
        strip,
    };
}

/**
 * Classify every line of a document - convenience function
 */
export function detectHeadersFooters(doc: Document, config: DetectorConfig = {}): DetectionResult {
    return createDetector(config).annotate(doc);
}

/**
 * Remove header and footer lines, keeping body lines in their original order
 */
export function removeHeadersFooters(doc: Document, config: DetectorConfig = {}): string[][] {
    return createDetector(config).strip(doc);
}
