export type {
    AnnotatedPage,
    CandidateMatrices,
    CandidateMatrix,
    ConfigValidation,
    DetectionResult,
    DetectionStats,
    Document,
    EmptySlotPolicy,
    LineRecord,
    LineType,
    Page,
    ScoreMatrix,
    SimilarityFn,
} from "./types";

export {
    createDetector,
    detectHeadersFooters,
    removeHeadersFooters,
    type Detector,
    type DetectorOptions,
} from "./pipeline";

export {
    DEFAULT_CONFIG,
    DEFAULT_WEIGHTS,
    DetectorConfigFileSchema,
    loadConfigFile,
    maxPossibleScore,
    resolveConfig,
    validateConfig,
    type DetectorConfig,
    type DetectorConfigFile,
    type ResolvedConfig,
} from "./config";

export { ConfigError, DocumentFormatError } from "./errors";

export { isCandidateLine, normalizeLine } from "./preprocessing/normalize";
export {
    inferFormat,
    loadDocument,
    parseDocument,
    parseHtmlDocument,
    parseJsonDocument,
    parseTextDocument,
    type DocumentFormat,
    type HtmlLoadConfig,
    type LoadConfig,
} from "./preprocessing/load";

export { tagDocument, tagPage } from "./extraction/candidates";
export { buildCandidateMatrices } from "./extraction/matrix";

export { createCachedSimilarity, indelRatio, type CachedSimilarity } from "./scoring/similarity";
export { footerWeights, pageWindow, scoreCandidateMatrix, type PageWindow, type WindowScoreConfig } from "./scoring/window";
export { applyScores, classifyLine, classifyPage, type Thresholds } from "./scoring/classify";

export { formatAnnotated, formatStripped, keepBodyLines, summarize } from "./output/format";

export { default as Logger } from "./utils/logger";
