/**
 * Detector configuration: defaults, schema validation and threshold checks
 */

import * as fs from "fs";
import { z } from "zod";
import type { ConfigValidation, EmptySlotPolicy, SimilarityFn } from "./types";
import { ConfigError, formatIssues } from "./errors";
import { indelRatio } from "./scoring/similarity";
import { maxOf } from "./utils/shared";

/**
 * Serializable options, shared by config files, CLI flags and MCP tool arguments
 */
export const DetectorConfigFileSchema = z
    .object({
        windowSize: z.number().int().min(0).optional(),
        headerThreshold: z.number().finite().optional(),
        footerThreshold: z.number().finite().optional(),
        weights: z.array(z.number().finite().min(0)).min(1).optional(),
        emptySlots: z.enum(["compare", "skip"]).optional(),
        debug: z.boolean().optional(),
    })
    .strict();

export type DetectorConfigFile = z.infer<typeof DetectorConfigFileSchema>;

export interface DetectorConfig extends DetectorConfigFile {
    /** String similarity in [0, 1]; defaults to the normalized InDel ratio */
    similarity?: SimilarityFn;
}

export interface ResolvedConfig {
    windowSize: number;
    headerThreshold: number;
    footerThreshold: number;
    weights: readonly number[];
    emptySlots: EmptySlotPolicy;
    similarity: SimilarityFn;
    debug: boolean;
}

export const DEFAULT_WEIGHTS: readonly number[] = [1.0, 0.75, 0.5, 0.5, 0.5];

export const DEFAULT_CONFIG: Omit<ResolvedConfig, "footerThreshold"> = {
    windowSize: 8, // 8 pages either side, 17 including the page itself
    headerThreshold: 8.0,
    weights: DEFAULT_WEIGHTS,
    emptySlots: "compare",
    similarity: indelRatio,
    debug: false,
};

/**
 * Merge overrides onto the defaults and validate the result
 * footerThreshold falls back to the (possibly overridden) headerThreshold.
 */
export function resolveConfig(overrides: DetectorConfig = {}): ResolvedConfig {
    const { similarity, ...serializable } = overrides;
    const parsed = DetectorConfigFileSchema.safeParse(serializable);

    if (!parsed.success) {
        throw new ConfigError("Invalid detector configuration", formatIssues(parsed.error.issues));
    }

    const options = parsed.data;
    const headerThreshold = options.headerThreshold ?? DEFAULT_CONFIG.headerThreshold;

    return {
        windowSize: options.windowSize ?? DEFAULT_CONFIG.windowSize,
        headerThreshold,
        footerThreshold: options.footerThreshold ?? headerThreshold,
        weights: options.weights ?? DEFAULT_CONFIG.weights,
        emptySlots: options.emptySlots ?? DEFAULT_CONFIG.emptySlots,
        similarity: similarity ?? DEFAULT_CONFIG.similarity,
        debug: options.debug ?? DEFAULT_CONFIG.debug,
    };
}

/**
 * Highest score an interior page can reach: 2W comparisons plus the self term
 * Boundary pages see a truncated window and top out at W * max(weights) + 1.
 */
export function maxPossibleScore(config: Pick<ResolvedConfig, "windowSize" | "weights">): number {
    return config.windowSize * 2 * maxOf(config.weights) + 1;
}

/**
 * Check that both thresholds are reachable
 * An unreachable threshold is not an error: that line type is simply never detected.
 */
export function validateConfig(config: ResolvedConfig): ConfigValidation {
    const maxScore = maxPossibleScore(config);
    const offending: string[] = [];

    if (config.headerThreshold > maxScore) {
        offending.push(`Header threshold (${config.headerThreshold})`);
    }
    if (config.footerThreshold > maxScore) {
        offending.push(`Footer threshold (${config.footerThreshold})`);
    }

    if (offending.length === 0) {
        return { ok: true };
    }

    return {
        ok: false,
        warning: `${offending.join(" and ")} exceeds maximum possible score (${maxScore}).`,
    };
}

/**
 * Read detector options from a JSON file
 */
export function loadConfigFile(filePath: string): DetectorConfigFile {
    if (!fs.existsSync(filePath)) {
        throw new ConfigError(`Config file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
        throw new ConfigError(`Config file is not valid JSON: ${filePath} (${err instanceof Error ? err.message : String(err)})`);
    }

    const parsed = DetectorConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file: ${filePath}`, formatIssues(parsed.error.issues));
    }
    return parsed.data;
}
