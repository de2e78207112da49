/**
 * MCP tool handlers, kept apart from the stdio server so they can be tested
 */

import { z } from "zod";
import type { DetectorConfigFile } from "../config";
import { createDetector } from "../pipeline";
import { formatStripped, keepBodyLines } from "../output/format";

/** Tool arguments shared by both tools */
export const detectorToolShape = {
    pages: z.array(z.array(z.string())).describe(
        "The document: an array of pages, each an array of line strings in reading order"
    ),
    windowSize: z.number().int().min(0).optional().describe(
        "Pages compared on each side of a page (default: 8)"
    ),
    headerThreshold: z.number().optional().describe(
        "Minimum score for a header line (default: 8). Interior pages can reach at most 2 * windowSize * max(weights) + 1."
    ),
    footerThreshold: z.number().optional().describe(
        "Minimum score for a footer line (default: headerThreshold)"
    ),
    weights: z.array(z.number().min(0)).min(1).optional().describe(
        "Per-line weights for the candidate lines, top line first (default: [1, 0.75, 0.5, 0.5, 0.5])"
    ),
};

const DetectorToolArgsSchema = z.object(detectorToolShape);

export type DetectorToolArgs = z.infer<typeof DetectorToolArgsSchema>;

export interface ToolResponse {
    [key: string]: unknown;
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
}

function textResponse(text: string): ToolResponse {
    return { content: [{ type: "text", text }] };
}

function errorResponse(err: unknown): ToolResponse {
    const message = err instanceof Error ? err.message : String(err);
    return { content: [{ type: "text", text: message }], isError: true };
}

/**
 * Pick the detector options out of the tool arguments
 */
export function toDetectorConfig(args: DetectorToolArgs): DetectorConfigFile {
    return {
        ...(args.windowSize !== undefined && { windowSize: args.windowSize }),
        ...(args.headerThreshold !== undefined && { headerThreshold: args.headerThreshold }),
        ...(args.footerThreshold !== undefined && { footerThreshold: args.footerThreshold }),
        ...(args.weights !== undefined && { weights: args.weights }),
    };
}

/**
 * detect_headers_footers: classified lines as JSON, plus any threshold warning
 */
export function runDetectTool(args: DetectorToolArgs): ToolResponse {
    try {
        const detector = createDetector(toDetectorConfig(args));
        const result = detector.annotate(args.pages);
        const pages = result.pages.map(page =>
            page.map(line => ({
                lineIndex: line.lineIndex,
                lineType: line.lineType,
                headerScore: line.headerScore,
                footerScore: line.footerScore,
                text: line.text,
            }))
        );
        return textResponse(JSON.stringify({
            ...(!result.validation.ok && { warning: result.validation.warning }),
            pages,
        }, null, 2));
    } catch (err) {
        return errorResponse(err);
    }
}

/**
 * strip_headers_footers: body text, pages separated by form feeds
 */
export function runStripTool(args: DetectorToolArgs): ToolResponse {
    try {
        const detector = createDetector(toDetectorConfig(args));
        const stripped = keepBodyLines(detector.annotate(args.pages).pages);
        return textResponse(formatStripped(stripped));
    } catch (err) {
        return errorResponse(err);
    }
}
