import { describe, it, expect } from "vitest";
import { runDetectTool, runStripTool, toDetectorConfig } from "../tools";

const pages = [
    ["Page Header", "Content A", "Page Footer"],
    ["Page Header", "Content A", "Page Footer"],
    ["Page Header", "Content A", "Page Footer"],
    ["Page Header", "Content A", "Page Footer"],
];

function responseText(response: { content: Array<{ text: string }> }): string {
    return response.content[0]?.text ?? "";
}

describe("toDetectorConfig", () => {
    it("keeps only the options that were given", () => {
        expect(toDetectorConfig({ pages: [], windowSize: 3 })).toEqual({ windowSize: 3 });
        expect(toDetectorConfig({ pages: [] })).toEqual({});
    });
});

describe("runStripTool", () => {
    it("returns body text with form feeds between pages", () => {
        const response = runStripTool({ pages, windowSize: 2, headerThreshold: 2, weights: [1] });

        expect(response.isError).toBeUndefined();
        expect(responseText(response)).toBe("Content A\n\fContent A\n\fContent A\n\fContent A\n");
    });

    it("reports invalid options as a tool error", () => {
        const response = runStripTool({ pages, weights: [] });

        expect(response.isError).toBe(true);
        expect(responseText(response)).toMatch(/^Invalid detector configuration/);
    });
});

describe("runDetectTool", () => {
    it("returns classified lines as JSON", () => {
        const response = runDetectTool({ pages, windowSize: 2, headerThreshold: 2, weights: [1] });
        const parsed: unknown = JSON.parse(responseText(response));

        expect(parsed).toHaveProperty("pages.length", 4);
        expect(parsed).toHaveProperty(["pages", 0], [
            { lineIndex: 0, lineType: "header", headerScore: 3, footerScore: 0, text: "Page Header" },
            { lineIndex: 1, lineType: "body", headerScore: 0, footerScore: 0, text: "Content A" },
            { lineIndex: 2, lineType: "footer", headerScore: 0, footerScore: 3, text: "Page Footer" },
        ]);
        expect(parsed).not.toHaveProperty("warning");
    });

    it("includes the warning for unreachable thresholds", () => {
        const response = runDetectTool({ pages, windowSize: 1, headerThreshold: 100, weights: [1] });
        const parsed: unknown = JSON.parse(responseText(response));

        expect(parsed).toMatchObject({
            warning: "Header threshold (100) and Footer threshold (100) exceeds maximum possible score (3).",
        });
    });
});
