import { describe, it, expect, vi, afterEach } from "vitest";
import { createDetector, detectHeadersFooters, removeHeadersFooters } from "../pipeline";
import { ConfigError } from "../errors";
import type { Document } from "../types";

const repeatedPages: Document = [
    ["Page Header", "Content A", "Page Footer"],
    ["Page Header", "Content A", "Page Footer"],
    ["Page Header", "Content A", "Page Footer"],
    ["Page Header", "Content A", "Page Footer"],
];

const chapterTitles = [
    "A Brief History of Lighthouses",
    "Keepers and Their Families",
    "Fresnel Lenses Explained",
    "Storms Along the Northern Coast",
    "Automation After the War",
    "Preservation Societies Today",
];

const chapterPages: Document = chapterTitles.map((title, i) => [
    `Chapter ${i + 1}: ${title}`,
    `Body text of chapter ${i + 1}`,
    `Page ${i + 1}`,
]);

afterEach(() => {
    vi.restoreAllMocks();
});

describe("detectHeadersFooters", () => {
    it("scores identical headers higher in the middle of the document", () => {
        const doc: Document = Array.from({ length: 5 }, () => ["Header"]);
        const { pages } = detectHeadersFooters(doc, { windowSize: 2, weights: [1.0], headerThreshold: 1 });

        expect(pages.map(p => p[0]?.headerScore)).toEqual([3, 4, 5, 4, 3]);
    });

    it("classifies repeated first and last lines", () => {
        const { pages } = detectHeadersFooters(repeatedPages, {
            windowSize: 2,
            headerThreshold: 2.0,
            weights: [1.0],
        });

        for (const page of pages) {
            expect(page.map(l => l.lineType)).toEqual(["header", "body", "footer"]);
        }
        expect(pages.map(p => p[0]?.headerScore)).toEqual([3, 4, 4, 3]);
        expect(pages.map(p => p[2]?.footerScore)).toEqual([3, 4, 4, 3]);
    });

    it("detects normalized footers while varying headers stay below the threshold", () => {
        const { pages } = detectHeadersFooters(chapterPages, {
            windowSize: 5,
            headerThreshold: 5,
            weights: [1.0],
        });

        for (const page of pages) {
            expect(page[0]?.lineType).toBe("body");
            expect(page[0]?.headerScore).toBeLessThan(4);
            expect(page[2]?.lineType).toBe("footer");
            expect(page[2]?.footerScore).toBe(6);
            expect(page[2]?.cleanedText).toBe("Page @");
        }
        expect(pages[0]?.[0]?.headerScore).toBeCloseTo(3.5936, 3);
    });

    it("detects footers numbered in Arabic-Indic digits", () => {
        const arabicIndic = (n: number): string =>
            String(n).replace(/[0-9]/g, d => String.fromCharCode(0x0660 + Number(d)));
        const doc: Document = Array.from({ length: 9 }, (_, i) => [
            `Section ${i + 1}`,
            "Body",
            `صفحة ${arabicIndic((i + 1) * 100)}`,
        ]);
        const { pages } = detectHeadersFooters(doc, { windowSize: 2, headerThreshold: 2.9, weights: [1] });

        expect(pages.map(p => p[2]?.cleanedText)).toEqual(Array.from({ length: 9 }, () => "صفحة @"));
        expect(pages.map(p => p[2]?.footerScore)).toEqual([3, 4, 5, 5, 5, 5, 5, 4, 3]);
        expect(pages.every(p => p[2]?.lineType === "footer")).toBe(true);
    });

    it("finds no headers or footers on a single page", () => {
        const { pages } = detectHeadersFooters([["Header", "Content", "Footer"]], {
            windowSize: 2,
            headerThreshold: 1.5,
            weights: [1.0],
        });

        const [page] = pages;
        expect(page?.[0]?.isHeaderCandidate).toBe(true);
        expect(page?.[2]?.isFooterCandidate).toBe(true);
        expect(page?.[0]?.headerScore).toBe(1);
        expect(page?.[2]?.footerScore).toBe(1);
        expect(page?.every(l => l.lineType === "body")).toBe(true);
    });

    it("returns an empty result for an empty document", () => {
        expect(detectHeadersFooters([]).pages).toEqual([]);
    });

    it("returns one annotated page per non-empty input page", () => {
        const doc: Document = [["a", "b"], [], ["   "], ["c"]];
        const { pages } = detectHeadersFooters(doc, { windowSize: 1, headerThreshold: 1 });

        expect(pages).toHaveLength(3);
        expect(pages.map(p => p.length)).toEqual([2, 1, 1]);
    });

    it("keeps a line that ties on both scores as a header", () => {
        const doc: Document = [["Same line"], ["Same line"], ["Same line"]];
        const { pages } = detectHeadersFooters(doc, { windowSize: 2, headerThreshold: 0.1, weights: [1.0] });

        for (const page of pages) {
            expect(page[0]?.headerScore).toBe(3);
            expect(page[0]?.footerScore).toBe(3);
            expect(page[0]?.lineType).toBe("header");
        }
    });

    it("applies reversed weights to footer slots", () => {
        // Two-line pages: both lines are header and footer candidates
        const doc: Document = [["A", "B"], ["A", "B"], ["A", "B"]];
        const { pages } = detectHeadersFooters(doc, { windowSize: 1, headerThreshold: 1.5, weights: [1.0, 0.5] });
        const first = pages[0];

        expect(first?.[0]).toMatchObject({ headerScore: 2, footerScore: 1, lineType: "header" });
        expect(first?.[1]).toMatchObject({ headerScore: 1, footerScore: 2, lineType: "footer" });
    });

    it("only classifies candidates, and footers always beat their header score", () => {
        const doc: Document = [
            ["ACME Corp", "", "Intro", "More", "text", "Confidential", "1"],
            ["ACME Corp", "Section 2", "Other", "words", "here", "Confidential", "2"],
            ["ACME Corp", "Section 3", "Yet", "more", "prose", "Confidential", "3"],
            ["ACME Corp", "Section 4", "Final", "page", "now", "Confidential", "4"],
        ];
        const { pages } = detectHeadersFooters(doc, { windowSize: 3, headerThreshold: 2, weights: [1, 0.5] });

        for (const page of pages) {
            for (const line of page) {
                if (!line.isHeaderCandidate && !line.isFooterCandidate) {
                    expect(line.lineType).toBe("body");
                }
                if (line.lineType === "footer") {
                    expect(line.footerScore).toBeGreaterThan(line.headerScore);
                }
            }
        }
        expect(pages.map(p => p[0]?.lineType)).toEqual(["header", "header", "header", "header"]);
        expect(pages.map(p => p[6]?.lineType)).toEqual(["footer", "footer", "footer", "footer"]);
    });

    it("uses a custom similarity function", () => {
        const exactMatch = (a: string, b: string): number => (a === b ? 1 : 0);
        const doc: Document = [["Page 1"], ["Page 2"], ["Page 3"]];
        const { pages } = detectHeadersFooters(doc, { windowSize: 1, headerThreshold: 3, weights: [1], similarity: exactMatch });

        // Normalization still applies before the similarity function sees the text
        expect(pages.map(p => p[0]?.headerScore)).toEqual([2, 3, 2]);
    });

    it("reports a validation warning for unreachable thresholds", () => {
        const { validation } = detectHeadersFooters(repeatedPages, { windowSize: 1, weights: [1], headerThreshold: 10 });

        expect(validation).toEqual({
            ok: false,
            warning: "Header threshold (10) and Footer threshold (10) exceeds maximum possible score (3).",
        });
    });

    it("attaches run statistics in debug mode", () => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        const { debug } = detectHeadersFooters(repeatedPages, {
            windowSize: 2,
            headerThreshold: 2,
            weights: [1],
            debug: true,
        });

        expect(debug).toEqual({
            inputPages: 4,
            retainedPages: 4,
            lineCount: 12,
            headerCandidates: 4,
            footerCandidates: 4,
            headerLines: 4,
            footerLines: 4,
            maxPossibleScore: 5,
            similarityCalls: 28,
            similarityCacheHits: 26,
        });
    });

    it("omits statistics unless debug is set", () => {
        expect(detectHeadersFooters(repeatedPages).debug).toBeUndefined();
    });
});

describe("removeHeadersFooters", () => {
    it("keeps only the body lines", () => {
        const result = removeHeadersFooters(repeatedPages, { windowSize: 2, headerThreshold: 2.0, weights: [1.0] });

        expect(result).toEqual([["Content A"], ["Content A"], ["Content A"], ["Content A"]]);
    });

    it("preserves the order of remaining lines", () => {
        const doc: Document = [
            ["Title", "first", "second", "third", "Page 1"],
            ["Title", "uno", "dos", "tres", "Page 2"],
            ["Title", "eins", "zwei", "drei", "Page 3"],
        ];
        const result = removeHeadersFooters(doc, { windowSize: 2, headerThreshold: 2.5, weights: [1] });

        expect(result).toEqual([
            ["first", "second", "third"],
            ["uno", "dos", "tres"],
            ["eins", "zwei", "drei"],
        ]);
    });
});

describe("createDetector", () => {
    it("exposes the resolved config and validation", () => {
        const detector = createDetector({ windowSize: 4 });

        expect(detector.config.windowSize).toBe(4);
        expect(detector.config.footerThreshold).toBe(8);
        expect(detector.validation).toEqual({ ok: true });
    });

    it("can be reused across documents", () => {
        const detector = createDetector({ windowSize: 2, headerThreshold: 2, weights: [1] });

        expect(detector.strip(repeatedPages)).toEqual([["Content A"], ["Content A"], ["Content A"], ["Content A"]]);
        expect(detector.strip([["Only page"]])).toEqual([["Only page"]]);
    });

    it("logs the threshold warning when asked", () => {
        const spy = vi.spyOn(console, "error").mockImplementation(() => {});
        createDetector({ windowSize: 1, weights: [1], headerThreshold: 10 }, { warn: true });

        expect(spy).toHaveBeenCalledTimes(1);
        expect(String(spy.mock.calls[0]?.[0])).toMatch(/\[WARN\] Header threshold \(10\) and Footer threshold \(10\) exceeds maximum possible score \(3\)\.$/);
    });

    it("stays quiet without the warn option", () => {
        const spy = vi.spyOn(console, "error").mockImplementation(() => {});
        createDetector({ windowSize: 1, weights: [1], headerThreshold: 10 });

        expect(spy).not.toHaveBeenCalled();
    });

    it("throws ConfigError for invalid options", () => {
        expect(() => createDetector({ weights: [] })).toThrow(ConfigError);
    });
});
