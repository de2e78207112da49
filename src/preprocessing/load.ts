/**
 * Document loaders: turn text, JSON or HTML into pages of lines
 */

import * as fs from "fs";
import * as path from "path";
import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { z } from "zod";
import type { Document } from "../types";
import { DocumentFormatError, formatIssues } from "../errors";
import { hasVisibleText, normalizeWhitespace } from "../utils/shared";
import { PAGE_SEPARATOR } from "../output/format";

export type DocumentFormat = "text" | "json" | "html";

export interface HtmlLoadConfig {
    /** Elements treated as pages */
    pageSelector?: string;
    /** Elements treated as lines within a page; line breaks in the page text otherwise */
    lineSelector?: string;
}

export interface LoadConfig extends HtmlLoadConfig {
    format?: DocumentFormat;
}

const DEFAULT_HTML_CONFIG: Required<Pick<HtmlLoadConfig, "pageSelector">> = {
    pageSelector: ".page",
};

const JsonDocumentSchema = z.array(z.array(z.string()));

/**
 * Split one page of text into lines, ignoring a single trailing line break
 */
function splitPageLines(pageText: string): string[] {
    if (pageText === "") return [];
    const body = pageText.replace(/\r?\n$/, "");
    return body.split(/\r?\n/);
}

/**
 * Parse plain text with form-feed page breaks (pdftotext output)
 * Text without form feeds is a single page. A trailing form feed does not open a new page.
 */
export function parseTextDocument(text: string): Document {
    const chunks = text.split(PAGE_SEPARATOR);
    if (chunks.length > 1 && chunks[chunks.length - 1] === "") {
        chunks.pop();
    }
    return chunks.map(splitPageLines);
}

/**
 * Parse a JSON array of pages, each an array of line strings
 */
export function parseJsonDocument(json: string): Document {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (err) {
        throw new DocumentFormatError(`Document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const parsed = JsonDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        throw new DocumentFormatError(
            `Expected an array of pages (arrays of strings):\n  ${formatIssues(parsed.error.issues).join("\n  ")}`
        );
    }
    return parsed.data;
}

/**
 * Extract visible lines from a page element
 * <br> tags become line breaks, like the text layer of a rendered page.
 */
function extractPageLines(
    $: cheerio.CheerioAPI,
    $page: cheerio.Cheerio<AnyNode>,
    lineSelector: string | undefined
): string[] {
    if (lineSelector !== undefined) {
        const lines: string[] = [];
        $page.find(lineSelector).each((_, el) => {
            const text = normalizeWhitespace($(el).text());
            if (hasVisibleText(text)) {
                lines.push(text);
            }
        });
        return lines;
    }

    const html = $page.html() ?? "";
    const withNewlines = html.replace(/<br\s*\/?>/gi, "\n");
    const text = cheerio.load(`<div>${withNewlines}</div>`)("div").first().text();

    return text
        .split(/\r?\n/)
        .map(line => line.replace(/[ \t]+/g, " ").trim())
        .filter(hasVisibleText);
}

/**
 * Parse HTML where each page is an element matching `pageSelector`
 * If nothing matches, the whole body is one page.
 */
export function parseHtmlDocument(html: string, config: HtmlLoadConfig = {}): Document {
    const pageSelector = config.pageSelector ?? DEFAULT_HTML_CONFIG.pageSelector;
    const $ = cheerio.load(html);

    $("script, style, noscript").remove();

    const $pages = $(pageSelector);
    if ($pages.length === 0) {
        return [extractPageLines($, $("body"), config.lineSelector)];
    }

    const pages: string[][] = [];
    $pages.each((_, el) => {
        pages.push(extractPageLines($, $(el), config.lineSelector));
    });
    return pages;
}

/**
 * Guess the document format from a file extension
 */
export function inferFormat(filePath: string): DocumentFormat {
    const ext = path.extname(filePath).toLowerCase();
    if (ext === ".json") return "json";
    if (ext === ".html" || ext === ".htm" || ext === ".xhtml") return "html";
    return "text";
}

/**
 * Parse document content in the given format
 */
export function parseDocument(content: string, format: DocumentFormat, config: HtmlLoadConfig = {}): Document {
    switch (format) {
        case "json":
            return parseJsonDocument(content);
        case "html":
            return parseHtmlDocument(content, config);
        case "text":
            return parseTextDocument(content);
    }
}

/**
 * Read and parse a document file
 */
export function loadDocument(filePath: string, config: LoadConfig = {}): Document {
    if (!fs.existsSync(filePath)) {
        throw new DocumentFormatError(`File not found: ${filePath}`);
    }

    const { format = inferFormat(filePath), ...htmlConfig } = config;
    const content = fs.readFileSync(filePath, "utf8");
    return parseDocument(content, format, htmlConfig);
}
