/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { detectorToolShape, runDetectTool, runStripTool } from "./tools";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

// Create MCP server
const server = new McpServer({
    name: "running_heads_mcp",
    version: "1.0.0",
});

// Register the detection tool
server.tool(
    "detect_headers_footers",
    `Classify every line of a multi-page document as header, footer or body.

Lines near the top or bottom of a page that recur on many neighbouring pages
(titles, running heads, page numbers, copyright lines) score high. Digits are
ignored when comparing, so "Page 3" and "Page 4" match.

RETURNS: JSON with one entry per line: lineIndex, lineType, headerScore, footerScore, text.
A "warning" field appears when a threshold can never be reached.`,
    detectorToolShape,
    async (args) => runDetectTool(args)
);

// Register the strip tool
server.tool(
    "strip_headers_footers",
    `Remove repeated headers and footers from a multi-page document.

Use this before summarizing, chunking or searching text extracted from PDFs,
so that running heads and page numbers do not leak into the body text.

RETURNS: The remaining body lines, each page's lines newline-terminated, pages separated by form feeds.`,
    detectorToolShape,
    async (args) => runStripTool(args)
);

// Start the server
async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.log("running-heads MCP server listening on stdio");
}

main().catch((error) => {
    logger.error(`Fatal error: ${error}`);
    process.exit(1);
});
