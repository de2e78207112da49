#!/usr/bin/env node

import { parseCliArgs, type CliOptions } from "./args";
import { loadConfigFile, type DetectorConfig } from "./config";
import { createDetector } from "./pipeline";
import { loadDocument } from "./preprocessing/load";
import { formatAnnotated, formatStripped, keepBodyLines } from "./output/format";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
running-heads - Detect repeated page headers and footers in multi-page text

Lines that recur at the top or bottom of many neighbouring pages (titles,
page numbers, copyright notices) are scored by cross-page similarity and
classified as header, footer or body.

COMMANDS:
  detect <file>      Print every line with its scores and classification
  strip <file>       Print the document with header and footer lines removed
  mcp                Start the MCP server (called by MCP clients)
  help, --help       Show this help message

INPUT:
  Plain text with form-feed page breaks (pdftotext output), a JSON array of
  pages (arrays of line strings), or HTML with one element per page.

OPTIONS:
  --window N              Pages compared on each side (default: 8)
  --threshold X           Minimum header score (default: 8)
  --footer-threshold X    Minimum footer score (default: header threshold)
  --weights LIST          Per-line weights, top line first (default: 1,0.75,0.5,0.5,0.5)
  --skip-empty-slots      Do not compare missing candidate lines
  --config path           JSON file with detector options (flags win)
  --format FORMAT         text | json | html (default: from file extension)
  --page-selector SEL     HTML page elements (default: .page)
  --line-selector SEL     HTML line elements (default: line breaks)
  --json                  Write JSON instead of text
  --debug                 Log run statistics
  --timing, -t            Show per-stage timing

EXAMPLES:
  pdftotext report.pdf - | running-heads strip /dev/stdin
  running-heads detect report.txt --window 4 --threshold 5
  running-heads strip book.html --line-selector ".line" --json
`;

/**
 * Build detector options: config file first, then individual flags
 */
function buildDetectorConfig(options: CliOptions): DetectorConfig {
    const fromFile = options.configPath !== undefined ? loadConfigFile(options.configPath) : {};
    return {
        ...fromFile,
        ...options.overrides,
        ...(options.debug && { debug: true }),
    };
}

function runDocumentCommand(command: "detect" | "strip", options: CliOptions): void {
    if (options.file === "") {
        logger.error(`${command} requires a file`);
        process.exit(1);
    }

    if (options.debug) {
        logger.setLevel("debug");
    }
    if (options.timing) {
        logger.setTimingEnabled(true);
    }

    const detector = createDetector(buildDetectorConfig(options), { warn: true });

    logger.debug(`Reading file: ${options.file}`);
    const doc = loadDocument(options.file, {
        ...(options.format !== undefined && { format: options.format }),
        ...(options.pageSelector !== undefined && { pageSelector: options.pageSelector }),
        ...(options.lineSelector !== undefined && { lineSelector: options.lineSelector }),
    });

    const result = detector.annotate(doc);

    if (options.timing) {
        logger.printTimings();
    }

    if (command === "detect") {
        console.log(options.json ? JSON.stringify(result, null, 2) : formatAnnotated(result));
        return;
    }

    const stripped = keepBodyLines(result.pages);
    if (options.json) {
        console.log(JSON.stringify(stripped, null, 2));
    } else {
        process.stdout.write(formatStripped(stripped));
    }
}

async function main(): Promise<void> {
    const { command, options, errors } = parseCliArgs(process.argv.slice(2));

    switch (command) {
        case "detect":
        case "strip": {
            if (errors.length > 0) {
                for (const error of errors) logger.error(error);
                console.log("Run 'running-heads --help' for usage.\n");
                process.exit(1);
            }
            runDocumentCommand(command, options);
            break;
        }

        case "mcp": {
            // Dynamically import and run MCP server
            await import("./mcp/server");
            break;
        }

        case "--help":
        case "-h":
        case "help":
        case undefined: {
            console.log(HELP_TEXT);
            break;
        }

        default: {
            console.log(`Unknown command: ${command}`);
            console.log("Run 'running-heads --help' for usage.\n");
            process.exit(1);
        }
    }
}

// Run main
main().catch((err) => {
    logger.error(err instanceof Error ? err.message : `Unexpected error: ${err}`);
    process.exit(1);
});
