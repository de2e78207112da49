import type { DetectorConfigFile } from "./config";
import type { DocumentFormat } from "./preprocessing/load";

export interface CliOptions {
    file: string;
    format?: DocumentFormat;
    configPath?: string;
    pageSelector?: string;
    lineSelector?: string;
    json: boolean;
    debug: boolean;
    timing: boolean;
    /** Detector options given as individual flags; these win over --config */
    overrides: DetectorConfigFile;
}

export interface ParsedArgs {
    command: string | undefined;
    options: CliOptions;
    errors: string[];
}

const FORMATS: readonly DocumentFormat[] = ["text", "json", "html"];

const VALUE_FLAGS = new Set([
    "--window",
    "--threshold",
    "--footer-threshold",
    "--weights",
    "--format",
    "--config",
    "--page-selector",
    "--line-selector",
]);

function isDocumentFormat(value: string): value is DocumentFormat {
    return FORMATS.some(format => format === value);
}

/**
 * Parse a comma-separated weight list, e.g. "1,0.75,0.5"
 */
export function parseWeights(value: string): number[] {
    return value.split(",").map(part => Number(part.trim()));
}

/**
 * Parse CLI arguments: `<command> [options] [file]`
 * Numeric values are converted but not range-checked; the config schema does that.
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
    // Filter out standalone "--" which npm passes through
    const args = argv.filter(a => a !== "--");
    const command = args[0];
    const errors: string[] = [];
    const options: CliOptions = {
        file: "",
        json: false,
        debug: false,
        timing: false,
        overrides: {},
    };

    for (let i = 1; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];
        if (arg === undefined) continue;

        if (arg === "--window" && nextArg !== undefined) {
            options.overrides.windowSize = Number(nextArg);
            i++;
        } else if (arg === "--threshold" && nextArg !== undefined) {
            options.overrides.headerThreshold = Number(nextArg);
            i++;
        } else if (arg === "--footer-threshold" && nextArg !== undefined) {
            options.overrides.footerThreshold = Number(nextArg);
            i++;
        } else if (arg === "--weights" && nextArg !== undefined) {
            options.overrides.weights = parseWeights(nextArg);
            i++;
        } else if (arg === "--skip-empty-slots") {
            options.overrides.emptySlots = "skip";
        } else if (arg === "--format" && nextArg !== undefined) {
            if (isDocumentFormat(nextArg)) {
                options.format = nextArg;
            } else {
                errors.push(`Unknown format: ${nextArg} (expected ${FORMATS.join(", ")})`);
            }
            i++;
        } else if (arg === "--config" && nextArg !== undefined) {
            options.configPath = nextArg;
            i++;
        } else if (arg === "--page-selector" && nextArg !== undefined) {
            options.pageSelector = nextArg;
            i++;
        } else if (arg === "--line-selector" && nextArg !== undefined) {
            options.lineSelector = nextArg;
            i++;
        } else if (arg === "--json") {
            options.json = true;
        } else if (arg === "--debug") {
            options.debug = true;
        } else if (arg === "--timing" || arg === "-t") {
            options.timing = true;
        } else if (VALUE_FLAGS.has(arg)) {
            errors.push(`Missing value for ${arg}`);
        } else if (arg.startsWith("-")) {
            errors.push(`Unknown option: ${arg}`);
        } else if (options.file === "") {
            options.file = arg;
        } else {
            errors.push(`Unexpected argument: ${arg}`);
        }
    }

    return { command, options, errors };
}
