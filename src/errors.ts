import type { ZodIssue } from "zod";

/**
 * Format zod issues as "path: message" lines
 */
export function formatIssues(issues: readonly ZodIssue[]): string[] {
    return issues.map(issue => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
    });
}

/**
 * Raised for configuration that cannot be run (as opposed to thresholds that
 * are merely unreachable, which only produce a validation warning)
 */
export class ConfigError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

/**
 * Raised by document loaders when input cannot be read as pages of lines
 */
export class DocumentFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "DocumentFormatError";
    }
}
