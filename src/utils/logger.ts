export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/** Accumulated wall time for one pipeline stage */
export interface StageTiming {
    label: string;
    runs: number;
    totalMs: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/**
 * Process-wide logger. Everything is written to stderr; stdout carries
 * command output and the MCP stdio transport.
 */
class Logger {
    private static instance: Logger | undefined;
    private level: LogLevel = "info";
    private timingEnabled = false;
    // Keyed by label so repeated runs of the same stage add up
    private stages = new Map<string, StageTiming>();

    private constructor() {}

    public static getInstance(): Logger {
        if (Logger.instance === undefined) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setLevel(level: LogLevel): void {
        this.level = level;
    }

    public log(message: string): void {
        this.emit("info", message);
    }

    public warn(message: string): void {
        this.emit("warn", message);
    }

    public error(message: string): void {
        this.emit("error", message);
    }

    public debug(message: string): void {
        this.emit("debug", message);
    }

    private emit(level: Exclude<LogLevel, "silent">, message: string): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
        console.error(`[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`);
    }

    /**
     * Turn stage timing on or off; switching it on starts from a clean slate
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) this.stages.clear();
    }

    /**
     * Run fn, adding its duration to the stage named by label
     */
    public time<T>(label: string, fn: () => T): T {
        if (!this.timingEnabled) return fn();

        const start = performance.now();
        try {
            return fn();
        } finally {
            const elapsed = performance.now() - start;
            const stage = this.stages.get(label) ?? { label, runs: 0, totalMs: 0 };
            this.stages.set(label, { label, runs: stage.runs + 1, totalMs: stage.totalMs + elapsed });
        }
    }

    public getTimings(): StageTiming[] {
        return [...this.stages.values()];
    }

    /**
     * Print one row per stage, in first-run order, then the total
     */
    public printTimings(): void {
        const stages = this.getTimings();
        if (stages.length === 0) {
            console.error("[TIMING] nothing timed");
            return;
        }

        const total = stages.reduce((sum, s) => sum + s.totalMs, 0);
        for (const stage of stages) {
            const share = total > 0 ? (stage.totalMs / total) * 100 : 0;
            console.error(
                `[TIMING] ${stage.label.padEnd(24)} ${stage.totalMs.toFixed(2).padStart(9)}ms ` +
                `x${String(stage.runs).padEnd(4)} ${share.toFixed(1).padStart(5)}%`
            );
        }
        console.error(`[TIMING] ${"total".padEnd(24)} ${total.toFixed(2).padStart(9)}ms`);
    }
}

export default Logger;
