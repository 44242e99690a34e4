/**
 * @module core/logging
 * @description Structured logging for optimization runs
 *
 * Loggers receive typed entries with a fixed field schema (versioned, append-only):
 * per-iteration progress, per-refinement outcomes, and a final run report.
 *
 * Browser-compatible: ConsoleLogger and MemoryLogger work in all environments.
 * Node.js only: file loggers live in `core/logging-node`.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Optimizer variant that produced an entry
 */
export type OptimizerKind = 'pso' | 'hybrid';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Run identifier */
    run: string;
    /** Random seed for reproducibility */
    seed: number;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Iteration-level log entry
 */
export interface IterationLogEntry extends BaseLogEntry {
    logType: 'iteration';
    optimizer: OptimizerKind;
    iteration: number;
    globalBestFitness: number;
    elapsedMs: number;
    /** Hybrid only: whether a refinement pass ran on this iteration */
    refined?: boolean;
}

/**
 * Refinement-pass log entry (hybrid only)
 */
export interface RefinementLogEntry extends BaseLogEntry {
    logType: 'refinement';
    iteration: number;
    elitesRefined: number;
    accepted: number;
    bestFitnessBefore: number;
    bestFitnessAfter: number;
}

/**
 * Report-level log entry (final summary)
 */
export interface ReportLogEntry extends BaseLogEntry {
    logType: 'report';
    optimizer: OptimizerKind;
    iterations: number;
    bestFitness: number;
    elapsedMs: number;
    metrics?: Record<string, number>;
    config: Record<string, unknown>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = IterationLogEntry | RefinementLogEntry | ReportLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp' | 'run' | 'seed'>;

export type IterationLogInput = EntryInput<IterationLogEntry>;
export type RefinementLogInput = EntryInput<RefinementLogEntry>;
export type ReportLogInput = EntryInput<ReportLogEntry>;

/**
 * Logger interface
 */
export interface Logger {
    logIteration(entry: IterationLogInput): void;
    logRefinement(entry: RefinementLogInput): void;
    logReport(entry: ReportLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Output directory (Node.js only) */
    outputDir?: string;
    /** Run name (used for file naming) */
    run: string;
    /** Random seed */
    seed: number;
    /** Schema version */
    schemaVersion?: string;
    /** Console verbosity */
    level?: LogLevel;
    /** Buffer size before flushing (file loggers) */
    bufferSize?: number;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

interface ResolvedLoggerConfig {
    run: string;
    seed: number;
    schemaVersion: string;
}

export function resolveLoggerConfig(config: LoggerConfig): ResolvedLoggerConfig {
    return {
        run: config.run,
        seed: config.seed,
        schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
    };
}

/**
 * Stamp an entry with the shared base fields
 */
export function createBaseEntry(config: ResolvedLoggerConfig): BaseLogEntry {
    return {
        schemaVersion: config.schemaVersion,
        run: config.run,
        seed: config.seed,
        timestamp: Date.now(),
    };
}

// ==================== Console Logger (Browser-compatible) ====================

/**
 * Console Logger: Print to console
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;
    private config: ResolvedLoggerConfig;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.config = { run: 'unknown', seed: 0, schemaVersion: DEFAULT_SCHEMA_VERSION };
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.config = resolveLoggerConfig(levelOrConfig);
        }
    }

    logIteration(entry: IterationLogInput): void {
        if (this.level === 'debug') {
            console.log(
                `[ITER] ${this.config.run} #${entry.iteration}: ` +
                `best=${entry.globalBestFitness.toExponential(6)}` +
                (entry.refined ? ' (refined)' : '')
            );
        }
    }

    logRefinement(entry: RefinementLogInput): void {
        if (this.level === 'debug' || this.level === 'info') {
            console.log(
                `[REFINE] ${this.config.run} #${entry.iteration}: ` +
                `accepted=${entry.accepted}/${entry.elitesRefined}, ` +
                `best=${entry.bestFitnessBefore.toExponential(4)} -> ${entry.bestFitnessAfter.toExponential(4)}`
            );
        }
    }

    logReport(entry: ReportLogInput): void {
        if (this.level === 'error') return;
        console.log(
            `[REPORT] ${this.config.run} (${entry.optimizer}): iterations=${entry.iterations}, ` +
            `best=${entry.bestFitness.toExponential(6)}, ` +
            `elapsed=${entry.elapsedMs.toFixed(1)}ms`
        );
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger (Browser-compatible) ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for callers that post-process the history.
 */
export class MemoryLogger implements Logger {
    private config: ResolvedLoggerConfig;
    public iterations: IterationLogEntry[] = [];
    public refinements: RefinementLogEntry[] = [];
    public reports: ReportLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = resolveLoggerConfig(config);
    }

    logIteration(entry: IterationLogInput): void {
        this.iterations.push({
            ...createBaseEntry(this.config),
            logType: 'iteration',
            ...entry,
        });
    }

    logRefinement(entry: RefinementLogInput): void {
        this.refinements.push({
            ...createBaseEntry(this.config),
            logType: 'refinement',
            ...entry,
        });
    }

    logReport(entry: ReportLogInput): void {
        this.reports.push({
            ...createBaseEntry(this.config),
            logType: 'report',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.iterations, ...this.refinements, ...this.reports];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.iterations = [];
        this.refinements = [];
        this.reports = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger (Browser-compatible) ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logIteration(entry: IterationLogInput): void {
        for (const logger of this.loggers) {
            logger.logIteration(entry);
        }
    }

    logRefinement(entry: RefinementLogInput): void {
        for (const logger of this.loggers) {
            logger.logRefinement(entry);
        }
    }

    logReport(entry: ReportLogInput): void {
        for (const logger of this.loggers) {
            logger.logReport(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format (browser-compatible)
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
