/**
 * @module core/logging-node
 * @description File-based loggers (Node.js only)
 *
 * - `CsvFileLogger`: one row per logged iteration (`iter,best_f,elapsed_ms`)
 * - `JsonlFileLogger`: every entry as one JSON line
 *
 * Files are created eagerly (parent directories included) and truncated on open.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    createBaseEntry,
    resolveLoggerConfig,
    type LogEntry,
    type Logger,
    type LoggerConfig,
    type IterationLogInput,
    type RefinementLogInput,
    type ReportLogInput,
} from './logging';
import { ValidationError } from './errors';

const DEFAULT_BUFFER_SIZE = 64;

// ==================== CSV helpers ====================

/**
 * Quote a cell when it contains a delimiter, quote or line break
 */
export function escapeCsvCell(value: string): string {
    if (/[",\n\r]/.test(value)) {
        return '"' + value.replace(/"/g, '""') + '"';
    }
    return value;
}

/**
 * Locale-independent cell formatting
 */
export function formatCsvValue(value: unknown): string {
    if (value === null || value === undefined) return '';
    return String(value);
}

function resolveFile(config: LoggerConfig, extension: string): string {
    const dir = config.outputDir ?? '.';
    return path.resolve(dir, `${config.run.replace(/[\\/]/g, '_')}.${extension}`);
}

function openFile(filePath: string, initialContent: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, initialContent, 'utf8');
}

// ==================== CSV Logger ====================

/**
 * Minimal CSV writer with a fixed column set
 */
export class CsvWriter {
    readonly filePath: string;
    private readonly columns: string[];
    private buffer: string[] = [];
    private readonly bufferSize: number;
    private closed = false;

    constructor(filePath: string, columns: string[], bufferSize: number = DEFAULT_BUFFER_SIZE) {
        if (columns.length === 0) {
            throw new ValidationError('At least one column name is required.');
        }
        this.filePath = path.resolve(filePath);
        this.columns = columns;
        this.bufferSize = Math.max(1, bufferSize);
        openFile(this.filePath, columns.map(escapeCsvCell).join(',') + '\n');
    }

    /**
     * Write a row of values in the same order as the columns
     */
    writeRow(values: unknown[]): void {
        if (this.closed) {
            throw new ValidationError(`CSV writer for ${this.filePath} is closed`);
        }
        if (values.length !== this.columns.length) {
            throw new ValidationError(
                `Expected ${this.columns.length} values, got ${values.length}.`
            );
        }
        this.buffer.push(values.map(v => escapeCsvCell(formatCsvValue(v))).join(','));
        if (this.buffer.length >= this.bufferSize) {
            this.flush();
        }
    }

    flush(): void {
        if (this.buffer.length === 0) return;
        fs.appendFileSync(this.filePath, this.buffer.join('\n') + '\n', 'utf8');
        this.buffer = [];
    }

    close(): void {
        if (this.closed) return;
        this.flush();
        this.closed = true;
    }
}

/**
 * CSV Logger: per-iteration best-fitness trace
 */
export class CsvFileLogger implements Logger {
    static readonly COLUMNS = ['iter', 'best_f', 'elapsed_ms'];

    private writer: CsvWriter;

    constructor(config: LoggerConfig) {
        this.writer = new CsvWriter(
            resolveFile(config, 'csv'),
            CsvFileLogger.COLUMNS,
            config.bufferSize
        );
    }

    get filePath(): string {
        return this.writer.filePath;
    }

    logIteration(entry: IterationLogInput): void {
        this.writer.writeRow([entry.iteration, entry.globalBestFitness, entry.elapsedMs]);
    }

    logRefinement(_entry: RefinementLogInput): void { /* not part of the CSV trace */ }

    logReport(_entry: ReportLogInput): void { /* not part of the CSV trace */ }

    flush(): void {
        this.writer.flush();
    }

    close(): void {
        this.writer.close();
    }
}

// ==================== JSONL Logger ====================

/**
 * JSONL Logger: every entry, one JSON document per line
 */
export class JsonlFileLogger implements Logger {
    readonly filePath: string;
    private config: ReturnType<typeof resolveLoggerConfig>;
    private buffer: LogEntry[] = [];
    private readonly bufferSize: number;

    constructor(config: LoggerConfig) {
        this.config = resolveLoggerConfig(config);
        this.filePath = resolveFile(config, 'jsonl');
        this.bufferSize = Math.max(1, config.bufferSize ?? DEFAULT_BUFFER_SIZE);
        openFile(this.filePath, '');
    }

    private push(entry: LogEntry): void {
        this.buffer.push(entry);
        if (this.buffer.length >= this.bufferSize) {
            this.flush();
        }
    }

    logIteration(entry: IterationLogInput): void {
        this.push({ ...createBaseEntry(this.config), logType: 'iteration', ...entry });
    }

    logRefinement(entry: RefinementLogInput): void {
        this.push({ ...createBaseEntry(this.config), logType: 'refinement', ...entry });
    }

    logReport(entry: ReportLogInput): void {
        this.push({ ...createBaseEntry(this.config), logType: 'report', ...entry });
    }

    flush(): void {
        if (this.buffer.length === 0) return;
        const lines = this.buffer.map(entry => JSON.stringify(entry)).join('\n') + '\n';
        fs.appendFileSync(this.filePath, lines, 'utf8');
        this.buffer = [];
    }

    close(): void {
        this.flush();
    }
}

// ==================== Factory ====================

/**
 * Create a file logger (Node.js only)
 */
export function createFileLogger(format: 'csv' | 'jsonl', config: LoggerConfig): CsvFileLogger | JsonlFileLogger {
    switch (format) {
        case 'csv':
            return new CsvFileLogger(config);
        case 'jsonl':
            return new JsonlFileLogger(config);
    }
}
