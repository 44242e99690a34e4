/**
 * @packageDocumentation
 * @module memetic-pso/node
 *
 * Node.js entry point: everything from the main entry plus the
 * file-backed pieces (CSV/JSONL loggers, dataset file loading).
 *
 * ## Usage Example
 * ```typescript
 * import { tasks, loadDataset, createFileLogger } from 'memetic-pso/node';
 *
 * const samples = loadDataset('data.csv');
 * const logger = createFileLogger('csv', { run: 'train/hybrid', seed: 42, outputDir: 'logs' });
 * const result = tasks.annTraining.trainWithHybrid(samples, {}, { logger });
 * logger.close();
 * ```
 *
 * @license MIT
 */

// Re-export everything from the main index
export * from './index';

// ==================== Node.js Only ====================
export {
    CsvWriter,
    CsvFileLogger,
    JsonlFileLogger,
    createFileLogger,
    escapeCsvCell,
    formatCsvValue,
} from './src/core/logging-node';

export { loadDataset } from './src/models/data/dataset-node';
