/**
 * @packageDocumentation
 * @module memetic-pso/browser
 *
 * Browser-compatible entry point. Excludes the file loggers, dataset file
 * loading and the task drivers' CLIs.
 *
 * ## Usage Example
 * ```typescript
 * import { numeric, data } from 'memetic-pso/browser';
 *
 * const samples = data.parseDataset(csvText);
 * ```
 *
 * @license MIT
 */

// ==================== Core ====================
export * as core from './src/core';

// ==================== Models ====================
export * as numeric from './src/models/numeric';
export * as ann from './src/models/ann';
export * as data from './src/models/data';

// ==================== Tasks (in-memory drivers) ====================
export * as tasks from './src/tasks';

// ==================== Version ====================
export const VERSION = '1.0.0';
