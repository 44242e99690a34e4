/**
 * @module tasks/ann-training
 * @description Regression network training with PSO and memetic PSO
 *
 * ## Usage
 * ```typescript
 * import { tasks, data } from 'memetic-pso/node';
 *
 * const samples = data.loadDataset('housing.csv');
 * const result = tasks.annTraining.trainWithHybrid(samples, { iterations: 200 });
 * console.log(result.trainMse, result.validationMse);
 * ```
 */

export * from './config';
export * from './objective';
export * from './trainer';
