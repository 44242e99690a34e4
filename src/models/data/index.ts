/**
 * @module data
 * @description Regression datasets (browser-safe part)
 */

export * from './dataset';
