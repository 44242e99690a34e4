/**
 * @module data/dataset
 * @description Tabular regression datasets: parsing, scaling, splitting, batching
 *
 * Browser-safe; file loading lives in `dataset-node.ts`.
 */

import { ConfigurationError, DatasetError } from '../../core/errors';
import { sampleWithoutReplacement, shuffleInPlace, type RandomSource } from '../../core/repro';

// ==================== Types ====================

/**
 * One row: feature vector and scalar target
 */
export interface Sample {
    features: number[];
    target: number;
}

/**
 * Observed [min, max] of one column
 */
export interface ColumnRange {
    min: number;
    max: number;
}

export interface NormalizedDataset {
    samples: Sample[];
    featureRanges: ColumnRange[];
    targetRange: ColumnRange;
}

export interface DatasetSplit {
    train: Sample[];
    validation: Sample[];
}

export const DEFAULT_SPLIT_RATIO = 0.8;

// ==================== Parsing ====================

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseCell(cell: string, lineNumber: number, column: number): number {
    const text = cell.trim();
    if (!NUMBER_PATTERN.test(text)) {
        throw new DatasetError(`Invalid numeric value '${cell}' at line ${lineNumber}, column ${column + 1}`, {
            line: lineNumber,
            column: column + 1,
            value: cell,
        });
    }
    return Number(text);
}

/**
 * Parse comma-separated text. The last column is the target, every earlier
 * column a feature. Blank lines are skipped.
 *
 * @throws DatasetError on a non-numeric cell, a row with fewer than two
 *         columns, a row whose width differs from the first, or no rows at all
 */
export function parseDataset(text: string): Sample[] {
    const samples: Sample[] = [];
    let width = -1;

    const lines = text.split(/\r?\n/);
    lines.forEach((line, i) => {
        if (line.trim() === '') return;
        const lineNumber = i + 1;
        const cells = line.split(',');

        if (cells.length < 2) {
            throw new DatasetError(`Line ${lineNumber} needs at least one feature and a target`, { line: lineNumber });
        }
        if (width < 0) {
            width = cells.length;
        } else if (cells.length !== width) {
            throw new DatasetError(`Line ${lineNumber} has ${cells.length} columns, expected ${width}`, {
                line: lineNumber,
                expected: width,
                actual: cells.length,
            });
        }

        const values = cells.map((cell, c) => parseCell(cell, lineNumber, c));
        samples.push({ features: values.slice(0, -1), target: values[values.length - 1] });
    });

    if (samples.length === 0) {
        throw new DatasetError('Dataset contains no rows');
    }
    return samples;
}

// ==================== Scaling ====================

function columnRange(values: readonly number[]): ColumnRange {
    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
        if (v < min) min = v;
        if (v > max) max = v;
    }
    return { min, max };
}

/**
 * Map `value` into [0, 1]; constant columns map to 0
 */
export function scaleValue(value: number, range: ColumnRange): number {
    const span = range.max - range.min;
    return span === 0 ? 0 : (value - range.min) / span;
}

/**
 * Inverse of `scaleValue` (a constant column maps back to its single value)
 */
export function unscaleValue(scaled: number, range: ColumnRange): number {
    return range.min + scaled * (range.max - range.min);
}

/**
 * Per-column min-max scaling of features and target to [0, 1]
 */
export function normalizeDataset(samples: readonly Sample[]): NormalizedDataset {
    if (samples.length === 0) {
        throw new DatasetError('Cannot normalize an empty dataset');
    }
    const featureCount = samples[0].features.length;
    const featureRanges: ColumnRange[] = [];
    for (let c = 0; c < featureCount; c++) {
        featureRanges.push(columnRange(samples.map(s => s.features[c])));
    }
    const targetRange = columnRange(samples.map(s => s.target));

    return {
        samples: samples.map(s => ({
            features: s.features.map((v, c) => scaleValue(v, featureRanges[c])),
            target: scaleValue(s.target, targetRange),
        })),
        featureRanges,
        targetRange,
    };
}

// ==================== Splitting & Batching ====================

/**
 * Seeded shuffle, then the first `floor(ratio·n)` rows train and the rest validate.
 * The input array is not reordered.
 */
export function splitDataset(
    samples: readonly Sample[],
    rng: RandomSource,
    ratio: number = DEFAULT_SPLIT_RATIO
): DatasetSplit {
    if (!Number.isFinite(ratio) || ratio < 0 || ratio > 1) {
        throw new ConfigurationError('ratio', `split ratio must be in [0, 1], got ${ratio}`, ratio);
    }
    const shuffled = shuffleInPlace(rng, [...samples]);
    const cut = Math.floor(ratio * shuffled.length);
    return {
        train: shuffled.slice(0, cut),
        validation: shuffled.slice(cut),
    };
}

/**
 * `min(size, n)` rows drawn without replacement
 */
export function sampleBatch<T>(samples: readonly T[], size: number, rng: RandomSource): T[] {
    if (!Number.isInteger(size) || size <= 0) {
        throw new ConfigurationError('size', `batch size must be a positive integer, got ${size}`, size);
    }
    return sampleWithoutReplacement(rng, samples, size);
}
