/**
 * Dataset Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
    normalizeDataset,
    parseDataset,
    sampleBatch,
    scaleValue,
    splitDataset,
    unscaleValue,
} from '../src/models/data/dataset';
import { loadDataset } from '../src/models/data/dataset-node';
import { createRng } from '../src/core/repro';
import { ConfigurationError, DatasetError } from '../src/core/errors';
import { catchError, linearSamples } from './test-utils';

describe('parseDataset', () => {
    it('uses the last column as the target', () => {
        expect(parseDataset('1,2,3\n4,5,6\n')).toEqual([
            { features: [1, 2], target: 3 },
            { features: [4, 5], target: 6 },
        ]);
    });

    it('accepts CRLF, blank lines, padding and exponents', () => {
        expect(parseDataset('\r\n 0.5 , -1e2\r\n\r\n.25,+3\r\n')).toEqual([
            { features: [0.5], target: -100 },
            { features: [0.25], target: 3 },
        ]);
    });

    it('reports the line and column of a bad cell', () => {
        const error = catchError(() => parseDataset('1,2\n3,abc\n'));
        expect(error).toBeInstanceOf(DatasetError);
        expect(error).toMatchObject({
            message: "Invalid numeric value 'abc' at line 2, column 2",
            details: { line: 2, column: 2, value: 'abc' },
        });
    });

    it.each([
        ['a single column', '1\n2\n'],
        ['ragged rows', '1,2\n1,2,3\n'],
        ['no rows', '\n  \n'],
        ['an empty cell', '1,\n'],
        ['a hex literal', '0x10,1\n'],
    ])('rejects %s', (_label, text) => {
        expect(() => parseDataset(text)).toThrow(DatasetError);
    });
});

describe('scaling', () => {
    it('maps each column onto [0, 1]', () => {
        const normalized = normalizeDataset([
            { features: [0, 5], target: 10 },
            { features: [2, 5], target: 20 },
            { features: [4, 5], target: 30 },
        ]);
        expect(normalized.featureRanges).toEqual([{ min: 0, max: 4 }, { min: 5, max: 5 }]);
        expect(normalized.targetRange).toEqual({ min: 10, max: 30 });
        expect(normalized.samples.map(s => s.features)).toEqual([[0, 0], [0.5, 0], [1, 0]]);
        expect(normalized.samples.map(s => s.target)).toEqual([0, 0.5, 1]);
    });

    it('unscaleValue inverts scaleValue', () => {
        const range = { min: -2, max: 6 };
        expect(scaleValue(2, range)).toBe(0.5);
        expect(unscaleValue(0.5, range)).toBe(2);
        expect(unscaleValue(0, { min: 3, max: 3 })).toBe(3);
    });

    it('rejects an empty dataset', () => {
        expect(() => normalizeDataset([])).toThrow(DatasetError);
    });
});

describe('splitDataset', () => {
    it('keeps floor(ratio * n) rows for training', () => {
        const samples = linearSamples(10);
        const { train, validation } = splitDataset(samples, createRng(3));
        expect(train).toHaveLength(8);
        expect(validation).toHaveLength(2);
        const targets = [...train, ...validation].map(s => s.target).sort((a, b) => a - b);
        expect(targets).toEqual(samples.map(s => s.target));
    });

    it('is reproducible and leaves the input order alone', () => {
        const samples = linearSamples(12);
        const first = samples[0];
        expect(splitDataset(samples, createRng(9), 0.5)).toEqual(splitDataset(samples, createRng(9), 0.5));
        expect(samples[0]).toBe(first);
    });

    it('rejects a ratio outside [0, 1]', () => {
        expect(() => splitDataset(linearSamples(4), createRng(1), 1.5)).toThrow(ConfigurationError);
    });
});

describe('sampleBatch', () => {
    it('draws distinct rows, capped at the dataset size', () => {
        const samples = linearSamples(6);
        const batch = sampleBatch(samples, 4, createRng(2));
        expect(batch).toHaveLength(4);
        expect(new Set(batch).size).toBe(4);
        expect(sampleBatch(samples, 50, createRng(2))).toHaveLength(6);
    });

    it('rejects a non-positive size', () => {
        expect(() => sampleBatch(linearSamples(3), 0, createRng(1))).toThrow(ConfigurationError);
    });
});

describe('loadDataset', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'memetic-pso-data-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads and parses a file', () => {
        const file = path.join(dir, 'data.csv');
        fs.writeFileSync(file, '0,1\n1,3\n', 'utf8');
        expect(loadDataset(file)).toEqual([
            { features: [0], target: 1 },
            { features: [1], target: 3 },
        ]);
    });

    it('raises DatasetError for a missing file', () => {
        const missing = path.join(dir, 'missing.csv');
        expect(() => loadDataset(missing)).toThrow(`Dataset file not found: ${missing}`);
    });
});
