/**
 * @module data/dataset-node
 * @description Dataset file loading (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import { DatasetError } from '../../core/errors';
import { parseDataset, type Sample } from './dataset';

/**
 * Read and parse a comma-separated dataset file
 *
 * @throws DatasetError when the file is missing or unreadable, or on a parse error
 */
export function loadDataset(filePath: string): Sample[] {
    const fullPath = path.resolve(filePath);
    if (!fs.existsSync(fullPath)) {
        throw new DatasetError(`Dataset file not found: ${fullPath}`, { path: fullPath });
    }

    let text: string;
    try {
        text = fs.readFileSync(fullPath, 'utf8');
    } catch (error) {
        throw new DatasetError(`Failed to read dataset file: ${fullPath}`, {
            path: fullPath,
            cause: error instanceof Error ? error.message : String(error),
        });
    }
    return parseDataset(text);
}
