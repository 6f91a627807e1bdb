import path from 'path';
import { isTest } from './isTest.js';

/**
 * Directory holding log files; test runs write under test/data
 */
export function resolveDataDir(): string {
    if (isTest) {
        return path.resolve(process.cwd(), 'test/data');
    }
    return process.env.DATA_DIR || path.resolve(process.cwd(), 'data');
}
