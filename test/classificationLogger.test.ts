import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { ClassificationLogger } from '../src/utils/logger/classificationLogger.js';
import { DiscrepancyType, type DiscrepancyFinding } from '../src/differential/types/Discrepancy.js';
import { ClassificationErrorType, UnknownProfileError } from '../src/differential/ErrorHandler.js';

describe('ClassificationLogger', () => {
    let dir: string;
    let logFile: string;
    let logger: ClassificationLogger;

    const finding: DiscrepancyFinding = {
        type: DiscrepancyType.STATUS_DISCREPANCY,
        servers: ['a', 'b'],
        serverIndices: [0, 1],
        position: 0,
        description: 'a accepted GET / while b rejected it with 403',
    };

    function readEntries(): unknown[] {
        if (!fs.existsSync(logFile)) {
            return [];
        }
        return fs.readFileSync(logFile, 'utf-8').trimEnd().split('\n').map(line => JSON.parse(line));
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'classification-log-'));
        logFile = path.join(dir, 'classification.log');
        logger = new ClassificationLogger({ discrepancies: true, nonDiscrepancies: false }, logFile);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('should create contexts carrying the given correlation id', () => {
        const context = logger.createContext(['a', 'b'], 'test-correlation');

        expect(context).toEqual({ correlationId: 'test-correlation', servers: ['a', 'b'], timestamp: expect.any(Number) });
        expect(logger.createContext([]).correlationId).toMatch(/^[0-9a-f-]{36}$/);
    });

    test('should write a warning for a discrepancy', () => {
        const context = logger.createContext(['a', 'b'], 'test-correlation');

        const entry = logger.logClassificationComplete(context, DiscrepancyType.STATUS_DISCREPANCY, finding, 1.5);

        expect(entry).toMatchObject({
            correlationId: 'test-correlation',
            level: 'warn',
            event: 'DISCREPANCY_FOUND',
            servers: ['a', 'b'],
            verdict: DiscrepancyType.STATUS_DISCREPANCY,
            finding,
            metadata: { processingTime: 1.5, serverCount: 2, category: 'differential.classification' },
        });
        expect(readEntries()).toEqual([entry]);
    });

    test('should skip runs without a discrepancy by default', () => {
        const context = logger.createContext(['a', 'b']);

        expect(logger.logClassificationComplete(context, DiscrepancyType.NO_DISCREPANCY, undefined, 0.2)).toBeNull();
        expect(readEntries()).toEqual([]);
    });

    test('should follow updated settings', () => {
        const context = logger.createContext(['a', 'b']);
        logger.updateSettings({ discrepancies: false, nonDiscrepancies: true });

        expect(logger.logClassificationComplete(context, DiscrepancyType.STATUS_DISCREPANCY, finding, 1)).toBeNull();
        const entry = logger.logClassificationComplete(context, DiscrepancyType.NO_DISCREPANCY, undefined, 1);

        expect(entry).toMatchObject({ level: 'info', event: 'CLASSIFICATION_COMPLETE', verdict: DiscrepancyType.NO_DISCREPANCY });
        expect(readEntries()).toHaveLength(1);
    });

    test('should always write errors', () => {
        logger.updateSettings({ discrepancies: false, nonDiscrepancies: false });
        const context = logger.createContext(['a', 'nope'], 'test-correlation');

        const entry = logger.logClassificationError(context, new UnknownProfileError('nope'), ClassificationErrorType.UNKNOWN_PROFILE);

        expect(entry).toMatchObject({
            level: 'error',
            event: 'CLASSIFICATION_ERROR',
            error: 'No server profile named "nope"',
            metadata: { errorType: 'UNKNOWN_PROFILE', errorName: 'UnknownProfileError' },
        });
        expect(readEntries()).toHaveLength(1);
        expect(logger.getLogFile()).toBe(logFile);
    });
});
