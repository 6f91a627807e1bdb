import { describe, test, expect } from '@jest/globals';
import {
    createClassifyRequestSchema,
    describeIssues,
    normalizeRequestSchema,
    parsedResponseSchema,
    resultEntrySchema,
} from '../src/differential/schemas.js';

describe('classification payload schemas', () => {
    const schema = createClassifyRequestSchema({ maxServers: 2, maxSequenceLength: 1 });

    test('should fill optional message fields with defaults', () => {
        const parsed = schema.parse({
            results: [
                { server: 'a', entries: [{ kind: 'request', request: { method: 'GET', target: '/', version: '1.1' } }] },
                { server: 'b', entries: [{ kind: 'response', response: { code: '400' } }] },
            ],
        });

        expect(parsed.results[0].entries[0]).toEqual({
            kind: 'request',
            request: { method: 'GET', target: '/', version: '1.1', headers: [], body: null },
        });
        expect(parsed.results[1].entries[0]).toEqual({
            kind: 'response',
            response: { code: '400', reason: '', headers: [], body: null },
        });
    });

    test('should accept absent entries', () => {
        expect(resultEntrySchema.safeParse({ kind: 'absent' }).success).toBe(true);
    });

    test('should reject unknown entry kinds', () => {
        expect(resultEntrySchema.safeParse({ kind: 'timeout' }).success).toBe(false);
    });

    test('should reject status codes that are not three bytes long', () => {
        expect(parsedResponseSchema.safeParse({ code: '4000' }).success).toBe(false);
    });

    test('should enforce the server limit', () => {
        const result = schema.safeParse({
            results: [
                { server: 'a', entries: [] },
                { server: 'b', entries: [] },
                { server: 'c', entries: [] },
            ],
        });

        expect(result.success).toBe(false);
    });

    test('should enforce the sequence length limit', () => {
        const result = schema.safeParse({
            results: [
                { server: 'a', entries: [{ kind: 'absent' }, { kind: 'absent' }] },
                { server: 'b', entries: [] },
            ],
        });

        expect(result.success).toBe(false);
    });

    test('should reject header values outside the byte range', () => {
        const result = normalizeRequestSchema.safeParse({
            request: { method: 'GET', target: '/', version: '1.1', headers: [['Host', 'ħ']] },
            server: 'a',
            other: 'b',
        });

        expect(result.success).toBe(false);
    });

    test('should describe issues as path and message lines', () => {
        const result = schema.safeParse({ results: [] });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(describeIssues(result.error)).toEqual(['results: Array must contain at least 2 element(s)']);
        }
    });

    test('should describe root issues', () => {
        const result = schema.safeParse('not an object');

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(describeIssues(result.error)).toEqual(['<root>: Expected object, received string']);
        }
    });
});
