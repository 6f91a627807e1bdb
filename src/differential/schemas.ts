import { z } from 'zod';
import { isByteString } from './headers.js';
import type { ClassificationLimits } from './types/Configuration.js';

export const BYTE_STRING_MESSAGE = 'must only contain byte values 0x00-0xFF';

export const byteString = z.string().refine(isByteString, { message: BYTE_STRING_MESSAGE });

export const headerNameSchema = z.string().min(1).refine(isByteString, { message: BYTE_STRING_MESSAGE });

const headerSchema = z.tuple([headerNameSchema, byteString]);

export const parsedRequestSchema = z.object({
    method: byteString,
    target: byteString,
    version: byteString,
    headers: z.array(headerSchema).default([]),
    body: byteString.nullable().default(null),
});

export const parsedResponseSchema = z.object({
    code: z.string().length(3).refine(isByteString, { message: BYTE_STRING_MESSAGE }),
    reason: byteString.default(''),
    headers: z.array(headerSchema).default([]),
    body: byteString.nullable().default(null),
});

export const resultEntrySchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('request'), request: parsedRequestSchema }),
    z.object({ kind: z.literal('response'), response: parsedResponseSchema }),
    z.object({ kind: z.literal('absent') }),
]);

/**
 * Body of POST /classify, bounded by the configured limits
 */
export function createClassifyRequestSchema(limits: ClassificationLimits) {
    return z.object({
        results: z
            .array(
                z.object({
                    server: z.string().min(1),
                    entries: z.array(resultEntrySchema).max(limits.maxSequenceLength),
                })
            )
            .min(2)
            .max(limits.maxServers),
    });
}

export const normalizeRequestSchema = z.object({
    request: parsedRequestSchema,
    server: z.string().min(1),
    other: z.string().min(1),
});

export type ClassifyRequestBody = z.infer<ReturnType<typeof createClassifyRequestSchema>>;
export type NormalizeRequestBody = z.infer<typeof normalizeRequestSchema>;

/**
 * Flattens zod issues into "path: message" lines
 */
export function describeIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}
