import { HTTP_0_9_VERSION, type ParsedRequest, type ParsedResponse } from './types/HTTPMessage.js';
import type { ServerProfile } from './types/ServerProfile.js';
import type { BenignRejectionKind } from './types/Discrepancy.js';
import { hasHeader } from './headers.js';

/**
 * One server accepted `request` while the other answered with `response`
 */
export interface AcceptRejectPair {
    request: ParsedRequest;
    accepter: ServerProfile;
    response: ParsedResponse;
    rejecter: ServerProfile;
}

export interface BenignRejectionRule {
    kind: BenignRejectionKind;
    description: string;
    matches: (pair: AcceptRejectPair) => boolean;
}

/**
 * Known configuration differences that explain an accept/reject split.
 * Evaluated in order; the first match wins.
 */
export const BENIGN_REJECTION_RULES: readonly BenignRejectionRule[] = [
    {
        kind: 'HTTP_0_9_NOT_ALLOWED',
        description: 'Accepted as HTTP/0.9, which the rejecter does not allow',
        matches: ({ request, rejecter }) => request.version === HTTP_0_9_VERSION && !rejecter.allowsHttp09,
    },
    {
        kind: 'LENGTH_REQUIRED_IN_POST',
        description: 'Rejecter requires a length on POST',
        matches: ({ request, accepter, response, rejecter }) =>
            response.code === '411' &&
            rejecter.requiresLengthInPost &&
            request.method === 'POST' &&
            !accepter.requiresLengthInPost,
    },
    {
        kind: 'MISSING_HOST_NOT_ALLOWED',
        description: 'Rejecter requires a Host header the request lacks',
        matches: ({ request, accepter, response, rejecter }) =>
            response.code === '400' &&
            !rejecter.allowsMissingHostHeader &&
            accepter.allowsMissingHostHeader &&
            !hasHeader(request, 'host'),
    },
    {
        kind: 'METHOD_NOT_WHITELISTED',
        description: 'Method is outside the rejecter\'s whitelist',
        matches: ({ request, rejecter }) =>
            rejecter.methodWhitelist !== null && !rejecter.methodWhitelist.includes(request.method),
    },
    {
        kind: 'METHOD_CHARACTER_BLACKLISTED',
        description: 'Method contains a byte the rejecter forbids',
        matches: ({ request, rejecter }) =>
            [...request.method].some(byte => rejecter.methodCharacterBlacklist.includes(byte)),
    },
];

/**
 * Finds the first rule explaining why one server rejected what the other accepted
 */
export function findBenignRejection(pair: AcceptRejectPair): BenignRejectionRule | undefined {
    return BENIGN_REJECTION_RULES.find(rule => rule.matches(pair));
}
