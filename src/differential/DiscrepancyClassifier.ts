import {
    ABSENT,
    type ParsedRequest,
    type ParsedResponse,
    type ResultEntry,
    type ResultSequence,
} from './types/HTTPMessage.js';
import type { ServerProfile } from './types/ServerProfile.js';
import {
    DiscrepancyType,
    type DiscrepancyFinding,
    type FoundDiscrepancyType,
} from './types/Discrepancy.js';
import { normalizeRequest } from './RequestNormalizer.js';
import { requestsEqual } from './headers.js';
import { findBenignRejection } from './BenignRejections.js';
import { assertInvariant, InvariantViolationError } from './ErrorHandler.js';

/**
 * What comparing one position of two result sequences yields
 */
export type PositionOutcome =
    /** Nothing to report here, look at the next position */
    | { kind: 'continue' }
    /** The pair diverged in a known way; positions after this one are not comparable */
    | { kind: 'stop' }
    | { kind: 'discrepancy'; type: FoundDiscrepancyType; description: string };

export interface PositionSide {
    entry: ResultEntry;
    profile: ServerProfile;
}

const CONTINUE: PositionOutcome = { kind: 'continue' };
const STOP: PositionOutcome = { kind: 'stop' };

const ENTRY_KINDS: ReadonlySet<string> = new Set(['request', 'response', 'absent']);

function describeEntry(entry: ResultEntry): string {
    switch (entry.kind) {
        case 'request':
            return `accepted ${entry.request.method} ${entry.request.target}`;
        case 'response':
            return `rejected with ${entry.response.code}`;
        case 'absent':
            return 'produced nothing';
    }
}

function isBadRequest(entry: ResultEntry): boolean {
    return entry.kind === 'response' && entry.response.code === '400';
}

function compareAcceptReject(
    request: ParsedRequest,
    accepter: ServerProfile,
    response: ParsedResponse,
    rejecter: ServerProfile
): PositionOutcome {
    if (findBenignRejection({ request, accepter, response, rejecter })) {
        return STOP;
    }

    return {
        kind: 'discrepancy',
        type: DiscrepancyType.STATUS_DISCREPANCY,
        description: `${accepter.name} accepted ${request.method} ${request.target} while ${rejecter.name} rejected it with ${response.code}`,
    };
}

function compareAccepted(first: ParsedRequest, firstProfile: ServerProfile, second: ParsedRequest, secondProfile: ServerProfile): PositionOutcome {
    const normalizedFirst = normalizeRequest(first, firstProfile, secondProfile);
    const normalizedSecond = normalizeRequest(second, secondProfile, firstProfile);

    if (requestsEqual(normalizedFirst, normalizedSecond)) {
        return CONTINUE;
    }

    return {
        kind: 'discrepancy',
        type: DiscrepancyType.SUBTLE_DISCREPANCY,
        description: `${firstProfile.name} and ${secondProfile.name} accepted the message with different interpretations`,
    };
}

/**
 * Compares the entries two servers produced at the same position
 */
export function comparePosition(first: PositionSide, second: PositionSide): PositionOutcome {
    const a = first.entry;
    const b = second.entry;

    if (a.kind === 'absent' || b.kind === 'absent') {
        if (a.kind === b.kind) {
            return CONTINUE;
        }
        // A clean 400 on one side and a silent close on the other are both rejections
        if (isBadRequest(a) || isBadRequest(b)) {
            return STOP;
        }
        return {
            kind: 'discrepancy',
            type: DiscrepancyType.STREAM_DISCREPANCY,
            description: `${first.profile.name} ${describeEntry(a)} while ${second.profile.name} ${describeEntry(b)}`,
        };
    }

    if (a.kind === 'request') {
        return b.kind === 'request'
            ? compareAccepted(a.request, first.profile, b.request, second.profile)
            : compareAcceptReject(a.request, first.profile, b.response, second.profile);
    }

    return b.kind === 'request'
        ? compareAcceptReject(b.request, second.profile, a.response, first.profile)
        : CONTINUE;
}

/**
 * Walks two result sequences position by position, returning the first discrepancy
 */
export function comparePair(
    firstSequence: ResultSequence,
    firstProfile: ServerProfile,
    secondSequence: ResultSequence,
    secondProfile: ServerProfile
): { type: FoundDiscrepancyType; position: number; description: string } | undefined {
    let sequence1 = firstSequence;
    let sequence2 = secondSequence;

    // A non-persistent server never legitimately produces a second result
    if (!firstProfile.supportsPersistence || !secondProfile.supportsPersistence) {
        sequence1 = sequence1.slice(0, 1);
        sequence2 = sequence2.slice(0, 1);
    }

    const length = Math.max(sequence1.length, sequence2.length);
    for (let position = 0; position < length; position++) {
        const outcome = comparePosition(
            { entry: sequence1[position] ?? ABSENT, profile: firstProfile },
            { entry: sequence2[position] ?? ABSENT, profile: secondProfile }
        );

        switch (outcome.kind) {
            case 'continue':
                continue;
            case 'stop':
                return undefined;
            case 'discrepancy':
                return { type: outcome.type, position, description: outcome.description };
        }
    }

    return undefined;
}

function assertResultSequences(resultSequences: readonly ResultSequence[], profiles: readonly ServerProfile[]): void {
    assertInvariant(
        resultSequences.length === profiles.length,
        `Got ${resultSequences.length} result sequences for ${profiles.length} server profiles`
    );
    assertInvariant(profiles.length >= 2, `At least two servers are needed, got ${profiles.length}`);

    resultSequences.forEach((sequence, serverIndex) => {
        sequence.forEach((entry: unknown, position) => {
            if (
                typeof entry !== 'object' ||
                entry === null ||
                !('kind' in entry) ||
                typeof entry.kind !== 'string' ||
                !ENTRY_KINDS.has(entry.kind)
            ) {
                throw new InvariantViolationError(
                    `Entry ${position} of server ${profiles[serverIndex].name} is neither a request, a response nor absent`
                );
            }
        });
    });
}

/**
 * Compares every pair of servers, in increasing index order, and reports the first discrepancy found
 */
export function findDiscrepancy(
    resultSequences: readonly ResultSequence[],
    profiles: readonly ServerProfile[]
): DiscrepancyFinding | undefined {
    assertResultSequences(resultSequences, profiles);

    for (let i = 0; i < profiles.length; i++) {
        for (let j = i + 1; j < profiles.length; j++) {
            const found = comparePair(resultSequences[i], profiles[i], resultSequences[j], profiles[j]);
            if (found) {
                return {
                    ...found,
                    servers: [profiles[i].name, profiles[j].name],
                    serverIndices: [i, j],
                };
            }
        }
    }

    return undefined;
}

/**
 * Classifies the result sequences of several servers fed the same input
 */
export function categorizeDiscrepancy(
    resultSequences: readonly ResultSequence[],
    profiles: readonly ServerProfile[]
): DiscrepancyType {
    return findDiscrepancy(resultSequences, profiles)?.type ?? DiscrepancyType.NO_DISCREPANCY;
}
