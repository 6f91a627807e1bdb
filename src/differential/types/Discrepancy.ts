/**
 * Outcome of comparing the result sequences of several servers.
 * No severity ordering is implied between the discrepancy kinds.
 */
export enum DiscrepancyType {
    /** Every pair agreed, or disagreed only in known ways */
    NO_DISCREPANCY = 'NO_DISCREPANCY',
    /** One server accepted a message the other rejected */
    STATUS_DISCREPANCY = 'STATUS_DISCREPANCY',
    /** Both accepted, but interpreted the bytes differently */
    SUBTLE_DISCREPANCY = 'SUBTLE_DISCREPANCY',
    /** One server kept producing messages after the other stopped */
    STREAM_DISCREPANCY = 'STREAM_DISCREPANCY',
}

export type FoundDiscrepancyType = Exclude<DiscrepancyType, DiscrepancyType.NO_DISCREPANCY>;

/**
 * Where the first discrepancy of a classification run was found
 */
export interface DiscrepancyFinding {
    type: FoundDiscrepancyType;
    /** Names of the two disagreeing servers, in traversal order */
    servers: [string, string];
    /** Indices of the two servers in the input lists */
    serverIndices: [number, number];
    /** Position within the (possibly truncated) result sequences */
    position: number;
    description: string;
}

/**
 * A known-benign explanation for one server accepting what another rejected
 */
export type BenignRejectionKind =
    | 'HTTP_0_9_NOT_ALLOWED'
    | 'LENGTH_REQUIRED_IN_POST'
    | 'MISSING_HOST_NOT_ALLOWED'
    | 'METHOD_NOT_WHITELISTED'
    | 'METHOD_CHARACTER_BLACKLISTED';
