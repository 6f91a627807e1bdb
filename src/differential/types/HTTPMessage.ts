/**
 * A single header field as parsed off the wire.
 * Name and value are byte strings: every code unit is a raw byte (0x00-0xFF).
 */
export type HTTPHeader = readonly [name: string, value: string];

/**
 * HTTP version marker that denotes a legacy HTTP/0.9 parse
 */
export const HTTP_0_9_VERSION = '0.9';

/**
 * A request as a target server understood it
 */
export interface ParsedRequest {
    /** Method token, e.g. "GET" */
    readonly method: string;
    /** Request target, e.g. "/" */
    readonly target: string;
    /** Version without the "HTTP/" prefix, e.g. "1.1"; "0.9" for legacy parses */
    readonly version: string;
    /** Headers in wire order, duplicates permitted */
    readonly headers: readonly HTTPHeader[];
    /** Body bytes, or null when the request carried no body */
    readonly body: string | null;
}

/**
 * A rejection response produced by a target server
 */
export interface ParsedResponse {
    /** Three-byte status code, e.g. "400" */
    readonly code: string;
    /** Reason phrase */
    readonly reason: string;
    readonly headers: readonly HTTPHeader[];
    readonly body: string | null;
}

export interface RequestEntry {
    readonly kind: 'request';
    readonly request: ParsedRequest;
}

export interface ResponseEntry {
    readonly kind: 'response';
    readonly response: ParsedResponse;
}

/**
 * No further message was produced at this position (connection closed or stream truncated)
 */
export interface AbsentEntry {
    readonly kind: 'absent';
}

export type ResultEntry = RequestEntry | ResponseEntry | AbsentEntry;

/**
 * Everything one server produced for one input byte stream, in order
 */
export type ResultSequence = readonly ResultEntry[];

export const ABSENT: AbsentEntry = Object.freeze({ kind: 'absent' });

export function requestEntry(request: ParsedRequest): RequestEntry {
    return { kind: 'request', request };
}

export function responseEntry(response: ParsedResponse): ResponseEntry {
    return { kind: 'response', response };
}

/**
 * Builds a request with HTTP/1.1 defaults for the fields not given
 */
export function createRequest(fields: Partial<ParsedRequest> = {}): ParsedRequest {
    return {
        method: fields.method ?? 'GET',
        target: fields.target ?? '/',
        version: fields.version ?? '1.1',
        headers: fields.headers ?? [],
        body: fields.body ?? null,
    };
}

export function createResponse(code: string, fields: Partial<Omit<ParsedResponse, 'code'>> = {}): ParsedResponse {
    return {
        code,
        reason: fields.reason ?? '',
        headers: fields.headers ?? [],
        body: fields.body ?? null,
    };
}
