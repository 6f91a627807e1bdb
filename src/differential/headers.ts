import type { HTTPHeader, ParsedRequest } from './types/HTTPMessage.js';

/**
 * True when every code unit is a single byte value
 */
export function isByteString(value: string): boolean {
    return [...value].every(c => c.charCodeAt(0) <= 0xff);
}

/**
 * Lowercases ASCII letters only, so bytes 0x80-0xFF keep their identity
 */
export function foldHeaderName(name: string): string {
    return name.replace(/[A-Z]/g, c => String.fromCharCode(c.charCodeAt(0) + 0x20));
}

export function headerNamesMatch(a: string, b: string): boolean {
    return foldHeaderName(a) === foldHeaderName(b);
}

/**
 * Looks a header name up in a rename mapping, returning it unchanged when unmapped
 */
export function translateHeaderName(name: string, translation: Readonly<Record<string, string>>): string {
    const folded = foldHeaderName(name);
    for (const [from, to] of Object.entries(translation)) {
        if (foldHeaderName(from) === folded) {
            return to;
        }
    }
    return name;
}

export function hasHeader(request: ParsedRequest, name: string): boolean {
    return request.headers.some(([headerName]) => headerNamesMatch(headerName, name));
}

/**
 * Returns a copy of the request without any header called `name`
 */
export function removeRequestHeader(request: ParsedRequest, name: string): ParsedRequest {
    return {
        ...request,
        headers: request.headers.filter(([headerName]) => !headerNamesMatch(headerName, name)),
    };
}

/**
 * Returns a copy of the request with every header name passed through `translation`
 */
export function translateRequestHeaderNames(
    request: ParsedRequest,
    translation: Readonly<Record<string, string>>
): ParsedRequest {
    return {
        ...request,
        headers: request.headers.map(([name, value]): HTTPHeader => [translateHeaderName(name, translation), value]),
    };
}

function compareBytes(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Orders headers by name, then value, comparing raw bytes
 */
export function sortHeaders(headers: readonly HTTPHeader[]): HTTPHeader[] {
    return [...headers].sort(
        ([nameA, valueA], [nameB, valueB]) => compareBytes(nameA, nameB) || compareBytes(valueA, valueB)
    );
}

/**
 * Structural equality over method, target, version, headers (in their current order) and body
 */
export function requestsEqual(a: ParsedRequest, b: ParsedRequest): boolean {
    if (a.method !== b.method || a.target !== b.target || a.version !== b.version || a.body !== b.body) {
        return false;
    }
    if (a.headers.length !== b.headers.length) {
        return false;
    }
    return a.headers.every(([name, value], index) => {
        const [otherName, otherValue] = b.headers[index];
        return name === otherName && value === otherValue;
    });
}
