import type { ParsedRequest } from './types/HTTPMessage.js';
import type { ServerProfile } from './types/ServerProfile.js';
import {
    removeRequestHeader,
    sortHeaders,
    translateHeaderName,
    translateRequestHeaderNames,
} from './headers.js';

/**
 * Rewrites a request accepted by `own` so that it can be compared with the
 * request accepted by `other`, cancelling the header changes either server is
 * known to make.
 *
 * Call it once per side, mirrored:
 * `normalizeRequest(r1, p1, p2)` and `normalizeRequest(r2, p2, p1)`.
 */
export function normalizeRequest(
    request: ParsedRequest,
    own: ServerProfile,
    other: ServerProfile
): ParsedRequest {
    let normalized = request;

    // Headers own injected never came from the client
    for (const name of own.addedHeaders) {
        normalized = removeRequestHeader(normalized, name);
    }

    // Headers other injected into its copy, named the way own names them
    for (const name of other.addedHeaders) {
        normalized = removeRequestHeader(normalized, translateHeaderName(name, own.headerNameTranslation));
    }

    // Headers either side drops or mangles carry no signal
    const uninformative = [
        ...[...other.removedHeaders, ...other.trashedHeaders].map(name =>
            translateHeaderName(name, own.headerNameTranslation)
        ),
        ...own.trashedHeaders,
        ...own.removedHeaders,
    ];
    for (const name of uninformative) {
        normalized = removeRequestHeader(normalized, name);
    }

    if (Object.keys(other.headerNameTranslation).length > 0) {
        normalized = translateRequestHeaderNames(normalized, other.headerNameTranslation);
    }

    return {
        ...normalized,
        headers: sortHeaders(normalized.headers),
    };
}
