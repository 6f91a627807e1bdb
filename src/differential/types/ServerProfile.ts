/**
 * Known, benign behavioral quirks of one target server.
 * Profiles are plain data and are frozen once created.
 */
export interface ServerProfile {
    /** Identifying name of the target, e.g. "nginx" */
    readonly name: string;
    /** Headers the server injects into a request before processing it */
    readonly addedHeaders: readonly string[];
    /** Headers the server drops */
    readonly removedHeaders: readonly string[];
    /** Headers the server mangles; compared as if removed */
    readonly trashedHeaders: readonly string[];
    /** Header renames applied by the server, original name -> reported name */
    readonly headerNameTranslation: Readonly<Record<string, string>>;
    /** Whether more than one request per connection is served */
    readonly supportsPersistence: boolean;
    readonly allowsHttp09: boolean;
    /** Whether a POST without a length is answered with 411 */
    readonly requiresLengthInPost: boolean;
    readonly allowsMissingHostHeader: boolean;
    /** Methods the server accepts, or null for no restriction */
    readonly methodWhitelist: readonly string[] | null;
    /** Bytes the server refuses inside a method token, as a byte string */
    readonly methodCharacterBlacklist: string;
}

/**
 * Profile of a server with no known quirks
 */
export const DEFAULT_SERVER_PROFILE: Omit<ServerProfile, 'name'> = {
    addedHeaders: [],
    removedHeaders: [],
    trashedHeaders: [],
    headerNameTranslation: {},
    supportsPersistence: true,
    allowsHttp09: false,
    requiresLengthInPost: false,
    allowsMissingHostHeader: true,
    methodWhitelist: null,
    methodCharacterBlacklist: '',
};

/**
 * Builds a frozen profile, filling unspecified quirks from DEFAULT_SERVER_PROFILE
 */
export function createServerProfile(name: string, quirks: Partial<Omit<ServerProfile, 'name'>> = {}): ServerProfile {
    const profile: ServerProfile = {
        ...DEFAULT_SERVER_PROFILE,
        ...quirks,
        name,
    };

    return Object.freeze({
        ...profile,
        addedHeaders: Object.freeze([...profile.addedHeaders]),
        removedHeaders: Object.freeze([...profile.removedHeaders]),
        trashedHeaders: Object.freeze([...profile.trashedHeaders]),
        headerNameTranslation: Object.freeze({ ...profile.headerNameTranslation }),
        methodWhitelist: profile.methodWhitelist ? Object.freeze([...profile.methodWhitelist]) : null,
    });
}
