/**
 * Bounds applied to classification payloads received over HTTP
 */
export interface ClassificationLimits {
    /** Maximum number of servers compared in one request */
    maxServers: number;
    /** Maximum number of entries in one server's result sequence */
    maxSequenceLength: number;
}

/**
 * Main configuration interface for the classification service
 */
export interface HarnessConfig {
    /** Port the HTTP service listens on */
    port: number;
    /** Path of the JSON server-profile table */
    profilesPath: string;
    /** How often the profile table is re-read from disk, 0 to never */
    profilesReloadIntervalMs: number;
    limits: ClassificationLimits;
    /** Structured classification logging */
    logging: {
        /** Write an entry for every discrepancy found */
        discrepancies: boolean;
        /** Also write an entry for runs that found nothing */
        nonDiscrepancies: boolean;
    };
}

/**
 * Default configuration values for the classification service
 */
export const DEFAULT_HARNESS_CONFIG: HarnessConfig = {
    port: 3000,
    profilesPath: 'config/profiles.json',
    profilesReloadIntervalMs: 0,
    limits: {
        maxServers: 16,
        maxSequenceLength: 64,
    },
    logging: {
        discrepancies: true,
        nonDiscrepancies: false,
    },
};
