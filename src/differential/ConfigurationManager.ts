import { EventEmitter } from 'events';
import { HarnessConfig, DEFAULT_HARNESS_CONFIG } from './types/Configuration.js';

/**
 * Configuration validation error
 */
export class ConfigurationError extends Error {
    constructor(message: string, public field?: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

type ConfigUpdate = Partial<Omit<HarnessConfig, 'limits' | 'logging'>> & {
    limits?: Partial<HarnessConfig['limits']>;
    logging?: Partial<HarnessConfig['logging']>;
};

/**
 * Configuration manager for the classification service
 * Handles environment variable loading and validation
 */
export class ConfigurationManager extends EventEmitter {
    private config: HarnessConfig;

    constructor() {
        super();
        this.config = this.loadConfiguration();
    }

    /**
     * Get the current configuration
     */
    getConfig(): HarnessConfig {
        return structuredClone(this.config);
    }

    /**
     * Update configuration and emit change event
     */
    updateConfig(newConfig: ConfigUpdate): void {
        const mergedConfig = this.mergeConfig(this.config, newConfig);
        this.validateConfiguration(mergedConfig);

        const oldConfig = this.config;
        this.config = mergedConfig;

        console.info('Configuration updated', {
            changes: this.getConfigChanges(oldConfig, mergedConfig),
        });

        this.emit('configChanged', this.getConfig(), oldConfig);
    }

    /**
     * Load configuration from environment variables and defaults
     */
    private loadConfiguration(): HarnessConfig {
        const config = structuredClone(DEFAULT_HARNESS_CONFIG);

        this.loadFromEnvironment(config);
        this.validateConfiguration(config);

        return config;
    }

    /**
     * Load configuration values from environment variables
     */
    private loadFromEnvironment(config: HarnessConfig): void {
        if (process.env.PORT !== undefined) {
            config.port = parseInt(process.env.PORT, 10);
        }
        if (process.env.PROFILES_PATH !== undefined) {
            config.profilesPath = process.env.PROFILES_PATH;
        }
        if (process.env.PROFILES_RELOAD_INTERVAL_MS !== undefined) {
            config.profilesReloadIntervalMs = parseInt(process.env.PROFILES_RELOAD_INTERVAL_MS, 10);
        }

        // Payload limits
        if (process.env.DIFF_MAX_SERVERS !== undefined) {
            config.limits.maxServers = parseInt(process.env.DIFF_MAX_SERVERS, 10);
        }
        if (process.env.DIFF_MAX_SEQUENCE_LENGTH !== undefined) {
            config.limits.maxSequenceLength = parseInt(process.env.DIFF_MAX_SEQUENCE_LENGTH, 10);
        }

        // Structured logging
        if (process.env.DIFF_LOG_DISCREPANCIES !== undefined) {
            config.logging.discrepancies = process.env.DIFF_LOG_DISCREPANCIES === 'true';
        }
        if (process.env.DIFF_LOG_NON_DISCREPANCIES !== undefined) {
            config.logging.nonDiscrepancies = process.env.DIFF_LOG_NON_DISCREPANCIES === 'true';
        }
    }

    /**
     * Validate configuration values
     */
    private validateConfiguration(config: HarnessConfig): void {
        if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
            throw new ConfigurationError('Port must be an integer between 0 and 65535', 'port');
        }
        if (config.profilesPath.trim() === '') {
            throw new ConfigurationError('Profiles path must not be empty', 'profilesPath');
        }
        if (!Number.isInteger(config.profilesReloadIntervalMs) || config.profilesReloadIntervalMs < 0) {
            throw new ConfigurationError('Profiles reload interval must be a non-negative integer', 'profilesReloadIntervalMs');
        }

        if (!Number.isInteger(config.limits.maxServers) || config.limits.maxServers < 2) {
            throw new ConfigurationError('At least two servers must be allowed per classification', 'limits.maxServers');
        }
        if (!Number.isInteger(config.limits.maxSequenceLength) || config.limits.maxSequenceLength < 1) {
            throw new ConfigurationError('Maximum sequence length must be a positive integer', 'limits.maxSequenceLength');
        }
    }

    /**
     * Merge configuration objects
     */
    private mergeConfig(base: HarnessConfig, updates: ConfigUpdate): HarnessConfig {
        return {
            port: updates.port ?? base.port,
            profilesPath: updates.profilesPath ?? base.profilesPath,
            profilesReloadIntervalMs: updates.profilesReloadIntervalMs ?? base.profilesReloadIntervalMs,
            limits: {
                ...base.limits,
                ...updates.limits,
            },
            logging: {
                ...base.logging,
                ...updates.logging,
            },
        };
    }

    /**
     * Get configuration changes for logging
     */
    private getConfigChanges(oldConfig: HarnessConfig, newConfig: HarnessConfig): Record<string, { from: unknown; to: unknown }> {
        const changes: Record<string, { from: unknown; to: unknown }> = {};

        const compareObjects = (old: Record<string, unknown>, updated: Record<string, unknown>, path: string = '') => {
            for (const key of Object.keys(updated)) {
                const currentPath = path ? `${path}.${key}` : key;
                const before = old[key];
                const after = updated[key];
                if (isPlainObject(after)) {
                    compareObjects(isPlainObject(before) ? before : {}, after, currentPath);
                } else if (JSON.stringify(before) !== JSON.stringify(after)) {
                    changes[currentPath] = { from: before, to: after };
                }
            }
        };

        compareObjects({ ...oldConfig }, { ...newConfig });
        return changes;
    }

    /**
     * Cleanup resources
     */
    destroy(): void {
        this.removeAllListeners();
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Singleton instance
let configManager: ConfigurationManager | null = null;

/**
 * Get the global configuration manager instance
 */
export function getConfigurationManager(): ConfigurationManager {
    if (!configManager) {
        configManager = new ConfigurationManager();
    }
    return configManager;
}

/**
 * Re-read the environment into a fresh configuration manager
 */
export function initializeConfigurationManager(): ConfigurationManager {
    if (configManager) {
        configManager.destroy();
    }
    configManager = new ConfigurationManager();
    return configManager;
}
