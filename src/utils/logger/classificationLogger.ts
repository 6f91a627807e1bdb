import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { DiscrepancyType, type DiscrepancyFinding } from '../../differential/types/Discrepancy.js';
import type { HarnessConfig } from '../../differential/types/Configuration.js';
import type { ClassificationErrorType } from '../../differential/ErrorHandler.js';
import { getConfigurationManager } from '../../differential/ConfigurationManager.js';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { resolveDataDir } from '../dataDir.js';
import { isTest } from '../isTest.js';

/**
 * Correlation context for one classification run
 */
export interface ClassificationContext {
    correlationId: string;
    /** Names of the compared servers, in input order */
    servers: string[];
    timestamp: number;
}

/**
 * Structured log entry for classification events
 */
export interface ClassificationLogEntry {
    correlationId: string;
    timestamp: number;
    level: 'info' | 'warn' | 'error';
    event: 'CLASSIFICATION_COMPLETE' | 'DISCREPANCY_FOUND' | 'CLASSIFICATION_ERROR';
    servers: string[];
    verdict?: DiscrepancyType;
    finding?: DiscrepancyFinding;
    error?: string;
    metadata?: Record<string, unknown>;
}

export type ClassificationLoggingSettings = HarnessConfig['logging'];

/**
 * JSON-lines logger for classification verdicts
 */
export class ClassificationLogger {
    private readonly logFile: string;
    private settings: ClassificationLoggingSettings;

    constructor(settings: ClassificationLoggingSettings, logFile: string = path.join(resolveDataDir(), 'classification.log')) {
        this.settings = { ...settings };
        this.logFile = logFile;
        ensureDirExistence(this.logFile);
    }

    createContext(servers: string[], correlationId: string = randomUUID()): ClassificationContext {
        return {
            correlationId,
            servers: [...servers],
            timestamp: Date.now(),
        };
    }

    updateSettings(settings: ClassificationLoggingSettings): void {
        this.settings = { ...settings };
    }

    getLogFile(): string {
        return this.logFile;
    }

    /**
     * Log the verdict of one classification run.
     * Returns the written entry, or null when the settings suppress it.
     */
    logClassificationComplete(
        context: ClassificationContext,
        verdict: DiscrepancyType,
        finding: DiscrepancyFinding | undefined,
        processingTime: number
    ): ClassificationLogEntry | null {
        const found = verdict !== DiscrepancyType.NO_DISCREPANCY;
        if (found ? !this.settings.discrepancies : !this.settings.nonDiscrepancies) {
            return null;
        }

        const entry: ClassificationLogEntry = {
            correlationId: context.correlationId,
            timestamp: Date.now(),
            level: found ? 'warn' : 'info',
            event: found ? 'DISCREPANCY_FOUND' : 'CLASSIFICATION_COMPLETE',
            servers: context.servers,
            verdict,
            finding,
            metadata: {
                processingTime,
                serverCount: context.servers.length,
                category: 'differential.classification',
            },
        };

        this.writeLogEntry(entry);
        return entry;
    }

    logClassificationError(
        context: ClassificationContext,
        error: Error,
        errorType: ClassificationErrorType
    ): ClassificationLogEntry {
        const entry: ClassificationLogEntry = {
            correlationId: context.correlationId,
            timestamp: Date.now(),
            level: 'error',
            event: 'CLASSIFICATION_ERROR',
            servers: context.servers,
            error: error.message,
            metadata: {
                errorType,
                errorName: error.name,
                stack: error.stack,
            },
        };

        this.writeLogEntry(entry);
        return entry;
    }

    private writeLogEntry(entry: ClassificationLogEntry): void {
        fs.appendFileSync(this.logFile, JSON.stringify(entry) + '\n');

        if (process.env.NODE_ENV !== 'production' && !isTest) {
            const level = entry.level.toUpperCase();
            console.log(`[${new Date(entry.timestamp).toISOString()}] [${level}] ${entry.event} - ${entry.servers.join(',')} - ${entry.correlationId}`);
        }
    }
}

// Singleton instance
let classificationLogger: ClassificationLogger | null = null;

/**
 * Get singleton classification logger, following logging changes of the configuration manager
 */
export function getClassificationLogger(): ClassificationLogger {
    if (!classificationLogger) {
        const configManager = getConfigurationManager();
        const logger = new ClassificationLogger(configManager.getConfig().logging);
        configManager.on('configChanged', (config: HarnessConfig) => logger.updateSettings(config.logging));
        classificationLogger = logger;
    }
    return classificationLogger;
}
