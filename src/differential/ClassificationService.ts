import type { ZodError } from 'zod';
import type { ParsedRequest, ResultSequence } from './types/HTTPMessage.js';
import { DiscrepancyType, type DiscrepancyFinding } from './types/Discrepancy.js';
import { findDiscrepancy } from './DiscrepancyClassifier.js';
import { normalizeRequest } from './RequestNormalizer.js';
import { getProfileRegistry, type ProfileRegistry } from './ProfileRegistry.js';
import {
    ClassificationRequestError,
    classificationErrorHandler,
    type ClassificationErrorHandler,
} from './ErrorHandler.js';
import { describeIssues } from './schemas.js';
import {
    getClassificationLogger,
    type ClassificationContext,
    type ClassificationLogger,
} from '../utils/logger/classificationLogger.js';
import { getMetricsCollector, type MetricsCollector } from '../utils/logger/metricsCollector.js';

/**
 * Result sequence of one named server
 */
export interface ServerResults {
    server: string;
    entries: ResultSequence;
}

export interface ClassificationOutcome {
    correlationId: string;
    verdict: DiscrepancyType;
    finding?: DiscrepancyFinding;
    /** Milliseconds spent classifying */
    processingTime: number;
}

export interface ClassificationServiceDependencies {
    registry: ProfileRegistry;
    logger: ClassificationLogger;
    metrics: MetricsCollector;
    errorHandler: ClassificationErrorHandler;
}

/**
 * Runs classifications for the harness, resolving server names to their
 * profiles and recording every verdict and failure.
 */
export class ClassificationService {
    private readonly registry: ProfileRegistry;
    private readonly logger: ClassificationLogger;
    private readonly metrics: MetricsCollector;
    private readonly errorHandler: ClassificationErrorHandler;

    constructor(dependencies: ClassificationServiceDependencies) {
        this.registry = dependencies.registry;
        this.logger = dependencies.logger;
        this.metrics = dependencies.metrics;
        this.errorHandler = dependencies.errorHandler;
    }

    classify(results: readonly ServerResults[], correlationId?: string): ClassificationOutcome {
        const context = this.logger.createContext(results.map(r => r.server), correlationId);

        try {
            const profiles = this.registry.getProfiles(context.servers);
            const startTime = process.hrtime.bigint();

            const finding = findDiscrepancy(results.map(r => r.entries), profiles);
            const verdict = finding?.type ?? DiscrepancyType.NO_DISCREPANCY;

            const processingTime = Number(process.hrtime.bigint() - startTime) / 1_000_000;
            this.logger.logClassificationComplete(context, verdict, finding, processingTime);
            this.metrics.recordClassification(verdict, finding, processingTime);

            return { correlationId: context.correlationId, verdict, finding, processingTime };
        } catch (error) {
            this.recordFailure(context, error);
            throw error;
        }
    }

    /**
     * Normalize `request`, accepted by `serverName`, for comparison against `otherName`
     */
    normalize(request: ParsedRequest, serverName: string, otherName: string): ParsedRequest {
        try {
            return normalizeRequest(request, this.registry.getProfile(serverName), this.registry.getProfile(otherName));
        } catch (error) {
            this.recordFailure(this.logger.createContext([serverName, otherName]), error);
            throw error;
        }
    }

    /**
     * Turn a failed payload validation into a recorded ClassificationRequestError
     */
    rejectPayload(error: ZodError, correlationId?: string): ClassificationRequestError {
        const rejection = new ClassificationRequestError('Invalid classification payload', describeIssues(error));
        this.recordFailure(this.logger.createContext([], correlationId), rejection);
        return rejection;
    }

    private recordFailure(context: ClassificationContext, error: unknown): void {
        const errorType = this.errorHandler.handle(error);
        this.metrics.recordError(errorType);
        this.logger.logClassificationError(context, error instanceof Error ? error : new Error(String(error)), errorType);
    }
}

// Singleton instance
let classificationService: ClassificationService | null = null;

export function getClassificationService(): ClassificationService {
    if (!classificationService) {
        classificationService = new ClassificationService({
            registry: getProfileRegistry(),
            logger: getClassificationLogger(),
            metrics: getMetricsCollector(),
            errorHandler: classificationErrorHandler,
        });
    }
    return classificationService;
}
