/**
 * Error types surfaced by the classification service
 */
export enum ClassificationErrorType {
    INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',
    PROFILE_CONFIGURATION_ERROR = 'PROFILE_CONFIGURATION_ERROR',
    REQUEST_VALIDATION_ERROR = 'REQUEST_VALIDATION_ERROR',
    UNKNOWN_PROFILE = 'UNKNOWN_PROFILE',
    INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * A caller handed the classifier inputs that break its contract.
 * Always a bug upstream (parser or harness), never a runtime condition.
 */
export class InvariantViolationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvariantViolationError';
    }
}

/**
 * The server-profile table is malformed
 */
export class ProfileConfigurationError extends Error {
    constructor(message: string, public field?: string) {
        super(message);
        this.name = 'ProfileConfigurationError';
    }
}

export class UnknownProfileError extends Error {
    constructor(public profileName: string) {
        super(`No server profile named "${profileName}"`);
        this.name = 'UnknownProfileError';
    }
}

/**
 * An HTTP payload failed schema validation
 */
export class ClassificationRequestError extends Error {
    constructor(message: string, public issues: string[] = []) {
        super(message);
        this.name = 'ClassificationRequestError';
    }
}

export function assertInvariant(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new InvariantViolationError(message);
    }
}

/**
 * Tracks failures of the classification service for monitoring.
 * Errors are recorded and handed back to the caller, never replaced by a fallback verdict.
 */
export class ClassificationErrorHandler {
    private readonly errorCounts: Map<ClassificationErrorType, number> = new Map();
    private readonly lastErrors: Map<ClassificationErrorType, number> = new Map();

    /**
     * Map an error onto its type
     */
    categorize(error: unknown): ClassificationErrorType {
        if (error instanceof InvariantViolationError) return ClassificationErrorType.INVARIANT_VIOLATION;
        if (error instanceof ProfileConfigurationError) return ClassificationErrorType.PROFILE_CONFIGURATION_ERROR;
        if (error instanceof ClassificationRequestError) return ClassificationErrorType.REQUEST_VALIDATION_ERROR;
        if (error instanceof UnknownProfileError) return ClassificationErrorType.UNKNOWN_PROFILE;
        return ClassificationErrorType.INTERNAL_ERROR;
    }

    /**
     * Record an error occurrence and return its type
     */
    handle(error: unknown): ClassificationErrorType {
        const errorType = this.categorize(error);
        this.recordError(errorType);

        const message = error instanceof Error ? error.message : String(error);
        if (errorType === ClassificationErrorType.INVARIANT_VIOLATION || errorType === ClassificationErrorType.INTERNAL_ERROR) {
            console.error(`Classification failed (${errorType}):`, message);
        } else {
            console.warn(`Classification rejected (${errorType}):`, message);
        }

        return errorType;
    }

    private recordError(errorType: ClassificationErrorType): void {
        const currentCount = this.errorCounts.get(errorType) || 0;
        this.errorCounts.set(errorType, currentCount + 1);
        this.lastErrors.set(errorType, Date.now());
    }

    /**
     * Get error statistics
     */
    getErrorStats(): {
        errorCounts: Record<string, number>;
        lastErrors: Record<string, number>;
    } {
        const errorCounts: Record<string, number> = {};
        const lastErrors: Record<string, number> = {};

        for (const [type, count] of this.errorCounts.entries()) {
            errorCounts[type] = count;
        }

        for (const [type, timestamp] of this.lastErrors.entries()) {
            lastErrors[type] = timestamp;
        }

        return { errorCounts, lastErrors };
    }

    resetErrorStats(): void {
        this.errorCounts.clear();
        this.lastErrors.clear();
    }

    /**
     * Unhealthy once an upstream collaborator has handed over broken data
     */
    isHealthy(): boolean {
        return (
            !this.errorCounts.has(ClassificationErrorType.INVARIANT_VIOLATION) &&
            !this.errorCounts.has(ClassificationErrorType.PROFILE_CONFIGURATION_ERROR) &&
            !this.errorCounts.has(ClassificationErrorType.INTERNAL_ERROR)
        );
    }
}

// Export singleton instance
export const classificationErrorHandler = new ClassificationErrorHandler();
