import { EventEmitter } from 'events';
import { DiscrepancyType, type DiscrepancyFinding } from '../../differential/types/Discrepancy.js';
import type { ClassificationErrorType } from '../../differential/ErrorHandler.js';

/**
 * Aggregated view of the classification runs seen so far
 */
export interface ClassificationMetrics {
    totalClassifications: number;
    verdicts: Record<DiscrepancyType, number>;
    /** Discrepancies per "serverA|serverB" pair */
    discrepanciesByPair: Record<string, number>;
    totalErrors: number;
    errorsByType: Record<string, number>;
    averageProcessingTime: number;
    maxProcessingTime: number;
    /** Share of runs that found a discrepancy (0-1) */
    discrepancyRate: number;
}

function emptyVerdictCounts(): Record<DiscrepancyType, number> {
    return {
        [DiscrepancyType.NO_DISCREPANCY]: 0,
        [DiscrepancyType.STATUS_DISCREPANCY]: 0,
        [DiscrepancyType.SUBTLE_DISCREPANCY]: 0,
        [DiscrepancyType.STREAM_DISCREPANCY]: 0,
    };
}

/**
 * Metrics collector for classification verdicts and failures
 */
export class MetricsCollector extends EventEmitter {
    private totalClassifications = 0;
    private verdicts = emptyVerdictCounts();
    private discrepanciesByPair: Map<string, number> = new Map();
    private errorsByType: Map<ClassificationErrorType, number> = new Map();
    private totalErrors = 0;
    private totalProcessingTime = 0;
    private maxProcessingTime = 0;

    /**
     * Record the verdict of one classification run
     */
    recordClassification(verdict: DiscrepancyType, finding: DiscrepancyFinding | undefined, processingTime: number): void {
        this.totalClassifications++;
        this.verdicts[verdict]++;
        this.totalProcessingTime += processingTime;
        this.maxProcessingTime = Math.max(this.maxProcessingTime, processingTime);

        if (finding) {
            const pairKey = finding.servers.join('|');
            this.discrepanciesByPair.set(pairKey, (this.discrepanciesByPair.get(pairKey) || 0) + 1);
            this.emit('discrepancy', finding);
        }
    }

    /**
     * Record a failed classification
     */
    recordError(errorType: ClassificationErrorType): void {
        this.totalErrors++;
        this.errorsByType.set(errorType, (this.errorsByType.get(errorType) || 0) + 1);
        this.emit('classificationError', { errorType, timestamp: Date.now() });
    }

    getMetrics(): ClassificationMetrics {
        const found = this.totalClassifications - this.verdicts[DiscrepancyType.NO_DISCREPANCY];

        return {
            totalClassifications: this.totalClassifications,
            verdicts: { ...this.verdicts },
            discrepanciesByPair: Object.fromEntries(this.discrepanciesByPair),
            totalErrors: this.totalErrors,
            errorsByType: Object.fromEntries(this.errorsByType),
            averageProcessingTime: this.totalClassifications > 0
                ? this.totalProcessingTime / this.totalClassifications
                : 0,
            maxProcessingTime: this.maxProcessingTime,
            discrepancyRate: this.totalClassifications > 0 ? found / this.totalClassifications : 0,
        };
    }

    /**
     * Reset all metrics (useful for testing)
     */
    reset(): void {
        this.totalClassifications = 0;
        this.verdicts = emptyVerdictCounts();
        this.discrepanciesByPair.clear();
        this.errorsByType.clear();
        this.totalErrors = 0;
        this.totalProcessingTime = 0;
        this.maxProcessingTime = 0;
    }
}

// Singleton instance
let metricsCollector: MetricsCollector | null = null;

export function getMetricsCollector(): MetricsCollector {
    if (!metricsCollector) {
        metricsCollector = new MetricsCollector();
    }
    return metricsCollector;
}
