import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import type { AnomalyStore, ThresholdRegistry } from '../storage/types.js';
import type {
    AnomalyEvent,
    Metric,
    NewAnomaly,
    Reading,
    Sample,
    Threshold,
    TimeRange,
} from './types.js';

/** Source of historical samples for the backfill path. */
export interface HistorySource {
    fetchMetric(patientId: string, metric: Metric, range: TimeRange): Promise<Sample[]>;
}

/**
 * Observed values are rendered as float literals: an integral value keeps
 * a trailing ".0" (110 -> "110.0"), anything else prints as-is.
 */
export function formatObserved(value: number): string {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Returns the violation description for `value` against `threshold`, or
 * null when the value is within bounds. Bounds are exclusive: a value equal
 * to min or max is not a violation. The min check wins when both apply.
 */
export function describeViolation(threshold: Threshold, value: number): string | null {
    const observed = formatObserved(value);

    if (threshold.min_value !== null && value < threshold.min_value) {
        return `${threshold.metric} ${observed} < min ${threshold.min_value}`;
    }
    if (threshold.max_value !== null && value > threshold.max_value) {
        return `${threshold.metric} ${observed} > max ${threshold.max_value}`;
    }
    return null;
}

function buildAnomaly(
    patientId: string,
    threshold: Threshold,
    value: number,
    description: string,
    timestamp: Date,
): NewAnomaly {
    return {
        patient_id: patientId,
        metric: threshold.metric,
        observed_value: value,
        severity: 'warning',
        description,
        timestamp,
        threshold_id: threshold.id,
    };
}

/**
 * Applies every threshold whose metric is present in the reading. Pure:
 * the same reading and thresholds always yield the same anomalies.
 */
export function detectAnomalies(reading: Reading, thresholds: Threshold[]): NewAnomaly[] {
    const anomalies: NewAnomaly[] = [];

    for (const threshold of thresholds) {
        const value = reading.values[threshold.metric];
        if (value === undefined) continue;

        const description = describeViolation(threshold, value);
        if (description) {
            anomalies.push(buildAnomaly(reading.patient_id, threshold, value, description, reading.timestamp));
        }
    }

    return anomalies;
}

export class AnomalyEvaluator {
    constructor(
        private thresholds: ThresholdRegistry,
        private anomalies: AnomalyStore,
        private history: HistorySource,
    ) { }

    /**
     * Evaluate one live reading. Anomalies of the reading are appended as a
     * single batch; a store failure rejects and records none of them.
     */
    async evaluate(reading: Reading): Promise<AnomalyEvent[]> {
        const thresholds = await this.thresholds.listForPatient(reading.patient_id);
        if (thresholds.length === 0) {
            return [];
        }

        const detected = detectAnomalies(reading, thresholds);
        if (detected.length === 0) {
            return [];
        }

        return this.anomalies.append(detected);
    }

    /**
     * Re-run the violation logic over historical samples. Nothing is
     * compared against anomalies recorded earlier, so overlapping windows
     * record the same violation again.
     */
    async backfill(patientId: string, range: TimeRange): Promise<AnomalyEvent[]> {
        const thresholds = await this.thresholds.listForPatient(patientId);
        if (thresholds.length === 0) {
            return [];
        }

        const detected: NewAnomaly[] = [];

        for (const threshold of thresholds) {
            let samples: Sample[];
            try {
                samples = await this.history.fetchMetric(patientId, threshold.metric, range);
            } catch (err) {
                logger.warn(
                    { patient_id: patientId, metric: threshold.metric, error: errorMessage(err) },
                    'History unavailable for metric, skipped',
                );
                continue;
            }

            for (const sample of samples) {
                const description = describeViolation(threshold, sample.value);
                if (description) {
                    detected.push(buildAnomaly(patientId, threshold, sample.value, description, sample.timestamp));
                }
            }
        }

        if (detected.length === 0) {
            return [];
        }

        const persisted = await this.anomalies.append(detected);
        logger.info(
            { patient_id: patientId, count: persisted.length, start: range.start, end: range.end },
            'Backfill recorded anomalies',
        );
        return persisted;
    }
}
