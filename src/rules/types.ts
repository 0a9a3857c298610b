export const METRICS = [
    'heart_rate',
    'spo2',
    'respiratory_rate',
    'systolic_bp',
    'diastolic_bp',
    'temperature',
    'glucose',
] as const;

export type Metric = (typeof METRICS)[number];

const METRIC_NAMES: readonly string[] = METRICS;

export function isMetric(value: string): value is Metric {
    return METRIC_NAMES.includes(value);
}

export type Severity = 'info' | 'warning' | 'critical';

export type MetricValues = Partial<Record<Metric, number>>;

/**
 * One timestamped set of metric values for a patient. Owned by the caller
 * for the duration of one evaluation pass.
 */
export interface Reading {
    patient_id: string;
    timestamp: Date;
    values: MetricValues;
}

export interface Threshold {
    id: string;
    patient_id: string;
    metric: Metric;
    min_value: number | null;
    max_value: number | null;
    created_at: Date;
    updated_at: Date;
}

export interface ThresholdInput {
    patient_id: string;
    metric: Metric;
    min_value?: number | null;
    max_value?: number | null;
}

/** An anomaly built by the evaluator, before the store assigns id and created_at. */
export interface NewAnomaly {
    patient_id: string;
    metric: Metric;
    observed_value: number;
    severity: Severity;
    description: string;
    timestamp: Date;
    threshold_id: string | null;
}

export interface AnomalyEvent extends NewAnomaly {
    id: string;
    created_at: Date;
}

export interface TimeRange {
    start: Date;
    end: Date;
}

/** One historical sample of a single metric. */
export interface Sample {
    timestamp: Date;
    value: number;
}
