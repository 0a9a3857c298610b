import type { AnomalyEvent, Metric, NewAnomaly, Threshold, ThresholdInput } from '../rules/types.js';

/**
 * Per-patient, per-metric limits. At most one row exists per
 * (patient_id, metric); upserts update that row in place.
 */
export interface ThresholdRegistry {
    listForPatient(patientId: string): Promise<Threshold[]>;
    get(patientId: string, metric: Metric): Promise<Threshold | undefined>;
    upsert(input: ThresholdInput): Promise<Threshold>;
}

/**
 * Append-only anomaly records. `append` is atomic per call: either every
 * anomaly of the batch is stored or none is.
 */
export interface AnomalyStore {
    append(batch: NewAnomaly[]): Promise<AnomalyEvent[]>;
    /** Newest first. */
    listForPatient(patientId: string): Promise<AnomalyEvent[]>;
    /** Inclusive range, oldest first. */
    listForPatientInRange(patientId: string, start: Date, end: Date): Promise<AnomalyEvent[]>;
}

export interface Storage {
    thresholds: ThresholdRegistry;
    anomalies: AnomalyStore;
    close(): Promise<void>;
}
