import { v4 as uuidv4 } from 'uuid';
import type { AnomalyEvent, Metric, NewAnomaly, Threshold, ThresholdInput } from '../rules/types.js';
import type { AnomalyStore, Storage, ThresholdRegistry } from './types.js';

function thresholdKey(patientId: string, metric: Metric): string {
    return `${patientId}:${metric}`;
}

/**
 * Single-process registry. The map is the only writer of each key, so
 * concurrent upserts of the same key collapse into one row.
 */
export class MemoryThresholdRegistry implements ThresholdRegistry {
    private thresholds = new Map<string, Threshold>();

    async listForPatient(patientId: string): Promise<Threshold[]> {
        return [...this.thresholds.values()]
            .filter((t) => t.patient_id === patientId)
            .map((t) => ({ ...t }));
    }

    async get(patientId: string, metric: Metric): Promise<Threshold | undefined> {
        const threshold = this.thresholds.get(thresholdKey(patientId, metric));
        return threshold ? { ...threshold } : undefined;
    }

    async upsert(input: ThresholdInput): Promise<Threshold> {
        const key = thresholdKey(input.patient_id, input.metric);
        const now = new Date();
        const existing = this.thresholds.get(key);

        const threshold: Threshold = existing
            ? {
                ...existing,
                min_value: input.min_value ?? null,
                max_value: input.max_value ?? null,
                updated_at: now,
            }
            : {
                id: uuidv4(),
                patient_id: input.patient_id,
                metric: input.metric,
                min_value: input.min_value ?? null,
                max_value: input.max_value ?? null,
                created_at: now,
                updated_at: now,
            };

        this.thresholds.set(key, threshold);
        return { ...threshold };
    }

    size(): number {
        return this.thresholds.size;
    }
}

export class MemoryAnomalyStore implements AnomalyStore {
    private anomalies: AnomalyEvent[] = [];

    async append(batch: NewAnomaly[]): Promise<AnomalyEvent[]> {
        const createdAt = new Date();
        const persisted = batch.map((anomaly) => ({ ...anomaly, id: uuidv4(), created_at: createdAt }));
        this.anomalies.push(...persisted);
        return persisted.map((a) => ({ ...a }));
    }

    async listForPatient(patientId: string): Promise<AnomalyEvent[]> {
        return this.anomalies
            .filter((a) => a.patient_id === patientId)
            .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
            .map((a) => ({ ...a }));
    }

    async listForPatientInRange(patientId: string, start: Date, end: Date): Promise<AnomalyEvent[]> {
        return this.anomalies
            .filter(
                (a) =>
                    a.patient_id === patientId &&
                    a.timestamp.getTime() >= start.getTime() &&
                    a.timestamp.getTime() <= end.getTime(),
            )
            .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
            .map((a) => ({ ...a }));
    }

    size(): number {
        return this.anomalies.length;
    }
}

export function createMemoryStorage(): Storage {
    return {
        thresholds: new MemoryThresholdRegistry(),
        anomalies: new MemoryAnomalyStore(),
        close: async () => undefined,
    };
}
