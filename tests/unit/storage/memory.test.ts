import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryAnomalyStore, MemoryThresholdRegistry } from '../../../src/storage/memory.js';
import type { NewAnomaly } from '../../../src/rules/types.js';

function anomaly(timestamp: string, patientId = 'patient-1'): NewAnomaly {
    return {
        patient_id: patientId,
        metric: 'heart_rate',
        observed_value: 120,
        severity: 'warning',
        description: 'heart_rate 120.0 > max 100',
        timestamp: new Date(timestamp),
        threshold_id: 'th-1',
    };
}

describe('MemoryThresholdRegistry', () => {
    let registry: MemoryThresholdRegistry;

    beforeEach(() => {
        registry = new MemoryThresholdRegistry();
    });

    it('returns an empty list for a patient without thresholds', async () => {
        expect(await registry.listForPatient('patient-1')).toEqual([]);
    });

    it('keeps one row per patient and metric, holding the latest bounds', async () => {
        const first = await registry.upsert({ patient_id: 'patient-1', metric: 'heart_rate', min_value: 60, max_value: 100 });
        const second = await registry.upsert({ patient_id: 'patient-1', metric: 'heart_rate', min_value: 50, max_value: 120 });

        const stored = await registry.listForPatient('patient-1');

        expect(registry.size()).toBe(1);
        expect(stored).toHaveLength(1);
        expect(second.id).toBe(first.id);
        expect(stored[0]).toMatchObject({ id: first.id, min_value: 50, max_value: 120 });
        expect(stored[0].created_at).toEqual(first.created_at);
    });

    it('clears a bound that is omitted on update', async () => {
        await registry.upsert({ patient_id: 'patient-1', metric: 'spo2', min_value: 92, max_value: 100 });
        const updated = await registry.upsert({ patient_id: 'patient-1', metric: 'spo2', min_value: 90 });

        expect(updated.max_value).toBeNull();
    });

    it('collapses concurrent upserts of the same key into one row', async () => {
        await Promise.all([
            registry.upsert({ patient_id: 'patient-1', metric: 'glucose', max_value: 10 }),
            registry.upsert({ patient_id: 'patient-1', metric: 'glucose', max_value: 11 }),
            registry.upsert({ patient_id: 'patient-1', metric: 'glucose', max_value: 12 }),
        ]);

        const stored = await registry.listForPatient('patient-1');
        expect(stored).toHaveLength(1);
        expect(stored[0].max_value).toBe(12);
    });

    it('keeps patients apart', async () => {
        await registry.upsert({ patient_id: 'patient-1', metric: 'heart_rate', max_value: 100 });
        await registry.upsert({ patient_id: 'patient-2', metric: 'heart_rate', max_value: 90 });

        expect(await registry.get('patient-2', 'heart_rate')).toMatchObject({ max_value: 90 });
        expect(await registry.get('patient-2', 'spo2')).toBeUndefined();
    });

    it('hands out copies that do not alter stored rows', async () => {
        const stored = await registry.upsert({ patient_id: 'patient-1', metric: 'heart_rate', max_value: 100 });
        stored.max_value = 1;

        expect(await registry.get('patient-1', 'heart_rate')).toMatchObject({ max_value: 100 });
    });
});

describe('MemoryAnomalyStore', () => {
    let store: MemoryAnomalyStore;

    beforeEach(async () => {
        store = new MemoryAnomalyStore();
        await store.append([
            anomaly('2024-01-01T10:00:00Z'),
            anomaly('2024-01-01T12:00:00Z'),
            anomaly('2024-01-01T11:00:00Z'),
            anomaly('2024-01-01T11:30:00Z', 'patient-2'),
        ]);
    });

    it('assigns ids to appended anomalies', async () => {
        const [persisted] = await store.append([anomaly('2024-01-01T13:00:00Z')]);

        expect(persisted.id).toEqual(expect.any(String));
        expect(persisted.created_at).toBeInstanceOf(Date);
    });

    it('lists a patient newest first', async () => {
        const listed = await store.listForPatient('patient-1');

        expect(listed.map((a) => a.timestamp.toISOString())).toEqual([
            '2024-01-01T12:00:00.000Z',
            '2024-01-01T11:00:00.000Z',
            '2024-01-01T10:00:00.000Z',
        ]);
    });

    it('lists an inclusive range oldest first', async () => {
        const listed = await store.listForPatientInRange(
            'patient-1',
            new Date('2024-01-01T11:00:00Z'),
            new Date('2024-01-01T12:00:00Z'),
        );

        expect(listed.map((a) => a.timestamp.toISOString())).toEqual([
            '2024-01-01T11:00:00.000Z',
            '2024-01-01T12:00:00.000Z',
        ]);
    });

    it('treats an empty batch as a no-op', async () => {
        expect(await store.append([])).toEqual([]);
        expect(store.size()).toBe(4);
    });
});
