import { describe, it, expect, beforeAll, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { ApiServer, parseRange } from '../../../src/api/server.js';
import type { ApiRequest } from '../../../src/api/server.js';
import { SchemaValidator } from '../../../src/contracts/schema-validator.js';
import { Metrics } from '../../../src/metrics/counter.js';
import type { ConsumerState } from '../../../src/nats/consumer.js';
import { AnomalyEvaluator } from '../../../src/rules/evaluator.js';
import { AnalysisService } from '../../../src/services/analysis-service.js';
import { ThresholdService } from '../../../src/services/threshold-service.js';
import { MemoryAnomalyStore, MemoryThresholdRegistry } from '../../../src/storage/memory.js';
import { NotFoundError } from '../../../src/errors.js';

function request(method: string, pathAndQuery: string, body?: unknown): ApiRequest {
    const url = new URL(pathAndQuery, 'http://localhost');
    return {
        method,
        path: url.pathname,
        query: url.searchParams,
        rawBody: body === undefined ? '' : JSON.stringify(body),
    };
}

describe('parseRange', () => {
    it('returns undefined when neither bound is given', () => {
        expect(parseRange(new URLSearchParams())).toBeUndefined();
    });

    it('parses both bounds', () => {
        expect(parseRange(new URLSearchParams({ start: '2024-01-01T00:00:00Z', end: '2024-01-02T00:00:00Z' }))).toEqual({
            start: new Date('2024-01-01T00:00:00Z'),
            end: new Date('2024-01-02T00:00:00Z'),
        });
    });

    it('requires both bounds together', () => {
        expect(() => parseRange(new URLSearchParams({ start: '2024-01-01T00:00:00Z' }))).toThrow(
            'start and end must be given together',
        );
    });

    it('rejects an end before the start', () => {
        expect(() =>
            parseRange(new URLSearchParams({ start: '2024-01-02T00:00:00Z', end: '2024-01-01T00:00:00Z' })),
        ).toThrow('end must be >= start');
    });

    it('rejects an unparseable bound', () => {
        expect(() => parseRange(new URLSearchParams({ start: 'soon', end: '2024-01-01T00:00:00Z' }))).toThrow(
            'Invalid start: soon',
        );
    });
});

describe('ApiServer.route', () => {
    let validator: SchemaValidator;
    let registry: MemoryThresholdRegistry;
    let store: MemoryAnomalyStore;
    let metrics: Metrics;
    let ensureExists: Mock<(patientId: string) => Promise<void>>;
    let connected: boolean;
    let state: ConsumerState;
    let server: ApiServer;

    beforeAll(() => {
        validator = new SchemaValidator('./contracts');
        validator.loadSchemas();
    });

    beforeEach(() => {
        registry = new MemoryThresholdRegistry();
        store = new MemoryAnomalyStore();
        metrics = new Metrics();
        ensureExists = vi.fn(async (_patientId: string) => undefined);
        connected = true;
        state = 'running';

        const patients = { ensureExists };
        const evaluator = new AnomalyEvaluator(registry, store, {
            fetchMetric: vi.fn(async () => [{ timestamp: new Date('2024-01-01T11:30:00Z'), value: 130 }]),
        });

        server = new ApiServer(0, {
            bus: { isConnected: () => connected },
            consumer: { getState: () => state },
            metrics,
            thresholds: new ThresholdService(registry, patients, validator),
            analysis: new AnalysisService(evaluator, store, patients, {
                windowMs: 3_600_000,
                now: () => new Date('2024-01-01T12:00:00Z'),
            }),
        });
    });

    describe('GET /health', () => {
        it('is ok while connected and consuming', async () => {
            const res = await server.route(request('GET', '/health'));

            expect(res.status).toBe(200);
            expect(res.body).toMatchObject({ status: 'ok', nats: { connected: true }, consumer: { state: 'running' } });
        });

        it('is degraded when the bus is down', async () => {
            connected = false;

            const res = await server.route(request('GET', '/health'));

            expect(res.status).toBe(503);
            expect(res.body).toMatchObject({ status: 'degraded', nats: { connected: false } });
        });

        it('is degraded when the consumer is not running', async () => {
            state = 'stopping';

            const res = await server.route(request('GET', '/health'));

            expect(res.status).toBe(503);
            expect(res.body).toMatchObject({ consumer: { state: 'stopping' } });
        });
    });

    it('exposes the pipeline counters', async () => {
        metrics.incrementReceived();
        metrics.incrementDroppedInvalid();

        const res = await server.route(request('GET', '/metrics'));

        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({ received: 1, dropped_invalid: 1, decoded: 0 });
    });

    describe('thresholds', () => {
        it('upserts and reads back a threshold', async () => {
            const created = await server.route(
                request('POST', '/thresholds', { patient_id: 'patient-1', metric: 'heart_rate', min_value: 60, max_value: 100 }),
            );
            const fetched = await server.route(request('GET', '/thresholds/patient-1/heart_rate'));
            const listed = await server.route(request('GET', '/thresholds/patient-1'));

            expect(created.status).toBe(200);
            expect(fetched.body).toMatchObject({ metric: 'heart_rate', min_value: 60, max_value: 100 });
            expect(listed.body).toHaveLength(1);
        });

        it('answers 400 for min_value above max_value', async () => {
            const res = await server.route(
                request('POST', '/thresholds', { patient_id: 'patient-1', metric: 'heart_rate', min_value: 100, max_value: 60 }),
            );

            expect(res.status).toBe(400);
            expect(res.body).toEqual({
                error: 'VALIDATION',
                message: 'min_value must not exceed max_value',
                context: { min_value: 100, max_value: 60 },
            });
        });

        it('answers 400 for a body that is not JSON', async () => {
            const res = await server.route({ ...request('POST', '/thresholds'), rawBody: '{"metric":' });

            expect(res.status).toBe(400);
            expect(res.body).toMatchObject({ message: 'Request body is not valid JSON' });
        });

        it('answers 400 for a missing body', async () => {
            const res = await server.route(request('POST', '/thresholds'));

            expect(res.body).toMatchObject({ error: 'VALIDATION', message: 'Request body is required' });
        });

        it('answers 404 for an unknown patient', async () => {
            ensureExists.mockRejectedValueOnce(new NotFoundError('Patient', 'ghost'));

            const res = await server.route(request('GET', '/thresholds/ghost'));

            expect(res.status).toBe(404);
            expect(res.body).toMatchObject({ error: 'NOT_FOUND', message: "Patient 'ghost' not found" });
        });

        it('answers 400 for an unsupported metric', async () => {
            const res = await server.route(request('GET', '/thresholds/patient-1/weight_kg'));

            expect(res.status).toBe(400);
            expect(res.body).toMatchObject({ message: 'Unsupported metric: weight_kg' });
        });
    });

    describe('anomalies and analysis', () => {
        beforeEach(async () => {
            await registry.upsert({ patient_id: 'patient-1', metric: 'heart_rate', min_value: 60, max_value: 100 });
        });

        it('runs a manual analysis and lists what it recorded', async () => {
            const analyzed = await server.route(request('POST', '/analyze/patient-1'));
            const listed = await server.route(request('GET', '/anomalies/patient-1'));

            expect(analyzed.status).toBe(200);
            expect(analyzed.body).toHaveLength(1);
            expect(listed.body).toEqual(analyzed.body);
        });

        it('filters anomalies by range', async () => {
            await server.route(request('POST', '/analyze/patient-1'));

            const outside = await server.route(
                request('GET', '/anomalies/patient-1?start=2024-01-01T11:40:00Z&end=2024-01-01T12:00:00Z'),
            );

            expect(outside.status).toBe(200);
            expect(outside.body).toEqual([]);
        });

        it('answers 400 for a half-open range', async () => {
            const res = await server.route(request('GET', '/anomalies/patient-1?start=2024-01-01T11:40:00Z'));

            expect(res.status).toBe(400);
        });
    });

    it('answers 400 for a malformed path encoding', async () => {
        const res = await server.route(request('GET', '/thresholds/%E0%A4%A'));

        expect(res).toEqual({
            status: 400,
            body: { error: 'VALIDATION', message: 'Malformed path', context: { path: '/thresholds/%E0%A4%A' } },
        });
    });

    it('answers 404 for an unknown route', async () => {
        const res = await server.route(request('DELETE', '/thresholds/patient-1'));

        expect(res).toEqual({ status: 404, body: { error: 'NOT_FOUND', message: 'Not found' } });
    });

    it('answers 500 without detail for an unexpected failure', async () => {
        ensureExists.mockRejectedValueOnce(new Error('socket hang up'));

        const res = await server.route(request('GET', '/anomalies/patient-1'));

        expect(res).toEqual({ status: 500, body: { error: 'INTERNAL', message: 'Internal server error' } });
    });
});
