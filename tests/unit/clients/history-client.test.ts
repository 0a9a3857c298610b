import { describe, it, expect, vi } from 'vitest';
import { HttpHistoryClient, toSamples } from '../../../src/clients/history-client.js';
import { ServiceUnavailableError, UpstreamError } from '../../../src/errors.js';

const range = {
    start: new Date('2024-01-01T11:00:00Z'),
    end: new Date('2024-01-01T12:00:00Z'),
};

describe('toSamples', () => {
    it('keeps points with a numeric value and a parseable timestamp', () => {
        expect(
            toSamples([
                { timestamp: '2024-01-01T11:10:00Z', value: 80 },
                { timestamp: '2024-01-01T13:20:00+02:00', value: 120.5 },
                { timestamp: 'not a time', value: 90 },
                { timestamp: '2024-01-01T11:40:00Z', value: '90' },
                null,
            ]),
        ).toEqual([
            { timestamp: new Date('2024-01-01T11:10:00Z'), value: 80 },
            { timestamp: new Date('2024-01-01T11:20:00Z'), value: 120.5 },
        ]);
    });

    it('reads points without offset as UTC', () => {
        expect(toSamples([{ timestamp: '2024-01-01T11:10:00.250000', value: 80 }])).toEqual([
            { timestamp: new Date('2024-01-01T11:10:00.250Z'), value: 80 },
        ]);
    });

    it('returns nothing for a body that is not a list', () => {
        expect(toSamples({ data: [] })).toEqual([]);
    });
});

describe('HttpHistoryClient', () => {
    it('asks for one metric over the window', async () => {
        const fetchImpl = vi.fn(
            async (_input: string | URL, _init?: RequestInit) =>
                new Response(JSON.stringify([{ timestamp: '2024-01-01T11:30:00Z', value: 97 }]), { status: 200 }),
        );
        const client = new HttpHistoryClient({ baseUrl: 'http://data:8080/patients', timeoutMs: 3000, fetchImpl });

        const samples = await client.fetchMetric('patient-1', 'spo2', range);

        const url = new URL(String(fetchImpl.mock.calls[0][0]));
        expect(url.pathname).toBe('/patients/patient-1/history');
        expect(url.searchParams.get('start_time')).toBe('2024-01-01T11:00:00.000Z');
        expect(url.searchParams.get('end_time')).toBe('2024-01-01T12:00:00.000Z');
        expect(url.searchParams.get('metric_type')).toBe('spo2');
        expect(samples).toEqual([{ timestamp: new Date('2024-01-01T11:30:00Z'), value: 97 }]);
    });

    it('raises UpstreamError for a non-200 answer', async () => {
        const fetchImpl = vi.fn(async () => new Response('nope', { status: 503 }));
        const client = new HttpHistoryClient({ baseUrl: 'http://data:8080/patients', timeoutMs: 3000, fetchImpl });

        await expect(client.fetchMetric('patient-1', 'spo2', range)).rejects.toThrow(
            'patient-data-service: unexpected status 503',
        );
    });

    it('raises UpstreamError for a body that is not JSON', async () => {
        const fetchImpl = vi.fn(async () => new Response('<html>', { status: 200 }));
        const client = new HttpHistoryClient({ baseUrl: 'http://data:8080/patients', timeoutMs: 3000, fetchImpl });

        await expect(client.fetchMetric('patient-1', 'spo2', range)).rejects.toThrow(UpstreamError);
    });

    it('raises ServiceUnavailableError when the request times out', async () => {
        const fetchImpl = vi.fn(
            (_input: string | URL, init?: RequestInit) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
                }),
        );
        const client = new HttpHistoryClient({ baseUrl: 'http://data:8080/patients', timeoutMs: 20, fetchImpl });

        await expect(client.fetchMetric('patient-1', 'spo2', range)).rejects.toThrow(ServiceUnavailableError);
    });
});
