import { parseIsoTimestamp } from '../contracts/timestamp.js';
import { ServiceUnavailableError, UpstreamError, errorMessage } from '../errors.js';
import type { HistorySource } from '../rules/evaluator.js';
import type { Metric, Sample, TimeRange } from '../rules/types.js';
import { fetchWithTimeout, trimBaseUrl } from './http.js';
import type { FetchLike, HttpClientOptions } from './http.js';

const SERVICE = 'patient-data-service';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keeps the points that carry a numeric value and a parseable timestamp.
 * Timestamps ending in "Z" and explicit offsets are both accepted.
 */
export function toSamples(body: unknown): Sample[] {
    if (!Array.isArray(body)) {
        return [];
    }

    const samples: Sample[] = [];
    for (const point of body) {
        if (!isRecord(point)) continue;
        const { value, timestamp } = point;
        if (typeof value !== 'number' || typeof timestamp !== 'string') continue;

        const parsed = parseIsoTimestamp(timestamp);
        if (!parsed) continue;

        samples.push({ timestamp: parsed, value });
    }
    return samples;
}

/** Reads one metric's time series from the patient data service. */
export class HttpHistoryClient implements HistorySource {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;

    constructor({ baseUrl, timeoutMs, fetchImpl = fetch }: HttpClientOptions) {
        this.baseUrl = trimBaseUrl(baseUrl);
        this.timeoutMs = timeoutMs;
        this.fetchImpl = fetchImpl;
    }

    async fetchMetric(patientId: string, metric: Metric, range: TimeRange): Promise<Sample[]> {
        const params = new URLSearchParams({
            start_time: range.start.toISOString(),
            end_time: range.end.toISOString(),
            metric_type: metric,
        });
        const url = `${this.baseUrl}/${encodeURIComponent(patientId)}/history?${params.toString()}`;

        let res: Response;
        try {
            res = await fetchWithTimeout(
                this.fetchImpl,
                url,
                { method: 'GET', headers: { accept: 'application/json' } },
                this.timeoutMs,
            );
        } catch (err) {
            throw new ServiceUnavailableError(SERVICE, errorMessage(err), { patient_id: patientId, metric });
        }

        if (res.status !== 200) {
            throw new UpstreamError(SERVICE, `unexpected status ${res.status}`, { patient_id: patientId, metric });
        }

        let body: unknown;
        try {
            body = await res.json();
        } catch (err) {
            throw new UpstreamError(SERVICE, `invalid JSON body: ${errorMessage(err)}`, { patient_id: patientId, metric });
        }
        return toSamples(body);
    }
}
