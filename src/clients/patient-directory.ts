import { NotFoundError, ServiceUnavailableError, UpstreamError, errorMessage } from '../errors.js';
import { fetchWithTimeout, trimBaseUrl } from './http.js';
import type { FetchLike, HttpClientOptions } from './http.js';

export interface PatientDirectory {
    ensureExists(patientId: string): Promise<void>;
}

const SERVICE = 'user-service';

/** Patient-existence check used by the administrative paths. */
export class HttpPatientDirectory implements PatientDirectory {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;

    constructor({ baseUrl, timeoutMs, fetchImpl = fetch }: HttpClientOptions) {
        this.baseUrl = trimBaseUrl(baseUrl);
        this.timeoutMs = timeoutMs;
        this.fetchImpl = fetchImpl;
    }

    async ensureExists(patientId: string): Promise<void> {
        let res: Response;
        try {
            res = await fetchWithTimeout(
                this.fetchImpl,
                `${this.baseUrl}/${encodeURIComponent(patientId)}`,
                { method: 'GET', headers: { accept: 'application/json' } },
                this.timeoutMs,
            );
        } catch (err) {
            throw new ServiceUnavailableError(SERVICE, errorMessage(err), { patient_id: patientId });
        }

        if (res.status === 200) {
            return;
        }
        if (res.status === 404) {
            throw new NotFoundError('Patient', patientId);
        }
        throw new UpstreamError(SERVICE, `unexpected status ${res.status}`, { patient_id: patientId });
    }
}
