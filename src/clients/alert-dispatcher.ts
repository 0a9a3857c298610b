import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import type { AnomalyEvent, Severity } from '../rules/types.js';
import { fetchWithTimeout, trimBaseUrl } from './http.js';
import type { FetchLike, HttpClientOptions } from './http.js';

export interface AlertNotification {
    patient_id: string;
    message: string;
    severity: Severity;
}

/**
 * Best-effort, at-most-once notification of a persisted anomaly. There is
 * no retry and no queue: a failed dispatch is logged and the notification
 * is lost, while the anomaly record stays as it is.
 */
export interface AlertSink {
    dispatch(anomaly: AnomalyEvent): Promise<boolean>;
}

export class HttpAlertDispatcher implements AlertSink {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;

    constructor({ baseUrl, timeoutMs, fetchImpl = fetch }: HttpClientOptions) {
        this.baseUrl = trimBaseUrl(baseUrl);
        this.timeoutMs = timeoutMs;
        this.fetchImpl = fetchImpl;
    }

    /**
     * Resolves true on a 2xx answer and false otherwise. Never rejects.
     */
    async dispatch(anomaly: AnomalyEvent): Promise<boolean> {
        const notification: AlertNotification = {
            patient_id: anomaly.patient_id,
            message: `Anomaly Detected: ${anomaly.description}`,
            severity: anomaly.severity,
        };

        try {
            const res = await fetchWithTimeout(
                this.fetchImpl,
                `${this.baseUrl}/notifications/send`,
                {
                    method: 'POST',
                    headers: { 'content-type': 'application/json' },
                    body: JSON.stringify(notification),
                },
                this.timeoutMs,
            );

            if (!res.ok) {
                logger.warn(
                    { anomaly_id: anomaly.id, patient_id: anomaly.patient_id, status: res.status },
                    'Alert service rejected notification',
                );
                return false;
            }

            logger.info(
                { anomaly_id: anomaly.id, patient_id: anomaly.patient_id, severity: anomaly.severity },
                'Alert dispatched',
            );
            return true;
        } catch (err) {
            logger.error(
                { anomaly_id: anomaly.id, patient_id: anomaly.patient_id, error: errorMessage(err) },
                'Failed to trigger alert service',
            );
            return false;
        }
    }
}
