import { logger } from '../config/logger.js';
import type { ReadingDecoder } from '../contracts/reading-decoder.js';
import type { AlertSink } from '../clients/alert-dispatcher.js';
import { AppError, errorMessage } from '../errors.js';
import type { Metrics } from '../metrics/counter.js';
import type { AnomalyEvaluator } from '../rules/evaluator.js';
import type { AnomalyEvent, Reading } from '../rules/types.js';
import type { MessageSource } from './subscriber.js';

export type ConsumerState = 'stopped' | 'running' | 'stopping';

export interface ConsumerConfig {
    subject: string;
    pollIntervalMs: number;
}

export type SourceFactory = (subject: string) => MessageSource;

/**
 * Owns the subscribe loop: decode -> evaluate -> persist -> dispatch, one
 * message at a time. Every failure stays with the message that caused it.
 *
 * stopped -> running -> stopping -> stopped. A stop request is observed at
 * the next poll boundary, after the message in flight (if any) completes.
 */
export class ReadingsConsumer {
    private state: ConsumerState = 'stopped';
    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;

    constructor(
        private openSource: SourceFactory,
        private decoder: ReadingDecoder,
        private evaluator: AnomalyEvaluator,
        private alerts: AlertSink,
        private metrics: Metrics,
        private config: ConsumerConfig,
    ) { }

    getState(): ConsumerState {
        return this.state;
    }

    start(): void {
        if (this.state !== 'stopped') {
            throw new Error(`Consumer cannot start while ${this.state}`);
        }

        const source = this.openSource(this.config.subject);
        const controller = new AbortController();
        this.controller = controller;
        this.state = 'running';

        logger.info(
            { subject: this.config.subject, pollIntervalMs: this.config.pollIntervalMs },
            'Starting readings consumer',
        );

        this.loop = this.run(source, controller.signal)
            .catch((err) => {
                logger.error({ error: err }, 'Consumer loop failed');
            })
            .finally(() => {
                source.close();
                this.controller = null;
                this.loop = null;
                this.state = 'stopped';
                logger.info('Readings consumer stopped');
            });
    }

    /**
     * Resolves once the loop has exited. Messages published from here on
     * are not delivered to this consumer.
     */
    async stop(): Promise<void> {
        if (this.state === 'stopped' || !this.loop) {
            return;
        }

        const loop = this.loop;
        this.state = 'stopping';
        this.controller?.abort();
        await loop;
    }

    private async run(source: MessageSource, signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            let payload: Uint8Array | null;
            try {
                payload = await source.poll(this.config.pollIntervalMs);
            } catch (err) {
                logger.error({ error: errorMessage(err) }, 'Subscription failed, consumer exiting');
                return;
            }

            if (payload) {
                await this.handleMessage(payload);
            } else if (source.isClosed()) {
                logger.warn({ subject: this.config.subject }, 'Subscription closed, consumer exiting');
                return;
            }
        }
    }

    async handleMessage(payload: Uint8Array, receivedAt: Date = new Date()): Promise<void> {
        this.metrics.incrementReceived();

        // Step 1: Decode
        let reading: Reading;
        try {
            reading = this.decoder.decode(payload, receivedAt);
        } catch (err) {
            logger.warn(
                { error: errorMessage(err), context: err instanceof AppError ? err.context : undefined },
                'Discarding undecodable message',
            );
            this.metrics.incrementDroppedInvalid();
            return;
        }

        this.metrics.incrementDecoded();

        // Step 2: Evaluate and persist as one batch
        let anomalies: AnomalyEvent[];
        try {
            anomalies = await this.evaluator.evaluate(reading);
        } catch (err) {
            logger.error(
                { patient_id: reading.patient_id, timestamp: reading.timestamp, error: errorMessage(err) },
                'Failed to evaluate reading, no anomalies recorded',
            );
            this.metrics.incrementEvaluationFailures();
            return;
        }

        if (anomalies.length === 0) {
            return;
        }

        this.metrics.addAnomaliesRecorded(anomalies.length);
        logger.info(
            {
                patient_id: reading.patient_id,
                count: anomalies.length,
                descriptions: anomalies.map((a) => a.description),
            },
            'Anomalies recorded',
        );

        // Step 3: Notify, best effort
        const results = await Promise.all(anomalies.map((anomaly) => this.alerts.dispatch(anomaly)));
        for (const delivered of results) {
            if (delivered) {
                this.metrics.incrementAlertsDispatched();
            } else {
                this.metrics.incrementAlertsFailed();
            }
        }
    }
}
