import { loadConfig } from './config/env.js';
import type { AppConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { ReadingDecoder } from './contracts/reading-decoder.js';
import { HttpAlertDispatcher } from './clients/alert-dispatcher.js';
import { HttpHistoryClient } from './clients/history-client.js';
import { HttpPatientDirectory } from './clients/patient-directory.js';
import { AnomalyEvaluator } from './rules/evaluator.js';
import { createMemoryStorage } from './storage/memory.js';
import { createPostgresStorage } from './storage/postgres.js';
import type { Storage } from './storage/types.js';
import { NatsClient } from './nats/connection.js';
import { ReadingsConsumer } from './nats/consumer.js';
import { NatsMessageSource } from './nats/subscriber.js';
import { Metrics } from './metrics/counter.js';
import { ThresholdService } from './services/threshold-service.js';
import { AnalysisService } from './services/analysis-service.js';
import { ApiServer } from './api/server.js';

async function openStorage(config: AppConfig): Promise<Storage> {
    if (config.storage.driver === 'memory') {
        logger.warn('Using in-memory storage, data is lost on restart');
        return createMemoryStorage();
    }
    return createPostgresStorage(config.storage.databaseUrl);
}

async function main() {
    logger.info('Starting vitals anomaly monitor');

    // Load configuration
    const config = loadConfig();
    logger.info({ config: { ...config, storage: { driver: config.storage.driver } } }, 'Configuration loaded');

    // Initialize schema validator
    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();

    const storage = await openStorage(config);

    // External collaborators
    const alerts = new HttpAlertDispatcher({
        baseUrl: config.services.alertsUrl,
        timeoutMs: config.timeouts.alertMs,
    });
    const patients = new HttpPatientDirectory({
        baseUrl: config.services.userServiceUrl,
        timeoutMs: config.timeouts.userServiceMs,
    });
    const history = new HttpHistoryClient({
        baseUrl: config.services.patientDataUrl,
        timeoutMs: config.timeouts.historyMs,
    });

    const evaluator = new AnomalyEvaluator(storage.thresholds, storage.anomalies, history);
    const metrics = new Metrics();

    // Initialize NATS client
    const natsClient = new NatsClient({
        servers: config.nats.url,
        name: 'vitals-anomaly-monitor',
    });

    await natsClient.connect();

    const consumer = new ReadingsConsumer(
        (subject) => new NatsMessageSource(natsClient.subscribe(subject)),
        new ReadingDecoder(validator),
        evaluator,
        alerts,
        metrics,
        {
            subject: config.nats.subject,
            pollIntervalMs: config.consumer.pollIntervalMs,
        },
    );

    const apiServer = new ApiServer(config.http.port, {
        bus: natsClient,
        consumer,
        metrics,
        thresholds: new ThresholdService(storage.thresholds, patients, validator),
        analysis: new AnalysisService(evaluator, storage.anomalies, patients, {
            windowMs: config.analysis.windowMs,
        }),
    });

    await apiServer.start();
    consumer.start();

    logger.info('Vitals anomaly monitor running');

    // Graceful shutdown
    let shuttingDown = false;
    const shutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info('Shutting down gracefully');

        await consumer.stop();
        await apiServer.stop();
        await natsClient.close();
        await storage.close();

        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ error: err }, 'Shutdown failed');
            process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error during startup');
    process.exit(1);
});
