import { config } from 'dotenv';

// Load .env file if present
config();

export type StorageDriver = 'postgres' | 'memory';

export interface AppConfig {
    nats: {
        url: string;
        subject: string;
    };
    consumer: {
        pollIntervalMs: number;
    };
    storage: {
        driver: StorageDriver;
        databaseUrl: string;
    };
    services: {
        alertsUrl: string;
        userServiceUrl: string;
        patientDataUrl: string;
    };
    timeouts: {
        alertMs: number;
        userServiceMs: number;
        historyMs: number;
    };
    analysis: {
        windowMs: number;
    };
    contracts: {
        path: string;
    };
    http: {
        port: number;
    };
    log: {
        level: string;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

function getStorageDriver(): StorageDriver {
    const value = getEnv('STORAGE_DRIVER', 'postgres');
    if (value !== 'postgres' && value !== 'memory') {
        throw new Error(`Invalid value for environment variable STORAGE_DRIVER: ${value}`);
    }
    return value;
}

export function loadConfig(): AppConfig {
    return {
        nats: {
            url: getEnv('NATS_URL', 'nats://localhost:4222'),
            subject: getEnv('NATS_SUBJECT', 'vital_signs_channel'),
        },
        consumer: {
            pollIntervalMs: getEnvNumber('CONSUMER_POLL_INTERVAL_MS', 1000),
        },
        storage: {
            driver: getStorageDriver(),
            databaseUrl: getEnv('DATABASE_URL', 'postgres://localhost:5432/analytics'),
        },
        services: {
            alertsUrl: getEnv('ALERTS_SERVICE_URL', 'http://alerts-service:8000'),
            userServiceUrl: getEnv('USER_SERVICE_URL', 'http://user-service:8000'),
            patientDataUrl: getEnv('PATIENT_DATA_SERVICE_URL', 'http://patient-data-service:8000'),
        },
        timeouts: {
            alertMs: getEnvNumber('ALERT_TIMEOUT_MS', 2000),
            userServiceMs: getEnvNumber('USER_SERVICE_TIMEOUT_MS', 2000),
            historyMs: getEnvNumber('HISTORY_TIMEOUT_MS', 3000),
        },
        analysis: {
            windowMs: getEnvNumber('ANALYSIS_WINDOW_MS', 3_600_000), // 1 hour default
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        http: {
            port: getEnvNumber('HTTP_PORT', 8093),
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}
