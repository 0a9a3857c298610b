export interface Migration {
    id: string;
    statements: string[];
}

export const MIGRATIONS: Migration[] = [
    {
        id: '001_thresholds',
        statements: [
            `CREATE TABLE IF NOT EXISTS thresholds (
                id UUID PRIMARY KEY,
                patient_id TEXT NOT NULL,
                metric TEXT NOT NULL,
                min_value DOUBLE PRECISION,
                max_value DOUBLE PRECISION,
                created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
                updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
                CONSTRAINT unique_patient_metric_threshold UNIQUE (patient_id, metric)
            )`,
        ],
    },
    {
        // threshold_id is a soft reference: anomalies outlive the threshold that raised them
        id: '002_anomalies',
        statements: [
            `CREATE TABLE IF NOT EXISTS anomalies (
                id UUID PRIMARY KEY,
                patient_id TEXT NOT NULL,
                timestamp TIMESTAMPTZ NOT NULL,
                created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
                metric TEXT NOT NULL,
                observed_value DOUBLE PRECISION NOT NULL,
                severity TEXT NOT NULL,
                description TEXT NOT NULL,
                threshold_id UUID
            )`,
            'CREATE INDEX IF NOT EXISTS idx_anomalies_patient_timestamp ON anomalies (patient_id, timestamp)',
        ],
    },
];
