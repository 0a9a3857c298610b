import pg from 'pg';
import type { Pool, PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import { isMetric } from '../rules/types.js';
import type { AnomalyEvent, Metric, NewAnomaly, Severity, Threshold, ThresholdInput } from '../rules/types.js';
import { MIGRATIONS } from './migrations.js';
import type { AnomalyStore, Storage, ThresholdRegistry } from './types.js';

interface ThresholdRow {
    id: string;
    patient_id: string;
    metric: string;
    min_value: number | null;
    max_value: number | null;
    created_at: Date;
    updated_at: Date;
}

interface AnomalyRow {
    id: string;
    patient_id: string;
    timestamp: Date;
    created_at: Date;
    metric: string;
    observed_value: number;
    severity: string;
    description: string;
    threshold_id: string | null;
}

const SEVERITIES: readonly string[] = ['info', 'warning', 'critical'];

function isSeverity(value: string): value is Severity {
    return SEVERITIES.includes(value);
}

function toMetric(value: string): Metric {
    if (!isMetric(value)) {
        throw new Error(`Unknown metric stored in database: ${value}`);
    }
    return value;
}

function toThreshold(row: ThresholdRow): Threshold {
    return {
        id: row.id,
        patient_id: row.patient_id,
        metric: toMetric(row.metric),
        min_value: row.min_value,
        max_value: row.max_value,
        created_at: row.created_at,
        updated_at: row.updated_at,
    };
}

function toAnomaly(row: AnomalyRow): AnomalyEvent {
    if (!isSeverity(row.severity)) {
        throw new Error(`Unknown severity stored in database: ${row.severity}`);
    }
    return {
        id: row.id,
        patient_id: row.patient_id,
        metric: toMetric(row.metric),
        observed_value: row.observed_value,
        severity: row.severity,
        description: row.description,
        timestamp: row.timestamp,
        threshold_id: row.threshold_id,
        created_at: row.created_at,
    };
}

/**
 * Pool wrapper. Every unit of work checks out its own client and returns it
 * on every exit path; clients are never shared between units of work.
 */
export class PgDatabase {
    constructor(private readonly pool: Pool) { }

    static fromUrl(connectionString: string): PgDatabase {
        return new PgDatabase(new pg.Pool({ connectionString }));
    }

    async withClient<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        try {
            return await fn(client);
        } finally {
            client.release();
        }
    }

    async withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        // a client whose ROLLBACK failed is in an unknown state and must not return to the pool
        let discard = false;
        try {
            await client.query('BEGIN');
            const result = await fn(client);
            await client.query('COMMIT');
            return result;
        } catch (err) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackErr) {
                discard = true;
                logger.error(
                    { error: errorMessage(rollbackErr), cause: errorMessage(err) },
                    'Rollback failed, discarding client',
                );
            }
            throw err;
        } finally {
            client.release(discard);
        }
    }

    async migrate(): Promise<void> {
        await this.withTransaction(async (client) => {
            await client.query(
                'CREATE TABLE IF NOT EXISTS schema_migrations (id TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW())',
            );
            const applied = await client.query<{ id: string }>('SELECT id FROM schema_migrations');
            const appliedIds = new Set(applied.rows.map((row) => row.id));

            for (const migration of MIGRATIONS) {
                if (appliedIds.has(migration.id)) continue;
                for (const statement of migration.statements) {
                    await client.query(statement);
                }
                await client.query('INSERT INTO schema_migrations (id) VALUES ($1) ON CONFLICT (id) DO NOTHING', [
                    migration.id,
                ]);
                logger.info({ migration: migration.id }, 'Migration applied');
            }
        });
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}

export class PostgresThresholdRegistry implements ThresholdRegistry {
    constructor(private readonly db: PgDatabase) { }

    async listForPatient(patientId: string): Promise<Threshold[]> {
        return this.db.withClient(async (client) => {
            const result = await client.query<ThresholdRow>(
                'SELECT * FROM thresholds WHERE patient_id = $1 ORDER BY metric',
                [patientId],
            );
            return result.rows.map(toThreshold);
        });
    }

    async get(patientId: string, metric: Metric): Promise<Threshold | undefined> {
        return this.db.withClient(async (client) => {
            const result = await client.query<ThresholdRow>(
                'SELECT * FROM thresholds WHERE patient_id = $1 AND metric = $2',
                [patientId, metric],
            );
            const row = result.rows[0];
            return row ? toThreshold(row) : undefined;
        });
    }

    /**
     * The unique (patient_id, metric) constraint serializes concurrent
     * upserts of one key; the loser of the race updates the winner's row.
     */
    async upsert(input: ThresholdInput): Promise<Threshold> {
        return this.db.withClient(async (client) => {
            const result = await client.query<ThresholdRow>(
                `INSERT INTO thresholds (id, patient_id, metric, min_value, max_value)
                 VALUES ($1, $2, $3, $4, $5)
                 ON CONFLICT (patient_id, metric)
                 DO UPDATE SET min_value = EXCLUDED.min_value, max_value = EXCLUDED.max_value, updated_at = NOW()
                 RETURNING *`,
                [uuidv4(), input.patient_id, input.metric, input.min_value ?? null, input.max_value ?? null],
            );
            const row = result.rows[0];
            if (!row) {
                throw new Error(`Threshold upsert returned no row for ${input.patient_id}/${input.metric}`);
            }
            return toThreshold(row);
        });
    }
}

export class PostgresAnomalyStore implements AnomalyStore {
    constructor(private readonly db: PgDatabase) { }

    async append(batch: NewAnomaly[]): Promise<AnomalyEvent[]> {
        if (batch.length === 0) {
            return [];
        }

        return this.db.withTransaction(async (client) => {
            const persisted: AnomalyEvent[] = [];
            for (const anomaly of batch) {
                const result = await client.query<AnomalyRow>(
                    `INSERT INTO anomalies (id, patient_id, timestamp, metric, observed_value, severity, description, threshold_id)
                     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
                     RETURNING *`,
                    [
                        uuidv4(),
                        anomaly.patient_id,
                        anomaly.timestamp,
                        anomaly.metric,
                        anomaly.observed_value,
                        anomaly.severity,
                        anomaly.description,
                        anomaly.threshold_id,
                    ],
                );
                const row = result.rows[0];
                if (!row) {
                    throw new Error('Anomaly insert returned no row');
                }
                persisted.push(toAnomaly(row));
            }
            return persisted;
        });
    }

    async listForPatient(patientId: string): Promise<AnomalyEvent[]> {
        return this.db.withClient(async (client) => {
            const result = await client.query<AnomalyRow>(
                'SELECT * FROM anomalies WHERE patient_id = $1 ORDER BY timestamp DESC',
                [patientId],
            );
            return result.rows.map(toAnomaly);
        });
    }

    async listForPatientInRange(patientId: string, start: Date, end: Date): Promise<AnomalyEvent[]> {
        return this.db.withClient(async (client) => {
            const result = await client.query<AnomalyRow>(
                `SELECT * FROM anomalies
                 WHERE patient_id = $1 AND timestamp >= $2 AND timestamp <= $3
                 ORDER BY timestamp ASC`,
                [patientId, start, end],
            );
            return result.rows.map(toAnomaly);
        });
    }
}

export async function createPostgresStorage(databaseUrl: string): Promise<Storage> {
    const db = PgDatabase.fromUrl(databaseUrl);
    await db.migrate();
    logger.info('Database migrations complete');

    return {
        thresholds: new PostgresThresholdRegistry(db),
        anomalies: new PostgresAnomalyStore(db),
        close: () => db.close(),
    };
}
