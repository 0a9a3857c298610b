import { logger } from '../config/logger.js';
import type { PatientDirectory } from '../clients/patient-directory.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { isMetric } from '../rules/types.js';
import type { Metric, Threshold, ThresholdInput } from '../rules/types.js';
import type { ThresholdRegistry } from '../storage/types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalBound(value: unknown, field: string): number | null {
    if (value === undefined || value === null) return null;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ValidationError(`${field} must be a number`, { field, value });
    }
    return value;
}

export function parseMetric(raw: string): Metric {
    if (!isMetric(raw)) {
        throw new ValidationError(`Unsupported metric: ${raw}`, { metric: raw });
    }
    return raw;
}

/**
 * Administrative access to thresholds. Every operation checks the patient
 * against the identity service first.
 */
export class ThresholdService {
    constructor(
        private registry: ThresholdRegistry,
        private patients: PatientDirectory,
        private validator: SchemaValidator,
    ) { }

    async list(patientId: string): Promise<Threshold[]> {
        await this.patients.ensureExists(patientId);
        return this.registry.listForPatient(patientId);
    }

    async get(patientId: string, rawMetric: string): Promise<Threshold> {
        const metric = parseMetric(rawMetric);
        await this.patients.ensureExists(patientId);

        const threshold = await this.registry.get(patientId, metric);
        if (!threshold) {
            throw new NotFoundError('Threshold', `${patientId}/${metric}`);
        }
        return threshold;
    }

    async upsert(body: unknown): Promise<Threshold> {
        const input = this.parseUpsert(body);
        await this.patients.ensureExists(input.patient_id);

        const threshold = await this.registry.upsert(input);
        logger.info(
            {
                threshold_id: threshold.id,
                patient_id: threshold.patient_id,
                metric: threshold.metric,
                min_value: threshold.min_value,
                max_value: threshold.max_value,
            },
            'Threshold stored',
        );
        return threshold;
    }

    private parseUpsert(body: unknown): ThresholdInput {
        const validation = this.validator.validateThresholdUpsert(body);
        if (!validation.valid || !isRecord(body)) {
            throw new ValidationError('Invalid threshold payload', { errors: validation.errors });
        }

        const patientId = body.patient_id;
        const metric = body.metric;
        if (typeof patientId !== 'string' || typeof metric !== 'string') {
            throw new ValidationError('patient_id and metric are required');
        }

        const min = optionalBound(body.min_value, 'min_value');
        const max = optionalBound(body.max_value, 'max_value');
        if (min !== null && max !== null && min > max) {
            throw new ValidationError('min_value must not exceed max_value', { min_value: min, max_value: max });
        }

        return {
            patient_id: patientId,
            metric: parseMetric(metric),
            min_value: min,
            max_value: max,
        };
    }
}
