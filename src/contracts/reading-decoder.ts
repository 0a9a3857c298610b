import { DecodeError, errorMessage } from '../errors.js';
import { METRICS } from '../rules/types.js';
import type { MetricValues, Reading } from '../rules/types.js';
import type { SchemaValidator } from './schema-validator.js';
import { parseIsoTimestamp } from './timestamp.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turns a raw bus payload into a typed Reading. Every shape problem is a
 * DecodeError raised here, so downstream stages only see valid readings.
 */
export class ReadingDecoder {
    private textDecoder = new TextDecoder('utf-8', { fatal: true });

    constructor(private validator: SchemaValidator) { }

    /**
     * @param receivedAt used as the reading time when the payload carries none
     */
    decode(payload: Uint8Array, receivedAt: Date = new Date()): Reading {
        let data: unknown;
        try {
            data = JSON.parse(this.textDecoder.decode(payload));
        } catch (err) {
            throw new DecodeError('Payload is not valid UTF-8 JSON', { cause: errorMessage(err) });
        }

        return this.fromObject(data, receivedAt);
    }

    fromObject(data: unknown, receivedAt: Date = new Date()): Reading {
        if (!isRecord(data)) {
            throw new DecodeError('Payload is not a JSON object');
        }

        const validation = this.validator.validateVitalSignsRecorded(data);
        if (!validation.valid) {
            throw new DecodeError('Payload does not match the vital signs contract', {
                errors: validation.errors,
            });
        }

        const patientId = data.patient_id;
        if (typeof patientId !== 'string' || patientId.length === 0) {
            throw new DecodeError('Missing patient_id');
        }

        return {
            patient_id: patientId,
            timestamp: this.parseTimestamp(data.timestamp, receivedAt),
            values: this.extractValues(data),
        };
    }

    private parseTimestamp(raw: unknown, receivedAt: Date): Date {
        if (raw === undefined) {
            return receivedAt;
        }
        if (typeof raw !== 'string') {
            throw new DecodeError('timestamp must be a string');
        }
        const timestamp = parseIsoTimestamp(raw);
        if (!timestamp) {
            throw new DecodeError(`Invalid timestamp: ${raw}`);
        }
        return timestamp;
    }

    private extractValues(data: Record<string, unknown>): MetricValues {
        const values: MetricValues = {};

        for (const metric of METRICS) {
            const raw = data[metric];
            if (raw === undefined || raw === null) continue;
            if (typeof raw !== 'number' || !Number.isFinite(raw)) {
                throw new DecodeError(`${metric} must be a number`, { value: raw });
            }
            values[metric] = raw;
        }

        return values;
    }
}
