import Ajv2020Lib from 'ajv/dist/2020.js';
import type { AnySchemaObject, ValidateFunction } from 'ajv';

const Ajv2020 = Ajv2020Lib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';

export const VITAL_SIGNS_RECORDED_SCHEMA =
    'https://vitals-anomaly-monitor.local/schemas/events/vital-signs-recorded.json';
export const THRESHOLD_UPSERT_SCHEMA =
    'https://vitals-anomaly-monitor.local/schemas/api/threshold-upsert.json';

export interface ValidationResult {
    valid: boolean;
    errors?: string;
}

function findJsonFiles(dir: string): string[] {
    return readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
        const fullPath = join(dir, entry.name);
        if (entry.isDirectory()) return findJsonFiles(fullPath);
        return entry.isFile() && entry.name.endsWith('.json') ? [fullPath] : [];
    });
}

function isSchemaObject(value: unknown): value is AnySchemaObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON Schema contracts keyed by `$id`. Every schema is compiled while
 * loading, so a broken contract stops startup instead of the first request.
 */
export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private validators = new Map<string, ValidateFunction>();
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            validateSchema: false,
            strict: false,
            allErrors: true,
        });
    }

    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            throw new Error(`Contracts directory not found: ${this.contractsPath}`);
        }

        const files = findJsonFiles(this.contractsPath);
        logger.info({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        const ids: string[] = [];
        for (const file of files) {
            let schema: unknown;
            try {
                schema = JSON.parse(readFileSync(file, 'utf-8'));
            } catch (err) {
                throw new Error(`Unreadable schema file ${file}: ${errorMessage(err)}`);
            }

            if (!isSchemaObject(schema) || typeof schema.$id !== 'string') {
                logger.warn({ file }, 'Schema missing $id, skipped');
                continue;
            }
            this.ajv.addSchema(schema);
            ids.push(schema.$id);
        }

        // compiled once every schema is registered, so cross-file $refs resolve
        for (const id of ids) {
            const validateFn = this.ajv.getSchema(id);
            if (!validateFn) {
                throw new Error(`Schema failed to compile: ${id}`);
            }
            this.validators.set(id, validateFn);
            logger.debug({ $id: id }, 'Schema loaded');
        }

        this.schemasLoaded = true;
        logger.info({ schemas: [...this.validators.keys()] }, 'All schemas loaded successfully');
    }

    validate(id: string, data: unknown): ValidationResult {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return { valid: false, errors: 'Schemas not loaded' };
        }

        const validateFn = this.validators.get(id);
        if (!validateFn) {
            logger.error({ schemaId: id }, 'Schema not found');
            return { valid: false, errors: `Schema not found: ${id}` };
        }

        if (!validateFn(data)) {
            return { valid: false, errors: this.ajv.errorsText(validateFn.errors) };
        }
        return { valid: true };
    }

    validateVitalSignsRecorded(data: unknown): ValidationResult {
        return this.validate(VITAL_SIGNS_RECORDED_SCHEMA, data);
    }

    validateThresholdUpsert(data: unknown): ValidationResult {
        return this.validate(THRESHOLD_UPSERT_SCHEMA, data);
    }
}
