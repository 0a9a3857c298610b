import type { PatientDirectory } from '../clients/patient-directory.js';
import type { AnomalyEvaluator } from '../rules/evaluator.js';
import type { AnomalyEvent, TimeRange } from '../rules/types.js';
import type { AnomalyStore } from '../storage/types.js';

export interface AnalysisOptions {
    windowMs: number;
    now?: () => Date;
}

export class AnalysisService {
    private readonly windowMs: number;
    private readonly now: () => Date;

    constructor(
        private evaluator: AnomalyEvaluator,
        private anomalies: AnomalyStore,
        private patients: PatientDirectory,
        { windowMs, now = () => new Date() }: AnalysisOptions,
    ) {
        this.windowMs = windowMs;
        this.now = now;
    }

    /** Newest first, or oldest first when a range is given. */
    async listAnomalies(patientId: string, range?: TimeRange): Promise<AnomalyEvent[]> {
        await this.patients.ensureExists(patientId);
        if (range) {
            return this.anomalies.listForPatientInRange(patientId, range.start, range.end);
        }
        return this.anomalies.listForPatient(patientId);
    }

    /**
     * Manual trigger: backfill over the most recent window. Each call
     * records whatever it finds, including violations already recorded.
     */
    async analyzeRecent(patientId: string): Promise<AnomalyEvent[]> {
        await this.patients.ensureExists(patientId);

        const end = this.now();
        const start = new Date(end.getTime() - this.windowMs);
        return this.evaluator.backfill(patientId, { start, end });
    }
}
