export interface PipelineCounters {
    received: number;
    decoded: number;
    dropped_invalid: number;
    anomalies_recorded: number;
    evaluation_failures: number;
    alerts_dispatched: number;
    alerts_failed: number;
}

function emptyCounters(): PipelineCounters {
    return {
        received: 0,
        decoded: 0,
        dropped_invalid: 0,
        anomalies_recorded: 0,
        evaluation_failures: 0,
        alerts_dispatched: 0,
        alerts_failed: 0,
    };
}

export class Metrics {
    private counters = emptyCounters();

    incrementReceived(): void {
        this.counters.received++;
    }

    incrementDecoded(): void {
        this.counters.decoded++;
    }

    incrementDroppedInvalid(): void {
        this.counters.dropped_invalid++;
    }

    addAnomaliesRecorded(count: number): void {
        this.counters.anomalies_recorded += count;
    }

    incrementEvaluationFailures(): void {
        this.counters.evaluation_failures++;
    }

    incrementAlertsDispatched(): void {
        this.counters.alerts_dispatched++;
    }

    incrementAlertsFailed(): void {
        this.counters.alerts_failed++;
    }

    getCounters(): PipelineCounters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = emptyCounters();
    }
}
