export type WorkerState = 'starting' | 'running' | 'paused' | 'stopping' | 'stopped' | 'failed';

export interface WorkerStatsSnapshot {
    workerId: string;
    state: WorkerState;
    jobsProcessed: number;
    jobsSucceeded: number;
    jobsFailed: number;
    /** Percentage of processed jobs that succeeded, 0 when nothing ran yet. */
    successRate: number;
    failureRate: number;
}

/** Per-worker counters. Never shared between workers. */
export class WorkerStats {
    private processed: number = 0;
    private succeeded: number = 0;
    private failed: number = 0;

    recordSuccess(): void {
        this.processed++;
        this.succeeded++;
    }

    recordFailure(): void {
        this.processed++;
        this.failed++;
    }

    snapshot(workerId: string, state: WorkerState): WorkerStatsSnapshot {
        return {
            workerId,
            state,
            jobsProcessed: this.processed,
            jobsSucceeded: this.succeeded,
            jobsFailed: this.failed,
            successRate: this.processed > 0 ? (this.succeeded / this.processed) * 100 : 0,
            failureRate: this.processed > 0 ? (this.failed / this.processed) * 100 : 0,
        };
    }
}

export function formatWorkerStats(stats: WorkerStatsSnapshot): string {
    return `Worker ${stats.workerId} (${stats.state}): ` +
        `${stats.jobsProcessed} processed, ` +
        `${stats.jobsSucceeded} succeeded (${stats.successRate.toFixed(1)}%), ` +
        `${stats.jobsFailed} failed (${stats.failureRate.toFixed(1)}%)`;
}
