import { JobErrorSnapshot } from "../errors/JobError";

export interface RetryAttempt {
    attempt: number;
    error: JobErrorSnapshot;
    /** Null when the policy gave up after this attempt. */
    delayMs: number | null;
    attemptedAt: number;
}

/** Append-only record of every failed execution of one job. */
export class RetryHistory {
    private readonly entries: RetryAttempt[] = [];

    constructor(attempts: RetryAttempt[] = []) {
        for (const attempt of attempts) {
            this.entries.push({ ...attempt });
        }
    }

    add(attempt: RetryAttempt): void {
        this.entries.push({ ...attempt });
    }

    get attempts(): readonly RetryAttempt[] {
        return this.entries;
    }

    get attemptCount(): number {
        return this.entries.length;
    }

    get totalDelayMs(): number {
        return this.entries.reduce((sum, entry) => sum + (entry.delayMs ?? 0), 0);
    }

    get lastError(): JobErrorSnapshot | null {
        const last = this.entries[this.entries.length - 1];
        return last ? last.error : null;
    }

    toJSON(): RetryAttempt[] {
        return this.entries.map(entry => ({ ...entry }));
    }
}

/**
 * Histories keyed by job id. A retried job may be picked up by any worker, so
 * workers of one pool share a single store.
 */
export class RetryHistoryStore {
    private histories = new Map<string, RetryHistory>();

    for(jobId: string): RetryHistory {
        let history = this.histories.get(jobId);
        if (!history) {
            history = new RetryHistory();
            this.histories.set(jobId, history);
        }
        return history;
    }

    get(jobId: string): RetryHistory | null {
        return this.histories.get(jobId) ?? null;
    }

    delete(jobId: string): void {
        this.histories.delete(jobId);
    }

    get size(): number {
        return this.histories.size;
    }
}
