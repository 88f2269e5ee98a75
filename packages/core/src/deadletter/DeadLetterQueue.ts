import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";
import { Job, cloneJob } from "../types/Job";
import { JobErrorSnapshot } from "../errors/JobError";
import { RetryAttempt } from "../retry/RetryHistory";
import { Logger, consoleLogger } from "../logging/logger";

export interface DeadLetter {
    id: string;
    job: Job;
    finalError: JobErrorSnapshot;
    retryHistory: RetryAttempt[];
    createdAt: number;
}

export interface DeadLetterAlert {
    count: number;
    threshold: number;
    windowMs: number;
}

export interface DeadLetterQueueOptions {
    /** Oldest entries are evicted beyond this count. */
    maxCount?: number;
    maxAgeMs?: number;
    alertOnDeadLetters?: boolean;
    alertThreshold?: number;
    alertWindowMs?: number;
    logger?: Logger;
}

/**
 * Bounded, in-memory holding area for jobs that exhausted their retries.
 *
 * Alerting is threshold based: a single `alert` event fires when the number of
 * dead letters pushed within `alertWindowMs` reaches `alertThreshold`. It fires
 * again only after the window has drained below the threshold.
 */
export class DeadLetterQueue extends EventEmitter {
    private entries: DeadLetter[] = [];
    private recent: number[] = []; // push times inside the alert window
    private alerting: boolean = false;

    private readonly maxCount: number;
    private readonly maxAgeMs: number;
    private readonly alertOnDeadLetters: boolean;
    private readonly alertThreshold: number;
    private readonly alertWindowMs: number;
    private readonly logger: Logger;

    constructor(options: DeadLetterQueueOptions = {}) {
        super();
        this.maxCount = options.maxCount ?? 10_000;
        this.maxAgeMs = options.maxAgeMs ?? 86_400_000;
        this.alertOnDeadLetters = options.alertOnDeadLetters ?? true;
        this.alertThreshold = Math.max(1, options.alertThreshold ?? 10);
        this.alertWindowMs = options.alertWindowMs ?? 300_000;
        this.logger = options.logger ?? consoleLogger;
    }

    push(job: Job, finalError: JobErrorSnapshot, retryHistory: readonly RetryAttempt[] = [], now: number = Date.now()): DeadLetter {
        const entry: DeadLetter = {
            id: randomUUID(),
            job: cloneJob(job),
            finalError: { ...finalError },
            retryHistory: retryHistory.map(attempt => ({ ...attempt })),
            createdAt: now,
        };

        this.entries.push(entry);
        while (this.maxCount > 0 && this.entries.length > this.maxCount) {
            this.entries.shift();
        }

        this.trackForAlert(now);
        return entry;
    }

    /** Drops entries older than `maxAgeMs`. Returns how many were removed. */
    prune(now: number = Date.now()): number {
        const before = this.entries.length;
        this.entries = this.entries.filter(entry => now - entry.createdAt <= this.maxAgeMs);
        return before - this.entries.length;
    }

    list(): DeadLetter[] {
        return [...this.entries];
    }

    get(id: string): DeadLetter | null {
        return this.entries.find(entry => entry.id === id) ?? null;
    }

    findByJobId(jobId: string): DeadLetter | null {
        return this.entries.find(entry => entry.job.id === jobId) ?? null;
    }

    remove(id: string): boolean {
        const index = this.entries.findIndex(entry => entry.id === id);
        if (index === -1) return false;
        this.entries.splice(index, 1);
        return true;
    }

    get size(): number {
        return this.entries.length;
    }

    clear(): void {
        this.entries = [];
        this.recent = [];
        this.alerting = false;
    }

    private trackForAlert(now: number): void {
        if (!this.alertOnDeadLetters) return;

        this.recent.push(now);
        this.recent = this.recent.filter(at => now - at < this.alertWindowMs);

        if (this.recent.length < this.alertThreshold) {
            this.alerting = false;
            return;
        }

        if (this.alerting) return;
        this.alerting = true;

        const alert: DeadLetterAlert = {
            count: this.recent.length,
            threshold: this.alertThreshold,
            windowMs: this.alertWindowMs,
        };
        this.logger.error('Dead letter threshold reached', { ...alert });
        this.emit('alert', alert);
    }
}
