import { Job } from "../types/Job";
import { JobQuery } from "../types/JobQuery";
import { JobStatus } from "../types/JobStatus";
import { PriorityName } from "../types/JobPriority";

export interface QueueStats {
    /** Due jobs waiting for a worker. */
    pending: number;
    /** Jobs waiting for their scheduled time, retries included. */
    delayed: number;
    processing: number;
    /** Every job the store still knows about, finished ones included. */
    total: number;
    byPriority: Record<PriorityName, number>;
}

/**
 * Durable queue contract. Implementations must make `dequeue` an exclusive
 * claim: a pending job is handed to exactly one caller, and never before its
 * `scheduledFor` time.
 */
export interface StorageAdapter {
    // Connection lifecycle
    connect(): Promise<void>;
    disconnect(): Promise<void>;

    // Admission. Returns false when the store is at capacity.
    enqueue(job: Job): Promise<boolean>;
    dequeue(workerId: string, timeoutMs?: number): Promise<Job | null>;
    /** Jobs waiting in the store, due or delayed. */
    size(): Promise<number>;
    isFull(): Promise<boolean>;
    /** Removes and cancels the oldest waiting job. */
    evictOldest(): Promise<Job | null>;
    /** Cancels a job that no worker has claimed yet. */
    cancel(jobId: string): Promise<boolean>;

    // Delayed jobs. Retries bypass the capacity check: they were admitted once already.
    scheduleRetry(job: Job, executeAt: number): Promise<void>;
    promoteDueJobs(now?: number): Promise<number>;

    // Job data access
    saveJob(job: Job): Promise<void>;
    updateJobStatus(jobId: string, status: JobStatus): Promise<void>;
    getJob(jobId: string): Promise<Job | null>;
    listJobs(query?: JobQuery): Promise<Job[]>;

    // Recovery
    recoverStuckJobs(timeoutMs: number): Promise<number>;
    getProcessingJobs(): Promise<string[]>;

    stats(): Promise<QueueStats>;
}
