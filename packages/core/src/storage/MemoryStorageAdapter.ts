import { Job, cloneJob, markCancelled, markPending, shouldExecuteNow } from "../types/Job";
import { JobPriority, PRIORITIES } from "../types/JobPriority";
import { JobQuery, filterJobs } from "../types/JobQuery";
import { JobStatus, isRetryable, isTerminal } from "../types/JobStatus";
import { InvalidTransitionError } from "../errors/QueueErrors";
import { WeightedRoundRobin } from "../queue/WeightedRoundRobin";
import { QueueStats, StorageAdapter } from "./StorageAdapter";

interface WaitingConsumer {
    workerId: string;
    resolve: (job: Job | null) => void;
}

/**
 * In-process store. Jobs are copied on the way in and out so callers never
 * share a record with the store, the same as with a remote backend.
 */
export class MemoryStorageAdapter implements StorageAdapter {
    private ready: Map<JobPriority, string[]> = new Map(); // per tier, FIFO
    private jobs: Map<string, Job> = new Map(); // all job data
    private processingJobs: Map<string, number> = new Map(); // jobId -> claimedAt
    private delayedJobs: Map<string, number> = new Map(); // jobId -> runAt
    private finishedJobs: Map<string, number> = new Map(); // jobId -> finishedAt, oldest first
    private capacity: number;
    private finishedJobTtlMs: number;
    private selector = new WeightedRoundRobin<JobPriority>(PRIORITIES.map(p => [p, p] as const));

    private waitingConsumers: WaitingConsumer[] = [];

    /**
     * @param capacity max waiting jobs, 0 for unbounded
     * @param finishedJobTtlMs how long completed, dead and cancelled records are kept, 0 to keep them forever
     */
    constructor(capacity: number = 1000, finishedJobTtlMs: number = 86_400_000) {
        this.capacity = capacity;
        this.finishedJobTtlMs = finishedJobTtlMs;
        for (const priority of PRIORITIES) {
            this.ready.set(priority, []);
        }
    }

    async connect(): Promise<void> {

    }

    async disconnect(): Promise<void> {
        for (const consumer of this.waitingConsumers) {
            consumer.resolve(null);
        }
        this.waitingConsumers = [];
        for (const priority of PRIORITIES) {
            this.ready.set(priority, []);
        }
        this.jobs.clear();
        this.processingJobs.clear();
        this.delayedJobs.clear();
        this.finishedJobs.clear();
        this.selector.reset();
    }

    async enqueue(job: Job): Promise<boolean> {
        if (isTerminal(job.status)) {
            throw new InvalidTransitionError(job.id, job.status, 'pending');
        }

        if (this.isAtCapacity()) {
            return false;
        }

        const stored = cloneJob(job);
        const now = Date.now();
        this.jobs.set(stored.id, stored);

        if (!shouldExecuteNow(stored, now) && stored.scheduledFor !== null) {
            this.delayedJobs.set(stored.id, stored.scheduledFor);
            return true;
        }

        markPending(stored);
        this.makeReady(stored, now);
        return true;
    }

    async dequeue(workerId: string, timeoutMs: number = 0): Promise<Job | null> {
        const job = this.claimNext(workerId);
        if (job) {
            return job;
        }

        if (timeoutMs <= 0) {
            return null;
        }

        return new Promise<Job | null>((resolve) => {
            const consumer: WaitingConsumer = {
                workerId,
                resolve: (claimed) => {
                    clearTimeout(timeoutId);
                    resolve(claimed);
                },
            };

            const timeoutId = setTimeout(() => {
                const index = this.waitingConsumers.indexOf(consumer);
                if (index !== -1) {
                    this.waitingConsumers.splice(index, 1);
                }
                resolve(null);
            }, timeoutMs);

            this.waitingConsumers.push(consumer);
        });
    }

    async size(): Promise<number> {
        return this.depth();
    }

    async isFull(): Promise<boolean> {
        return this.isAtCapacity();
    }

    async evictOldest(): Promise<Job | null> {
        let oldest: Job | null = null;

        for (const id of this.waitingIds()) {
            const job = this.jobs.get(id);
            if (job && (oldest === null || job.createdAt < oldest.createdAt)) {
                oldest = job;
            }
        }

        if (!oldest) return null;

        this.removeWaiting(oldest.id);
        markCancelled(oldest);
        this.retire(oldest.id);
        return cloneJob(oldest);
    }

    async cancel(jobId: string): Promise<boolean> {
        const job = this.jobs.get(jobId);
        if (!job || !this.removeWaiting(jobId)) {
            return false;
        }
        markCancelled(job);
        this.retire(jobId);
        return true;
    }

    async scheduleRetry(job: Job, executeAt: number): Promise<void> {
        if (!isRetryable(job.status)) {
            throw new InvalidTransitionError(job.id, job.status, 'pending');
        }

        const stored = cloneJob(job);
        stored.scheduledFor = executeAt;
        stored.workerId = null;

        this.processingJobs.delete(stored.id);
        this.delayedJobs.set(stored.id, executeAt);
        this.jobs.set(stored.id, stored);
    }

    async promoteDueJobs(now: number = Date.now()): Promise<number> {
        let promoted = 0;

        for (const [jobId, executeAt] of this.delayedJobs) {
            if (executeAt > now) continue;

            this.delayedJobs.delete(jobId);
            const job = this.jobs.get(jobId);
            if (!job || isTerminal(job.status)) continue;

            markPending(job);
            this.makeReady(job, now);
            promoted++;
        }
        return promoted;
    }

    async saveJob(job: Job): Promise<void> {
        this.jobs.set(job.id, cloneJob(job));
        if (job.status !== 'running') {
            this.processingJobs.delete(job.id);
        }
        if (isTerminal(job.status)) {
            this.retire(job.id);
        }
    }

    async updateJobStatus(jobId: string, status: JobStatus): Promise<void> {
        const job = this.jobs.get(jobId);
        if (!job) return;

        const now = Date.now();
        job.status = status;

        if (status === 'running') {
            job.startedAt = now;
            this.processingJobs.set(jobId, now);
            return;
        }

        this.processingJobs.delete(jobId);
        if (status !== 'pending') {
            job.completedAt = now;
        }
        if (isTerminal(status)) {
            this.retire(jobId, now);
        }
    }

    async getJob(jobId: string): Promise<Job | null> {
        const job = this.jobs.get(jobId);
        return job ? cloneJob(job) : null;
    }

    async listJobs(query: JobQuery = {}): Promise<Job[]> {
        return filterJobs(this.jobs.values(), query).map(job => cloneJob(job));
    }

    /** A job counts as stuck only once it has outlived both the given timeout and its own. */
    async recoverStuckJobs(timeoutMs: number): Promise<number> {
        const now = Date.now();
        let recovered = 0;

        for (const [jobId, claimedAt] of this.processingJobs) {
            const job = this.jobs.get(jobId);
            if (!job || job.status !== 'running') {
                this.processingJobs.delete(jobId);
                continue;
            }
            if (now - claimedAt < Math.max(timeoutMs, job.timeoutMs)) continue;

            this.processingJobs.delete(jobId);
            markPending(job);
            job.startedAt = null;
            this.tier(job.priority).unshift(jobId); // back to the front of its tier
            recovered++;
        }
        return recovered;
    }

    /** Forgets finished jobs older than the retention window. Returns how many were dropped. */
    pruneFinishedJobs(now: number = Date.now()): number {
        if (this.finishedJobTtlMs <= 0) return 0;

        let pruned = 0;
        for (const [jobId, finishedAt] of this.finishedJobs) {
            if (now - finishedAt < this.finishedJobTtlMs) break;
            this.finishedJobs.delete(jobId);
            this.jobs.delete(jobId);
            pruned++;
        }
        return pruned;
    }

    async getProcessingJobs(): Promise<string[]> {
        return Array.from(this.processingJobs.keys());
    }

    async stats(): Promise<QueueStats> {
        let pending = 0;
        for (const ids of this.ready.values()) {
            pending += ids.length;
        }
        return {
            pending,
            delayed: this.delayedJobs.size,
            processing: this.processingJobs.size,
            total: this.jobs.size,
            byPriority: {
                high: this.tier(JobPriority.High).length,
                normal: this.tier(JobPriority.Normal).length,
                low: this.tier(JobPriority.Low).length,
            },
        };
    }

    private claimNext(workerId: string): Job | null {
        for (;;) {
            const priority = this.selector.next(p => this.tier(p).length > 0);
            if (priority === null) return null;

            const jobId = this.tier(priority).shift();
            const job = jobId !== undefined ? this.jobs.get(jobId) : undefined;
            if (!job || job.status !== 'pending') continue;

            return this.claim(job, workerId, Date.now());
        }
    }

    private claim(job: Job, workerId: string, now: number): Job {
        job.status = 'running';
        job.workerId = workerId;
        this.processingJobs.set(job.id, now);
        return cloneJob(job);
    }

    private makeReady(job: Job, now: number): void {
        const consumer = this.waitingConsumers.shift();
        if (consumer) {
            consumer.resolve(this.claim(job, consumer.workerId, now));
            return;
        }
        this.tier(job.priority).push(job.id);
    }

    private retire(jobId: string, now: number = Date.now()): void {
        if (!this.finishedJobs.has(jobId)) {
            this.finishedJobs.set(jobId, now);
        }
        this.pruneFinishedJobs(now);
    }

    private tier(priority: JobPriority): string[] {
        let ids = this.ready.get(priority);
        if (!ids) {
            ids = [];
            this.ready.set(priority, ids);
        }
        return ids;
    }

    private *waitingIds(): Iterable<string> {
        for (const ids of this.ready.values()) {
            yield* ids;
        }
        yield* this.delayedJobs.keys();
    }

    private removeWaiting(jobId: string): boolean {
        if (this.delayedJobs.delete(jobId)) return true;

        for (const ids of this.ready.values()) {
            const index = ids.indexOf(jobId);
            if (index !== -1) {
                ids.splice(index, 1);
                return true;
            }
        }
        return false;
    }

    private depth(): number {
        let depth = this.delayedJobs.size;
        for (const ids of this.ready.values()) {
            depth += ids.length;
        }
        return depth;
    }

    private isAtCapacity(): boolean {
        return this.capacity > 0 && this.depth() >= this.capacity;
    }
}
