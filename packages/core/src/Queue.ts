import { EventEmitter } from "node:events";
import { Job, JobOptions, createJob } from "./types/Job";
import { JobQuery } from "./types/JobQuery";
import { StorageAdapter, QueueStats } from "./storage/StorageAdapter";
import OverflowStrategy from "./queue/OverflowStrategy";
import { getMemoryStorage } from "./storage/StorageRegistry";
import { QueueFullError } from "./errors/QueueErrors";
import { Logger, consoleLogger } from "./logging/logger";
import { QueueEventMap } from "./types/QueueEvents";

export type JobDefaults = Pick<JobOptions, 'maxAttempts' | 'timeoutMs' | 'priority'>;

export interface QueueOptions {
    storage?: StorageAdapter;
    /** Waiting jobs allowed before the overflow strategy applies, 0 for unbounded. */
    maxDepth?: number;
    overflowStrategy?: OverflowStrategy;
    blockTimeoutMs?: number;
    blockPollIntervalMs?: number;
    /** Share of the worker pool this queue receives. */
    weight?: number;
    defaults?: JobDefaults;
    logger?: Logger;
}

/**
 * Producer side of a named queue: builds jobs and admits them to the store,
 * applying the overflow strategy when the store is at capacity.
 */
export class Queue extends EventEmitter {
    private storage: StorageAdapter;
    private queueName: string;
    private maxDepth: number;
    private overflowStrategy: OverflowStrategy;
    private blockTimeoutMs: number;
    private blockPollIntervalMs: number;
    private weight: number;
    private defaults: JobDefaults;
    private logger: Logger;
    private isConnected: boolean = false;

    // Serializes admission so the depth check and the write see the same size
    private enqueueLock: boolean = false;

    constructor(queueName: string, options: QueueOptions = {}) {
        super();
        this.queueName = queueName;
        this.maxDepth = options.maxDepth ?? 1000;
        this.overflowStrategy = options.overflowStrategy ?? OverflowStrategy.BLOCK;
        this.blockTimeoutMs = options.blockTimeoutMs ?? 30_000;
        this.blockPollIntervalMs = options.blockPollIntervalMs ?? 100;
        this.weight = options.weight ?? 50;
        this.defaults = options.defaults ?? {};
        this.logger = options.logger ?? consoleLogger;

        // Use provided storage or fall back to in-memory
        this.storage = options.storage ?? getMemoryStorage(queueName, this.maxDepth);
    }

    emitEvent<K extends keyof QueueEventMap>(event: K, payload: QueueEventMap[K]): boolean {
        return this.emit(event, payload);
    }

    async connect(): Promise<void> {
        if (this.isConnected) return;
        await this.storage.connect();
        this.isConnected = true;
        this.emitEvent('queue:connected', { queue: this.queueName });
    }

    async disconnect(): Promise<void> {
        if (!this.isConnected) return;
        await this.storage.disconnect();
        this.isConnected = false;
        this.emitEvent('queue:disconnected', { queue: this.queueName });
    }

    async add<T>(jobType: string, payload: T, options: JobOptions = {}): Promise<Job<T>> {
        const job = createJob(jobType, payload, {
            ...this.defaults,
            ...options,
            queue: this.queueName,
        });
        await this.enqueue(job);
        return job;
    }

    /** Admits an already built job, e.g. one handed over by the scheduler. */
    async enqueue<T>(job: Job<T>): Promise<Job<T>> {
        if (!this.isConnected) await this.connect();

        const added = await this.withEnqueueLock(() => this.admit(job));

        if (added) {
            this.emitEvent('job:added', { job });
            return job;
        }

        this.emitEvent('queue:full', { queue: this.queueName, size: await this.storage.size() });
        return this.handleOverflow(job);
    }

    private async handleOverflow<T>(job: Job<T>): Promise<Job<T>> {

        switch (this.overflowStrategy) {

            case OverflowStrategy.DROP_NEWEST: {
                this.emitEvent('job:dropped', { job, reason: 'DROP_NEWEST' });
                this.logger.warn('Queue full, dropped incoming job', { queue: this.queueName, jobId: job.id });
                throw new QueueFullError(this.queueName, `Queue ${this.queueName} is full. Job dropped (DROP_NEWEST).`);
            }

            case OverflowStrategy.DROP_OLDEST: {
                return this.dropOldestAndEnqueue(job);
            }

            case OverflowStrategy.BLOCK: {
                return this.waitForSpace(job);
            }
        }
    }

    private async dropOldestAndEnqueue<T>(job: Job<T>): Promise<Job<T>> {
        return this.withEnqueueLock(async () => {
            if (await this.admit(job)) {
                this.emitEvent('job:added', { job });
                return job;
            }

            const oldestJob = await this.storage.evictOldest();
            if (!oldestJob) {
                this.emitEvent('job:dropped', { job, reason: 'NOTHING_TO_EVICT' });
                throw new QueueFullError(this.queueName, `Queue ${this.queueName} is full. No waiting jobs to drop.`);
            }

            this.emitEvent('job:dropped', { job: oldestJob, reason: 'DROP_OLDEST' });
            this.logger.warn('Queue full, evicted oldest job', { queue: this.queueName, jobId: oldestJob.id });

            if (await this.admit(job)) {
                this.emitEvent('job:added', { job });
                return job;
            }

            throw new QueueFullError(this.queueName, `Queue ${this.queueName} is full. Failed to enqueue even after dropping the oldest job.`);
        });
    }

    private async waitForSpace<T>(job: Job<T>): Promise<Job<T>> {
        const deadline = Date.now() + this.blockTimeoutMs;

        while (Date.now() < deadline) {
            await new Promise(resolve => setTimeout(resolve, this.blockPollIntervalMs));

            if (await this.withEnqueueLock(() => this.admit(job))) {
                this.emitEvent('job:added', { job });
                return job;
            }
        }

        this.emitEvent('job:dropped', { job, reason: 'BLOCK_TIMEOUT' });
        throw new QueueFullError(
            this.queueName,
            `Queue ${this.queueName} is full. Producer blocked for ${this.blockTimeoutMs}ms without space freeing up.`,
        );
    }

    // The queue's own depth limit applies on top of whatever capacity the store enforces.
    private async admit(job: Job): Promise<boolean> {
        if (this.maxDepth > 0 && await this.storage.size() >= this.maxDepth) {
            return false;
        }
        return this.storage.enqueue(job);
    }

    private async withEnqueueLock<R>(fn: () => Promise<R>): Promise<R> {
        while (this.enqueueLock) {
            await new Promise(resolve => setTimeout(resolve, 10));
        }

        this.enqueueLock = true;
        try {
            return await fn();
        } finally {
            this.enqueueLock = false;
        }
    }

    /** Cancels a job no worker has claimed yet. Running jobs can only be cancelled cooperatively. */
    async cancel(jobId: string): Promise<boolean> {
        const cancelled = await this.storage.cancel(jobId);
        if (cancelled) {
            const job = await this.storage.getJob(jobId);
            if (job) {
                this.emitEvent('job:cancelled', { job });
            }
        }
        return cancelled;
    }

    /** Get the underlying storage adapter (useful for advanced usage) */
    getStorage(): StorageAdapter {
        return this.storage;
    }

    async getJob(jobId: string): Promise<Job | null> {
        return this.storage.getJob(jobId);
    }

    async getSize(): Promise<number> {
        return this.storage.size();
    }

    async listJobs(query: JobQuery = {}): Promise<Job[]> {
        return this.storage.listJobs({ ...query, queue: this.queueName });
    }

    async stats(): Promise<QueueStats> {
        return this.storage.stats();
    }

    getName(): string {
        return this.queueName;
    }

    getWeight(): number {
        return this.weight;
    }
}
