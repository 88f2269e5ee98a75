import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";

import { Job, MAX_TIMEOUT_MS, canRetry, markCancelled, markCompleted, markDead, markFailed, markStarted, markTimedOut } from "../types/Job";
import { JobResult } from "../types/JobResult";
import { StorageAdapter } from "../storage/StorageAdapter";
import { getMemoryStorage } from "../storage/StorageRegistry";
import { JobError, CancelledError, ExecutionError, TimeoutError, toJobError } from "../errors/JobError";
import { RetryPolicy, ExponentialRetryPolicy } from "../retry/RetryPolicy";
import { RetryAttempt, RetryHistoryStore } from "../retry/RetryHistory";
import { DeadLetterQueue } from "../deadletter/DeadLetterQueue";
import { HandlerRegistry, JobContext, JobHandler } from "../handlers/HandlerRegistry";
import { Logger, consoleLogger } from "../logging/logger";
import { WorkerEventMap } from "../types/QueueEvents";
import { WorkerState, WorkerStats, WorkerStatsSnapshot, formatWorkerStats } from "./WorkerStats";

export interface WorkerOptions {
    /** A registry dispatching on job type, or one handler for every job. */
    handler: HandlerRegistry | JobHandler;
    storage?: StorageAdapter;
    workerId?: string;
    retryPolicy?: RetryPolicy;
    retryHistories?: RetryHistoryStore;
    /** Null disables dead-lettering; dead jobs are still persisted and emitted. */
    deadLetterQueue?: DeadLetterQueue | null;
    pollIntervalMs?: number;
    errorBackoffMs?: number;
    stuckJobTimeoutMs?: number;
    recoverOnStart?: boolean;
    /** Attempts at persisting a finished job before giving up on the write. */
    persistAttempts?: number;
    logger?: Logger;
}

/**
 * Runs one job at a time from a single named queue. Concurrency comes from
 * running several workers against the same store; the store's dequeue is the
 * only place ownership of a job is decided.
 */
export class Worker extends EventEmitter {
    private storage: StorageAdapter;
    private queueName: string;
    private workerId: string;
    private handler: HandlerRegistry | JobHandler;
    private retryPolicy: RetryPolicy;
    private retryHistories: RetryHistoryStore;
    private deadLetterQueue: DeadLetterQueue | null;
    private pollIntervalMs: number;
    private errorBackoffMs: number;
    private stuckJobTimeoutMs: number;
    private recoverOnStart: boolean;
    private persistAttempts: number;
    private logger: Logger;

    private state: WorkerState = 'stopped';
    private stats = new WorkerStats();
    private loop: Promise<void> | null = null;
    private starting: Promise<void> | null = null;
    private stopping: Promise<void> | null = null;
    private wake: (() => void) | null = null;
    private currentJob: Job | null = null;
    private abortController: AbortController | null = null;

    constructor(queueName: string, options: WorkerOptions) {
        super();
        this.queueName = queueName;
        this.workerId = options.workerId ?? `${queueName}-worker-${randomUUID().slice(0, 8)}`;
        this.handler = options.handler;
        this.retryPolicy = options.retryPolicy ?? new ExponentialRetryPolicy();
        this.retryHistories = options.retryHistories ?? new RetryHistoryStore();
        this.deadLetterQueue = options.deadLetterQueue === undefined ? new DeadLetterQueue() : options.deadLetterQueue;
        this.pollIntervalMs = options.pollIntervalMs ?? 100;
        this.errorBackoffMs = options.errorBackoffMs ?? 1000;
        this.stuckJobTimeoutMs = options.stuckJobTimeoutMs ?? 300_000;
        this.recoverOnStart = options.recoverOnStart ?? true;
        this.persistAttempts = Math.max(1, options.persistAttempts ?? 3);
        this.logger = options.logger ?? consoleLogger;

        this.storage = options.storage ?? getMemoryStorage(queueName);
    }

    emitEvent<K extends keyof WorkerEventMap>(event: K, payload: WorkerEventMap[K]): boolean {
        return this.emit(event, payload);
    }

    async start(): Promise<void> {
        if (this.starting) return this.starting;
        if (this.state !== 'stopped' && this.state !== 'failed') return;

        this.state = 'starting';
        this.starting = this.boot().finally(() => {
            this.starting = null;
        });
        return this.starting;
    }

    // A stop() that lands while connecting or recovering wins: boot checks the
    // state after every await and leaves without spawning the loop.
    private async boot(): Promise<void> {
        try {
            await this.storage.connect();
            if (this.state !== 'starting') return;

            if (this.recoverOnStart) {
                const recovered = await this.storage.recoverStuckJobs(this.stuckJobTimeoutMs);
                if (recovered > 0) {
                    this.logger.warn('Recovered stuck jobs', { workerId: this.workerId, count: recovered });
                    this.emitEvent('worker:recovered', { workerId: this.workerId, count: recovered });
                }
            }
        } catch (error) {
            if (this.state === 'starting') this.state = 'failed';
            this.logger.error('Worker failed to start', { workerId: this.workerId, error: String(error) });
            throw error;
        }

        if (this.state !== 'starting') return;

        this.state = 'running';
        this.emitEvent('worker:started', { workerId: this.workerId, queue: this.queueName });
        this.loop = this.run();
    }

    /**
     * Stops dequeuing and waits for the job in hand to settle. The store is
     * left connected: it is shared with the queue and sibling workers.
     */
    async stop(): Promise<void> {
        if (this.state === 'stopped') return;
        if (this.stopping) return this.stopping;

        this.state = 'stopping';
        this.stopping = this.shutdown().finally(() => {
            this.stopping = null;
        });
        return this.stopping;
    }

    private async shutdown(): Promise<void> {
        this.wakeUp();

        // a failed start has already been reported to its caller
        if (this.starting) await Promise.allSettled([this.starting]);

        if (this.loop) {
            await this.loop;
            this.loop = null;
        }

        this.state = 'stopped';
        this.emitEvent('worker:stopped', { workerId: this.workerId, state: this.state });
    }

    pause(): void {
        if (this.state !== 'running') return;
        this.state = 'paused';
        this.emitEvent('worker:paused', { workerId: this.workerId });
    }

    resume(): void {
        if (this.state !== 'paused') return;
        this.state = 'running';
        this.wakeUp();
        this.emitEvent('worker:resumed', { workerId: this.workerId });
    }

    /** Aborts the signal of the running handler. Returns false when idle. */
    cancelCurrentJob(reason: string = 'Job cancelled'): boolean {
        if (!this.abortController || !this.currentJob) return false;
        this.abortController.abort(new CancelledError(reason));
        return true;
    }

    private async run(): Promise<void> {
        while (this.state === 'running' || this.state === 'paused') {
            if (this.state === 'paused') {
                await this.sleep(this.pollIntervalMs);
                continue;
            }

            try {
                const job = await this.storage.dequeue(this.workerId);
                if (!job) {
                    await this.sleep(this.pollIntervalMs);
                    continue;
                }
                await this.processJob(job);
            } catch (error) {
                this.logger.error('Worker loop error', { workerId: this.workerId, error: String(error) });
                this.emitEvent('worker:error', { workerId: this.workerId, error, context: 'run' });
                await this.sleep(this.errorBackoffMs);
            }
        }
    }

    private async processJob(job: Job): Promise<void> {
        const startedAt = Date.now();
        markStarted(job, this.workerId, startedAt);
        await this.persist(job, () => this.storage.saveJob(job));

        this.currentJob = job;
        const controller = new AbortController();
        this.abortController = controller;
        this.emitEvent('job:started', { job, workerId: this.workerId });

        let result: JobResult;
        try {
            result = await this.execute(job, controller, startedAt);
            if (!result.success) {
                throw new ExecutionError(result.error ?? 'Job reported failure');
            }
        } catch (error) {
            await this.handleFailure(job, toJobError(error));
            return;
        } finally {
            this.currentJob = null;
            this.abortController = null;
        }

        const completedAt = Date.now();
        markCompleted(job, completedAt);
        await this.persist(job, () => this.storage.saveJob(job));
        this.retryHistories.delete(job.id);
        this.stats.recordSuccess();
        this.emitEvent('job:completed', { job, result, duration: completedAt - startedAt });
    }

    private async execute(job: Job, controller: AbortController, startedAt: number): Promise<JobResult> {
        const signal = controller.signal;
        const context: JobContext = {
            signal,
            attempt: job.attempt,
            maxAttempts: job.maxAttempts,
            queue: job.queue,
            workerId: this.workerId,
            startedAt,
            timeoutMs: job.timeoutMs,
            isLastAttempt: () => job.attempt >= job.maxAttempts,
            logger: this.logger,
        };

        const aborted = new Promise<never>((_, reject) => {
            if (signal.aborted) {
                reject(toJobError(signal.reason));
                return;
            }
            signal.addEventListener('abort', () => reject(toJobError(signal.reason)), { once: true });
        });
        const timer = setTimeout(
            () => controller.abort(new TimeoutError(job.timeoutMs)),
            Math.min(job.timeoutMs, MAX_TIMEOUT_MS),
        );

        try {
            return await Promise.race([this.dispatch(job, context), aborted]);
        } finally {
            clearTimeout(timer);
        }
    }

    private dispatch(job: Job, context: JobContext): Promise<JobResult> {
        if (this.handler instanceof HandlerRegistry) {
            return this.handler.dispatch(job, context);
        }
        return this.handler(job, context);
    }

    private async handleFailure(job: Job, error: JobError): Promise<void> {
        const now = Date.now();
        this.stats.recordFailure();

        if (error.kind === 'cancelled') {
            markCancelled(job, now);
            job.error = error.toSnapshot();
            await this.persist(job, () => this.storage.saveJob(job));
            this.retryHistories.delete(job.id);
            this.logger.info('Job cancelled', { jobId: job.id, workerId: this.workerId });
            this.emitEvent('job:cancelled', { job });
            return;
        }

        if (error.kind === 'timeout') {
            markTimedOut(job, error, now);
        } else {
            markFailed(job, error, now);
        }

        const delayMs = this.retryPolicy.shouldRetry(error) && canRetry(job)
            ? this.retryPolicy.calculateDelay(job.attempt, error)
            : null;

        const attempt: RetryAttempt = { attempt: job.attempt, error: error.toSnapshot(), delayMs, attemptedAt: now };
        const history = this.retryHistories.for(job.id);
        history.add(attempt);

        if (delayMs !== null) {
            const nextAttemptAt = now + delayMs;
            job.scheduledFor = nextAttemptAt;
            const scheduled = await this.persist(job, () => this.storage.scheduleRetry(job, nextAttemptAt));
            if (!scheduled) {
                // still claimed in the store; stuck-job recovery returns it to the queue
                this.logger.error('Failed to schedule retry', {
                    jobId: job.id,
                    attempt: job.attempt,
                    error: error.message,
                });
                return;
            }
            this.logger.warn('Job failed, retry scheduled', {
                jobId: job.id,
                attempt: job.attempt,
                maxAttempts: job.maxAttempts,
                delayMs,
                error: error.message,
            });
            this.emitEvent('job:retry', { job, attempt, nextAttemptAt });
            return;
        }

        const finalError = error.toSnapshot();
        markDead(job, now);
        await this.persist(job, () => this.storage.saveJob(job));
        const deadLetter = this.deadLetterQueue
            ? this.deadLetterQueue.push(job, finalError, history.attempts, now)
            : null;
        this.retryHistories.delete(job.id);

        this.logger.error('Job moved to dead letter queue', {
            jobId: job.id,
            jobType: job.jobType,
            attempts: job.attempt,
            error: finalError.message,
        });
        this.emitEvent('job:dead', { job, error: finalError, deadLetter });
    }

    // Store failures while recording an outcome are retried here and never
    // change the job's own state. A job left running is picked up again by
    // stuck-job recovery.
    private async persist(job: Job, write: () => Promise<void>): Promise<boolean> {
        for (let attempt = 1; attempt <= this.persistAttempts; attempt++) {
            try {
                await write();
                return true;
            } catch (error) {
                this.logger.error('Failed to persist job', {
                    jobId: job.id,
                    status: job.status,
                    attempt,
                    error: String(error),
                });
                this.emitEvent('worker:error', { workerId: this.workerId, error, context: 'persist' });
                if (attempt < this.persistAttempts) {
                    await new Promise(resolve => setTimeout(resolve, this.errorBackoffMs));
                }
            }
        }
        return false;
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve();
            }, ms);
            this.wake = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
        });
    }

    private wakeUp(): void {
        if (this.wake) this.wake();
    }

    getId(): string {
        return this.workerId;
    }

    getQueueName(): string {
        return this.queueName;
    }

    getState(): WorkerState {
        return this.state;
    }

    getCurrentJob(): Job | null {
        return this.currentJob;
    }

    getStats(): WorkerStatsSnapshot {
        return this.stats.snapshot(this.workerId, this.state);
    }

    formatStats(): string {
        return formatWorkerStats(this.getStats());
    }

    isActive(): boolean {
        return this.state === 'running' || this.state === 'paused';
    }
}
