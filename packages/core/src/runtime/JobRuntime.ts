import { Queue } from "../Queue";
import { Job, JobOptions } from "../types/Job";
import { StorageAdapter } from "../storage/StorageAdapter";
import { MemoryStorageAdapter } from "../storage/MemoryStorageAdapter";
import { Worker } from "../worker/Worker";
import { WorkerStatsSnapshot } from "../worker/WorkerStats";
import { Scheduler } from "../scheduler/Scheduler";
import { DeadLetterQueue } from "../deadletter/DeadLetterQueue";
import { HandlerRegistry, JobHandler } from "../handlers/HandlerRegistry";
import { MetricsCollector, MetricsSnapshot } from "../metrics/MetricsCollector";
import { RetryPolicy, retryPolicyFromConfig } from "../retry/RetryPolicy";
import { RetryHistoryStore } from "../retry/RetryHistory";
import { JobConfig, JobConfigInput, allocateWorkers, defineJobConfig } from "../config/JobConfig";
import { Logger, consoleLogger } from "../logging/logger";

export type StorageFactory = (queueName: string, maxDepth: number) => StorageAdapter;

export interface JobRuntimeOptions {
    /** Validated and completed with defaults; a full JobConfig passes through unchanged. */
    config?: JobConfigInput;
    handlers: HandlerRegistry | JobHandler;
    /** One store per named queue. Memory stores by default. */
    storageFactory?: StorageFactory;
    /** Overrides the policy derived from `config.retry`. */
    retryPolicy?: RetryPolicy;
    logger?: Logger;
}

/**
 * Wires queues, workers, the scheduler, dead-lettering and metrics from one
 * configuration.
 */
export class JobRuntime {
    readonly config: JobConfig;
    readonly deadLetterQueue: DeadLetterQueue | null;
    readonly scheduler: Scheduler;

    private queues = new Map<string, Queue>();
    private workers: Worker[] = [];
    private metrics: MetricsCollector | null;
    private logger: Logger;
    private started: boolean = false;
    private starting: Promise<void> | null = null;

    constructor(options: JobRuntimeOptions) {
        this.config = defineJobConfig(options.config ?? {});
        this.logger = options.logger ?? consoleLogger;

        const { worker, queue, retry, deadLetter, scheduler, metrics } = this.config;
        const storageFactory = options.storageFactory ?? ((_name: string, maxDepth: number) => new MemoryStorageAdapter(maxDepth));
        const retryPolicy = options.retryPolicy ?? retryPolicyFromConfig(retry);
        const retryHistories = new RetryHistoryStore();

        this.deadLetterQueue = deadLetter.enabled
            ? new DeadLetterQueue({
                maxCount: deadLetter.maxCount,
                maxAgeMs: deadLetter.maxAgeMs,
                alertOnDeadLetters: deadLetter.alertOnDeadLetters,
                alertThreshold: deadLetter.alertThreshold,
                alertWindowMs: deadLetter.alertWindowMs,
                logger: this.logger,
            })
            : null;

        this.metrics = metrics.enabled ? new MetricsCollector() : null;
        if (this.metrics && this.deadLetterQueue) {
            this.metrics.attachDeadLetterQueue(this.deadLetterQueue);
        }

        this.scheduler = new Scheduler({
            checkIntervalMs: scheduler.checkIntervalMs,
            deadLetterQueue: this.deadLetterQueue,
            logger: this.logger,
        });

        const stores = new Map<string, StorageAdapter>();
        for (const definition of queue.queues) {
            const storage = storageFactory(definition.name, queue.maxDepth);
            const jobQueue = new Queue(definition.name, {
                storage,
                maxDepth: queue.maxDepth,
                overflowStrategy: queue.overflowStrategy,
                blockTimeoutMs: queue.blockTimeoutMs,
                blockPollIntervalMs: queue.blockPollIntervalMs,
                weight: definition.weight,
                defaults: { maxAttempts: retry.maxAttempts, timeoutMs: worker.timeoutMs },
                logger: this.logger,
            });
            stores.set(definition.name, storage);
            this.queues.set(definition.name, jobQueue);
            this.scheduler.register(jobQueue);
            this.metrics?.attachQueue(jobQueue);
        }

        const weights = Array.from(this.queues.values(), jobQueue => ({
            name: jobQueue.getName(),
            weight: jobQueue.getWeight(),
        }));
        const allocation = allocateWorkers(worker.poolSize, weights, worker.maxConcurrentJobs);

        for (const [name, storage] of stores) {
            const count = allocation.get(name) ?? 0;
            for (let i = 0; i < count; i++) {
                const jobWorker = new Worker(name, {
                    handler: options.handlers,
                    storage,
                    workerId: `${name}-worker-${i}`,
                    retryPolicy,
                    retryHistories,
                    deadLetterQueue: this.deadLetterQueue,
                    pollIntervalMs: worker.pollIntervalMs,
                    errorBackoffMs: worker.errorBackoffMs,
                    stuckJobTimeoutMs: worker.stuckJobTimeoutMs,
                    // one recovery pass per store is enough
                    recoverOnStart: i === 0,
                    logger: this.logger,
                });
                this.metrics?.attachWorker(jobWorker);
                this.workers.push(jobWorker);
            }
        }
    }

    async start(): Promise<void> {
        if (this.started) return;
        if (this.starting) return this.starting;

        this.starting = this.boot().finally(() => {
            this.starting = null;
        });
        return this.starting;
    }

    private async boot(): Promise<void> {
        for (const queue of this.queues.values()) {
            await queue.connect();
        }
        await Promise.all(this.workers.map(worker => worker.start()));

        if (this.config.scheduler.enabled) {
            this.scheduler.start();
        }
        this.started = true;
        this.logger.info('Job runtime started', {
            queues: Array.from(this.queues.keys()),
            workers: this.workers.length,
        });
    }

    /**
     * Waits out a start in progress, then stops the scheduler, lets every
     * worker finish its job in hand and disconnects the stores. Each step is a
     * no-op for parts that never started.
     */
    async stop(): Promise<void> {
        if (this.starting) await Promise.allSettled([this.starting]);

        await this.scheduler.stop();
        await Promise.all(this.workers.map(worker => worker.stop()));
        for (const queue of this.queues.values()) {
            await queue.disconnect();
        }

        if (this.started) {
            this.started = false;
            this.logger.info('Job runtime stopped');
        }
    }

    pause(): void {
        for (const worker of this.workers) worker.pause();
    }

    resume(): void {
        for (const worker of this.workers) worker.resume();
    }

    queue(name: string = this.config.queue.defaultQueue): Queue {
        const queue = this.queues.get(name);
        if (!queue) {
            throw new Error(`Unknown queue ${name}`);
        }
        return queue;
    }

    async add<T>(jobType: string, payload: T, options: JobOptions = {}): Promise<Job<T>> {
        return this.queue(options.queue).add(jobType, payload, options);
    }

    getWorkers(): readonly Worker[] {
        return this.workers;
    }

    workerStats(): WorkerStatsSnapshot[] {
        return this.workers.map(worker => worker.getStats());
    }

    async getMetrics(): Promise<MetricsSnapshot | null> {
        if (!this.metrics) return null;

        let size = 0;
        for (const queue of this.queues.values()) {
            size += await queue.getSize();
        }
        this.metrics.updateQueueSize(size);
        return this.metrics.getSnapshot();
    }

    toPrometheusFormat(): string {
        return this.metrics ? this.metrics.toPrometheusFormat() : '';
    }
}
