import { EventEmitter } from "node:events";
import { Job } from "../types/Job";
import { Queue } from "../Queue";
import { DeadLetterQueue } from "../deadletter/DeadLetterQueue";
import { Logger, consoleLogger } from "../logging/logger";

export interface SchedulerOptions {
    checkIntervalMs?: number;
    /** Pruned of expired entries on every tick when given. */
    deadLetterQueue?: DeadLetterQueue | null;
    logger?: Logger;
}

/**
 * Periodic due-check. Delayed jobs, retries included, only return to their
 * queue's ready set through {@link Scheduler.runOnce}.
 */
export class Scheduler extends EventEmitter {
    private queues = new Map<string, Queue>();
    private checkIntervalMs: number;
    private deadLetterQueue: DeadLetterQueue | null;
    private logger: Logger;

    private isRunning: boolean = false;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;

    constructor(options: SchedulerOptions = {}) {
        super();
        this.checkIntervalMs = options.checkIntervalMs ?? 60_000;
        this.deadLetterQueue = options.deadLetterQueue ?? null;
        this.logger = options.logger ?? consoleLogger;
    }

    register(queue: Queue): this {
        this.queues.set(queue.getName(), queue);
        return this;
    }

    unregister(queueName: string): boolean {
        return this.queues.delete(queueName);
    }

    /** Enqueues a job to run no earlier than `at`. */
    async schedule<T>(job: Job<T>, at: number | Date): Promise<Job<T>> {
        const queue = this.queues.get(job.queue);
        if (!queue) {
            throw new Error(`Queue ${job.queue} is not registered with the scheduler`);
        }
        job.scheduledFor = at instanceof Date ? at.getTime() : at;
        return queue.enqueue(job);
    }

    /** One sweep over every registered queue. Returns the number of jobs promoted. */
    async runOnce(now: number = Date.now()): Promise<number> {
        let promoted = 0;

        for (const [name, queue] of this.queues) {
            try {
                const count = await queue.getStorage().promoteDueJobs(now);
                if (count > 0) {
                    promoted += count;
                    this.logger.debug('Promoted due jobs', { queue: name, count });
                    this.emit('jobs:promoted', { queue: name, count });
                }
            } catch (error) {
                this.logger.error('Due-check failed', { queue: name, error: String(error) });
                this.emit('scheduler:error', { queue: name, error });
            }
        }

        if (this.deadLetterQueue) {
            const pruned = this.deadLetterQueue.prune(now);
            if (pruned > 0) {
                this.logger.info('Pruned expired dead letters', { count: pruned });
            }
        }

        return promoted;
    }

    start(): void {
        if (this.isRunning) return;
        this.isRunning = true;
        this.scheduleNext();
    }

    async stop(): Promise<void> {
        this.isRunning = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.inFlight) {
            await this.inFlight;
        }
    }

    isActive(): boolean {
        return this.isRunning;
    }

    private scheduleNext(): void {
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlight = this.tick();
        }, this.checkIntervalMs);
    }

    private async tick(): Promise<void> {
        try {
            await this.runOnce();
        } finally {
            this.inFlight = null;
            if (this.isRunning) {
                this.scheduleNext();
            }
        }
    }
}
