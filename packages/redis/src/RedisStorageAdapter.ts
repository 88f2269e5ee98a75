import Redis from "ioredis";
import path from "path";
import fs from "fs";
import {
    Job,
    JobPriority,
    JobQuery,
    JobStatus,
    QueueStats,
    StorageAdapter,
    InvalidTransitionError,
    WeightedRoundRobin,
    PRIORITIES,
    cloneJob,
    filterJobs,
    isRetryable,
    isTerminal,
    shouldExecuteNow,
} from "@jobline/core";
import { RedisConfig, DEFAULT_KEY_PREFIX } from "./RedisConfig";
import { RedisKeys, buildKeys, fromRedisHash, hashToArgs, jobKey, readyKey, toRedisHash } from "./serialization";

function loadScript(name: string): string {
    return fs.readFileSync(path.join(__dirname, 'lua-scripts', name), 'utf-8');
}

function toCount(result: unknown): number {
    return typeof result === 'number' ? result : Number(result ?? 0);
}

/**
 * Redis-backed store. Every transition that must be atomic across keys, the
 * claim in particular, runs as a Lua script.
 */
export class RedisStorageAdapter implements StorageAdapter {
    private client: Redis;
    private ownsClient: boolean;
    private keys: RedisKeys;
    private capacity: number;
    private finishedJobTtlSeconds: number;
    private dequeuePollIntervalMs: number;
    private selector = new WeightedRoundRobin<JobPriority>(PRIORITIES.map(p => [p, p] as const));

    private enqueueLua = loadScript('enqueue.lua');
    private acquireJobLua = loadScript('acquire-job.lua');
    private promoteDueLua = loadScript('promote-due.lua');
    private evictOldestLua = loadScript('evict-oldest.lua');
    private cancelLua = loadScript('cancel.lua');
    private recoverStuckJobsLua = loadScript('recover-stuck-jobs.lua');

    constructor(config: RedisConfig) {
        this.keys = buildKeys(config.keyPrefix ?? DEFAULT_KEY_PREFIX, config.queueName);
        this.capacity = config.capacity ?? 0;
        this.finishedJobTtlSeconds = config.finishedJobTtlSeconds ?? 86_400;
        this.dequeuePollIntervalMs = config.dequeuePollIntervalMs ?? 50;

        if (config.client) {
            this.client = config.client;
            this.ownsClient = false;
        } else {
            this.client = new Redis({
                host: config.host ?? '127.0.0.1',
                port: config.port ?? 6379,
                password: config.password,
                db: config.db ?? 0,
                lazyConnect: true,
                maxRetriesPerRequest: null,
            });
            this.ownsClient = true;
        }
    }

    async connect(): Promise<void> {
        if (this.client.status === 'wait') {
            await this.client.connect();
        }
        await this.client.ping();
    }

    async disconnect(): Promise<void> {
        if (this.ownsClient && this.client.status !== 'end') {
            await this.client.quit();
        }
    }

    async enqueue(job: Job): Promise<boolean> {
        if (isTerminal(job.status)) {
            throw new InvalidTransitionError(job.id, job.status, 'pending');
        }

        const runAt = !shouldExecuteNow(job) && job.scheduledFor !== null ? job.scheduledFor : 0;
        const ready = this.keys.ready;

        const result = await this.client.eval(
            this.enqueueLua, 7,
            ready.high, ready.normal, ready.low, this.keys.delayed, this.keys.jobs,
            jobKey(this.keys, job.id), readyKey(this.keys, job.priority),
            this.capacity.toString(), job.id, runAt.toString(),
            ...hashToArgs(toRedisHash(job)),
        );

        return toCount(result) === 1;
    }

    async dequeue(workerId: string, timeoutMs: number = 0): Promise<Job | null> {
        const deadline = Date.now() + timeoutMs;

        for (;;) {
            const job = await this.acquire(workerId);
            if (job || Date.now() >= deadline) {
                return job;
            }
            await new Promise(resolve => setTimeout(resolve, this.dequeuePollIntervalMs));
        }
    }

    // The weighted pick decides which tier is tried first; the script falls
    // through to the others when it is empty.
    private async acquire(workerId: string): Promise<Job | null> {
        const first = this.selector.next() ?? JobPriority.High;
        const order = [first, ...PRIORITIES.filter(p => p !== first)].map(p => readyKey(this.keys, p));

        const jobId = await this.client.eval(
            this.acquireJobLua, 4,
            ...order, this.keys.processing,
            Date.now().toString(), workerId, this.keys.jobPrefix,
        );

        if (typeof jobId !== 'string') return null;
        return this.getJob(jobId);
    }

    async size(): Promise<number> {
        const ready = this.keys.ready;
        const results = await this.client.multi()
            .llen(ready.high)
            .llen(ready.normal)
            .llen(ready.low)
            .zcard(this.keys.delayed)
            .exec();

        return (results ?? []).reduce((sum, [, value]) => sum + toCount(value), 0);
    }

    async isFull(): Promise<boolean> {
        return this.capacity > 0 && (await this.size()) >= this.capacity;
    }

    async evictOldest(): Promise<Job | null> {
        const ready = this.keys.ready;
        const jobId = await this.client.eval(
            this.evictOldestLua, 4,
            ready.high, ready.normal, ready.low, this.keys.delayed,
            Date.now().toString(), this.keys.jobPrefix,
        );

        if (typeof jobId !== 'string') return null;
        await this.expireFinished(jobId);
        return this.getJob(jobId);
    }

    async cancel(jobId: string): Promise<boolean> {
        const ready = this.keys.ready;
        const result = await this.client.eval(
            this.cancelLua, 5,
            ready.high, ready.normal, ready.low, this.keys.delayed, jobKey(this.keys, jobId),
            Date.now().toString(), jobId,
        );

        const cancelled = toCount(result) === 1;
        if (cancelled) await this.expireFinished(jobId);
        return cancelled;
    }

    async scheduleRetry(job: Job, executeAt: number): Promise<void> {
        if (!isRetryable(job.status)) {
            throw new InvalidTransitionError(job.id, job.status, 'pending');
        }

        const stored = cloneJob(job);
        stored.scheduledFor = executeAt;
        stored.workerId = null;

        await this.client.multi()
            .hset(jobKey(this.keys, stored.id), toRedisHash(stored))
            .zrem(this.keys.processing, stored.id)
            .zadd(this.keys.delayed, executeAt, stored.id)
            .exec();
    }

    async promoteDueJobs(now: number = Date.now()): Promise<number> {
        const ready = this.keys.ready;
        const result = await this.client.eval(
            this.promoteDueLua, 4,
            this.keys.delayed, ready.high, ready.normal, ready.low,
            now.toString(), this.keys.jobPrefix,
        );
        return toCount(result);
    }

    async saveJob(job: Job): Promise<void> {
        const key = jobKey(this.keys, job.id);
        const pipeline = this.client.multi()
            .hset(key, toRedisHash(job))
            .sadd(this.keys.jobs, job.id);

        if (job.status !== 'running') {
            pipeline.zrem(this.keys.processing, job.id);
        }
        if (isTerminal(job.status) && this.finishedJobTtlSeconds > 0) {
            pipeline.expire(key, this.finishedJobTtlSeconds);
        }
        await pipeline.exec();
    }

    async updateJobStatus(jobId: string, status: JobStatus): Promise<void> {
        const key = jobKey(this.keys, jobId);
        const now = Date.now();

        if (status === 'running') {
            await this.client.multi()
                .hset(key, 'status', status, 'startedAt', now.toString())
                .zadd(this.keys.processing, now, jobId)
                .exec();
            return;
        }

        const pipeline = this.client.multi().zrem(this.keys.processing, jobId);
        if (status === 'pending') {
            pipeline.hset(key, 'status', status);
        } else {
            pipeline.hset(key, 'status', status, 'completedAt', now.toString());
        }
        await pipeline.exec();
    }

    async getJob(jobId: string): Promise<Job | null> {
        const data = await this.client.hgetall(jobKey(this.keys, jobId));
        return fromRedisHash(data);
    }

    async listJobs(query: JobQuery = {}): Promise<Job[]> {
        const ids = await this.client.smembers(this.keys.jobs);
        const jobs: Job[] = [];
        const expired: string[] = [];

        for (const id of ids) {
            const job = await this.getJob(id);
            if (job) {
                jobs.push(job);
            } else {
                expired.push(id);
            }
        }

        if (expired.length > 0) {
            await this.client.srem(this.keys.jobs, ...expired);
        }

        jobs.sort((a, b) => a.createdAt - b.createdAt);
        return filterJobs(jobs, query);
    }

    async recoverStuckJobs(timeoutMs: number): Promise<number> {
        const ready = this.keys.ready;
        const result = await this.client.eval(
            this.recoverStuckJobsLua, 4,
            this.keys.processing, ready.high, ready.normal, ready.low,
            Date.now().toString(), timeoutMs.toString(), this.keys.jobPrefix,
        );
        return toCount(result);
    }

    async getProcessingJobs(): Promise<string[]> {
        return this.client.zrange(this.keys.processing, 0, -1);
    }

    async stats(): Promise<QueueStats> {
        const ready = this.keys.ready;
        const results = await this.client.multi()
            .llen(ready.high)
            .llen(ready.normal)
            .llen(ready.low)
            .zcard(this.keys.delayed)
            .zcard(this.keys.processing)
            .scard(this.keys.jobs)
            .exec();

        const [high, normal, low, delayed, processing, total] = (results ?? []).map(([, value]) => toCount(value));
        return {
            pending: (high ?? 0) + (normal ?? 0) + (low ?? 0),
            delayed: delayed ?? 0,
            processing: processing ?? 0,
            total: total ?? 0,
            byPriority: { high: high ?? 0, normal: normal ?? 0, low: low ?? 0 },
        };
    }

    private async expireFinished(jobId: string): Promise<void> {
        if (this.finishedJobTtlSeconds > 0) {
            await this.client.expire(jobKey(this.keys, jobId), this.finishedJobTtlSeconds);
        }
    }
}
