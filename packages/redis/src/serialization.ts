import { Job, JobPriority, JobStatus, priorityName, parseJob, serializeJob, PriorityName } from "@jobline/core";

/**
 * Fields the Lua scripts read or rewrite in place. Everything else lives in
 * the `data` field as JSON and is only touched from Node.
 */
export const HOT_FIELDS = ['status', 'workerId', 'priority', 'createdAt', 'startedAt', 'completedAt', 'scheduledFor', 'timeoutMs'] as const;

export type HotField = typeof HOT_FIELDS[number];
export type RedisJobHash = Record<HotField | 'data', string>;

export interface RedisKeys {
    ready: Record<PriorityName, string>;
    delayed: string;
    processing: string;
    jobs: string;
    jobPrefix: string;
}

export function buildKeys(keyPrefix: string, queueName: string): RedisKeys {
    const base = `${keyPrefix}:${queueName}`;
    return {
        ready: {
            high: `${base}:ready:high`,
            normal: `${base}:ready:normal`,
            low: `${base}:ready:low`,
        },
        delayed: `${base}:delayed`,
        processing: `${base}:processing`,
        jobs: `${base}:jobs`,
        jobPrefix: `${base}:job:`,
    };
}

export function jobKey(keys: RedisKeys, jobId: string): string {
    return `${keys.jobPrefix}${jobId}`;
}

export function readyKey(keys: RedisKeys, priority: JobPriority): string {
    return keys.ready[priorityName(priority)];
}

function optionalNumber(value: number | null): string {
    return value === null ? '' : String(value);
}

function parseOptionalNumber(value: string | undefined): number | null {
    if (value === undefined || value === '') return null;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
}

export function toRedisHash(job: Job): RedisJobHash {
    return {
        status: job.status,
        workerId: job.workerId ?? '',
        priority: String(job.priority),
        createdAt: String(job.createdAt),
        startedAt: optionalNumber(job.startedAt),
        completedAt: optionalNumber(job.completedAt),
        scheduledFor: optionalNumber(job.scheduledFor),
        timeoutMs: String(job.timeoutMs),
        data: serializeJob(job),
    };
}

/** Flattened for HSET / script arguments. */
export function hashToArgs(hash: RedisJobHash): string[] {
    return Object.entries(hash).flat();
}

/** Rebuilds a job from HGETALL output, the hot fields winning over `data`. Null for a missing key. */
export function fromRedisHash(hash: Record<string, string>): Job | null {
    if (hash.data === undefined) return null;

    const data: unknown = JSON.parse(hash.data);
    if (typeof data !== 'object' || data === null) {
        throw new Error('Stored job data is not an object');
    }

    const status: JobStatus | undefined = parseStatus(hash.status);

    return parseJob({
        ...data,
        ...(status !== undefined ? { status } : {}),
        ...(hash.workerId !== undefined ? { workerId: hash.workerId === '' ? null : hash.workerId } : {}),
        ...(hash.startedAt !== undefined ? { startedAt: parseOptionalNumber(hash.startedAt) } : {}),
        ...(hash.completedAt !== undefined ? { completedAt: parseOptionalNumber(hash.completedAt) } : {}),
        ...(hash.scheduledFor !== undefined ? { scheduledFor: parseOptionalNumber(hash.scheduledFor) } : {}),
    });
}

function parseStatus(value: string | undefined): JobStatus | undefined {
    switch (value) {
        case 'pending':
        case 'running':
        case 'completed':
        case 'failed':
        case 'timed_out':
        case 'dead':
        case 'cancelled':
            return value;
        default:
            return undefined;
    }
}
