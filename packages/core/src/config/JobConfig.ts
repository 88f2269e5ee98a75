import { z } from "zod";
import OverflowStrategy from "../queue/OverflowStrategy";
import { ConfigError } from "../errors/QueueErrors";
import { MAX_TIMEOUT_MS } from "../types/Job";

const queueDefinitionSchema = z.object({
    name: z.string().min(1),
    weight: z.number().int().positive(),
});

const workerSchema = z.object({
    poolSize: z.number().int().positive().default(10),
    timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(300_000),
    maxConcurrentJobs: z.number().int().positive().default(5),
    pollIntervalMs: z.number().int().positive().default(100),
    errorBackoffMs: z.number().int().nonnegative().default(1000),
    stuckJobTimeoutMs: z.number().int().positive().default(300_000),
});

const queueSchema = z.object({
    defaultQueue: z.string().min(1).default('default'),
    queues: z.array(queueDefinitionSchema).min(1).default([
        { name: 'high', weight: 100 },
        { name: 'default', weight: 50 },
        { name: 'low', weight: 10 },
    ]),
    maxDepth: z.number().int().nonnegative().default(10_000),
    overflowStrategy: z.nativeEnum(OverflowStrategy).default(OverflowStrategy.BLOCK),
    blockTimeoutMs: z.number().int().nonnegative().default(30_000),
    blockPollIntervalMs: z.number().int().positive().default(100),
});

const schedulerSchema = z.object({
    enabled: z.boolean().default(true),
    checkIntervalMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(60_000),
});

const retrySchema = z.object({
    enabled: z.boolean().default(true),
    maxAttempts: z.number().int().positive().default(3),
    initialDelayMs: z.number().int().nonnegative().default(1000),
    maxDelayMs: z.number().int().nonnegative().default(3_600_000),
    backoffMultiplier: z.number().positive().default(2),
    jitter: z.number().min(0).max(1).default(0.1),
    retryOnTimeout: z.boolean().default(true),
});

const deadLetterSchema = z.object({
    enabled: z.boolean().default(true),
    maxAgeMs: z.number().int().positive().default(86_400_000),
    maxCount: z.number().int().nonnegative().default(10_000),
    alertOnDeadLetters: z.boolean().default(true),
    alertThreshold: z.number().int().positive().default(10),
    alertWindowMs: z.number().int().positive().default(300_000),
});

const metricsSchema = z.object({
    enabled: z.boolean().default(true),
});

export const jobConfigSchema = z.object({
    worker: workerSchema.default({}),
    queue: queueSchema.default({}),
    scheduler: schedulerSchema.default({}),
    retry: retrySchema.default({}),
    deadLetter: deadLetterSchema.default({}),
    metrics: metricsSchema.default({}),
}).superRefine((config, ctx) => {
    const names = config.queue.queues.map(queue => queue.name);
    if (new Set(names).size !== names.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['queue', 'queues'], message: 'Queue names must be unique' });
    }
    if (!names.includes(config.queue.defaultQueue)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['queue', 'defaultQueue'],
            message: `Default queue ${config.queue.defaultQueue} is not among the configured queues`,
        });
    }
    if (config.worker.poolSize < names.length) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['worker', 'poolSize'],
            message: `Must be at least the number of queues (${names.length})`,
        });
    }
    if (config.retry.maxDelayMs < config.retry.initialDelayMs) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['retry', 'maxDelayMs'], message: 'Must be at least initialDelayMs' });
    }
});

export type JobConfig = z.output<typeof jobConfigSchema>;
export type JobConfigInput = z.input<typeof jobConfigSchema>;
export type QueueDefinition = z.output<typeof queueDefinitionSchema>;

/** Validates untrusted input, e.g. a parsed config file, filling in defaults. */
export function parseJobConfig(raw: unknown): JobConfig {
    const parsed = jobConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    return parsed.data;
}

/** Defaults with each given section merged over them. */
export function defineJobConfig(partial: JobConfigInput = {}): JobConfig {
    return parseJobConfig(partial);
}

export function developmentConfig(): JobConfig {
    return defineJobConfig({
        worker: { poolSize: 3 },
    });
}

export function productionConfig(): JobConfig {
    return defineJobConfig({
        worker: { poolSize: 20 },
        retry: { maxAttempts: 5 },
    });
}

/**
 * Splits a pool across queues in proportion to weight, never handing out more
 * than `poolSize` workers nor more than `maxPerQueue` to one queue. Each queue
 * gets one worker first, heaviest first, while the pool lasts; leftover slots
 * go to the largest deficit against the weighted share, ties to the earlier
 * queue.
 */
export function allocateWorkers(poolSize: number, queues: readonly QueueDefinition[], maxPerQueue: number = Infinity): Map<string, number> {
    const allocation = new Map<string, number>();
    if (queues.length === 0) return allocation;

    const cap = Math.max(1, maxPerQueue);
    const total = Math.max(0, Math.min(poolSize, cap * queues.length));

    for (const queue of queues) {
        allocation.set(queue.name, 0);
    }

    let remaining = total;
    const byWeight = [...queues].sort((a, b) => b.weight - a.weight);
    for (const queue of byWeight) {
        if (remaining === 0) break;
        allocation.set(queue.name, 1);
        remaining--;
    }

    const totalWeight = queues.reduce((sum, queue) => sum + queue.weight, 0);

    while (remaining > 0) {
        let best: QueueDefinition | null = null;
        let bestDeficit = -Infinity;

        for (const queue of queues) {
            const current = allocation.get(queue.name) ?? 0;
            if (current >= cap) continue;
            const deficit = (queue.weight / totalWeight) * total - current;
            if (deficit > bestDeficit) {
                best = queue;
                bestDeficit = deficit;
            }
        }

        if (!best) break;
        allocation.set(best.name, (allocation.get(best.name) ?? 0) + 1);
        remaining--;
    }

    return allocation;
}
