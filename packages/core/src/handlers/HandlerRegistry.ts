import { z } from "zod";
import { Job } from "../types/Job";
import { JobResult } from "../types/JobResult";
import { ExecutionError } from "../errors/JobError";
import { Logger } from "../logging/logger";

export interface JobContext {
    /** Aborted when the job times out or the worker cancels it. */
    signal: AbortSignal;
    attempt: number;
    maxAttempts: number;
    queue: string;
    workerId: string;
    startedAt: number;
    timeoutMs: number;
    isLastAttempt(): boolean;
    logger: Logger;
}

export type JobHandler<T = unknown> = (job: Job<T>, context: JobContext) => Promise<JobResult>;

interface HandlerRegistration {
    handler: JobHandler;
}

/**
 * Maps job types to handlers. Payloads are opaque in the store; a handler
 * registered with a schema receives a payload parsed against it.
 */
export class HandlerRegistry {
    private handlers = new Map<string, HandlerRegistration>();

    register(jobType: string, handler: JobHandler): this {
        this.add(jobType, handler);
        return this;
    }

    registerWithSchema<S extends z.ZodTypeAny>(jobType: string, schema: S, handler: JobHandler<z.output<S>>): this {
        this.add(jobType, (job, context) => {
            const parsed = schema.safeParse(job.payload);
            if (!parsed.success) {
                const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'payload'}: ${issue.message}`);
                throw new ExecutionError(`Invalid payload for ${jobType}: ${issues.join('; ')}`);
            }
            return handler({ ...job, payload: parsed.data }, context);
        });
        return this;
    }

    private add(jobType: string, handler: JobHandler): void {
        if (this.handlers.has(jobType)) {
            throw new Error(`Handler already registered for job type ${jobType}`);
        }
        this.handlers.set(jobType, { handler });
    }

    unregister(jobType: string): boolean {
        return this.handlers.delete(jobType);
    }

    has(jobType: string): boolean {
        return this.handlers.has(jobType);
    }

    jobTypes(): string[] {
        return Array.from(this.handlers.keys());
    }

    async dispatch(job: Job, context: JobContext): Promise<JobResult> {
        const registration = this.handlers.get(job.jobType);
        if (!registration) {
            throw new ExecutionError(`No handler registered for ${job.jobType}`);
        }
        return registration.handler(job, context);
    }
}
