import { randomUUID } from "node:crypto";
import { z } from "zod";
import { JobPriority } from "./JobPriority";
import { JobStatus, isRetryable, isTerminal } from "./JobStatus";
import { JobErrorSnapshot, JobError } from "../errors/JobError";
import { InvalidTransitionError } from "../errors/QueueErrors";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_JOB_TIMEOUT_MS = 300_000;
export const DEFAULT_QUEUE = 'default';
/** Longest delay a Node timer accepts (2^31 - 1 ms, about 24.8 days). */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * A unit of deferred work. Plain data so that any store can persist it; the
 * functions in this module are the only sanctioned way to move it through its
 * lifecycle. All timestamps are epoch milliseconds.
 */
export interface Job<T = unknown> {
  id: string;
  jobType: string;
  payload: T;
  priority: JobPriority;
  queue: string;
  status: JobStatus;
  attempt: number;
  maxAttempts: number;
  createdAt: number;
  scheduledFor: number | null;
  startedAt: number | null;
  completedAt: number | null;
  workerId: string | null;
  tags: string[];
  metadata: Record<string, string>;
  timeoutMs: number;
  error: JobErrorSnapshot | null;
}

export interface JobOptions {
  id?: string;
  queue?: string;
  priority?: JobPriority;
  maxAttempts?: number;
  timeoutMs?: number;
  /** Absolute execution time. Wins over `delayMs`. */
  scheduledFor?: number | Date;
  delayMs?: number;
  tags?: string[];
  metadata?: Record<string, string>;
}

export function createJob<T>(jobType: string, payload: T, options: JobOptions = {}, now: number = Date.now()): Job<T> {
  let scheduledFor: number | null = null;
  if (options.scheduledFor !== undefined) {
    scheduledFor = options.scheduledFor instanceof Date ? options.scheduledFor.getTime() : options.scheduledFor;
  } else if (options.delayMs !== undefined && options.delayMs > 0) {
    scheduledFor = now + options.delayMs;
  }

  return {
    id: options.id ?? randomUUID(),
    jobType,
    payload,
    priority: options.priority ?? JobPriority.Normal,
    queue: options.queue ?? DEFAULT_QUEUE,
    status: 'pending',
    attempt: 0,
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    createdAt: now,
    scheduledFor,
    startedAt: null,
    completedAt: null,
    workerId: null,
    tags: [...(options.tags ?? [])],
    metadata: { ...(options.metadata ?? {}) },
    timeoutMs: Math.min(options.timeoutMs ?? DEFAULT_JOB_TIMEOUT_MS, MAX_TIMEOUT_MS),
    error: null,
  };
}

function transition(job: Job, to: JobStatus, allowed: readonly JobStatus[]): void {
  if (isTerminal(job.status) || !allowed.includes(job.status)) {
    throw new InvalidTransitionError(job.id, job.status, to);
  }
  job.status = to;
}

export function isScheduled(job: Job): boolean {
  return job.scheduledFor !== null;
}

/** A job is due when it has no schedule or its schedule has elapsed. */
export function shouldExecuteNow(job: Job, now: number = Date.now()): boolean {
  return job.scheduledFor === null || job.scheduledFor <= now;
}

export function timeUntilExecution(job: Job, now: number = Date.now()): number | null {
  if (job.scheduledFor === null) return null;
  return Math.max(0, job.scheduledFor - now);
}

// The store claims a job by setting it running before the worker records the
// attempt, so starting is allowed from either state.
export function markStarted(job: Job, workerId: string, now: number = Date.now()): void {
  transition(job, 'running', ['pending', 'running']);
  job.workerId = workerId;
  job.startedAt = now;
  job.completedAt = null;
  job.attempt++;
}

export function markCompleted(job: Job, now: number = Date.now()): void {
  transition(job, 'completed', ['running']);
  job.completedAt = now;
  job.error = null;
}

export function markFailed(job: Job, error: JobError, now: number = Date.now()): void {
  transition(job, 'failed', ['running']);
  job.completedAt = now;
  job.error = error.toSnapshot();
}

export function markTimedOut(job: Job, error: JobError, now: number = Date.now()): void {
  transition(job, 'timed_out', ['running']);
  job.completedAt = now;
  job.error = error.toSnapshot();
}

export function markDead(job: Job, now: number = Date.now()): void {
  transition(job, 'dead', ['running', 'failed', 'timed_out']);
  job.completedAt = now;
  job.workerId = null;
}

export function markCancelled(job: Job, now: number = Date.now()): void {
  transition(job, 'cancelled', ['pending', 'running', 'failed', 'timed_out']);
  job.completedAt = now;
  job.workerId = null;
}

/** Back into rotation: a retry whose delay elapsed, or a job recovered from a lost worker. */
export function markPending(job: Job): void {
  transition(job, 'pending', ['pending', 'running', 'failed', 'timed_out']);
  job.workerId = null;
}

export function canRetry(job: Job): boolean {
  return isRetryable(job.status) && job.attempt < job.maxAttempts;
}

export function hasTimedOut(job: Job, now: number = Date.now()): boolean {
  if (job.startedAt === null) return false;
  return now - job.startedAt > job.timeoutMs;
}

export function jobDuration(job: Job): number | null {
  if (job.startedAt === null || job.completedAt === null) return null;
  return job.completedAt - job.startedAt;
}

const jobErrorSnapshotSchema = z.object({
  kind: z.enum(['execution', 'timeout', 'cancelled']),
  message: z.string(),
  timeoutMs: z.number().int().nonnegative().optional(),
});

const jobSchema = z.object({
  id: z.string().min(1),
  jobType: z.string().min(1),
  payload: z.unknown(),
  priority: z.nativeEnum(JobPriority),
  queue: z.string().min(1),
  status: z.enum(['pending', 'running', 'completed', 'failed', 'timed_out', 'dead', 'cancelled']),
  attempt: z.number().int().nonnegative(),
  maxAttempts: z.number().int().nonnegative(),
  createdAt: z.number(),
  scheduledFor: z.number().nullable(),
  startedAt: z.number().nullable(),
  completedAt: z.number().nullable(),
  workerId: z.string().nullable(),
  tags: z.array(z.string()),
  metadata: z.record(z.string()),
  timeoutMs: z.number().int().nonnegative().max(MAX_TIMEOUT_MS),
  error: jobErrorSnapshotSchema.nullable(),
});

export function serializeJob(job: Job): string {
  return JSON.stringify(job);
}

/** Validates a decoded job record. The payload stays opaque until a handler interprets it. */
export function parseJob(value: unknown): Job {
  const data = jobSchema.parse(value);
  return { ...data, payload: data.payload };
}

export function deserializeJob(raw: string): Job {
  return parseJob(JSON.parse(raw));
}

export function cloneJob<T>(job: Job<T>): Job<T> {
  return {
    ...job,
    tags: [...job.tags],
    metadata: { ...job.metadata },
    error: job.error ? { ...job.error } : null,
  };
}
