import { JobError } from "../errors/JobError";
import { ExponentialBackoff } from "./ExponentialBackoff";

/**
 * Decides whether and when a failed job runs again. Policies are built once and
 * shared by every worker; none of them holds per-job state.
 */
export interface RetryPolicy {
    readonly name: string;
    /** Delay in ms before the next attempt, or null to give up. */
    calculateDelay(attempt: number, error: JobError): number | null;
    shouldRetry(error: JobError): boolean;
}

export interface RetryPolicyOptions {
    retryOnTimeout?: boolean;
}

abstract class BaseRetryPolicy implements RetryPolicy {
    abstract readonly name: string;
    private readonly retryOnTimeout: boolean;

    constructor(options: RetryPolicyOptions = {}) {
        this.retryOnTimeout = options.retryOnTimeout ?? true;
    }

    abstract calculateDelay(attempt: number, error: JobError): number | null;

    shouldRetry(error: JobError): boolean {
        if (error.kind === 'cancelled') return false;
        if (error.kind === 'timeout') return this.retryOnTimeout;
        return true;
    }
}

export class NoRetryPolicy implements RetryPolicy {
    readonly name = 'none';

    calculateDelay(): number | null {
        return null;
    }

    shouldRetry(): boolean {
        return false;
    }
}

export class FixedRetryPolicy extends BaseRetryPolicy {
    readonly name = 'fixed';
    readonly delayMs: number;
    readonly maxAttempts: number;

    constructor(options: { delayMs: number; maxAttempts: number } & RetryPolicyOptions) {
        super(options);
        this.delayMs = options.delayMs;
        this.maxAttempts = options.maxAttempts;
    }

    calculateDelay(attempt: number): number | null {
        return attempt < this.maxAttempts ? this.delayMs : null;
    }
}

export class ExponentialRetryPolicy extends BaseRetryPolicy {
    readonly name = 'exponential';
    readonly backoff: ExponentialBackoff;

    constructor(backoff: ExponentialBackoff = new ExponentialBackoff(), options: RetryPolicyOptions = {}) {
        super(options);
        this.backoff = backoff;
    }

    calculateDelay(attempt: number): number | null {
        return this.backoff.calculateDelay(attempt);
    }
}

export type CustomRetryFn = (attempt: number, error: JobError) => number | null;

export class CustomRetryPolicy extends BaseRetryPolicy {
    readonly name = 'custom';
    private readonly fn: CustomRetryFn;

    constructor(fn: CustomRetryFn, options: RetryPolicyOptions = {}) {
        super(options);
        this.fn = fn;
    }

    calculateDelay(attempt: number, error: JobError): number | null {
        const delay = this.fn(attempt, error);
        return delay === null ? null : Math.max(0, delay);
    }
}

export interface RetrySettings {
    enabled: boolean;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    jitter: number;
    retryOnTimeout: boolean;
}

export function retryPolicyFromConfig(settings: RetrySettings): RetryPolicy {
    if (!settings.enabled) {
        return new NoRetryPolicy();
    }
    const backoff = new ExponentialBackoff({
        initialDelayMs: settings.initialDelayMs,
        maxDelayMs: settings.maxDelayMs,
        multiplier: settings.backoffMultiplier,
        jitter: settings.jitter,
    });
    return new ExponentialRetryPolicy(backoff, { retryOnTimeout: settings.retryOnTimeout });
}
