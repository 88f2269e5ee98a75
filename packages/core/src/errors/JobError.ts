export type JobErrorKind = 'execution' | 'timeout' | 'cancelled';

export interface JobErrorSnapshot {
    kind: JobErrorKind;
    message: string;
    timeoutMs?: number;
}

/**
 * Errors raised while executing a job. Handlers may throw anything; the worker
 * normalizes it through {@link toJobError} before deciding the transition.
 */
export abstract class JobError extends Error {
    abstract readonly kind: JobErrorKind;

    toSnapshot(): JobErrorSnapshot {
        return { kind: this.kind, message: this.message };
    }
}

/** Business failure reported by a handler. */
export class ExecutionError extends JobError {
    readonly kind = 'execution' as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ExecutionError';
    }
}

export class TimeoutError extends JobError {
    readonly kind = 'timeout' as const;
    readonly timeoutMs: number;

    constructor(timeoutMs: number) {
        super(`Job timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }

    override toSnapshot(): JobErrorSnapshot {
        return { kind: this.kind, message: this.message, timeoutMs: this.timeoutMs };
    }
}

/** Explicit cancellation. Never retried. */
export class CancelledError extends JobError {
    readonly kind = 'cancelled' as const;

    constructor(message: string = 'Job cancelled') {
        super(message);
        this.name = 'CancelledError';
    }
}

export function toJobError(error: unknown): JobError {
    if (error instanceof JobError) return error;
    if (error instanceof Error) return new ExecutionError(error.message, { cause: error });
    return new ExecutionError(String(error));
}

export function fromSnapshot(snapshot: JobErrorSnapshot): JobError {
    switch (snapshot.kind) {
        case 'timeout':
            return new TimeoutError(snapshot.timeoutMs ?? 0);
        case 'cancelled':
            return new CancelledError(snapshot.message);
        case 'execution':
            return new ExecutionError(snapshot.message);
    }
}
