export interface ExponentialBackoffOptions {
    initialDelayMs?: number;
    maxDelayMs?: number;
    multiplier?: number;
    /** Fraction of the delay used as symmetric jitter, clamped to [0, 1]. */
    jitter?: number;
    random?: () => number;
}

export class ExponentialBackoff {
    readonly initialDelayMs: number;
    readonly maxDelayMs: number;
    readonly multiplier: number;
    readonly jitter: number;
    private readonly random: () => number;

    constructor(options: ExponentialBackoffOptions = {}) {
        this.initialDelayMs = options.initialDelayMs ?? 1000;
        this.maxDelayMs = options.maxDelayMs ?? 3_600_000;
        this.multiplier = options.multiplier ?? 2;
        this.jitter = Math.min(1, Math.max(0, options.jitter ?? 0.1));
        this.random = options.random ?? Math.random;
    }

    withJitter(jitter: number): ExponentialBackoff {
        return new ExponentialBackoff({
            initialDelayMs: this.initialDelayMs,
            maxDelayMs: this.maxDelayMs,
            multiplier: this.multiplier,
            jitter,
            random: this.random,
        });
    }

    /**
     * Attempt 0 returns the initial delay untouched. From attempt 1 on the delay
     * is initial * multiplier^(attempt - 1), capped, then jittered by up to
     * +/- delay * jitter and floored at zero.
     */
    calculateDelay(attempt: number): number {
        if (attempt <= 0) {
            return this.initialDelayMs;
        }

        const exponential = this.initialDelayMs * Math.pow(this.multiplier, attempt - 1);
        const capped = Math.min(exponential, this.maxDelayMs);

        if (this.jitter === 0) {
            return capped;
        }

        const range = capped * this.jitter;
        const offset = (this.random() * 2 - 1) * range;
        return Math.max(0, capped + offset);
    }
}
