import Redis from "ioredis";

export interface RedisConfig {
    queueName: string;
    host?: string;
    port?: number;
    password?: string;
    db?: number;
    /** Namespace for every key the adapter writes. */
    keyPrefix?: string;
    /** Waiting jobs allowed, 0 for unbounded. */
    capacity?: number;
    /** Seconds a finished job's hash is kept before Redis expires it, 0 to keep forever. */
    finishedJobTtlSeconds?: number;
    /** Poll interval while a dequeue waits for work. */
    dequeuePollIntervalMs?: number;
    /** Reuse an existing connection instead of opening one. */
    client?: Redis;
}

export const DEFAULT_KEY_PREFIX = 'jobline';
