// Core
export { Queue } from "./Queue";
export type { QueueOptions, JobDefaults } from "./Queue";
export { Worker } from "./worker/Worker";
export type { WorkerOptions } from "./worker/Worker";
export { WorkerStats, formatWorkerStats } from "./worker/WorkerStats";
export type { WorkerState, WorkerStatsSnapshot } from "./worker/WorkerStats";
export { Scheduler } from "./scheduler/Scheduler";
export type { SchedulerOptions } from "./scheduler/Scheduler";
export { JobRuntime } from "./runtime/JobRuntime";
export type { JobRuntimeOptions, StorageFactory } from "./runtime/JobRuntime";

// Types
export * from "./types/Job";
export * from "./types/JobStatus";
export * from "./types/JobPriority";
export * from "./types/JobQuery";
export { JobResult } from "./types/JobResult";
export type { QueueEventMap, WorkerEventMap, DropReason } from "./types/QueueEvents";

// Errors
export * from "./errors/JobError";
export * from "./errors/QueueErrors";

// Retry
export * from "./retry/RetryPolicy";
export { ExponentialBackoff } from "./retry/ExponentialBackoff";
export type { ExponentialBackoffOptions } from "./retry/ExponentialBackoff";
export { RetryHistory, RetryHistoryStore } from "./retry/RetryHistory";
export type { RetryAttempt } from "./retry/RetryHistory";

// Handlers, dead letters, batches
export { HandlerRegistry } from "./handlers/HandlerRegistry";
export type { JobHandler, JobContext } from "./handlers/HandlerRegistry";
export { DeadLetterQueue } from "./deadletter/DeadLetterQueue";
export type { DeadLetter, DeadLetterAlert, DeadLetterQueueOptions } from "./deadletter/DeadLetterQueue";
export { runBatch, batchToJobResult } from "./batch/runBatch";
export type { BatchSummary, BatchItemError, BatchOptions } from "./batch/runBatch";

// Storage (for implementing custom adapters)
export type { StorageAdapter, QueueStats } from "./storage/StorageAdapter";
export { MemoryStorageAdapter } from "./storage/MemoryStorageAdapter";
export { getMemoryStorage, clearMemoryStorageRegistry } from "./storage/StorageRegistry";

// Queue strategies
export { OverflowStrategy } from "./queue/OverflowStrategy";
export { WeightedRoundRobin } from "./queue/WeightedRoundRobin";

// Config, logging, metrics
export * from "./config/JobConfig";
export { consoleLogger, silentLogger } from "./logging/logger";
export type { Logger, LogFields } from "./logging/logger";
export { MetricsCollector } from "./metrics/MetricsCollector";
export type { MetricsSnapshot } from "./metrics/MetricsCollector";
