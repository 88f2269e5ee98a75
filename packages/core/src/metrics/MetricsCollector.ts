import { Queue } from "../Queue";
import { Worker } from "../worker/Worker";
import { DeadLetterQueue } from "../deadletter/DeadLetterQueue";
import { QueueEventMap, WorkerEventMap } from "../types/QueueEvents";

export interface MetricsSnapshot {
  jobsAdded: number;
  jobsCompleted: number;
  jobsFailed: number;
  jobsDead: number;
  jobsCancelled: number;
  jobsDropped: number;
  totalRetries: number;
  deadLetterAlerts: number;

  queueSize: number;
  activeWorkers: number;
  idleWorkers: number;

  avgProcessingTime: number;
  maxProcessingTime: number;
  minProcessingTime: number;

  p50ProcessingTime: number;
  p95ProcessingTime: number;
  p99ProcessingTime: number;

  jobsPerSecond: number;

  successRate: number; // percentage
  errorRate: number; // percentage

  uptimeMs: number;
}

/**
 * Aggregates the events of the queues and workers it is attached to. Nothing
 * here is global; each runtime owns its own collector.
 */
export class MetricsCollector {
  private jobsAdded: number = 0
  private jobsCompleted: number = 0
  private jobsFailed: number = 0
  private jobsDead: number = 0
  private jobsCancelled: number = 0
  private jobsDropped: number = 0
  private totalRetries: number = 0
  private deadLetterAlerts: number = 0

  private queueSize: number = 0
  private busyWorkers = new Set<string>()
  private knownWorkers = new Set<string>()

  // ring buffer of recent durations for percentiles
  private readonly maxSamples: number;
  private processingTimes: number[] = []
  private processingTimeIndex: number = 0;

  private totalProcessingTime: number = 0;
  private processedCount: number = 0;
  private maxProcessingTime: number = 0;
  private minProcessingTime: number = Infinity;

  private startTime: number = Date.now();
  private lastThroughputCheck: number = Date.now();
  private jobsSinceLastCheck: number = 0;
  private currentThroughput: number = 0;

  constructor(maxSamples: number = 1000) {
    this.maxSamples = maxSamples;
  }

  attachQueue(queue: Queue): void {
    queue.on('job:added', () => this.jobsAdded++);
    queue.on('job:dropped', () => this.jobsDropped++);
    queue.on('job:cancelled', () => this.jobsCancelled++);
    queue.on('queue:full', (event: QueueEventMap['queue:full']) => this.updateQueueSize(event.size));
  }

  attachWorker(worker: Worker): void {
    this.knownWorkers.add(worker.getId());

    worker.on('job:started', (event: WorkerEventMap['job:started']) => {
      this.busyWorkers.add(event.workerId);
    });
    worker.on('job:completed', (event: WorkerEventMap['job:completed']) => {
      this.busyWorkers.delete(worker.getId());
      this.jobsCompleted++;
      this.jobsSinceLastCheck++;
      this.recordProcessingTime(event.duration);
      this.updateThroughput();
    });
    worker.on('job:retry', () => {
      this.busyWorkers.delete(worker.getId());
      this.jobsFailed++;
      this.totalRetries++;
    });
    worker.on('job:dead', () => {
      this.busyWorkers.delete(worker.getId());
      this.jobsFailed++;
      this.jobsDead++;
    });
    worker.on('job:cancelled', () => {
      this.busyWorkers.delete(worker.getId());
      this.jobsCancelled++;
    });
    worker.on('worker:stopped', () => {
      this.busyWorkers.delete(worker.getId());
    });
  }

  attachDeadLetterQueue(deadLetterQueue: DeadLetterQueue): void {
    deadLetterQueue.on('alert', () => this.deadLetterAlerts++);
  }

  recordProcessingTime(durationMs: number): void {
    if (this.processingTimes.length < this.maxSamples) {
      this.processingTimes.push(durationMs);
    } else {
      this.processingTimes[this.processingTimeIndex] = durationMs;
      this.processingTimeIndex = (this.processingTimeIndex + 1) % this.maxSamples;
    }

    this.totalProcessingTime += durationMs;
    this.processedCount++;
    this.maxProcessingTime = Math.max(this.maxProcessingTime, durationMs);
    this.minProcessingTime = Math.min(this.minProcessingTime, durationMs);
  }

  updateQueueSize(size: number): void {
    this.queueSize = size
  }

  private updateThroughput(): void {
    const now = Date.now();
    const elapsed = now - this.lastThroughputCheck

    if (elapsed >= 1000) {
      this.currentThroughput = (this.jobsSinceLastCheck / elapsed) * 1000;
      this.lastThroughputCheck = now;
      this.jobsSinceLastCheck = 0;
    }
  }

  calculatePercentile(percentile: number): number {
    if (this.processingTimes.length === 0) return 0;

    const sorted = [...this.processingTimes].sort((a, b) => a - b);
    const index = Math.max(0, Math.ceil((percentile / 100) * sorted.length) - 1);
    return sorted[index] ?? 0;
  }

  getSnapshot(): MetricsSnapshot {
    const finished = this.jobsCompleted + this.jobsDead;

    return {
      jobsAdded: this.jobsAdded,
      jobsCompleted: this.jobsCompleted,
      jobsFailed: this.jobsFailed,
      jobsDead: this.jobsDead,
      jobsCancelled: this.jobsCancelled,
      jobsDropped: this.jobsDropped,
      totalRetries: this.totalRetries,
      deadLetterAlerts: this.deadLetterAlerts,

      queueSize: this.queueSize,
      activeWorkers: this.busyWorkers.size,
      idleWorkers: this.knownWorkers.size - this.busyWorkers.size,

      avgProcessingTime: this.processedCount > 0 ? this.totalProcessingTime / this.processedCount : 0,
      maxProcessingTime: this.maxProcessingTime,
      minProcessingTime: this.minProcessingTime === Infinity ? 0 : this.minProcessingTime,

      p50ProcessingTime: this.calculatePercentile(50),
      p95ProcessingTime: this.calculatePercentile(95),
      p99ProcessingTime: this.calculatePercentile(99),

      jobsPerSecond: this.currentThroughput,

      successRate: finished > 0 ? (this.jobsCompleted / finished) * 100 : 0,
      errorRate: finished > 0 ? (this.jobsDead / finished) * 100 : 0,

      uptimeMs: Date.now() - this.startTime
    }
  }

  reset(): void {
    this.jobsAdded = 0
    this.jobsCompleted = 0
    this.jobsFailed = 0
    this.jobsDead = 0
    this.jobsCancelled = 0
    this.jobsDropped = 0
    this.totalRetries = 0
    this.deadLetterAlerts = 0

    this.queueSize = 0
    this.busyWorkers.clear()

    this.processingTimes = []
    this.processingTimeIndex = 0;

    this.totalProcessingTime = 0;
    this.processedCount = 0;
    this.maxProcessingTime = 0;
    this.minProcessingTime = Infinity;

    this.startTime = Date.now();
    this.lastThroughputCheck = Date.now();
    this.jobsSinceLastCheck = 0;
    this.currentThroughput = 0;
  }

  toPrometheusFormat(): string {
    const snapshot = this.getSnapshot();
    return [
      '# HELP jobline_jobs_added_total Total jobs added to queues',
      '# TYPE jobline_jobs_added_total counter',
      `jobline_jobs_added_total ${snapshot.jobsAdded}`,
      '',
      '# HELP jobline_jobs_completed_total Total jobs completed successfully',
      '# TYPE jobline_jobs_completed_total counter',
      `jobline_jobs_completed_total ${snapshot.jobsCompleted}`,
      '',
      '# HELP jobline_jobs_failed_total Total failed executions, retried or not',
      '# TYPE jobline_jobs_failed_total counter',
      `jobline_jobs_failed_total ${snapshot.jobsFailed}`,
      '',
      '# HELP jobline_jobs_dead_total Total jobs moved to the dead letter queue',
      '# TYPE jobline_jobs_dead_total counter',
      `jobline_jobs_dead_total ${snapshot.jobsDead}`,
      '',
      '# HELP jobline_jobs_dropped_total Total jobs dropped on overflow',
      '# TYPE jobline_jobs_dropped_total counter',
      `jobline_jobs_dropped_total ${snapshot.jobsDropped}`,
      '',
      '# HELP jobline_retries_total Total retries scheduled',
      '# TYPE jobline_retries_total counter',
      `jobline_retries_total ${snapshot.totalRetries}`,
      '',
      '# HELP jobline_queue_size Last observed queue size',
      '# TYPE jobline_queue_size gauge',
      `jobline_queue_size ${snapshot.queueSize}`,
      '',
      '# HELP jobline_active_workers Workers currently running a job',
      '# TYPE jobline_active_workers gauge',
      `jobline_active_workers ${snapshot.activeWorkers}`,
      '',
      '# HELP jobline_processing_time_seconds Job processing time',
      '# TYPE jobline_processing_time_seconds summary',
      `jobline_processing_time_seconds{quantile="0.5"} ${snapshot.p50ProcessingTime / 1000}`,
      `jobline_processing_time_seconds{quantile="0.95"} ${snapshot.p95ProcessingTime / 1000}`,
      `jobline_processing_time_seconds{quantile="0.99"} ${snapshot.p99ProcessingTime / 1000}`,
    ].join('\n');
  }
}

export default MetricsCollector;
