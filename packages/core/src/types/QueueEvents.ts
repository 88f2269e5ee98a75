import { Job } from "./Job";
import { JobResult } from "./JobResult";
import { JobErrorSnapshot } from "../errors/JobError";
import { RetryAttempt } from "../retry/RetryHistory";
import { DeadLetter } from "../deadletter/DeadLetterQueue";
import { WorkerState } from "../worker/WorkerStats";

/** NOTHING_TO_EVICT: DROP_OLDEST found the queue full but no waiting job to evict. */
export type DropReason = 'DROP_NEWEST' | 'DROP_OLDEST' | 'NOTHING_TO_EVICT' | 'BLOCK_TIMEOUT';

interface QueueLifeCycleEvents {
  'queue:connected': { queue: string };
  'queue:disconnected': { queue: string };
  'queue:full': { queue: string; size: number };
  'job:added': { job: Job };
  'job:dropped': { job: Job; reason: DropReason };
  'job:cancelled': { job: Job };
}

interface WorkerLifeCycleEvents {
  'worker:started': { workerId: string; queue: string };
  'worker:paused': { workerId: string };
  'worker:resumed': { workerId: string };
  'worker:stopped': { workerId: string; state: WorkerState };
  'worker:error': { workerId: string; error: unknown; context: string };
  'worker:recovered': { workerId: string; count: number };
}

interface JobExecutionEvents {
  'job:started': { job: Job; workerId: string };
  'job:completed': { job: Job; result: JobResult; duration: number };
  'job:retry': { job: Job; attempt: RetryAttempt; nextAttemptAt: number };
  'job:dead': { job: Job; error: JobErrorSnapshot; deadLetter: DeadLetter | null };
  'job:cancelled': { job: Job };
}

export type QueueEventMap = QueueLifeCycleEvents;
export type WorkerEventMap = WorkerLifeCycleEvents & JobExecutionEvents;
