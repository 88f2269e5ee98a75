export type JobStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'timed_out'
  | 'dead'
  | 'cancelled'

export const JOB_STATUSES: readonly JobStatus[] = [
  'pending',
  'running',
  'completed',
  'failed',
  'timed_out',
  'dead',
  'cancelled',
];

/** Completed, dead and cancelled jobs never change again. */
export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'dead' || status === 'cancelled';
}

export function isRetryable(status: JobStatus): boolean {
  return status === 'failed' || status === 'timed_out';
}

export function isActive(status: JobStatus): boolean {
  return status === 'pending' || status === 'running';
}
