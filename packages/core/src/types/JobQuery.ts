import { Job } from "./Job";
import { JobStatus } from "./JobStatus";

export interface JobQuery {
  status?: JobStatus;
  queue?: string;
  jobType?: string;
  workerId?: string;
  /** Every listed tag must be present on the job. */
  tags?: string[];
  createdAfter?: number;
  createdBefore?: number;
  limit?: number;
  offset?: number;
}

export function matchesQuery(job: Job, query: JobQuery): boolean {
  if (query.status !== undefined && job.status !== query.status) return false;
  if (query.queue !== undefined && job.queue !== query.queue) return false;
  if (query.jobType !== undefined && job.jobType !== query.jobType) return false;
  if (query.workerId !== undefined && job.workerId !== query.workerId) return false;
  if (query.tags && !query.tags.every(tag => job.tags.includes(tag))) return false;
  if (query.createdAfter !== undefined && job.createdAt <= query.createdAfter) return false;
  if (query.createdBefore !== undefined && job.createdAt >= query.createdBefore) return false;
  return true;
}

export function filterJobs(jobs: Iterable<Job>, query: JobQuery): Job[] {
  const matched: Job[] = [];
  for (const job of jobs) {
    if (matchesQuery(job, query)) matched.push(job);
  }
  const offset = query.offset ?? 0;
  const end = query.limit !== undefined ? offset + query.limit : undefined;
  return matched.slice(offset, end);
}
