/**
 * Priority tiers. The numeric value doubles as the tier's dequeue weight, so a
 * full high tier is served ten times as often as a full low tier but the low
 * tier is never starved outright.
 */
export enum JobPriority {
  High = 100,
  Normal = 50,
  Low = 10,
}

export type PriorityName = 'high' | 'normal' | 'low';

export const PRIORITIES: readonly JobPriority[] = [JobPriority.High, JobPriority.Normal, JobPriority.Low];

export function priorityName(priority: JobPriority): PriorityName {
  switch (priority) {
    case JobPriority.High:
      return 'high';
    case JobPriority.Normal:
      return 'normal';
    case JobPriority.Low:
      return 'low';
  }
}

export function parsePriority(value: string): JobPriority | null {
  switch (value.trim().toLowerCase()) {
    case 'high':
      return JobPriority.High;
    case 'normal':
      return JobPriority.Normal;
    case 'low':
      return JobPriority.Low;
    default:
      return null;
  }
}

export function comparePriority(a: JobPriority, b: JobPriority): number {
  return a - b;
}
