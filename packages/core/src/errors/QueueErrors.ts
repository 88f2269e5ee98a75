import { JobStatus } from "../types/JobStatus";

export class QueueFullError extends Error {
    readonly queueName: string;

    constructor(queueName: string, message: string) {
        super(message);
        this.name = 'QueueFullError';
        this.queueName = queueName;
    }
}

export class InvalidTransitionError extends Error {
    readonly jobId: string;
    readonly from: JobStatus;
    readonly to: JobStatus;

    constructor(jobId: string, from: JobStatus, to: JobStatus) {
        super(`Job ${jobId} cannot move from ${from} to ${to}`);
        this.name = 'InvalidTransitionError';
        this.jobId = jobId;
        this.from = from;
        this.to = to;
    }
}

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid job configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
