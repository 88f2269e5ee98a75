import { randomUUID } from "node:crypto";
import { JobResult } from "../types/JobResult";
import { Logger, silentLogger } from "../logging/logger";

export interface BatchItemError {
    index: number;
    message: string;
}

export interface BatchSummary {
    batchId: string;
    name: string;
    processed: number;
    succeeded: number;
    failed: number;
    durationMs: number;
    errors: BatchItemError[];
}

export interface BatchOptions {
    logger?: Logger;
    /** Checked between items; a set signal stops the batch early. */
    signal?: AbortSignal;
}

/**
 * Processes items one by one. A failing item is recorded and the batch moves
 * on; only an aborted signal ends it early.
 */
export async function runBatch<T>(
    name: string,
    items: Iterable<T> | AsyncIterable<T>,
    fn: (item: T, index: number) => Promise<void>,
    options: BatchOptions = {},
): Promise<BatchSummary> {
    const logger = options.logger ?? silentLogger;
    const startedAt = Date.now();
    const summary: BatchSummary = {
        batchId: randomUUID(),
        name,
        processed: 0,
        succeeded: 0,
        failed: 0,
        durationMs: 0,
        errors: [],
    };

    let index = 0;
    for await (const item of items) {
        if (options.signal?.aborted) break;

        try {
            await fn(item, index);
            summary.succeeded++;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            summary.failed++;
            summary.errors.push({ index, message });
            logger.warn('Batch item failed', { batch: name, index, error: message });
        }
        summary.processed++;
        index++;
    }

    summary.durationMs = Date.now() - startedAt;
    logger.info('Batch finished', {
        batch: name,
        processed: summary.processed,
        succeeded: summary.succeeded,
        failed: summary.failed,
    });
    return summary;
}

/** A batch with at least one successful item counts as a successful job. */
export function batchToJobResult(summary: BatchSummary): JobResult {
    const result = summary.failed > 0 && summary.succeeded === 0
        ? JobResult.failure(`Batch ${summary.name} failed for all ${summary.failed} items`)
        : JobResult.success(summary);

    return JobResult.withMetadata(
        JobResult.withMetadata(
            JobResult.withMetadata(result, 'batchId', summary.batchId),
            'processed', String(summary.processed),
        ),
        'failed', String(summary.failed),
    );
}
