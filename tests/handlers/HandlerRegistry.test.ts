import { z } from 'zod';
import {
  ExecutionError,
  HandlerRegistry,
  JobContext,
  JobResult,
  createJob,
  silentLogger,
} from '@jobline/core';

const context = (): JobContext => ({
  signal: new AbortController().signal,
  attempt: 1,
  maxAttempts: 3,
  queue: 'default',
  workerId: 'w1',
  startedAt: 0,
  timeoutMs: 1000,
  isLastAttempt: () => false,
  logger: silentLogger,
});

describe('HandlerRegistry', () => {
  let registry: HandlerRegistry;

  beforeEach(() => {
    registry = new HandlerRegistry();
  });

  it('should dispatch on job type', async () => {
    const email = jest.fn(async () => JobResult.success('sent'));
    const report = jest.fn(async () => JobResult.success('built'));
    registry.register('email', email).register('report', report);

    const result = await registry.dispatch(createJob('report', {}), context());

    expect(result.data).toBe('built');
    expect(email).not.toHaveBeenCalled();
    expect(registry.jobTypes()).toEqual(['email', 'report']);
  });

  it('should fail jobs without a handler', async () => {
    const dispatched = registry.dispatch(createJob('unknown', null), context());

    await expect(dispatched).rejects.toBeInstanceOf(ExecutionError);
    await expect(registry.dispatch(createJob('unknown', null), context()))
      .rejects.toThrow('No handler registered for unknown');
  });

  it('should refuse a second handler for the same type', () => {
    registry.register('email', async () => JobResult.success());

    expect(() => registry.register('email', async () => JobResult.success()))
      .toThrow('Handler already registered for job type email');
  });

  it('should unregister handlers', () => {
    registry.register('email', async () => JobResult.success());

    expect(registry.unregister('email')).toBe(true);
    expect(registry.has('email')).toBe(false);
    expect(registry.unregister('email')).toBe(false);
  });

  describe('with a schema', () => {
    const invoiceSchema = z.object({ invoiceId: z.string(), amount: z.number().positive() });

    it('should hand the parsed payload to the handler', async () => {
      registry.registerWithSchema('invoice', invoiceSchema, async (job) =>
        JobResult.success(`${job.payload.invoiceId}:${job.payload.amount}`));

      const result = await registry.dispatch(createJob('invoice', { invoiceId: 'inv-1', amount: 12 }), context());

      expect(result.data).toBe('inv-1:12');
    });

    it('should reject an invalid payload as an execution error', async () => {
      const handler = jest.fn(async () => JobResult.success());
      registry.registerWithSchema('invoice', invoiceSchema, handler);

      await expect(registry.dispatch(createJob('invoice', { invoiceId: 'inv-1', amount: -5 }), context()))
        .rejects.toThrow('Invalid payload for invoice: amount: Number must be greater than 0');
      expect(handler).not.toHaveBeenCalled();
    });
  });
});
