import {
  MemoryStorageAdapter,
  Job,
  JobPriority,
  ExecutionError,
  InvalidTransitionError,
  createJob,
  markStarted,
  markFailed,
  markCompleted,
} from '@jobline/core';

describe('MemoryStorageAdapter', () => {
  let storage: MemoryStorageAdapter;

  const makeJob = (
    id: string,
    options: { priority?: JobPriority; createdAt?: number; delayMs?: number; timeoutMs?: number } = {},
  ): Job =>
    createJob(
      'test',
      { id },
      { id, priority: options.priority, delayMs: options.delayMs, timeoutMs: options.timeoutMs },
      options.createdAt ?? Date.now(),
    );

  beforeEach(async () => {
    storage = new MemoryStorageAdapter(10);
    await storage.connect();
  });

  afterEach(async () => {
    await storage.disconnect();
  });

  describe('enqueue', () => {
    it('should enqueue a job successfully', async () => {
      const result = await storage.enqueue(makeJob('job-1'));

      expect(result).toBe(true);
      expect(await storage.size()).toBe(1);
    });

    it('should reject a job when at capacity', async () => {
      for (let i = 0; i < 10; i++) {
        await storage.enqueue(makeJob(`job-${i}`));
      }

      expect(await storage.isFull()).toBe(true);
      expect(await storage.enqueue(makeJob('overflow'))).toBe(false);
      expect(await storage.getJob('overflow')).toBeNull();
    });

    it('should count delayed jobs towards capacity', async () => {
      const small = new MemoryStorageAdapter(2);
      await small.enqueue(makeJob('now'));
      await small.enqueue(makeJob('later', { delayMs: 60_000 }));

      expect(await small.enqueue(makeJob('third'))).toBe(false);
    });

    it('should refuse terminal jobs', async () => {
      const job = makeJob('done');
      markStarted(job, 'w');
      markCompleted(job);

      await expect(storage.enqueue(job)).rejects.toThrow(InvalidTransitionError);
    });

    it('should keep its own copy of the job', async () => {
      const job = makeJob('job-1');
      await storage.enqueue(job);
      job.tags.push('changed-by-caller');

      expect((await storage.getJob('job-1'))?.tags).toEqual([]);
    });
  });

  describe('dequeue', () => {
    it('should claim a job for one worker', async () => {
      await storage.enqueue(makeJob('job-1'));

      const job = await storage.dequeue('worker-a');

      expect(job?.id).toBe('job-1');
      expect(job?.status).toBe('running');
      expect(job?.workerId).toBe('worker-a');
      expect(await storage.dequeue('worker-b')).toBeNull();
      expect(await storage.getProcessingJobs()).toEqual(['job-1']);
    });

    it('should be FIFO within a priority tier', async () => {
      await storage.enqueue(makeJob('first'));
      await storage.enqueue(makeJob('second'));

      expect((await storage.dequeue('w'))?.id).toBe('first');
      expect((await storage.dequeue('w'))?.id).toBe('second');
    });

    it('should serve high priority first without starving low', async () => {
      for (let i = 0; i < 12; i++) {
        await storage.enqueue(makeJob(`high-${i}`, { priority: JobPriority.High }));
      }
      await storage.enqueue(makeJob('normal-0', { priority: JobPriority.Normal }));
      await storage.enqueue(makeJob('low-0', { priority: JobPriority.Low }));

      const order: string[] = [];
      for (let i = 0; i < 14; i++) {
        const job = await storage.dequeue('w');
        if (job) order.push(job.id);
      }

      expect(order[0]).toBe('high-0');
      expect(order.indexOf('normal-0')).toBe(1);
      expect(order.indexOf('low-0')).toBeLessThan(13);
      expect(order).toHaveLength(14);
    });

    it('should never hand out a job before its scheduled time', async () => {
      await storage.enqueue(makeJob('later', { delayMs: 60_000 }));

      expect(await storage.dequeue('w')).toBeNull();
      expect((await storage.stats()).delayed).toBe(1);
    });

    it('should wait for a job up to the timeout', async () => {
      const pending = storage.dequeue('w', 1000);
      await storage.enqueue(makeJob('arrives'));

      const job = await pending;
      expect(job?.id).toBe('arrives');
      expect(job?.workerId).toBe('w');
    });

    it('should return null when the wait times out', async () => {
      expect(await storage.dequeue('w', 20)).toBeNull();
    });

    it('should hand each job to exactly one of many concurrent callers', async () => {
      for (let i = 0; i < 50; i++) {
        await storage.enqueue(makeJob(`job-${i}`));
      }

      const claims = await Promise.all(
        Array.from({ length: 80 }, (_, i) => storage.dequeue(`worker-${i % 4}`)),
      );
      const ids = claims.filter((job): job is Job => job !== null).map(job => job.id);

      expect(ids).toHaveLength(50);
      expect(new Set(ids).size).toBe(50);
    });
  });

  describe('delayed jobs and retries', () => {
    it('should promote due jobs and leave the rest', async () => {
      const now = Date.now();
      await storage.enqueue(makeJob('soon', { delayMs: 1000 }));
      await storage.enqueue(makeJob('much-later', { delayMs: 60_000 }));

      expect(await storage.promoteDueJobs(now + 5000)).toBe(1);
      expect((await storage.dequeue('w'))?.id).toBe('soon');
      expect((await storage.stats()).delayed).toBe(1);
    });

    it('should keep a retried job failed until promoted', async () => {
      await storage.enqueue(makeJob('job-1'));
      const job = await storage.dequeue('w');
      if (!job) throw new Error('expected a job');

      markStarted(job, 'w');
      markFailed(job, new ExecutionError('boom'));
      await storage.scheduleRetry(job, Date.now() + 10_000);

      const stored = await storage.getJob('job-1');
      expect(stored?.status).toBe('failed');
      expect(stored?.workerId).toBeNull();
      expect(await storage.getProcessingJobs()).toEqual([]);
      expect(await storage.dequeue('w')).toBeNull();

      await storage.promoteDueJobs(Date.now() + 20_000);
      const retried = await storage.dequeue('w');
      expect(retried?.id).toBe('job-1');
      expect(retried?.attempt).toBe(1);
    });

    it('should schedule a retry even when at capacity', async () => {
      const small = new MemoryStorageAdapter(1);
      await small.enqueue(makeJob('a'));
      const job = await small.dequeue('w');
      if (!job) throw new Error('expected a job');
      await small.enqueue(makeJob('b'));

      markStarted(job, 'w');
      markFailed(job, new ExecutionError('boom'));
      await small.scheduleRetry(job, Date.now() + 1000);

      expect(await small.size()).toBe(2);
    });

    it('should only schedule retries for failed or timed out jobs', async () => {
      await expect(storage.scheduleRetry(makeJob('fresh'), Date.now())).rejects.toThrow(InvalidTransitionError);
    });
  });

  describe('eviction and cancellation', () => {
    it('should evict the oldest waiting job and cancel it', async () => {
      await storage.enqueue(makeJob('newer', { createdAt: 2000 }));
      await storage.enqueue(makeJob('oldest', { createdAt: 1000, priority: JobPriority.Low }));

      const evicted = await storage.evictOldest();

      expect(evicted?.id).toBe('oldest');
      expect(evicted?.status).toBe('cancelled');
      expect(await storage.size()).toBe(1);
    });

    it('should return null when nothing is waiting', async () => {
      expect(await storage.evictOldest()).toBeNull();
    });

    it('should cancel only waiting jobs', async () => {
      await storage.enqueue(makeJob('waiting'));
      await storage.enqueue(makeJob('taken'));
      await storage.dequeue('w'); // claims "waiting"

      expect(await storage.cancel('waiting')).toBe(false);
      expect(await storage.cancel('taken')).toBe(true);
      expect((await storage.getJob('taken'))?.status).toBe('cancelled');
      expect(await storage.cancel('missing')).toBe(false);
    });
  });

  describe('recovery and queries', () => {
    it('should return stuck jobs to the front of their tier', async () => {
      await storage.enqueue(makeJob('stuck', { timeoutMs: 0 }));
      await storage.enqueue(makeJob('next'));
      await storage.dequeue('crashed-worker');

      expect(await storage.recoverStuckJobs(0)).toBe(1);

      const job = await storage.dequeue('w');
      expect(job?.id).toBe('stuck');
      expect(job?.startedAt).toBeNull();
    });

    it('should leave recently claimed jobs alone', async () => {
      await storage.enqueue(makeJob('busy'));
      await storage.dequeue('w');

      expect(await storage.recoverStuckJobs(60_000)).toBe(0);
    });

    it('should not recover a job still within its own timeout', async () => {
      await storage.enqueue(makeJob('long', { timeoutMs: 600_000 }));
      await storage.dequeue('w');

      expect(await storage.recoverStuckJobs(0)).toBe(0);
      expect((await storage.getJob('long'))?.status).toBe('running');
      expect(await storage.getProcessingJobs()).toEqual(['long']);
    });

    it('should list jobs by query', async () => {
      await storage.enqueue(makeJob('a'));
      await storage.enqueue(makeJob('b'));
      await storage.dequeue('w');

      const running = await storage.listJobs({ status: 'running' });
      expect(running.map(job => job.id)).toEqual(['a']);
      expect(await storage.listJobs({ workerId: 'nobody' })).toEqual([]);
    });

    it('should track status changes made directly', async () => {
      await storage.enqueue(makeJob('a'));
      await storage.updateJobStatus('a', 'running');
      expect(await storage.getProcessingJobs()).toEqual(['a']);

      await storage.updateJobStatus('a', 'completed');
      const job = await storage.getJob('a');
      expect(job?.status).toBe('completed');
      expect(job?.completedAt).not.toBeNull();
      expect(await storage.getProcessingJobs()).toEqual([]);
    });

    it('should forget finished jobs after the retention window', async () => {
      const store = new MemoryStorageAdapter(0, 1000);
      await store.enqueue(makeJob('done'));
      await store.enqueue(makeJob('waiting'));
      const claimed = await store.dequeue('w');
      if (!claimed) throw new Error('expected a claimed job');
      markStarted(claimed, 'w');
      markCompleted(claimed);
      await store.saveJob(claimed);

      expect(store.pruneFinishedJobs(Date.now() + 500)).toBe(0);
      expect((await store.getJob('done'))?.status).toBe('completed');

      expect(store.pruneFinishedJobs(Date.now() + 2000)).toBe(1);
      expect(await store.getJob('done')).toBeNull();
      expect((await store.getJob('waiting'))?.status).toBe('pending');
    });

    it('should keep finished jobs forever with a zero retention window', async () => {
      const store = new MemoryStorageAdapter(0, 0);
      await store.enqueue(makeJob('gone'));
      await store.cancel('gone');

      expect(store.pruneFinishedJobs(Date.now() + 10 * 86_400_000)).toBe(0);
      expect((await store.getJob('gone'))?.status).toBe('cancelled');
    });

    it('should report stats by tier', async () => {
      await storage.enqueue(makeJob('h', { priority: JobPriority.High }));
      await storage.enqueue(makeJob('l', { priority: JobPriority.Low }));
      await storage.enqueue(makeJob('d', { delayMs: 60_000 }));

      expect(await storage.stats()).toEqual({
        pending: 2,
        delayed: 1,
        processing: 0,
        total: 3,
        byPriority: { high: 1, normal: 0, low: 1 },
      });
    });
  });
});
