import {
  Queue,
  Worker,
  JobResult,
  MemoryStorageAdapter,
  OverflowStrategy,
  QueueFullError,
  JobPriority,
  clearMemoryStorageRegistry,
  getMemoryStorage,
  silentLogger,
} from '@jobline/core';

describe('Queue', () => {
  let queue: Queue;

  beforeEach(() => {
    clearMemoryStorageRegistry();
  });

  afterEach(async () => {
    if (queue) {
      await queue.disconnect();
    }
  });

  describe('add', () => {
    it('should build and enqueue a job on this queue', async () => {
      queue = new Queue('emails', { logger: silentLogger });
      const added = jest.fn();
      queue.on('job:added', added);

      const job = await queue.add('send_email', { to: 'a@example.com' }, { priority: JobPriority.High });

      expect(job.queue).toBe('emails');
      expect(job.status).toBe('pending');
      expect(await queue.getSize()).toBe(1);
      expect(added).toHaveBeenCalledWith({ job });
      expect((await queue.getJob(job.id))?.priority).toBe(JobPriority.High);
    });

    it('should apply queue defaults under per-job options', async () => {
      queue = new Queue('defaults', { defaults: { maxAttempts: 7, timeoutMs: 500 }, logger: silentLogger });

      const a = await queue.add('t', null);
      const b = await queue.add('t', null, { maxAttempts: 1 });

      expect(a.maxAttempts).toBe(7);
      expect(a.timeoutMs).toBe(500);
      expect(b.maxAttempts).toBe(1);
    });

    it('should share the named memory store with other users of the name', async () => {
      queue = new Queue('shared', { logger: silentLogger });
      const other = new Queue('shared', { logger: silentLogger });

      await queue.add('t', 1);
      expect(await other.getSize()).toBe(1);
    });
  });

  describe('overflow', () => {
    it('should reject the incoming job with DROP_NEWEST', async () => {
      queue = new Queue('drop-newest', {
        storage: new MemoryStorageAdapter(2),
        overflowStrategy: OverflowStrategy.DROP_NEWEST,
        logger: silentLogger,
      });
      const dropped = jest.fn();
      queue.on('job:dropped', dropped);

      await queue.add('t', 1);
      await queue.add('t', 2);

      await expect(queue.add('t', 3)).rejects.toThrow(QueueFullError);
      expect(await queue.getSize()).toBe(2);
      expect(dropped).toHaveBeenCalledTimes(1);
      expect(dropped.mock.calls[0][0].reason).toBe('DROP_NEWEST');
      expect(dropped.mock.calls[0][0].job.payload).toBe(3);
    });

    it('should evict the oldest waiting job with DROP_OLDEST', async () => {
      queue = new Queue('drop-oldest', {
        storage: new MemoryStorageAdapter(2),
        overflowStrategy: OverflowStrategy.DROP_OLDEST,
        logger: silentLogger,
      });
      const dropped = jest.fn();
      queue.on('job:dropped', dropped);

      const first = await queue.add('t', 1);
      await queue.add('t', 2);
      const third = await queue.add('t', 3);

      expect(await queue.getSize()).toBe(2);
      expect((await queue.getJob(first.id))?.status).toBe('cancelled');
      expect((await queue.getJob(third.id))?.status).toBe('pending');
      expect(dropped.mock.calls[0][0]).toMatchObject({ reason: 'DROP_OLDEST' });
      expect(dropped.mock.calls[0][0].job.id).toBe(first.id);
    });

    it('should block until space frees up with BLOCK', async () => {
      const storage = new MemoryStorageAdapter(1);
      queue = new Queue('block', {
        storage,
        overflowStrategy: OverflowStrategy.BLOCK,
        blockTimeoutMs: 2000,
        blockPollIntervalMs: 10,
        logger: silentLogger,
      });

      await queue.add('t', 1);
      const blocked = queue.add('t', 2);

      setTimeout(() => {
        void storage.dequeue('w');
      }, 50);

      const job = await blocked;
      expect(job.payload).toBe(2);
      expect(await queue.getSize()).toBe(1);
    });

    it('should give up blocking after blockTimeoutMs', async () => {
      queue = new Queue('block-timeout', {
        storage: new MemoryStorageAdapter(1),
        overflowStrategy: OverflowStrategy.BLOCK,
        blockTimeoutMs: 60,
        blockPollIntervalMs: 10,
        logger: silentLogger,
      });
      const full = jest.fn();
      queue.on('queue:full', full);

      await queue.add('t', 1);
      await expect(queue.add('t', 2)).rejects.toThrow('Producer blocked for 60ms');
      expect(full).toHaveBeenCalledWith({ queue: 'block-timeout', size: 1 });
    });

    it('should enforce maxDepth over an unbounded store', async () => {
      queue = new Queue('depth-explicit', {
        storage: new MemoryStorageAdapter(0),
        maxDepth: 2,
        overflowStrategy: OverflowStrategy.DROP_NEWEST,
        logger: silentLogger,
      });

      await queue.add('t', 1);
      await queue.add('t', 2);

      await expect(queue.add('t', 3)).rejects.toThrow(QueueFullError);
      expect(await queue.getSize()).toBe(2);
    });

    it('should enforce maxDepth when a worker registered the store first', async () => {
      const worker = new Worker('depth-shared', {
        handler: async () => JobResult.success(),
        deadLetterQueue: null,
        logger: silentLogger,
      });
      queue = new Queue('depth-shared', {
        maxDepth: 2,
        overflowStrategy: OverflowStrategy.DROP_NEWEST,
        logger: silentLogger,
      });

      expect(queue.getStorage()).toBe(getMemoryStorage(worker.getQueueName()));
      await queue.add('t', 1);
      await queue.add('t', 2);

      await expect(queue.add('t', 3)).rejects.toThrow(QueueFullError);
      expect(await queue.getSize()).toBe(2);
    });

    it('should evict under maxDepth with DROP_OLDEST', async () => {
      queue = new Queue('depth-oldest', {
        storage: new MemoryStorageAdapter(0),
        maxDepth: 2,
        overflowStrategy: OverflowStrategy.DROP_OLDEST,
        logger: silentLogger,
      });

      const first = await queue.add('t', 1);
      await queue.add('t', 2);
      await queue.add('t', 3);

      expect(await queue.getSize()).toBe(2);
      expect((await queue.getJob(first.id))?.status).toBe('cancelled');
    });

    it('should report NOTHING_TO_EVICT when DROP_OLDEST finds no waiting job', async () => {
      const storage = new MemoryStorageAdapter(1);
      queue = new Queue('nothing-to-evict', {
        storage,
        overflowStrategy: OverflowStrategy.DROP_OLDEST,
        logger: silentLogger,
      });
      const dropped = jest.fn();
      queue.on('job:dropped', dropped);

      await queue.add('t', 1);
      jest.spyOn(storage, 'evictOldest').mockResolvedValueOnce(null);

      await expect(queue.add('t', 2)).rejects.toThrow('No waiting jobs to drop');
      expect(dropped).toHaveBeenCalledTimes(1);
      expect(dropped.mock.calls[0][0].reason).toBe('NOTHING_TO_EVICT');
      expect(dropped.mock.calls[0][0].job.payload).toBe(2);
    });

    it('should not limit an unbounded store', async () => {
      queue = new Queue('unbounded', { storage: new MemoryStorageAdapter(0), logger: silentLogger });

      for (let i = 0; i < 50; i++) {
        await queue.add('t', i);
      }
      expect(await queue.getSize()).toBe(50);
    });
  });

  describe('cancel and inspection', () => {
    it('should cancel a waiting job and emit job:cancelled', async () => {
      queue = new Queue('cancel', { logger: silentLogger });
      const cancelled = jest.fn();
      queue.on('job:cancelled', cancelled);

      const job = await queue.add('t', null);

      expect(await queue.cancel(job.id)).toBe(true);
      expect(await queue.cancel(job.id)).toBe(false);
      expect(cancelled).toHaveBeenCalledTimes(1);
      expect((await queue.getJob(job.id))?.status).toBe('cancelled');
    });

    it('should list only its own jobs', async () => {
      const storage = new MemoryStorageAdapter(0);
      queue = new Queue('mine', { storage, logger: silentLogger });
      const neighbour = new Queue('theirs', { storage, logger: silentLogger });

      await queue.add('t', 1);
      await neighbour.add('t', 2);

      const jobs = await queue.listJobs();
      expect(jobs.map(job => job.payload)).toEqual([1]);
      expect((await queue.stats()).pending).toBe(2);
    });

    it('should expose its name and weight', () => {
      queue = new Queue('weighted', { weight: 100, logger: silentLogger });

      expect(queue.getName()).toBe('weighted');
      expect(queue.getWeight()).toBe(100);
    });
  });
});
