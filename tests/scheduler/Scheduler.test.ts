import { once } from 'node:events';
import {
  Queue,
  Scheduler,
  MemoryStorageAdapter,
  DeadLetterQueue,
  createJob,
  silentLogger,
} from '@jobline/core';

describe('Scheduler', () => {
  let storage: MemoryStorageAdapter;
  let queue: Queue;
  let scheduler: Scheduler;

  beforeEach(async () => {
    storage = new MemoryStorageAdapter(0);
    queue = new Queue('sched', { storage, logger: silentLogger });
    await queue.connect();
    scheduler = new Scheduler({ checkIntervalMs: 10, logger: silentLogger }).register(queue);
  });

  afterEach(async () => {
    await scheduler.stop();
    await queue.disconnect();
  });

  it('should promote only jobs that are due', async () => {
    const now = Date.now();
    await queue.add('t', 'soon', { scheduledFor: now + 1000 });
    await queue.add('t', 'later', { scheduledFor: now + 60_000 });

    expect(await scheduler.runOnce(now)).toBe(0);
    expect(await scheduler.runOnce(now + 1000)).toBe(1);

    const job = await storage.dequeue('w');
    expect(job?.payload).toBe('soon');
    expect((await storage.stats()).delayed).toBe(1);
  });

  it('should enqueue a job for a later time', async () => {
    const job = createJob('report', null, { queue: 'sched' });
    const at = new Date(Date.now() + 5000);

    await scheduler.schedule(job, at);

    expect((await storage.getJob(job.id))?.scheduledFor).toBe(at.getTime());
    expect(await storage.dequeue('w')).toBeNull();
    expect(await scheduler.runOnce(at.getTime())).toBe(1);
  });

  it('should refuse jobs for an unknown queue', async () => {
    const job = createJob('report', null, { queue: 'elsewhere' });

    await expect(scheduler.schedule(job, Date.now())).rejects.toThrow('Queue elsewhere is not registered');
  });

  it('should sweep on its own timer once started', async () => {
    await queue.add('t', null, { delayMs: 5 });
    const promoted = once(scheduler, 'jobs:promoted');

    scheduler.start();
    const [event] = await promoted;

    expect(event).toEqual({ queue: 'sched', count: 1 });
    expect(scheduler.isActive()).toBe(true);

    await scheduler.stop();
    expect(scheduler.isActive()).toBe(false);
  });

  it('should keep going when one store fails', async () => {
    const broken = new Queue('broken', { storage: new MemoryStorageAdapter(0), logger: silentLogger });
    jest.spyOn(broken.getStorage(), 'promoteDueJobs').mockRejectedValue(new Error('connection lost'));
    scheduler.register(broken);
    const errors = jest.fn();
    scheduler.on('scheduler:error', errors);

    const now = Date.now();
    await queue.add('t', null, { scheduledFor: now });

    expect(await scheduler.runOnce(now)).toBe(0);
    expect(errors).toHaveBeenCalledWith(expect.objectContaining({ queue: 'broken' }));
  });

  it('should prune expired dead letters on each sweep', async () => {
    const deadLetterQueue = new DeadLetterQueue({ maxAgeMs: 1000, alertOnDeadLetters: false, logger: silentLogger });
    deadLetterQueue.push(createJob('t', null), { kind: 'execution', message: 'old' }, [], 0);
    const pruning = new Scheduler({ deadLetterQueue, logger: silentLogger });

    await pruning.runOnce(5000);

    expect(deadLetterQueue.size).toBe(0);
  });
});
