import { Queue, QueueEvents, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import type { ProcessorConfig } from './config.js';
import { logger } from './logger.js';
import { deadLetterEntrySchema, type DeadLetterEntry, type DeadLetterOutcome } from './tasks/dead-letter.js';
import type { TaskRunOutcome } from './tasks/runner.js';
import { mediaTaskJobSchema, type MediaTaskJob, type TaskQueue } from './tasks/types.js';

type QueueConfig = Pick<ProcessorConfig, 'redisUrl' | 'taskQueueName' | 'deadLetterQueueName' | 'concurrency'>;

const connections: Redis[] = [];

export const createRedisConnection = (redisUrl: string) => {
  const connection = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
  });
  connections.push(connection);
  return connection;
};

export const closeRedisConnections = async () => {
  await Promise.all(connections.splice(0).map((connection) => connection.quit()));
};

const KEEP_COMPLETED = {
  age: 300, // Keep completed jobs for 5 minutes
  count: 100, // Keep at most 100 completed jobs
};

export const createTaskQueue = (cfg: QueueConfig) =>
  new Queue<MediaTaskJob>(cfg.taskQueueName, {
    connection: createRedisConnection(cfg.redisUrl),
    defaultJobOptions: {
      removeOnComplete: KEEP_COMPLETED,
      removeOnFail: false,
      attempts: 1,
    },
  });

export const createDeadLetterQueue = (cfg: QueueConfig) =>
  new Queue<DeadLetterEntry>(cfg.deadLetterQueueName, {
    connection: createRedisConnection(cfg.redisUrl),
    defaultJobOptions: {
      removeOnComplete: KEEP_COMPLETED,
      removeOnFail: false,
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
    },
  });

/** TaskQueue backed by BullMQ; the task id doubles as the job id. */
export class BullTaskQueue implements TaskQueue {
  constructor(private readonly queue: Queue<MediaTaskJob>) {}

  async enqueue(job: MediaTaskJob): Promise<void> {
    const added = await this.queue.add('media-task', job, { jobId: job.taskId });
    logger.info({ jobId: added.id, mediaType: job.mediaType }, 'Queued media task job');
  }
}

/**
 * Forward every failed task job to the dead-letter queue. Dead-letter job
 * ids are derived from the failed job id, so a repeated event is deduplicated.
 */
export const forwardFailures = (
  cfg: QueueConfig,
  taskQueue: Queue<MediaTaskJob>,
  deadLetterQueue: Queue<DeadLetterEntry>,
) => {
  const events = new QueueEvents(cfg.taskQueueName, {
    connection: createRedisConnection(cfg.redisUrl),
  });

  events
    .waitUntilReady()
    .then(() => logger.info('Task queue events ready'))
    .catch((err) => {
      logger.error({ err }, 'Task queue events failed to initialize');
    });

  events.on('failed', async ({ jobId, failedReason }) => {
    try {
      const job = await taskQueue.getJob(jobId);
      const data = mediaTaskJobSchema.partial().safeParse(job?.data);
      await deadLetterQueue.add(
        'dead-letter',
        { jobId, failedReason, job: data.success ? data.data : undefined },
        { jobId: `dlq-${jobId}` },
      );
      logger.warn({ jobId, failedReason }, 'Forwarded failed task job to dead-letter queue');
    } catch (err) {
      logger.error({ err, jobId }, 'Failed to forward task job to dead-letter queue');
    }
  });

  events.on('error', (err) => {
    logger.error({ err }, 'Task queue events error');
  });

  return events;
};

export const createTaskWorker = (cfg: QueueConfig, processor: (job: MediaTaskJob) => Promise<TaskRunOutcome>) => {
  const worker = new Worker<MediaTaskJob, TaskRunOutcome>(
    cfg.taskQueueName,
    async (job) => processor(mediaTaskJobSchema.parse(job.data)),
    {
      connection: createRedisConnection(cfg.redisUrl),
      concurrency: cfg.concurrency,
    },
  );

  worker.on('completed', (job, outcome) => {
    logger.info({ jobId: job.id, status: outcome.status }, 'Media task job completed');
  });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Media task job failed');
  });

  return worker;
};

export const createDeadLetterWorker = (
  cfg: QueueConfig,
  processor: (entry: DeadLetterEntry) => Promise<DeadLetterOutcome>,
) => {
  const worker = new Worker<DeadLetterEntry, DeadLetterOutcome>(
    cfg.deadLetterQueueName,
    async (job) => processor(deadLetterEntrySchema.parse(job.data)),
    {
      connection: createRedisConnection(cfg.redisUrl),
      concurrency: 1,
    },
  );

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Dead-letter job failed');
  });

  return worker;
};
