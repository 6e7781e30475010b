import { loadConfig } from './config.js';
import { getContainer } from './container.js';
import { logger } from './logger.js';
import {
  closeRedisConnections,
  createDeadLetterQueue,
  createDeadLetterWorker,
  createTaskWorker,
  forwardFailures,
} from './queue.js';

const config = loadConfig();
const { runner, deadLetter, taskQueue } = getContainer(config);

const deadLetterQueue = createDeadLetterQueue(config);
const queueEvents = forwardFailures(config, taskQueue, deadLetterQueue);
const taskWorker = createTaskWorker(config, (job) => runner.run(job));
const deadLetterWorker = createDeadLetterWorker(config, (entry) => deadLetter.handle(entry));

taskWorker
  .waitUntilReady()
  .then(() => logger.info({ queue: config.taskQueueName, concurrency: config.concurrency }, 'Media task worker ready'))
  .catch((err) => {
    logger.error({ err }, 'Media task worker failed to initialize');
    process.exitCode = 1;
  });

deadLetterWorker
  .waitUntilReady()
  .then(() => logger.info({ queue: config.deadLetterQueueName }, 'Dead-letter worker ready'))
  .catch((err) => {
    logger.error({ err }, 'Dead-letter worker failed to initialize');
    process.exitCode = 1;
  });

/** Let running jobs finish, then release every Redis connection. */
export const shutdownWorkers = async () => {
  await Promise.all([taskWorker.close(), deadLetterWorker.close()]);
  await Promise.all([queueEvents.close(), taskQueue.close(), deadLetterQueue.close()]);
  await closeRedisConnections();
};
