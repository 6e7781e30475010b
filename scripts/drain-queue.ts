import { Queue } from 'bullmq';
import { Redis } from 'ioredis';
import { loadConfig } from '../src/config.js';

/**
 * Drain or clear the media task queue and its dead-letter queue.
 *
 * Usage:
 *   npm run drain-queue                    # Drain waiting jobs (leave active; default)
 *   npm run drain-queue -- --obliterate    # Remove ALL jobs (waiting, active, completed, failed)
 */
async function main() {
  const obliterate = process.argv.includes('--obliterate');
  const cfg = loadConfig();
  const connection = new Redis(cfg.redisUrl, { maxRetriesPerRequest: null });
  const queues = [cfg.taskQueueName, cfg.deadLetterQueueName].map((name) => new Queue(name, { connection }));

  for (const queue of queues) {
    if (obliterate) {
      await queue.obliterate({ force: true });
      console.log(`Queue ${queue.name} obliterated (all jobs removed).`);
    } else {
      await queue.drain(true);
      console.log(`Queue ${queue.name} drained (waiting jobs removed).`);
    }
    await queue.close();
  }

  await connection.quit();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
