import { loadConfig } from './config.js';
import { getContainer } from './container.js';
import { logger } from './logger.js';
import { createServer } from './server.js';
import { shutdownWorkers } from './worker.js';

const config = loadConfig();
const { media, tasks } = getContainer(config);

const app = createServer({
  media,
  tasks,
  sourceBucket: config.sourceBucket,
  sharedSecret: config.sharedSecret,
});

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, objectStore: config.objectStore, taskStore: config.taskStore }, 'Media API listening');
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'Shutting down');
  server.close();
  shutdownWorkers()
    .then(() => process.exit(0))
    .catch((err) => {
      logger.error({ err }, 'Failed to shut down cleanly');
      process.exit(1);
    });
};

process.once('SIGTERM', shutdown);
process.once('SIGINT', shutdown);
