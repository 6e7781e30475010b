import type { ProcessorConfig } from './config.js';
import { createHandlers } from './handlers/index.js';
import { runTool } from './infra/exec.js';
import { configureFfmpeg, ffmpegRunner } from './infra/ffmpeg.js';
import { PubSubNotifier } from './notifications/pubsub.js';
import { BullTaskQueue, createRedisConnection, createTaskQueue } from './queue.js';
import { MediaService } from './services/media-service.js';
import { createObjectStore, type ObjectStore } from './storage/index.js';
import { DeadLetterConsumer } from './tasks/dead-letter.js';
import { TaskManager } from './tasks/manager.js';
import { InMemoryTaskStore } from './tasks/memory-store.js';
import { RedisTaskStore } from './tasks/redis-store.js';
import { TaskRunner } from './tasks/runner.js';
import type { TaskStore } from './tasks/types.js';

export interface Container {
  config: ProcessorConfig;
  objectStore: ObjectStore;
  taskStore: TaskStore;
  media: MediaService;
  tasks: TaskManager;
  runner: TaskRunner;
  deadLetter: DeadLetterConsumer;
  taskQueue: ReturnType<typeof createTaskQueue>;
}

let container: Container | undefined;

const createTaskStore = (config: ProcessorConfig): TaskStore =>
  config.taskStore === 'redis' ? new RedisTaskStore(createRedisConnection(config.redisUrl)) : new InMemoryTaskStore();

/** Wire the process once; the API and the workers share the same instances. */
export const getContainer = (config: ProcessorConfig): Container => {
  if (container) return container;

  configureFfmpeg({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath });

  const objectStore = createObjectStore(config);
  const taskStore = createTaskStore(config);
  const handlers = createHandlers({
    ffmpeg: ffmpegRunner,
    runTool,
    documentTools: {
      soffice: config.sofficePath,
      pdftoppm: config.pdftoppmPath,
      pdftotext: config.pdftotextPath,
      pdfinfo: config.pdfinfoPath,
    },
    watermarkFontFile: config.watermarkFontFile,
  });
  const media = new MediaService({ objectStore, ffmpeg: ffmpegRunner, handlers, timeoutMs: config.taskTimeoutMs });
  const taskQueue = createTaskQueue(config);
  const tasks = new TaskManager(taskStore, new BullTaskQueue(taskQueue), media, { sourceBucket: config.sourceBucket });
  const runner = new TaskRunner({ media, objectStore, manager: tasks });
  const notifier = new PubSubNotifier({ projectId: config.gcpProjectId, topic: config.failureTopic });
  const deadLetter = new DeadLetterConsumer(taskStore, notifier);

  container = { config, objectStore, taskStore, media, tasks, runner, deadLetter, taskQueue };
  return container;
};
