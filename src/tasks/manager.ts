import { randomUUID } from 'crypto';
import { errorMessage, ParseError, ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import { TASK_TYPES, type MediaType } from '../media/catalog.js';
import type { Pipeline } from '../operations/index.js';
import { stringParam } from '../pipeline/params.js';
import type { MediaService } from '../services/media-service.js';
import type { TaskQueue, TaskRecord, TaskStatus, TaskStore } from './types.js';

export interface SubmitRequest {
  mediaType: MediaType;
  sourceKey: string;
  operations: string;
}

export interface SubmitResult {
  taskId: string;
  status: TaskStatus;
  message: string;
}

export interface TaskManagerOptions {
  sourceBucket: string;
}

const LABELS: Readonly<Record<MediaType, string>> = {
  image: 'Image',
  audio: 'Audio',
  video: 'Video',
  document: 'Document',
};

const baseName = (key: string) => {
  const file = key.split('/').pop() ?? key;
  const dot = file.lastIndexOf('.');
  return dot > 0 ? file.slice(0, dot) : file;
};

/** Results live under a prefix owned by the task. */
export const deriveTargetKey = (mediaType: MediaType, taskId: string, sourceKey: string, format?: string) =>
  `processed/${mediaType}/${taskId}/${baseName(sourceKey)}${format ? `.${format}` : ''}`;

/** Document stages may name their own output bucket. */
const targetBucketOf = (pipeline: Pipeline, fallback: string) => {
  for (const stage of pipeline.stages) {
    const bucket = stringParam(stage.params, 'b');
    if (bucket) return bucket;
  }
  return fallback;
};

export class TaskManager {
  constructor(
    private readonly store: TaskStore,
    private readonly queue: TaskQueue,
    private readonly media: MediaService,
    private readonly options: TaskManagerOptions,
  ) {}

  /**
   * Record the task and hand it to the queue. Requests that do not parse or
   * validate still get a record, already failed, and are never queued.
   */
  async submit(request: SubmitRequest): Promise<SubmitResult> {
    const { mediaType, sourceKey, operations } = request;
    const taskId = randomUUID();
    const label = LABELS[mediaType];

    let pipeline: Pipeline | undefined;
    let rejection: ParseError | ValidationError | undefined;
    try {
      pipeline = this.media.buildPipeline(mediaType, sourceKey, operations);
    } catch (err) {
      if (!(err instanceof ParseError || err instanceof ValidationError)) throw err;
      rejection = err;
    }

    const now = new Date().toISOString();
    const targetBucket = pipeline ? targetBucketOf(pipeline, this.options.sourceBucket) : this.options.sourceBucket;
    const record: TaskRecord = {
      taskId,
      status: 'processing',
      taskType: TASK_TYPES[mediaType],
      sourceKey,
      targetKey: deriveTargetKey(mediaType, taskId, sourceKey, pipeline?.outputFormat),
      sourceBucket: this.options.sourceBucket,
      targetBucket,
      operations,
      createdAt: now,
      updatedAt: now,
    };
    await this.store.create(record);

    if (!pipeline) {
      const reason = rejection?.message ?? 'Invalid operations';
      await this.fail(taskId, reason);
      logger.info({ taskId, mediaType, reason }, 'Rejected task before queueing');
      return { taskId, status: 'failed', message: `${label} processing task rejected: ${reason}` };
    }

    try {
      await this.queue.enqueue({
        taskId,
        mediaType,
        sourceBucket: record.sourceBucket,
        sourceKey,
        targetBucket,
        targetKey: record.targetKey,
        operations,
      });
    } catch (err) {
      await this.fail(taskId, `Failed to enqueue task: ${errorMessage(err)}`);
      throw err;
    }

    logger.info({ taskId, mediaType, sourceKey, stages: pipeline.stages.length }, 'Queued media task');
    return { taskId, status: 'processing', message: `${label} processing task received and started` };
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    return this.store.get(taskId);
  }

  /** Returns false when the task was already terminal or is unknown. */
  async complete(taskId: string, target: { targetKey: string; targetBucket: string }): Promise<boolean> {
    const { applied, record } = await this.store.update(taskId, 'completed', target);
    if (!applied) logger.warn({ taskId, status: record?.status ?? null }, 'Ignored completion of a settled task');
    return applied;
  }

  async fail(taskId: string, reason: string): Promise<boolean> {
    const { applied, record } = await this.store.update(taskId, 'failed', { errorMessage: reason });
    if (!applied) logger.warn({ taskId, status: record?.status ?? null }, 'Ignored failure of a settled task');
    return applied;
  }
}
