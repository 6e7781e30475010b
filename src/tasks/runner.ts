import { isReportableFault } from '../errors.js';
import { logger } from '../logger.js';
import type { PipelineResult } from '../pipeline/types.js';
import type { MediaService } from '../services/media-service.js';
import type { ObjectStore } from '../storage/object-store.js';
import type { TaskManager } from './manager.js';
import type { MediaTaskJob } from './types.js';

export type TaskRunOutcome =
  | { status: 'completed'; targetKey: string }
  | { status: 'failed'; errorMessage: string };

export interface TaskRunnerDeps {
  media: MediaService;
  objectStore: ObjectStore;
  manager: TaskManager;
}

export class TaskRunner {
  constructor(private readonly deps: TaskRunnerDeps) {}

  /**
   * Execute one queued task. Pipeline faults settle the task as failed;
   * anything else (timeouts, storage outages) is rethrown for the queue's
   * dead-letter path.
   */
  async run(job: MediaTaskJob): Promise<TaskRunOutcome> {
    const log = logger.child({ taskId: job.taskId, mediaType: job.mediaType });
    const { media, manager } = this.deps;

    try {
      const pipeline = media.buildPipeline(job.mediaType, job.sourceKey, job.operations);
      const result = await media.run(job.mediaType, { bucket: job.sourceBucket, key: job.sourceKey }, pipeline);
      const targetKey = await this.storeResult(job, result);
      await manager.complete(job.taskId, { targetKey, targetBucket: job.targetBucket });
      log.info({ targetKey, targetBucket: job.targetBucket }, 'Media task completed');
      return { status: 'completed', targetKey };
    } catch (err) {
      if (!isReportableFault(err)) throw err;
      log.warn({ err }, 'Media task failed');
      await manager.fail(job.taskId, err.message);
      return { status: 'failed', errorMessage: err.message };
    }
  }

  /** Multi-part results go under a prefix, one object per part, numbered from 1. */
  private async storeResult(job: MediaTaskJob, result: PipelineResult): Promise<string> {
    const { objectStore } = this.deps;
    const parts = result.parts ?? [];

    if (parts.length > 1) {
      const prefix = job.targetKey.replace(/\.[^./]+$/, '');
      await Promise.all(
        parts.map((part, index) =>
          objectStore.put(
            job.targetBucket,
            `${prefix}/page_${index + 1}.${result.metadata.format}`,
            part,
            result.contentType,
          ),
        ),
      );
      return `${prefix}/`;
    }

    await objectStore.put(job.targetBucket, job.targetKey, result.artifact, result.contentType);
    return job.targetKey;
  }
}
