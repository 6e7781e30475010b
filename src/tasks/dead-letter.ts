import { randomUUID } from 'crypto';
import { z } from 'zod';
import { logger } from '../logger.js';
import { TASK_TYPES } from '../media/catalog.js';
import { mediaTaskJobSchema, TaskConflictError, type TaskRecord, type TaskStore } from './types.js';

export const deadLetterEntrySchema = z.object({
  jobId: z.string(),
  failedReason: z.string().optional(),
  job: mediaTaskJobSchema.partial().optional(),
});

/** What the task queue forwards when a job fails outside the task runner's control. */
export type DeadLetterEntry = z.infer<typeof deadLetterEntrySchema>;

export type FailureErrorType = 'memory' | 'timeout' | 'processing';

export interface FailureNotification {
  taskId: string;
  taskType: string;
  sourceKey: string;
  operations?: string;
  errorMessage: string;
  errorType: FailureErrorType;
  timestamp: string;
}

export interface Notifier {
  notify(notification: FailureNotification): Promise<void>;
}

export type DeadLetterOutcome = 'recorded' | 'skipped';

const MEMORY_PATTERN = /memory|signal: killed|SIGKILL/i;
const TIMEOUT_PATTERN = /time(?:d)? ?out|budget/i;

export const classifyFailure = (message: string): FailureErrorType => {
  if (MEMORY_PATTERN.test(message)) return 'memory';
  if (TIMEOUT_PATTERN.test(message)) return 'timeout';
  return 'processing';
};

export const describeFailure = (reason: string | undefined, operations: string | undefined) => {
  const message = reason?.trim() || 'Unknown error';
  return operations && !message.includes(operations) ? `${message} (Operations: ${operations})` : message;
};

export class DeadLetterConsumer {
  constructor(
    private readonly store: TaskStore,
    private readonly notifier: Notifier,
  ) {}

  /**
   * Settle the task behind a dead-lettered job and publish one notification.
   * Tasks that already reached a terminal status are neither touched nor
   * notified again.
   */
  async handle(entry: DeadLetterEntry): Promise<DeadLetterOutcome> {
    const job = entry.job ?? {};
    const taskId = job.taskId ?? `error-${randomUUID()}`;
    const taskType = job.mediaType ? TASK_TYPES[job.mediaType] : 'unknown';
    const sourceKey = job.sourceKey ?? 'unknown';
    const errorMessage = describeFailure(entry.failedReason, job.operations);
    const log = logger.child({ taskId, jobId: entry.jobId });

    const settled = await this.settle(taskId, errorMessage, () => {
      const now = new Date().toISOString();
      return {
        taskId,
        status: 'failed',
        taskType,
        sourceKey,
        targetKey: job.targetKey ?? '',
        sourceBucket: job.sourceBucket ?? '',
        targetBucket: job.targetBucket ?? '',
        operations: job.operations ?? '',
        createdAt: now,
        updatedAt: now,
        errorMessage,
      };
    });

    if (!settled) {
      log.info('Dead-lettered task already settled, skipping notification');
      return 'skipped';
    }

    const errorType = classifyFailure(errorMessage);
    log.warn({ errorType, errorMessage }, 'Recorded dead-lettered task as failed');

    await this.notifier.notify({
      taskId,
      taskType,
      sourceKey,
      operations: job.operations,
      errorMessage,
      errorType,
      timestamp: new Date().toISOString(),
    });
    return 'recorded';
  }

  private async settle(taskId: string, errorMessage: string, build: () => TaskRecord): Promise<boolean> {
    const existing = await this.store.get(taskId);
    if (!existing) {
      try {
        await this.store.create(build());
        return true;
      } catch (err) {
        if (!(err instanceof TaskConflictError)) throw err;
      }
    }
    const { applied } = await this.store.update(taskId, 'failed', { errorMessage });
    return applied;
  }
}
