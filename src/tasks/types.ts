import { z } from 'zod';
import { MEDIA_TYPES } from '../media/catalog.js';

export const TASK_STATUSES = ['processing', 'completed', 'failed'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];
export type TerminalStatus = Exclude<TaskStatus, 'processing'>;

export const taskRecordSchema = z.object({
  taskId: z.string().min(1),
  status: z.enum(TASK_STATUSES),
  taskType: z.string(),
  sourceKey: z.string(),
  targetKey: z.string(),
  sourceBucket: z.string(),
  targetBucket: z.string(),
  operations: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  errorMessage: z.string().optional(),
});

export type TaskRecord = z.infer<typeof taskRecordSchema>;

export interface TerminalFields {
  targetKey?: string;
  targetBucket?: string;
  errorMessage?: string;
}

export interface UpdateResult {
  /** False when the task was missing or already terminal. */
  applied: boolean;
  record: TaskRecord | null;
}

export interface TaskStore {
  /** Throws TaskConflictError when the id is taken. */
  create(record: TaskRecord): Promise<void>;
  get(taskId: string): Promise<TaskRecord | null>;
  /** Moves a `processing` task to a terminal status; terminal records are left as they are. */
  update(taskId: string, status: TerminalStatus, fields: TerminalFields): Promise<UpdateResult>;
}

export class TaskConflictError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} already exists`);
    this.name = 'TaskConflictError';
  }
}

export const mediaTaskJobSchema = z.object({
  taskId: z.string().min(1),
  mediaType: z.enum(MEDIA_TYPES),
  sourceBucket: z.string(),
  sourceKey: z.string(),
  targetBucket: z.string(),
  targetKey: z.string(),
  operations: z.string(),
});

/** Payload of a queued task. The pipeline is rebuilt from `operations` by the worker. */
export type MediaTaskJob = z.infer<typeof mediaTaskJobSchema>;

export interface TaskQueue {
  enqueue(job: MediaTaskJob): Promise<void>;
}
