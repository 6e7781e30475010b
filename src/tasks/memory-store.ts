import {
  TaskConflictError,
  type TaskRecord,
  type TaskStore,
  type TerminalFields,
  type TerminalStatus,
  type UpdateResult,
} from './types.js';

export class InMemoryTaskStore implements TaskStore {
  private readonly records = new Map<string, TaskRecord>();

  async create(record: TaskRecord): Promise<void> {
    if (this.records.has(record.taskId)) throw new TaskConflictError(record.taskId);
    this.records.set(record.taskId, { ...record });
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    const record = this.records.get(taskId);
    return record ? { ...record } : null;
  }

  async update(taskId: string, status: TerminalStatus, fields: TerminalFields): Promise<UpdateResult> {
    const current = this.records.get(taskId);
    if (!current) return { applied: false, record: null };
    if (current.status !== 'processing') return { applied: false, record: { ...current } };

    const next: TaskRecord = { ...current, status, updatedAt: new Date().toISOString() };
    if (fields.targetKey !== undefined) next.targetKey = fields.targetKey;
    if (fields.targetBucket !== undefined) next.targetBucket = fields.targetBucket;
    if (fields.errorMessage !== undefined) next.errorMessage = fields.errorMessage;
    this.records.set(taskId, next);
    return { applied: true, record: { ...next } };
  }
}
