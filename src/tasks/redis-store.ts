import type { Redis } from 'ioredis';
import { logger } from '../logger.js';
import {
  TaskConflictError,
  taskRecordSchema,
  type TaskRecord,
  type TaskStore,
  type TerminalFields,
  type TerminalStatus,
  type UpdateResult,
} from './types.js';

const KEY_PREFIX = 'media:task:';

// Create only when the hash is absent.
const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('HSET', KEYS[1], unpack(ARGV))
return 1
`;

// -1 missing, 0 already terminal, 1 applied.
const TRANSITION_SCRIPT = `
local status = redis.call('HGET', KEYS[1], 'status')
if not status then return -1 end
if status ~= 'processing' then return 0 end
redis.call('HSET', KEYS[1], unpack(ARGV))
return 1
`;

export const taskKey = (taskId: string) => `${KEY_PREFIX}${taskId}`;

/** Flatten to HSET arguments, dropping absent fields. */
export const toHashArgs = (fields: Record<string, string | undefined>): string[] =>
  Object.entries(fields).flatMap(([field, value]) => (value === undefined ? [] : [field, value]));

export const fromHash = (hash: Record<string, string>): TaskRecord | null => {
  if (Object.keys(hash).length === 0) return null;
  const parsed = taskRecordSchema.safeParse(hash);
  if (!parsed.success) {
    logger.error({ issues: parsed.error.issues, taskId: hash.taskId }, 'Malformed task record in Redis');
    throw new Error(`Malformed task record ${hash.taskId ?? '(unknown)'}`);
  }
  return parsed.data;
};

export class RedisTaskStore implements TaskStore {
  constructor(private readonly redis: Redis) {}

  async create(record: TaskRecord): Promise<void> {
    const created = await this.redis.eval(CREATE_SCRIPT, 1, taskKey(record.taskId), ...toHashArgs({ ...record }));
    if (created !== 1) throw new TaskConflictError(record.taskId);
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    return fromHash(await this.redis.hgetall(taskKey(taskId)));
  }

  async update(taskId: string, status: TerminalStatus, fields: TerminalFields): Promise<UpdateResult> {
    const args = toHashArgs({ ...fields, status, updatedAt: new Date().toISOString() });
    const outcome = await this.redis.eval(TRANSITION_SCRIPT, 1, taskKey(taskId), ...args);
    if (outcome === -1) return { applied: false, record: null };
    return { applied: outcome === 1, record: await this.get(taskId) };
  }
}
