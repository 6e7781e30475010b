import { describe, it, expect } from 'vitest';
import { createTestMediaService, MemoryObjectStore, RecordingQueue } from '../testing/fakes.js';
import { deriveTargetKey, TaskManager } from './manager.js';
import { InMemoryTaskStore } from './memory-store.js';
import type { MediaTaskJob, TaskQueue } from './types.js';

const b64 = (text: string) => Buffer.from(text).toString('base64url');

const setup = (queue: TaskQueue = new RecordingQueue()) => {
  const store = new InMemoryTaskStore();
  const media = createTestMediaService({ objectStore: new MemoryObjectStore() });
  const manager = new TaskManager(store, queue, media, { sourceBucket: 'media' });
  return { manager };
};

describe('deriveTargetKey', () => {
  it('should place results under the task id with the output extension', () => {
    expect(deriveTargetKey('image', 'task-1', 'photos/cat.jpg', 'webp')).toBe('processed/image/task-1/cat.webp');
    expect(deriveTargetKey('audio', 'task-2', 'noext')).toBe('processed/audio/task-2/noext');
  });
});

describe('TaskManager', () => {
  it('should record and queue a valid submission', async () => {
    const queue = new RecordingQueue();
    const { manager } = setup(queue);

    const result = await manager.submit({ mediaType: 'image', sourceKey: 'photos/cat.jpg', operations: 'resize,w_800' });
    const record = await manager.get(result.taskId);

    expect(result).toEqual({
      taskId: result.taskId,
      status: 'processing',
      message: 'Image processing task received and started',
    });
    expect(record).toMatchObject({
      status: 'processing',
      taskType: 'image/process',
      targetKey: `processed/image/${result.taskId}/cat.jpg`,
      targetBucket: 'media',
    });
    const expected: MediaTaskJob = {
      taskId: result.taskId,
      mediaType: 'image',
      sourceBucket: 'media',
      sourceKey: 'photos/cat.jpg',
      targetBucket: 'media',
      targetKey: `processed/image/${result.taskId}/cat.jpg`,
      operations: 'resize,w_800',
    };
    expect(queue.jobs).toEqual([expected]);
  });

  it('should fail an invalid submission at once and never queue it', async () => {
    const queue = new RecordingQueue();
    const { manager } = setup(queue);

    const result = await manager.submit({
      mediaType: 'audio',
      sourceKey: 'clips/a.wav',
      operations: 'convert,f_mp3,aq_90,ab_96000',
    });

    const reason = 'Invalid parameter "ab" for operation "convert" (stage 0): cannot be combined with "aq"';
    expect(result).toEqual({
      taskId: result.taskId,
      status: 'failed',
      message: `Audio processing task rejected: ${reason}`,
    });
    expect(await manager.get(result.taskId)).toMatchObject({ status: 'failed', errorMessage: reason });
    expect(queue.jobs).toHaveLength(0);
  });

  it('should fail the task when it cannot be queued', async () => {
    let queuedId = '';
    const { manager } = setup({
      enqueue: async (job) => {
        queuedId = job.taskId;
        throw new Error('queue unavailable');
      },
    });

    await expect(
      manager.submit({ mediaType: 'image', sourceKey: 'photos/cat.jpg', operations: 'grayscale' }),
    ).rejects.toThrow('queue unavailable');

    expect(await manager.get(queuedId)).toMatchObject({
      status: 'failed',
      errorMessage: 'Failed to enqueue task: queue unavailable',
    });
  });

  it('should send document results to the requested bucket', async () => {
    const { manager } = setup();

    const { taskId } = await manager.submit({
      mediaType: 'document',
      sourceKey: 'reports/q1.docx',
      operations: `convert,target_pdf,b_${b64('exports')}`,
    });

    expect(await manager.get(taskId)).toMatchObject({
      targetBucket: 'exports',
      targetKey: `processed/document/${taskId}/q1.pdf`,
      taskType: 'doc/convert',
    });
  });

  it('should settle a task only once', async () => {
    const { manager } = setup();
    const { taskId } = await manager.submit({ mediaType: 'image', sourceKey: 'a.png', operations: 'grayscale' });

    expect(await manager.complete(taskId, { targetKey: 'processed/a.png', targetBucket: 'media' })).toBe(true);
    expect(await manager.fail(taskId, 'too late')).toBe(false);
    expect(await manager.get(taskId)).toMatchObject({ status: 'completed', targetKey: 'processed/a.png' });
  });

  it('should return null for an unknown task', async () => {
    const { manager } = setup();

    expect(await manager.get('does-not-exist')).toBeNull();
  });
});
