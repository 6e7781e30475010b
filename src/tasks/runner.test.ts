import { describe, it, expect } from 'vitest';
import { InfrastructureError } from '../errors.js';
import type { FfmpegRunner } from '../infra/ffmpeg.js';
import {
  createFakeDocumentTools,
  createTestMediaService,
  DEFAULT_PROBES,
  MemoryObjectStore,
  RecordingQueue,
} from '../testing/fakes.js';
import { TaskManager } from './manager.js';
import { InMemoryTaskStore } from './memory-store.js';
import { TaskRunner } from './runner.js';
import type { MediaTaskJob } from './types.js';

const b64 = (text: string) => Buffer.from(text).toString('base64url');

const setup = (options: { ffmpeg?: FfmpegRunner; pageCount?: number; timeoutMs?: number } = {}) => {
  const objectStore = new MemoryObjectStore();
  const queue = new RecordingQueue();
  const media = createTestMediaService({
    objectStore,
    ffmpeg: options.ffmpeg,
    runTool: createFakeDocumentTools(options.pageCount ?? 1),
    timeoutMs: options.timeoutMs,
  });
  const manager = new TaskManager(new InMemoryTaskStore(), queue, media, { sourceBucket: 'media' });
  const runner = new TaskRunner({ media, objectStore, manager });

  const submit = async (mediaType: MediaTaskJob['mediaType'], sourceKey: string, operations: string) => {
    await manager.submit({ mediaType, sourceKey, operations });
    const job = queue.jobs.at(-1);
    if (!job) throw new Error('nothing was queued');
    return job;
  };

  return { objectStore, manager, runner, submit };
};

describe('TaskRunner', () => {
  it('should store the result and complete the task', async () => {
    const { objectStore, manager, runner, submit } = setup();
    objectStore.seed('media', 'photos/cat.png', 'png-bytes');
    const job = await submit('image', 'photos/cat.png', 'resize,w_800/format,f_webp');

    const outcome = await runner.run(job);

    const targetKey = `processed/image/${job.taskId}/cat.webp`;
    expect(outcome).toEqual({ status: 'completed', targetKey });
    expect(objectStore.objects.get(`media/${targetKey}`)).toEqual({
      body: Buffer.from('out.webp'),
      contentType: 'image/webp',
    });
    expect(await manager.get(job.taskId)).toMatchObject({ status: 'completed', targetKey, targetBucket: 'media' });
  });

  it('should fail the task when a stage cannot handle the source', async () => {
    const { objectStore, manager, runner, submit } = setup();
    objectStore.seed('media', 'clips/take.aiff', 'aiff-bytes');
    const job = await submit('audio', 'clips/take.aiff', 'convert,f_mp3');

    const outcome = await runner.run(job);

    const message = 'Stage 0 (convert) failed: Unsupported audio source format "aiff"';
    expect(outcome).toEqual({ status: 'failed', errorMessage: message });
    expect(await manager.get(job.taskId)).toMatchObject({ status: 'failed', errorMessage: message });
    expect(objectStore.objects.size).toBe(1);
  });

  it('should fail the task when the source is missing', async () => {
    const { manager, runner, submit } = setup();
    const job = await submit('image', 'photos/missing.png', 'grayscale');

    await runner.run(job);

    expect(await manager.get(job.taskId)).toMatchObject({
      status: 'failed',
      errorMessage: 'Object not found: media/photos/missing.png',
    });
  });

  it('should store every page of a multi-page result under a prefix', async () => {
    const { objectStore, manager, runner, submit } = setup({ pageCount: 3 });
    objectStore.seed('media', 'reports/q1.pdf', 'pdf-bytes');
    const job = await submit('document', 'reports/q1.pdf', `convert,target_png,pages_${b64('1-2')}`);

    const outcome = await runner.run(job);

    const prefix = `processed/document/${job.taskId}/q1`;
    expect(outcome).toEqual({ status: 'completed', targetKey: `${prefix}/` });
    expect(objectStore.objects.get(`media/${prefix}/page_1.png`)?.body.toString()).toBe('page 1');
    expect(objectStore.objects.get(`media/${prefix}/page_2.png`)?.body.toString()).toBe('page 2');
    expect(await manager.get(job.taskId)).toMatchObject({ status: 'completed', targetKey: `${prefix}/` });
  });

  it('should let a budget overrun escape and leave the task processing', async () => {
    const stalled: FfmpegRunner = {
      transcode: () => new Promise<Buffer>(() => undefined),
      probe: async (_input, format) => DEFAULT_PROBES[format] ?? {},
    };
    const { objectStore, manager, runner, submit } = setup({ ffmpeg: stalled, timeoutMs: 20 });
    objectStore.seed('media', 'photos/cat.png', 'png-bytes');
    const job = await submit('image', 'photos/cat.png', 'grayscale');

    await expect(runner.run(job)).rejects.toBeInstanceOf(InfrastructureError);
    expect(await manager.get(job.taskId)).toMatchObject({ status: 'processing' });
  });
});
