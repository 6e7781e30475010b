import { writeFile } from 'fs/promises';
import { ObjectNotFoundError } from '../errors.js';
import { createHandlers } from '../handlers/index.js';
import type { ToolRunner } from '../infra/exec.js';
import type { FfmpegRunner, ProbeResult, TranscodeRequest } from '../infra/ffmpeg.js';
import { MediaService } from '../services/media-service.js';
import type { ObjectStore } from '../storage/object-store.js';
import type { MediaTaskJob, TaskQueue } from '../tasks/types.js';

// In-process stand-ins for storage, codecs and the queue, shared by the tests.

export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, { body: Buffer; contentType: string }>();

  async fetch(bucket: string, key: string): Promise<Buffer> {
    const object = this.objects.get(`${bucket}/${key}`);
    if (!object) throw new ObjectNotFoundError(bucket, key);
    return object.body;
  }

  async put(bucket: string, key: string, body: Buffer, contentType: string): Promise<string> {
    this.objects.set(`${bucket}/${key}`, { body, contentType });
    return `memory://${bucket}/${key}`;
  }

  seed(bucket: string, key: string, body: string) {
    this.objects.set(`${bucket}/${key}`, { body: Buffer.from(body), contentType: 'application/octet-stream' });
  }
}

export class RecordingQueue implements TaskQueue {
  readonly jobs: MediaTaskJob[] = [];

  async enqueue(job: MediaTaskJob): Promise<void> {
    this.jobs.push(job);
  }
}

export interface FakeFfmpeg extends FfmpegRunner {
  requests: TranscodeRequest[];
}

/** Probes by extension and "transcodes" to `out.<format>`. */
export const createFakeFfmpeg = (probes: Readonly<Record<string, ProbeResult>> = {}): FakeFfmpeg => {
  const requests: TranscodeRequest[] = [];
  return {
    requests,
    transcode: async (request) => {
      requests.push(request);
      return Buffer.from(`out.${request.outputFormat}`);
    },
    probe: async (_input, format) => probes[format] ?? {},
  };
};

export const DEFAULT_PROBES: Readonly<Record<string, ProbeResult>> = {
  png: { width: 1600, height: 1200, codec: 'png' },
  jpg: { width: 1600, height: 1200, codec: 'mjpeg' },
  wav: { sampleRate: 44100, channels: 2, durationMs: 5000, codec: 'pcm_s16le' },
  aiff: { sampleRate: 44100, channels: 2, durationMs: 5000, codec: 'pcm_s16be' },
  mp4: { width: 1920, height: 1080, durationMs: 10000, codec: 'h264', colorSpace: 'bt709' },
};

/** Writes what pdftoppm would write; every document has `pageCount` pages. */
export const createFakeDocumentTools = (pageCount: number): ToolRunner => {
  return async (command, args) => {
    if (command === 'pdfinfo') return { stdout: `Pages: ${pageCount}\n`, stderr: '' };
    if (command === 'pdftoppm') {
      await writeFile(`${args[args.length - 1]}.png`, `page ${args[4]}`);
    }
    return { stdout: '', stderr: '' };
  };
};

export const createTestMediaService = (options: {
  objectStore: ObjectStore;
  ffmpeg?: FfmpegRunner;
  runTool?: ToolRunner;
  timeoutMs?: number;
}) => {
  const ffmpeg = options.ffmpeg ?? createFakeFfmpeg(DEFAULT_PROBES);
  return new MediaService({
    objectStore: options.objectStore,
    ffmpeg,
    handlers: createHandlers({
      ffmpeg,
      runTool: options.runTool ?? createFakeDocumentTools(1),
      documentTools: { soffice: 'soffice', pdftoppm: 'pdftoppm', pdftotext: 'pdftotext', pdfinfo: 'pdfinfo' },
    }),
    timeoutMs: options.timeoutMs ?? 5000,
  });
};
