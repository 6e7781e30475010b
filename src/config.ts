import { config as loadEnv } from 'dotenv';

loadEnv();

export type ObjectStoreBackend = 'gcs' | 'local';
export type TaskStoreBackend = 'redis' | 'memory';

export interface ProcessorConfig {
  port: number;
  redisUrl: string;
  taskQueueName: string;
  deadLetterQueueName: string;
  concurrency: number;
  /** Hard wall-clock budget for one pipeline run (sync or async). */
  taskTimeoutMs: number;
  sharedSecret?: string;
  objectStore: ObjectStoreBackend;
  /** Bucket that sources are read from and, unless overridden, results are written to. */
  sourceBucket: string;
  localStorageDir: string;
  taskStore: TaskStoreBackend;
  gcpProjectId?: string;
  failureTopic: string;
  ffmpegPath?: string;
  ffprobePath?: string;
  sofficePath: string;
  pdftoppmPath: string;
  pdftotextPath: string;
  pdfinfoPath: string;
  watermarkFontFile?: string;
}

const parseBackend = <T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T => {
  const match = allowed.find((entry) => entry === value?.toLowerCase());
  return match ?? fallback;
};

export const loadConfig = (): ProcessorConfig => {
  const {
    PORT,
    REDIS_URL,
    PROCESSOR_QUEUE_NAME,
    PROCESSOR_DLQ_NAME,
    PROCESSOR_CONCURRENCY,
    PROCESSOR_TASK_TIMEOUT_MS,
    PROCESSOR_SHARED_SECRET,
    OBJECT_STORE,
    SOURCE_BUCKET,
    LOCAL_STORAGE_DIR,
    TASK_STORE,
    GOOGLE_PROJECT_ID,
    FAILURE_TOPIC,
    FFMPEG_PATH,
    FFPROBE_PATH,
    SOFFICE_PATH,
    PDFTOPPM_PATH,
    PDFTOTEXT_PATH,
    PDFINFO_PATH,
    WATERMARK_FONT_FILE,
  } = process.env;

  return {
    port: Number(PORT ?? 4000),
    redisUrl: REDIS_URL ?? 'redis://127.0.0.1:6379',
    taskQueueName: PROCESSOR_QUEUE_NAME ?? 'media-tasks',
    deadLetterQueueName: PROCESSOR_DLQ_NAME ?? 'media-tasks-dead-letter',
    concurrency: Number(PROCESSOR_CONCURRENCY ?? 2),
    taskTimeoutMs: Number(PROCESSOR_TASK_TIMEOUT_MS ?? 300000), // 5 minutes default
    sharedSecret: PROCESSOR_SHARED_SECRET || undefined,
    objectStore: parseBackend(OBJECT_STORE, ['gcs', 'local'] as const, 'local'),
    sourceBucket: SOURCE_BUCKET ?? 'media',
    localStorageDir: LOCAL_STORAGE_DIR ?? './.data/objects',
    taskStore: parseBackend(TASK_STORE, ['redis', 'memory'] as const, 'redis'),
    gcpProjectId: GOOGLE_PROJECT_ID || undefined,
    failureTopic: FAILURE_TOPIC ?? 'media-processing-errors',
    ffmpegPath: FFMPEG_PATH || undefined,
    ffprobePath: FFPROBE_PATH || undefined,
    sofficePath: SOFFICE_PATH ?? 'soffice',
    pdftoppmPath: PDFTOPPM_PATH ?? 'pdftoppm',
    pdftotextPath: PDFTOTEXT_PATH ?? 'pdftotext',
    pdfinfoPath: PDFINFO_PATH ?? 'pdfinfo',
    watermarkFontFile: WATERMARK_FONT_FILE || undefined,
  };
};
