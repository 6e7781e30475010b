import type { FfmpegRunner } from '../infra/ffmpeg.js';
import { withTimeout } from '../infra/timeout.js';
import { logger } from '../logger.js';
import { extensionOf, type MediaType } from '../media/catalog.js';
import { buildPipeline, type Pipeline } from '../operations/index.js';
import { executePipeline, finalizeArtifact } from '../pipeline/executor.js';
import type { HandlerRegistry, PipelineResult } from '../pipeline/types.js';
import type { ObjectStore } from '../storage/object-store.js';
import { inspectSource } from './probe.js';

export interface MediaServiceDeps {
  objectStore: ObjectStore;
  ffmpeg: FfmpegRunner;
  handlers: HandlerRegistry;
  /** Wall-clock budget for fetch, probe and execution together. */
  timeoutMs: number;
}

export interface SourceRef {
  bucket: string;
  key: string;
}

export class MediaService {
  constructor(private readonly deps: MediaServiceDeps) {}

  /** Parse and validate; throws ParseError or ValidationError. */
  buildPipeline<M extends MediaType>(mediaType: M, sourceKey: string, operations: string): Pipeline<M> {
    return buildPipeline(mediaType, operations, { sourceFormat: extensionOf(sourceKey) });
  }

  /**
   * Fetch the source and run the pipeline over it. Without a pipeline the
   * source bytes are returned as they are.
   */
  async run<M extends MediaType>(mediaType: M, source: SourceRef, pipeline?: Pipeline<M>): Promise<PipelineResult> {
    const startedAt = Date.now();
    const work = async () => {
      const artifact = await this.deps.objectStore.fetch(source.bucket, source.key);
      const context = await inspectSource(this.deps.ffmpeg, mediaType, source.key, artifact);
      if (!pipeline || pipeline.stages.length === 0) return finalizeArtifact(context);
      return executePipeline(pipeline, context, this.deps.handlers[mediaType]);
    };

    const result = await withTimeout(work(), this.deps.timeoutMs, `${mediaType} pipeline`);
    logger.info(
      {
        mediaType,
        key: source.key,
        stages: pipeline?.stages.length ?? 0,
        format: result.metadata.format,
        bytes: result.artifact.byteLength,
        ms: Date.now() - startedAt,
      },
      'Media pipeline finished',
    );
    return result;
  }
}
