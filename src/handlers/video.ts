import type { FfmpegRunner } from '../infra/ffmpeg.js';
import { SNAPSHOT_FORMATS } from '../operations/schema/video.js';
import type { StageParams } from '../operations/types.js';
import { enumParam, numberParam } from '../pipeline/params.js';
import type { HandlerTable, MediaContext } from '../pipeline/types.js';
import type { Size } from './image-geometry.js';

export const SUPPORTED_VIDEO_CODECS: ReadonlySet<string> = new Set(['h264', 'hevc', 'h265']);

export const assertSnapshotSource = (context: MediaContext) => {
  const codec = context.metadata.codec?.toLowerCase();
  if (!codec || !SUPPORTED_VIDEO_CODECS.has(codec)) {
    throw new Error(`Unsupported video codec "${codec ?? 'unknown'}", expected h264 or hevc`);
  }
  if (context.metadata.colorSpace?.toLowerCase().startsWith('bt2020')) {
    throw new Error('BT.2020 color space is not supported');
  }
};

/** A zero side is derived from the other one, keeping the aspect ratio. */
export const snapshotSize = (source: Size, width: number, height: number): Size => {
  if (width === 0 && height === 0) return source;
  if (width === 0) return { width: Math.floor((height * source.width) / source.height), height };
  if (height === 0) return { width, height: Math.floor((width * source.height) / source.width) };
  return { width, height };
};

export interface SnapshotPlan extends Size {
  format: (typeof SNAPSHOT_FORMATS)[number];
  inputOptions: string[];
  outputOptions: string[];
  videoFilters: string[];
}

export const planSnapshot = (context: MediaContext, params: StageParams): SnapshotPlan => {
  const { width, height } = context.metadata;
  if (!width || !height) throw new Error('Video dimensions are unknown');

  const at = numberParam(params, 't') ?? 0;
  if (context.metadata.durationMs !== undefined && at >= context.metadata.durationMs) {
    throw new Error(`Snapshot time ${at}ms is past the end of the ${context.metadata.durationMs}ms video`);
  }

  const format = enumParam(params, 'f', SNAPSHOT_FORMATS, 'jpg');
  const rotation = enumParam(params, 'ar', ['auto', 'h', 'w'] as const, 'auto');
  const size = snapshotSize({ width, height }, numberParam(params, 'w') ?? 0, numberParam(params, 'h') ?? 0);

  const videoFilters = [`scale=${size.width}:${size.height}`];
  let output = size;
  if (rotation === 'h' && size.width > size.height) {
    videoFilters.push('transpose=1');
    output = { width: size.height, height: size.width };
  } else if (rotation === 'w' && size.width < size.height) {
    videoFilters.push('transpose=2');
    output = { width: size.height, height: size.width };
  }
  if (params.m === 'fast') videoFilters.push('select=eq(pict_type\\,I)');

  return {
    ...output,
    format,
    inputOptions: [`-ss ${at / 1000}`],
    outputOptions: ['-frames:v 1', '-update 1', format === 'jpg' ? '-q:v 2' : '-compression_level 3'],
    videoFilters,
  };
};

export const createVideoHandlers = ({ ffmpeg }: { ffmpeg: FfmpegRunner }): HandlerTable<'video'> => ({
  snapshot: async (context, params) => {
    assertSnapshotSource(context);
    const plan = planSnapshot(context, params);
    const artifact = await ffmpeg.transcode({
      input: context.artifact,
      inputFormat: context.metadata.format,
      outputFormat: plan.format,
      inputOptions: plan.inputOptions,
      outputOptions: plan.outputOptions,
      videoFilters: plan.videoFilters,
    });
    return {
      artifact,
      metadata: { format: plan.format, width: plan.width, height: plan.height },
    };
  },
});
