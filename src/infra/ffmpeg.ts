import { promises as fs } from 'fs';
import { join } from 'path';
import ffmpeg from 'fluent-ffmpeg';
import type { FfprobeData } from 'fluent-ffmpeg';
import { logger } from '../logger.js';
import { withTempDir } from './temp.js';

export interface TranscodeRequest {
  input: Buffer;
  /** Extension used for the scratch input file so ffmpeg can pick a demuxer. */
  inputFormat: string;
  outputFormat: string;
  inputOptions?: readonly string[];
  outputOptions?: readonly string[];
  videoFilters?: readonly string[];
}

export interface ProbeResult {
  width?: number;
  height?: number;
  durationMs?: number;
  sampleRate?: number;
  channels?: number;
  codec?: string;
  colorSpace?: string;
  rotation?: number;
}

export interface FfmpegRunner {
  transcode(request: TranscodeRequest): Promise<Buffer>;
  probe(input: Buffer, format: string): Promise<ProbeResult>;
}

export const configureFfmpeg = (paths: { ffmpegPath?: string; ffprobePath?: string }) => {
  if (paths.ffmpegPath) ffmpeg.setFfmpegPath(paths.ffmpegPath);
  if (paths.ffprobePath) ffmpeg.setFfprobePath(paths.ffprobePath);
};

const ffprobeFile = (path: string) =>
  new Promise<FfprobeData>((resolve, reject) => {
    ffmpeg.ffprobe(path, (err, data) => {
      if (err) {
        reject(err instanceof Error ? err : new Error(String(err)));
        return;
      }
      resolve(data);
    });
  });

const optionalNumber = (value: unknown): number | undefined => {
  const parsed = Number(value);
  return value === undefined || value === null || value === '' || Number.isNaN(parsed) ? undefined : parsed;
};

export const toProbeResult = (data: FfprobeData): ProbeResult => {
  const streams = data.streams ?? [];
  const video = streams.find((stream) => stream.codec_type === 'video');
  const audio = streams.find((stream) => stream.codec_type === 'audio');
  const primary = video ?? audio;
  const duration = optionalNumber(data.format?.duration);

  return {
    width: video?.width,
    height: video?.height,
    durationMs: duration === undefined ? undefined : Math.round(duration * 1000),
    sampleRate: optionalNumber(audio?.sample_rate),
    channels: audio?.channels,
    codec: primary?.codec_name,
    colorSpace: video?.color_space,
    rotation: optionalNumber(video?.rotation),
  };
};

export const ffmpegRunner: FfmpegRunner = {
  transcode: async (request) =>
    withTempDir('media-ffmpeg', async (dir) => {
      const inputPath = join(dir, `input.${request.inputFormat}`);
      const outputPath = join(dir, `output.${request.outputFormat}`);
      await fs.writeFile(inputPath, request.input);

      const command = ffmpeg(inputPath);
      if (request.inputOptions?.length) command.inputOptions([...request.inputOptions]);
      if (request.videoFilters?.length) command.videoFilters([...request.videoFilters]);
      if (request.outputOptions?.length) command.outputOptions([...request.outputOptions]);

      await new Promise<void>((resolve, reject) => {
        command
          .on('start', (commandLine: string) => logger.debug({ commandLine }, 'ffmpeg started'))
          .on('error', (err: Error) => reject(err))
          .on('end', () => resolve())
          .save(outputPath);
      });

      return fs.readFile(outputPath);
    }),

  probe: async (input, format) =>
    withTempDir('media-probe', async (dir) => {
      const path = join(dir, `probe.${format}`);
      await fs.writeFile(path, input);
      return toProbeResult(await ffprobeFile(path));
    }),
};
