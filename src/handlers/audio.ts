import type { FfmpegRunner } from '../infra/ffmpeg.js';
import { AUDIO_FORMATS } from '../operations/schema/audio.js';
import type { StageParams } from '../operations/types.js';
import { enumParam, numberParam, stringParam } from '../pipeline/params.js';
import type { HandlerTable, MediaContext } from '../pipeline/types.js';

type AudioFormat = (typeof AUDIO_FORMATS)[number];

// Sources are PCM WAV; anything this service itself produced is accepted too so
// conversions can be chained.
export const AUDIO_INPUT_FORMATS: ReadonlySet<string> = new Set(['wav', ...AUDIO_FORMATS]);

const MUXERS: Readonly<Record<AudioFormat, string[]>> = {
  mp3: ['-f mp3', '-c:a libmp3lame'],
  m4a: ['-f mp4', '-c:a aac'],
  flac: ['-f flac', '-c:a flac'],
  oga: ['-f oga', '-c:a libvorbis'],
  ac3: ['-f ac3', '-c:a ac3'],
  opus: ['-f opus', '-c:a libopus'],
  amr: ['-f amr', '-c:a libopencore_amrnb'],
};

const seconds = (ms: number) => `${ms / 1000}`;

const qualityOption = (format: AudioFormat, quality: number): string => {
  // lame: 0 best, 9 worst. vorbis: 0–10. native aac: 0.1–2.
  if (format === 'mp3') return `-q:a ${Math.round(9 - (quality * 9) / 100)}`;
  if (format === 'oga') return `-q:a ${Math.round(quality / 10)}`;
  return `-q:a ${Math.max(0.1, quality / 50)}`;
};

const bitrateOptions = (bitrate: number, mode: string | undefined): string[] => {
  if (mode === '1') return [`-b:a ${bitrate}`, `-maxrate ${bitrate}`];
  if (mode === '2') return [`-b:a ${bitrate}`, `-minrate ${bitrate}`, `-maxrate ${bitrate}`, `-bufsize ${bitrate * 2}`];
  return [`-b:a ${bitrate}`];
};

/** Output options for one `convert` stage, in ffmpeg argument order. */
export const buildAudioOptions = (params: StageParams): { format: AudioFormat; outputOptions: string[] } => {
  const format = enumParam(params, 'f', AUDIO_FORMATS, 'mp3');
  const options = ['-vn'];

  const start = numberParam(params, 'ss');
  const duration = numberParam(params, 't');
  const sampleRate = numberParam(params, 'ar');
  const channels = numberParam(params, 'ac');
  const quality = numberParam(params, 'aq');
  const bitrate = numberParam(params, 'ab');
  const depth = numberParam(params, 'adepth');

  if (start !== undefined) options.push(`-ss ${seconds(start)}`);
  if (duration !== undefined) options.push(`-t ${seconds(duration)}`);
  if (sampleRate !== undefined) options.push(`-ar ${sampleRate}`);
  if (channels !== undefined) options.push(`-ac ${channels}`);
  if (quality !== undefined) options.push(qualityOption(format, quality));
  if (bitrate !== undefined) options.push(...bitrateOptions(bitrate, stringParam(params, 'abopt')));
  if (depth !== undefined) options.push(`-sample_fmt s${depth === 24 ? 32 : 16}`);

  return { format, outputOptions: [...options, ...MUXERS[format]] };
};

export const createAudioHandlers = ({ ffmpeg }: { ffmpeg: FfmpegRunner }): HandlerTable<'audio'> => ({
  convert: async (context: MediaContext, params: StageParams) => {
    const inputFormat = context.metadata.format;
    if (!AUDIO_INPUT_FORMATS.has(inputFormat)) {
      throw new Error(`Unsupported audio source format "${inputFormat}"`);
    }

    const { format, outputOptions } = buildAudioOptions(params);
    const artifact = await ffmpeg.transcode({ input: context.artifact, inputFormat, outputFormat: format, outputOptions });

    return {
      artifact,
      metadata: {
        ...context.metadata,
        format,
        codec: undefined,
        sampleRate: numberParam(params, 'ar') ?? context.metadata.sampleRate,
        channels: numberParam(params, 'ac') ?? context.metadata.channels,
      },
    };
  },
});
