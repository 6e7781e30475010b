import { describe, it, expect } from 'vitest';
import type { FfmpegRunner, TranscodeRequest } from '../infra/ffmpeg.js';
import { buildPipeline } from '../operations/index.js';
import type { MediaContext } from '../pipeline/types.js';
import { buildAudioOptions, createAudioHandlers } from './audio.js';

const paramsOf = (operations: string) => buildPipeline('audio', operations).stages[0].params;

const wav: MediaContext = {
  artifact: Buffer.from('wav-bytes'),
  metadata: { format: 'wav', sampleRate: 44100, channels: 2, durationMs: 60000, codec: 'pcm_s16le' },
};

describe('buildAudioOptions', () => {
  it('should order trimming, resampling and quality before the muxer', () => {
    expect(buildAudioOptions(paramsOf('convert,f_mp3,ss_1500,t_30000,ar_44100,ac_2,aq_90'))).toEqual({
      format: 'mp3',
      outputOptions: ['-vn', '-ss 1.5', '-t 30', '-ar 44100', '-ac 2', '-q:a 1', '-f mp3', '-c:a libmp3lame'],
    });
  });

  it('should constrain the bitrate in strict mode', () => {
    expect(buildAudioOptions(paramsOf('convert,f_opus,ab_64000,abopt_2')).outputOptions).toEqual([
      '-vn',
      '-b:a 64000',
      '-minrate 64000',
      '-maxrate 64000',
      '-bufsize 128000',
      '-f opus',
      '-c:a libopus',
    ]);
  });

  it('should map bit depth to a sample format', () => {
    expect(buildAudioOptions(paramsOf('convert,f_flac,adepth_24')).outputOptions).toEqual([
      '-vn',
      '-sample_fmt s32',
      '-f flac',
      '-c:a flac',
    ]);
  });

  it('should use the only sample rate and channel count AMR allows', () => {
    expect(buildAudioOptions(paramsOf('convert,f_amr')).outputOptions).toEqual([
      '-vn',
      '-ar 8000',
      '-ac 1',
      '-f amr',
      '-c:a libopencore_amrnb',
    ]);
  });
});

describe('audio convert handler', () => {
  it('should transcode and carry over the new stream properties', async () => {
    const requests: TranscodeRequest[] = [];
    const ffmpeg: FfmpegRunner = {
      transcode: async (request) => {
        requests.push(request);
        return Buffer.from('mp3-bytes');
      },
      probe: async () => ({}),
    };

    const result = await createAudioHandlers({ ffmpeg }).convert(wav, paramsOf('convert,f_mp3,ar_22050'));

    expect(requests[0]).toMatchObject({ inputFormat: 'wav', outputFormat: 'mp3' });
    expect(result.artifact.toString()).toBe('mp3-bytes');
    expect(result.metadata).toEqual({
      format: 'mp3',
      sampleRate: 22050,
      channels: 2,
      durationMs: 60000,
      codec: undefined,
    });
  });

  it('should refuse sources it cannot decode', async () => {
    const ffmpeg: FfmpegRunner = {
      transcode: async () => Buffer.alloc(0),
      probe: async () => ({}),
    };
    const aiff: MediaContext = { ...wav, metadata: { format: 'aiff' } };

    await expect(createAudioHandlers({ ffmpeg }).convert(aiff, paramsOf('convert,f_mp3'))).rejects.toThrow(
      'Unsupported audio source format "aiff"',
    );
  });
});
