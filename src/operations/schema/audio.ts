import type { NamespaceSchema } from './types.js';
import { int, intSet, oneOf } from './builders.js';

export const AUDIO_FORMATS = ['mp3', 'm4a', 'flac', 'oga', 'ac3', 'opus', 'amr'] as const;

// Formats whose encoders take a quality scale instead of a bitrate.
export const VBR_FORMATS = ['mp3', 'm4a', 'oga'] as const;

export const SAMPLE_RATES = [8000, 11025, 12000, 16000, 22050, 24000, 32000, 44100, 48000, 64000, 88200, 96000] as const;

const MAX_DURATION_MS = 24 * 60 * 60 * 1000;

export const AUDIO_SCHEMA: NamespaceSchema<'audio'> = {
  operations: {
    convert: {
      params: {
        f: { type: oneOf(...AUDIO_FORMATS), required: true },
        ss: { type: int(0, MAX_DURATION_MS) },
        t: { type: int(1, MAX_DURATION_MS) },
        ar: { type: intSet(...SAMPLE_RATES) },
        ac: { type: int(1, 8) },
        aq: {
          type: int(0, 100),
          exclusive: { group: 'bitrate', member: 'quality' },
          when: { whenParam: 'f', in: VBR_FORMATS },
        },
        ab: { type: int(1000, 10_000_000), exclusive: { group: 'bitrate', member: 'bitrate' } },
        abopt: { type: oneOf('0', '1', '2'), when: { whenPresent: ['ab'] } },
        adepth: { type: intSet(16, 24), when: { whenParam: 'f', in: ['flac'] } },
      },
      formatKey: 'f',
    },
  },
  formats: {
    mp3: {
      ar: { allowed: [8000, 11025, 12000, 16000, 22050, 24000, 32000, 44100, 48000] },
      ac: { max: 2 },
      ab: { min: 8000, max: 320_000 },
    },
    m4a: {
      ab: { min: 8000, max: 512_000 },
    },
    flac: {
      ab: { supported: false },
    },
    oga: {
      ab: { min: 8000, max: 500_000 },
    },
    ac3: {
      ar: { allowed: [32000, 44100, 48000] },
      ac: { max: 6 },
      ab: { min: 32_000, max: 640_000 },
    },
    opus: {
      ar: { allowed: [8000, 12000, 16000, 24000, 48000] },
      ab: { min: 6000, max: 510_000 },
    },
    amr: {
      ar: { allowed: [8000] },
      ac: { allowed: [1] },
      ab: { min: 4750, max: 12_200 },
    },
  },
};
