import type { NamespaceSchema, ParamBound } from './types.js';
import { GRAVITIES, base64Text, bool, color, int, intSet, oneOf, percent } from './builders.js';

export const IMAGE_FORMATS = ['jpg', 'jpeg', 'png', 'webp', 'bmp', 'gif', 'tiff'] as const;
export const LOSSY_IMAGE_FORMATS = ['jpg', 'jpeg', 'webp'] as const;
export const RESIZE_MODES = ['lfit', 'mfit', 'fill', 'pad', 'fixed'] as const;

const MAX_SIDE = 16384;
const side = int(1, MAX_SIDE);

const lossy: Readonly<Record<string, ParamBound>> = { q: { min: 1, max: 100 }, Q: { min: 1, max: 100 } };
const lossless: Readonly<Record<string, ParamBound>> = { q: { supported: false }, Q: { supported: false } };

export const IMAGE_SCHEMA: NamespaceSchema<'image'> = {
  operations: {
    resize: {
      params: {
        p: { type: int(1, 1000), exclusive: { group: 'scale', member: 'percent' } },
        w: { type: side, exclusive: { group: 'scale', member: 'box' } },
        h: { type: side, exclusive: { group: 'scale', member: 'box' } },
        l: { type: side, exclusive: { group: 'scale', member: 'longest' } },
        s: { type: side, exclusive: { group: 'scale', member: 'shortest' } },
        m: { type: oneOf(...RESIZE_MODES), default: 'lfit', when: { whenPresent: ['w', 'h'] } },
        color: { type: color, default: 'FFFFFF', when: { whenParam: 'm', in: ['pad'] } },
        limit: { type: bool, default: true },
      },
      requireOneOf: [['p', 'w', 'h', 'l', 's']],
      requires: [{ when: { whenParam: 'm', in: ['fill', 'pad', 'fixed'] }, keys: ['w', 'h'] }],
    },
    crop: {
      params: {
        w: { type: side, exclusive: { group: 'region', member: 'box' } },
        h: { type: side, exclusive: { group: 'region', member: 'box' } },
        p: { type: percent, exclusive: { group: 'region', member: 'percent' } },
        x: { type: int(0, MAX_SIDE), default: 0 },
        y: { type: int(0, MAX_SIDE), default: 0 },
        g: { type: oneOf(...GRAVITIES), default: 'nw' },
      },
      requireOneOf: [['w', 'h', 'p']],
    },
    rotate: {
      params: { d: { type: intSet(90, 180, 270), default: 90 } },
      positional: 'd',
    },
    blur: {
      params: { r: { type: int(1, 50), default: 2 } },
      positional: 'r',
    },
    grayscale: { params: {} },
    watermark: {
      params: {
        text: { type: base64Text(64), required: true },
        color: { type: color, default: '000000' },
        t: { type: int(0, 100), default: 100 },
        g: { type: oneOf(...GRAVITIES), default: 'se' },
        x: { type: int(0, 4096), default: 10 },
        y: { type: int(0, 4096), default: 10 },
        voffset: { type: int(-1000, 1000), default: 0 },
        size: { type: int(1, 1000), default: 40 },
        shadow: { type: int(0, 100), default: 0 },
      },
    },
    format: {
      params: {
        f: { type: oneOf(...IMAGE_FORMATS), required: true },
        q: { type: percent, default: 85, when: { whenParam: 'f', in: LOSSY_IMAGE_FORMATS } },
      },
      positional: 'f',
      formatKey: 'f',
    },
    quality: {
      params: {
        q: { type: percent, exclusive: { group: 'quality', member: 'relative' } },
        Q: { type: percent, exclusive: { group: 'quality', member: 'absolute' } },
      },
      requireOneOf: [['q', 'Q']],
    },
    'auto-orient': {
      params: { a: { type: bool, default: false } },
      positional: 'a',
    },
  },
  formats: {
    jpg: lossy,
    jpeg: lossy,
    webp: lossy,
    png: lossless,
    bmp: lossless,
    gif: lossless,
    tiff: lossless,
  },
};
