import type { NamespaceSchema } from './types.js';
import { int, oneOf } from './builders.js';

export const SNAPSHOT_FORMATS = ['jpg', 'png'] as const;

export const VIDEO_SCHEMA: NamespaceSchema<'video'> = {
  operations: {
    snapshot: {
      params: {
        t: { type: int(0, 24 * 60 * 60 * 1000), default: 0 },
        w: { type: int(0, 16384), default: 0 },
        h: { type: int(0, 16384), default: 0 },
        m: { type: oneOf('default', 'fast'), default: 'default' },
        f: { type: oneOf(...SNAPSHOT_FORMATS), default: 'jpg' },
        ar: { type: oneOf('auto', 'h', 'w'), default: 'auto' },
      },
      formatKey: 'f',
      terminal: true,
    },
  },
  formats: {},
};
