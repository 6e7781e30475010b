import { lookup } from 'mime-types';

// Containers the mime database maps to something other than what players expect.
const OVERRIDES: Readonly<Record<string, string>> = {
  mp3: 'audio/mpeg',
  m4a: 'audio/mp4',
  oga: 'audio/ogg',
  opus: 'audio/opus',
  amr: 'audio/amr',
  ac3: 'audio/ac3',
  flac: 'audio/flac',
  txt: 'text/plain',
};

export const contentTypeFor = (format: string): string => {
  const normalized = format.toLowerCase();
  if (Object.hasOwn(OVERRIDES, normalized)) return OVERRIDES[normalized];
  return lookup(normalized) || 'application/octet-stream';
};
