export const MEDIA_TYPES = ['image', 'audio', 'video', 'document'] as const;

export type MediaType = (typeof MEDIA_TYPES)[number];

/**
 * Closed operation namespaces. Each media type owns its own set; names are
 * never shared across namespaces even when they coincide (`convert`).
 */
export const OPERATIONS = {
  image: ['resize', 'crop', 'rotate', 'blur', 'grayscale', 'watermark', 'format', 'quality', 'auto-orient'],
  audio: ['convert'],
  video: ['snapshot'],
  document: ['convert'],
} as const satisfies Record<MediaType, readonly string[]>;

export type OperationName<M extends MediaType> = (typeof OPERATIONS)[M][number];

export const TASK_TYPES: Readonly<Record<MediaType, string>> = {
  image: 'image/process',
  audio: 'audio/process',
  video: 'video/process',
  document: 'doc/convert',
};

export const isMediaType = (value: string): value is MediaType => {
  const known: readonly string[] = MEDIA_TYPES;
  return known.includes(value);
};

export const isOperationName = <M extends MediaType>(
  mediaType: M,
  name: string,
): name is OperationName<M> => {
  const names: readonly string[] = OPERATIONS[mediaType];
  return names.includes(name);
};

/** Lower-cased extension of an object key, without the dot. */
export const extensionOf = (key: string): string | undefined => {
  const base = key.split('/').pop() ?? key;
  const dot = base.lastIndexOf('.');
  if (dot <= 0 || dot === base.length - 1) return undefined;
  return base.slice(dot + 1).toLowerCase();
};
