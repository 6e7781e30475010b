import type { MediaType } from '../../media/catalog.js';
import { deepFreeze } from '../freeze.js';
import { AUDIO_SCHEMA } from './audio.js';
import { DOCUMENT_SCHEMA } from './document.js';
import { IMAGE_SCHEMA } from './image.js';
import type { FormatConstraintTable, NamespaceSchema, OperationSchema, ParamBound } from './types.js';
import { VIDEO_SCHEMA } from './video.js';

export type { FormatConstraintTable, OperationSchema, ParamBound, ParamSpec, ParamType } from './types.js';

type SchemaRegistry = { readonly [M in MediaType]: NamespaceSchema<M> };

export const SCHEMAS: SchemaRegistry = deepFreeze({
  image: IMAGE_SCHEMA,
  audio: AUDIO_SCHEMA,
  video: VIDEO_SCHEMA,
  document: DOCUMENT_SCHEMA,
});

const OPERATION_TABLES: Readonly<Record<MediaType, Readonly<Record<string, OperationSchema | undefined>>>> = {
  image: SCHEMAS.image.operations,
  audio: SCHEMAS.audio.operations,
  video: SCHEMAS.video.operations,
  document: SCHEMAS.document.operations,
};

const FORMAT_TABLES: Readonly<Record<MediaType, FormatConstraintTable>> = {
  image: SCHEMAS.image.formats,
  audio: SCHEMAS.audio.formats,
  video: SCHEMAS.video.formats,
  document: SCHEMAS.document.formats,
};

export const getOperationSchema = (mediaType: MediaType, name: string): OperationSchema | undefined =>
  Object.hasOwn(OPERATION_TABLES[mediaType], name) ? OPERATION_TABLES[mediaType][name] : undefined;

export const getFormatConstraints = (
  mediaType: MediaType,
  format: string,
): Readonly<Record<string, ParamBound>> | undefined => {
  const table = FORMAT_TABLES[mediaType];
  return Object.hasOwn(table, format) ? table[format] : undefined;
};
