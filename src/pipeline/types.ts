import type { MediaType, OperationName } from '../media/catalog.js';
import type { StageParams } from '../operations/types.js';

export interface MediaMetadata {
  format: string;
  width?: number;
  height?: number;
  durationMs?: number;
  sampleRate?: number;
  channels?: number;
  codec?: string;
  colorSpace?: string;
  /** Display rotation in degrees, from the container's side data. */
  rotation?: number;
  pages?: number;
  quality?: number;
}

export interface MediaContext {
  artifact: Buffer;
  metadata: MediaMetadata;
  /** Multi-part output, e.g. one image per document page. `artifact` is the first part. */
  parts?: readonly Buffer[];
}

export type StageHandler = (context: MediaContext, params: StageParams) => Promise<MediaContext>;

/** One handler per operation of a media type; a missing entry does not compile. */
export type HandlerTable<M extends MediaType> = { readonly [K in OperationName<M>]: StageHandler };

export type HandlerRegistry = { readonly [M in MediaType]: HandlerTable<M> };

export interface PipelineResult extends MediaContext {
  etag: string;
  contentType: string;
}
