import type { MediaType, OperationName } from '../media/catalog.js';

/** One parsed stage: operation name plus raw, untyped tokens. */
export interface OperationSpec<M extends MediaType = MediaType> {
  name: OperationName<M>;
  /** Insertion order follows the source string. */
  params: ReadonlyMap<string, string>;
  flags: readonly string[];
  position: number;
}

export type ParamValue = number | string | boolean | readonly number[];

export type StageParams = Readonly<Record<string, ParamValue>>;

export interface ValidatedStage<M extends MediaType = MediaType> {
  name: OperationName<M>;
  position: number;
  params: StageParams;
}

export interface Pipeline<M extends MediaType = MediaType> {
  mediaType: M;
  stages: readonly ValidatedStage<M>[];
  /** Format the last format-selecting stage produces, or the source format. */
  outputFormat?: string;
}
