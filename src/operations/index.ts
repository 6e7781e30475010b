import type { MediaType } from '../media/catalog.js';
import { parseOperations } from './parser.js';
import type { Pipeline } from './types.js';
import { validatePipeline, type ValidateOptions } from './validator.js';

export { parseOperations } from './parser.js';
export { validatePipeline } from './validator.js';
export type { ValidateOptions } from './validator.js';
export type { OperationSpec, ParamValue, Pipeline, StageParams, ValidatedStage } from './types.js';

/** Parse then validate; either step throws before any side effect. */
export const buildPipeline = <M extends MediaType>(
  mediaType: M,
  operations: string,
  options?: ValidateOptions,
): Pipeline<M> => validatePipeline(mediaType, parseOperations(mediaType, operations), options);
