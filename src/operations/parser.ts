import { ParseError } from '../errors.js';
import { isOperationName, type MediaType } from '../media/catalog.js';
import type { OperationSpec } from './types.js';

const STAGE_SEPARATOR = '/';
const TOKEN_SEPARATOR = ',';
const KEY_VALUE_SEPARATOR = '_';

const parseStage = <M extends MediaType>(
  mediaType: M,
  stage: string,
  position: number,
): OperationSpec<M> => {
  if (stage.length === 0) {
    throw new ParseError(`Empty stage at position ${position}`, position, stage);
  }

  const [name, ...tokens] = stage.split(TOKEN_SEPARATOR);
  if (!isOperationName(mediaType, name)) {
    throw new ParseError(`Unknown ${mediaType} operation "${name}"`, position, name);
  }

  const params = new Map<string, string>();
  const flags: string[] = [];

  for (const token of tokens) {
    if (token.length === 0) {
      throw new ParseError(`Empty token in stage "${name}"`, position, token);
    }

    const split = token.indexOf(KEY_VALUE_SEPARATOR);
    if (split === -1) {
      if (flags.includes(token) || params.has(token)) {
        throw new ParseError(`Duplicate flag "${token}" in stage "${name}"`, position, token);
      }
      flags.push(token);
      continue;
    }

    // Only the first underscore separates; values may contain more.
    const key = token.slice(0, split);
    const value = token.slice(split + 1);
    if (key.length === 0) {
      throw new ParseError(`Empty parameter key in token "${token}"`, position, token);
    }
    if (params.has(key) || flags.includes(key)) {
      throw new ParseError(`Duplicate parameter "${key}" in stage "${name}"`, position, token);
    }
    params.set(key, value);
  }

  return { name, params, flags, position };
};

/**
 * Split a raw operations string into ordered stage specs for one media type.
 *
 * @example
 * parseOperations('image', 'resize,w_800/format,png')
 */
export const parseOperations = <M extends MediaType>(mediaType: M, raw: string): OperationSpec<M>[] => {
  if (raw.length === 0) {
    throw new ParseError('Operations string is empty');
  }
  return raw.split(STAGE_SEPARATOR).map((stage, position) => parseStage(mediaType, stage, position));
};
