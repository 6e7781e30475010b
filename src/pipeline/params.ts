import type { StageParams } from '../operations/types.js';

// Readers for validated stage params. Validation has already typed and
// defaulted every value, so a mismatch here is a programming error.

export const numberParam = (params: StageParams, key: string): number | undefined => {
  const value = params[key];
  return typeof value === 'number' ? value : undefined;
};

export const stringParam = (params: StageParams, key: string): string | undefined => {
  const value = params[key];
  return typeof value === 'string' ? value : undefined;
};

export const booleanParam = (params: StageParams, key: string): boolean | undefined => {
  const value = params[key];
  return typeof value === 'boolean' ? value : undefined;
};

export const listParam = (params: StageParams, key: string): readonly number[] | undefined => {
  const value = params[key];
  return typeof value === 'object' ? value : undefined;
};

export const requireNumber = (params: StageParams, key: string): number => {
  const value = numberParam(params, key);
  if (value === undefined) throw new Error(`Missing numeric parameter "${key}"`);
  return value;
};

export const requireString = (params: StageParams, key: string): string => {
  const value = stringParam(params, key);
  if (value === undefined) throw new Error(`Missing parameter "${key}"`);
  return value;
};

export const enumParam = <T extends string>(
  params: StageParams,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T => {
  const value = params[key];
  return allowed.find((entry) => entry === value) ?? fallback;
};
