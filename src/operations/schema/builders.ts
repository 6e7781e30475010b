import type { ParamType } from './types.js';

export const int = (min: number, max: number): ParamType => ({ kind: 'int', min, max });
export const intSet = (...values: number[]): ParamType => ({ kind: 'int-set', values });
export const oneOf = (...values: string[]): ParamType => ({ kind: 'enum', values });
export const color: ParamType = { kind: 'color' };
export const percent: ParamType = { kind: 'percent' };
export const bool: ParamType = { kind: 'bool' };
export const base64Text = (maxLength: number): ParamType => ({ kind: 'base64-text', maxLength });
export const pageList: ParamType = { kind: 'page-list' };

export const GRAVITIES = ['nw', 'north', 'ne', 'west', 'center', 'east', 'sw', 'south', 'se'] as const;
export type Gravity = (typeof GRAVITIES)[number];
