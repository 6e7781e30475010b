import type { MediaType, OperationName } from '../../media/catalog.js';
import type { ParamValue } from '../types.js';

export type ParamType =
  | { kind: 'int'; min: number; max: number }
  | { kind: 'int-set'; values: readonly number[] }
  | { kind: 'enum'; values: readonly string[] }
  | { kind: 'color' }
  | { kind: 'percent' }
  | { kind: 'bool' }
  | { kind: 'text'; maxLength: number }
  | { kind: 'base64-text'; maxLength: number }
  | { kind: 'page-list' };

/** Keys sharing a group but naming different members may not appear together. */
export interface ExclusivityRule {
  group: string;
  member: string;
}

export type ApplicabilityRule =
  | { whenParam: string; in: readonly ParamValue[] }
  | { whenPresent: readonly string[] };

export interface ParamSpec {
  type: ParamType;
  default?: ParamValue;
  required?: boolean;
  exclusive?: ExclusivityRule;
  /** The key is only meaningful when this holds; present without it is rejected. */
  when?: ApplicabilityRule;
}

export interface Requirement {
  when: ApplicabilityRule;
  keys: readonly string[];
}

export interface OperationSchema {
  params: Readonly<Record<string, ParamSpec>>;
  /** Key a single bare flag binds to, e.g. `rotate,90`. */
  positional?: string;
  /** Param that selects this stage's output format. */
  formatKey?: string;
  requireOneOf?: readonly (readonly string[])[];
  requires?: readonly Requirement[];
  /** No stage may follow. */
  terminal?: boolean;
}

export interface ParamBound {
  allowed?: readonly ParamValue[];
  min?: number;
  max?: number;
  supported?: false;
}

/** Output format → constrained param key → bound. */
export type FormatConstraintTable = Readonly<Record<string, Readonly<Record<string, ParamBound>>>>;

export interface NamespaceSchema<M extends MediaType> {
  operations: { readonly [K in OperationName<M>]: OperationSchema };
  formats: FormatConstraintTable;
}
