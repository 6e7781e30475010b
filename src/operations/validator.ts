import { ValidationError } from '../errors.js';
import type { MediaType } from '../media/catalog.js';
import { deepFreeze } from './freeze.js';
import { createCoercer, type Coercer } from './schema/param-types.js';
import { getFormatConstraints, getOperationSchema } from './schema/index.js';
import type { OperationSchema, ParamBound, ParamSpec } from './schema/index.js';
import type { ApplicabilityRule } from './schema/types.js';
import type { OperationSpec, ParamValue, Pipeline, ValidatedStage } from './types.js';

export interface ValidateOptions {
  /** Format of the source object, usually its key extension. */
  sourceFormat?: string;
}

type Values = Record<string, ParamValue>;

const coercers = new WeakMap<ParamSpec, Coercer>();

const coercerFor = (spec: ParamSpec): Coercer => {
  let coercer = coercers.get(spec);
  if (!coercer) {
    coercer = createCoercer(spec.type);
    coercers.set(spec, coercer);
  }
  return coercer;
};

const paramSpec = (schema: OperationSchema, key: string): ParamSpec | undefined =>
  Object.hasOwn(schema.params, key) ? schema.params[key] : undefined;

const holds = (rule: ApplicabilityRule, values: Values): boolean => {
  if ('whenParam' in rule) {
    const current = values[rule.whenParam];
    return current !== undefined && rule.in.includes(current);
  }
  return rule.whenPresent.some((key) => values[key] !== undefined);
};

const describeRule = (rule: ApplicabilityRule): string =>
  'whenParam' in rule
    ? `${rule.whenParam} is one of ${rule.in.join(', ')}`
    : `${rule.whenPresent.join(' or ')} is given`;

const bindFlags = (spec: OperationSpec, schema: OperationSchema): Map<string, string> => {
  const raw = new Map(spec.params);
  if (spec.flags.length === 0) return raw;

  const fail = (key: string | undefined, reason: string) =>
    new ValidationError(spec.name, spec.position, key, reason);

  if (spec.flags.length > 1) {
    throw fail(undefined, `accepts at most one bare value, got ${spec.flags.join(', ')}`);
  }
  const [flag] = spec.flags;
  if (!schema.positional) {
    throw fail(undefined, `does not accept a bare value ("${flag}")`);
  }
  if (raw.has(schema.positional)) {
    throw fail(schema.positional, 'given both as a bare value and explicitly');
  }
  raw.set(schema.positional, flag);
  return raw;
};

const validateStage = <M extends MediaType>(
  mediaType: M,
  spec: OperationSpec<M>,
): { stage: ValidatedStage<M>; schema: OperationSchema } => {
  const schema = getOperationSchema(mediaType, spec.name);
  if (!schema) {
    throw new ValidationError(spec.name, spec.position, undefined, `not a ${mediaType} operation`);
  }

  const fail = (key: string | undefined, reason: string) =>
    new ValidationError(spec.name, spec.position, key, reason);

  const raw = bindFlags(spec, schema);

  for (const key of raw.keys()) {
    if (!paramSpec(schema, key)) throw fail(key, 'unknown parameter');
  }

  // Exclusivity looks at keys only, before any value is inspected.
  const claimed = new Map<string, { member: string; key: string }>();
  for (const key of raw.keys()) {
    const rule = paramSpec(schema, key)?.exclusive;
    if (!rule) continue;
    const holder = claimed.get(rule.group);
    if (holder && holder.member !== rule.member) {
      throw fail(key, `cannot be combined with "${holder.key}"`);
    }
    if (!holder) claimed.set(rule.group, { member: rule.member, key });
  }

  const values: Values = {};
  for (const [key, value] of raw) {
    const param = paramSpec(schema, key);
    if (!param) continue;
    const result = coercerFor(param)(value);
    if (!result.success) throw fail(key, result.reason);
    values[key] = result.value;
  }

  const entries = Object.entries(schema.params);

  for (const [key, param] of entries) {
    if (values[key] === undefined && param.default !== undefined && !param.when) {
      values[key] = param.default;
    }
  }

  for (const [key, param] of entries) {
    if (raw.has(key) && param.when && !holds(param.when, values)) {
      throw fail(key, `only applies when ${describeRule(param.when)}`);
    }
  }

  for (const [key, param] of entries) {
    if (param.required && values[key] === undefined) throw fail(key, 'is required');
  }
  for (const keys of schema.requireOneOf ?? []) {
    if (!keys.some((key) => values[key] !== undefined)) {
      throw fail(undefined, `requires one of ${keys.join(', ')}`);
    }
  }
  for (const requirement of schema.requires ?? []) {
    if (!holds(requirement.when, values)) continue;
    const missing = requirement.keys.find((key) => values[key] === undefined);
    if (missing) throw fail(missing, `is required when ${describeRule(requirement.when)}`);
  }

  for (const [key, param] of entries) {
    if (values[key] === undefined && param.default !== undefined && param.when && holds(param.when, values)) {
      values[key] = param.default;
    }
  }

  return { stage: { name: spec.name, position: spec.position, params: values }, schema };
};

const singleValue = (bound: ParamBound): ParamValue | undefined => {
  if (bound.allowed?.length === 1) return bound.allowed[0];
  if (bound.min !== undefined && bound.min === bound.max) return bound.min;
  return undefined;
};

const checkBound = (value: ParamValue, bound: ParamBound, format: string): string | undefined => {
  if (bound.supported === false) return `is not supported for ${format} output`;
  if (bound.allowed && !bound.allowed.includes(value)) {
    return `must be one of ${bound.allowed.join(', ')} for ${format} output`;
  }
  if (typeof value === 'number') {
    if ((bound.min !== undefined && value < bound.min) || (bound.max !== undefined && value > bound.max)) {
      return `must be between ${bound.min ?? '-'} and ${bound.max ?? '-'} for ${format} output`;
    }
  }
  return undefined;
};

/**
 * Type, default and cross-check parsed stages against the media type's
 * schema tables. Fails on the first violation; the returned pipeline is
 * frozen.
 */
export const validatePipeline = <M extends MediaType>(
  mediaType: M,
  specs: readonly OperationSpec<M>[],
  options: ValidateOptions = {},
): Pipeline<M> => {
  const validated = specs.map((spec) => validateStage(mediaType, spec));

  validated.forEach(({ stage, schema }, index) => {
    const next = validated[index + 1];
    if (schema.terminal && next) {
      throw new ValidationError(
        next.stage.name,
        next.stage.position,
        undefined,
        `cannot follow terminal operation "${stage.name}"`,
      );
    }
  });

  let format = options.sourceFormat?.toLowerCase();
  for (const { stage, schema } of validated) {
    const params: Values = { ...stage.params };
    const selected = schema.formatKey ? params[schema.formatKey] : undefined;
    if (typeof selected === 'string') format = selected;
    if (!format) continue;

    const bounds = getFormatConstraints(mediaType, format);
    if (!bounds) continue;

    for (const [key, bound] of Object.entries(bounds)) {
      if (!paramSpec(schema, key)) continue;
      const value = params[key];
      if (value === undefined) {
        const only = singleValue(bound);
        if (only !== undefined) params[key] = only;
        continue;
      }
      const reason = checkBound(value, bound, format);
      if (reason) throw new ValidationError(stage.name, stage.position, key, reason);
    }
    stage.params = params;
  }

  return deepFreeze({
    mediaType,
    stages: validated.map(({ stage }) => stage),
    outputFormat: format,
  });
};
