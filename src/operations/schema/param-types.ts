import { z } from 'zod';
import type { ParamValue } from '../types.js';
import type { ParamType } from './types.js';

export type CoercionResult = { success: true; value: ParamValue } | { success: false; reason: string };

export type Coercer = (raw: string) => CoercionResult;

const BASE64URL = /^[A-Za-z0-9_-]+$/;
const PAGE_RANGE = /^(\d+)(?:-(\d+))?$/;
const MAX_PAGES = 1000;

const integer = z
  .string()
  .regex(/^-?\d+$/, { message: 'must be an integer' })
  .transform(Number);

const boundedInteger = (min: number, max: number) =>
  integer.pipe(
    z
      .number()
      .min(min, { message: `must be between ${min} and ${max}` })
      .max(max, { message: `must be between ${min} and ${max}` }),
  );

const base64Text = z
  .string()
  .regex(BASE64URL, { message: 'must be url-safe base64' })
  .transform((value) => Buffer.from(value, 'base64url').toString('utf8'));

// A single page or range may be written plainly (`pages_3`, `pages_2-4`); lists are base64url.
const pageText = z.string().transform((value, ctx) => {
  if (PAGE_RANGE.test(value)) return value;
  if (!BASE64URL.test(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a page range or url-safe base64' });
    return z.NEVER;
  }
  return Buffer.from(value, 'base64url').toString('utf8');
});

const pageList = pageText.transform((decoded, ctx): number[] => {
  const pages = new Set<number>();
  for (const part of decoded.split(',')) {
    const match = PAGE_RANGE.exec(part.trim());
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid page range "${part}"` });
      return z.NEVER;
    }
    const start = Number(match[1]);
    const end = match[2] === undefined ? start : Number(match[2]);
    if (start < 1 || end < start) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid page range "${part}"` });
      return z.NEVER;
    }
    if (pages.size + (end - start + 1) > MAX_PAGES) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `at most ${MAX_PAGES} pages` });
      return z.NEVER;
    }
    for (let page = start; page <= end; page += 1) pages.add(page);
  }
  return [...pages].sort((a, b) => a - b);
});

const buildSchema = (type: ParamType): z.ZodType<ParamValue, z.ZodTypeDef, string> => {
  switch (type.kind) {
    case 'int':
      return boundedInteger(type.min, type.max);
    case 'percent':
      return boundedInteger(1, 100);
    case 'int-set':
      return integer.refine((value) => type.values.includes(value), {
        message: `must be one of ${type.values.join(', ')}`,
      });
    case 'enum':
      return z.string().refine((value) => type.values.includes(value), {
        message: `must be one of ${type.values.join(', ')}`,
      });
    case 'color':
      return z
        .string()
        .regex(/^[0-9A-Fa-f]{6}$/, { message: 'must be six hex digits' })
        .transform((value) => value.toUpperCase());
    case 'bool':
      return z
        .string()
        .refine((value) => value === '0' || value === '1', { message: 'must be 0 or 1' })
        .transform((value) => value === '1');
    case 'text':
      return z
        .string()
        .min(1, { message: 'must not be empty' })
        .max(type.maxLength, { message: `must be at most ${type.maxLength} characters` });
    case 'base64-text':
      return base64Text.pipe(
        z
          .string()
          .min(1, { message: 'must not be empty' })
          .max(type.maxLength, { message: `must decode to at most ${type.maxLength} characters` }),
      );
    case 'page-list':
      return pageList;
  }
};

/** Build a raw-string coercer for a declared param type. */
export const createCoercer = (type: ParamType): Coercer => {
  const schema = buildSchema(type);
  return (raw) => {
    const result = schema.safeParse(raw);
    if (result.success) return { success: true, value: result.data };
    return { success: false, reason: result.error.issues[0]?.message ?? 'invalid value' };
  };
};
