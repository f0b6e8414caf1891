import { z } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { Secret } from '../../domain/secret.js';
import {
  checkOneOf,
  checkPrefix,
  checkRange,
  parseBoolean,
  parseDecimal,
  parseInteger,
  requireNonEmpty,
  type NumericRange,
} from '../validation/field-validators.js';
import type { FieldConstraint, FieldDeclaration, FieldDefault, FieldFailure, FieldType } from './types.js';

type Coerce<T> = (field: string, raw: string) => Result<T, FieldFailure>;

const declarations = new WeakMap<z.ZodTypeAny, FieldDeclaration>();

export function getFieldDeclaration(schema: z.ZodTypeAny): FieldDeclaration | undefined {
  return declarations.get(schema);
}

function declare<S extends z.ZodTypeAny>(schema: S, declaration: FieldDeclaration): S {
  declarations.set(schema, Object.freeze({ ...declaration }));
  return schema;
}

function fieldName(ctx: z.RefinementCtx): string {
  const last = ctx.path[ctx.path.length - 1];
  return last === undefined ? 'value' : String(last);
}

function addFailure(ctx: z.RefinementCtx, failure: FieldFailure): void {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: failure.message,
    params: { kind: failure.kind, code: failure.code },
  });
}

function asFailure<T>(
  result: Result<T, string>,
  code: FieldFailure['code'],
  kind: FieldFailure['kind'] = 'coercion',
): Result<T, FieldFailure> {
  return result.ok ? result : err({ kind, code, message: result.error });
}

function rangeConstraint(range: NumericRange): FieldConstraint {
  return range.min === undefined && range.max === undefined
    ? { kind: 'none' }
    : { kind: 'range', ...range };
}

function requiredField<T>(type: FieldType, constraint: FieldConstraint, secret: boolean, coerce: Coerce<T>) {
  const schema = z
    .string()
    .optional()
    .transform((raw, ctx): T => {
      const field = fieldName(ctx);
      if (raw === undefined) {
        addFailure(ctx, { kind: 'coercion', code: 'missing_field', message: `${field} is required` });
        return z.NEVER;
      }
      const result = coerce(field, raw);
      if (!result.ok) {
        addFailure(ctx, result.error);
        return z.NEVER;
      }
      return result.value;
    });

  return declare(schema, { type, required: true, constraint, secret });
}

function defaultedField<T extends FieldDefault>(
  type: FieldType,
  constraint: FieldConstraint,
  defaultValue: T,
  coerce: Coerce<T>,
) {
  const schema = z
    .string()
    .optional()
    .transform((raw, ctx): T => {
      if (raw === undefined) return defaultValue;
      const result = coerce(fieldName(ctx), raw);
      if (!result.ok) {
        addFailure(ctx, result.error);
        return z.NEVER;
      }
      return result.value;
    });

  return declare(schema, { type, required: false, defaultValue, constraint, secret: false });
}

/** Absent and empty values both resolve to `undefined`. */
function optionalField<T>(type: FieldType, constraint: FieldConstraint, secret: boolean, coerce: Coerce<T>) {
  const schema = z
    .string()
    .optional()
    .transform((raw, ctx): T | undefined => {
      if (raw === undefined || raw === '') return undefined;
      const result = coerce(fieldName(ctx), raw);
      if (!result.ok) {
        addFailure(ctx, result.error);
        return z.NEVER;
      }
      return result.value;
    });

  return declare(schema, { type, required: false, constraint, secret });
}

const coerceText: Coerce<string> = (_field, raw) => ok(raw);

const coerceNonEmpty: Coerce<string> = (field, raw) =>
  asFailure(requireNonEmpty(field, raw), 'empty_field');

function coerceNumber(parse: typeof parseInteger, range: NumericRange): Coerce<number> {
  return (field, raw) => {
    const parsed = asFailure(parse(field, raw), 'invalid_type');
    if (!parsed.ok) return parsed;
    return asFailure(checkRange(field, parsed.value, range), 'out_of_range');
  };
}

export function textField(defaultValue: string) {
  return defaultedField('string', { kind: 'none' }, defaultValue, coerceText);
}

export function requiredTextField() {
  return requiredField('string', { kind: 'non_empty' }, false, coerceNonEmpty);
}

export function optionalTextField() {
  return optionalField('string', { kind: 'none' }, false, coerceText);
}

export function booleanField(defaultValue: boolean) {
  return defaultedField('boolean', { kind: 'none' }, defaultValue, (field, raw) =>
    asFailure(parseBoolean(field, raw), 'invalid_type'),
  );
}

export function integerField(defaultValue: number, range: NumericRange = {}) {
  return defaultedField('integer', rangeConstraint(range), defaultValue, coerceNumber(parseInteger, range));
}

export function floatField(defaultValue: number, range: NumericRange = {}) {
  return defaultedField('float', rangeConstraint(range), defaultValue, coerceNumber(parseDecimal, range));
}

export function enumField<V extends string>(values: readonly V[], defaultValue: V) {
  return defaultedField('enum', { kind: 'enum', values }, defaultValue, (field, raw) =>
    asFailure(checkOneOf(field, raw, values), 'invalid_choice'),
  );
}

export function secretField() {
  return requiredField('secret', { kind: 'non_empty' }, true, (field, raw) => {
    const checked = coerceNonEmpty(field, raw);
    return checked.ok ? ok(new Secret(checked.value)) : checked;
  });
}

export function optionalSecretField(prefix?: string) {
  const constraint: FieldConstraint = prefix === undefined ? { kind: 'none' } : { kind: 'prefix', prefix };

  return optionalField('optional-secret', constraint, true, (field, raw) => {
    if (prefix !== undefined) {
      const checked = asFailure(checkPrefix(field, raw, prefix), 'invalid_prefix', 'format');
      if (!checked.ok) return checked;
    }
    return ok(new Secret(raw));
  });
}
