import { z } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { Secret } from '../../domain/secret.js';
import {
  GENERAL_FIELD,
  ISSUE_CODES,
  ISSUE_KINDS,
  type EnvSnapshot,
  type IssueCode,
  type IssueKind,
  type ValidationError,
} from '../../domain/types.js';
import { getFieldDeclaration } from './fields.js';
import { settingsSchema, type Settings } from './settings-schema.js';
import type { ConfigField } from './types.js';

export type { ConfigField, FieldConstraint, FieldType } from './types.js';
export {
  API_KEY_PREFIX,
  DIMENSION_WEIGHT_FIELDS,
  LLM_KEY_FIELDS,
  settingsSchema,
  type DimensionWeightField,
  type SettingName,
  type Settings,
} from './settings-schema.js';

function isIssueKind(value: unknown): value is IssueKind {
  return ISSUE_KINDS.some((kind) => kind === value);
}

function isIssueCode(value: unknown): value is IssueCode {
  return ISSUE_CODES.some((code) => code === value);
}

function toValidationError(issue: z.ZodIssue): ValidationError {
  const field = issue.path.length > 0 ? String(issue.path[0]) : GENERAL_FIELD;

  if (issue.code === z.ZodIssueCode.custom) {
    const kind: unknown = issue.params?.kind;
    const code: unknown = issue.params?.code;
    return {
      field,
      kind: isIssueKind(kind) ? kind : 'coercion',
      code: isIssueCode(code) ? code : 'invalid_type',
      message: issue.message,
    };
  }

  return { field, kind: 'coercion', code: 'invalid_type', message: `${field}: ${issue.message}` };
}

let fieldCache: readonly ConfigField[] | null = null;

export function listFields(): readonly ConfigField[] {
  if (!fieldCache) {
    fieldCache = Object.freeze(
      Object.entries(settingsSchema.shape).flatMap(([name, schema]) => {
        const declaration = getFieldDeclaration(schema);
        return declaration ? [Object.freeze({ name, ...declaration })] : [];
      }),
    );
  }
  return fieldCache;
}

export function requiredFieldNames(): string[] {
  return listFields()
    .filter((field) => field.required)
    .map((field) => field.name);
}

/**
 * Coerces every declared field from its raw string. All field-level
 * failures are returned together; keys the schema does not declare are
 * ignored.
 */
export function coerceSnapshot(snapshot: EnvSnapshot): Result<Settings, ValidationError[]> {
  const parsed = settingsSchema.safeParse(snapshot);
  if (parsed.success) {
    return ok(Object.freeze(parsed.data));
  }
  return err(parsed.error.issues.map(toValidationError));
}

/** Inverse of {@link coerceSnapshot}: secrets are revealed, absent optionals omitted. */
export function serializeSettings(settings: Settings): Record<string, string> {
  const snapshot: Record<string, string> = {};
  for (const [name, value] of Object.entries(settings)) {
    if (value === undefined) continue;
    snapshot[name] = value instanceof Secret ? value.reveal() : String(value);
  }
  return snapshot;
}
