import type { IssueCode, IssueKind } from '../../domain/types.js';

export type FieldType =
  | 'string'
  | 'boolean'
  | 'integer'
  | 'float'
  | 'enum'
  | 'secret'
  | 'optional-secret';

export type FieldConstraint =
  | { kind: 'none' }
  | { kind: 'non_empty' }
  | { kind: 'range'; min?: number; max?: number }
  | { kind: 'enum'; values: readonly string[] }
  | { kind: 'prefix'; prefix: string };

export type FieldDefault = string | number | boolean;

/** What a field factory records about the field it built. */
export interface FieldDeclaration {
  readonly type: FieldType;
  readonly required: boolean;
  /** Absent for required fields and for optional fields without a default. */
  readonly defaultValue?: FieldDefault;
  readonly constraint: FieldConstraint;
  readonly secret: boolean;
}

export interface ConfigField extends FieldDeclaration {
  readonly name: string;
}

export interface FieldFailure {
  kind: Extract<IssueKind, 'coercion' | 'format'>;
  code: IssueCode;
  message: string;
}
