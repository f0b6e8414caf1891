export const ENVIRONMENT_MODES = ['development', 'staging', 'production'] as const;

export type EnvironmentMode = (typeof ENVIRONMENT_MODES)[number];

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['json', 'console'] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

export const PARAM_VERSIONS = ['v1.0', 'v2.0'] as const;

export type ParamVersion = (typeof PARAM_VERSIONS)[number];

/** Flat string-keyed, string-valued view of an environment. */
export type EnvSnapshot = Readonly<Record<string, string>>;

export const GENERAL_FIELD = 'general';

export const ISSUE_KINDS = ['coercion', 'format', 'cross_field', 'conditional'] as const;

export type IssueKind = (typeof ISSUE_KINDS)[number];

export const ISSUE_CODES = [
  'missing_field',
  'empty_field',
  'invalid_type',
  'invalid_choice',
  'out_of_range',
  'invalid_prefix',
  'dimension_weights_sum',
  'production_debug_enabled',
  'production_secret_key_too_short',
  'production_llm_key_missing',
] as const;

export type IssueCode = (typeof ISSUE_CODES)[number];

export interface ValidationError {
  field: string;
  kind: IssueKind;
  code: IssueCode;
  message: string;
}

/** Every failure found in one validation attempt, in the order the checks ran. */
export interface ValidationReport {
  errors: readonly ValidationError[];
}

export const SCENARIO_EXPECTATIONS = ['valid', 'invalid'] as const;

export type ScenarioExpectation = (typeof SCENARIO_EXPECTATIONS)[number];

/** A named set of overrides applied on top of a base snapshot. */
export interface Scenario {
  id: string;
  name: string;
  description?: string;
  expected?: ScenarioExpectation;
  env: EnvSnapshot;
}
