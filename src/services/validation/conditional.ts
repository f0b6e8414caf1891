import { GENERAL_FIELD, type ValidationError } from '../../domain/types.js';
import { LLM_KEY_FIELDS, type Settings } from '../schema-registry/index.js';
import { PRODUCTION_SECRET_KEY_MIN_LENGTH, type ConditionalRuleSet, type NamedRule } from './types.js';

const PRODUCTION_RULES: readonly NamedRule[] = [
  {
    name: 'debug_disabled',
    check: (settings: Settings): ValidationError | null =>
      settings.DEBUG
        ? {
            field: 'DEBUG',
            kind: 'conditional',
            code: 'production_debug_enabled',
            message: 'DEBUG must be false in production',
          }
        : null,
  },
  {
    name: 'secret_key_length',
    check: (settings: Settings): ValidationError | null =>
      settings.SECRET_KEY.length < PRODUCTION_SECRET_KEY_MIN_LENGTH
        ? {
            field: 'SECRET_KEY',
            kind: 'conditional',
            code: 'production_secret_key_too_short',
            message: `SECRET_KEY must be at least ${PRODUCTION_SECRET_KEY_MIN_LENGTH} characters in production (got ${settings.SECRET_KEY.length})`,
          }
        : null,
  },
  {
    name: 'llm_key_present',
    check: (settings: Settings): ValidationError | null =>
      LLM_KEY_FIELDS.some((field) => settings[field] !== undefined)
        ? null
        : {
            field: GENERAL_FIELD,
            kind: 'conditional',
            code: 'production_llm_key_missing',
            message: `At least one LLM API key (${LLM_KEY_FIELDS.join(' or ')}) is required in production`,
          },
  },
];

/** Rules gated on APP_ENV. Modes without rules are a no-op. */
export const CONDITIONAL_RULES: ConditionalRuleSet = {
  development: [],
  staging: [],
  production: PRODUCTION_RULES,
};

export function validateConditional(
  settings: Settings,
  rules: ConditionalRuleSet = CONDITIONAL_RULES,
): ValidationError[] {
  return rules[settings.APP_ENV].flatMap((rule) => {
    const failure = rule.check(settings);
    return failure ? [failure] : [];
  });
}
