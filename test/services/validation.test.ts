import { describe, it, expect } from 'vitest';
import {
  CONDITIONAL_RULES,
  sumDimensionWeights,
  validateConditional,
  validateCrossField,
  validateSnapshot,
} from '../../src/services/validation/index.js';
import { coerceSnapshot, type Settings } from '../../src/services/schema-registry/index.js';
import type { EnvSnapshot } from '../../src/domain/types.js';
import { DEFAULT_WEIGHTS, PRODUCTION_ENV, REQUIRED_ENV } from '../fixtures.js';

function coerce(env: EnvSnapshot): Settings {
  const result = coerceSnapshot(env);
  if (!result.ok) {
    throw new Error(`fixture failed to coerce: ${result.error.map((e) => e.message).join('; ')}`);
  }
  return result.value;
}

describe('validateSnapshot', () => {
  it('accepts a development snapshot with only required fields', () => {
    const result = validateSnapshot(REQUIRED_ENV);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.APP_ENV).toBe('development');
  });

  it('accepts a complete production snapshot', () => {
    const result = validateSnapshot({ ...PRODUCTION_ENV, ...DEFAULT_WEIGHTS });
    expect(result.ok).toBe(true);
  });

  it('reports every production violation together', () => {
    const result = validateSnapshot({
      ...REQUIRED_ENV,
      APP_ENV: 'production',
      DEBUG: 'true',
      SECRET_KEY: 'short',
      OPENAI_API_KEY: '',
      ANTHROPIC_API_KEY: '',
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.errors).toEqual([
      {
        field: 'DEBUG',
        kind: 'conditional',
        code: 'production_debug_enabled',
        message: 'DEBUG must be false in production',
      },
      {
        field: 'SECRET_KEY',
        kind: 'conditional',
        code: 'production_secret_key_too_short',
        message: 'SECRET_KEY must be at least 32 characters in production (got 5)',
      },
      {
        field: 'general',
        kind: 'conditional',
        code: 'production_llm_key_missing',
        message: 'At least one LLM API key (OPENAI_API_KEY or ANTHROPIC_API_KEY) is required in production',
      },
    ]);
  });

  it('rejects dimension weights that do not sum to 1.0', () => {
    const result = validateSnapshot({ ...REQUIRED_ENV, ...DEFAULT_WEIGHTS, W_DATA_INFRA: '0.20' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.errors).toEqual([
      {
        field: 'general',
        kind: 'cross_field',
        code: 'dimension_weights_sum',
        message: 'Dimension weights must sum to 1.0 (±0.001), got 1.02',
      },
    ]);
  });

  it('puts cross-field failures before conditional ones', () => {
    const result = validateSnapshot({ ...PRODUCTION_ENV, W_DATA_INFRA: '0.20', DEBUG: 'true' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.errors.map((e) => e.code)).toEqual([
      'dimension_weights_sum',
      'production_debug_enabled',
    ]);
  });

  it('stops at field failures without running the rules', () => {
    const result = validateSnapshot({
      ...REQUIRED_ENV,
      APP_ENV: 'production',
      DEBUG: 'true',
      RATE_LIMIT_PER_MINUTE: '1500',
      W_DATA_INFRA: '0.5',
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.errors).toEqual([
      {
        field: 'RATE_LIMIT_PER_MINUTE',
        kind: 'coercion',
        code: 'out_of_range',
        message: 'RATE_LIMIT_PER_MINUTE must be less than or equal to 1000 (got 1500)',
      },
    ]);
  });

  it('rejects a malformed API key as a format error', () => {
    const result = validateSnapshot({ ...PRODUCTION_ENV, OPENAI_API_KEY: 'pk-xxx' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.errors).toEqual([
      { field: 'OPENAI_API_KEY', kind: 'format', code: 'invalid_prefix', message: "OPENAI_API_KEY must start with 'sk-'" },
    ]);
  });

  it('is deterministic for the same snapshot', () => {
    const env = { ...REQUIRED_ENV, APP_ENV: 'production', DEBUG: 'on' };
    const first = validateSnapshot(env);
    const second = validateSnapshot(env);
    expect(first.ok).toBe(false);
    expect(second.ok).toBe(false);
    if (first.ok || second.ok) return;
    expect(second.error).toEqual(first.error);
  });
});

describe('validateCrossField', () => {
  it('sums the default weights to 1.0', () => {
    const settings = coerce(REQUIRED_ENV);
    expect(sumDimensionWeights(settings)).toBeCloseTo(1.0, 10);
    expect(validateCrossField(settings)).toEqual([]);
  });

  it('tolerates drift inside the tolerance', () => {
    expect(validateCrossField(coerce({ ...REQUIRED_ENV, W_CULTURE: '0.1005' }))).toEqual([]);
  });

  it('rejects drift beyond the tolerance in either direction', () => {
    expect(validateCrossField(coerce({ ...REQUIRED_ENV, W_CULTURE: '0.1015' }))).toHaveLength(1);
    expect(validateCrossField(coerce({ ...REQUIRED_ENV, W_CULTURE: '0.098' }))).toHaveLength(1);
  });

  it('runs caller-supplied rules in order', () => {
    const settings = coerce(REQUIRED_ENV);
    const errors = validateCrossField(settings, [
      { name: 'always_ok', check: () => null },
      {
        name: 'always_fails',
        check: () => ({ field: 'general', kind: 'cross_field', code: 'dimension_weights_sum', message: 'nope' }),
      },
    ]);
    expect(errors.map((e) => e.message)).toEqual(['nope']);
  });
});

describe('dimension weight tolerance across fields', () => {
  const withinTolerance: Array<[string, Record<string, string>, number]> = [
    ['two fields drifting up and down', { W_DATA_INFRA: '0.1805', W_TALENT: '0.1698' }, 1.0003],
    ['two fields drifting up', { W_TECH_STACK: '0.1504', W_LEADERSHIP: '0.1304' }, 1.0008],
    ['three fields drifting down', { W_AI_GOVERNANCE: '0.1497', W_USE_CASES: '0.1198', W_CULTURE: '0.0999' }, 0.9994],
    ['a rebalanced pair', { W_DATA_INFRA: '0.19', W_CULTURE: '0.09' }, 1],
    [
      'every field rebalanced',
      {
        W_DATA_INFRA: '0.2',
        W_AI_GOVERNANCE: '0.13',
        W_TECH_STACK: '0.16',
        W_TALENT: '0.16',
        W_LEADERSHIP: '0.12',
        W_USE_CASES: '0.13',
        W_CULTURE: '0.1',
      },
      1,
    ],
  ];

  const beyondTolerance: Array<[string, Record<string, string>, number]> = [
    ['two fields over by 0.002', { W_TECH_STACK: '0.151', W_LEADERSHIP: '0.131' }, 1.002],
    ['two fields under by 0.002', { W_AI_GOVERNANCE: '0.149', W_USE_CASES: '0.119' }, 0.998],
    ['three fields lowered', { W_DATA_INFRA: '0.17', W_TALENT: '0.16', W_CULTURE: '0.08' }, 0.96],
    [
      'every field raised',
      {
        W_DATA_INFRA: '0.25',
        W_AI_GOVERNANCE: '0.2',
        W_TECH_STACK: '0.2',
        W_TALENT: '0.2',
        W_LEADERSHIP: '0.2',
        W_USE_CASES: '0.2',
        W_CULTURE: '0.2',
      },
      1.45,
    ],
  ];

  for (const [label, weights, total] of withinTolerance) {
    it(`accepts ${label} (sum ${total})`, () => {
      const settings = coerce({ ...REQUIRED_ENV, ...weights });
      expect(sumDimensionWeights(settings)).toBeCloseTo(total, 9);
      expect(validateCrossField(settings)).toEqual([]);
    });
  }

  for (const [label, weights, total] of beyondTolerance) {
    it(`rejects ${label} (sum ${total})`, () => {
      expect(validateCrossField(coerce({ ...REQUIRED_ENV, ...weights }))).toEqual([
        {
          field: 'general',
          kind: 'cross_field',
          code: 'dimension_weights_sum',
          message: `Dimension weights must sum to 1.0 (±0.001), got ${total}`,
        },
      ]);
    });
  }
});

describe('validateConditional', () => {
  const lax = { ...REQUIRED_ENV, DEBUG: 'true', SECRET_KEY: 'short' };

  it('does nothing in development', () => {
    expect(validateConditional(coerce({ ...lax, APP_ENV: 'development' }))).toEqual([]);
  });

  it('does nothing in staging', () => {
    expect(validateConditional(coerce({ ...lax, APP_ENV: 'staging' }))).toEqual([]);
  });

  it('accepts an Anthropic key alone in production', () => {
    const settings = coerce({ ...REQUIRED_ENV, APP_ENV: 'production', ANTHROPIC_API_KEY: 'sk-ant-test' });
    expect(validateConditional(settings)).toEqual([]);
  });

  it('accepts a secret key of exactly 32 characters in production', () => {
    const settings = coerce({ ...PRODUCTION_ENV, SECRET_KEY: 'x'.repeat(32) });
    expect(validateConditional(settings)).toEqual([]);
  });

  it('rejects a secret key of 31 characters in production', () => {
    const settings = coerce({ ...PRODUCTION_ENV, SECRET_KEY: 'x'.repeat(31) });
    expect(validateConditional(settings).map((e) => e.message)).toEqual([
      'SECRET_KEY must be at least 32 characters in production (got 31)',
    ]);
  });

  it('only registers rules for production', () => {
    expect(CONDITIONAL_RULES.development).toHaveLength(0);
    expect(CONDITIONAL_RULES.staging).toHaveLength(0);
    expect(CONDITIONAL_RULES.production.map((r) => r.name)).toEqual([
      'debug_disabled',
      'secret_key_length',
      'llm_key_present',
    ]);
  });
});
