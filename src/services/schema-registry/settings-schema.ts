import { z } from 'zod';
import { ENVIRONMENT_MODES, LOG_FORMATS, LOG_LEVELS, PARAM_VERSIONS } from '../../domain/types.js';
import {
  booleanField,
  enumField,
  floatField,
  integerField,
  optionalSecretField,
  optionalTextField,
  requiredTextField,
  secretField,
  textField,
} from './fields.js';

export const API_KEY_PREFIX = 'sk-';

/**
 * Every platform setting, in report order. Each value arrives as a raw
 * environment string and is coerced by its field factory.
 */
export const settingsSchema = z.object({
  // Application
  APP_NAME: textField('PE Org-AI-R Platform'),
  APP_VERSION: textField('4.0.0'),
  APP_ENV: enumField(ENVIRONMENT_MODES, 'development'),
  DEBUG: booleanField(false),
  LOG_LEVEL: enumField(LOG_LEVELS, 'INFO'),
  LOG_FORMAT: enumField(LOG_FORMATS, 'json'),
  SECRET_KEY: secretField(),

  // API
  API_V1_PREFIX: textField('/api/v1'),
  API_V2_PREFIX: textField('/api/v2'),
  RATE_LIMIT_PER_MINUTE: integerField(60, { min: 1, max: 1000 }),

  // Parameter versioning
  PARAM_VERSION: enumField(PARAM_VERSIONS, 'v2.0'),

  // LLM providers
  OPENAI_API_KEY: optionalSecretField(API_KEY_PREFIX),
  ANTHROPIC_API_KEY: optionalSecretField(API_KEY_PREFIX),
  DEFAULT_LLM_MODEL: textField('gpt-4o-2024-08-06'),
  FALLBACK_LLM_MODEL: textField('claude-sonnet-4-20250514'),

  // Cost management
  DAILY_COST_BUDGET_USD: floatField(500, { min: 0 }),
  COST_ALERT_THRESHOLD_PCT: floatField(0.8, { min: 0, max: 1 }),

  // Human-in-the-loop review
  HITL_SCORE_CHANGE_THRESHOLD: floatField(15, { min: 5, max: 30 }),
  HITL_EBITDA_PROJECTION_THRESHOLD: floatField(10, { min: 5, max: 25 }),

  // Snowflake
  SNOWFLAKE_ACCOUNT: requiredTextField(),
  SNOWFLAKE_USER: requiredTextField(),
  SNOWFLAKE_PASSWORD: secretField(),
  SNOWFLAKE_DATABASE: textField('PE_ORGAIR'),
  SNOWFLAKE_SCHEMA: textField('PUBLIC'),
  SNOWFLAKE_WAREHOUSE: requiredTextField(),
  SNOWFLAKE_ROLE: textField('PE_ORGAIR_ROLE'),

  // AWS
  AWS_ACCESS_KEY_ID: secretField(),
  AWS_SECRET_ACCESS_KEY: secretField(),
  AWS_REGION: textField('us-east-1'),
  S3_BUCKET: requiredTextField(),

  // Redis
  REDIS_URL: textField('redis://localhost:6379/0'),
  CACHE_TTL_SECTORS: integerField(86400),
  CACHE_TTL_SCORES: integerField(3600),

  // Scoring parameters (v2.0)
  ALPHA_VR_WEIGHT: floatField(0.6, { min: 0.55, max: 0.7 }),
  BETA_SYNERGY_WEIGHT: floatField(0.12, { min: 0.08, max: 0.2 }),
  LAMBDA_PENALTY: floatField(0.25, { min: 0, max: 0.5 }),
  DELTA_POSITION: floatField(0.15, { min: 0.1, max: 0.2 }),

  // Dimension weights
  W_DATA_INFRA: floatField(0.18, { min: 0, max: 1 }),
  W_AI_GOVERNANCE: floatField(0.15, { min: 0, max: 1 }),
  W_TECH_STACK: floatField(0.15, { min: 0, max: 1 }),
  W_TALENT: floatField(0.17, { min: 0, max: 1 }),
  W_LEADERSHIP: floatField(0.13, { min: 0, max: 1 }),
  W_USE_CASES: floatField(0.12, { min: 0, max: 1 }),
  W_CULTURE: floatField(0.1, { min: 0, max: 1 }),

  // Task queue
  CELERY_BROKER_URL: textField('redis://localhost:6379/1'),
  CELERY_RESULT_BACKEND: textField('redis://localhost:6379/2'),

  // Observability
  OTEL_EXPORTER_OTLP_ENDPOINT: optionalTextField(),
  OTEL_SERVICE_NAME: textField('pe-orgair'),
});

export type Settings = Readonly<z.output<typeof settingsSchema>>;

export type SettingName = keyof Settings;

export const DIMENSION_WEIGHT_FIELDS = [
  'W_DATA_INFRA',
  'W_AI_GOVERNANCE',
  'W_TECH_STACK',
  'W_TALENT',
  'W_LEADERSHIP',
  'W_USE_CASES',
  'W_CULTURE',
] as const satisfies readonly SettingName[];

export type DimensionWeightField = (typeof DIMENSION_WEIGHT_FIELDS)[number];

export const LLM_KEY_FIELDS = ['OPENAI_API_KEY', 'ANTHROPIC_API_KEY'] as const satisfies readonly SettingName[];
