import type { EnvSnapshot } from '../src/domain/types.js';

/** Every required field with a throwaway value; everything else falls back to defaults. */
export const REQUIRED_ENV: EnvSnapshot = {
  SECRET_KEY: 'test-secret-key-0123456789abcdefghijklmn',
  SNOWFLAKE_ACCOUNT: 'test_account',
  SNOWFLAKE_USER: 'test_user',
  SNOWFLAKE_PASSWORD: 'test-password',
  SNOWFLAKE_WAREHOUSE: 'test_warehouse',
  AWS_ACCESS_KEY_ID: 'test-access-key',
  AWS_SECRET_ACCESS_KEY: 'test-secret-access-key',
  S3_BUCKET: 'test_bucket',
};

export const PRODUCTION_ENV: EnvSnapshot = {
  ...REQUIRED_ENV,
  APP_ENV: 'production',
  DEBUG: 'false',
  OPENAI_API_KEY: 'sk-test-key',
};

export const DEFAULT_WEIGHTS: EnvSnapshot = {
  W_DATA_INFRA: '0.18',
  W_AI_GOVERNANCE: '0.15',
  W_TECH_STACK: '0.15',
  W_TALENT: '0.17',
  W_LEADERSHIP: '0.13',
  W_USE_CASES: '0.12',
  W_CULTURE: '0.10',
};
