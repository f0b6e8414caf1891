import type { EnvironmentMode, ValidationError } from '../../domain/types.js';
import type { Settings } from '../schema-registry/index.js';

/** A rule over a fully coerced settings object; returns `null` when satisfied. */
export type SettingsRule = (settings: Settings) => ValidationError | null;

export interface NamedRule {
  name: string;
  check: SettingsRule;
}

export type ConditionalRuleSet = Record<EnvironmentMode, readonly NamedRule[]>;

export const WEIGHT_SUM_TARGET = 1.0;
export const WEIGHT_SUM_TOLERANCE = 0.001;
export const PRODUCTION_SECRET_KEY_MIN_LENGTH = 32;
