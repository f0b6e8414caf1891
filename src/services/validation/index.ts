import { ok, err, type Result } from '../../domain/result.js';
import type { EnvSnapshot, ValidationReport } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { coerceSnapshot, type Settings } from '../schema-registry/index.js';
import { validateConditional } from './conditional.js';
import { validateCrossField } from './cross-field.js';

export type { NamedRule, SettingsRule, ConditionalRuleSet } from './types.js';
export { WEIGHT_SUM_TOLERANCE, PRODUCTION_SECRET_KEY_MIN_LENGTH } from './types.js';
export { validateCrossField, sumDimensionWeights, CROSS_FIELD_RULES } from './cross-field.js';
export { validateConditional, CONDITIONAL_RULES } from './conditional.js';

const log = logger.child({ module: 'validation' });

/**
 * Runs the full pipeline over one snapshot: field coercion, then the
 * cross-field and conditional rules. Rules only see a fully coerced
 * object, so any field failure ends the attempt before they run.
 */
export function validateSnapshot(snapshot: EnvSnapshot): Result<Settings, ValidationReport> {
  const coerced = coerceSnapshot(snapshot);
  if (!coerced.ok) {
    log.info({ stage: 'fields', errorCount: coerced.error.length }, 'Settings rejected at field level');
    return err({ errors: coerced.error });
  }

  const settings = coerced.value;
  const errors = [...validateCrossField(settings), ...validateConditional(settings)];

  if (errors.length > 0) {
    log.info(
      { stage: 'rules', environment: settings.APP_ENV, errorCount: errors.length },
      'Settings rejected by cross-field or conditional rules',
    );
    return err({ errors });
  }

  log.debug({ environment: settings.APP_ENV }, 'Settings validated');
  return ok(settings);
}
