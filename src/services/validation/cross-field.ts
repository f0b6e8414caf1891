import { GENERAL_FIELD, type ValidationError } from '../../domain/types.js';
import { DIMENSION_WEIGHT_FIELDS, type Settings } from '../schema-registry/index.js';
import { WEIGHT_SUM_TARGET, WEIGHT_SUM_TOLERANCE, type NamedRule } from './types.js';

export function sumDimensionWeights(settings: Settings): number {
  return DIMENSION_WEIGHT_FIELDS.reduce((sum, field) => sum + settings[field], 0);
}

export function checkDimensionWeightSum(settings: Settings): ValidationError | null {
  const total = sumDimensionWeights(settings);
  if (Math.abs(total - WEIGHT_SUM_TARGET) <= WEIGHT_SUM_TOLERANCE) return null;

  return {
    field: GENERAL_FIELD,
    kind: 'cross_field',
    code: 'dimension_weights_sum',
    message: `Dimension weights must sum to 1.0 (±${WEIGHT_SUM_TOLERANCE}), got ${Number(total.toFixed(6))}`,
  };
}

export const CROSS_FIELD_RULES: readonly NamedRule[] = [
  { name: 'dimension_weights_sum', check: checkDimensionWeightSum },
];

export function validateCrossField(
  settings: Settings,
  rules: readonly NamedRule[] = CROSS_FIELD_RULES,
): ValidationError[] {
  return rules.flatMap((rule) => {
    const failure = rule.check(settings);
    return failure ? [failure] : [];
  });
}
