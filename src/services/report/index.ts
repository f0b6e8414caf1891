import { Secret, SECRET_MASK } from '../../domain/secret.js';
import type { ValidationReport } from '../../domain/types.js';
import { listFields, type Settings } from '../schema-registry/index.js';

export type DisplayValue = string | number | boolean | null;

const NOT_SET = '(not set)';

function toDisplayValue(value: unknown): DisplayValue {
  if (value === undefined || value === null) return null;
  if (value instanceof Secret) return SECRET_MASK;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

/** Every declared field in declaration order; secrets masked, absent optionals as `null`. */
export function toDisplayRecord(settings: Settings): Record<string, DisplayValue> {
  const entries: Record<string, unknown> = { ...settings };
  const record: Record<string, DisplayValue> = {};
  for (const field of listFields()) {
    record[field.name] = toDisplayValue(entries[field.name]);
  }
  return record;
}

export function renderSettingsReport(settings: Settings): string {
  const lines = ['Configuration is VALID', ''];
  for (const [name, value] of Object.entries(toDisplayRecord(settings))) {
    lines.push(`${name}: ${value === null ? NOT_SET : String(value)}`);
  }
  return lines.join('\n');
}

export function renderValidationReport(report: ValidationReport): string {
  const count = report.errors.length;
  const lines = [`Configuration is INVALID (${count} ${count === 1 ? 'error' : 'errors'})`, ''];
  for (const entry of report.errors) {
    lines.push(`- ${entry.field}: ${entry.message}`);
  }
  return lines.join('\n');
}
