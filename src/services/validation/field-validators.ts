import { ok, err, type Result } from '../../domain/result.js';

export interface NumericRange {
  min?: number;
  max?: number;
}

const TRUE_STRINGS: ReadonlySet<string> = new Set(['true', '1', 'yes', 'on', 't', 'y']);
const FALSE_STRINGS: ReadonlySet<string> = new Set(['false', '0', 'no', 'off', 'f', 'n']);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseBoolean(field: string, raw: string): Result<boolean, string> {
  const normalized = raw.trim().toLowerCase();
  if (TRUE_STRINGS.has(normalized)) return ok(true);
  if (FALSE_STRINGS.has(normalized)) return ok(false);
  return err(`${field} must be a boolean (got '${raw}')`);
}

export function parseInteger(field: string, raw: string): Result<number, string> {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return err(`${field} must be an integer (got '${raw}')`);
  }
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    return err(`${field} must be a safe integer (|n| <= 2^53-1) (got '${raw}')`);
  }
  return ok(value);
}

export function parseDecimal(field: string, raw: string): Result<number, string> {
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return err(`${field} must be a number (got '${raw}')`);
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    return err(`${field} must be a number (got '${raw}')`);
  }
  return ok(value);
}

/** Inclusive at both ends. */
export function checkRange(field: string, value: number, range: NumericRange): Result<number, string> {
  if (range.min !== undefined && value < range.min) {
    return err(`${field} must be greater than or equal to ${range.min} (got ${value})`);
  }
  if (range.max !== undefined && value > range.max) {
    return err(`${field} must be less than or equal to ${range.max} (got ${value})`);
  }
  return ok(value);
}

function isOneOf<V extends string>(allowed: readonly V[], raw: string): raw is V {
  return allowed.some((candidate) => candidate === raw);
}

export function checkOneOf<V extends string>(
  field: string,
  raw: string,
  allowed: readonly V[],
): Result<V, string> {
  if (isOneOf(allowed, raw)) return ok(raw);
  return err(`${field} must be one of: ${allowed.join(', ')} (got '${raw}')`);
}

export function checkPrefix(field: string, value: string, prefix: string): Result<string, string> {
  if (value.startsWith(prefix)) return ok(value);
  return err(`${field} must start with '${prefix}'`);
}

export function requireNonEmpty(field: string, raw: string): Result<string, string> {
  if (raw.trim().length === 0) return err(`${field} must not be empty`);
  return ok(raw);
}
