import { describe, it, expect } from 'vitest';
import { adHocScenarioInput, runScenariosInput, validateSettingsInput } from '../../src/domain/schemas.js';

describe('validateSettingsInput', () => {
  it('accepts a string-valued env map', () => {
    const result = validateSettingsInput.safeParse({ env: { APP_ENV: 'development' } });
    expect(result.success).toBe(true);
  });

  it('accepts the optional useCache flag', () => {
    const result = validateSettingsInput.safeParse({ env: {}, useCache: false });
    expect(result.success).toBe(true);
  });

  it('rejects non-string env values', () => {
    const result = validateSettingsInput.safeParse({ env: { RATE_LIMIT_PER_MINUTE: 60 } });
    expect(result.success).toBe(false);
  });

  it('rejects a missing env', () => {
    const result = validateSettingsInput.safeParse({});
    expect(result.success).toBe(false);
  });
});

describe('runScenariosInput', () => {
  it('accepts an empty body', () => {
    expect(runScenariosInput.safeParse({}).success).toBe(true);
  });

  it('accepts ids and a base snapshot', () => {
    const result = runScenariosInput.safeParse({ ids: ['valid-development'], base: { APP_ENV: 'staging' } });
    expect(result.success).toBe(true);
  });

  it('rejects empty ids', () => {
    expect(runScenariosInput.safeParse({ ids: [''] }).success).toBe(false);
  });
});

describe('adHocScenarioInput', () => {
  it('requires a name', () => {
    const result = adHocScenarioInput.safeParse({ name: '', env: {} });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe('Scenario name is required');
  });

  it('accepts name and env', () => {
    expect(adHocScenarioInput.safeParse({ name: 'Mine', env: { DEBUG: 'true' } }).success).toBe(true);
  });
});
