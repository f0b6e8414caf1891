import type { EnvSnapshot, ScenarioExpectation, ValidationReport } from '../../domain/types.js';
import type { DisplayValue } from '../report/index.js';
import type { SettingsLoader } from '../settings-loader/index.js';

export interface ScenarioReport {
  id: string;
  name: string;
  passed: boolean;
  expected?: ScenarioExpectation;
  /** Masked resolved values; present when the scenario passed. */
  settings?: Record<string, DisplayValue>;
  /** Every failure; present when the scenario failed. */
  errors?: ValidationReport;
  report: string;
}

export interface RunScenarioOptions {
  base?: EnvSnapshot;
  loader?: SettingsLoader;
  placeholders?: EnvSnapshot;
}
