import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { EnvSnapshot, Scenario } from '../../domain/types.js';
import { createScenarioLogger, logger } from '../../infrastructure/logger.js';
import { renderSettingsReport, renderValidationReport, toDisplayRecord } from '../report/index.js';
import { requiredFieldNames } from '../schema-registry/index.js';
import { getSettingsLoader } from '../settings-loader/index.js';
import { getScenarioCatalog } from './catalog.js';
import type { RunScenarioOptions, ScenarioReport } from './types.js';

export type { RunScenarioOptions, ScenarioReport } from './types.js';
export { getScenarioCatalog, findScenario, parseCatalog, scenarioSchema, type ScenarioCatalog } from './catalog.js';

const log = logger.child({ module: 'scenario-runner' });

/**
 * Merges `overrides` over `base` and fills every required field that is
 * still missing from `placeholders`, so a scenario fails only on what it
 * sets out to test.
 */
export function buildScenarioSnapshot(
  base: EnvSnapshot,
  overrides: EnvSnapshot,
  placeholders: EnvSnapshot = getScenarioCatalog().placeholders,
): EnvSnapshot {
  const snapshot: Record<string, string> = { ...base, ...overrides };

  for (const name of requiredFieldNames()) {
    if (name in snapshot) continue;
    const placeholder = placeholders[name];
    if (placeholder === undefined) {
      log.warn({ field: name }, 'No placeholder for required field');
      continue;
    }
    snapshot[name] = placeholder;
  }

  return Object.freeze(snapshot);
}

export function runScenario(scenario: Scenario, options: RunScenarioOptions = {}): ScenarioReport {
  const snapshot = buildScenarioSnapshot(options.base ?? {}, scenario.env, options.placeholders);
  const scenarioLog = createScenarioLogger(scenario.id, snapshot.APP_ENV);
  const loader = options.loader ?? getSettingsLoader();

  const result = loader.load(snapshot);
  const summary = { id: scenario.id, name: scenario.name, expected: scenario.expected };

  if (result.ok) {
    scenarioLog.info('Scenario passed validation');
    return {
      ...summary,
      passed: true,
      settings: toDisplayRecord(result.value),
      report: renderSettingsReport(result.value),
    };
  }

  scenarioLog.info(
    { errorCount: result.error.errors.length, fields: result.error.errors.map((e) => e.field) },
    'Scenario failed validation',
  );
  return {
    ...summary,
    passed: false,
    errors: result.error,
    report: renderValidationReport(result.error),
  };
}

/**
 * Runs the given catalog scenarios (all of them when `ids` is omitted) in
 * order. A failing scenario never stops the run; an unknown id rejects the
 * whole request before anything runs.
 */
export function runScenarios(
  ids?: readonly string[],
  options: RunScenarioOptions = {},
): Result<ScenarioReport[], AppError> {
  const { scenarios } = getScenarioCatalog();
  let selected: Scenario[];

  if (ids === undefined) {
    selected = [...scenarios];
  } else {
    selected = [];
    const unknown: string[] = [];
    for (const id of ids) {
      const scenario = scenarios.find((candidate) => candidate.id === id);
      if (scenario) selected.push(scenario);
      else unknown.push(id);
    }
    if (unknown.length > 0) {
      return err(
        createAppError(
          ErrorCode.SCENARIO_NOT_FOUND,
          `Unknown scenario(s): ${unknown.join(', ')}`,
          `Known scenarios: ${scenarios.map((s) => s.id).join(', ')}`,
        ),
      );
    }
  }

  const reports = selected.map((scenario) => runScenario(scenario, options));
  log.info(
    { total: reports.length, passed: reports.filter((r) => r.passed).length },
    'Scenario run complete',
  );
  return ok(reports);
}

/** True when a scenario's outcome matches its declared expectation (or it declares none). */
export function meetsExpectation(report: ScenarioReport): boolean {
  if (report.expected === undefined) return true;
  return report.passed === (report.expected === 'valid');
}

export function renderScenarioReport(report: ScenarioReport): string {
  const status = report.passed ? 'PASS' : 'FAIL';
  return [`=== ${report.name} [${report.id}]: ${status}`, report.report].join('\n');
}
