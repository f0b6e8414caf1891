import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { SCENARIO_EXPECTATIONS, type EnvSnapshot, type Scenario } from '../../domain/types.js';

const currentDir = dirname(fileURLToPath(import.meta.url));
const catalogPath = join(currentDir, 'catalog.json');

const envSchema = z.record(z.string(), z.string());

export const scenarioSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  expected: z.enum(SCENARIO_EXPECTATIONS).optional(),
  env: envSchema,
});

const catalogSchema = z.object({
  placeholders: envSchema,
  scenarios: z.array(scenarioSchema),
});

export interface ScenarioCatalog {
  placeholders: EnvSnapshot;
  scenarios: readonly Readonly<Scenario>[];
}

let catalog: ScenarioCatalog | null = null;

export function parseCatalog(raw: unknown): Result<ScenarioCatalog, AppError> {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError(ErrorCode.SCENARIO_CATALOG_INVALID, 'Scenario catalog is malformed', details));
  }

  const ids = new Set<string>();
  for (const scenario of parsed.data.scenarios) {
    if (ids.has(scenario.id)) {
      return err(
        createAppError(ErrorCode.SCENARIO_CATALOG_INVALID, `Duplicate scenario id '${scenario.id}'`),
      );
    }
    ids.add(scenario.id);
  }

  return ok({
    placeholders: Object.freeze(parsed.data.placeholders),
    scenarios: Object.freeze(
      parsed.data.scenarios.map((scenario) => Object.freeze({ ...scenario, env: Object.freeze({ ...scenario.env }) })),
    ),
  });
}

/** @throws {Error} If the bundled catalog file is malformed */
export function getScenarioCatalog(): ScenarioCatalog {
  if (!catalog) {
    const result = parseCatalog(JSON.parse(readFileSync(catalogPath, 'utf-8')));
    if (!result.ok) {
      throw new Error(`[${result.error.code}] ${result.error.message}: ${result.error.details ?? ''}`);
    }
    catalog = result.value;
  }
  return catalog;
}

export function findScenario(id: string): Result<Readonly<Scenario>, AppError> {
  const scenario = getScenarioCatalog().scenarios.find((candidate) => candidate.id === id);
  if (!scenario) {
    return err(createAppError(ErrorCode.SCENARIO_NOT_FOUND, `Scenario '${id}' not found`));
  }
  return ok(scenario);
}
