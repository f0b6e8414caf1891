import { Router, type Request, type Response } from 'express';
import { adHocScenarioInput, runScenariosInput } from '../../domain/schemas.js';
import { sendAppError, successResponse } from '../middleware/error-handler.js';
import {
  findScenario,
  getScenarioCatalog,
  runScenario,
  runScenarios,
} from '../../services/scenario-runner/index.js';
import type { SettingsLoader } from '../../services/settings-loader/index.js';
import { sendInvalidBody } from './shared.js';

function slugify(name: string): string {
  return name.toLowerCase().trim().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'custom';
}

export function createScenarioRouter(loader: SettingsLoader): Router {
  const router = Router();

  router.get('/scenarios', (_req: Request, res: Response) => {
    const summaries = getScenarioCatalog().scenarios.map(({ id, name, description, expected }) => ({
      id,
      name,
      description,
      expected,
    }));
    res.json(successResponse(summaries));
  });

  router.post('/scenarios/run', (req: Request, res: Response) => {
    const parsed = runScenariosInput.safeParse(req.body ?? {});
    if (!parsed.success) return sendInvalidBody(res, parsed.error);

    const result = runScenarios(parsed.data.ids, { base: parsed.data.base, loader });
    if (!result.ok) return sendAppError(res, result.error);

    res.json(successResponse(result.value));
  });

  router.post('/scenarios/custom', (req: Request, res: Response) => {
    const parsed = adHocScenarioInput.safeParse(req.body);
    if (!parsed.success) return sendInvalidBody(res, parsed.error);

    const { name, env, base } = parsed.data;
    const report = runScenario({ id: slugify(name), name, env }, { base, loader });
    res.json(successResponse(report));
  });

  router.post('/scenarios/:id/run', (req: Request, res: Response) => {
    const scenarioResult = findScenario(req.params.id);
    if (!scenarioResult.ok) return sendAppError(res, scenarioResult.error);

    res.json(successResponse(runScenario(scenarioResult.value, { loader })));
  });

  return router;
}
